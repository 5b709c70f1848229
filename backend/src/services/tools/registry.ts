import type { FastifyBaseLogger } from "fastify";
import type { z } from "zod";

import type { ToolSettings } from "../../config/env";
import type { MetricsCollector } from "../metrics-collector";
import type { CommandRunner, ExecutableLookup } from "./command-runner";
import { formatIssues } from "./validators";

export type ToolCategory = "connectivity" | "dns" | "http" | "discovery" | "system";

export type ToolEnvelope = { success: boolean } & Record<string, unknown>;

export type ToolPreconditionFailure = {
  error: true;
  operation: string;
  message: string;
};

export type ToolContext = {
  exec: CommandRunner;
  which: ExecutableLookup;
  settings: ToolSettings;
  log: FastifyBaseLogger;
};

export type ToolDefinition<TSchema extends z.ZodTypeAny> = {
  name: string;
  category: ToolCategory;
  description: string;
  // Human readable verb phrase used in precondition failures, e.g. "ping host".
  operation: string;
  input: TSchema;
  run: (input: z.output<TSchema>, context: ToolContext) => Promise<ToolEnvelope>;
};

type PreparedRun =
  | { ok: true; run: (context: ToolContext) => Promise<ToolEnvelope> }
  | { ok: false; message: string };

export type Tool = {
  name: string;
  category: ToolCategory;
  description: string;
  operation: string;
  prepare: (args: unknown) => PreparedRun;
};

export type ToolRegistry = ReadonlyMap<string, Tool>;

export type ToolExecution =
  | { kind: "completed"; envelope: ToolEnvelope }
  | { kind: "rejected"; failure: ToolPreconditionFailure };

/** Raised by a tool when validated input is still unusable, e.g. a mode that is switched off. */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolInputError";
  }
}

export const defineTool = <TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): Tool => ({
  name: definition.name,
  category: definition.category,
  description: definition.description,
  operation: definition.operation,
  prepare: (args) => {
    const parsed = definition.input.safeParse(args ?? {});
    if (!parsed.success) {
      return { ok: false, message: formatIssues(parsed.error) };
    }

    const input: z.output<TSchema> = parsed.data;
    return { ok: true, run: (context) => definition.run(input, context) };
  },
});

export const createToolRegistry = (tools: readonly Tool[]): ToolRegistry => {
  const registry = new Map<string, Tool>();

  for (const tool of tools) {
    if (registry.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }

    registry.set(tool.name, tool);
  }

  return registry;
};

export const listTools = (registry: ToolRegistry) =>
  [...registry.values()].map((tool) => ({
    name: tool.name,
    category: tool.category,
    description: tool.description,
  }));

/**
 * Returns null for an unknown tool. Every run that gets past validation is
 * recorded on the collector, including runs that throw; the error is then
 * rethrown.
 */
export const executeTool = async (
  registry: ToolRegistry,
  name: string,
  args: unknown,
  context: ToolContext & { collector: MetricsCollector }
): Promise<ToolExecution | null> => {
  const tool = registry.get(name);
  if (!tool) {
    return null;
  }

  const rejected = (message: string): ToolExecution => {
    context.log.warn({ tool: name, message }, "Tool input rejected");
    return { kind: "rejected", failure: { error: true, operation: tool.operation, message } };
  };

  const prepared = tool.prepare(args);
  if (!prepared.ok) {
    return rejected(prepared.message);
  }

  const startedAt = performance.now();

  try {
    const envelope = await prepared.run(context);
    context.collector.recordToolExecution({
      tool: name,
      durationSeconds: (performance.now() - startedAt) / 1000,
      success: envelope.success,
    });

    return { kind: "completed", envelope };
  } catch (error) {
    if (error instanceof ToolInputError) {
      return rejected(error.message);
    }

    context.collector.recordToolExecution({
      tool: name,
      durationSeconds: (performance.now() - startedAt) / 1000,
      success: false,
    });
    throw error;
  }
};

/** Wraps a runner so every command line and spawn failure reaches the request log. */
export const createLoggedRunner = (runner: CommandRunner, log: FastifyBaseLogger): CommandRunner => {
  return async (argv, options) => {
    log.debug({ command: argv.join(" "), timeoutSeconds: options.timeoutSeconds }, "Executing command");
    const result = await runner(argv, options);

    if (result.returnCode === -1) {
      log.error({ command: result.command, stderr: result.stderr }, "Command failed to complete");
    }

    return result;
  };
};

export const fromCommandResult = (
  result: { success: boolean; stdout: string; stderr: string; returnCode: number },
  fields: Record<string, unknown> = {}
): ToolEnvelope => ({
  success: result.success,
  ...fields,
  stdout: result.stdout,
  stderr: result.stderr,
  returnCode: result.returnCode,
});
