import { z } from "zod";

import { parseMtrOutput, parsePingOutput, parseTracerouteOutput } from "./parsers";
import { defineTool, fromCommandResult } from "./registry";
import { boundedInt, hostSchema, portSchema } from "./validators";

export const pingHostTool = defineTool({
  name: "ping_host",
  category: "connectivity",
  description: "Send ICMP echo requests to a host and report packet loss and round-trip times.",
  operation: "ping host",
  input: z.object({
    host: hostSchema,
    count: boundedInt(1, 100).optional(),
    timeout: boundedInt(1, 60).default(10),
  }),
  run: async (input, context) => {
    const count = input.count ?? context.settings.pingCount;
    const result = await context.exec(["ping", "-c", String(count), "-W", String(input.timeout), input.host], {
      timeoutSeconds: count * input.timeout + 5,
    });

    if (!result.success) {
      return fromCommandResult(result, { host: input.host, error: result.stderr });
    }

    return fromCommandResult(result, { host: input.host, stats: parsePingOutput(result.stdout) });
  },
});

export const traceroutePathTool = defineTool({
  name: "traceroute_path",
  category: "connectivity",
  description: "Trace the route packets take to a host.",
  operation: "traceroute path",
  input: z.object({
    target: hostSchema,
    maxHops: boundedInt(1, 64).optional(),
    waitSeconds: boundedInt(1, 30).default(3),
    timeout: boundedInt(1, 600).optional(),
  }),
  run: async (input, context) => {
    const maxHops = input.maxHops ?? context.settings.tracerouteMaxHops;
    const result = await context.exec(
      ["traceroute", "-m", String(maxHops), "-w", String(input.waitSeconds), input.target],
      { timeoutSeconds: (input.timeout ?? context.settings.defaultTimeoutSeconds) + 10 }
    );

    if (!result.success) {
      return fromCommandResult(result, { target: input.target, error: result.stderr });
    }

    return fromCommandResult(result, { target: input.target, hops: parseTracerouteOutput(result.stdout) });
  },
});

export const mtrMonitorTool = defineTool({
  name: "mtr_monitor",
  category: "connectivity",
  description: "Probe every hop to a host repeatedly with mtr and report per-hop loss and latency.",
  operation: "mtr monitor",
  input: z.object({
    target: hostSchema,
    count: boundedInt(1, 100).default(10),
    timeout: boundedInt(1, 600).optional(),
  }),
  run: async (input, context) => {
    const result = await context.exec(
      ["mtr", "--report", "--report-wide", "-c", String(input.count), input.target],
      { timeoutSeconds: (input.timeout ?? context.settings.defaultTimeoutSeconds) + 10 }
    );

    if (!result.success) {
      return fromCommandResult(result, { target: input.target, error: result.stderr });
    }

    return fromCommandResult(result, { target: input.target, hops: parseMtrOutput(result.stdout) });
  },
});

export const netcatTestTool = defineTool({
  name: "netcat_test",
  category: "connectivity",
  description: "Check whether a TCP port on a host accepts connections.",
  operation: "netcat test",
  input: z.object({
    host: hostSchema,
    port: portSchema,
    timeout: boundedInt(1, 60).default(10),
  }),
  run: async (input, context) => {
    const result = await context.exec(["nc", "-z", "-w", String(input.timeout), input.host, String(input.port)], {
      timeoutSeconds: input.timeout + 5,
    });

    return fromCommandResult(result, { host: input.host, port: input.port, connected: result.success });
  },
});

export const connectivityTools = [pingHostTool, traceroutePathTool, mtrMonitorTool, netcatTestTool];
