import { z } from "zod";

import { parseDigShortOutput } from "./parsers";
import { defineTool, fromCommandResult } from "./registry";
import { domainSchema, hostSchema, recordTypeSchema } from "./validators";

const lookupInput = z.object({
  domain: domainSchema,
  recordType: recordTypeSchema.default("A"),
  server: hostSchema.optional(),
});

export const nslookupQueryTool = defineTool({
  name: "nslookup_query",
  category: "dns",
  description: "Resolve a DNS record with nslookup, optionally against a specific server.",
  operation: "nslookup query",
  input: lookupInput,
  run: async (input, context) => {
    const argv = ["nslookup", `-type=${input.recordType}`, input.domain];
    if (input.server) {
      argv.push(input.server);
    }

    const result = await context.exec(argv, { timeoutSeconds: context.settings.defaultTimeoutSeconds });
    return fromCommandResult(result, {
      domain: input.domain,
      recordType: input.recordType,
      server: input.server ?? null,
    });
  },
});

export const digQueryTool = defineTool({
  name: "dig_query",
  category: "dns",
  description: "Resolve a DNS record with dig and return the short-form answers.",
  operation: "dig query",
  input: lookupInput,
  run: async (input, context) => {
    const argv = ["dig"];
    if (input.server) {
      argv.push(`@${input.server}`);
    }
    argv.push("+short", input.recordType, input.domain);

    const result = await context.exec(argv, { timeoutSeconds: context.settings.defaultTimeoutSeconds });
    return fromCommandResult(result, {
      domain: input.domain,
      recordType: input.recordType,
      server: input.server ?? null,
      answers: result.success ? parseDigShortOutput(result.stdout) : [],
    });
  },
});

export const hostLookupTool = defineTool({
  name: "host_lookup",
  category: "dns",
  description: "Resolve a DNS record with the host utility.",
  operation: "host lookup",
  input: lookupInput.omit({ server: true }),
  run: async (input, context) => {
    const result = await context.exec(["host", "-t", input.recordType, input.domain], {
      timeoutSeconds: context.settings.defaultTimeoutSeconds,
    });

    return fromCommandResult(result, { domain: input.domain, recordType: input.recordType });
  },
});

export const dnsTools = [nslookupQueryTool, digQueryTool, hostLookupTool];
