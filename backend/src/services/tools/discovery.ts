import { z } from "zod";

import { defineTool, fromCommandResult, ToolInputError } from "./registry";
import { boundedInt, networkTargetSchema, portSpecSchema } from "./validators";

const NMAP_SCAN_ARGS = {
  basic: ["-sT", "-T4"],
  quick: ["-sS", "-T4", "--top-ports", "100"],
  full: ["-sS", "-sV", "-O", "-T4"],
} as const;

type NmapScanType = keyof typeof NMAP_SCAN_ARGS;

// SYN and OS detection scans need raw sockets.
const PRIVILEGED_SCAN_TYPES: ReadonlySet<NmapScanType> = new Set(["quick", "full"]);

export const nmapScanTool = defineTool({
  name: "nmap_scan",
  category: "discovery",
  description: "Scan a host or network for open ports with nmap.",
  operation: "nmap scan",
  input: z.object({
    target: networkTargetSchema,
    ports: portSpecSchema.optional(),
    scanType: z.enum(["basic", "quick", "full"]).default("basic"),
    timeout: boundedInt(1, 3600).optional(),
  }),
  run: async (input, context) => {
    if (PRIVILEGED_SCAN_TYPES.has(input.scanType) && !context.settings.allowPrivilegedCommands) {
      throw new ToolInputError(`Scan type "${input.scanType}" requires ALLOW_PRIVILEGED_COMMANDS to be enabled`);
    }

    const argv = ["nmap", ...NMAP_SCAN_ARGS[input.scanType]];
    if (input.ports) {
      argv.push("-p", input.ports);
    }
    argv.push(input.target);

    const result = await context.exec(argv, {
      timeoutSeconds: input.timeout ?? context.settings.nmapTimeoutSeconds,
    });

    return fromCommandResult(result, {
      target: input.target,
      ports: input.ports ?? null,
      scanType: input.scanType,
    });
  },
});

export const serviceDiscoveryTool = defineTool({
  name: "service_discovery",
  category: "discovery",
  description: "Detect service versions on a host's open ports with nmap.",
  operation: "service discovery",
  input: z.object({
    target: networkTargetSchema,
    ports: portSpecSchema.optional(),
  }),
  run: async (input, context) => {
    const argv = ["nmap", "-sV", "-sC", "--version-intensity", "5"];
    if (input.ports) {
      argv.push("-p", input.ports);
    }
    argv.push(input.target);

    const result = await context.exec(argv, { timeoutSeconds: context.settings.nmapTimeoutSeconds });

    return fromCommandResult(result, { target: input.target, ports: input.ports ?? null });
  },
});

export const discoveryTools = [nmapScanTool, serviceDiscoveryTool];
