import { statfs } from "node:fs/promises";
import os from "node:os";

import { z } from "zod";

import { parseArpOutput, parseNetstatOutput, parseSsOutput } from "./parsers";
import { defineTool, fromCommandResult } from "./registry";
import { protocolSchema, socketStateSchema } from "./validators";

export const REQUIRED_BINARIES = [
  "ping",
  "traceroute",
  "mtr",
  "nc",
  "nslookup",
  "dig",
  "host",
  "curl",
  "nmap",
  "ss",
  "netstat",
  "arp",
] as const;

const protocolFlags = (protocol: "tcp" | "udp" | undefined): string => {
  if (protocol === "tcp") {
    return "t";
  }

  if (protocol === "udp") {
    return "u";
  }

  return "tu";
};

const percentOf = (part: number, total: number): number => (total > 0 ? Number(((part / total) * 100).toFixed(2)) : 0);

export const ssConnectionsTool = defineTool({
  name: "ss_connections",
  category: "system",
  description: "List sockets with ss, optionally filtered by protocol and state.",
  operation: "ss connections",
  input: z.object({
    protocol: protocolSchema.optional(),
    state: socketStateSchema.optional(),
  }),
  run: async (input, context) => {
    const flags = protocolFlags(input.protocol);
    const argv = input.state ? ["ss", `-${flags}n`, "state", input.state] : ["ss", `-${flags}ln`];

    const result = await context.exec(argv, { timeoutSeconds: context.settings.defaultTimeoutSeconds });
    const sockets = result.success
      ? parseSsOutput(result.stdout).map((entry) => ({ ...entry, state: entry.state ?? input.state ?? null }))
      : [];

    return fromCommandResult(result, {
      protocol: input.protocol ?? null,
      state: input.state ?? null,
      sockets,
    });
  },
});

export const netstatConnectionsTool = defineTool({
  name: "netstat_connections",
  category: "system",
  description: "List listening sockets with netstat, optionally filtered by protocol and state.",
  operation: "netstat connections",
  input: z.object({
    protocol: protocolSchema.optional(),
    state: z.string().trim().regex(/^[A-Za-z_0-9]+$/, "must be a socket state such as LISTEN").optional(),
  }),
  run: async (input, context) => {
    const result = await context.exec(["netstat", `-${protocolFlags(input.protocol)}ln`], {
      timeoutSeconds: context.settings.defaultTimeoutSeconds,
    });

    const wanted = input.state?.toUpperCase();
    const connections = result.success
      ? parseNetstatOutput(result.stdout).filter((entry) => !wanted || entry.state?.toUpperCase() === wanted)
      : [];

    return fromCommandResult(result, {
      protocol: input.protocol ?? null,
      state: input.state ?? null,
      connections,
    });
  },
});

export const arpTableTool = defineTool({
  name: "arp_table",
  category: "system",
  description: "Show the ARP neighbour table.",
  operation: "arp table",
  input: z.object({}),
  run: async (_input, context) => {
    const result = await context.exec(["arp", "-a"], { timeoutSeconds: context.settings.defaultTimeoutSeconds });

    return fromCommandResult(result, { entries: result.success ? parseArpOutput(result.stdout) : [] });
  },
});

export const systemStatusTool = defineTool({
  name: "system_status",
  category: "system",
  description: "Report host load, memory, disk and network interfaces.",
  operation: "system status",
  input: z.object({}),
  run: async () => {
    const totalMemory = os.totalmem();
    const freeMemory = os.freemem();
    const cpus = os.cpus();
    const disk = await statfs("/");
    const diskTotal = disk.blocks * disk.bsize;
    const diskFree = disk.bavail * disk.bsize;

    const networkInterfaces = Object.fromEntries(
      Object.entries(os.networkInterfaces()).map(([name, addresses]) => [
        name,
        (addresses ?? []).map((entry) => ({
          family: entry.family,
          address: entry.address,
          internal: entry.internal,
        })),
      ])
    );

    return {
      success: true,
      hostname: os.hostname(),
      platform: os.platform(),
      release: os.release(),
      arch: os.arch(),
      uptimeSeconds: Math.floor(os.uptime()),
      loadAverage: os.loadavg(),
      cpu: {
        count: cpus.length,
        model: cpus[0]?.model ?? null,
      },
      memory: {
        total: totalMemory,
        free: freeMemory,
        used: totalMemory - freeMemory,
        percent: percentOf(totalMemory - freeMemory, totalMemory),
      },
      disk: {
        total: diskTotal,
        free: diskFree,
        used: diskTotal - diskFree,
        percent: percentOf(diskTotal - diskFree, diskTotal),
      },
      networkInterfaces,
    };
  },
});

export const checkRequiredToolsTool = defineTool({
  name: "check_required_tools",
  category: "system",
  description: "Report which of the command line utilities the tools rely on are installed.",
  operation: "check required tools",
  input: z.object({}),
  run: async (_input, context) => {
    const availability = await Promise.all(
      REQUIRED_BINARIES.map(async (binary) => [binary, await context.which(binary)] as const)
    );

    return {
      success: true,
      tools: Object.fromEntries(availability),
      missing: availability.filter(([, available]) => !available).map(([binary]) => binary),
    };
  },
});

export const systemTools = [ssConnectionsTool, netstatConnectionsTool, arpTableTool, systemStatusTool, checkRequiredToolsTool];
