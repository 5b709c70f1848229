import { connectivityTools } from "./connectivity";
import { discoveryTools } from "./discovery";
import { dnsTools } from "./dns";
import { httpTools } from "./http";
import { createToolRegistry, type ToolRegistry } from "./registry";
import { systemTools } from "./system";

export const buildDefaultToolRegistry = (): ToolRegistry =>
  createToolRegistry([...connectivityTools, ...dnsTools, ...httpTools, ...discoveryTools, ...systemTools]);

export * from "./command-runner";
export * from "./registry";
