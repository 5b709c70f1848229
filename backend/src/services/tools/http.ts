import { z } from "zod";

import { CURL_TRAILER_FORMAT, parseCurlOutput } from "./parsers";
import { defineTool } from "./registry";
import { boundedInt, httpHeadersSchema, httpMethodSchema, urlSchema } from "./validators";

export const curlRequestTool = defineTool({
  name: "curl_request",
  category: "http",
  description: "Send an HTTP request with curl and report the status, timings and body.",
  operation: "curl request",
  input: z.object({
    url: urlSchema,
    method: httpMethodSchema.default("GET"),
    headers: httpHeadersSchema.optional(),
    data: z.string().max(65536).optional(),
    followRedirects: z.boolean().default(false),
    timeout: boundedInt(1, 300).optional(),
  }),
  run: async (input, context) => {
    const timeout = input.timeout ?? context.settings.defaultTimeoutSeconds;
    // -X HEAD still waits for a body; --head makes curl stop after the headers.
    const methodArgs = input.method === "HEAD" ? ["--head"] : ["-X", input.method];
    const argv = ["curl", "-sS", ...methodArgs, "--max-time", String(timeout), "-w", CURL_TRAILER_FORMAT];

    for (const [name, value] of Object.entries(input.headers ?? {})) {
      argv.push("-H", `${name}: ${value}`);
    }

    if (input.data !== undefined) {
      argv.push("--data-raw", input.data);
    }

    if (input.followRedirects) {
      argv.push("-L");
    }

    argv.push(input.url);

    const result = await context.exec(argv, { timeoutSeconds: timeout + 5 });
    const { body, stats } = parseCurlOutput(result.stdout);

    return {
      success: result.success,
      url: input.url,
      method: input.method,
      stats,
      responseBody: body,
      stderr: result.stderr,
      returnCode: result.returnCode,
    };
  },
});

export const httpTools = [curlRequestTool];
