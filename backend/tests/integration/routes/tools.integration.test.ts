import assert from "node:assert/strict";
import test from "node:test";

import { buildApp } from "../../../src/app";
import { parseServerEnv } from "../../../src/config/env";
import { createMetricsCollector } from "../../../src/services/metrics-collector";
import type { CommandResult, CommandRunner } from "../../../src/services/tools";

const API_KEY = "test-secret";
const headers = { "x-api-key": API_KEY };

const buildToolsTestApp = async (runCommand: CommandRunner) => {
  const collector = createMetricsCollector();
  const app = buildApp({
    env: parseServerEnv({ API_KEYS: API_KEY, RATE_LIMIT_SWEEP_INTERVAL_MS: "0" }),
    collector,
    runCommand,
    which: async (binary) => binary !== "nmap",
    logger: false,
  });

  await app.ready();
  return { app, collector };
};

const createFakeRunner = (result: Partial<CommandResult> = {}) => {
  const calls: string[][] = [];
  const runner: CommandRunner = async (argv) => {
    calls.push([...argv]);
    return { success: true, stdout: "", stderr: "", returnCode: 0, command: argv.join(" "), ...result };
  };

  return { runner, calls };
};

test("lists every registered tool", async (t) => {
  const { runner } = createFakeRunner();
  const { app } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/tools", headers });
  const body: { tools: Array<{ name: string; category: string }> } = response.json();

  assert.equal(response.statusCode, 200);
  assert.equal(body.tools.length, 15);
  assert.equal(body.tools[0]?.name, "ping_host");
  assert.equal(body.tools[0]?.category, "connectivity");
});

test("runs a tool and records the execution", async (t) => {
  const { runner, calls } = createFakeRunner({ stdout: "192.0.2.10\n192.0.2.11\n" });
  const { app, collector } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/tools/dig_query",
    headers,
    payload: { domain: "Example.COM", server: "192.0.2.53" },
  });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), {
    success: true,
    domain: "example.com",
    recordType: "A",
    server: "192.0.2.53",
    answers: ["192.0.2.10", "192.0.2.11"],
    stdout: "192.0.2.10\n192.0.2.11\n",
    stderr: "",
    returnCode: 0,
  });
  assert.deepEqual(calls, [["dig", "@192.0.2.53", "+short", "A", "example.com"]]);

  const [series] = collector.getSnapshot().tools;
  assert.equal(series?.tool, "dig_query");
  assert.equal(series?.executions, 1);
  assert.equal(series?.failures, 0);

  const metrics = await app.inject({ method: "GET", url: "/metrics" });
  assert.ok(metrics.body.split("\n").includes('tool_executions_total{tool="dig_query"} 1'));
});

test("unknown tool names are a 404", async (t) => {
  const { runner, calls } = createFakeRunner();
  const { app } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "POST", url: "/tools/telnet_connect", headers, payload: {} });

  assert.equal(response.statusCode, 404);
  assert.deepEqual(response.json(), { error: "TOOL_NOT_FOUND", message: "Unknown tool: telnet_connect" });
  assert.equal(calls.length, 0);
});

test("invalid tool arguments come back as a precondition failure", async (t) => {
  const { runner, calls } = createFakeRunner();
  const { app, collector } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/tools/netcat_test",
    headers,
    payload: { host: "192.0.2.1", port: 70000 },
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    error: true,
    operation: "netcat test",
    message: "port: Number must be less than or equal to 65535",
  });
  assert.equal(calls.length, 0);
  assert.deepEqual(collector.getSnapshot().tools, []);
});

test("privileged scan types are refused while privileged commands are disabled", async (t) => {
  const { runner, calls } = createFakeRunner();
  const { app } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/tools/nmap_scan",
    headers,
    payload: { target: "192.0.2.0/28", scanType: "full" },
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    error: true,
    operation: "nmap scan",
    message: 'Scan type "full" requires ALLOW_PRIVILEGED_COMMANDS to be enabled',
  });
  assert.equal(calls.length, 0);
});

test("a runner that throws surfaces as a 500 and counts as a failed execution", async (t) => {
  const runner: CommandRunner = async () => {
    throw new Error("spawn exploded");
  };
  const { app, collector } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "POST", url: "/tools/host_lookup", headers, payload: { domain: "example.com" } });

  assert.equal(response.statusCode, 500);
  assert.deepEqual(response.json(), { error: "INTERNAL_SERVER_ERROR", message: "Unexpected error" });

  const [series] = collector.getSnapshot().tools;
  assert.equal(series?.executions, 1);
  assert.equal(series?.failures, 1);
});

test("tool routes require a credential", async (t) => {
  const { runner, calls } = createFakeRunner();
  const { app } = await buildToolsTestApp(runner);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "POST", url: "/tools/arp_table", payload: {} });

  assert.equal(response.statusCode, 401);
  assert.equal(calls.length, 0);
});
