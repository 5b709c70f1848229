import assert from "node:assert/strict";
import test from "node:test";

import { hashApiKey } from "@netops/auth";

import { buildApp } from "../../../src/app";
import { parseServerEnv } from "../../../src/config/env";
import { createMetricsCollector } from "../../../src/services/metrics-collector";

const NOW_MS = 1_700_000_000_000;
const API_KEY = "abc123";
const IDENTITY = `key:${hashApiKey(API_KEY).slice(0, 8)}`;

const buildPipelineTestApp = async (overrides: Record<string, string> = {}) => {
  const collector = createMetricsCollector();
  const app = buildApp({
    env: parseServerEnv({
      API_KEYS: API_KEY,
      REQUIRE_AUTH: "true",
      RATE_LIMIT_SWEEP_INTERVAL_MS: "0",
      ...overrides,
    }),
    collector,
    now: () => NOW_MS,
    logger: false,
  });

  app.get("/ping", async () => ({ pong: true }));
  app.get("/explode", async () => {
    throw new Error("boom");
  });
  app.get("/in-flight", async () => ({ inProgress: collector.getSnapshot().httpInProgress }));

  await app.ready();
  return { app, collector };
};

test("valid key is admitted with rate limit headers; missing and wrong keys are rejected", async (t) => {
  const { app } = await buildPipelineTestApp();
  t.after(async () => {
    await app.close();
  });

  const admitted = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": API_KEY } });
  assert.equal(admitted.statusCode, 200);
  assert.deepEqual(admitted.json(), { pong: true });
  assert.equal(admitted.headers["x-ratelimit-limit"], "100");
  assert.equal(admitted.headers["x-ratelimit-remaining"], "99");
  assert.equal(admitted.headers["x-ratelimit-reset"], "1700000060");

  const missing = await app.inject({ method: "GET", url: "/ping" });
  assert.equal(missing.statusCode, 401);
  assert.equal(missing.headers["www-authenticate"], 'Bearer realm="netops"');
  assert.deepEqual(missing.json(), {
    error: "AUTHENTICATION_REQUIRED",
    message: "Please provide an API key using the Authorization header (Bearer token), X-API-Key or API-Key header",
  });

  const wrong = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": "wrong" } });
  assert.equal(wrong.statusCode, 403);
  assert.deepEqual(wrong.json(), { error: "INVALID_API_KEY", message: "The provided API key is not valid" });
  assert.equal(wrong.headers["www-authenticate"], undefined);
});

test("bearer token takes precedence over X-API-Key", async (t) => {
  const { app } = await buildPipelineTestApp();
  t.after(async () => {
    await app.close();
  });

  const bearerValid = await app.inject({
    method: "GET",
    url: "/ping",
    headers: { authorization: `Bearer ${API_KEY}`, "x-api-key": "wrong" },
  });
  assert.equal(bearerValid.statusCode, 200);

  const bearerWrong = await app.inject({
    method: "GET",
    url: "/ping",
    headers: { authorization: "Bearer wrong", "x-api-key": API_KEY },
  });
  assert.equal(bearerWrong.statusCode, 403);

  const legacyHeader = await app.inject({ method: "GET", url: "/ping", headers: { "api-key": API_KEY } });
  assert.equal(legacyHeader.statusCode, 200);
});

test("plaintext key and its digest share one identity and one bucket", async (t) => {
  const { app } = await buildPipelineTestApp();
  t.after(async () => {
    await app.close();
  });

  const plain = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": API_KEY } });
  const digest = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": hashApiKey(API_KEY) } });

  assert.equal(plain.statusCode, 200);
  assert.equal(digest.statusCode, 200);
  assert.equal(plain.headers["x-ratelimit-remaining"], "99");
  assert.equal(digest.headers["x-ratelimit-remaining"], "98");

  const status = await app.inject({ method: "GET", url: "/rate-limit/status", headers: { "x-api-key": API_KEY } });
  assert.deepEqual(status.json(), { identity: IDENTITY, limit: 100, remaining: 97, used: 3, windowSeconds: 60 });
});

test("exempt paths are never rejected and carry no rate limit headers", async (t) => {
  const { app } = await buildPipelineTestApp({ RATE_LIMIT_REQUESTS: "1" });
  t.after(async () => {
    await app.close();
  });

  for (let index = 0; index < 5; index += 1) {
    const response = await app.inject({ method: "GET", url: "/health", headers: { "x-api-key": "wrong" } });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: "ok", tools: 15 });
    assert.equal(response.headers["x-ratelimit-limit"], undefined);
    assert.equal(response.headers["x-content-type-options"], "nosniff");
  }
});

test("rejects with 429 once the window is full", async (t) => {
  const { app, collector } = await buildPipelineTestApp({ RATE_LIMIT_REQUESTS: "2", RATE_LIMIT_WINDOW_SECONDS: "10" });
  t.after(async () => {
    await app.close();
  });

  const first = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": API_KEY } });
  const second = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": API_KEY } });
  const third = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": API_KEY } });

  assert.equal(first.headers["x-ratelimit-remaining"], "1");
  assert.equal(second.headers["x-ratelimit-remaining"], "0");

  assert.equal(third.statusCode, 429);
  assert.deepEqual(third.json(), {
    error: "RATE_LIMIT_EXCEEDED",
    message: "Too many requests. Please try again in 10 seconds.",
    retry_after: 10,
  });
  assert.equal(third.headers["retry-after"], "10");
  assert.equal(third.headers["x-ratelimit-limit"], "2");
  assert.equal(third.headers["x-ratelimit-remaining"], "0");
  assert.equal(third.headers["x-ratelimit-reset"], "1700000010");
  assert.equal(collector.getSnapshot().rateLimitHits, 1);
});

test("failed authentication attempts spend the caller's address quota", async (t) => {
  const { app, collector } = await buildPipelineTestApp({ RATE_LIMIT_REQUESTS: "2" });
  t.after(async () => {
    await app.close();
  });

  const statuses: number[] = [];
  for (let index = 0; index < 3; index += 1) {
    const response = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": "wrong" } });
    statuses.push(response.statusCode);
  }

  assert.deepEqual(statuses, [403, 403, 429]);

  const snapshot = collector.getSnapshot();
  assert.equal(snapshot.authAttempts, 3);
  assert.equal(snapshot.authFailures, 3);
  assert.equal(snapshot.rateLimitHits, 1);

  const keyed = await app.inject({ method: "GET", url: "/ping", headers: { "x-api-key": API_KEY } });
  assert.equal(keyed.statusCode, 200);
});

test("in-progress gauge covers the handler and returns to zero after a failure", async (t) => {
  const { app, collector } = await buildPipelineTestApp();
  t.after(async () => {
    await app.close();
  });

  const inFlight = await app.inject({ method: "GET", url: "/in-flight", headers: { "x-api-key": API_KEY } });
  assert.deepEqual(inFlight.json(), { inProgress: 1 });

  const failed = await app.inject({ method: "GET", url: "/explode", headers: { "x-api-key": API_KEY } });
  assert.equal(failed.statusCode, 500);
  assert.deepEqual(failed.json(), { error: "INTERNAL_SERVER_ERROR", message: "Unexpected error" });

  const snapshot = collector.getSnapshot();
  assert.equal(snapshot.httpInProgress, 0);
  assert.deepEqual(
    snapshot.http.map((series) => [series.method, series.path, series.status, series.total]),
    [
      ["GET", "/in-flight", 200, 1],
      ["GET", "/explode", 500, 1],
    ]
  );
});

test("metrics endpoint is open, exposes traffic and is not counted itself", async (t) => {
  const { app, collector } = await buildPipelineTestApp();
  t.after(async () => {
    await app.close();
  });

  await app.inject({ method: "GET", url: "/ping?verbose=1", headers: { "x-api-key": API_KEY } });
  await app.inject({ method: "GET", url: "/metrics" });

  const metrics = await app.inject({ method: "GET", url: "/metrics" });
  assert.equal(metrics.statusCode, 200);
  assert.equal(metrics.headers["content-type"], "text/plain; version=0.0.4; charset=utf-8");

  const lines = metrics.body.split("\n");
  assert.ok(lines.includes('http_requests_total{method="GET",path="/ping",status="200"} 1'));
  assert.ok(lines.includes("auth_attempts_total 1"));
  assert.ok(lines.includes("http_requests_in_progress 0"));
  assert.deepEqual(
    collector.getSnapshot().http.map((series) => series.path),
    ["/ping"]
  );
});

test("authentication can be switched off globally", async (t) => {
  const { app, collector } = await buildPipelineTestApp({ REQUIRE_AUTH: "false" });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/ping" });
  assert.equal(response.statusCode, 200);
  assert.equal(response.headers["x-ratelimit-remaining"], "99");
  assert.equal(collector.getSnapshot().authAttempts, 0);

  const status = await app.inject({ method: "GET", url: "/rate-limit/status" });
  assert.equal(status.json().identity, "ip:127.0.0.1");
});

test("relocated health and metrics routes stay open without a credential", async (t) => {
  const { app, collector } = await buildPipelineTestApp({ HEALTH_PATH: "/healthz", METRICS_PATH: "/prom" });
  t.after(async () => {
    await app.close();
  });

  const health = await app.inject({ method: "GET", url: "/healthz" });
  assert.equal(health.statusCode, 200);
  assert.deepEqual(health.json(), { status: "ok", tools: 15 });
  assert.equal(health.headers["x-ratelimit-limit"], undefined);

  const metrics = await app.inject({ method: "GET", url: "/prom" });
  assert.equal(metrics.statusCode, 200);
  assert.equal(metrics.headers["content-type"], "text/plain; version=0.0.4; charset=utf-8");

  const snapshot = collector.getSnapshot();
  assert.equal(snapshot.authAttempts, 0);
  assert.deepEqual(
    snapshot.http.map((series) => [series.path, series.status]),
    [["/healthz", 200]]
  );
});
