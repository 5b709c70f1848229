import assert from "node:assert/strict";
import test from "node:test";

import { createMetricsCollector, escapeLabelValue } from "./metrics-collector";

test("counts every request for a method, path and status and observes each duration", () => {
  const collector = createMetricsCollector();

  for (let index = 0; index < 5; index += 1) {
    collector.recordHttpRequest({ method: "GET", path: "/tools", status: 200, durationSeconds: 0.02 });
  }
  collector.recordHttpRequest({ method: "GET", path: "/tools", status: 401, durationSeconds: 0.001 });

  const [ok, unauthorized] = collector.getSnapshot().http;
  assert.equal(ok?.total, 5);
  assert.equal(ok?.duration.count, 5);
  assert.equal(unauthorized?.total, 1);

  const text = collector.exportPrometheus();
  assert.ok(text.includes('http_requests_total{method="GET",path="/tools",status="200"} 5\n'));
  assert.ok(text.includes('http_requests_total{method="GET",path="/tools",status="401"} 1\n'));
  assert.ok(text.includes('http_request_duration_seconds_count{method="GET",path="/tools",status="200"} 5\n'));
  assert.ok(text.includes('http_request_duration_seconds_sum{method="GET",path="/tools",status="200"} 0.100000\n'));
});

test("histogram buckets are cumulative and end with +Inf", () => {
  const collector = createMetricsCollector();

  collector.recordHttpRequest({ method: "POST", path: "/tools/ping_host", status: 200, durationSeconds: 0.003 });
  collector.recordHttpRequest({ method: "POST", path: "/tools/ping_host", status: 200, durationSeconds: 0.2 });
  collector.recordHttpRequest({ method: "POST", path: "/tools/ping_host", status: 200, durationSeconds: 42 });

  const labels = 'method="POST",path="/tools/ping_host",status="200"';
  const lines = collector.exportPrometheus().split("\n");

  assert.ok(lines.includes(`http_request_duration_seconds_bucket{${labels},le="0.005"} 1`));
  assert.ok(lines.includes(`http_request_duration_seconds_bucket{${labels},le="0.1"} 1`));
  assert.ok(lines.includes(`http_request_duration_seconds_bucket{${labels},le="0.25"} 2`));
  assert.ok(lines.includes(`http_request_duration_seconds_bucket{${labels},le="10"} 2`));
  assert.ok(lines.includes(`http_request_duration_seconds_bucket{${labels},le="+Inf"} 3`));
});

test("in-progress gauge never drops below zero", () => {
  const collector = createMetricsCollector();

  collector.incRequestsInProgress();
  collector.incRequestsInProgress();
  collector.decRequestsInProgress();
  assert.equal(collector.getSnapshot().httpInProgress, 1);

  collector.decRequestsInProgress();
  collector.decRequestsInProgress();
  assert.equal(collector.getSnapshot().httpInProgress, 0);
});

test("auth attempts count every outcome and failures only the failed ones", () => {
  const collector = createMetricsCollector();

  collector.recordAuthAttempt(true);
  collector.recordAuthAttempt(false);
  collector.recordAuthAttempt(false);
  collector.recordRateLimitHit();

  const snapshot = collector.getSnapshot();
  assert.equal(snapshot.authAttempts, 3);
  assert.equal(snapshot.authFailures, 2);
  assert.equal(snapshot.rateLimitHits, 1);

  const lines = collector.exportPrometheus().split("\n");
  assert.ok(lines.includes("auth_attempts_total 3"));
  assert.ok(lines.includes("auth_failures_total 2"));
  assert.ok(lines.includes("rate_limit_hits_total 1"));
});

test("tool executions track count, duration and failures per tool", () => {
  const collector = createMetricsCollector();

  collector.recordToolExecution({ tool: "dig_query", durationSeconds: 0.4, success: true });
  collector.recordToolExecution({ tool: "dig_query", durationSeconds: 1.6, success: false });
  collector.recordToolExecution({ tool: "arp_table", durationSeconds: 0.05, success: true });

  const lines = collector.exportPrometheus().split("\n");
  assert.ok(lines.includes('tool_executions_total{tool="dig_query"} 2'));
  assert.ok(lines.includes('tool_failures_total{tool="dig_query"} 1'));
  assert.ok(lines.includes('tool_failures_total{tool="arp_table"} 0'));
  assert.ok(lines.includes('tool_execution_duration_seconds_bucket{tool="dig_query",le="0.5"} 1'));
  assert.ok(lines.includes('tool_execution_duration_seconds_bucket{tool="dig_query",le="2.5"} 2'));
  assert.ok(lines.includes('tool_execution_duration_seconds_sum{tool="dig_query"} 2.000000'));
  assert.ok(lines.includes('tool_execution_duration_seconds_count{tool="arp_table"} 1'));
});

test("an empty collector still describes every metric family", () => {
  const text = createMetricsCollector().exportPrometheus();

  const types = text
    .split("\n")
    .filter((line) => line.startsWith("# TYPE "))
    .map((line) => line.slice("# TYPE ".length));

  assert.deepEqual(types, [
    "http_requests_total counter",
    "http_request_duration_seconds histogram",
    "http_requests_in_progress gauge",
    "auth_attempts_total counter",
    "auth_failures_total counter",
    "rate_limit_hits_total counter",
    "tool_executions_total counter",
    "tool_execution_duration_seconds histogram",
    "tool_failures_total counter",
  ]);
  assert.ok(text.includes("\nhttp_requests_in_progress 0\n"));
});

test("negative and non-finite durations are observed as zero", () => {
  const collector = createMetricsCollector();

  collector.recordHttpRequest({ method: "GET", path: "/", status: 200, durationSeconds: -1 });
  collector.recordHttpRequest({ method: "GET", path: "/", status: 200, durationSeconds: Number.NaN });

  const series = collector.getSnapshot().http[0];
  assert.equal(series?.duration.sum, 0);
  assert.equal(series?.duration.buckets[0]?.count, 2);
});

test("label values escape backslashes, quotes and newlines", () => {
  assert.equal(escapeLabelValue('a\\b"c\nd'), 'a\\\\b\\"c\\nd');

  const collector = createMetricsCollector();
  collector.recordHttpRequest({ method: "GET", path: '/x"y', status: 404, durationSeconds: 0 });
  assert.ok(collector.exportPrometheus().includes('path="/x\\"y"'));
});
