export const HTTP_DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10] as const;
export const TOOL_DURATION_BUCKETS = [0.1, 0.5, 1, 2.5, 5, 10, 30, 60, 120, 300] as const;

type Histogram = {
  bounds: readonly number[];
  // cumulative: counts[i] is the number of observations <= bounds[i]
  counts: number[];
  sum: number;
  count: number;
};

export type HistogramSnapshot = {
  buckets: Array<{ le: number; count: number }>;
  sum: number;
  count: number;
};

type HttpSeries = {
  method: string;
  path: string;
  status: number;
  total: number;
  duration: Histogram;
};

type ToolSeries = {
  tool: string;
  executions: number;
  failures: number;
  duration: Histogram;
};

export type MetricsSnapshot = {
  http: Array<{ method: string; path: string; status: number; total: number; duration: HistogramSnapshot }>;
  httpInProgress: number;
  authAttempts: number;
  authFailures: number;
  rateLimitHits: number;
  tools: Array<{ tool: string; executions: number; failures: number; duration: HistogramSnapshot }>;
};

export type MetricsCollector = {
  recordHttpRequest: (input: { method: string; path: string; status: number; durationSeconds: number }) => void;
  incRequestsInProgress: () => void;
  decRequestsInProgress: () => void;
  recordAuthAttempt: (success: boolean) => void;
  recordRateLimitHit: () => void;
  recordToolExecution: (input: { tool: string; durationSeconds: number; success: boolean }) => void;
  getSnapshot: () => MetricsSnapshot;
  exportPrometheus: () => string;
};

const createHistogram = (bounds: readonly number[]): Histogram => ({
  bounds,
  counts: bounds.map(() => 0),
  sum: 0,
  count: 0,
});

const toDuration = (value: number): number => (Number.isFinite(value) && value > 0 ? value : 0);

const observe = (histogram: Histogram, value: number): void => {
  histogram.sum += value;
  histogram.count += 1;

  histogram.bounds.forEach((bound, index) => {
    if (value <= bound) {
      histogram.counts[index] += 1;
    }
  });
};

const snapshotHistogram = (histogram: Histogram): HistogramSnapshot => ({
  buckets: histogram.bounds.map((le, index) => ({ le, count: histogram.counts[index] ?? 0 })),
  sum: histogram.sum,
  count: histogram.count,
});

export const escapeLabelValue = (value: string): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");

const formatLabels = (labels: Record<string, string>): string => {
  const pairs = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return pairs.length > 0 ? `{${pairs.join(",")}}` : "";
};

const pushHistogramLines = (
  lines: string[],
  name: string,
  labels: Record<string, string>,
  histogram: HistogramSnapshot
): void => {
  for (const bucket of histogram.buckets) {
    lines.push(`${name}_bucket${formatLabels({ ...labels, le: String(bucket.le) })} ${bucket.count}`);
  }

  lines.push(`${name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${histogram.count}`);
  lines.push(`${name}_sum${formatLabels(labels)} ${histogram.sum.toFixed(6)}`);
  lines.push(`${name}_count${formatLabels(labels)} ${histogram.count}`);
};

const pushFamilyHeader = (lines: string[], name: string, help: string, type: "counter" | "gauge" | "histogram"): void => {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} ${type}`);
};

export const renderPrometheusMetrics = (snapshot: MetricsSnapshot): string => {
  const lines: string[] = [];

  pushFamilyHeader(lines, "http_requests_total", "Total number of HTTP requests.", "counter");
  for (const series of snapshot.http) {
    const labels = formatLabels({ method: series.method, path: series.path, status: String(series.status) });
    lines.push(`http_requests_total${labels} ${series.total}`);
  }

  pushFamilyHeader(lines, "http_request_duration_seconds", "HTTP request duration in seconds.", "histogram");
  for (const series of snapshot.http) {
    pushHistogramLines(
      lines,
      "http_request_duration_seconds",
      { method: series.method, path: series.path, status: String(series.status) },
      series.duration
    );
  }

  pushFamilyHeader(lines, "http_requests_in_progress", "Number of HTTP requests currently being processed.", "gauge");
  lines.push(`http_requests_in_progress ${snapshot.httpInProgress}`);

  pushFamilyHeader(lines, "auth_attempts_total", "Total number of authentication attempts.", "counter");
  lines.push(`auth_attempts_total ${snapshot.authAttempts}`);

  pushFamilyHeader(lines, "auth_failures_total", "Total number of authentication failures.", "counter");
  lines.push(`auth_failures_total ${snapshot.authFailures}`);

  pushFamilyHeader(lines, "rate_limit_hits_total", "Total number of requests rejected by the rate limiter.", "counter");
  lines.push(`rate_limit_hits_total ${snapshot.rateLimitHits}`);

  pushFamilyHeader(lines, "tool_executions_total", "Total number of tool executions.", "counter");
  for (const series of snapshot.tools) {
    lines.push(`tool_executions_total${formatLabels({ tool: series.tool })} ${series.executions}`);
  }

  pushFamilyHeader(lines, "tool_execution_duration_seconds", "Tool execution duration in seconds.", "histogram");
  for (const series of snapshot.tools) {
    pushHistogramLines(lines, "tool_execution_duration_seconds", { tool: series.tool }, series.duration);
  }

  pushFamilyHeader(lines, "tool_failures_total", "Total number of failed tool executions.", "counter");
  for (const series of snapshot.tools) {
    lines.push(`tool_failures_total${formatLabels({ tool: series.tool })} ${series.failures}`);
  }

  return `${lines.join("\n")}\n`;
};

/**
 * Process-lifetime counters and latency histograms.
 *
 * Recording functions are synchronous, so each update is atomic with respect
 * to other requests on the event loop. Export copies the registers first and
 * formats the copy.
 */
export const createMetricsCollector = (): MetricsCollector => {
  const httpSeries = new Map<string, HttpSeries>();
  const toolSeries = new Map<string, ToolSeries>();

  const state = {
    httpInProgress: 0,
    authAttempts: 0,
    authFailures: 0,
    rateLimitHits: 0,
  };

  const recordHttpRequest: MetricsCollector["recordHttpRequest"] = (input) => {
    const key = JSON.stringify([input.method, input.path, input.status]);
    const series = httpSeries.get(key) ?? {
      method: input.method,
      path: input.path,
      status: input.status,
      total: 0,
      duration: createHistogram(HTTP_DURATION_BUCKETS),
    };

    series.total += 1;
    observe(series.duration, toDuration(input.durationSeconds));
    httpSeries.set(key, series);
  };

  const recordToolExecution: MetricsCollector["recordToolExecution"] = (input) => {
    const series = toolSeries.get(input.tool) ?? {
      tool: input.tool,
      executions: 0,
      failures: 0,
      duration: createHistogram(TOOL_DURATION_BUCKETS),
    };

    series.executions += 1;
    if (!input.success) {
      series.failures += 1;
    }

    observe(series.duration, toDuration(input.durationSeconds));
    toolSeries.set(input.tool, series);
  };

  const getSnapshot = (): MetricsSnapshot => ({
    http: [...httpSeries.values()].map((series) => ({
      method: series.method,
      path: series.path,
      status: series.status,
      total: series.total,
      duration: snapshotHistogram(series.duration),
    })),
    httpInProgress: state.httpInProgress,
    authAttempts: state.authAttempts,
    authFailures: state.authFailures,
    rateLimitHits: state.rateLimitHits,
    tools: [...toolSeries.values()].map((series) => ({
      tool: series.tool,
      executions: series.executions,
      failures: series.failures,
      duration: snapshotHistogram(series.duration),
    })),
  });

  return {
    recordHttpRequest,
    incRequestsInProgress: () => {
      state.httpInProgress += 1;
    },
    decRequestsInProgress: () => {
      state.httpInProgress = Math.max(0, state.httpInProgress - 1);
    },
    recordAuthAttempt: (success) => {
      state.authAttempts += 1;
      if (!success) {
        state.authFailures += 1;
      }
    },
    recordRateLimitHit: () => {
      state.rateLimitHits += 1;
    },
    recordToolExecution,
    getSnapshot,
    exportPrometheus: () => renderPrometheusMetrics(getSnapshot()),
  };
};
