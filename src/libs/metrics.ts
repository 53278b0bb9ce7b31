// src/libs/metrics.ts
// ============================================================================
// In-Process Prometheus-Metriken (Text-Exposition unter /metrics)
// ----------------------------------------------------------------------------
// - Familien werden einmal mit HELP/TYPE registriert (FAMILIES)
// - Serien halten ihre Labels strukturiert; der Map-Key ist nur Identitaet
// - Label-Werte werden erst beim Rendern escaped
// ============================================================================

type LabelValue = string | number | boolean;
type Labels = Record<string, LabelValue | undefined>;
type CleanLabels = Record<string, LabelValue>;

type MetricType = "counter" | "histogram";

type Family = { type: MetricType; help: string };

type CounterSeries = { labels: CleanLabels; value: number };

type HistogramSeries = {
  labels: CleanLabels;
  count: number;
  sum: number;
  buckets: Array<{ le: number; count: number }>;
};

const METRIC_NAMES = [
  "http_requests_total",
  "http_request_duration_seconds",
  "otp_requests_total",
  "otp_confirm_success_total",
  "otp_confirm_failed_total",
  "auth_login_success_total",
  "auth_login_failed_total",
  "auth_refresh_success_total",
  "auth_refresh_reuse_detected_total",
  "auth_tokens_revoked_total",
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

const FAMILIES: Record<MetricName, Family> = {
  http_requests_total: { type: "counter", help: "Total number of HTTP requests" },
  http_request_duration_seconds: {
    type: "histogram",
    help: "HTTP request duration in seconds",
  },
  otp_requests_total: { type: "counter", help: "OTP issuance attempts by outcome" },
  otp_confirm_success_total: { type: "counter", help: "Successful OTP confirmations" },
  otp_confirm_failed_total: { type: "counter", help: "Failed OTP confirmations" },
  auth_login_success_total: { type: "counter", help: "Successful password logins" },
  auth_login_failed_total: { type: "counter", help: "Failed password logins" },
  auth_refresh_success_total: { type: "counter", help: "Successful refresh token rotations" },
  auth_refresh_reuse_detected_total: {
    type: "counter",
    help: "Reused refresh tokens (family revoked)",
  },
  auth_tokens_revoked_total: { type: "counter", help: "Revoked access tokens" },
};

const counters = new Map<MetricName, Map<string, CounterSeries>>();
const histograms = new Map<MetricName, Map<string, HistogramSeries>>();

const REQUEST_DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function cleanLabels(labels?: Labels): CleanLabels {
  const clean: CleanLabels = {};
  if (!labels) return clean;
  for (const [k, v] of Object.entries(labels).sort(([a], [b]) => a.localeCompare(b))) {
    if (v !== undefined) clean[k] = v;
  }
  return clean;
}

function seriesKey(labels: CleanLabels): string {
  return JSON.stringify(labels);
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function labelText(labels: CleanLabels): string {
  const parts = Object.entries(labels).map(([k, v]) => `${k}="${escapeLabel(String(v))}"`);
  return parts.length === 0 ? "" : `{${parts.join(",")}}`;
}

function seriesOf<T>(store: Map<MetricName, Map<string, T>>, name: MetricName): Map<string, T> {
  let series = store.get(name);
  if (!series) {
    series = new Map<string, T>();
    store.set(name, series);
  }
  return series;
}

export function incCounter(name: MetricName, labels?: Labels, by = 1) {
  const clean = cleanLabels(labels);
  const series = seriesOf(counters, name);
  const key = seriesKey(clean);
  const current = series.get(key);
  if (current) {
    current.value += by;
  } else {
    series.set(key, { labels: clean, value: by });
  }
}

export function observeHistogram(
  name: MetricName,
  value: number,
  labels?: Labels,
  buckets: number[] = REQUEST_DURATION_BUCKETS,
) {
  const clean = cleanLabels(labels);
  const series = seriesOf(histograms, name);
  const key = seriesKey(clean);

  let state = series.get(key);
  if (!state) {
    state = {
      labels: clean,
      count: 0,
      sum: 0,
      buckets: buckets.map((le) => ({ le, count: 0 })),
    };
    series.set(key, state);
  }

  state.count += 1;
  state.sum += value;
  for (const bucket of state.buckets) {
    if (value <= bucket.le) bucket.count += 1;
  }
}

// ---------------------------------------------------------------------------
// Fachliche Recorder
// ---------------------------------------------------------------------------

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number,
) {
  incCounter("http_requests_total", { method, route, status: statusCode });
  observeHistogram("http_request_duration_seconds", durationSeconds, { method, route });
}

export function recordOtpRequest(outcome: "sent" | "cooldown" | "quota" | "sms_failed") {
  incCounter("otp_requests_total", { outcome });
}

export function recordOtpConfirm(success: boolean) {
  incCounter(success ? "otp_confirm_success_total" : "otp_confirm_failed_total");
}

export function recordAuthLogin(success: boolean) {
  incCounter(success ? "auth_login_success_total" : "auth_login_failed_total");
}

export function recordAuthRefreshSuccess() {
  incCounter("auth_refresh_success_total");
}

export function recordAuthRefreshReuseDetected() {
  incCounter("auth_refresh_reuse_detected_total");
}

export function recordTokensRevoked(count: number) {
  if (count > 0) incCounter("auth_tokens_revoked_total", undefined, count);
}

/** Nur fuer Tests */
export function resetMetrics() {
  counters.clear();
  histograms.clear();
}

/** Anzahl Serien einer Familie (Kardinalitaet) */
export function seriesCount(name: MetricName): number {
  return (counters.get(name)?.size ?? 0) + (histograms.get(name)?.size ?? 0);
}

// ---------------------------------------------------------------------------
// Exposition
// ---------------------------------------------------------------------------

function renderHistogram(name: string, state: HistogramSeries, lines: string[]) {
  for (const bucket of state.buckets) {
    lines.push(`${name}_bucket${labelText({ ...state.labels, le: bucket.le })} ${bucket.count}`);
  }
  lines.push(`${name}_bucket${labelText({ ...state.labels, le: "+Inf" })} ${state.count}`);
  lines.push(`${name}_sum${labelText(state.labels)} ${state.sum}`);
  lines.push(`${name}_count${labelText(state.labels)} ${state.count}`);
}

export function renderPrometheusMetrics(): string {
  const lines: string[] = [];

  for (const name of METRIC_NAMES) {
    const family = FAMILIES[name];
    lines.push(`# HELP ${name} ${family.help}`);
    lines.push(`# TYPE ${name} ${family.type}`);

    const counterSeries = counters.get(name);
    if (counterSeries) {
      for (const series of counterSeries.values()) {
        lines.push(`${name}${labelText(series.labels)} ${series.value}`);
      }
    }

    const histogramSeries = histograms.get(name);
    if (histogramSeries) {
      for (const state of histogramSeries.values()) {
        renderHistogram(name, state, lines);
      }
    }
  }

  return `${lines.join("\n")}\n`;
}
