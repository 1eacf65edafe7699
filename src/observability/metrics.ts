/**
 * Relay metrics: in-memory counters and gauges rendered as Prometheus text.
 *
 * Each metric is written as one block (HELP, TYPE, then its series). Label
 * values are escaped because webhook event types come from the platform.
 */

type MetricKind = "counter" | "gauge";

export const METRIC_HELP: Readonly<Record<string, string>> = {
  voiceback_webhook_events_total: "Webhook events received, by event type",
  voiceback_crisis_detections_total: "Utterances that matched a crisis keyword",
  voiceback_degraded_responses_total: "Replies built from the fallback record",
  voiceback_utterance_failures_total: "Utterances answered with the apology reply",
  voiceback_emotions_total: "Replies spoken, by detected emotion",
  voiceback_responses_reloads_total: "Response corpus reloads that swapped in a new file",
  voiceback_active_calls: "Calls currently in progress",
  voiceback_uptime_seconds: "Process uptime in seconds",
};

/** metric name → rendered label set → value */
type SeriesTable = Map<string, Map<string, number>>;

const counters: SeriesTable = new Map();
const gauges: SeriesTable = new Map();

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function renderLabels(labels?: Record<string, string>): string {
  if (!labels) return "";
  const entries = Object.entries(labels);
  if (entries.length === 0) return "";
  const body = entries
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`)
    .join(",");
  return `{${body}}`;
}

function seriesOf(table: SeriesTable, name: string): Map<string, number> {
  let series = table.get(name);
  if (!series) {
    series = new Map();
    table.set(name, series);
  }
  return series;
}

export function increment(name: string, labels?: Record<string, string>, amount = 1): void {
  const series = seriesOf(counters, name);
  const key = renderLabels(labels);
  series.set(key, (series.get(key) ?? 0) + amount);
}

export function gauge(name: string, value: number, labels?: Record<string, string>): void {
  seriesOf(gauges, name).set(renderLabels(labels), value);
}

export function getCounter(name: string, labels?: Record<string, string>): number {
  return counters.get(name)?.get(renderLabels(labels)) ?? 0;
}

export function getGauge(name: string, labels?: Record<string, string>): number {
  return gauges.get(name)?.get(renderLabels(labels)) ?? 0;
}

function renderBlock(lines: string[], kind: MetricKind, name: string, series: Map<string, number>): void {
  const help = METRIC_HELP[name];
  if (help) lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} ${kind}`);
  for (const [labels, value] of series) {
    lines.push(`${name}${labels} ${value}`);
  }
}

export function getPrometheusText(): string {
  const lines: string[] = [];
  for (const [name, series] of counters) renderBlock(lines, "counter", name, series);
  for (const [name, series] of gauges) renderBlock(lines, "gauge", name, series);
  return lines.join("\n") + "\n";
}

/** Reset all metrics (for testing). */
export function resetMetrics(): void {
  counters.clear();
  gauges.clear();
}

export const metrics = { increment, gauge, getCounter, getGauge, getPrometheusText, resetMetrics };
