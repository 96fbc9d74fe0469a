export type MetricType = "gauge" | "counter";

export interface MetricDefinition {
  name: string;
  help: string;
  type: MetricType;
  labelNames: readonly string[];
}

export type Labels = Record<string, string>;

/**
 * Transport for metric updates. Implementations may push over the network and
 * return a promise; callers go through MetricsEmitter, which absorbs failures.
 */
export interface MetricsBackend {
  register(def: MetricDefinition): void;
  setGauge(name: string, labels: Labels, value: number): void | Promise<void>;
  incCounter(name: string, labels: Labels, by: number): void | Promise<void>;
}

interface Series {
  labels: Labels;
  value: number;
}

interface MetricState {
  def: MetricDefinition;
  series: Map<string, Series>;
}

function seriesKey(def: MetricDefinition, labels: Labels): string {
  return JSON.stringify(def.labelNames.map((n) => labels[n] ?? ""));
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "+Inf";
  if (value === -Infinity) return "-Inf";
  return String(value);
}

/** Process-local metric registry rendered in the Prometheus text format (0.0.4). */
export class InMemoryMetricsBackend implements MetricsBackend {
  private readonly metrics = new Map<string, MetricState>();

  register(def: MetricDefinition): void {
    const existing = this.metrics.get(def.name);
    if (existing) {
      if (existing.def.type !== def.type) {
        throw new Error(`metric ${def.name} already registered as ${existing.def.type}`);
      }
      return;
    }
    this.metrics.set(def.name, { def, series: new Map() });
  }

  setGauge(name: string, labels: Labels, value: number): void {
    const state = this.require(name, "gauge", labels);
    state.series.set(seriesKey(state.def, labels), { labels: this.pick(state.def, labels), value });
  }

  incCounter(name: string, labels: Labels, by: number): void {
    if (!Number.isFinite(by) || by < 0) throw new Error(`counter ${name} can only increase (got ${by})`);
    const state = this.require(name, "counter", labels);
    const key = seriesKey(state.def, labels);
    const prev = state.series.get(key)?.value ?? 0;
    state.series.set(key, { labels: this.pick(state.def, labels), value: prev + by });
  }

  /** Current value of one series, or undefined if it was never written. */
  value(name: string, labels: Labels): number | undefined {
    const state = this.metrics.get(name);
    if (!state) return undefined;
    return state.series.get(seriesKey(state.def, labels))?.value;
  }

  render(): string {
    const lines: string[] = [];
    for (const { def, series } of this.metrics.values()) {
      lines.push(`# HELP ${def.name} ${def.help.replace(/\\/g, "\\\\").replace(/\n/g, "\\n")}`);
      lines.push(`# TYPE ${def.name} ${def.type}`);
      for (const s of series.values()) {
        const labelText = def.labelNames.map((n) => `${n}="${escapeLabelValue(s.labels[n] ?? "")}"`).join(",");
        lines.push(labelText ? `${def.name}{${labelText}} ${formatValue(s.value)}` : `${def.name} ${formatValue(s.value)}`);
      }
    }
    return lines.length ? lines.join("\n") + "\n" : "";
  }

  private require(name: string, type: MetricType, labels: Labels): MetricState {
    const state = this.metrics.get(name);
    if (!state) throw new Error(`unknown metric: ${name}`);
    if (state.def.type !== type) throw new Error(`metric ${name} is a ${state.def.type}, not a ${type}`);
    for (const n of state.def.labelNames) {
      if (labels[n] === undefined) throw new Error(`metric ${name} missing label ${n}`);
    }
    return state;
  }

  private pick(def: MetricDefinition, labels: Labels): Labels {
    const out: Labels = {};
    for (const n of def.labelNames) out[n] = labels[n] ?? "";
    return out;
  }
}
