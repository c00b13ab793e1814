export type TelemetryTagValue = string | number | boolean | null | undefined;

export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: Record<string, TelemetryTagValue>;
  metrics?: Record<string, number | null | undefined>;
  message?: string;
};

type Aggregate = {
  count: number;
  sum: number;
  max: number;
};

const nowIso = () => new Date().toISOString();

const finite = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const bump = (map: Map<string, Aggregate>, key: string, value: number) => {
  const agg = map.get(key) ?? { count: 0, sum: 0, max: 0 };
  agg.count += 1;
  agg.sum += value;
  if (value > agg.max) agg.max = value;
  map.set(key, agg);
};

/**
 * Bounded ring of recent events plus running aggregates per event name.
 * Batch runs and API failures are recorded here; `snapshot()` feeds
 * `GET /health`.
 */
export class TelemetryStore {
  private readonly maxEvents: number;
  private readonly events: TelemetryEvent[] = [];

  private readonly durations = new Map<string, Aggregate>();
  // keyed `${eventName}|${metric}`
  private readonly metrics = new Map<string, Aggregate>();

  constructor(args?: { maxEvents?: number }) {
    this.maxEvents = Math.max(10, Math.trunc(args?.maxEvents ?? 500));
  }

  reset(): void {
    this.events.length = 0;
    this.durations.clear();
    this.metrics.clear();
  }

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): TelemetryEvent {
    const stored: TelemetryEvent = { ...event, ts: event.ts ?? nowIso() };

    this.events.push(stored);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    const durationMs = finite(stored.durationMs);
    if (durationMs !== null) bump(this.durations, stored.name, durationMs);

    for (const [metric, raw] of Object.entries(stored.metrics ?? {})) {
      const value = finite(raw);
      if (value !== null) bump(this.metrics, `${stored.name}|${metric}`, value);
    }
    return stored;
  }

  listRecent(limit = 50): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    if (n === 0) return [];
    return this.events.slice(-n);
  }

  snapshot(recent = 20) {
    const durationsByName = [...this.durations.entries()]
      .map(([name, agg]) => ({
        name,
        count: agg.count,
        avgMs: agg.count > 0 ? agg.sum / agg.count : 0,
        maxMs: agg.max,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));

    const metricsByName = [...this.metrics.entries()]
      .map(([key, agg]) => {
        const split = key.indexOf('|');
        return {
          name: key.slice(0, split),
          metric: key.slice(split + 1),
          count: agg.count,
          total: agg.sum,
          max: agg.max,
        };
      })
      .sort(
        (a, b) =>
          a.name.localeCompare(b.name) || a.metric.localeCompare(b.metric),
      );

    return {
      generatedAt: nowIso(),
      durationsByName,
      metricsByName,
      recentEvents: this.listRecent(recent),
    };
  }
}

export const telemetryStore = new TelemetryStore();
