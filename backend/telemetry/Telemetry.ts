import { performance } from 'perf_hooks';

import { telemetryStore, type TelemetryEvent } from './TelemetryStore';

const flagEnabled = (name: string): boolean => {
  const value = String(process.env[name] ?? '').trim().toLowerCase();
  if (!value) return true;
  return value === '1' || value === 'true' || value === 'yes';
};

export const telemetry = {
  nowMs: (): number => performance.now(),

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): void {
    if (!flagEnabled('TRL_TELEMETRY')) return;

    const stored = telemetryStore.record(event);
    if (!flagEnabled('TRL_TELEMETRY_LOGS')) return;

    // One JSON object per line.
    // eslint-disable-next-line no-console
    console.info(
      JSON.stringify({
        type: 'trl.telemetry',
        ts: stored.ts,
        name: stored.name,
        durationMs: stored.durationMs,
        tags: stored.tags,
        metrics: stored.metrics,
        message: stored.message,
      }),
    );
  },

  /** Runs `fn` and records its duration under `name`, whether it throws or not. */
  time<T>(
    name: string,
    fn: () => T,
    describe?: (result: T) => Pick<TelemetryEvent, 'tags' | 'metrics'>,
  ): T {
    const startedAt = performance.now();
    let outcome: 'ok' | 'error' = 'error';
    let extra: Pick<TelemetryEvent, 'tags' | 'metrics'> = {};
    try {
      const result = fn();
      outcome = 'ok';
      if (describe) extra = describe(result);
      return result;
    } finally {
      telemetry.record({
        name,
        durationMs: performance.now() - startedAt,
        tags: { outcome, ...extra.tags },
        metrics: extra.metrics,
      });
    }
  },
};
