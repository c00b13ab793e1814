import { telemetry } from '../Telemetry';
import { telemetryStore } from '../TelemetryStore';

describe('telemetry.time', () => {
  beforeEach(() => telemetryStore.reset());

  test('records the outcome and described metrics', () => {
    const result = telemetry.time(
      'batch.parse',
      () => 3,
      (count) => ({ metrics: { items: count } }),
    );

    expect(result).toBe(3);
    const [event] = telemetryStore.listRecent();
    expect(event?.name).toBe('batch.parse');
    expect(event?.tags).toEqual({ outcome: 'ok' });
    expect(event?.metrics).toEqual({ items: 3 });
  });

  test('records an error outcome and rethrows', () => {
    expect(() =>
      telemetry.time('batch.parse', () => {
        throw new Error('bad input');
      }),
    ).toThrow('bad input');
    expect(telemetryStore.listRecent()[0]?.tags).toEqual({ outcome: 'error' });
  });

  test('TRL_TELEMETRY=false disables recording', () => {
    process.env.TRL_TELEMETRY = 'false';
    try {
      telemetry.record({ name: 'api.error' });
    } finally {
      delete process.env.TRL_TELEMETRY;
    }
    expect(telemetryStore.listRecent()).toEqual([]);
  });
});
