import { DEFAULT_APP_CONFIG, loadAppConfig } from '../appConfig';

describe('loadAppConfig', () => {
  test('uses defaults for an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      databasePath: 'product_readiness.db',
      port: 8080,
      requestTimeoutMs: 15000,
      jsonBodyLimit: '10mb',
    });
  });

  test('reads overrides', () => {
    expect(
      loadAppConfig({
        DATABASE_PATH: ' /var/lib/trl/readiness.db ',
        API_PORT: '3001',
        API_TIMEOUT_MS: '2500',
        JSON_BODY_LIMIT: '1mb',
      }),
    ).toEqual({
      databasePath: '/var/lib/trl/readiness.db',
      port: 3001,
      requestTimeoutMs: 2500,
      jsonBodyLimit: '1mb',
    });
  });

  test('invalid numbers fall back to the defaults', () => {
    const config = loadAppConfig({ API_PORT: 'eighty', API_TIMEOUT_MS: '-5' });
    expect(config.port).toBe(DEFAULT_APP_CONFIG.port);
    expect(config.requestTimeoutMs).toBe(DEFAULT_APP_CONFIG.requestTimeoutMs);
  });
});
