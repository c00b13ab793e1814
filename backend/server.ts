import 'dotenv/config';

import { createApiApp } from './apiApp';
import { loadAppConfig } from './config/appConfig';
import { openReadinessRepository } from './readiness/RepositoryStore';

const bootstrap = () => {
  const config = loadAppConfig();
  const repository = openReadinessRepository(config.databasePath);
  const app = createApiApp({ repository, config });

  const server = app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`[api] listening on http://localhost:${config.port}`);
    // eslint-disable-next-line no-console
    console.log(`[api] database ${config.databasePath}`);
  });

  const shutdown = () => {
    server.close(() => repository.close());
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

try {
  bootstrap();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error('[api] failed to start', err);
  process.exitCode = 1;
}
