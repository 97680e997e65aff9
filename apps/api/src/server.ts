import 'dotenv/config';
import { createServer } from 'http';
import { closePool, getPool } from '@carpool/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/app-config.js';
import { createPgRepositories, createServices } from './container.js';

async function main() {
  const config = loadConfig();

  // Verify DB connection
  await getPool().query('SELECT 1');
  console.log('[server] database connected');

  const repos = createPgRepositories();
  const services = createServices(repos, { gapThresholdKm: config.auditGapThresholdKm });
  const app = buildApp({ repos, services }, { corsOrigin: config.corsOrigin });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error('[server] error while closing the pool', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
