import { getConfig } from '../shared/config';
import { closePools, getReaderPool } from '../shared/db';
import { createServiceLogger } from '../shared/logger';
import { PgStore } from '../shared/pg-store';
import { createReadApp } from './app';

const log = createServiceLogger('api-read');

async function main(): Promise<void> {
  const config = getConfig();
  const store = new PgStore(await getReaderPool());
  const app = createReadApp(store);

  const server = app.listen(config.readPort, () => log.info(`API Read Service listening on port ${config.readPort}`));

  const shutdown = (signal: string): void => {
    log.info('Shutting down', { signal });
    server.close(() => {
      closePools().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error('Failed to close database pools', { error: err });
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  log.error('API Read Service failed to start', { error: err });
  process.exit(1);
});
