import { getConfig } from '../shared/config';
import { closePools, getWriterPool } from '../shared/db';
import { createServiceLogger } from '../shared/logger';
import { PgStore } from '../shared/pg-store';
import { createWriteApp } from './app';

const log = createServiceLogger('api-write');

async function main(): Promise<void> {
  const config = getConfig();
  const store = new PgStore(await getWriterPool());
  const app = createWriteApp(store);

  const server = app.listen(config.writePort, () => log.info(`API Write Service listening on port ${config.writePort}`));

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
  log.error('API Write Service failed to start', { error: err });
  process.exit(1);
});
