import path from 'node:path';
import { loadConfig } from './config';
import { CsvFileAdapter } from './adapters/csv/csvFileAdapter';
import { LedgerStore } from './usecases/ledger';
import { createApp, createServices } from './server/app';
import { createLogger, setLogLevel } from './utils/log';

const log = createLogger('main');

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const dataDir = path.resolve(config.dataDir);
  const ledger = new LedgerStore(new CsvFileAdapter(dataDir));
  const app = createApp(createServices(ledger));

  const server = app.listen(config.port, config.host, () => {
    log.info(`listening on http://${config.host}:${config.port} (data in ${dataDir})`);
  });
  server.on('error', (err) => {
    log.error('server error', err);
    process.exitCode = 1;
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) {
        log.error('close failed', err);
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (e) {
  log.error('startup failed', e);
  process.exitCode = 1;
}
