import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { runSync } from './app.js';
import { reportFailure } from './core/report.js';

const logger = createLogger();
const controller = new AbortController();

function requestShutdown(signal: string): void {
  if (controller.signal.aborted) return;
  logger.info({ signal }, 'Shutdown signal received, finishing in-flight uploads');
  controller.abort();
}

process.on('SIGTERM', () => requestShutdown('SIGTERM'));
process.on('SIGINT', () => requestShutdown('SIGINT'));

async function main(): Promise<number> {
  const config = loadConfig();
  logger.info({
    storeId: config.storeId,
    destination: config.destination,
    database: config.analyticsDatabase,
    table: config.analyticsTable,
    requestsPerSecond: config.requestsPerSecond,
    uploadWorkers: config.uploadWorkers,
  }, 'Starting loyalty sync');

  return runSync(config, logger, controller.signal);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.exitCode = reportFailure(err, logger);
  });
