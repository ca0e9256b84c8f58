import 'dotenv/config';
import pino from 'pino';
import { buildApp } from './app';
import { loadConfig } from './config';
import { openDb } from './db';
import { EpsonPrinterClient } from './epson-client';
import { StatusPoller } from './poller';
import { createReadingRepository } from './readings';

async function main(): Promise<void> {
  const { config, redacted } = loadConfig();
  const logger = pino({ level: config.logLevel });

  logger.info({ config: redacted }, 'config loaded');

  const db = openDb(config.dbPath);
  const readings = createReadingRepository(db);
  const client = new EpsonPrinterClient({
    host: config.printerHost,
    path: config.printerPath,
    timeoutMs: config.requestTimeoutMs,
    logger
  });
  const poller = new StatusPoller(client, readings, logger, config.scanIntervalMs);

  const fastify = await buildApp({ config, client, poller, readings, logger });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'shutting down');
    poller.stop();
    await fastify.close();
    db.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  await fastify.listen({ host: config.appHost, port: config.appPort });
  poller.start();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
