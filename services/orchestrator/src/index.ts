import { config } from './config';
import { logger } from './logger';
import { createObservabilitySink } from './observability';
import { createOrchestrator } from './orchestrator';
import { closeRedis, getRedis } from './redis/client';
import { buildApp } from './server';

/**
 * Entrypoint for the orchestration service.
 * Loads the agent catalog, wires the router and remediation machine, and listens.
 */
async function main() {
  const sink = createObservabilitySink(logger);
  const core = createOrchestrator({ config, logger, sink });

  const registry = core.registry.status();
  if (!registry.available) {
    logger.error({ registry }, 'Starting without an agent catalog; every dispatch will fail');
  }

  const app = await buildApp({
    ...core,
    pingRedis: config.redisUrl ? () => getRedis().ping() : undefined,
    logLevel: config.log.level,
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await closeRedis();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info(`Orchestrator listening on http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error starting orchestrator');
  process.exit(1);
});
