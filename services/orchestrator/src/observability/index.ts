import { config } from '../config';
import type { ObservabilitySink } from '../contracts/observability';
import type { Logger } from '../logger';
import { getRedis } from '../redis/client';
import { LogEventSink } from './logSink';
import { RedisEventSink } from './redisSink';

export function createObservabilitySink(logger: Logger): ObservabilitySink {
  if (!config.redisUrl) {
    logger.info('REDIS_URL not set; observability events go to the log only');
    return new LogEventSink(logger);
  }

  return new RedisEventSink({
    publisher: getRedis(),
    logger,
    channelPrefix: config.events.channelPrefix,
    agentName: config.events.agentName,
  });
}
