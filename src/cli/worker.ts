import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Redis } from 'ioredis';
import { Pool } from 'pg';
import { NodemailerMailTransport } from '../adapters/nodemailer-mail-transport';
import { PgInstanceStoreAdapter } from '../adapters/pg-instance-store.adapter';
import { PgWorkflowDefinitionSource } from '../adapters/pg-workflow-definition.source';
import { RedisStreamEventLogAdapter } from '../adapters/redis-stream-event-log.adapter';
import type { WorkerConfig } from '../config/load-config-from-env';
import { EventWorkflowModule } from '../workflow.module';
import { BUILTIN_ACTION_TYPES } from '../workflow.constants';

/**
 * Runs the consumer loops until SIGINT or SIGTERM, then closes the Nest
 * context, the Redis connection and the pool.
 */
export async function runWorker(config: WorkerConfig): Promise<void> {
  const logger = new Logger('EventWorkflowWorker');

  const pool = new Pool({ connectionString: config.databaseUrl });
  const redis = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    db: config.redis.db,
    password: config.redis.password,
    // Blocking XREADGROUP calls must not be cut short by the retry limit.
    maxRetriesPerRequest: null,
  });

  const app = await NestFactory.createApplicationContext(
    EventWorkflowModule.forRoot({
      instanceStore: new PgInstanceStoreAdapter(pool, config.instanceTable),
      eventLog: new RedisStreamEventLogAdapter(redis, {
        streamName: config.redis.streamName,
      }),
      definitionSource: new PgWorkflowDefinitionSource(
        pool,
        () => BUILTIN_ACTION_TYPES,
        config.definitionTable,
      ),
      mailTransport: NodemailerMailTransport.fromSmtpConfig(config.smtp),
      consumer: { ...config.consumer, autoStart: true },
    }),
  );

  logger.log(
    `Worker ${config.consumer.consumerNames?.join(', ')} consuming ${config.redis.streamName}`,
  );

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.log(`Received ${signal}, shutting down`);
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  await app.close();
  await redis.quit();
  await pool.end();
}
