import type { SmtpConfig } from '../adapters/nodemailer-mail-transport';
import type { ConsumerGroupOptions } from '../interfaces/workflow-module-options.interface';
import {
  DEFAULT_CONSUMER_NAME,
  DEFAULT_DEFINITION_TABLE,
  DEFAULT_GROUP_NAME,
  DEFAULT_INSTANCE_TABLE,
  DEFAULT_LEASE_MS,
  DEFAULT_STREAM_NAME,
} from '../workflow.constants';

export interface RedisConfig {
  host: string;
  port: number;
  db: number;
  password?: string;
  streamName: string;
}

export interface WorkerConfig {
  redis: RedisConfig;
  databaseUrl: string;
  instanceTable: string;
  definitionTable: string;
  smtp: SmtpConfig;
  consumer: ConsumerGroupOptions;
}

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value === '' ? fallback : value;
}

function envOptional(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function envInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${key}: "${raw}". Expected a non-negative integer.`);
  }
  return value;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  return ['1', 'true', 'yes'].includes(raw.toLowerCase());
}

/**
 * Worker settings from environment variables. Only DATABASE_URL is
 * required; everything else has a default.
 */
export function loadConfigFromEnv(env: Env = process.env): WorkerConfig {
  const databaseUrl = envOptional(env, 'DATABASE_URL');
  if (!databaseUrl) {
    throw new Error('Missing required env var: DATABASE_URL');
  }

  const smtpUser = envOptional(env, 'SMTP_USER');
  const smtpPort = envInt(env, 'SMTP_PORT', 587);
  const consumerName = envString(env, 'CONSUMER_NAME', DEFAULT_CONSUMER_NAME);
  const maxDeliveries = envOptional(env, 'MAX_DELIVERIES');

  return {
    redis: {
      host: envString(env, 'REDIS_HOST', 'localhost'),
      port: envInt(env, 'REDIS_PORT', 6379),
      db: envInt(env, 'REDIS_DB', 0),
      password: envOptional(env, 'REDIS_PASSWORD'),
      streamName: envString(env, 'REDIS_STREAM_NAME', DEFAULT_STREAM_NAME),
    },
    databaseUrl,
    instanceTable: envString(env, 'INSTANCE_TABLE', DEFAULT_INSTANCE_TABLE),
    definitionTable: envString(env, 'DEFINITION_TABLE', DEFAULT_DEFINITION_TABLE),
    smtp: {
      host: envString(env, 'SMTP_HOST', 'smtp.gmail.com'),
      port: smtpPort,
      // Port 465 speaks TLS from the start; 587 upgrades with STARTTLS.
      secure: envBool(env, 'SMTP_SECURE', smtpPort === 465),
      user: smtpUser,
      password: envOptional(env, 'SMTP_PASSWORD'),
      from: envString(env, 'FROM_EMAIL', smtpUser ?? ''),
    },
    consumer: {
      groupName: envString(env, 'CONSUMER_GROUP', DEFAULT_GROUP_NAME),
      consumerNames: [consumerName],
      leaseMs: envInt(env, 'PENDING_TIMEOUT_MS', DEFAULT_LEASE_MS),
      maxDeliveries:
        maxDeliveries === undefined
          ? undefined
          : envInt(env, 'MAX_DELIVERIES', 0),
    },
  };
}
