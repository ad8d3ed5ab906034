import type { Redis } from 'ioredis';
import type {
  ClaimOptions,
  IEventLogAdapter,
  PendingSummary,
} from '../interfaces/event-log-adapter.interface';
import type {
  StreamEntry,
  WorkflowEvent,
} from '../interfaces/workflow-event.interface';
import { encodeStreamEntry } from '../utils/stream-entry-codec';
import { DEFAULT_STREAM_MAX_LEN } from '../workflow.constants';

export type RedisCommandClient = Pick<Redis, 'call'>;

export interface RedisStreamOptions {
  streamName: string;
  /** Approximate stream length kept by XADD trimming. */
  maxLen?: number;
}

/** Reads `[field, value, field, value, ...]` into a record. */
function toFields(raw: unknown): Record<string, string> | null {
  if (!Array.isArray(raw)) return null;
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < raw.length; i += 2) {
    fields[String(raw[i])] = String(raw[i + 1]);
  }
  return fields;
}

/** Reads `[[id, [field, value, ...]], ...]`, skipping entries deleted from the stream. */
function toRawEntries(raw: unknown): Array<{ id: string; fields: Record<string, string> }> {
  if (!Array.isArray(raw)) return [];
  const entries: Array<{ id: string; fields: Record<string, string> }> = [];
  for (const item of raw) {
    if (!Array.isArray(item) || typeof item[0] !== 'string') continue;
    const fields = toFields(item[1]);
    if (fields) {
      entries.push({ id: item[0], fields });
    }
  }
  return entries;
}

/**
 * Event log backed by a Redis stream and consumer group.
 * Claims use XAUTOCLAIM for timed-out pending entries, then XREADGROUP `>`.
 */
export class RedisStreamEventLogAdapter implements IEventLogAdapter {
  private readonly maxLen: number;

  constructor(
    private readonly redis: RedisCommandClient,
    private readonly options: RedisStreamOptions,
  ) {
    this.maxLen = options.maxLen ?? DEFAULT_STREAM_MAX_LEN;
  }

  async ensureGroup(group: string): Promise<void> {
    try {
      await this.redis.call(
        'XGROUP',
        'CREATE',
        this.options.streamName,
        group,
        '0',
        'MKSTREAM',
      );
    } catch (error) {
      // BUSYGROUP: the group already exists
      if (error instanceof Error && error.message.includes('BUSYGROUP')) {
        return;
      }
      throw error;
    }
  }

  async publish(event: WorkflowEvent): Promise<string> {
    const args: string[] = [];
    for (const [field, value] of Object.entries(encodeStreamEntry(event))) {
      args.push(field, value);
    }

    const id = await this.redis.call(
      'XADD',
      this.options.streamName,
      'MAXLEN',
      '~',
      this.maxLen,
      '*',
      ...args,
    );
    return String(id);
  }

  async claim(
    group: string,
    consumer: string,
    options: ClaimOptions,
  ): Promise<StreamEntry[]> {
    const reclaimed = await this.reclaim(group, consumer, options);
    if (reclaimed.length > 0) {
      return reclaimed;
    }

    const reply = await this.redis.call(
      'XREADGROUP',
      'GROUP',
      group,
      consumer,
      'COUNT',
      options.count,
      'BLOCK',
      options.blockMs,
      'STREAMS',
      this.options.streamName,
      '>',
    );

    if (!Array.isArray(reply)) return [];
    const entries: StreamEntry[] = [];
    for (const stream of reply) {
      if (!Array.isArray(stream)) continue;
      for (const entry of toRawEntries(stream[1])) {
        entries.push({ ...entry, deliveryCount: 1 });
      }
    }
    return entries;
  }

  async ack(group: string, entryId: string): Promise<void> {
    await this.redis.call('XACK', this.options.streamName, group, entryId);
  }

  async pending(group: string): Promise<PendingSummary> {
    const reply = await this.redis.call(
      'XPENDING',
      this.options.streamName,
      group,
    );

    const consumers: Record<string, number> = {};
    if (!Array.isArray(reply)) {
      return { count: 0, consumers };
    }

    const perConsumer: unknown = reply[3];
    if (Array.isArray(perConsumer)) {
      for (const item of perConsumer) {
        if (Array.isArray(item)) {
          consumers[String(item[0])] = Number(item[1]);
        }
      }
    }
    return { count: Number(reply[0] ?? 0), consumers };
  }

  private async reclaim(
    group: string,
    consumer: string,
    options: ClaimOptions,
  ): Promise<StreamEntry[]> {
    const reply = await this.redis.call(
      'XAUTOCLAIM',
      this.options.streamName,
      group,
      consumer,
      options.minIdleMs,
      '0-0',
      'COUNT',
      options.count,
    );

    if (!Array.isArray(reply)) return [];
    const entries: StreamEntry[] = [];
    for (const entry of toRawEntries(reply[1])) {
      entries.push({
        ...entry,
        deliveryCount: await this.deliveryCount(group, entry.id),
      });
    }
    return entries;
  }

  private async deliveryCount(group: string, entryId: string): Promise<number> {
    const reply = await this.redis.call(
      'XPENDING',
      this.options.streamName,
      group,
      entryId,
      entryId,
      1,
    );

    if (Array.isArray(reply) && Array.isArray(reply[0])) {
      const count = Number(reply[0][3]);
      return Number.isNaN(count) ? 1 : count;
    }
    return 1;
  }
}
