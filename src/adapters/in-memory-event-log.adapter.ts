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

interface LogRecord {
  id: string;
  fields: Record<string, string>;
}

interface PendingRecord {
  consumer: string;
  deliveredAt: number;
  deliveryCount: number;
}

interface GroupState {
  /** Index of the next record never delivered to this group. */
  nextIndex: number;
  pending: Map<string, PendingRecord>;
}

export interface InMemoryEventLogOptions {
  /** Clock used for lease bookkeeping. Default: Date.now */
  now?: () => number;
}

/**
 * Consumer-group log kept in process memory, with the claim/ack/reclaim
 * semantics of a Redis stream.
 */
export class InMemoryEventLogAdapter implements IEventLogAdapter {
  private readonly records: LogRecord[] = [];
  private readonly groups = new Map<string, GroupState>();
  private readonly waiters = new Set<() => void>();
  private readonly now: () => number;
  private lastMillis = 0;
  private sequence = 0;

  constructor(options: InMemoryEventLogOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async ensureGroup(group: string): Promise<void> {
    if (!this.groups.has(group)) {
      this.groups.set(group, { nextIndex: 0, pending: new Map() });
    }
  }

  async publish(event: WorkflowEvent): Promise<string> {
    return this.append(encodeStreamEntry(event));
  }

  /** Append raw wire fields. Lets tests publish malformed entries. */
  append(fields: Record<string, string>): string {
    const id = this.nextId();
    this.records.push({ id, fields: { ...fields } });
    for (const wake of [...this.waiters]) {
      wake();
    }
    return id;
  }

  async claim(
    group: string,
    consumer: string,
    options: ClaimOptions,
  ): Promise<StreamEntry[]> {
    const entries = this.claimAvailable(group, consumer, options);
    if (entries.length > 0 || options.blockMs <= 0) {
      return entries;
    }

    await this.waitForAppend(options.blockMs);
    return this.claimAvailable(group, consumer, options);
  }

  async ack(group: string, entryId: string): Promise<void> {
    this.getGroup(group).pending.delete(entryId);
  }

  async pending(group: string): Promise<PendingSummary> {
    const consumers: Record<string, number> = {};
    const { pending } = this.getGroup(group);
    for (const record of pending.values()) {
      consumers[record.consumer] = (consumers[record.consumer] ?? 0) + 1;
    }
    return { count: pending.size, consumers };
  }

  private claimAvailable(
    group: string,
    consumer: string,
    options: ClaimOptions,
  ): StreamEntry[] {
    const state = this.getGroup(group);
    const now = this.now();
    const claimed: StreamEntry[] = [];

    for (const record of this.records) {
      if (claimed.length >= options.count) break;
      const pending = state.pending.get(record.id);
      if (!pending || now - pending.deliveredAt < options.minIdleMs) continue;

      pending.consumer = consumer;
      pending.deliveredAt = now;
      pending.deliveryCount += 1;
      claimed.push(this.toEntry(record, pending.deliveryCount));
    }

    while (
      claimed.length < options.count &&
      state.nextIndex < this.records.length
    ) {
      const record = this.records[state.nextIndex];
      state.nextIndex += 1;
      state.pending.set(record.id, {
        consumer,
        deliveredAt: now,
        deliveryCount: 1,
      });
      claimed.push(this.toEntry(record, 1));
    }

    return claimed;
  }

  private waitForAppend(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      this.waiters.add(wake);
    });
  }

  private getGroup(group: string): GroupState {
    const state = this.groups.get(group);
    if (!state) {
      throw new Error(`Consumer group "${group}" does not exist`);
    }
    return state;
  }

  private toEntry(record: LogRecord, deliveryCount: number): StreamEntry {
    return { id: record.id, fields: { ...record.fields }, deliveryCount };
  }

  private nextId(): string {
    const millis = Math.max(this.now(), this.lastMillis);
    this.sequence = millis === this.lastMillis ? this.sequence + 1 : 0;
    this.lastMillis = millis;
    return `${millis}-${this.sequence}`;
  }
}
