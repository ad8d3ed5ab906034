import type { StreamEntry, WorkflowEvent } from './workflow-event.interface';

export interface ClaimOptions {
  /** Maximum number of entries to hand out. */
  count: number;
  /** How long to wait for new entries when none are available. 0 = no wait. */
  blockMs: number;
  /** Pending entries idle at least this long are reclaimed from any consumer. */
  minIdleMs: number;
}

export interface PendingSummary {
  count: number;
  consumers: Record<string, number>;
}

export interface IEventLogAdapter {
  /** Create the consumer group if it does not exist yet. */
  ensureGroup(group: string): Promise<void>;

  /**
   * Claim entries for a consumer: timed-out pending entries first, then
   * entries never delivered to the group.
   */
  claim(
    group: string,
    consumer: string,
    options: ClaimOptions,
  ): Promise<StreamEntry[]>;

  /** Acknowledge an entry, removing it from the group's pending list. */
  ack(group: string, entryId: string): Promise<void>;

  /** Summarise the group's claimed-but-unacknowledged entries. */
  pending(group: string): Promise<PendingSummary>;

  /** Append an event in the log wire shape. Resolves to the entry id. */
  publish(event: WorkflowEvent): Promise<string>;
}
