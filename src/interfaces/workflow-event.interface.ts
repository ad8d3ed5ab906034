/** A submitted business event, immutable once published to the log. */
export interface WorkflowEvent {
  id: string;
  templateId: string;
  orgId: string;
  data: Record<string, unknown>;
  submittedAt: Date;
}

/** A log entry as claimed from a consumer group. */
export interface StreamEntry {
  /** Monotonically increasing log id, e.g. `1700000000000-0`. */
  id: string;
  fields: Record<string, string>;
  /** How many times the entry has been handed to a consumer, this claim included. */
  deliveryCount: number;
}
