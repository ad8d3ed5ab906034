import { InvalidStreamEntryError } from '../errors/invalid-stream-entry.error';
import type {
  StreamEntry,
  WorkflowEvent,
} from '../interfaces/workflow-event.interface';
import { isPlainObject } from './resolve-path';

const DEFAULT_ORG_ID = '0';

export function encodeStreamEntry(event: WorkflowEvent): Record<string, string> {
  return {
    event_id: event.id,
    template_id: event.templateId,
    org_id: event.orgId,
    data: JSON.stringify(event.data),
    submitted_at: event.submittedAt.toISOString(),
  };
}

function entryTimestamp(entryId: string): Date | null {
  const millis = Number.parseInt(entryId.split('-')[0] ?? '', 10);
  return Number.isNaN(millis) ? null : new Date(millis);
}

/**
 * Decodes a log entry's wire fields into an event. `org_id` defaults to "0";
 * a missing `submitted_at` falls back to the entry id's millisecond part.
 */
export function decodeStreamEntry(entry: StreamEntry): WorkflowEvent {
  const { fields } = entry;

  const id = fields.event_id;
  if (!id) {
    throw new InvalidStreamEntryError(
      entry.id,
      `Log entry ${entry.id} has no event_id`,
    );
  }

  const templateId = fields.template_id;
  if (!templateId) {
    throw new InvalidStreamEntryError(
      entry.id,
      `Log entry ${entry.id} has no template_id`,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(fields.data ?? '');
  } catch {
    throw new InvalidStreamEntryError(
      entry.id,
      `Log entry ${entry.id} has a data field that is not valid JSON`,
    );
  }
  if (!isPlainObject(data)) {
    throw new InvalidStreamEntryError(
      entry.id,
      `Log entry ${entry.id} has a data field that is not a JSON object`,
    );
  }

  const submittedAt = fields.submitted_at
    ? new Date(fields.submitted_at)
    : entryTimestamp(entry.id);
  if (!submittedAt || Number.isNaN(submittedAt.getTime())) {
    throw new InvalidStreamEntryError(
      entry.id,
      `Log entry ${entry.id} has an invalid submitted_at`,
    );
  }

  return {
    id,
    templateId,
    orgId: fields.org_id || DEFAULT_ORG_ID,
    data,
    submittedAt,
  };
}
