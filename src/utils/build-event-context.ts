import type { WorkflowEvent } from '../interfaces/workflow-event.interface';
import { cloneJson } from './clone-json';

/**
 * The namespace triggers, transitions and templates resolve paths against.
 * Keys follow the log wire names so definitions can be authored against them.
 */
export function buildEventContext(
  event: WorkflowEvent,
): Record<string, unknown> {
  return {
    data: cloneJson(event.data),
    template_id: event.templateId,
    submission_id: event.id,
    org_id: event.orgId,
    submitted_at: event.submittedAt.toISOString(),
  };
}
