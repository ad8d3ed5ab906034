import { Injectable } from '@nestjs/common';
import { WorkflowActionHandler } from '../decorators/action-handler.decorator';
import type {
  ActionResult,
  IActionHandler,
} from '../interfaces/action-handler.interface';

/** Placeholder for action types whose side effects live outside this library. */
@Injectable()
@WorkflowActionHandler(
  'create_ticket',
  'update_ticket',
  'create_task',
  'update_task',
  'webhook',
)
export class NotImplementedActionHandler implements IActionHandler {
  async execute(): Promise<ActionResult> {
    return { status: 'NOT_IMPLEMENTED', output: { note: 'Not implemented yet' } };
  }
}
