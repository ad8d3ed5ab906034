import { Injectable, Logger } from '@nestjs/common';
import { ActionRegistry } from './action-registry.service';
import type { ActionResult } from '../interfaces/action-handler.interface';
import type { WorkflowActionDefinition } from '../interfaces/workflow-definition.interface';

@Injectable()
export class ActionDispatcher {
  private readonly logger = new Logger(ActionDispatcher.name);

  constructor(private readonly registry: ActionRegistry) {}

  /**
   * Runs one action against the instance context. Never throws: a missing
   * handler or a handler exception comes back as a FAILED result.
   */
  async execute(
    action: WorkflowActionDefinition,
    context: Record<string, unknown>,
  ): Promise<ActionResult> {
    const handler = this.registry.get(action.type);
    if (!handler) {
      this.logger.error(`No handler registered for action type "${action.type}"`);
      return {
        status: 'FAILED',
        output: { error: `Unknown action type "${action.type}"` },
      };
    }

    try {
      return await handler.execute(action, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Action handler for "${action.type}" threw: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { status: 'FAILED', output: { error: message } };
    }
  }
}
