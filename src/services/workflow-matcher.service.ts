import { Injectable, Logger } from '@nestjs/common';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type { WorkflowEvent } from '../interfaces/workflow-event.interface';
import { buildEventContext } from '../utils/build-event-context';
import { evaluateCondition } from '../utils/evaluate-condition';

@Injectable()
export class WorkflowMatcher {
  private readonly logger = new Logger(WorkflowMatcher.name);

  /**
   * Every active definition whose trigger type equals the event's template
   * id and whose trigger condition holds, in input order.
   */
  match(
    event: WorkflowEvent,
    definitions: WorkflowDefinition[],
  ): WorkflowDefinition[] {
    const context = buildEventContext(event);

    return definitions.filter((definition) => {
      if (!definition.active) return false;
      if (definition.trigger.type !== event.templateId) return false;

      return evaluateCondition(definition.trigger.condition, context, (error) => {
        this.logger.warn(
          `Trigger of workflow ${definition.id} not evaluated for event ${event.id}: ${error.message}`,
        );
      });
    });
  }
}
