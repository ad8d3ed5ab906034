import { SetMetadata } from '@nestjs/common';
import { ACTION_HANDLER_METADATA } from '../workflow.constants';

export interface ActionHandlerMetadata {
  /** Action types the decorated provider executes. */
  types: string[];
}

/**
 * Marks a provider implementing `IActionHandler` as the handler for one or
 * more action types. Picked up by `ActionRegistry` at module init.
 */
export function WorkflowActionHandler(...types: string[]): ClassDecorator {
  return (target: Function) => {
    const metadata: ActionHandlerMetadata = { types };
    SetMetadata(ACTION_HANDLER_METADATA, metadata)(target);
    Reflect.defineMetadata(ACTION_HANDLER_METADATA, metadata, target);
  };
}
