import { randomUUID } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ActionDispatcher } from './action-dispatcher.service';
import { InstanceLifecycle } from '../engines/instance-lifecycle';
import type { LifecycleTransition } from '../engines/instance-lifecycle';
import { ActionExecutionError } from '../errors/action-execution.error';
import { InstanceNotFoundError } from '../errors/instance-not-found.error';
import { InvalidStateError } from '../errors/invalid-state.error';
import { RecursiveTransitionError } from '../errors/recursive-transition.error';
import { WorkflowNotFoundError } from '../errors/workflow-not-found.error';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type {
  InstanceCreatedEvent,
  InstanceStatusChangedEvent,
  StepTransitionEvent,
} from '../events/workflow-events';
import type { IInstanceStoreAdapter } from '../interfaces/instance-store-adapter.interface';
import type {
  WorkflowDefinition,
  WorkflowStep,
} from '../interfaces/workflow-definition.interface';
import type { IWorkflowDefinitionSource } from '../interfaces/workflow-definition-source.interface';
import type { WorkflowEvent } from '../interfaces/workflow-event.interface';
import type {
  InstanceFailure,
  WorkflowInstance,
} from '../interfaces/workflow-instance.interface';
import type { EventWorkflowModuleOptions } from '../interfaces/workflow-module-options.interface';
import { buildEventContext } from '../utils/build-event-context';
import { cloneJson } from '../utils/clone-json';
import { evaluateCondition } from '../utils/evaluate-condition';
import { isPlainObject } from '../utils/resolve-path';
import {
  DEFAULT_MAX_STEPS_PER_PASS,
  INSTANCE_STORE_ADAPTER,
  TERMINAL_STEP_ID,
  WORKFLOW_DEFINITION_SOURCE,
  WORKFLOW_MODULE_OPTIONS,
} from '../workflow.constants';

export type StepEngineOptions = Pick<EventWorkflowModuleOptions, 'maxStepsPerPass'>;

export interface StartResult {
  instance: WorkflowInstance;
  /** False when an instance already existed for the (workflow, event) pair. */
  created: boolean;
}

interface RecordedActionResult {
  type: string;
  status: string;
  output: Record<string, unknown>;
}

/**
 * Stores a result at `context.actions[stepId][index]`. The whole result is
 * kept there, so a handler's output sits one level down: conditions read
 * `actions.<stepId>.<index>.output.<key>`.
 */
function recordActionResult(
  context: Record<string, unknown>,
  stepId: string,
  index: number,
  result: RecordedActionResult,
): void {
  const actions = isPlainObject(context.actions) ? context.actions : {};
  const existing = actions[stepId];
  const stepResults = isPlainObject(existing) ? existing : {};
  stepResults[String(index)] = result;
  actions[stepId] = stepResults;
  context.actions = actions;
}

@Injectable()
export class StepEngine {
  private readonly logger = new Logger(StepEngine.name);
  private readonly maxStepsPerPass: number;

  constructor(
    @Inject(INSTANCE_STORE_ADAPTER)
    private readonly store: IInstanceStoreAdapter,
    @Inject(WORKFLOW_DEFINITION_SOURCE)
    private readonly definitions: IWorkflowDefinitionSource,
    private readonly dispatcher: ActionDispatcher,
    private readonly eventEmitter: EventEmitter2,
    @Inject(WORKFLOW_MODULE_OPTIONS) options: StepEngineOptions,
  ) {
    this.maxStepsPerPass = options.maxStepsPerPass ?? DEFAULT_MAX_STEPS_PER_PASS;
  }

  /**
   * Creates the instance for a matched (definition, event) pair and drives
   * it to a pause point or a terminal status. A no-op when the pair already
   * has an instance, whatever its status.
   */
  async start(
    definition: WorkflowDefinition,
    event: WorkflowEvent,
  ): Promise<StartResult> {
    return this.store.transaction(async (tx) => {
      const existing = await tx.findByWorkflowAndEvent(
        definition.id,
        event.id,
        true,
      );
      if (existing) {
        this.logger.log(
          `Workflow ${definition.id}: event ${event.id} already has instance ${existing.id} (${existing.status})`,
        );
        return { instance: existing, created: false };
      }

      const inserted = await tx.insert({
        id: randomUUID(),
        workflowId: definition.id,
        eventId: event.id,
        currentStepId: definition.initialStepId,
        status: 'RUNNING',
        context: buildEventContext(event),
        failure: null,
      });
      if (!inserted) {
        // Another consumer inserted the pair after our read.
        const winner = await tx.findByWorkflowAndEvent(definition.id, event.id);
        if (!winner) {
          throw new InvalidStateError(
            `${definition.id}/${event.id}`,
            `Instance for workflow ${definition.id} and event ${event.id} was neither inserted nor found`,
          );
        }
        return { instance: winner, created: false };
      }

      await tx.insertHistory({
        instanceId: inserted.id,
        fromStepId: null,
        toStepId: inserted.currentStepId,
        status: inserted.status,
      });

      this.eventEmitter.emit(WorkflowEventType.INSTANCE_CREATED, {
        workflowId: definition.id,
        instanceId: inserted.id,
        eventId: event.id,
        initialStepId: definition.initialStepId,
        timestamp: new Date(),
      } satisfies InstanceCreatedEvent);

      const instance = await this.drive(tx, definition, inserted, false);
      return { instance, created: true };
    });
  }

  /**
   * Drives a RUNNING instance forward. Instances in any other status are
   * returned unchanged and no action runs.
   */
  async advance(instanceId: string): Promise<WorkflowInstance> {
    return this.store.transaction(async (tx) => {
      const instance = await this.loadInstance(tx, instanceId, true);
      if (instance.status !== 'RUNNING') {
        return instance;
      }
      const definition = await this.loadDefinition(instance.workflowId);
      return this.drive(tx, definition, instance, false);
    });
  }

  /**
   * Completes the human task an instance is paused on: merges the outcome
   * into the context, moves WAITING_HUMAN -> RUNNING with a compare-and-set,
   * then runs the task step's actions and transitions.
   */
  async resume(
    instanceId: string,
    outcome: Record<string, unknown>,
  ): Promise<WorkflowInstance> {
    return this.store.transaction(async (tx) => {
      const instance = await this.loadInstance(tx, instanceId, true);
      const lifecycle = new InstanceLifecycle(instance.id, instance.status);
      lifecycle.apply('resume');

      const definition = await this.loadDefinition(instance.workflowId);
      const context = { ...instance.context, ...cloneJson(outcome) };

      const swapped = await tx.compareAndSetStatus(
        instance.id,
        'WAITING_HUMAN',
        'RUNNING',
        context,
      );
      if (!swapped) {
        throw new InvalidStateError(
          instance.id,
          `Instance ${instance.id} is no longer waiting for a human task`,
        );
      }

      await tx.insertHistory({
        instanceId: instance.id,
        fromStepId: instance.currentStepId,
        toStepId: instance.currentStepId,
        status: 'RUNNING',
      });
      this.emitStatusChanged(
        { ...instance, context },
        'WAITING_HUMAN',
        'RUNNING',
        null,
      );

      return this.drive(
        tx,
        definition,
        { ...instance, status: lifecycle.status, context },
        true,
      );
    });
  }

  async getInstance(instanceId: string): Promise<WorkflowInstance> {
    return this.loadInstance(this.store, instanceId, false);
  }

  private async drive(
    tx: IInstanceStoreAdapter,
    definition: WorkflowDefinition,
    instance: WorkflowInstance,
    resumed: boolean,
  ): Promise<WorkflowInstance> {
    const lifecycle = new InstanceLifecycle(instance.id, instance.status);
    const context = cloneJson(instance.context);
    let stepId = instance.currentStepId;
    let skipPause = resumed;
    let visits = 0;

    while (lifecycle.status === 'RUNNING') {
      const step = definition.steps[stepId];
      if (!step) {
        throw new InvalidStateError(
          instance.id,
          `Instance ${instance.id} is at step "${stepId}", which workflow ${definition.id} does not define`,
        );
      }

      visits += 1;
      if (visits > this.maxStepsPerPass) {
        const error = new RecursiveTransitionError(
          instance.id,
          stepId,
          this.maxStepsPerPass,
        );
        this.logger.warn(error.message);
        return this.changeStatus(tx, instance, lifecycle, 'fail', stepId, context, {
          stepId,
          actionIndex: -1,
          actionType: 'transition',
          error: error.message,
        });
      }

      if (step.kind === 'HUMAN_TASK' && !skipPause) {
        return this.changeStatus(tx, instance, lifecycle, 'pause', stepId, context, null);
      }
      skipPause = false;

      const failure = await this.runActions(instance.id, step, context);
      if (failure) {
        return this.changeStatus(tx, instance, lifecycle, 'fail', stepId, context, failure);
      }

      const nextStepId = this.selectTransition(instance.id, step, context);
      if (nextStepId === null) {
        return this.changeStatus(tx, instance, lifecycle, 'complete', stepId, context, null);
      }

      await tx.update(instance.id, {
        currentStepId: nextStepId,
        status: 'RUNNING',
        context,
        failure: null,
      });
      await tx.insertHistory({
        instanceId: instance.id,
        fromStepId: stepId,
        toStepId: nextStepId,
        status: 'RUNNING',
      });
      this.eventEmitter.emit(WorkflowEventType.STEP_TRANSITION, {
        workflowId: definition.id,
        instanceId: instance.id,
        fromStepId: stepId,
        toStepId: nextStepId,
        timestamp: new Date(),
      } satisfies StepTransitionEvent);

      stepId = nextStepId;
    }

    return instance;
  }

  /** Runs a step's actions in order. Resolves to the first failure, if any. */
  private async runActions(
    instanceId: string,
    step: WorkflowStep,
    context: Record<string, unknown>,
  ): Promise<InstanceFailure | null> {
    for (const [index, action] of step.actions.entries()) {
      const result = await this.dispatcher.execute(action, context);
      recordActionResult(context, step.id, index, {
        type: action.type,
        status: result.status,
        output: cloneJson(result.output),
      });

      if (result.status === 'FAILED') {
        const reason =
          typeof result.output.error === 'string'
            ? result.output.error
            : 'Action reported failure';
        const error = new ActionExecutionError(
          instanceId,
          step.id,
          index,
          action.type,
          reason,
        );
        this.logger.warn(error.message);
        return {
          stepId: step.id,
          actionIndex: index,
          actionType: action.type,
          error: reason,
        };
      }
    }
    return null;
  }

  /**
   * First transition whose condition holds. Null ends the instance: the
   * terminal marker, an empty list, or no transition holding.
   */
  private selectTransition(
    instanceId: string,
    step: WorkflowStep,
    context: Record<string, unknown>,
  ): string | null {
    for (const transition of step.transitions) {
      const holds = evaluateCondition(transition.condition, context, (error) => {
        this.logger.warn(
          `Instance ${instanceId}: transition from "${step.id}" to "${transition.targetStepId}" not evaluated: ${error.message}`,
        );
      });
      if (holds) {
        return transition.targetStepId === TERMINAL_STEP_ID
          ? null
          : transition.targetStepId;
      }
    }
    return null;
  }

  private async changeStatus(
    tx: IInstanceStoreAdapter,
    instance: WorkflowInstance,
    lifecycle: InstanceLifecycle,
    transition: LifecycleTransition,
    stepId: string,
    context: Record<string, unknown>,
    failure: InstanceFailure | null,
  ): Promise<WorkflowInstance> {
    const fromStatus = lifecycle.status;
    const toStatus = lifecycle.apply(transition);

    await tx.update(instance.id, {
      currentStepId: stepId,
      status: toStatus,
      context,
      failure,
    });
    await tx.insertHistory({
      instanceId: instance.id,
      fromStepId: stepId,
      toStepId: stepId,
      status: toStatus,
    });

    const saved = await this.loadInstance(tx, instance.id, false);
    this.emitStatusChanged(saved, fromStatus, toStatus, failure);
    this.logger.log(
      `Instance ${instance.id} of workflow ${instance.workflowId}: ${fromStatus} -> ${toStatus} at step "${stepId}"`,
    );
    return saved;
  }

  private emitStatusChanged(
    instance: WorkflowInstance,
    fromStatus: WorkflowInstance['status'],
    toStatus: WorkflowInstance['status'],
    failure: InstanceFailure | null,
  ): void {
    this.eventEmitter.emit(WorkflowEventType.STATUS_CHANGED, {
      workflowId: instance.workflowId,
      instanceId: instance.id,
      stepId: instance.currentStepId,
      fromStatus,
      toStatus,
      failure,
      timestamp: new Date(),
    } satisfies InstanceStatusChangedEvent);
  }

  private async loadInstance(
    adapter: IInstanceStoreAdapter,
    instanceId: string,
    lock: boolean,
  ): Promise<WorkflowInstance> {
    const instance = await adapter.findById(instanceId, lock);
    if (!instance) {
      throw new InstanceNotFoundError(instanceId);
    }
    return instance;
  }

  private async loadDefinition(workflowId: string): Promise<WorkflowDefinition> {
    const definition = await this.definitions.findById(workflowId);
    if (!definition) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return definition;
  }
}
