import StateMachine from 'javascript-state-machine';
import { InvalidStateError } from '../errors/invalid-state.error';
import type { InstanceStatus } from '../interfaces/workflow-instance.interface';

export type LifecycleTransition = 'pause' | 'resume' | 'complete' | 'fail';

const TRANSITIONS: Array<{
  name: LifecycleTransition;
  from: InstanceStatus;
  to: InstanceStatus;
}> = [
  { name: 'pause', from: 'RUNNING', to: 'WAITING_HUMAN' },
  { name: 'resume', from: 'WAITING_HUMAN', to: 'RUNNING' },
  { name: 'complete', from: 'RUNNING', to: 'COMPLETED' },
  { name: 'fail', from: 'RUNNING', to: 'FAILED' },
];

const STATUSES: readonly InstanceStatus[] = [
  'RUNNING',
  'WAITING_HUMAN',
  'COMPLETED',
  'FAILED',
];

function isInstanceStatus(value: string): value is InstanceStatus {
  return STATUSES.some((status) => status === value);
}

/**
 * Guards an instance's status. Statuses only move forward, except for the
 * single WAITING_HUMAN -> RUNNING step a resume makes; any other move throws.
 */
export class InstanceLifecycle {
  private readonly fsm: StateMachine;

  constructor(
    private readonly instanceId: string,
    initial: InstanceStatus,
  ) {
    this.fsm = new StateMachine({ init: initial, transitions: TRANSITIONS });
  }

  get status(): InstanceStatus {
    const { state } = this.fsm;
    if (!isInstanceStatus(state)) {
      throw new InvalidStateError(
        this.instanceId,
        `Instance ${this.instanceId} is in unknown status ${state}`,
      );
    }
    return state;
  }

  apply(transition: LifecycleTransition): InstanceStatus {
    if (!this.fsm.can(transition)) {
      throw new InvalidStateError(
        this.instanceId,
        `Cannot ${transition} instance ${this.instanceId} while it is ${this.fsm.state}`,
      );
    }

    const transitionFn = this.fsm[transition];
    if (typeof transitionFn !== 'function') {
      throw new Error(
        `Lifecycle transition ${transition} is not available on the state machine`,
      );
    }
    transitionFn.call(this.fsm);

    return this.status;
  }
}
