import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryEventLogAdapter } from '../src/adapters/in-memory-event-log.adapter';
import { InMemoryInstanceStoreAdapter } from '../src/adapters/in-memory-instance-store.adapter';
import { InMemoryWorkflowDefinitionSource } from '../src/adapters/in-memory-workflow-definition.source';
import { NotImplementedActionHandler } from '../src/actions/not-implemented.action';
import { SendEmailActionHandler } from '../src/actions/send-email.action';
import type {
  IMailTransport,
  MailDelivery,
  MailMessage,
} from '../src/interfaces/mail-transport.interface';
import type { WorkflowDefinition } from '../src/interfaces/workflow-definition.interface';
import type { WorkflowEvent } from '../src/interfaces/workflow-event.interface';
import type { ConsumerGroupOptions } from '../src/interfaces/workflow-module-options.interface';
import { ActionDispatcher } from '../src/services/action-dispatcher.service';
import { ActionRegistry } from '../src/services/action-registry.service';
import { ConsumerGroup } from '../src/services/consumer-group.service';
import { StepEngine } from '../src/services/step-engine.service';
import { WorkflowMatcher } from '../src/services/workflow-matcher.service';

export function createMockRegistry(): ActionRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new ActionRegistry(mockDiscovery, mockReflector);
}

/** Records sent messages; set `failWith` to make the next sends reject. */
export class FakeMailTransport implements IMailTransport {
  readonly sent: MailMessage[] = [];
  failWith: Error | null = null;

  async send(message: MailMessage): Promise<MailDelivery> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(message);
    return { messageId: `msg-${this.sent.length}` };
  }
}

/** A manually advanced clock for lease bookkeeping. */
export class FakeClock {
  constructor(public current = 1_700_000_000_000) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface Harness {
  store: InMemoryInstanceStoreAdapter;
  eventLog: InMemoryEventLogAdapter;
  definitions: InMemoryWorkflowDefinitionSource;
  mail: FakeMailTransport;
  registry: ActionRegistry;
  dispatcher: ActionDispatcher;
  matcher: WorkflowMatcher;
  engine: StepEngine;
  eventEmitter: EventEmitter2;
  consumerGroup: ConsumerGroup;
  clock: FakeClock;
}

export interface HarnessOptions {
  definitions?: WorkflowDefinition[];
  consumer?: ConsumerGroupOptions;
  maxStepsPerPass?: number;
}

/** Wires the services by hand against in-memory adapters. */
export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = new FakeClock();
  const store = new InMemoryInstanceStoreAdapter();
  const eventLog = new InMemoryEventLogAdapter({ now: clock.now });
  const definitions = new InMemoryWorkflowDefinitionSource(
    options.definitions ?? [],
  );
  const mail = new FakeMailTransport();

  const registry = createMockRegistry();
  registry.register('send_email', new SendEmailActionHandler(mail));
  const notImplemented = new NotImplementedActionHandler();
  for (const type of [
    'create_ticket',
    'update_ticket',
    'create_task',
    'update_task',
    'webhook',
  ]) {
    registry.register(type, notImplemented);
  }

  const dispatcher = new ActionDispatcher(registry);
  const matcher = new WorkflowMatcher();
  const eventEmitter = new EventEmitter2();
  const engine = new StepEngine(store, definitions, dispatcher, eventEmitter, {
    maxStepsPerPass: options.maxStepsPerPass,
  });
  const consumerGroup = new ConsumerGroup(
    eventLog,
    definitions,
    matcher,
    engine,
    eventEmitter,
    { blockMs: 0, autoStart: false, ...options.consumer },
  );

  return {
    store,
    eventLog,
    definitions,
    mail,
    registry,
    dispatcher,
    matcher,
    engine,
    eventEmitter,
    consumerGroup,
    clock,
  };
}

export function makeEvent(overrides: Partial<WorkflowEvent> = {}): WorkflowEvent {
  return {
    id: 'sub-1',
    templateId: 'form_submitted',
    orgId: '7',
    data: { email: 'a@b.com', name: 'Ada' },
    submittedAt: new Date('2025-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

/** One AUTO_ACTION step that emails the submitter. */
export function emailWorkflow(
  overrides: Partial<WorkflowDefinition> = {},
): WorkflowDefinition {
  return {
    id: 'wf-email',
    name: 'Email on submit',
    active: true,
    trigger: {
      type: 'form_submitted',
      condition: { path: 'template_id', op: '==', value: 'form_submitted' },
    },
    initialStepId: 'notify',
    steps: {
      notify: {
        id: 'notify',
        name: 'Notify',
        kind: 'AUTO_ACTION',
        actions: [
          {
            type: 'send_email',
            config: { to_path: 'data.email', subject: 'Thanks {data.name}' },
          },
        ],
        transitions: [],
      },
    },
    ...overrides,
  };
}

/** review (AUTO_ACTION) -> approval (HUMAN_TASK) -> step2 when approved. */
export function approvalWorkflow(
  overrides: Partial<WorkflowDefinition> = {},
): WorkflowDefinition {
  return {
    id: 'wf-approval',
    name: 'Approval',
    active: true,
    trigger: { type: 'form_submitted' },
    initialStepId: 'review',
    steps: {
      review: {
        id: 'review',
        name: 'Review',
        kind: 'AUTO_ACTION',
        actions: [{ type: 'create_ticket', config: {} }],
        transitions: [{ targetStepId: 'approval' }],
      },
      approval: {
        id: 'approval',
        name: 'Approval',
        kind: 'HUMAN_TASK',
        actions: [],
        transitions: [
          {
            condition: { path: 'approved', op: '==', value: true },
            targetStepId: 'step2',
          },
        ],
      },
      step2: {
        id: 'step2',
        name: 'Confirm',
        kind: 'AUTO_ACTION',
        actions: [{ type: 'send_email', config: { to: 'ops@example.com' } }],
        transitions: [],
      },
    },
    ...overrides,
  };
}
