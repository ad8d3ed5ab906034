// Module
export { EventWorkflowModule } from './workflow.module';

// Services
export { ActionDispatcher } from './services/action-dispatcher.service';
export { ActionRegistry } from './services/action-registry.service';
export {
  ConsumerGroup,
  resolveConsumerGroupOptions,
} from './services/consumer-group.service';
export type {
  EntryDisposition,
  EntryOutcome,
  PollSummary,
  ResolvedConsumerGroupOptions,
} from './services/consumer-group.service';
export { StepEngine } from './services/step-engine.service';
export type { StartResult, StepEngineOptions } from './services/step-engine.service';
export { WorkflowDefinitionService } from './services/workflow-definition.service';
export { WorkflowMatcher } from './services/workflow-matcher.service';

// Actions
export {
  SendEmailActionHandler,
  DEFAULT_EMAIL_BODY,
  DEFAULT_EMAIL_SUBJECT,
} from './actions/send-email.action';
export { NotImplementedActionHandler } from './actions/not-implemented.action';

// Decorators
export { WorkflowActionHandler } from './decorators/action-handler.decorator';
export type { ActionHandlerMetadata } from './decorators/action-handler.decorator';
export { InstanceLifecycle } from './engines/instance-lifecycle';
export type { LifecycleTransition } from './engines/instance-lifecycle';

// Interfaces
export type {
  ActionResult,
  ActionResultStatus,
  IActionHandler,
} from './interfaces/action-handler.interface';
export type {
  ClaimOptions,
  IEventLogAdapter,
  PendingSummary,
} from './interfaces/event-log-adapter.interface';
export type { IInstanceStoreAdapter } from './interfaces/instance-store-adapter.interface';
export type {
  IMailTransport,
  MailDelivery,
  MailMessage,
} from './interfaces/mail-transport.interface';
export type { IWorkflowDefinitionSource } from './interfaces/workflow-definition-source.interface';
export type {
  AllCondition,
  AnyCondition,
  ComparisonCondition,
  ComparisonOperator,
  Condition,
  StepKind,
  WorkflowActionDefinition,
  WorkflowDefinition,
  WorkflowStep,
  WorkflowTransition,
  WorkflowTrigger,
} from './interfaces/workflow-definition.interface';
export type { StreamEntry, WorkflowEvent } from './interfaces/workflow-event.interface';
export { isTerminalStatus } from './interfaces/workflow-instance.interface';
export type {
  InstanceFailure,
  InstanceHistoryRecord,
  InstanceStatus,
  NewWorkflowInstance,
  WorkflowInstance,
  WorkflowInstanceUpdate,
} from './interfaces/workflow-instance.interface';
export type {
  ConsumerGroupOptions,
  EventWorkflowModuleAsyncOptions,
  EventWorkflowModuleOptions,
} from './interfaces/workflow-module-options.interface';

// Adapters
export {
  DrizzleInstanceStoreAdapter,
} from './adapters/drizzle-instance-store.adapter';
export type { DrizzleSqlExecutor } from './adapters/drizzle-instance-store.adapter';
export { InMemoryEventLogAdapter } from './adapters/in-memory-event-log.adapter';
export type { InMemoryEventLogOptions } from './adapters/in-memory-event-log.adapter';
export { InMemoryInstanceStoreAdapter } from './adapters/in-memory-instance-store.adapter';
export { InMemoryWorkflowDefinitionSource } from './adapters/in-memory-workflow-definition.source';
export { NodemailerMailTransport } from './adapters/nodemailer-mail-transport';
export type { SmtpConfig, SmtpSender } from './adapters/nodemailer-mail-transport';
export { PgInstanceStoreAdapter } from './adapters/pg-instance-store.adapter';
export { PgWorkflowDefinitionSource } from './adapters/pg-workflow-definition.source';
export { RedisStreamEventLogAdapter } from './adapters/redis-stream-event-log.adapter';
export type {
  RedisCommandClient,
  RedisStreamOptions,
} from './adapters/redis-stream-event-log.adapter';

// Utils
export { evaluateCondition, COMPARISON_OPERATORS } from './utils/evaluate-condition';
export { resolvePath } from './utils/resolve-path';
export { renderTemplate } from './utils/render-template';
export { buildEventContext } from './utils/build-event-context';
export { decodeStreamEntry, encodeStreamEntry } from './utils/stream-entry-codec';
export { validateWorkflowDefinition } from './utils/validate-workflow-definition';

// Errors
export { ActionExecutionError } from './errors/action-execution.error';
export { ConsumerTransportError } from './errors/consumer-transport.error';
export { DefinitionValidationError } from './errors/definition-validation.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { InstanceNotFoundError } from './errors/instance-not-found.error';
export { InvalidStateError } from './errors/invalid-state.error';
export { InvalidStreamEntryError } from './errors/invalid-stream-entry.error';
export { MatchEvaluationError } from './errors/match-evaluation.error';
export { RecursiveTransitionError } from './errors/recursive-transition.error';
export { WorkflowNotFoundError } from './errors/workflow-not-found.error';

// Events
export { WorkflowEventType } from './events/workflow-event-type.enum';
export type {
  EntryDeadLetteredEvent,
  EntryRejectedEvent,
  InstanceCreatedEvent,
  InstanceStatusChangedEvent,
  StepTransitionEvent,
} from './events/workflow-events';

// Config & CLI
export { loadConfigFromEnv } from './config/load-config-from-env';
export type { RedisConfig, WorkerConfig } from './config/load-config-from-env';
export {
  generateDefinitionsMigration,
  generateMigration,
  writeMigration,
} from './cli/generate-migration';
export { runWorker } from './cli/worker';

// Constants
export {
  ACTION_HANDLER_METADATA,
  BUILTIN_ACTION_TYPES,
  CONSUMER_GROUP_OPTIONS,
  EVENT_LOG_ADAPTER,
  INSTANCE_STORE_ADAPTER,
  MAIL_TRANSPORT,
  TERMINAL_STEP_ID,
  WORKFLOW_DEFINITION_SOURCE,
  WORKFLOW_MODULE_OPTIONS,
} from './workflow.constants';
