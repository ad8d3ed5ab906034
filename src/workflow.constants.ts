export const WORKFLOW_MODULE_OPTIONS = Symbol('WORKFLOW_MODULE_OPTIONS');
export const CONSUMER_GROUP_OPTIONS = Symbol('CONSUMER_GROUP_OPTIONS');
export const INSTANCE_STORE_ADAPTER = Symbol('INSTANCE_STORE_ADAPTER');
export const EVENT_LOG_ADAPTER = Symbol('EVENT_LOG_ADAPTER');
export const WORKFLOW_DEFINITION_SOURCE = Symbol('WORKFLOW_DEFINITION_SOURCE');
export const MAIL_TRANSPORT = Symbol('MAIL_TRANSPORT');

export const ACTION_HANDLER_METADATA = 'event-workflows:action-handler';

/** Reserved transition target that ends an instance. */
export const TERMINAL_STEP_ID = '__end__';

export const DEFAULT_GROUP_NAME = 'workflow_workers';
export const DEFAULT_CONSUMER_NAME = 'worker_1';
export const DEFAULT_LEASE_MS = 60_000;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_BLOCK_MS = 1_000;
export const DEFAULT_INITIAL_BACKOFF_MS = 1_000;
export const DEFAULT_MAX_BACKOFF_MS = 30_000;
export const DEFAULT_MAX_STEPS_PER_PASS = 100;

export const DEFAULT_STREAM_NAME = 'workflow_events';
export const DEFAULT_STREAM_MAX_LEN = 10_000;
export const DEFAULT_INSTANCE_TABLE = 'workflow_instances';
export const DEFAULT_DEFINITION_TABLE = 'workflow_definitions';

export const BUILTIN_ACTION_TYPES = [
  'send_email',
  'create_ticket',
  'update_ticket',
  'create_task',
  'update_task',
  'webhook',
] as const;
