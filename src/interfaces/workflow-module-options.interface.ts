import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { IInstanceStoreAdapter } from './instance-store-adapter.interface';
import type { IEventLogAdapter } from './event-log-adapter.interface';
import type { IMailTransport } from './mail-transport.interface';
import type { IWorkflowDefinitionSource } from './workflow-definition-source.interface';

export interface ConsumerGroupOptions {
  /** Consumer group name. Default: 'workflow_workers' */
  groupName?: string;

  /** One claim loop runs per name. Default: ['worker_1'] */
  consumerNames?: string[];

  /** Pending-entry lease before another consumer may reclaim it. Default: 60000 */
  leaseMs?: number;

  /** Entries claimed per poll. Default: 10 */
  batchSize?: number;

  /** How long a claim waits for new entries. Default: 1000 */
  blockMs?: number;

  /** First back-off after a log transport failure. Default: 1000 */
  initialBackoffMs?: number;

  /** Back-off ceiling. Default: 30000 */
  maxBackoffMs?: number;

  /**
   * Acknowledge and dead-letter an entry once it has been delivered more
   * than this many times. Default: unbounded
   */
  maxDeliveries?: number;

  /** Start the claim loops on application bootstrap. Default: true */
  autoStart?: boolean;
}

export interface EventWorkflowModuleOptions {
  /** Instance store adapter implementing IInstanceStoreAdapter */
  instanceStore: IInstanceStoreAdapter;

  /** Event log adapter implementing IEventLogAdapter */
  eventLog: IEventLogAdapter;

  /** Read API over stored workflow definitions */
  definitionSource: IWorkflowDefinitionSource;

  /** Delivery collaborator for the send_email action */
  mailTransport: IMailTransport;

  /**
   * Steps one start/advance/resume pass may visit before the instance is
   * failed as looping. Default: 100
   */
  maxStepsPerPass?: number;

  consumer?: ConsumerGroupOptions;
}

export interface EventWorkflowModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<FactoryProvider<EventWorkflowModuleOptions>, 'useFactory' | 'inject'> {}
