import { setTimeout as delay } from 'timers/promises';
import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { StepEngine } from './step-engine.service';
import type { StartResult } from './step-engine.service';
import { WorkflowMatcher } from './workflow-matcher.service';
import { ConsumerTransportError } from '../errors/consumer-transport.error';
import { InvalidStreamEntryError } from '../errors/invalid-stream-entry.error';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type {
  EntryDeadLetteredEvent,
  EntryRejectedEvent,
} from '../events/workflow-events';
import type {
  IEventLogAdapter,
  PendingSummary,
} from '../interfaces/event-log-adapter.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import type { IWorkflowDefinitionSource } from '../interfaces/workflow-definition-source.interface';
import type {
  StreamEntry,
  WorkflowEvent,
} from '../interfaces/workflow-event.interface';
import type { ConsumerGroupOptions } from '../interfaces/workflow-module-options.interface';
import { decodeStreamEntry } from '../utils/stream-entry-codec';
import {
  CONSUMER_GROUP_OPTIONS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_BLOCK_MS,
  DEFAULT_CONSUMER_NAME,
  DEFAULT_GROUP_NAME,
  DEFAULT_INITIAL_BACKOFF_MS,
  DEFAULT_LEASE_MS,
  DEFAULT_MAX_BACKOFF_MS,
  EVENT_LOG_ADAPTER,
  WORKFLOW_DEFINITION_SOURCE,
} from '../workflow.constants';

export type ResolvedConsumerGroupOptions = Required<
  Omit<ConsumerGroupOptions, 'maxDeliveries'>
> &
  Pick<ConsumerGroupOptions, 'maxDeliveries'>;

export function resolveConsumerGroupOptions(
  options: ConsumerGroupOptions = {},
): ResolvedConsumerGroupOptions {
  return {
    groupName: options.groupName ?? DEFAULT_GROUP_NAME,
    consumerNames:
      options.consumerNames && options.consumerNames.length > 0
        ? options.consumerNames
        : [DEFAULT_CONSUMER_NAME],
    leaseMs: options.leaseMs ?? DEFAULT_LEASE_MS,
    batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    blockMs: options.blockMs ?? DEFAULT_BLOCK_MS,
    initialBackoffMs: options.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS,
    maxBackoffMs: options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS,
    maxDeliveries: options.maxDeliveries,
    autoStart: options.autoStart ?? true,
  };
}

/**
 * ACKED: every matched workflow was durably advanced.
 * REJECTED: the entry could not be decoded and was acknowledged.
 * DEAD_LETTERED: delivered more than maxDeliveries times and acknowledged.
 * LEFT_PENDING: a fatal error occurred; the entry waits for reclaim.
 */
export type EntryDisposition =
  | 'ACKED'
  | 'REJECTED'
  | 'DEAD_LETTERED'
  | 'LEFT_PENDING';

export interface EntryOutcome {
  entryId: string;
  disposition: EntryDisposition;
  results: StartResult[];
  errors: Error[];
}

export interface PollSummary {
  consumerName: string;
  claimed: number;
  outcomes: EntryOutcome[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

@Injectable()
export class ConsumerGroup implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(ConsumerGroup.name);
  private readonly settings: ResolvedConsumerGroupOptions;
  private loops: Promise<void>[] = [];
  private abortController = new AbortController();
  private running = false;

  constructor(
    @Inject(EVENT_LOG_ADAPTER) private readonly eventLog: IEventLogAdapter,
    @Inject(WORKFLOW_DEFINITION_SOURCE)
    private readonly definitions: IWorkflowDefinitionSource,
    private readonly matcher: WorkflowMatcher,
    private readonly engine: StepEngine,
    private readonly eventEmitter: EventEmitter2,
    @Inject(CONSUMER_GROUP_OPTIONS) options: ConsumerGroupOptions,
  ) {
    this.settings = resolveConsumerGroupOptions(options);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get options(): ResolvedConsumerGroupOptions {
    return this.settings;
  }

  async onApplicationBootstrap(): Promise<void> {
    if (this.settings.autoStart) {
      await this.start();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  /**
   * Starts one claim loop per consumer name. Each loop creates the group
   * before its first claim and again after a transport error, so an event
   * log that is down at startup or has lost the group is retried with backoff.
   */
  async start(): Promise<void> {
    if (this.running) return;

    this.running = true;
    this.abortController = new AbortController();
    this.loops = this.settings.consumerNames.map((name) => this.runLoop(name));
  }

  /** Ends the claim loops once their current poll finishes. */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.abortController.abort();
    await Promise.all(this.loops);
    this.loops = [];
  }

  /** Claims one batch for a consumer and processes it entry by entry. */
  async poll(consumerName: string): Promise<PollSummary> {
    const entries = await this.withTransport('claim', () =>
      this.eventLog.claim(this.settings.groupName, consumerName, {
        count: this.settings.batchSize,
        blockMs: this.settings.blockMs,
        minIdleMs: this.settings.leaseMs,
      }),
    );

    const outcomes: EntryOutcome[] = [];
    for (const entry of entries) {
      outcomes.push(await this.processEntry(consumerName, entry));
    }
    return { consumerName, claimed: entries.length, outcomes };
  }

  /**
   * Decodes an entry, starts an instance for every matching workflow and
   * acknowledges the entry unless one of them raised.
   */
  async processEntry(
    consumerName: string,
    entry: StreamEntry,
  ): Promise<EntryOutcome> {
    let event: WorkflowEvent;
    try {
      event = decodeStreamEntry(entry);
    } catch (error) {
      if (!(error instanceof InvalidStreamEntryError)) throw error;
      return this.reject(consumerName, entry, error);
    }

    const { maxDeliveries } = this.settings;
    if (maxDeliveries !== undefined && entry.deliveryCount > maxDeliveries) {
      return this.deadLetter(consumerName, entry);
    }

    const results: StartResult[] = [];
    const errors: Error[] = [];

    let matched: WorkflowDefinition[] = [];
    try {
      matched = this.matcher.match(event, await this.definitions.listActive());
    } catch (error) {
      const failure = toError(error);
      errors.push(failure);
      this.logger.error(
        `Log entry ${entry.id}: matching failed: ${failure.message}`,
        failure.stack,
      );
    }

    for (const definition of matched) {
      try {
        results.push(await this.engine.start(definition, event));
      } catch (error) {
        const failure = toError(error);
        errors.push(failure);
        this.logger.error(
          `Log entry ${entry.id}: workflow ${definition.id} failed: ${failure.message}`,
          failure.stack,
        );
      }
    }

    if (errors.length > 0) {
      this.logger.warn(
        `Log entry ${entry.id} left pending after ${errors.length} fatal error(s)`,
      );
      return { entryId: entry.id, disposition: 'LEFT_PENDING', results, errors };
    }

    await this.ack(entry.id);
    const created = results.filter((result) => result.created).length;
    this.logger.log(
      `${consumerName} acknowledged ${entry.id} (event ${event.id}): ${matched.length} workflow(s) matched, ${created} instance(s) created`,
    );
    return { entryId: entry.id, disposition: 'ACKED', results, errors };
  }

  pending(): Promise<PendingSummary> {
    return this.withTransport('pending', () =>
      this.eventLog.pending(this.settings.groupName),
    );
  }

  private async runLoop(consumerName: string): Promise<void> {
    let backoffMs = this.settings.initialBackoffMs;
    this.logger.log(
      `Consumer ${consumerName} joined group ${this.settings.groupName}`,
    );

    let needsGroup = true;
    while (this.running) {
      try {
        if (needsGroup) {
          await this.withTransport('ensureGroup', () =>
            this.eventLog.ensureGroup(this.settings.groupName),
          );
          needsGroup = false;
        }
        await this.poll(consumerName);
        backoffMs = this.settings.initialBackoffMs;
      } catch (error) {
        needsGroup = true;
        const failure = toError(error);
        this.logger.error(
          `Consumer ${consumerName}: ${failure.message}; retrying in ${backoffMs}ms`,
          failure.stack,
        );
        await this.sleep(backoffMs);
        backoffMs = Math.min(backoffMs * 2, this.settings.maxBackoffMs);
      }
    }

    this.logger.log(`Consumer ${consumerName} stopped`);
  }

  private async reject(
    consumerName: string,
    entry: StreamEntry,
    error: InvalidStreamEntryError,
  ): Promise<EntryOutcome> {
    this.logger.warn(`Rejecting log entry ${entry.id}: ${error.message}`);
    await this.ack(entry.id);

    this.eventEmitter.emit(WorkflowEventType.ENTRY_REJECTED, {
      groupName: this.settings.groupName,
      consumerName,
      entryId: entry.id,
      reason: error.message,
      timestamp: new Date(),
    } satisfies EntryRejectedEvent);

    return {
      entryId: entry.id,
      disposition: 'REJECTED',
      results: [],
      errors: [error],
    };
  }

  private async deadLetter(
    consumerName: string,
    entry: StreamEntry,
  ): Promise<EntryOutcome> {
    this.logger.error(
      `Dead-lettering log entry ${entry.id} after ${entry.deliveryCount} deliveries`,
    );
    await this.ack(entry.id);

    this.eventEmitter.emit(WorkflowEventType.ENTRY_DEAD_LETTERED, {
      groupName: this.settings.groupName,
      consumerName,
      entryId: entry.id,
      deliveryCount: entry.deliveryCount,
      fields: { ...entry.fields },
      timestamp: new Date(),
    } satisfies EntryDeadLetteredEvent);

    return {
      entryId: entry.id,
      disposition: 'DEAD_LETTERED',
      results: [],
      errors: [],
    };
  }

  private ack(entryId: string): Promise<void> {
    return this.withTransport('ack', () =>
      this.eventLog.ack(this.settings.groupName, entryId),
    );
  }

  private async withTransport<T>(
    operation: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ConsumerTransportError) throw error;
      throw new ConsumerTransportError(operation, error);
    }
  }

  private async sleep(ms: number): Promise<void> {
    const { signal } = this.abortController;
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }
}
