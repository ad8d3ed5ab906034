import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { NotImplementedActionHandler } from './actions/not-implemented.action';
import { SendEmailActionHandler } from './actions/send-email.action';
import { ActionDispatcher } from './services/action-dispatcher.service';
import { ActionRegistry } from './services/action-registry.service';
import { ConsumerGroup } from './services/consumer-group.service';
import { StepEngine } from './services/step-engine.service';
import { WorkflowDefinitionService } from './services/workflow-definition.service';
import { WorkflowMatcher } from './services/workflow-matcher.service';
import type {
  EventWorkflowModuleAsyncOptions,
  EventWorkflowModuleOptions,
} from './interfaces/workflow-module-options.interface';
import {
  CONSUMER_GROUP_OPTIONS,
  EVENT_LOG_ADAPTER,
  INSTANCE_STORE_ADAPTER,
  MAIL_TRANSPORT,
  WORKFLOW_DEFINITION_SOURCE,
  WORKFLOW_MODULE_OPTIONS,
} from './workflow.constants';

/** Providers derived from the resolved module options. */
const optionProviders: Provider[] = [
  {
    provide: INSTANCE_STORE_ADAPTER,
    useFactory: (options: EventWorkflowModuleOptions) => options.instanceStore,
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: EVENT_LOG_ADAPTER,
    useFactory: (options: EventWorkflowModuleOptions) => options.eventLog,
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: WORKFLOW_DEFINITION_SOURCE,
    useFactory: (options: EventWorkflowModuleOptions) =>
      options.definitionSource,
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: MAIL_TRANSPORT,
    useFactory: (options: EventWorkflowModuleOptions) => options.mailTransport,
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
  {
    provide: CONSUMER_GROUP_OPTIONS,
    useFactory: (options: EventWorkflowModuleOptions) => options.consumer ?? {},
    inject: [WORKFLOW_MODULE_OPTIONS],
  },
];

const serviceProviders: Provider[] = [
  ActionRegistry,
  ActionDispatcher,
  WorkflowMatcher,
  StepEngine,
  ConsumerGroup,
  WorkflowDefinitionService,
  SendEmailActionHandler,
  NotImplementedActionHandler,
];

const exportedProviders = [
  ActionRegistry,
  ActionDispatcher,
  WorkflowMatcher,
  StepEngine,
  ConsumerGroup,
  WorkflowDefinitionService,
  INSTANCE_STORE_ADAPTER,
  EVENT_LOG_ADAPTER,
  WORKFLOW_DEFINITION_SOURCE,
];

@Module({})
export class EventWorkflowModule {
  static forRoot(options: EventWorkflowModuleOptions): DynamicModule {
    return {
      module: EventWorkflowModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: [
        { provide: WORKFLOW_MODULE_OPTIONS, useValue: options },
        ...optionProviders,
        ...serviceProviders,
      ],
      exports: exportedProviders,
      global: true,
    };
  }

  static forRootAsync(options: EventWorkflowModuleAsyncOptions): DynamicModule {
    return {
      module: EventWorkflowModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: WORKFLOW_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        ...optionProviders,
        ...serviceProviders,
      ],
      exports: exportedProviders,
      global: true,
    };
  }
}
