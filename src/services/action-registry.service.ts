import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { ACTION_HANDLER_METADATA } from '../workflow.constants';
import type { ActionHandlerMetadata } from '../decorators/action-handler.decorator';
import type { IActionHandler } from '../interfaces/action-handler.interface';

function isActionHandler(value: unknown): value is IActionHandler {
  return (
    typeof value === 'object' &&
    value !== null &&
    'execute' in value &&
    typeof value.execute === 'function'
  );
}

@Injectable()
export class ActionRegistry implements OnModuleInit {
  private readonly logger = new Logger(ActionRegistry.name);
  private readonly handlers = new Map<string, IActionHandler>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  onModuleInit(): void {
    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype || !wrapper.instance) continue;

      const metadata = this.reflector.get<ActionHandlerMetadata | undefined>(
        ACTION_HANDLER_METADATA,
        wrapper.metatype,
      );
      if (!metadata) continue;

      if (!isActionHandler(wrapper.instance)) {
        this.logger.warn(
          `${wrapper.metatype.name} is marked as an action handler but has no execute() method`,
        );
        continue;
      }

      for (const type of metadata.types) {
        this.register(type, wrapper.instance);
        this.logger.log(
          `Registered action handler: ${type} -> ${wrapper.metatype.name}`,
        );
      }
    }
  }

  register(type: string, handler: IActionHandler): void {
    const existing = this.handlers.get(type);
    if (existing) {
      throw new DuplicateRegistrationError(
        type,
        existing.constructor.name,
        handler.constructor.name,
      );
    }
    this.handlers.set(type, handler);
  }

  get(type: string): IActionHandler | undefined {
    return this.handlers.get(type);
  }

  /** Registered action types, in registration order. */
  getTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}
