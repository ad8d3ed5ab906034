import { Logger } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { WorkflowActionHandler } from '../../src/decorators/action-handler.decorator';
import { DuplicateRegistrationError } from '../../src/errors/duplicate-registration.error';
import type {
  ActionResult,
  IActionHandler,
} from '../../src/interfaces/action-handler.interface';
import { ActionRegistry } from '../../src/services/action-registry.service';
import { ACTION_HANDLER_METADATA } from '../../src/workflow.constants';
import { createMockRegistry } from '../helpers';

@WorkflowActionHandler('create_ticket', 'update_ticket')
class TicketHandler implements IActionHandler {
  async execute(): Promise<ActionResult> {
    return { status: 'SUCCEEDED', output: { ticketId: 'T-1' } };
  }
}

class OtherTicketHandler implements IActionHandler {
  async execute(): Promise<ActionResult> {
    return { status: 'SUCCEEDED', output: {} };
  }
}

@WorkflowActionHandler('webhook')
class NotAHandler {}

describe('@WorkflowActionHandler', () => {
  it('should store the handled types as metadata', () => {
    expect(Reflect.getMetadata(ACTION_HANDLER_METADATA, TicketHandler)).toEqual({
      types: ['create_ticket', 'update_ticket'],
    });
  });
});

describe('ActionRegistry', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should register and look up handlers by type', () => {
    const registry = createMockRegistry();
    const handler = new TicketHandler();

    registry.register('create_ticket', handler);

    expect(registry.get('create_ticket')).toBe(handler);
    expect(registry.get('update_ticket')).toBeUndefined();
    expect(registry.getTypes()).toEqual(['create_ticket']);
  });

  it('should reject a second handler for the same type', () => {
    const registry = createMockRegistry();
    registry.register('create_ticket', new TicketHandler());

    expect(() => registry.register('create_ticket', new OtherTicketHandler())).toThrow(
      DuplicateRegistrationError,
    );
    expect(() => registry.register('create_ticket', new OtherTicketHandler())).toThrow(
      'Duplicate action type "create_ticket". Both TicketHandler and OtherTicketHandler are registered for the same type.',
    );
  });

  it('should discover decorated providers on module init', () => {
    const ticketHandler = new TicketHandler();
    const discovery = {
      getProviders: () => [
        { metatype: TicketHandler, instance: ticketHandler },
        { metatype: OtherTicketHandler, instance: new OtherTicketHandler() },
        { metatype: NotAHandler, instance: new NotAHandler() },
        { metatype: null, instance: {} },
      ],
    } as unknown as DiscoveryService;

    const registry = new ActionRegistry(discovery, new Reflector());
    registry.onModuleInit();

    expect(registry.getTypes()).toEqual(['create_ticket', 'update_ticket']);
    expect(registry.get('update_ticket')).toBe(ticketHandler);
    expect(registry.get('webhook')).toBeUndefined();
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'NotAHandler is marked as an action handler but has no execute() method',
    );
  });
});
