import { Logger } from '@nestjs/common';
import { NotImplementedActionHandler } from '../../src/actions/not-implemented.action';
import {
  DEFAULT_EMAIL_BODY,
  SendEmailActionHandler,
} from '../../src/actions/send-email.action';
import type { IActionHandler } from '../../src/interfaces/action-handler.interface';
import { ActionDispatcher } from '../../src/services/action-dispatcher.service';
import { createMockRegistry, FakeMailTransport } from '../helpers';

const context = {
  submission_id: 'sub-1',
  template_id: 'form_submitted',
  data: { email: 'a@b.com', name: 'Ada' },
};

describe('ActionDispatcher', () => {
  let mail: FakeMailTransport;
  let dispatcher: ActionDispatcher;
  let registry: ReturnType<typeof createMockRegistry>;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    mail = new FakeMailTransport();
    registry = createMockRegistry();
    registry.register('send_email', new SendEmailActionHandler(mail));
    registry.register('webhook', new NotImplementedActionHandler());
    dispatcher = new ActionDispatcher(registry);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('send_email', () => {
    it('should send to the address at to_path with rendered templates', async () => {
      const result = await dispatcher.execute(
        {
          type: 'send_email',
          config: {
            to_path: 'data.email',
            subject: 'Welcome {data.name}',
            body: 'Submission {submission_id} received',
          },
        },
        context,
      );

      expect(result).toEqual({
        status: 'SUCCEEDED',
        output: { to: 'a@b.com', subject: 'Welcome Ada', messageId: 'msg-1' },
      });
      expect(mail.sent).toEqual([
        {
          to: 'a@b.com',
          subject: 'Welcome Ada',
          text: 'Submission sub-1 received',
          html: undefined,
          cc: undefined,
          bcc: undefined,
        },
      ]);
    });

    it('should prefer an explicit recipient and apply defaults', async () => {
      const result = await dispatcher.execute(
        { type: 'send_email', config: { to: 'ops@example.com', to_path: 'data.email' } },
        context,
      );

      expect(result.output.to).toBe('ops@example.com');
      expect(mail.sent[0].subject).toBe('Notification');
      expect(mail.sent[0].text).toBe(DEFAULT_EMAIL_BODY);
    });

    it('should merge template_data and pass cc, bcc and html', async () => {
      await dispatcher.execute(
        {
          type: 'send_email',
          config: {
            to: 'ops@example.com',
            subject: '{team}: {data.name} {data.missing}',
            html: '<b>{team}</b>',
            cc: 'lead@example.com',
            bcc: ['audit@example.com', 42],
            template_data: { team: 'Support' },
          },
        },
        context,
      );

      expect(mail.sent[0]).toEqual({
        to: 'ops@example.com',
        subject: 'Support: Ada {data.missing}',
        text: DEFAULT_EMAIL_BODY,
        html: '<b>Support</b>',
        cc: ['lead@example.com'],
        bcc: ['audit@example.com'],
      });
    });

    it('should fail without a recipient', async () => {
      const result = await dispatcher.execute(
        { type: 'send_email', config: { to_path: 'data.phone' } },
        context,
      );

      expect(result.status).toBe('FAILED');
      expect(result.output.error).toBe(
        'No recipient: set "to" or a "to_path" that resolves to an address',
      );
      expect(mail.sent).toHaveLength(0);
    });

    it('should fail with the transport error message', async () => {
      mail.failWith = new Error('connection refused');

      const result = await dispatcher.execute(
        { type: 'send_email', config: { to: 'ops@example.com' } },
        context,
      );

      expect(result).toEqual({
        status: 'FAILED',
        output: {
          to: 'ops@example.com',
          subject: 'Notification',
          error: 'connection refused',
        },
      });
    });
  });

  it('should report placeholder actions as not implemented', async () => {
    const result = await dispatcher.execute({ type: 'webhook', config: { url: 'x' } }, context);
    expect(result).toEqual({
      status: 'NOT_IMPLEMENTED',
      output: { note: 'Not implemented yet' },
    });
  });

  it('should turn an unknown action type into a failure', async () => {
    const result = await dispatcher.execute({ type: 'send_sms', config: {} }, context);
    expect(result).toEqual({
      status: 'FAILED',
      output: { error: 'Unknown action type "send_sms"' },
    });
  });

  it('should turn a handler exception into a failure', async () => {
    const exploding: IActionHandler = {
      execute: jest.fn().mockRejectedValue(new Error('boom')),
    };
    registry.register('create_task', exploding);

    const result = await dispatcher.execute({ type: 'create_task', config: {} }, context);

    expect(result).toEqual({ status: 'FAILED', output: { error: 'boom' } });
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Action handler for "create_task" threw: boom',
      expect.any(String),
    );
  });
});
