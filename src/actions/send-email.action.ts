import { Inject, Injectable, Logger } from '@nestjs/common';
import { WorkflowActionHandler } from '../decorators/action-handler.decorator';
import type {
  ActionResult,
  IActionHandler,
} from '../interfaces/action-handler.interface';
import type { IMailTransport } from '../interfaces/mail-transport.interface';
import type { WorkflowActionDefinition } from '../interfaces/workflow-definition.interface';
import { renderTemplate } from '../utils/render-template';
import { isPlainObject, resolvePath } from '../utils/resolve-path';
import { MAIL_TRANSPORT } from '../workflow.constants';

export const DEFAULT_EMAIL_SUBJECT = 'Notification';
export const DEFAULT_EMAIL_BODY = 'You have a new notification.';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function stringList(value: unknown): string[] | undefined {
  if (typeof value === 'string' && value.length > 0) return [value];
  if (!Array.isArray(value)) return undefined;
  const items = value.filter(
    (item): item is string => typeof item === 'string' && item.length > 0,
  );
  return items.length > 0 ? items : undefined;
}

/**
 * `send_email`: renders subject and body against the instance context and
 * hands the message to the mail transport.
 *
 * Config keys: `to` or `to_path` (a context path holding the address),
 * `subject`, `body`, `html`, `cc`, `bcc`, `template_data`.
 */
@Injectable()
@WorkflowActionHandler('send_email')
export class SendEmailActionHandler implements IActionHandler {
  private readonly logger = new Logger(SendEmailActionHandler.name);

  constructor(
    @Inject(MAIL_TRANSPORT) private readonly transport: IMailTransport,
  ) {}

  async execute(
    action: WorkflowActionDefinition,
    context: Record<string, unknown>,
  ): Promise<ActionResult> {
    const { config } = action;

    const to = this.resolveRecipient(config, context);
    if (!to) {
      return {
        status: 'FAILED',
        output: { error: 'No recipient: set "to" or a "to_path" that resolves to an address' },
      };
    }

    const templateContext = isPlainObject(config.template_data)
      ? { ...context, ...config.template_data }
      : context;

    const subject = renderTemplate(
      optionalString(config.subject) ?? DEFAULT_EMAIL_SUBJECT,
      templateContext,
    );
    const text = renderTemplate(
      optionalString(config.body) ?? DEFAULT_EMAIL_BODY,
      templateContext,
    );
    const htmlTemplate = optionalString(config.html);

    try {
      const delivery = await this.transport.send({
        to,
        subject,
        text,
        html: htmlTemplate
          ? renderTemplate(htmlTemplate, templateContext)
          : undefined,
        cc: stringList(config.cc),
        bcc: stringList(config.bcc),
      });
      this.logger.log(`Email sent to ${to}: ${subject}`);
      return {
        status: 'SUCCEEDED',
        output: { to, subject, messageId: delivery.messageId },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Email to ${to} failed: ${message}`);
      return { status: 'FAILED', output: { to, subject, error: message } };
    }
  }

  private resolveRecipient(
    config: Record<string, unknown>,
    context: Record<string, unknown>,
  ): string | undefined {
    const direct = optionalString(config.to);
    if (direct) return direct;

    const path = optionalString(config.to_path);
    return path ? optionalString(resolvePath(context, path)) : undefined;
  }
}
