import { createTransport } from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type {
  IMailTransport,
  MailDelivery,
  MailMessage,
} from '../interfaces/mail-transport.interface';

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
}

export type SmtpSender = Pick<
  Transporter<SMTPTransport.SentMessageInfo>,
  'sendMail'
>;

export class NodemailerMailTransport implements IMailTransport {
  constructor(
    private readonly sender: SmtpSender,
    private readonly from: string,
  ) {}

  static fromSmtpConfig(config: SmtpConfig): NodemailerMailTransport {
    const transporter = createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth:
        config.user && config.password
          ? { user: config.user, pass: config.password }
          : undefined,
    });
    return new NodemailerMailTransport(transporter, config.from);
  }

  async send(message: MailMessage): Promise<MailDelivery> {
    const info = await this.sender.sendMail({
      from: this.from,
      to: message.to,
      cc: message.cc,
      bcc: message.bcc,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
    return { messageId: info.messageId };
  }
}
