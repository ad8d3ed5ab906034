export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
  cc?: string[];
  bcc?: string[];
}

export interface MailDelivery {
  messageId: string;
}

export interface IMailTransport {
  send(message: MailMessage): Promise<MailDelivery>;
}
