import sgMail from "@sendgrid/mail";
import { randomUUID } from "node:crypto";
import { Logger } from "../config/logger";
import { escapeHtml } from "../shared/utils/html";

export interface OutboundEmail {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface EmailSendResult {
  provider: string;
  messageId: string | null;
}

export interface EmailSender {
  readonly provider: string;
  send(email: OutboundEmail): Promise<EmailSendResult>;
}

export class SendGridEmailSender implements EmailSender {
  readonly provider = "sendgrid";

  constructor(
    apiKey: string,
    private readonly from: string,
    private readonly logger: Logger,
  ) {
    sgMail.setApiKey(apiKey);
  }

  async send(email: OutboundEmail): Promise<EmailSendResult> {
    const startedAt = Date.now();
    const [response] = await sgMail.send({
      to: email.to,
      from: this.from,
      subject: email.subject,
      text: email.text,
      html: email.html ?? textToHtml(email.text),
    });
    const messageIdHeader: unknown = response.headers?.["x-message-id"];
    const messageId = typeof messageIdHeader === "string" ? messageIdHeader : null;
    this.logger.info("email.sent", {
      provider: this.provider,
      to: email.to,
      statusCode: response.statusCode,
      latencyMs: Date.now() - startedAt,
      messageId,
    });
    return { provider: this.provider, messageId };
  }
}

/** Development sender: the message goes to the log instead of a mailbox. */
export class LogEmailSender implements EmailSender {
  readonly provider = "log";

  constructor(private readonly logger: Logger) {}

  async send(email: OutboundEmail): Promise<EmailSendResult> {
    const messageId = `log-${randomUUID()}`;
    this.logger.info("email.logged", {
      provider: this.provider,
      messageId,
      to: email.to,
      subject: email.subject,
      text: email.text,
    });
    return { provider: this.provider, messageId };
  }
}

export function textToHtml(text: string): string {
  return text
    .split(/\n{2,}/)
    .map((paragraph) => `<p>${escapeHtml(paragraph).replace(/\n/g, "<br>")}</p>`)
    .join("\n");
}
