// Transactional email via nodemailer. In console mode messages are serialized
// in-process and logged instead of sent.

import nodemailer, { Transporter } from "nodemailer";
import { MailConfig } from "../config";
import { errorFields, log } from "../logger";

export interface OutgoingEmail {
  to: string[];
  subject: string;
  text: string;
  html: string;
  replyTo?: string[];
}

export interface Mailer {
  send(email: OutgoingEmail): Promise<void>;
}

export class MailDeliveryError extends Error {
  constructor(
    message: string,
    public readonly subject: string
  ) {
    super(message);
    this.name = "MailDeliveryError";
  }
}

export class NodemailerMailer implements Mailer {
  constructor(
    private readonly transporter: Transporter,
    private readonly from: string,
    private readonly logBodies: boolean
  ) {}

  static fromConfig(config: MailConfig): NodemailerMailer {
    if (config.transport === "console") {
      return new NodemailerMailer(
        nodemailer.createTransport({ jsonTransport: true }),
        config.from,
        true
      );
    }

    const transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.port === 465,
      requireTLS: config.useTls,
      auth: config.user
        ? { user: config.user, pass: config.password }
        : undefined,
    });
    return new NodemailerMailer(transporter, config.from, false);
  }

  async send(email: OutgoingEmail): Promise<void> {
    let info: { messageId?: string; message?: unknown };
    try {
      info = await this.transporter.sendMail({
        from: this.from,
        to: email.to,
        replyTo: email.replyTo,
        subject: email.subject,
        text: email.text,
        html: email.html,
      });
    } catch (err) {
      log("error", "Email delivery failed", {
        subject: email.subject,
        recipients: email.to.length,
        ...errorFields(err),
      });
      const reason = err instanceof Error ? err.message : String(err);
      throw new MailDeliveryError(`Email delivery failed: ${reason}`, email.subject);
    }

    log("info", "Email sent", {
      subject: email.subject,
      recipients: email.to.length,
      message_id: info.messageId,
      ...(this.logBodies ? { message: info.message } : {}),
    });
  }
}
