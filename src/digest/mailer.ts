import nodemailer from "nodemailer";
import type { SmtpConfig } from "../config.js";
import type { Logger } from "../util/logger.js";
import { withRetry } from "../util/retry.js";

export interface DigestMessage {
  from: string;
  to: string[];
  subject: string;
  html: string;
}

/**
 * The part of a nodemailer transporter the digest needs.
 */
export interface MailTransport {
  sendMail(mail: { from: string; to: string; subject: string; html: string }): Promise<{ messageId: string }>;
}

export function createSmtpTransport(smtp: SmtpConfig): MailTransport {
  if (!smtp.host) {
    throw new Error("SMTP_HOST is required to send the digest. Set it in .env file or environment.");
  }
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass ?? "" } : undefined,
  });
}

// 5xx SMTP replies are permanent; anything else (4xx, connection errors) is retried.
function isTransient(error: Error): boolean {
  const responseCode = "responseCode" in error ? error.responseCode : undefined;
  return typeof responseCode !== "number" || responseCode < 500;
}

/**
 * Send the digest, retrying transient SMTP failures. Resolves to the message id.
 */
export async function sendDigest(
  message: DigestMessage,
  transporter: MailTransport,
  logger: Logger
): Promise<string> {
  if (message.to.length === 0) {
    throw new Error("DIGEST_TO is required to send the digest.");
  }

  const info = await withRetry(
    () =>
      transporter.sendMail({
        from: message.from,
        to: message.to.join(", "),
        subject: message.subject,
        html: message.html,
      }),
    { tries: 3, baseMs: 1000, logger, shouldRetry: isTransient }
  );

  logger.info({ messageId: info.messageId, recipients: message.to.length }, "Sent digest");
  return info.messageId;
}
