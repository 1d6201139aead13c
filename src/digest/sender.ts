// pattern: Imperative Shell
import nodemailer from "nodemailer";
import type { Logger } from "pino";
import type { Recipient, SmtpConfig } from "../config";

/**
 * Discriminated union result type for digest email send operations.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

/**
 * Function signature for delivering one rendered digest.
 * Never throws; errors are returned in the result.
 */
export type SendDigestFn = (
  recipient: Recipient,
  subject: string,
  html: string,
  logger: Logger,
) => Promise<SendResult>;

export type SmtpSender = {
  readonly send: SendDigestFn;
  readonly close: () => void;
};

/**
 * Creates an SMTP sender bound to the configured account. Port 465 uses
 * implicit TLS; any other port must upgrade with STARTTLS before
 * authenticating.
 */
export function createSmtpSender(smtp: SmtpConfig): SmtpSender {
  const secure = smtp.port === 465;
  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure,
    requireTLS: !secure,
    auth: {
      user: smtp.user,
      pass: smtp.password,
    },
  });

  const fromAddress = smtp.fromAddress ?? smtp.user;

  async function send(
    recipient: Recipient,
    subject: string,
    html: string,
    logger: Logger,
  ): Promise<SendResult> {
    try {
      const info = await transporter.sendMail({
        from: { name: smtp.fromName, address: fromAddress },
        to: { name: recipient.name, address: recipient.email },
        subject,
        html,
      });

      const messageId = info.messageId || "unknown";
      logger.info(
        { messageId, recipient: recipient.email },
        "digest email sent",
      );
      return { success: true, messageId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { recipient: recipient.email, error: message },
        "digest email send failed",
      );
      return { success: false, error: message };
    }
  }

  return {
    send,
    close: () => {
      transporter.close();
    },
  };
}
