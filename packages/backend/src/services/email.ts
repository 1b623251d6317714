/**
 * Email transport
 *
 * Delivery is best-effort and at-most-once: `send` reports failure as a value,
 * and `deliverBestEffort` is the single place a failed send is logged and
 * dropped. Nothing here throws to the caller.
 */

import nodemailer from 'nodemailer';
import type { EmailConfig } from '../config';

export type EmailResult = { ok: true } | { ok: false; error: string };

export type EmailDelivery = 'sent' | 'skipped' | 'failed';

export interface EmailTransport {
  readonly enabled: boolean;
  send(to: string, subject: string, body: string): Promise<EmailResult>;
}

export interface EmailMessage {
  to: string;
  subject: string;
  body: string;
  /** For log lines only */
  context: { userId: string; submissionId: string | null };
}

const SUBJECT_PREFIX = '[Pressdesk]';

/** Used when SMTP is not configured. */
export const disabledEmailTransport: EmailTransport = {
  enabled: false,
  async send() {
    return { ok: false, error: 'SMTP not configured' };
  },
};

export function createEmailTransport(config: EmailConfig | null): EmailTransport {
  if (!config) return disabledEmailTransport;

  const transport = nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: { user: config.user, pass: config.pass },
  });

  return {
    enabled: true,
    async send(to, subject, body) {
      try {
        await transport.sendMail({ from: config.from, to, subject, text: body });
        return { ok: true };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    },
  };
}

export async function deliverBestEffort(
  transport: EmailTransport,
  message: EmailMessage
): Promise<EmailDelivery> {
  const { userId, submissionId } = message.context;
  if (!transport.enabled) {
    console.log(`[email] Skipping email to user ${userId}: SMTP not configured`);
    return 'skipped';
  }

  let result: EmailResult;
  try {
    result = await transport.send(message.to, `${SUBJECT_PREFIX} ${message.subject}`, message.body);
  } catch (err) {
    result = { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  if (!result.ok) {
    console.error(
      `[email] Failed to send to user ${userId} (submission ${submissionId ?? 'n/a'}): ${result.error}`
    );
    return 'failed';
  }
  console.log(`[email] Sent "${message.subject}" to user ${userId}`);
  return 'sent';
}
