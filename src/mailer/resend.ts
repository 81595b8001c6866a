//src/mailer/resend.ts
import { Resend } from "resend";
import type { Logger } from "pino";

export interface CodeEmailPayload {
  to: string;
  name: string;
  code: string;
  expiresAt: Date;
}

export type MailResult = { success: true } | { success: false; error: string };

export interface Mailer {
  sendVerificationCode(payload: CodeEmailPayload): Promise<MailResult>;
  sendPasswordResetCode(payload: CodeEmailPayload): Promise<MailResult>;
}

type RenderedEmail = { subject: string; html: string; text: string };

const HTML_ESCAPES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;", "'": "&#39;" };

function escapeHtml(value: string) {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function minutesLeft(expiresAt: Date) {
  const minutes = Math.max(1, Math.round((expiresAt.getTime() - Date.now()) / 60000));
  return minutes === 1 ? "1 minute" : `${minutes} minutes`;
}

export function renderVerificationEmail(appName: string, { name, code, expiresAt }: CodeEmailPayload): RenderedEmail {
  const minutes = minutesLeft(expiresAt);
  return {
    subject: `${appName} - Verify your email`,
    html: `
    <div style="font-family: Arial, sans-serif; line-height:1.6;">
      <h2>Welcome to ${escapeHtml(appName)}, ${escapeHtml(name)}!</h2>
      <p>Use this code to finish creating your account:</p>
      <p style="text-align:center;margin:32px 0;font-size:28px;letter-spacing:6px;"><b>${code}</b></p>
      <p>The code expires in ${minutes}. If you didn't request it, you can ignore this email.</p>
    </div>
  `,
    text: `
Hi ${name},
Your ${appName} verification code is ${code}. It expires in ${minutes}.
`,
  };
}

export function renderPasswordResetEmail(appName: string, { name, code, expiresAt }: CodeEmailPayload): RenderedEmail {
  const minutes = minutesLeft(expiresAt);
  return {
    subject: `${appName} - Password reset code`,
    html: `
    <div style="font-family: Arial, sans-serif; line-height:1.6;">
      <h2>Reset your password</h2>
      <p>Hi ${escapeHtml(name)}, we received a request to reset your ${escapeHtml(appName)} password.</p>
      <p style="text-align:center;margin:32px 0;font-size:28px;letter-spacing:6px;"><b>${code}</b></p>
      <p>The code expires in ${minutes}. If you didn't ask for a reset, your password is unchanged.</p>
    </div>
  `,
    text: `
Hi ${name},
Your ${appName} password reset code is ${code}. It expires in ${minutes}.
`,
  };
}

export class ResendMailer implements Mailer {
  private readonly resend: Resend;

  constructor(
    apiKey: string,
    private readonly from: string,
    private readonly appName: string,
    private readonly logger: Logger
  ) {
    this.resend = new Resend(apiKey);
  }

  sendVerificationCode(payload: CodeEmailPayload) {
    return this.deliver(payload.to, renderVerificationEmail(this.appName, payload));
  }

  sendPasswordResetCode(payload: CodeEmailPayload) {
    return this.deliver(payload.to, renderPasswordResetEmail(this.appName, payload));
  }

  private async deliver(to: string, email: RenderedEmail): Promise<MailResult> {
    try {
      const { error } = await this.resend.emails.send({ from: this.from, to, ...email });
      if (error) {
        this.logger.error({ to, error: error.message }, "Failed to send email");
        return { success: false, error: error.message };
      }
      return { success: true };
    } catch (err) {
      this.logger.error({ err, to }, "Failed to send email");
      return { success: false, error: err instanceof Error ? err.message : "Unknown error" };
    }
  }
}

/** Used when no Resend key is configured: the code goes to the log for local testing. */
export class LogMailer implements Mailer {
  constructor(private readonly logger: Logger) {}

  async sendVerificationCode({ to, code, expiresAt }: CodeEmailPayload): Promise<MailResult> {
    this.logger.warn({ to, code, expiresAt }, "Email not sent - mailer not configured (verification code)");
    return { success: true };
  }

  async sendPasswordResetCode({ to, code, expiresAt }: CodeEmailPayload): Promise<MailResult> {
    this.logger.warn({ to, code, expiresAt }, "Email not sent - mailer not configured (password reset code)");
    return { success: true };
  }
}
