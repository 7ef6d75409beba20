/**
 * Email Channel
 *
 * Sends the appointment confirmation to the lead over SMTP (nodemailer).
 *
 * @module lead-intake/channels/email
 */

import type { SendMailOptions } from 'nodemailer';
import type { LeadNotification, NotificationChannelSender } from './types';

// ===========================================
// Constants
// ===========================================

export const DEFAULT_SMTP_HOST = 'smtp.gmail.com';
export const DEFAULT_SMTP_PORT = 587;

/** Connection, greeting and socket timeout for SMTP */
export const SMTP_TIMEOUT_MS = 10_000;

/**
 * The part of a nodemailer transporter the channel uses
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface EmailChannelConfig {
  /** Sender address; the channel is unconfigured without it */
  from: string | undefined;
}

// ===========================================
// Message Building
// ===========================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function buildEmailSubject(notification: LeadNotification): string {
  return `Appointment Confirmed - ${notification.processed.model}`;
}

export function buildEmailText(notification: LeadNotification): string {
  const { lead, processed, meetLink } = notification;

  const lines = [
    `Dear ${processed.name},`,
    '',
    'Your appointment has been confirmed!',
    '',
    'Appointment Details:',
    `- Car Model: ${processed.model}`,
    `- Date & Time: ${processed.datetime}`,
    `- Phone: ${processed.phone}`,
    `- Reference ID: ${lead.lead_id}`,
  ];

  if (meetLink) {
    lines.push('', `Join Meeting: ${meetLink}`);
  }

  lines.push(
    '',
    'We look forward to seeing you!',
    '',
    'If you need to reschedule, please contact us at least 24 hours in advance.',
    '',
    'Best regards,',
    'Your Dealership Team'
  );

  return lines.join('\n');
}

export function buildEmailHtml(notification: LeadNotification): string {
  const { lead, processed, meetLink } = notification;
  const name = escapeHtml(processed.name);
  const model = escapeHtml(processed.model);
  const datetime = escapeHtml(processed.datetime);
  const phone = escapeHtml(processed.phone);

  const button = meetLink
    ? `<div style="text-align: center;"><a href="${escapeHtml(meetLink)}" class="button">Join Meeting</a></div>`
    : '';

  return `<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
    .container { max-width: 600px; margin: 0 auto; padding: 20px; background: #f4f4f4; }
    .header { background: #2c3e50; color: white; padding: 30px; text-align: center; border-radius: 10px 10px 0 0; }
    .content { background: white; padding: 30px; border-radius: 0 0 10px 10px; }
    .button { display: inline-block; padding: 12px 30px; background: #2c3e50; color: white !important; text-decoration: none; border-radius: 5px; margin: 20px 0; }
    .info-box { background: #f9f9f9; padding: 20px; border-left: 4px solid #2c3e50; margin: 20px 0; }
    .footer { text-align: center; padding: 20px; color: #666; font-size: 12px; }
  </style>
</head>
<body>
  <div class="container">
    <div class="header"><h1>Appointment Confirmed!</h1></div>
    <div class="content">
      <p>Dear ${name},</p>
      <p>Thank you for your interest! Your consultation appointment has been scheduled.</p>
      <div class="info-box">
        <h3>Appointment Details</h3>
        <p><strong>Car Model:</strong> ${model}</p>
        <p><strong>Date &amp; Time:</strong> ${datetime}</p>
        <p><strong>Phone:</strong> ${phone}</p>
        <p><strong>Reference ID:</strong> ${escapeHtml(lead.lead_id)}</p>
      </div>
      ${button}
      <p>We look forward to helping you find your perfect vehicle!</p>
      <p><em>If you need to reschedule, please contact us at least 24 hours in advance.</em></p>
      <p>Best regards,<br><strong>Your Dealership Team</strong></p>
    </div>
    <div class="footer"><p>This is an automated confirmation. Please do not reply to this email.</p></div>
  </div>
</body>
</html>`;
}

export function buildEmailMessage(from: string, notification: LeadNotification): SendMailOptions {
  return {
    from,
    to: notification.lead.email,
    subject: buildEmailSubject(notification),
    text: buildEmailText(notification),
    html: buildEmailHtml(notification),
  };
}

// ===========================================
// Channel
// ===========================================

export class EmailChannel implements NotificationChannelSender {
  readonly channel = 'email' as const;

  /**
   * @param transport - SMTP transport, null when credentials are missing
   */
  constructor(
    private readonly transport: MailTransport | null,
    private readonly config: EmailChannelConfig
  ) {}

  isConfigured(): boolean {
    return this.transport !== null && Boolean(this.config.from);
  }

  async send(notification: LeadNotification): Promise<void> {
    if (!this.transport || !this.config.from) {
      throw new Error('Email credentials are not configured');
    }
    await this.transport.sendMail(buildEmailMessage(this.config.from, notification));
  }
}
