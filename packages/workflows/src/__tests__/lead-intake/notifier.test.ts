/**
 * Notifier and Channel Tests
 *
 * @module __tests__/lead-intake/notifier.test
 */

import { describe, it, expect, vi } from 'vitest';
import {
  EmailChannel,
  NORMAL_COLOR,
  SlackWebhookChannel,
  URGENT_COLOR,
  buildChatMessage,
  buildEmailHtml,
  buildEmailMessage,
  buildEmailText,
  escapeHtml,
  type LeadNotification,
} from '../../lead-intake/channels';
import { createLead } from '../../lead-intake/lead';
import { Notifier } from '../../lead-intake/notifier';
import {
  FakeChannel,
  NOW,
  createCapturingLogger,
  createProcessedLead,
  createSilentLogger,
  createSubmission,
} from './fixtures';

const lead = createLead(createSubmission(), NOW);

function notification(overrides: Partial<LeadNotification> = {}): LeadNotification {
  return {
    lead,
    processed: createProcessedLead(),
    meetLink: 'https://meet.google.com/new',
    ...overrides,
  };
}

// ===========================================
// Chat Webhook
// ===========================================

describe('buildChatMessage', () => {
  it('should mention the channel and use the urgent colour for high intent', () => {
    const message = buildChatMessage(notification(), NOW);

    expect(message.text).toBe('<!here> New lead received!');
    expect(message.attachments).toEqual([
      {
        color: URGENT_COLOR,
        title: 'New Lead: Jane Doe',
        fields: [
          { title: 'Email', value: 'jane@corp.com', short: true },
          { title: 'Phone', value: '+1-212-555-0100', short: true },
          { title: 'Model', value: 'Luxury Sedan X', short: true },
          { title: 'Intent Score', value: '0.90/1.0', short: true },
          { title: 'Lead ID', value: lead.lead_id, short: true },
          { title: 'Appointment', value: '2026-03-04T15:00:00.000Z', short: false },
          {
            title: 'Meeting Link',
            value: '<https://meet.google.com/new|Join Meeting>',
            short: false,
          },
        ],
        footer: 'Lead Intake',
        ts: '1772463600',
      },
    ]);
  });

  it('should treat exactly 0.8 as high intent', () => {
    const message = buildChatMessage(
      notification({ processed: createProcessedLead({ intent_score: 0.8 }) }),
      NOW
    );
    expect(message.attachments?.[0]?.color).toBe(URGENT_COLOR);
  });

  it('should post a plain alert below the threshold without a meeting link', () => {
    const message = buildChatMessage(
      notification({ processed: createProcessedLead({ intent_score: 0.79 }), meetLink: null }),
      NOW
    );

    expect(message.text).toBe('New lead received');
    const attachment = message.attachments?.[0];
    expect(attachment?.color).toBe(NORMAL_COLOR);
    expect(attachment?.fields?.map((field) => field.title)).toEqual([
      'Email',
      'Phone',
      'Model',
      'Intent Score',
      'Lead ID',
      'Appointment',
    ]);
  });
});

describe('SlackWebhookChannel', () => {
  it('should post the built message', async () => {
    const send = vi.fn(async () => ({ text: 'ok' }));
    const channel = new SlackWebhookChannel({ send });

    await channel.send(notification());

    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(
      expect.objectContaining({ text: '<!here> New lead received!' })
    );
  });

  it('should be unconfigured without a webhook', async () => {
    const channel = new SlackWebhookChannel(null);

    expect(channel.isConfigured()).toBe(false);
    await expect(channel.send(notification())).rejects.toThrow(
      'Chat webhook URL is not configured'
    );
  });
});

// ===========================================
// Email
// ===========================================

describe('email message', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe(
      '&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;'
    );
  });

  it('should address the lead with the appointment details', () => {
    const message = buildEmailMessage('dealer@example.com', notification());

    expect(message.from).toBe('dealer@example.com');
    expect(message.to).toBe('jane@corp.com');
    expect(message.subject).toBe('Appointment Confirmed - Luxury Sedan X');
  });

  it('should lay out the plain text body', () => {
    expect(buildEmailText(notification()).split('\n')).toEqual([
      'Dear Jane Doe,',
      '',
      'Your appointment has been confirmed!',
      '',
      'Appointment Details:',
      '- Car Model: Luxury Sedan X',
      '- Date & Time: 2026-03-04T15:00:00.000Z',
      '- Phone: +1-212-555-0100',
      `- Reference ID: ${lead.lead_id}`,
      '',
      'Join Meeting: https://meet.google.com/new',
      '',
      'We look forward to seeing you!',
      '',
      'If you need to reschedule, please contact us at least 24 hours in advance.',
      '',
      'Best regards,',
      'Your Dealership Team',
    ]);
  });

  it('should omit the meeting line without a link', () => {
    const text = buildEmailText(notification({ meetLink: null }));
    expect(text).not.toContain('Join Meeting');
  });

  it('should escape lead values in the HTML body', () => {
    const html = buildEmailHtml(
      notification({ processed: createProcessedLead({ name: '<script>x</script>' }) })
    );

    expect(html).toContain('<p>Dear &lt;script&gt;x&lt;/script&gt;,</p>');
    expect(html).toContain('<a href="https://meet.google.com/new" class="button">Join Meeting</a>');
  });
});

describe('EmailChannel', () => {
  it('should send through the transport', async () => {
    const sendMail = vi.fn(async () => ({ messageId: 'm-1' }));
    const channel = new EmailChannel({ sendMail }, { from: 'dealer@example.com' });

    await channel.send(notification());

    expect(channel.isConfigured()).toBe(true);
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({ from: 'dealer@example.com', to: 'jane@corp.com' })
    );
  });

  it('should be unconfigured without a transport or sender', () => {
    const sendMail = vi.fn(async () => ({}));

    expect(new EmailChannel(null, { from: 'dealer@example.com' }).isConfigured()).toBe(false);
    expect(new EmailChannel({ sendMail }, { from: undefined }).isConfigured()).toBe(false);
  });
});

// ===========================================
// Notifier
// ===========================================

describe('Notifier.notify', () => {
  it('should deliver through the named channel', async () => {
    const chat = new FakeChannel('chat_webhook');
    const capture = createCapturingLogger();
    const notifier = new Notifier([chat], { logger: capture.logger });
    const processed = createProcessedLead();

    const result = await notifier.notify(lead, processed, 'https://meet.google.com/new', 'chat_webhook');

    expect(result).toEqual({ success: true, channel: 'chat_webhook' });
    expect(chat.sent).toEqual([{ lead, processed, meetLink: 'https://meet.google.com/new' }]);
    expect(capture.events()[0]).toMatchObject({
      event: 'notification_sent',
      channel: 'chat_webhook',
    });
  });

  it('should refuse an unconfigured channel', async () => {
    const email = new FakeChannel('email', false);
    const capture = createCapturingLogger();
    const notifier = new Notifier([email], { logger: capture.logger });

    const result = await notifier.notify(lead, createProcessedLead(), null, 'email');

    expect(result).toEqual({
      success: false,
      code: 'NOT_CONFIGURED',
      error: 'Notification channel email not configured',
    });
    expect(email.sent).toHaveLength(0);
    expect(capture.events()[0]).toMatchObject({ event: 'notification_failed', level: 'warn' });
  });

  it('should refuse an unknown channel name', async () => {
    const notifier = new Notifier([new FakeChannel('email')], { logger: createSilentLogger() });

    const result = await notifier.notify(lead, createProcessedLead(), null, 'sms');

    expect(result).toEqual({
      success: false,
      code: 'NOT_CONFIGURED',
      error: 'Notification channel sms not configured',
    });
  });

  it('should report a delivery fault after one attempt', async () => {
    const chat = new FakeChannel('chat_webhook');
    chat.fail = new Error('request timed out');
    const capture = createCapturingLogger();
    const notifier = new Notifier([chat], { logger: capture.logger });

    const result = await notifier.notify(lead, createProcessedLead(), null, 'chat_webhook');

    expect(result).toEqual({
      success: false,
      code: 'DELIVERY_ERROR',
      error: 'request timed out',
    });
    expect(capture.events()[0]).toMatchObject({
      event: 'notification_failed',
      level: 'error',
      error_code: 'TIMEOUT',
    });
  });

  it('should list only configured channels', () => {
    const notifier = new Notifier(
      [new FakeChannel('chat_webhook'), new FakeChannel('email', false)],
      { logger: createSilentLogger() }
    );

    expect(notifier.configuredChannels()).toEqual(['chat_webhook']);
  });
});
