/**
 * src/shared/mail/resend-mailer.ts
 *
 * Mailer over the Resend HTTP API. Used only when EMAIL_PROVIDER_API_KEY is set;
 * otherwise invites are delivered by the identity provider itself.
 */

import { MailDeliveryError, type MailMessage, type Mailer } from './mailer';

const RESEND_API_URL = 'https://api.resend.com/emails';

export function renderMail(message: MailMessage): { subject: string; html: string; text: string } {
  switch (message.type) {
    case 'invite.email':
      return {
        subject: `${message.invitedBy} invited you to ${message.orgSlug}`,
        text: `${message.invitedBy} has invited you to join ${message.orgSlug}.\n\nAccept the invitation: ${message.actionLink}\n`,
        html: `<p>${message.invitedBy} has invited you to join <strong>${message.orgSlug}</strong>.</p><p><a href="${message.actionLink}">Accept the invitation</a></p>`,
      };
  }
}

export class ResendMailer implements Mailer {
  constructor(private readonly opts: { apiKey: string; from: string }) {}

  async send(message: MailMessage): Promise<void> {
    const body = renderMail(message);

    const response = await fetch(RESEND_API_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.opts.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        from: this.opts.from,
        to: [message.to],
        subject: body.subject,
        html: body.html,
        text: body.text,
      }),
    });

    if (!response.ok) {
      throw new MailDeliveryError(
        `Mail provider error: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
  }
}
