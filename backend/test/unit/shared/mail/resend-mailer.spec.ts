import { describe, it, expect, vi, afterEach } from 'vitest';

import { ResendMailer, renderMail } from '../../../../src/shared/mail/resend-mailer';
import { MailDeliveryError, type InviteEmailMessage } from '../../../../src/shared/mail/mailer';

const INVITE: InviteEmailMessage = {
  type: 'invite.email',
  to: 'new@example.com',
  orgSlug: 'acme',
  invitedBy: 'member@example.com',
  actionLink: 'http://localhost:5173/accept-invite#invite=abc',
};

describe('renderMail', () => {
  it('names the inviter and the org in an invite', () => {
    expect(renderMail(INVITE)).toEqual({
      subject: 'member@example.com invited you to acme',
      text:
        'member@example.com has invited you to join acme.\n\n' +
        'Accept the invitation: http://localhost:5173/accept-invite#invite=abc\n',
      html:
        '<p>member@example.com has invited you to join <strong>acme</strong>.</p>' +
        '<p><a href="http://localhost:5173/accept-invite#invite=abc">Accept the invitation</a></p>',
    });
  });
});

describe('ResendMailer', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the rendered invite to the mail API', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const mailer = new ResendMailer({ apiKey: 'test-secret', from: 'invites@example.com' });
    await mailer.send(INVITE);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.resend.com/emails');
    expect(init.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(init.body)).toMatchObject({
      from: 'invites@example.com',
      to: ['new@example.com'],
      subject: 'member@example.com invited you to acme',
    });
  });

  it('throws MailDeliveryError when the provider rejects the message', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('nope', { status: 422, statusText: 'Unprocessable Entity' })),
    );

    const mailer = new ResendMailer({ apiKey: 'test-secret', from: 'invites@example.com' });

    await expect(mailer.send(INVITE)).rejects.toEqual(
      new MailDeliveryError('Mail provider error: 422 Unprocessable Entity', 422),
    );
  });
});
