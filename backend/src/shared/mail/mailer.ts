/**
 * src/shared/mail/mailer.ts
 *
 * WHY:
 * - Decouples "an invite link must reach someone" from "here is how mail is sent".
 * - The invite service only ever sees this interface; di.ts picks the transport.
 *
 * RULES:
 * - Messages are discriminated unions on the `type` field.
 * - The action link is a signed credential: never log it.
 */

export type InviteEmailMessage = {
  type: 'invite.email';
  to: string;
  orgSlug: string;
  invitedBy: string;
  /** Signed link produced by the identity provider. */
  actionLink: string;
};

export type MailMessage = InviteEmailMessage;

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

/** Mail provider rejected the message (status is the provider HTTP status). */
export class MailDeliveryError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'MailDeliveryError';
  }
}
