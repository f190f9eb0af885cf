/**
 * src/shared/mail/inmem-mailer.ts
 *
 * WHY:
 * - Tests need to inspect what the invite flow sent without real mail infrastructure.
 * - drain() is the test contract: call it after the HTTP request completes.
 *
 * RULES:
 * - Implements Mailer only; production code never calls drain().
 */

import type { MailMessage, Mailer } from './mailer';

export class InMemMailer implements Mailer {
  private readonly outbox: MailMessage[] = [];

  send(message: MailMessage): Promise<void> {
    this.outbox.push(message);
    return Promise.resolve();
  }

  /** Returns all sent messages and clears the outbox. */
  drain(): MailMessage[] {
    return this.outbox.splice(0, this.outbox.length);
  }
}
