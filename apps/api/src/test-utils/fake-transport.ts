import type { EmailConfiguration } from '@salesdesk/core';

import type { EmailTransport, OutboundEmail, TransportResult } from '../modules/email-delivery/email-transport';

/** Records outbound messages; queued results are consumed in order, then every send succeeds. */
export class FakeEmailTransport implements EmailTransport {
  readonly sent: Array<{ message: OutboundEmail; config: EmailConfiguration }> = [];
  readonly results: Array<TransportResult | Error> = [];
  connectionResult: TransportResult = { ok: true, message: 'Connection successful' };

  async testConnection(): Promise<TransportResult> {
    return this.connectionResult;
  }

  async send(message: OutboundEmail, config: EmailConfiguration): Promise<TransportResult> {
    this.sent.push({ message, config });
    const next = this.results.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? { ok: true, message: 'Email sent successfully', externalId: `msg-${this.sent.length}` };
  }

  failNext(message: string): void {
    this.results.push({ ok: false, message });
  }
}
