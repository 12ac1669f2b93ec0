import type { NotificationChannel } from '../types/notifier.js';
import type { CycleResult } from '../types/result.js';
import { toPayload } from './format.js';
import { post } from './http.js';

/** POSTs the whole cycle result as JSON. */
export class WebhookChannel implements NotificationChannel {
  readonly name = 'webhook';

  constructor(private readonly url: string) {}

  async send(result: CycleResult): Promise<void> {
    await post(this.url, {
      label: this.name,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(toPayload(result)),
    });
  }
}
