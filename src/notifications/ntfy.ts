import type { NotificationChannel } from '../types/notifier.js';
import type { CycleResult } from '../types/result.js';
import { formatSummary, summaryTitle } from './format.js';
import { post } from './http.js';

export interface NtfyOptions {
  url: string;
  username: string;
  password: string;
}

/** RFC 2047 encoded-word, so team names with umlauts survive the header. */
export function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

export class NtfyChannel implements NotificationChannel {
  readonly name = 'ntfy';

  constructor(private readonly options: NtfyOptions) {}

  async send(result: CycleResult): Promise<void> {
    const auth = Buffer.from(`${this.options.username}:${this.options.password}`).toString('base64');
    await post(this.options.url, {
      label: this.name,
      headers: {
        Authorization: `Basic ${auth}`,
        'Content-Type': 'text/plain; charset=utf-8',
        'X-Title': encodeHeaderValue(summaryTitle(result)),
        'X-Priority': result.status === 'aborted' || result.counts.failed > 0 ? 'high' : 'default',
      },
      body: formatSummary(result),
    });
  }
}
