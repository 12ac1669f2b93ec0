import type { NotificationChannel } from '../types/notifier.js';
import type { CycleResult } from '../types/result.js';
import { describeOutcome, summaryCounts, summaryTitle } from './format.js';
import { post } from './http.js';

export function escapeMarkdownV2(text: string): string {
  return text.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, '\\$1');
}

export function formatTelegramMessage(result: CycleResult): string {
  const emoji = result.status === 'aborted' ? '\u{26A0}\u{FE0F}' : result.counts.failed > 0 ? '\u{2757}' : '\u{26BD}';
  const header = `${emoji} *${escapeMarkdownV2(summaryTitle(result))}*`;
  const counts = `_${escapeMarkdownV2(summaryCounts(result))}_`;

  const details = result.outcomes
    .filter((o) => o.status === 'submitted' || o.status === 'failed' || o.status === 'skipped-malformed')
    .map((o) => `\u{2022} ${escapeMarkdownV2(describeOutcome(o))}`);

  const parts = [header, counts];
  if (result.error) parts.push(escapeMarkdownV2(`Error: ${result.error}`));
  if (details.length) parts.push(details.join('\n'));
  return parts.join('\n\n');
}

export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
  ) {}

  async send(result: CycleResult): Promise<void> {
    await post(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
      label: this.name,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.chatId,
        text: formatTelegramMessage(result),
        parse_mode: 'MarkdownV2',
      }),
    });
  }
}
