import type { Logger } from 'pino';
import type { Config } from '../config.js';
import type { NotificationChannel, Notifier } from '../types/notifier.js';
import type { CycleResult } from '../types/result.js';
import { logger as rootLogger } from '../utils/logger.js';
import { formatSummary, summaryTitle } from './format.js';
import { NtfyChannel } from './ntfy.js';
import { TelegramChannel } from './telegram.js';
import { WebhookChannel } from './webhook.js';
import { ZapierChannel } from './zapier.js';

/**
 * Fans a cycle result out to every configured channel. A channel that fails
 * is logged and the rest still get the message.
 */
export class NotificationDispatcher implements Notifier {
  private readonly log: Logger;

  constructor(
    readonly channels: NotificationChannel[],
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'notifier' });
  }

  async notify(result: CycleResult): Promise<void> {
    this.log.info({ cycle: result.cycleId }, summaryTitle(result));
    this.log.debug(formatSummary(result));

    for (const channel of this.channels) {
      try {
        await channel.send(result);
        this.log.debug({ channel: channel.name }, 'Notification delivered');
      } catch (err) {
        this.log.error({ channel: channel.name, err }, 'Failed to deliver notification');
      }
    }
  }
}

export function createChannels(env: Config['env']): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (env.WEBHOOK_URL) channels.push(new WebhookChannel(env.WEBHOOK_URL));
  if (env.ZAPIER_URL) channels.push(new ZapierChannel(env.ZAPIER_URL));
  if (env.NTFY_URL && env.NTFY_USERNAME && env.NTFY_PASSWORD) {
    channels.push(
      new NtfyChannel({ url: env.NTFY_URL, username: env.NTFY_USERNAME, password: env.NTFY_PASSWORD }),
    );
  }
  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    channels.push(new TelegramChannel(env.TELEGRAM_BOT_TOKEN, env.TELEGRAM_CHAT_ID));
  }
  return channels;
}

/** With notifications disabled the dispatcher only logs the summary. */
export function createNotifier(config: Config, enabled: boolean, log: Logger = rootLogger): NotificationDispatcher {
  const channels = enabled ? createChannels(config.env) : [];
  log.info({ channels: channels.map((c) => c.name) }, 'Notification channels configured');
  return new NotificationDispatcher(channels, log);
}
