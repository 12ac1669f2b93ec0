import type { CycleResult } from './result.js';

/** Best effort: implementations log delivery failures instead of throwing. */
export interface Notifier {
  notify(result: CycleResult): Promise<void>;
}

export interface NotificationChannel {
  readonly name: string;
  send(result: CycleResult): Promise<void>;
}
