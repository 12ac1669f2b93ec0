import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { loadConfig } from '../../src/config.js';
import { createChannels, NotificationDispatcher } from '../../src/notifications/index.js';
import { encodeHeaderValue, NtfyChannel } from '../../src/notifications/ntfy.js';
import { TelegramChannel } from '../../src/notifications/telegram.js';
import { WebhookChannel } from '../../src/notifications/webhook.js';
import { ZapierChannel } from '../../src/notifications/zapier.js';
import { buildCycleResult } from '../../src/scheduler/cycle.js';
import type { NotificationChannel } from '../../src/types/notifier.js';
import type { CycleResult } from '../../src/types/result.js';
import { NOW, makeMatch, silentLogger } from '../helpers/fakes.js';

const HOOKS = 'https://hooks.test.local';

function sampleResult(): CycleResult {
  return buildCycleResult({
    cycleId: 7,
    competition: 'test-league',
    startedAt: NOW,
    finishedAt: NOW,
    outcomes: [
      {
        status: 'submitted',
        attempts: 1,
        tip: { matchId: '11', scoreline: { home: 2, away: 1 }, outcome: 'home' },
        match: makeMatch({ id: '11', homeTeam: 'Red River FC', awayTeam: 'Blue Harbour' }),
      },
      {
        status: 'submitted',
        attempts: 2,
        tip: { matchId: '12', scoreline: { home: 0, away: 1 }, outcome: 'away' },
        match: makeMatch({ id: '12', homeTeam: 'Green Valley', awayTeam: 'Stonebridge 04' }),
      },
      {
        status: 'skipped-ineligible',
        reason: 'too-far',
        match: makeMatch({ id: '13' }),
      },
    ],
  });
}

describe('notification channels', () => {
  let agent: MockAgent;
  let original: Dispatcher;
  let bodies: string[];

  beforeEach(() => {
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    bodies = [];
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
  });

  function capture(origin: string, path: string, statusCode = 200, times = 1): void {
    agent
      .get(origin)
      .intercept({ path, method: 'POST' })
      .reply(statusCode, (opts) => {
        bodies.push(String(opts.body));
        return statusCode >= 400 ? 'boom' : 'ok';
      })
      .times(times);
  }

  it('should post the cycle as JSON to a webhook', async () => {
    capture(HOOKS, '/cycle');

    await new WebhookChannel(`${HOOKS}/cycle`).send(sampleResult());

    expect(bodies).toHaveLength(1);
    const payload: unknown = JSON.parse(bodies[0] ?? '');
    expect(payload).toMatchObject({
      cycleId: 7,
      status: 'completed',
      counts: { submitted: 2, 'skipped-ineligible': 1 },
    });
  });

  it('should post one form per submitted tip to zapier', async () => {
    capture(HOOKS, '/zap', 200, 2);

    await new ZapierChannel(`${HOOKS}/zap`).send(sampleResult());

    expect(bodies).toHaveLength(2);
    const first = new URLSearchParams(bodies[0]);
    expect(first.get('team1')).toBe('Red River FC');
    expect(first.get('team2')).toBe('Blue Harbour');
    expect(first.get('quoteteam1')).toBe('2');
    expect(first.get('quotedraw')).toBe('3.4');
    expect(first.get('tipteam1')).toBe('2');
    expect(first.get('tipteam2')).toBe('1');
    expect(new URLSearchParams(bodies[1]).get('tipteam2')).toBe('1');
    expect(new URLSearchParams(bodies[1]).get('team1')).toBe('Green Valley');
  });

  it('should post the remaining tips when one zapier post fails', async () => {
    capture(HOOKS, '/zap', 500);
    capture(HOOKS, '/zap');

    await expect(new ZapierChannel(`${HOOKS}/zap`).send(sampleResult())).rejects.toThrow(
      'zapier: 1 of 2 tip posts failed (Red River FC vs Blue Harbour: zapier responded 500: boom)',
    );

    expect(bodies).toHaveLength(2);
    expect(new URLSearchParams(bodies[1]).get('team1')).toBe('Green Valley');
  });

  it('should send a MarkdownV2 message to telegram', async () => {
    capture('https://api.telegram.org', '/bottest-token/sendMessage');

    await new TelegramChannel('test-token', '42').send(sampleResult());

    const body: unknown = JSON.parse(bodies[0] ?? '');
    expect(body).toMatchObject({ chat_id: '42', parse_mode: 'MarkdownV2' });
  });

  it('should send the plain summary to ntfy', async () => {
    capture(HOOKS, '/tipbot');

    await new NtfyChannel({ url: `${HOOKS}/tipbot`, username: 'bot', password: 'test-secret' }).send(
      sampleResult(),
    );

    expect(bodies[0]?.split('\n')[0]).toBe(
      'submitted 2, already tipped 0, not eligible 1, malformed odds 0, failed 0',
    );
  });

  it('should reject on an error status', async () => {
    capture(HOOKS, '/cycle', 500);

    await expect(new WebhookChannel(`${HOOKS}/cycle`).send(sampleResult())).rejects.toThrow(
      'webhook responded 500: boom',
    );
  });

  it('should keep delivering when one channel fails', async () => {
    const delivered: number[] = [];
    const broken: NotificationChannel = {
      name: 'broken',
      send: async () => {
        throw new Error('unreachable');
      },
    };
    const recording: NotificationChannel = {
      name: 'recording',
      send: async (result) => {
        delivered.push(result.cycleId);
      },
    };

    const dispatcher = new NotificationDispatcher([broken, recording], silentLogger);
    await expect(dispatcher.notify(sampleResult())).resolves.toBeUndefined();

    expect(delivered).toEqual([7]);
  });
});

describe('encodeHeaderValue', () => {
  it('should leave ASCII untouched', () => {
    expect(encodeHeaderValue('Tipping cycle #1')).toBe('Tipping cycle #1');
  });

  it('should encode non-ASCII as an RFC 2047 word', () => {
    expect(encodeHeaderValue('Köln')).toBe('=?UTF-8?B?S8O2bG4=?=');
  });
});

describe('createChannels', () => {
  const base = {
    KICKTIPP_EMAIL: 'bot@example.test',
    KICKTIPP_PASSWORD: 'test-secret',
    KICKTIPP_NAME_OF_COMPETITION: 'test-league',
  };

  it('should create no channels without settings', () => {
    expect(createChannels(loadConfig(base).env)).toEqual([]);
  });

  it('should create every fully configured channel', () => {
    const config = loadConfig({
      ...base,
      WEBHOOK_URL: `${HOOKS}/cycle`,
      ZAPIER_URL: `${HOOKS}/zap`,
      NTFY_URL: `${HOOKS}/tipbot`,
      NTFY_USERNAME: 'bot',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: '42',
    });

    // ntfy is left out without a password
    expect(createChannels(config.env).map((c) => c.name)).toEqual(['webhook', 'zapier', 'telegram']);
  });
});
