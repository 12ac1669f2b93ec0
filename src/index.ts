#!/usr/bin/env node
import { KicktippAdapter } from './adapters/kicktipp.js';
import { sendHeartbeat } from './api/heartbeat.js';
import { HealthStatus } from './api/health-status.js';
import { createServer } from './api/server.js';
import { USAGE, parseCliArgs } from './cli.js';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { createNotifier } from './notifications/index.js';
import { runCycle } from './scheduler/cycle.js';
import { CycleScheduler } from './scheduler/index.js';
import { logger } from './utils/logger.js';
import { BrowserPool } from './workers/browser-pool.js';

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }
  if (args.debug) logger.level = 'debug';

  const config = loadConfig();
  logger.info(
    {
      competition: config.competition,
      intervalMinutes: config.intervalMinutes,
      leadTimeHours: config.leadTimeHours,
      overwriteTips: config.overwriteTips,
      headless: !args.headed,
    },
    'Starting tipbot...',
  );

  const pool = new BrowserPool({
    headless: !args.headed,
    executablePath: config.browser.executablePath,
    timeoutMs: config.browser.timeoutMs,
  });
  const driver = new KicktippAdapter(pool, config.baseUrl);
  const notifier = createNotifier(config, args.notify);
  const health = new HealthStatus(config.intervalMinutes);
  const heartbeatUrl = config.env.HEARTBEAT_URL;

  const scheduler = new CycleScheduler({
    intervalMs: config.intervalMinutes * 60 * 1000,
    competition: config.competition,
    notifier,
    logger,
    runCycle: (cycleId) =>
      runCycle(cycleId, {
        driver,
        credentials: config.credentials,
        competition: config.competition,
        leadTimeHours: config.leadTimeHours,
        overwriteTips: config.overwriteTips,
        policy: config.policy,
        retry: config.retry,
        logger,
      }),
    onCycleComplete: async (result) => {
      health.recordCycle(result);
      if (heartbeatUrl) await sendHeartbeat(heartbeatUrl, health);
    },
  });

  // Interval 0 keeps the old run-once behaviour
  if (args.once || config.intervalMinutes === 0) {
    await scheduler.runOnce();
    await pool.close();
    logger.info('Single cycle finished, exiting');
    return;
  }

  const server = config.env.HEALTH_PORT > 0 ? await createServer(health) : null;
  if (server) {
    await server.listen({ port: config.env.HEALTH_PORT, host: '0.0.0.0' });
    logger.info({ port: config.env.HEALTH_PORT }, 'Health endpoints: /health, /status');
  }

  health.markReady();
  scheduler.start();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await scheduler.stop();
      await server?.close();
      await pool.close();
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ issues: err.issues }, err.message);
  } else {
    logger.fatal({ err }, 'Failed to start');
  }
  process.exit(1);
});
