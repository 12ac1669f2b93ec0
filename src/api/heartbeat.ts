import { post } from '../notifications/http.js';
import { logger } from '../utils/logger.js';
import type { HealthStatus } from './health-status.js';

/** Pings an external uptime monitor. Failures are logged only. */
export async function sendHeartbeat(url: string, health: HealthStatus): Promise<void> {
  try {
    await post(url, {
      label: 'heartbeat',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        service: 'tipbot',
        status: health.status,
        timestamp: new Date().toISOString(),
        uptime: health.uptimeSeconds(),
      }),
    });
    logger.debug('Heartbeat sent');
  } catch (err) {
    logger.warn({ err }, 'Failed to send heartbeat');
  }
}
