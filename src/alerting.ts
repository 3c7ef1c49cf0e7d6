import http from 'node:http';
import https from 'node:https';
import logger from './logger';
import type { RefreshMonitor, RefreshStateSnapshot } from './state/refreshMonitor';

export interface AlertPolicy {
  webhookUrl?: string;
  afterFailures: number;
  cooldownMs: number;
}

/**
 * POSTs a JSON alert. Resolves to false on any transport or HTTP error;
 * alert delivery never fails the caller.
 */
export function postWebhook(webhookUrl: string, message: string, payload: object): Promise<boolean> {
  return new Promise((resolve) => {
    let url: URL;
    try {
      url = new URL(webhookUrl);
    } catch (err) {
      logger.error({ err }, '[alerting] invalid webhook url');
      resolve(false);
      return;
    }

    const body = JSON.stringify({ message, ...payload });
    const options: https.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (url.protocol === 'https:' ? 443 : 80),
      path: `${url.pathname}${url.search}`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(body),
      },
    };

    const client = url.protocol === 'https:' ? https : http;
    const req = client.request(options, (res) => {
      res.resume();
      const ok = !res.statusCode || res.statusCode < 400;
      if (!ok) {
        logger.error({ status: res.statusCode }, '[alerting] webhook responded with error');
      }
      res.on('end', () => resolve(ok));
      res.on('error', (err) => {
        logger.error({ err }, '[alerting] webhook response failed');
        resolve(false);
      });
      res.on('close', () => {
        if (!res.complete) resolve(false);
      });
    });

    req.on('error', (err) => {
      logger.error({ err }, '[alerting] failed to send webhook');
      resolve(false);
    });

    req.end(body);
  });
}

export async function notifyRefreshFailing(
  state: RefreshStateSnapshot,
  webhookUrl: string | undefined,
): Promise<void> {
  logger.warn('[alerting] forecast refresh failing', {
    consecutiveFailures: state.consecutiveFailures,
    lastError: state.lastError,
    lastSuccess: state.lastSuccessIso,
  });
  if (!webhookUrl) {
    logger.info('[alerting] webhook not configured; skipping alert');
    return;
  }
  await postWebhook(webhookUrl, 'Forecast refresh failing', state);
}

/** Alerts when the failure streak crosses the policy threshold, at most once per cooldown. */
export async function checkRefreshAlerts(
  monitor: RefreshMonitor,
  policy: AlertPolicy,
  nowMs = Date.now(),
): Promise<boolean> {
  if (!monitor.shouldAlertFailures(policy.afterFailures, policy.cooldownMs, nowMs)) {
    return false;
  }
  await notifyRefreshFailing(monitor.getState(nowMs), policy.webhookUrl);
  return true;
}
