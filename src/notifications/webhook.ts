/**
 * Webhook notifier.
 *
 * Sends one summary event per terminal run to the configured webhook via
 * HTTP POST, signed with HMAC-SHA256 when a signing secret is configured.
 * Delivery is best-effort: at most one retry, and a failure is logged as a
 * warning without touching the run's recorded outcome.
 */

import { createHmac } from 'crypto';
import { v4 as uuid } from 'uuid';
import { TypedError, notifyFailedError } from '../domain/errors';
import { OutcomeCounts, RootCause, RunOutcome, RunReport } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';

export const SIGNATURE_HEADER = 'X-Deckhand-Signature';

/** Summary event for a finished run. */
export interface WebhookPayload {
  id: string;
  event: 'run.completed';
  timestamp: string;
  runId: string;
  manifestName: string;
  outcome: RunOutcome;
  countsByHost: Record<string, OutcomeCounts>;
  durationMs: number;
  rootCauses: RootCause[];
}

/** Webhook delivery result. */
export interface WebhookDeliveryResult {
  success: boolean;
  attempts: number;
  statusCode?: number;
  error?: TypedError;
  payload: WebhookPayload;
}

/**
 * A single delivery attempt (injectable for testing). Resolves with the
 * response status; rejects on network failure.
 */
export type WebhookDeliveryFn = (
  url: string,
  body: string,
  headers: Record<string, string>,
) => Promise<{ statusCode: number }>;

export interface NotifierOptions {
  url?: string;
  signingSecret?: string;
  /** Permit loopback and private-network targets. */
  allowPrivate?: boolean;
  /** Delay before the single retry. */
  retryDelayMs?: number;
  deliveryFn?: WebhookDeliveryFn;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_ATTEMPTS = 2;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DELIVERY_TIMEOUT_MS = 10_000;

/**
 * Validate that a webhook URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 *
 * Blocks non-HTTP(S) protocols, loopback, cloud metadata endpoints and
 * private/link-local IPv4 ranges. `allowPrivate` lifts the network checks
 * but never the protocol check.
 */
export function validateWebhookUrl(url: string, allowPrivate = false): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }
  if (allowPrivate) return null;

  const hostname = parsed.hostname.toLowerCase();

  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Webhook URL must not point to localhost: ${hostname}`;
  }

  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Webhook URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4Match) {
    const a = Number(ipv4Match[1]);
    const b = Number(ipv4Match[2]);
    // 10.0.0.0/8
    if (a === 10) return `Webhook URL must not point to private IP range: ${hostname}`;
    // 172.16.0.0/12
    if (a === 172 && b >= 16 && b <= 31) return `Webhook URL must not point to private IP range: ${hostname}`;
    // 192.168.0.0/16
    if (a === 192 && b === 168) return `Webhook URL must not point to private IP range: ${hostname}`;
    // 169.254.0.0/16
    if (a === 169 && b === 254) return `Webhook URL must not point to link-local range: ${hostname}`;
    // 127.0.0.0/8
    if (a === 127) return `Webhook URL must not point to localhost: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

/** One HTTP POST using native fetch. */
export const httpDelivery: WebhookDeliveryFn = async (url, body, headers) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), DELIVERY_TIMEOUT_MS);
  try {
    const response = await fetch(url, { method: 'POST', headers, body, signal: controller.signal });
    return { statusCode: response.status };
  } finally {
    clearTimeout(timeout);
  }
};

export function buildPayload(report: RunReport): WebhookPayload {
  return {
    id: `whk_${uuid()}`,
    event: 'run.completed',
    timestamp: new Date().toISOString(),
    runId: report.runId,
    manifestName: report.manifestName,
    outcome: report.outcome,
    countsByHost: report.countsByHost,
    durationMs: report.durationMs,
    rootCauses: report.rootCauses,
  };
}

/** The webhook notifier. */
export class Notifier {
  private deliveryFn: WebhookDeliveryFn;
  private sleep: (ms: number) => Promise<void>;
  /** Record of delivered webhooks for testing/audit. */
  private deliveryLog: WebhookDeliveryResult[] = [];

  constructor(
    private options: NotifierOptions,
    private log: Logger = rootLogger,
  ) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  get enabled(): boolean {
    return Boolean(this.options.url);
  }

  /**
   * Send the run summary. Never throws; returns null when no webhook is
   * configured.
   */
  async notify(report: RunReport): Promise<WebhookDeliveryResult | null> {
    const url = this.options.url;
    if (!url) return null;

    const payload = buildPayload(report);
    const urlError = validateWebhookUrl(url, this.options.allowPrivate ?? false);
    if (urlError) {
      return this.fail(payload, 0, urlError);
    }

    const body = JSON.stringify(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'deckhand-webhook',
      'X-Deckhand-Delivery': payload.id,
      'X-Deckhand-Event': payload.event,
    };
    if (this.options.signingSecret) {
      headers[SIGNATURE_HEADER] = signPayload(body, this.options.signingSecret);
    }

    let lastError = 'Webhook delivery failed';
    let statusCode: number | undefined;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      if (attempt > 1) await this.sleep(this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
      try {
        const response = await this.deliveryFn(url, body, headers);
        statusCode = response.statusCode;
        if (statusCode >= 200 && statusCode < 300) {
          const result: WebhookDeliveryResult = { success: true, attempts: attempt, statusCode, payload };
          this.deliveryLog.push(result);
          this.log.info('Run summary delivered', { runId: report.runId, statusCode, attempts: attempt });
          return result;
        }
        lastError = `Webhook returned HTTP ${statusCode}`;
        // Client errors will not improve on retry.
        if (statusCode >= 400 && statusCode < 500) return this.fail(payload, attempt, lastError, statusCode);
      } catch (err) {
        lastError = err instanceof Error ? err.message : String(err);
      }
    }
    return this.fail(payload, MAX_ATTEMPTS, lastError, statusCode);
  }

  /** Get delivery log (for testing/audit). */
  getDeliveryLog(): WebhookDeliveryResult[] {
    return [...this.deliveryLog];
  }

  private fail(payload: WebhookPayload, attempts: number, reason: string, statusCode?: number): WebhookDeliveryResult {
    const error = notifyFailedError(reason, payload.runId);
    this.log.warn('Run summary notification failed', { runId: payload.runId, code: error.code, reason, attempts });
    const result: WebhookDeliveryResult = { success: false, attempts, statusCode, error, payload };
    this.deliveryLog.push(result);
    return result;
  }
}
