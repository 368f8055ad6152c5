/**
 * Webhook notifier.
 *
 * Subscribes to terminal process events and delivers them to a configured
 * endpoint via HTTP POST, signed with HMAC-SHA256 when a signing secret is
 * configured.
 */

import { v4 as uuid } from 'uuid';
import { createHmac } from 'crypto';
import { ProcessEvent, ProcessEventType, TERMINAL_EVENT_TYPES } from '../domain/events';
import { TypedError } from '../domain/errors';
import { ProcessStatus } from '../domain/process';
import { ProcessEventPublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { computeBackoff, sleep } from '../engine/retry';

/** Webhook payload for process events. */
export interface WebhookPayload {
  id: string;
  event: ProcessEventType;
  timestamp: string;
  processId: string;
  subjectId: string;
  status: ProcessStatus;
  message: string;
  errorDetail?: TypedError;
}

/** Webhook delivery result. */
export interface WebhookDeliveryResult {
  success: boolean;
  statusCode?: number;
  error?: string;
  payload: WebhookPayload;
}

/** Webhook delivery function type (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  payload: WebhookPayload,
  signingSecret?: string,
) => Promise<{ statusCode: number }>;

/** Notifier configuration. */
export interface WebhookConfig {
  url: string;
  signingSecret?: string;
  /** Event types to deliver. Defaults to terminal events. */
  events?: readonly ProcessEventType[];
}

/** Compute the signature header value for a payload body. */
export function signPayload(body: string, signingSecret: string): string {
  return `sha256=${createHmac('sha256', signingSecret).update(body).digest('hex')}`;
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * SSRF PROTECTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A webhook URL pointing at internal services (cloud metadata at
 * http://169.254.169.254/, internal APIs on localhost) would turn the
 * notifier into a Server-Side Request Forgery proxy.
 *
 * `validateWebhookUrl()` blocks:
 * - Non-HTTP(S) protocols (file://, ftp://, etc.)
 * - Private/reserved IP ranges (RFC 1918, link-local, loopback)
 * - Cloud metadata endpoints (169.254.169.254)
 * - Localhost references
 * ═══════════════════════════════════════════════════════════════════════════
 */

const BLOCKED_HOSTS: Record<string, string> = {
  localhost: 'localhost',
  '127.0.0.1': 'localhost',
  '::1': 'localhost',
  '[::1]': 'localhost',
  '169.254.169.254': 'cloud metadata endpoints',
  'metadata.google.internal': 'cloud metadata endpoints',
};

/** IPv4 ranges refused as webhook targets: [first octet, second octet range, label]. */
const BLOCKED_IPV4_RANGES: ReadonlyArray<[number, [number, number], string]> = [
  [0, [0, 255], 'unspecified address'],
  [10, [0, 255], 'private IP range'],
  [127, [0, 255], 'localhost'],
  [169, [254, 254], 'link-local range'],
  [172, [16, 31], 'private IP range'],
  [192, [168, 168], 'private IP range'],
];

/**
 * Validate that a webhook URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 */
export function validateWebhookUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();
  const blockedHost = BLOCKED_HOSTS[hostname];
  if (blockedHost) {
    return `Webhook URL must not point to ${blockedHost}: ${hostname}`;
  }

  const ipv4 = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4) {
    const first = Number(ipv4[1]);
    const second = Number(ipv4[2]);
    for (const [octet, [low, high], label] of BLOCKED_IPV4_RANGES) {
      if (first === octet && second >= low && second <= high) {
        return `Webhook URL must not point to ${label}: ${hostname}`;
      }
    }
  }

  return null;
}

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * RETRY LOGIC
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Delivery retries up to 3 times with exponential backoff (1s, 2s, 4s)
 * on network errors and 5xx responses. 4xx responses fail immediately.
 * ═══════════════════════════════════════════════════════════════════════════
 */
const WEBHOOK_MAX_RETRIES = 3;
const WEBHOOK_BACKOFF_BASE_MS = 1000;
const WEBHOOK_REQUEST_TIMEOUT_MS = 10_000;

/** HTTP webhook delivery using native fetch with HMAC signing and retry. */
export const httpDelivery: WebhookDeliveryFn = async (
  url: string,
  payload: WebhookPayload,
  signingSecret?: string,
) => {
  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'validation-process-service-webhook/0.1.0',
    'X-Webhook-Id': payload.id,
    'X-Webhook-Event': payload.event,
  };

  if (signingSecret) {
    headers['X-Webhook-Signature'] = signPayload(body, signingSecret);
  }

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= WEBHOOK_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await sleep(computeBackoff('exponential', WEBHOOK_BACKOFF_BASE_MS, attempt));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), WEBHOOK_REQUEST_TIMEOUT_MS);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });
      clearTimeout(timeout);

      // Anything below 500 is final, including 4xx rejections
      if (response.status < 500) {
        return { statusCode: response.status };
      }

      lastError = new Error(`Webhook returned HTTP ${response.status}`);
    } catch (err) {
      clearTimeout(timeout);
      lastError = err instanceof Error ? err : new Error('Unknown webhook error');
    }
  }

  throw lastError ?? new Error('Webhook delivery failed after retries');
};

/** Delivers process events to a webhook endpoint. */
export class WebhookNotifier {
  private readonly deliveryFn: WebhookDeliveryFn;
  private readonly events: readonly ProcessEventType[];
  private readonly log: Logger;
  /** Record of delivery attempts for inspection. */
  private deliveryLog: WebhookDeliveryResult[] = [];

  constructor(
    private readonly config: WebhookConfig,
    deliveryFn?: WebhookDeliveryFn,
    log: Logger = rootLogger,
  ) {
    this.deliveryFn = deliveryFn ?? httpDelivery;
    this.events = config.events ?? TERMINAL_EVENT_TYPES;
    this.log = log.child({ component: 'webhook' });
  }

  /** Subscribe to a publisher. Returns the unsubscribe function. */
  attach(publisher: ProcessEventPublisher): () => void {
    return publisher.subscribe({
      id: `sub_webhook_${uuid()}`,
      eventTypes: [...this.events],
      callback: async (event) => {
        await this.notify(event);
      },
    });
  }

  /** Send a webhook notification for a process event. */
  async notify(event: ProcessEvent): Promise<WebhookDeliveryResult> {
    const payload = buildPayload(event);

    // SSRF protection: validate URL before making any request
    const urlError = validateWebhookUrl(this.config.url);
    if (urlError) {
      return this.record({ success: false, error: urlError, payload });
    }

    if (!this.events.includes(event.type)) {
      return { success: true, payload };
    }

    try {
      const response = await this.deliveryFn(this.config.url, payload, this.config.signingSecret);
      return this.record({
        success: response.statusCode >= 200 && response.statusCode < 300,
        statusCode: response.statusCode,
        payload,
      });
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Webhook delivery failed';
      return this.record({ success: false, error: errorMessage, payload });
    }
  }

  /** Get delivery log. */
  getDeliveryLog(): WebhookDeliveryResult[] {
    return [...this.deliveryLog];
  }

  private record(result: WebhookDeliveryResult): WebhookDeliveryResult {
    this.deliveryLog.push(result);
    if (!result.success) {
      this.log.warn('Webhook delivery failed', {
        processId: result.payload.processId,
        event: result.payload.event,
        statusCode: result.statusCode,
        error: result.error,
      });
    }
    return result;
  }
}

function buildPayload(event: ProcessEvent): WebhookPayload {
  const payload: WebhookPayload = {
    id: `whk_${uuid()}`,
    event: event.type,
    timestamp: new Date().toISOString(),
    processId: event.processId,
    subjectId: event.subjectId,
    status: event.payload.status,
    message: event.payload.message,
  };
  if (event.payload.errorDetail) payload.errorDetail = event.payload.errorDetail;
  return payload;
}
