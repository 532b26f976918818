/**
 * Submission of a payload to the sender endpoint, following redirects.
 */

import type { PushConfig, SecretString } from '../config/index.js';
import { encodeCredentials } from '../auth/index.js';
import {
  InvalidRedirectError,
  TooManyRedirectsError,
  toTransportError,
} from '../errors/index.js';
import type { PushTransport, TransportResponse } from '../transport/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import { MetricNames } from '../observability/index.js';
import type { SendResult } from '../types/index.js';

/**
 * Status codes that trigger a resubmission: 301, 302 and 303.
 */
export const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([301, 302, 303]);

/**
 * Checks if the given status code is a redirect.
 */
export function isRedirect(statusCode: number): boolean {
  return REDIRECT_STATUS_CODES.has(statusCode);
}

/**
 * Resolves a Location header against the URL that returned it.
 * @throws InvalidRedirectError if the header is missing or not a URL
 */
export function resolveRedirect(
  currentUrl: string,
  statusCode: number,
  location: string | undefined
): string {
  if (location === undefined || location.trim().length === 0) {
    throw new InvalidRedirectError(statusCode, location);
  }
  try {
    return new URL(location, currentUrl).toString();
  } catch (error) {
    throw new InvalidRedirectError(
      statusCode,
      location,
      error instanceof Error ? error : undefined
    );
  }
}

type PostOutcome =
  | { kind: 'complete'; statusCode: number }
  | { kind: 'redirect'; statusCode: number; location: string };

/**
 * Posts a payload and walks the redirect chain until a terminal status.
 *
 * Never rejects: every failure comes back as a failed {@link SendResult}.
 */
export class RequestSubmitter {
  private readonly config: PushConfig;
  private readonly transport: PushTransport;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: {
    config: PushConfig;
    transport: PushTransport;
    logger: Logger;
    metrics: MetricsCollector;
  }) {
    this.config = options.config;
    this.transport = options.transport;
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  async submit(
    url: string,
    payload: string,
    pushApplicationId: string,
    masterSecret: SecretString
  ): Promise<SendResult> {
    let currentUrl = url;
    let redirects = 0;

    try {
      const authorization = encodeCredentials(pushApplicationId, masterSecret);

      for (;;) {
        const outcome = await this.post(currentUrl, authorization, payload);

        if (outcome.kind === 'complete') {
          return { ok: true, statusCode: outcome.statusCode, redirects, url: currentUrl };
        }

        if (redirects >= this.config.maxRedirects) {
          throw new TooManyRedirectsError(this.config.maxRedirects, outcome.location);
        }

        this.logger.info('Performing redirect', {
          statusCode: outcome.statusCode,
          location: outcome.location,
        });
        this.metrics.incrementCounter(MetricNames.REDIRECTS_TOTAL, 1, {
          status: String(outcome.statusCode),
        });

        redirects++;
        currentUrl = outcome.location;
      }
    } catch (error) {
      return { ok: false, error: toTransportError(error) };
    }
  }

  /**
   * One POST. The response is released once on every path out of here.
   */
  private async post(url: string, authorization: string, payload: string): Promise<PostOutcome> {
    this.metrics.incrementCounter(MetricNames.REQUESTS_TOTAL, 1);

    const response = await this.transport.post({
      url,
      authorization,
      payload,
      charset: 'utf-8',
      proxy: this.config.proxy,
      trustStore: this.config.trustStore,
      userAgent: this.config.userAgent,
    });

    try {
      const statusCode = response.statusCode;
      this.logger.info('HTTP response from UnifiedPush server', { statusCode, url });

      if (isRedirect(statusCode)) {
        return {
          kind: 'redirect',
          statusCode,
          location: resolveRedirect(url, statusCode, response.header('Location')),
        };
      }
      return { kind: 'complete', statusCode };
    } finally {
      await this.release(response, url);
    }
  }

  /**
   * A failed release is logged; the outcome already read stands.
   */
  private async release(response: TransportResponse, url: string): Promise<void> {
    try {
      await response.release();
    } catch (error) {
      this.logger.warn('Failed to release response', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
