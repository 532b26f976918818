/**
 * UnifiedPush sender - main entry point.
 *
 * Posts messages to the sender endpoint of a UnifiedPush server.
 */

import {
  PushConfig,
  PushConfigBuilder,
  ProxyConfig,
  SecretString,
  TrustStoreConfig,
  buildSenderUrl,
} from '../config/index.js';
import { loadPushConfigFile } from '../config/file.js';
import { PushTransport, UndiciTransport } from '../transport/index.js';
import {
  Logger,
  MetricsCollector,
  NoopLogger,
  NoopMetricsCollector,
  MetricNames,
} from '../observability/index.js';
import {
  MessageResponseCallback,
  PushMessage,
  SendFailure,
  SendResult,
  serializeMessage,
} from '../types/index.js';
import { PushError, toTransportError } from '../errors/index.js';
import { RequestSubmitter } from './submitter.js';

/**
 * Push sender options.
 */
export interface PushSenderOptions {
  /** Transport instance. Default: {@link UndiciTransport} */
  transport?: PushTransport;
  /** Logger instance */
  logger?: Logger;
  /** Metrics collector instance */
  metrics?: MetricsCollector;
}

// ============================================================================
// Push Sender
// ============================================================================

/**
 * Sends messages to a UnifiedPush server.
 *
 * The configuration is frozen at build time, so one sender can serve any
 * number of concurrent sends.
 *
 * @example
 * ```typescript
 * const sender = PushSender.withRootServerURL('https://push.example.com/ag-push')
 *   .pushApplicationId('my-app-id')
 *   .masterSecret('my-master-secret')
 *   .build();
 *
 * const result = await sender.send('{"alert":"Hello"}');
 * if (!result.ok) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export class PushSender {
  private readonly config: PushConfig;
  private readonly transport: PushTransport;
  private readonly submitter: RequestSubmitter;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  private constructor(
    config: PushConfig,
    transport: PushTransport,
    logger: Logger,
    metrics: MetricsCollector
  ) {
    this.config = config;
    this.transport = transport;
    this.logger = logger;
    this.metrics = metrics;
    this.submitter = new RequestSubmitter({ config, transport, logger, metrics });
  }

  /**
   * Creates a new sender from a built configuration.
   */
  static create(config: PushConfig, options: PushSenderOptions = {}): PushSender {
    return new PushSender(
      config,
      options.transport ?? new UndiciTransport(),
      options.logger ?? new NoopLogger(),
      options.metrics ?? new NoopMetricsCollector()
    );
  }

  /**
   * Starts a builder for the given root server URL.
   * @throws ConfigurationError if the URL is empty
   */
  static withRootServerURL(rootServerURL: string): PushSenderBuilder {
    return new PushSenderBuilder().withRootServerURL(rootServerURL);
  }

  /**
   * Starts a builder from a JSON configuration file.
   * @throws ConfigurationError if the file cannot be loaded or has no server URL
   */
  static withConfig(location: string): PushSenderBuilder {
    const file = loadPushConfigFile(location);
    return new PushSenderBuilder()
      .withRootServerURL(file.serverUrl)
      .pushApplicationId(file.pushApplicationId)
      .masterSecret(file.masterSecret);
  }

  /**
   * Starts a builder from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): PushSenderBuilder {
    return PushSenderBuilder.fromEnv(env);
  }

  get serverURL(): string {
    return this.config.serverURL;
  }

  get pushApplicationId(): string {
    return this.config.pushApplicationId;
  }

  get masterSecret(): SecretString {
    return this.config.masterSecret;
  }

  get proxy(): ProxyConfig | undefined {
    return this.config.proxy;
  }

  get customTrustStore(): TrustStoreConfig | undefined {
    return this.config.trustStore;
  }

  get configuration(): PushConfig {
    return this.config;
  }

  /**
   * URL of the sender endpoint.
   * @throws ConfigurationError if the server URL is empty
   */
  buildUrl(): string {
    return buildSenderUrl(this.config.serverURL);
  }

  /**
   * Sends a message.
   *
   * The returned promise never rejects: server, network and callback failures
   * come back as `{ ok: false }` and go to `callback.onError`. An error thrown
   * by `onComplete` is reported the same way. Without a callback failures are
   * logged and only visible in the result.
   *
   * @throws ConfigurationError synchronously if the server URL is empty
   */
  send(message: PushMessage, callback?: MessageResponseCallback): Promise<SendResult> {
    const url = this.buildUrl();
    const payload = serializeMessage(message);
    return this.deliver(url, payload, callback);
  }

  /**
   * Releases transport resources.
   */
  async close(): Promise<void> {
    await this.transport.close?.();
  }

  private async deliver(
    url: string,
    payload: string,
    callback: MessageResponseCallback | undefined
  ): Promise<SendResult> {
    const startTime = Date.now();

    const result = await this.submitter.submit(
      url,
      payload,
      this.config.pushApplicationId,
      this.config.masterSecret
    );

    this.metrics.recordHistogram(MetricNames.SEND_LATENCY, (Date.now() - startTime) / 1000);

    if (!result.ok) {
      return this.fail(result.error, callback);
    }

    try {
      callback?.onComplete(result.statusCode);
    } catch (error) {
      return this.fail(toTransportError(error), callback);
    }
    this.metrics.incrementCounter(MetricNames.SEND_COMPLETED, 1, {
      status: String(result.statusCode),
    });
    return result;
  }

  private fail(error: PushError, callback: MessageResponseCallback | undefined): SendFailure {
    this.metrics.incrementCounter(MetricNames.SEND_FAILED, 1, { code: error.code });
    this.logger.error(
      callback ? 'Send did not succeed' : 'Send did not succeed, no callback registered',
      { code: error.code, error: error.message }
    );

    try {
      callback?.onError(error);
    } catch (callbackError) {
      this.logger.error('Error callback threw', {
        error: callbackError instanceof Error ? callbackError.message : String(callbackError),
      });
    }
    return { ok: false, error };
  }
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Configuration builder that produces a {@link PushSender}.
 */
export class PushSenderBuilder extends PushConfigBuilder {
  private readonly senderOptions: PushSenderOptions = {};

  /**
   * Sets the transport used for every request.
   */
  withTransport(transport: PushTransport): this {
    this.senderOptions.transport = transport;
    return this;
  }

  /**
   * Sets the logger.
   */
  withLogger(logger: Logger): this {
    this.senderOptions.logger = logger;
    return this;
  }

  /**
   * Sets the metrics collector.
   */
  withMetrics(metrics: MetricsCollector): this {
    this.senderOptions.metrics = metrics;
    return this;
  }

  /**
   * Builds the sender.
   * @throws ConfigurationError if the configuration is incomplete
   */
  build(): PushSender {
    return PushSender.create(this.buildConfig(), { ...this.senderOptions });
  }
}
