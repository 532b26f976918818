/**
 * UnifiedPush Sender
 *
 * Posts push notification messages to the sender endpoint of a UnifiedPush
 * server.
 *
 * ## Features
 *
 * - Application credentials sent as HTTP Basic authorization
 * - HTTP and SOCKS5 proxies
 * - Custom trust store (PEM or PKCS12)
 * - Bounded redirect following (301, 302, 303)
 * - Result values, with an optional callback
 *
 * ## Quick Start
 *
 * ```typescript
 * import { PushSender, ConsoleLogger } from 'unifiedpush-sender';
 *
 * const sender = PushSender.withRootServerURL('https://push.example.com/ag-push')
 *   .pushApplicationId('my-app-id')
 *   .masterSecret('my-master-secret')
 *   .withLogger(new ConsoleLogger())
 *   .build();
 *
 * await sender.send(JSON.stringify({ message: { alert: 'Hello' } }), {
 *   onComplete: (statusCode) => console.log('Delivered', statusCode),
 *   onError: (error) => console.error(error.message),
 * });
 * ```
 *
 * ## Proxy and trust store
 *
 * ```typescript
 * const sender = PushSender.withConfig('./pushConfig.json')
 *   .withProxy({ host: 'proxy.internal', port: 3128, user: 'push', password: 'secret' })
 *   .customTrustStore('./certs/ca.pem')
 *   .build();
 * ```
 *
 * @module unifiedpush-sender
 */

// Client
export { PushSender, PushSenderBuilder } from './client/index.js';
export type { PushSenderOptions } from './client/index.js';
export {
  RequestSubmitter,
  REDIRECT_STATUS_CODES,
  isRedirect,
  resolveRedirect,
} from './client/submitter.js';

// Configuration
export {
  PushConfigBuilder,
  SecretString,
  normalizeServerURL,
  buildSenderUrl,
  SENDER_ENDPOINT_PATH,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_USER_AGENT,
} from './config/index.js';
export type {
  PushConfig,
  ProxyConfig,
  ProxyOptions,
  ProxyType,
  TrustStoreConfig,
  TrustStoreType,
} from './config/index.js';
export { PushConfigFileSchema, loadPushConfigFile } from './config/file.js';
export type { PushConfigFile } from './config/file.js';

// Auth
export { encodeCredentials, basicAuthorization } from './auth/index.js';

// Transport
export { UndiciTransport } from './transport/index.js';
export type {
  PushTransport,
  TransportRequest,
  TransportResponse,
  UndiciTransportOptions,
} from './transport/index.js';
export {
  createDispatcher,
  loadTrustStore,
  proxyAuthorization,
  socksConnector,
} from './transport/dispatcher.js';
export type { TrustOptions } from './transport/dispatcher.js';

// Types
export { serializeMessage } from './types/index.js';
export type {
  SerializableMessage,
  PushMessage,
  SendSuccess,
  SendFailure,
  SendResult,
  MessageResponseCallback,
} from './types/index.js';

// Errors
export {
  PushError,
  PushErrorCode,
  ConfigurationError,
  TransportError,
  InvalidRedirectError,
  TooManyRedirectsError,
  isPushError,
  toTransportError,
} from './errors/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  redactSensitive,
} from './observability/index.js';
export type { Logger, LogEntry, MetricsCollector } from './observability/index.js';
