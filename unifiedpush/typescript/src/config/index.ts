/**
 * UnifiedPush sender configuration and builder.
 */

import { ConfigurationError } from '../errors/index.js';

/**
 * How requests reach the push server.
 */
export type ProxyType = 'http' | 'socks' | 'direct';

/**
 * Format of a custom trust store file.
 */
export type TrustStoreType = 'PEM' | 'PKCS12';

/**
 * Proxy settings applied to every request of a sender.
 */
export interface ProxyConfig {
  readonly type: ProxyType;
  readonly host: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: SecretString;
}

/**
 * Certificate authorities accepted when validating the server certificate,
 * used instead of the platform default set.
 */
export interface TrustStoreConfig {
  /** Path to the trust store file */
  readonly path: string;
  /** File format. Default: PEM */
  readonly type: TrustStoreType;
  /** Password protecting a PKCS12 file */
  readonly password?: SecretString;
}

/**
 * Immutable sender configuration.
 */
export interface PushConfig {
  /** Root URL of the push server, always ending with '/' */
  readonly serverURL: string;
  /** Push application the messages belong to */
  readonly pushApplicationId: string;
  /** Master secret of the push application */
  readonly masterSecret: SecretString;
  readonly proxy?: ProxyConfig;
  readonly trustStore?: TrustStoreConfig;
  /** Redirects followed before giving up. Default: 10 */
  readonly maxRedirects: number;
  /** User agent string */
  readonly userAgent: string;
}

/**
 * Proxy fields accepted by {@link PushConfigBuilder.withProxy}.
 */
export interface ProxyOptions {
  host: string;
  port: number;
  type?: ProxyType;
  user?: string;
  password?: string;
}

/**
 * Relative path of the sender endpoint below the server root.
 */
export const SENDER_ENDPOINT_PATH = 'rest/sender/';

/**
 * Default maximum number of redirects followed per send.
 */
export const DEFAULT_MAX_REDIRECTS = 10;

/**
 * Default user agent for requests.
 */
export const DEFAULT_USER_AGENT = 'unifiedpush-sender-ts/1.0.0';

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns a redacted string for logging.
   */
  toString(): string {
    return '[REDACTED]';
  }

  /**
   * Returns a redacted value for JSON serialization.
   */
  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Appends the trailing separator the endpoint path is resolved against.
 * @throws ConfigurationError if the URL is empty
 */
export function normalizeServerURL(url: string | null | undefined): string {
  if (url === null || url === undefined || url.trim().length === 0) {
    throw new ConfigurationError('server URL can not be empty');
  }
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Builds the URL of the sender endpoint.
 * @throws ConfigurationError if the server URL is empty
 */
export function buildSenderUrl(serverURL: string): string {
  if (!serverURL) {
    throw new ConfigurationError('server URL can not be empty');
  }
  return `${serverURL}${SENDER_ENDPOINT_PATH}`;
}

/**
 * Proxy fields collected before build. Every field is optional until the
 * builder finalizes it.
 */
interface ProxyDraft {
  readonly type: ProxyType;
  readonly host?: string;
  readonly port?: number;
  readonly user?: string;
  readonly password?: string;
}

/**
 * Builder for UnifiedPush sender configuration.
 */
export class PushConfigBuilder {
  private serverURL?: string;
  private applicationId = '';
  private secret = '';
  private proxyDraft?: ProxyDraft;
  private trustStore?: TrustStoreConfig;
  private maxRedirects: number = DEFAULT_MAX_REDIRECTS;
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Sets the root URL of the push server, e.g. https://push.example.com/ag-push.
   * @throws ConfigurationError if the URL is empty
   */
  withRootServerURL(url: string): this {
    this.serverURL = normalizeServerURL(url);
    return this;
  }

  /**
   * Specifies which push application the sender will be using.
   */
  pushApplicationId(pushApplicationId: string): this {
    this.applicationId = pushApplicationId;
    return this;
  }

  /**
   * Sets the master secret used to authenticate against the push server.
   */
  masterSecret(masterSecret: string): this {
    this.secret = masterSecret;
    return this;
  }

  /**
   * Sets a custom trust store, replacing any previous one.
   * The file is read when the first request is made.
   */
  customTrustStore(path: string, type?: TrustStoreType, password?: string): this {
    this.trustStore = Object.freeze({
      path,
      type: type ?? 'PEM',
      password: password === undefined ? undefined : new SecretString(password),
    });
    return this;
  }

  /**
   * Specifies the proxy to connect through. Type defaults to HTTP.
   */
  proxy(host: string, port: number): this {
    return this.updateProxy({ host, port });
  }

  /**
   * Sets the user for proxy authentication.
   */
  proxyUser(user: string): this {
    return this.updateProxy({ user });
  }

  /**
   * Sets the password for proxy authentication.
   */
  proxyPassword(password: string): this {
    return this.updateProxy({ password });
  }

  /**
   * Sets the proxy type.
   */
  proxyType(type: ProxyType): this {
    return this.updateProxy({ type });
  }

  /**
   * Replaces all proxy settings at once.
   */
  withProxy(options: ProxyOptions): this {
    this.proxyDraft = { ...options, type: options.type ?? 'http' };
    return this;
  }

  /**
   * Sets how many redirects a single send follows.
   */
  withMaxRedirects(maxRedirects: number): this {
    if (!Number.isInteger(maxRedirects) || maxRedirects < 0) {
      throw new ConfigurationError('max redirects must be a non-negative integer');
    }
    this.maxRedirects = maxRedirects;
    return this;
  }

  /**
   * Sets the user agent string.
   */
  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - UNIFIEDPUSH_SERVER_URL: root server URL (required)
   * - UNIFIEDPUSH_APPLICATION_ID: push application id
   * - UNIFIEDPUSH_MASTER_SECRET: master secret
   */
  static fromEnv<T extends PushConfigBuilder>(
    this: new () => T,
    env: NodeJS.ProcessEnv = process.env
  ): T {
    const builder = new this().withRootServerURL(
      env.UNIFIEDPUSH_SERVER_URL ?? ''
    );

    const applicationId = env.UNIFIEDPUSH_APPLICATION_ID;
    if (applicationId) {
      builder.pushApplicationId(applicationId);
    }

    const secret = env.UNIFIEDPUSH_MASTER_SECRET;
    if (secret) {
      builder.masterSecret(secret);
    }

    return builder;
  }

  /**
   * Builds the immutable configuration.
   * @throws ConfigurationError if no server URL was set or the proxy is incomplete
   */
  buildConfig(): PushConfig {
    if (this.serverURL === undefined) {
      throw new ConfigurationError('server URL can not be empty');
    }

    return Object.freeze({
      serverURL: this.serverURL,
      pushApplicationId: this.applicationId,
      masterSecret: new SecretString(this.secret),
      proxy: this.proxyDraft ? finalizeProxy(this.proxyDraft) : undefined,
      trustStore: this.trustStore,
      maxRedirects: this.maxRedirects,
      userAgent: this.userAgent,
    });
  }

  private updateProxy(fields: Partial<ProxyDraft>): this {
    const current = this.proxyDraft ?? { type: 'http' };
    this.proxyDraft = { ...current, ...fields, type: fields.type ?? current.type };
    return this;
  }
}

function finalizeProxy(draft: ProxyDraft): ProxyConfig {
  if (draft.type !== 'direct') {
    if (!draft.host) {
      throw new ConfigurationError('proxy host can not be empty');
    }
    if (draft.port === undefined || !Number.isInteger(draft.port) || draft.port <= 0 || draft.port > 65535) {
      throw new ConfigurationError(`invalid proxy port: ${String(draft.port)}`);
    }
  }

  return Object.freeze({
    type: draft.type,
    host: draft.host ?? '',
    port: draft.port ?? 0,
    user: draft.user,
    password: draft.password === undefined ? undefined : new SecretString(draft.password),
  });
}
