/**
 * HTTP transport layer for the UnifiedPush sender endpoint.
 *
 * The transport performs exactly one POST per call and never follows
 * redirects; redirect handling belongs to the submitter.
 *
 * @module transport
 */

import { request, type Dispatcher } from 'undici';
import type { ProxyConfig, TrustStoreConfig } from '../config/index.js';
import { DEFAULT_USER_AGENT } from '../config/index.js';
import { basicAuthorization } from '../auth/index.js';
import { createDispatcher } from './dispatcher.js';

/**
 * A single POST to the push server.
 */
export interface TransportRequest {
  /** Absolute target URL */
  url: string;
  /** Base64 credential token, without scheme label */
  authorization: string;
  /** Serialized message */
  payload: string;
  /** Encoding of the payload on the wire */
  charset: 'utf-8';
  proxy?: ProxyConfig;
  trustStore?: TrustStoreConfig;
  userAgent?: string;
}

/**
 * Handle on a response. Must be released once the caller is done with it.
 */
export interface TransportResponse {
  readonly statusCode: number;
  /** Case-insensitive header lookup */
  header(name: string): string | undefined;
  /** Frees the underlying connection. Safe to call more than once. */
  release(): Promise<void>;
}

/**
 * Transport interface for posting payloads.
 *
 * @example
 * ```typescript
 * class StaticTransport implements PushTransport {
 *   async post(): Promise<TransportResponse> {
 *     return {
 *       statusCode: 200,
 *       header: () => undefined,
 *       release: async () => {},
 *     };
 *   }
 * }
 * ```
 */
export interface PushTransport {
  post(request: TransportRequest): Promise<TransportResponse>;
  /** Releases long-lived resources such as connection pools */
  close?(): Promise<void>;
}

/**
 * Options for {@link UndiciTransport}.
 */
export interface UndiciTransportOptions {
  /**
   * Dispatcher used for every request. Takes precedence over the proxy and
   * trust store settings of the request; not closed by the transport.
   */
  dispatcher?: Dispatcher;
  /** Time to wait for response headers (ms). Default: undici's */
  headersTimeoutMs?: number;
  /** Time allowed between body chunks (ms). Default: undici's */
  bodyTimeoutMs?: number;
  /** Builds the dispatcher for a proxy and trust store pair. Default: {@link createDispatcher} */
  dispatcherFactory?: typeof createDispatcher;
}

/**
 * Response handle over an undici response.
 */
class UndiciResponse implements TransportResponse {
  private released = false;

  constructor(private readonly data: Dispatcher.ResponseData) {}

  get statusCode(): number {
    return this.data.statusCode;
  }

  header(name: string): string | undefined {
    const value = this.data.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    // Drain the body so the socket goes back to the pool
    await this.data.body.dump();
  }
}

/**
 * undici-based transport.
 *
 * Dispatchers are created on first use for each proxy and trust store pair,
 * keyed by the frozen config objects, and kept until {@link UndiciTransport.close}.
 */
export class UndiciTransport implements PushTransport {
  private readonly options: UndiciTransportOptions;
  private readonly dispatchers = new Map<
    ProxyConfig | undefined,
    Map<TrustStoreConfig | undefined, Dispatcher | undefined>
  >();

  constructor(options: UndiciTransportOptions = {}) {
    this.options = { ...options };
  }

  async post(req: TransportRequest): Promise<TransportResponse> {
    const response = await request(req.url, {
      method: 'POST',
      headers: {
        'authorization': basicAuthorization(req.authorization),
        'content-type': `application/json;charset=${req.charset}`,
        'accept': 'application/json',
        'user-agent': req.userAgent ?? DEFAULT_USER_AGENT,
      },
      // undici writes string bodies as UTF-8
      body: req.payload,
      dispatcher: this.dispatcherFor(req.proxy, req.trustStore),
      headersTimeout: this.options.headersTimeoutMs,
      bodyTimeout: this.options.bodyTimeoutMs,
    });

    return new UndiciResponse(response);
  }

  async close(): Promise<void> {
    const owned: Dispatcher[] = [];
    for (const byTrustStore of this.dispatchers.values()) {
      for (const dispatcher of byTrustStore.values()) {
        if (dispatcher) {
          owned.push(dispatcher);
        }
      }
    }
    this.dispatchers.clear();
    await Promise.all(owned.map((dispatcher) => dispatcher.close()));
  }

  private dispatcherFor(
    proxy: ProxyConfig | undefined,
    trustStore: TrustStoreConfig | undefined
  ): Dispatcher | undefined {
    if (this.options.dispatcher) {
      return this.options.dispatcher;
    }

    let byTrustStore = this.dispatchers.get(proxy);
    if (!byTrustStore) {
      byTrustStore = new Map();
      this.dispatchers.set(proxy, byTrustStore);
    }
    if (!byTrustStore.has(trustStore)) {
      const factory = this.options.dispatcherFactory ?? createDispatcher;
      byTrustStore.set(trustStore, factory(proxy, trustStore));
    }
    return byTrustStore.get(trustStore);
  }
}
