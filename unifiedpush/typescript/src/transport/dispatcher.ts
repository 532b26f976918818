/**
 * undici dispatchers honoring proxy and trust store settings.
 */

import { readFileSync } from 'fs';
import forge from 'node-forge';
import { Agent, ProxyAgent, buildConnector, type Dispatcher } from 'undici';
import { SocksClient } from 'socks';
import type { ProxyConfig, TrustStoreConfig } from '../config/index.js';
import { encodeCredentials, basicAuthorization } from '../auth/index.js';

/**
 * TLS options derived from a custom trust store.
 */
export interface TrustOptions {
  /** PEM certificates replacing the default CA set */
  ca: string[];
}

/**
 * Reads the certificates of a trust store file. Both formats end up as the
 * CA list; a PKCS12 store contributes every certificate bag it holds.
 */
export function loadTrustStore(trustStore: TrustStoreConfig): TrustOptions {
  if (trustStore.type === 'PKCS12') {
    return {
      ca: readPkcs12Certificates(trustStore.path, trustStore.password?.expose()),
    };
  }
  return { ca: [readFileSync(trustStore.path, 'utf-8')] };
}

function readPkcs12Certificates(path: string, password: string | undefined): string[] {
  const der = readFileSync(path).toString('binary');
  const p12 = forge.pkcs12.pkcs12FromAsn1(forge.asn1.fromDer(der), password ?? '');
  const bags = p12.getBags({ bagType: forge.pki.oids.certBag })[forge.pki.oids.certBag] ?? [];

  const certificates = bags.flatMap((bag) =>
    bag.cert ? [forge.pki.certificateToPem(bag.cert)] : []
  );
  if (certificates.length === 0) {
    throw new Error(`no certificates found in trust store ${path}`);
  }
  return certificates;
}

/**
 * Value of the Proxy-Authorization header, if the proxy has a user.
 */
export function proxyAuthorization(proxy: ProxyConfig): string | undefined {
  if (proxy.user === undefined) {
    return undefined;
  }
  return basicAuthorization(encodeCredentials(proxy.user, proxy.password?.expose() ?? ''));
}

/**
 * Creates a dispatcher for the given settings, or undefined when the
 * global dispatcher already does the job.
 */
export function createDispatcher(
  proxy: ProxyConfig | undefined,
  trustStore: TrustStoreConfig | undefined
): Dispatcher | undefined {
  const tls = trustStore ? loadTrustStore(trustStore) : undefined;

  if (proxy === undefined || proxy.type === 'direct') {
    return tls ? new Agent({ connect: tls }) : undefined;
  }

  if (proxy.type === 'socks') {
    return new Agent({ connect: socksConnector(proxy, tls) });
  }

  return new ProxyAgent({
    uri: `http://${proxy.host}:${proxy.port}`,
    token: proxyAuthorization(proxy),
    requestTls: tls,
  });
}

/**
 * Connector opening each connection through a SOCKS5 tunnel, upgraded to TLS
 * for https targets.
 */
export function socksConnector(
  proxy: ProxyConfig,
  tls: TrustOptions | undefined
): buildConnector.connector {
  const upgradeToTls = buildConnector({ ...tls });

  return (options, callback) => {
    const secure = options.protocol === 'https:';
    const port = Number(options.port) || (secure ? 443 : 80);

    SocksClient.createConnection({
      proxy: {
        host: proxy.host,
        port: proxy.port,
        type: 5,
        userId: proxy.user,
        password: proxy.password?.expose(),
      },
      command: 'connect',
      destination: { host: options.hostname, port },
    }).then(
      ({ socket }) => {
        if (secure) {
          upgradeToTls({ ...options, httpSocket: socket }, callback);
        } else {
          callback(null, socket);
        }
      },
      (error: unknown) => {
        callback(error instanceof Error ? error : new Error(String(error)), null);
      }
    );
  };
}
