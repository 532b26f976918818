/**
 * Application credential encoding.
 * @module auth
 */

import type { SecretString } from '../config/index.js';

/**
 * Encodes `pushApplicationId:masterSecret` as standard Base64 over UTF-8.
 *
 * The result carries no scheme label; the transport adds `Basic `.
 */
export function encodeCredentials(
  pushApplicationId: string,
  masterSecret: string | SecretString
): string {
  const secret = typeof masterSecret === 'string' ? masterSecret : masterSecret.expose();
  return Buffer.from(`${pushApplicationId}:${secret}`, 'utf-8').toString('base64');
}

/**
 * Formats a pre-encoded token as an HTTP Basic authorization value.
 */
export function basicAuthorization(token: string): string {
  return `Basic ${token}`;
}
