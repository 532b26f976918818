/**
 * Send outcome types.
 */

import type { PushError } from '../errors/index.js';

/**
 * The push server answered with a non-redirect status.
 *
 * The status code is reported verbatim: a 4xx or 5xx is still a completed send.
 */
export interface SendSuccess {
  readonly ok: true;
  readonly statusCode: number;
  /** Number of redirects followed */
  readonly redirects: number;
  /** URL that produced the final response */
  readonly url: string;
}

/**
 * The submission failed before a terminal response was reached.
 */
export interface SendFailure {
  readonly ok: false;
  readonly error: PushError;
}

export type SendResult = SendSuccess | SendFailure;

/**
 * Callback notified once per send.
 */
export interface MessageResponseCallback {
  onComplete(statusCode: number): void;
  onError(error: PushError): void;
}
