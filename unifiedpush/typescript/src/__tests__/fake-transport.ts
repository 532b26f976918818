/**
 * In-process transport stand-in for sender tests.
 */

import type { PushTransport, TransportRequest, TransportResponse } from '../index.js';

export interface FakeReply {
  statusCode?: number;
  location?: string;
  /** Thrown when the status code is read, like a failed connect */
  failure?: Error;
  /** Rejection of release() */
  releaseFailure?: Error;
  /** Delay before the reply is produced (ms) */
  delayMs?: number;
}

export type Responder = (request: TransportRequest, index: number) => FakeReply;

export class FakeTransport implements PushTransport {
  readonly requests: TransportRequest[] = [];
  releases = 0;
  closed = false;

  constructor(private readonly respond: Responder) {}

  async post(request: TransportRequest): Promise<TransportResponse> {
    const index = this.requests.length;
    this.requests.push(request);
    const reply = this.respond(request, index);
    if (reply.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
    }
    const headers = new Map<string, string>();
    if (reply.location !== undefined) {
      headers.set('location', reply.location);
    }

    return {
      get statusCode(): number {
        if (reply.failure) {
          throw reply.failure;
        }
        return reply.statusCode ?? 200;
      },
      header: (name) => headers.get(name.toLowerCase()),
      release: async () => {
        this.releases++;
        if (reply.releaseFailure) {
          throw reply.releaseFailure;
        }
      },
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Replies with the given sequence, repeating the last entry.
 */
export function sequence(...replies: FakeReply[]): Responder {
  return (_request, index) => replies[Math.min(index, replies.length - 1)];
}
