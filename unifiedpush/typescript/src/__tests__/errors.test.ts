/**
 * Tests for UnifiedPush error types.
 */

import { describe, it, expect } from 'vitest';
import {
  PushError,
  PushErrorCode,
  ConfigurationError,
  TransportError,
  InvalidRedirectError,
  TooManyRedirectsError,
  isPushError,
  toTransportError,
} from '../index.js';

describe('PushError', () => {
  it('should serialize to JSON', () => {
    const error = new PushError({
      code: PushErrorCode.TransportError,
      message: 'boom',
      statusCode: 302,
      details: { location: 'https://b.example.com/' },
    });

    expect(error.toJSON()).toEqual({
      name: 'PushError',
      code: PushErrorCode.TransportError,
      message: 'boom',
      statusCode: 302,
      details: { location: 'https://b.example.com/' },
    });
  });

  it('should keep the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new TransportError('connect failed', { cause });
    expect(error.cause).toBe(cause);
    expect(error.code).toBe(PushErrorCode.TransportError);
  });
});

describe('ConfigurationError', () => {
  it('should prefix the message', () => {
    const error = new ConfigurationError('server URL can not be empty');
    expect(error.message).toBe('Configuration error: server URL can not be empty');
    expect(error.name).toBe('ConfigurationError');
    expect(error).toBeInstanceOf(PushError);
  });
});

describe('InvalidRedirectError', () => {
  it('should describe a missing Location header', () => {
    const error = new InvalidRedirectError(302, undefined);
    expect(error.message).toBe('Redirect (302) without a Location header');
    expect(error.code).toBe(PushErrorCode.InvalidRedirect);
    expect(error.statusCode).toBe(302);
    expect(error).toBeInstanceOf(TransportError);
  });

  it('should describe a malformed Location header', () => {
    const error = new InvalidRedirectError(301, 'http://[');
    expect(error.message).toBe('Redirect (301) to invalid location: http://[');
    expect(error.details).toEqual({ location: 'http://[' });
  });
});

describe('TooManyRedirectsError', () => {
  it('should carry the limit', () => {
    const error = new TooManyRedirectsError(5, 'https://loop.example.com/rest/sender/');
    expect(error.code).toBe(PushErrorCode.TooManyRedirects);
    expect(error.message).toBe(
      'Exceeded maximum of 5 redirects (last location: https://loop.example.com/rest/sender/)'
    );
    expect(error.details).toEqual({ maxRedirects: 5, lastUrl: 'https://loop.example.com/rest/sender/' });
  });
});

describe('toTransportError', () => {
  it('should pass push errors through', () => {
    const error = new TooManyRedirectsError(1, 'https://a.example.com/');
    expect(toTransportError(error)).toBe(error);
  });

  it('should wrap plain errors', () => {
    const cause = new Error('socket hang up');
    const error = toTransportError(cause);
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe('Send did not succeed: socket hang up');
    expect(error.cause).toBe(cause);
  });

  it('should wrap non-error values', () => {
    const error = toTransportError('nope');
    expect(error.message).toBe('Send did not succeed: nope');
    expect(error.cause).toBeUndefined();
  });
});

describe('isPushError', () => {
  it('should recognize push errors only', () => {
    expect(isPushError(new ConfigurationError('x'))).toBe(true);
    expect(isPushError(new Error('x'))).toBe(false);
    expect(isPushError('x')).toBe(false);
  });
});
