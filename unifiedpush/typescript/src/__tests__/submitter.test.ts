/**
 * Tests for the request submitter.
 */

import { describe, it, expect } from 'vitest';
import {
  RequestSubmitter,
  PushConfigBuilder,
  SecretString,
  NoopLogger,
  NoopMetricsCollector,
  InvalidRedirectError,
  isRedirect,
  resolveRedirect,
} from '../index.js';
import { FakeTransport, sequence } from './fake-transport.js';

describe('isRedirect', () => {
  it('should accept 301, 302 and 303 only', () => {
    expect([300, 301, 302, 303, 304, 307, 308].filter(isRedirect)).toEqual([301, 302, 303]);
  });
});

describe('resolveRedirect', () => {
  it('should keep absolute locations', () => {
    expect(
      resolveRedirect('https://a.example.com/rest/sender/', 302, 'https://b.example.com/rest/sender/')
    ).toBe('https://b.example.com/rest/sender/');
  });

  it('should resolve relative locations', () => {
    expect(resolveRedirect('https://a.example.com/ag-push/rest/sender/', 301, '../v2/')).toBe(
      'https://a.example.com/ag-push/rest/v2/'
    );
  });

  it('should reject empty locations', () => {
    expect(() => resolveRedirect('https://a.example.com/', 302, '')).toThrow(InvalidRedirectError);
    expect(() => resolveRedirect('https://a.example.com/', 302, undefined)).toThrow(
      'Redirect (302) without a Location header'
    );
  });
});

describe('RequestSubmitter', () => {
  const config = new PushConfigBuilder()
    .withRootServerURL('https://a.example.com')
    .withMaxRedirects(2)
    .buildConfig();

  it('should carry the same credentials across redirects', async () => {
    const transport = new FakeTransport(
      sequence(
        { statusCode: 302, location: 'https://b.example.com/' },
        { statusCode: 303, location: 'https://c.example.com/' },
        { statusCode: 204 }
      )
    );
    const submitter = new RequestSubmitter({
      config,
      transport,
      logger: new NoopLogger(),
      metrics: new NoopMetricsCollector(),
    });

    const result = await submitter.submit(
      'https://a.example.com/rest/sender/',
      'payload',
      'test-app',
      new SecretString('test-secret')
    );

    expect(result).toEqual({ ok: true, statusCode: 204, redirects: 2, url: 'https://c.example.com/' });
    expect(transport.requests.map((r) => r.url)).toEqual([
      'https://a.example.com/rest/sender/',
      'https://b.example.com/',
      'https://c.example.com/',
    ]);
    expect(new Set(transport.requests.map((r) => r.authorization))).toEqual(
      new Set(['dGVzdC1hcHA6dGVzdC1zZWNyZXQ='])
    );
    expect(transport.requests.every((r) => r.userAgent === config.userAgent)).toBe(true);
  });

  it('should never reject', async () => {
    const transport = new FakeTransport(() => {
      throw new Error('offline');
    });
    const submitter = new RequestSubmitter({
      config,
      transport,
      logger: new NoopLogger(),
      metrics: new NoopMetricsCollector(),
    });

    const result = await submitter.submit('https://a.example.com/rest/sender/', 'p', 'a', new SecretString('s'));

    expect(result.ok).toBe(false);
  });
});
