import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import {
  Prober,
  USER_AGENTS,
  hasUserAgent,
  isExpectedStatus,
  randomUserAgent,
  type CertificateInspector,
} from '../../src/services/prober/index.js';
import { MockHttpServer } from '../mocks/httpServer.js';
import { createTarget } from '../fixtures/targets.js';

describe('Prober', () => {
  let server: MockHttpServer;

  beforeAll(async () => {
    server = new MockHttpServer();
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(() => {
    server.requests.length = 0;
  });

  describe('status classification', () => {
    it('should accept a listed redirect status without following it', async () => {
      server.route('/moved', { status: 301, headers: { Location: '/elsewhere' } });
      const prober = new Prober();

      const check = await prober.probe(
        createTarget({ url: server.url('/moved'), expectedStatus: [200, 301, 302] })
      );

      expect(check.success).toBe(true);
      expect(check.statusCode).toBe(301);
      expect(check.error).toBeUndefined();
      expect(server.requests.map((r) => r.path)).toEqual(['/moved']);
    });

    it('should fail an unlisted status without an error text', async () => {
      server.route('/missing', { status: 404, body: 'nothing here' });
      const prober = new Prober();

      const check = await prober.probe(
        createTarget({ url: server.url('/missing'), expectedStatus: [200, 301, 302] })
      );

      expect(check.success).toBe(false);
      expect(check.statusCode).toBe(404);
      expect(check.error).toBeUndefined();
    });

    it('should not wait for the body of an unlisted status', async () => {
      server.route('/endless', { status: 404, body: 'still sending', hangBody: true });
      const prober = new Prober();
      const started = Date.now();

      const check = await prober.probe(
        createTarget({
          url: server.url('/endless'),
          expectedStatus: [200],
          expectedContent: 'ok',
          timeoutMs: 3000,
        })
      );

      expect(Date.now() - started).toBeLessThan(1000);
      expect(check.success).toBe(false);
      expect(check.statusCode).toBe(404);
    });

    it('should accept any 2xx when no status is listed', async () => {
      server.route('/created', { status: 204 });
      const prober = new Prober();

      const check = await prober.probe(createTarget({ url: server.url('/created') }));

      expect(check.success).toBe(true);
      expect(check.statusCode).toBe(204);
    });

    it('should follow redirects when asked to', async () => {
      server.route('/old', { status: 302, headers: { Location: '/new' } });
      server.route('/new', { status: 200, body: 'arrived' });
      const prober = new Prober();

      const check = await prober.probe(createTarget({ url: server.url('/old'), followRedirects: true }));

      expect(check.success).toBe(true);
      expect(check.statusCode).toBe(200);
      expect(server.requests.map((r) => r.path)).toEqual(['/old', '/new']);
    });
  });

  describe('content matching', () => {
    it('should succeed when the body contains the expected content', async () => {
      server.route('/health', { status: 200, body: '{"status":"ok","version":"1.2.3"}' });
      const prober = new Prober();

      const check = await prober.probe(
        createTarget({ url: server.url('/health'), expectedContent: '"status":"ok"' })
      );

      expect(check.success).toBe(true);
      expect(check.error).toBeUndefined();
    });

    it('should report a content mismatch distinctly', async () => {
      server.route('/health', { status: 200, body: '{"status":"down"}' });
      const prober = new Prober();

      const check = await prober.probe(
        createTarget({ url: server.url('/health'), expectedContent: '"status":"ok"' })
      );

      expect(check.success).toBe(false);
      expect(check.statusCode).toBe(200);
      expect(check.error).toBe(`Expected content '"status":"ok"' not found in response`);
    });

    it('should fail when the body does not arrive within the timeout', async () => {
      server.route('/stalled', { status: 200, body: '{"status":', hangBody: true });
      const prober = new Prober();

      const check = await prober.probe(
        createTarget({ url: server.url('/stalled'), expectedContent: '"status":"ok"', timeoutMs: 300 })
      );

      expect(check.success).toBe(false);
      expect(check.statusCode).toBe(200);
      expect(check.error).toMatch(/^Failed to read response body: body not received within \d+ms$/);
    });
  });

  describe('network failures', () => {
    it('should describe a refused connection', async () => {
      const closed = new MockHttpServer();
      await closed.start();
      const url = closed.url('/health');
      await closed.stop();
      const prober = new Prober();

      const check = await prober.probe(createTarget({ url }));

      expect(check.success).toBe(false);
      expect(check.statusCode).toBeUndefined();
      expect(check.error).toBe(`Connection refused (${url})`);
    });

    it('should time out a slow response', async () => {
      server.route('/slow', { status: 200, delayMs: 2000 });
      const prober = new Prober();

      const check = await prober.probe(createTarget({ url: server.url('/slow'), timeoutMs: 100 }));

      expect(check.success).toBe(false);
      expect(check.statusCode).toBeUndefined();
      expect(check.error).toBe('Request timed out after 100ms');
    });
  });

  describe('request shape', () => {
    it('should send the configured method and headers', async () => {
      server.route('/echo', { status: 200 });
      const prober = new Prober();

      await prober.probe(
        createTarget({ url: server.url('/echo'), method: 'POST', headers: { 'X-Api-Key': 'test-secret' } })
      );

      expect(server.requests[0]?.method).toBe('POST');
      expect(server.requests[0]?.headers['x-api-key']).toBe('test-secret');
    });

    it('should add a browser User-Agent when none is configured', async () => {
      server.route('/ua', { status: 200 });
      const prober = new Prober({ userAgent: () => 'test-agent/1.0' });

      await prober.probe(createTarget({ url: server.url('/ua') }));

      expect(server.requests[0]?.headers['user-agent']).toBe('test-agent/1.0');
    });

    it('should keep a configured User-Agent in any casing', async () => {
      server.route('/ua', { status: 200 });
      const prober = new Prober({ userAgent: () => 'test-agent/1.0' });

      await prober.probe(createTarget({ url: server.url('/ua'), headers: { 'user-agent': 'custom/2.0' } }));

      expect(server.requests[0]?.headers['user-agent']).toBe('custom/2.0');
    });
  });

  describe('certificates', () => {
    it('should not inspect certificates for plain http', async () => {
      server.route('/plain', { status: 200 });
      const lookups: string[] = [];
      const certificates: CertificateInspector = {
        daysUntilExpiry: async (url) => {
          lookups.push(url);
          return 5;
        },
      };
      const prober = new Prober({ certificates });

      const check = await prober.probe(createTarget({ url: server.url('/plain') }));

      expect(lookups).toEqual([]);
      expect(check.certExpiresDays).toBeUndefined();
    });
  });

  it('should freeze the returned check', async () => {
    server.route('/frozen', { status: 200 });
    const check = await new Prober().probe(createTarget({ url: server.url('/frozen') }));

    expect(Object.isFrozen(check)).toBe(true);
  });
});

describe('isExpectedStatus', () => {
  it('should use the list when present', () => {
    expect(isExpectedStatus(301, [200, 301, 302])).toBe(true);
    expect(isExpectedStatus(200, [201])).toBe(false);
  });

  it('should accept only 2xx for an empty list', () => {
    expect(isExpectedStatus(200, [])).toBe(true);
    expect(isExpectedStatus(299, [])).toBe(true);
    expect(isExpectedStatus(301, [])).toBe(false);
    expect(isExpectedStatus(500, [])).toBe(false);
  });
});

describe('User-Agent rotation', () => {
  it('should pick from the fixed list', () => {
    expect(randomUserAgent(() => 0)).toBe(USER_AGENTS[0]);
    expect(randomUserAgent(() => 0.999999)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
  });

  it('should detect User-Agent headers case-insensitively', () => {
    expect(hasUserAgent({ 'USER-AGENT': 'x' })).toBe(true);
    expect(hasUserAgent({ Accept: 'text/plain' })).toBe(false);
  });
});
