import net from 'net';
import tls from 'tls';
import { logger, errorMessage } from '../../utils/logger.js';
import { daysBetween, type ClockFn } from '../../utils/time.js';

const log = logger('Certificates');

/**
 * Looks up how many days remain on a host's TLS certificate
 */
export interface CertificateInspector {
  /** Whole days until expiry, or undefined when unknown */
  daysUntilExpiry(url: string): Promise<number | undefined>;
}

/**
 * Default inspector: certificate expiry is not inspected
 */
export class UnknownCertificateInspector implements CertificateInspector {
  async daysUntilExpiry(_url: string): Promise<number | undefined> {
    return undefined;
  }
}

/**
 * Reads the peer certificate with a bare TLS handshake
 */
export class TlsCertificateInspector implements CertificateInspector {
  private readonly timeoutMs: number;
  private readonly clock: ClockFn;

  constructor(options: { timeoutMs?: number; clock?: ClockFn } = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.clock = options.clock ?? Date.now;
  }

  async daysUntilExpiry(url: string): Promise<number | undefined> {
    let host: string;
    let port: number;
    try {
      const parsed = new URL(url);
      host = parsed.hostname;
      port = parsed.port ? Number(parsed.port) : 443;
    } catch (error) {
      log.debug('Cannot parse URL for certificate lookup', { url, error: errorMessage(error) });
      return undefined;
    }

    const validTo = await this.fetchValidTo(host, port);
    if (validTo === undefined) {
      return undefined;
    }

    const expiresAt = Date.parse(validTo);
    if (isNaN(expiresAt)) {
      return undefined;
    }
    return Math.max(0, daysBetween(this.clock(), expiresAt));
  }

  private fetchValidTo(host: string, port: number): Promise<string | undefined> {
    return new Promise((resolve) => {
      const servername = net.isIP(host) ? undefined : host;
      const socket = tls.connect({ host, port, servername, rejectUnauthorized: false }, () => {
        const certificate = socket.getPeerCertificate();
        socket.end();
        resolve(certificate.valid_to || undefined);
      });

      socket.setTimeout(this.timeoutMs, () => {
        log.debug('Certificate lookup timed out', { host, port });
        socket.destroy();
        resolve(undefined);
      });

      socket.on('error', (error) => {
        log.debug('Certificate lookup failed', { host, port, error: error.message });
        resolve(undefined);
      });
    });
  }
}
