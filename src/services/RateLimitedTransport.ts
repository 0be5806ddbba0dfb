import dgram from 'dgram';
import net from 'net';
import logger from '../utils/logger';
import { TransportError, errorCode, errorMessage } from '../utils/errors';
import type { DiagnosticsRecorder } from './DiagnosticsRecorder';

/**
 * The slice of `dgram.Socket` the transport uses; tests pass a fake.
 */
export interface DatagramSocket {
  connect(port: number, address: string, callback: () => void): void;
  send(msg: Buffer, callback: (error: Error | null) => void): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
  close(callback?: () => void): unknown;
}

export type DatagramSocketFactory = (host: string) => DatagramSocket;

export const createUdpSocket: DatagramSocketFactory = (host) => dgram.createSocket(net.isIPv6(host) ? 'udp6' : 'udp4');

/**
 * What the bridge needs from a transport.
 */
export interface TelemetryTransport {
  isDue(nowMs: number): boolean;
  maybeSend(bytes: Buffer, nowMs: number): boolean;
}

export interface RateLimitedTransportOptions {
  host: string;
  port: number;
  sendIntervalMs: number;
  socketFactory?: DatagramSocketFactory;
  diagnostics?: DiagnosticsRecorder;
}

export interface TransportStats {
  connected: boolean;
  lastSentMs: number | null;
  attempted: number;
  delivered: number;
  throttled: number;
  /** Sends skipped while `open()` was still connecting; these leave the interval alone. */
  deferred: number;
  failed: number;
}

/**
 * Fire-and-forget UDP sender allowing at most one datagram per send interval.
 *
 * `lastSentMs` moves before the write is attempted, so a slow or failing
 * write still waits out the full interval. Failures are logged once per
 * outage and counted; nothing is retried and nothing throws to the caller.
 * Until the connect callback fires, sends are skipped without starting the
 * interval, so the first datagram goes out as soon as the socket is ready.
 */
export class RateLimitedTransport implements TelemetryTransport {
  private socket: DatagramSocket | null = null;

  private connected = false;

  private connecting = false;

  private lastSentMs: number | null = null;

  private inOutage = false;

  private failuresInOutage = 0;

  private readonly stats = {
    attempted: 0,
    delivered: 0,
    throttled: 0,
    deferred: 0,
    failed: 0,
  };

  private readonly socketFactory: DatagramSocketFactory;

  constructor(private readonly options: RateLimitedTransportOptions) {
    this.socketFactory = options.socketFactory ?? createUdpSocket;
  }

  /**
   * Create the socket and connect it to the configured peer.
   */
  open(): void {
    if (this.socket) {
      return;
    }

    const { host, port } = this.options;
    const socket = this.socketFactory(host);
    socket.on('error', (error) => {
      if (this.socket === socket) {
        this.connecting = false;
      }
      this.reportFailure(error);
    });
    this.socket = socket;
    this.connecting = true;

    try {
      socket.connect(port, host, () => {
        if (this.socket !== socket) {
          return;
        }
        this.connecting = false;
        this.connected = true;
        logger.info('Telemetry transport connected', { host, port });
      });
    } catch (error) {
      this.connecting = false;
      this.reportFailure(error);
    }
  }

  close(): void {
    if (!this.socket) {
      return;
    }
    const socket = this.socket;
    this.socket = null;
    this.connected = false;
    this.connecting = false;
    try {
      socket.close();
    } catch (error) {
      logger.debug('Telemetry socket already closed', { error: errorMessage(error) });
    }
  }

  isDue(nowMs: number): boolean {
    return this.lastSentMs === null || nowMs - this.lastSentMs >= this.options.sendIntervalMs;
  }

  /**
   * Send `bytes` if the interval has elapsed since the last send.
   * Returns true when a write was attempted.
   */
  maybeSend(bytes: Buffer, nowMs: number): boolean {
    if (this.connecting) {
      this.stats.deferred += 1;
      return false;
    }

    if (!this.isDue(nowMs)) {
      this.stats.throttled += 1;
      return false;
    }

    this.lastSentMs = nowMs;
    this.stats.attempted += 1;

    const socket = this.socket;
    if (!socket || !this.connected) {
      this.reportFailure(new TransportError('Telemetry socket is not connected'));
      return true;
    }

    try {
      socket.send(bytes, (error) => {
        if (error) {
          this.reportFailure(error);
          return;
        }
        this.reportDelivered();
      });
    } catch (error) {
      this.reportFailure(error);
    }
    return true;
  }

  getStats(): TransportStats {
    return {
      connected: this.connected,
      lastSentMs: this.lastSentMs,
      ...this.stats,
    };
  }

  private reportDelivered(): void {
    this.stats.delivered += 1;
    if (this.inOutage) {
      logger.info('Telemetry transport recovered', {
        host: this.options.host,
        port: this.options.port,
        failedSends: this.failuresInOutage,
      });
      this.inOutage = false;
      this.failuresInOutage = 0;
    }
  }

  private reportFailure(error: unknown): void {
    this.stats.failed += 1;
    this.failuresInOutage += 1;
    const details = {
      host: this.options.host,
      port: this.options.port,
      error: errorMessage(error),
      code: errorCode(error),
    };
    this.options.diagnostics?.record('transport_error', details);

    if (!this.inOutage) {
      this.inOutage = true;
      logger.warn('Telemetry datagram send failed', details);
    }
  }
}
