import dgram from 'dgram';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import {
  receivedTelemetrySchema,
  type ReceivedTelemetry,
  type TelemetryEvent,
} from '../schemas/telemetry.schemas';
import type { TelemetryPosition } from '../types/telemetry.types';

export interface TelemetryReceiverHandlers {
  onStatus?: (status: string, distance: number, fuel: number, flightTime: number) => void;
  onPosition?: (position: TelemetryPosition) => void;
  onEvents?: (events: TelemetryEvent[]) => void;
}

export interface TelemetryReceiverOptions {
  host: string;
  port: number;
  maxLogLines?: number;
  handlers?: TelemetryReceiverHandlers;
  socketFactory?: () => ReceiverSocket;
}

/**
 * The slice of `dgram.Socket` the receiver uses.
 */
export interface ReceiverSocket {
  bind(port: number, address: string): unknown;
  on(event: 'message', listener: (msg: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'listening', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
  close(callback?: () => void): unknown;
}

export interface ReceiverSnapshot {
  running: boolean;
  host: string;
  port: number;
  packetsOk: number;
  packetsErr: number;
  lastPacketTime: number | null;
  lastError: string | null;
  lastStatus: string | null;
  lastPosition: TelemetryPosition | null;
  lastDistance: number | null;
  lastFuel: number | null;
  lastFlightTime: number | null;
  log: string[];
}

const formatClock = (ms: number): string => new Date(ms).toISOString().slice(11, 19);

/**
 * Ground-side listener for bridge datagrams. Validates each packet, keeps
 * last-seen values and counters, and hands results to the UI handlers.
 * A bad packet or a throwing handler is counted and logged; the socket keeps going.
 */
export class TelemetryReceiver {
  private socket: ReceiverSocket | null = null;

  private running = false;

  private packetsOk = 0;

  private packetsErr = 0;

  private lastPacketTime: number | null = null;

  private lastError: string | null = null;

  private lastStatus: string | null = null;

  private lastPosition: TelemetryPosition | null = null;

  private lastDistance: number | null = null;

  private lastFuel: number | null = null;

  private lastFlightTime: number | null = null;

  private log: string[] = [];

  private readonly maxLogLines: number;

  private readonly handlers: TelemetryReceiverHandlers;

  constructor(private readonly options: TelemetryReceiverOptions) {
    this.maxLogLines = options.maxLogLines ?? 500;
    this.handlers = options.handlers ?? {};
  }

  /**
   * Bind the UDP socket. Resolves once listening; rejects if the bind fails.
   */
  async start(): Promise<void> {
    if (this.socket) {
      return;
    }

    const { host, port } = this.options;
    const socket: ReceiverSocket = this.options.socketFactory?.() ?? dgram.createSocket('udp4');
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const onBindError = (error: Error): void => {
        this.socket = null;
        this.lastError = `Bind failed: ${error.message}`;
        this.appendLog(this.lastError, Date.now());
        logger.error('Telemetry receiver bind failed', { host, port, error: error.message });
        socket.close();
        reject(error);
      };

      socket.on('error', onBindError);
      socket.on('listening', () => {
        socket.off('error', onBindError);
        socket.on('error', (error) => this.recordError(`Socket error: ${error.message}`, Date.now()));
        this.running = true;
        this.appendLog(`UDP receiver listening on ${host}:${port}`, Date.now());
        logger.info('Telemetry receiver listening', { host, port });
        resolve();
      });
      socket.on('message', (msg) => this.handleDatagram(msg, Date.now()));
      socket.bind(port, host);
    });
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
    this.running = false;
    this.appendLog('UDP receiver stopped', Date.now());
    logger.info('Telemetry receiver stopped', { host: this.options.host, port: this.options.port });
  }

  /**
   * Decode and apply one datagram. Returns the validated payload, or null
   * when the packet was rejected.
   */
  handleDatagram(data: Buffer, nowMs: number): ReceivedTelemetry | null {
    let decoded: unknown;
    try {
      decoded = JSON.parse(data.toString('utf8'));
    } catch (error) {
      this.recordError(`JSON decode error: ${errorMessage(error)}`, nowMs);
      return null;
    }

    const result = receivedTelemetrySchema.safeParse(decoded);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      this.recordError(`Invalid payload: ${issues}`, nowMs);
      return null;
    }

    const payload = result.data;
    this.lastStatus = payload.status;
    this.lastFlightTime = payload.flight_time;
    this.lastPosition = payload.position;
    this.lastDistance = payload.position.distance;
    this.lastFuel = payload.fuel;

    this.invokeHandler('status_handler', nowMs, () => this.handlers.onStatus?.(
      payload.status,
      payload.position.distance,
      payload.fuel,
      payload.flight_time,
    ));
    this.invokeHandler('position_handler', nowMs, () => this.handlers.onPosition?.(payload.position));
    if (payload.events && payload.events.length > 0) {
      const { events } = payload;
      this.invokeHandler('events_handler', nowMs, () => this.handlers.onEvents?.(events));
    }

    this.packetsOk += 1;
    this.lastPacketTime = nowMs;
    const p = payload.position;
    this.appendLog(
      `OK: st=${payload.status} lat=${p.lat} lon=${p.lon} alt_msl=${p.altitude_msl} alt_agl=${p.altitude_agl} `
        + `gs=${p.gs} dist=${p.distance}nm fuel=${payload.fuel} ft=${payload.flight_time}`,
      nowMs,
    );
    return payload;
  }

  getSnapshot(): ReceiverSnapshot {
    return {
      running: this.running,
      host: this.options.host,
      port: this.options.port,
      packetsOk: this.packetsOk,
      packetsErr: this.packetsErr,
      lastPacketTime: this.lastPacketTime,
      lastError: this.lastError,
      lastStatus: this.lastStatus,
      lastPosition: this.lastPosition ? { ...this.lastPosition } : null,
      lastDistance: this.lastDistance,
      lastFuel: this.lastFuel,
      lastFlightTime: this.lastFlightTime,
      log: [...this.log],
    };
  }

  getSummary(): string {
    const state = this.running ? 'running' : 'stopped';
    const last = this.lastPacketTime === null ? '-' : formatClock(this.lastPacketTime);
    return `Bridge: ${state} ${this.options.host}:${this.options.port} | last ${last} `
      + `| ok ${this.packetsOk} err ${this.packetsErr} | ${this.lastStatus ?? '-'}`;
  }

  private invokeHandler(name: string, nowMs: number, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.recordError(`${name}: ${errorMessage(error)}`, nowMs);
    }
  }

  private recordError(message: string, nowMs: number): void {
    this.packetsErr += 1;
    this.lastError = message;
    this.appendLog(`ERR: ${message}`, nowMs);
    logger.warn('Telemetry receiver error', { error: message });
  }

  private appendLog(line: string, nowMs: number): void {
    this.log.push(`[${formatClock(nowMs)}] ${line}`);
    if (this.log.length > this.maxLogLines) {
      this.log = this.log.slice(-this.maxLogLines);
    }
  }
}
