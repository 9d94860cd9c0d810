import { createSocket } from 'node:dgram';
import { encodeOscMessage, type TelemetryMessage } from './osc.ts';

/**
 * Outbound channel for telemetry messages. Implementations must not throw from
 * {@link TelemetrySink.send}: delivery is best effort.
 */
export interface TelemetrySink {
  send(message: TelemetryMessage): void;
  close(): void;
}

export class NullTelemetrySink implements TelemetrySink {
  send(): void {}

  close(): void {}
}

/** Keeps every message in memory; used by tests and the balance script. */
export class RecordingTelemetrySink implements TelemetrySink {
  readonly messages: TelemetryMessage[] = [];
  private closed = false;

  send(message: TelemetryMessage): void {
    if (!this.closed) {
      this.messages.push(message);
    }
  }

  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  clear(): void {
    this.messages.length = 0;
  }

  /** Values of every `/event` message, in send order. */
  events(): string[] {
    const names: string[] = [];
    for (const message of this.messages) {
      const [first] = message.args;
      if (message.address === '/event' && first?.type === 's') {
        names.push(first.value);
      }
    }
    return names;
  }
}

/** The slice of `dgram.Socket` the UDP sink relies on. */
export interface DatagramSocket {
  send(msg: Uint8Array, port: number, address: string, callback?: (error: Error | null) => void): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
  unref(): unknown;
  close(): unknown;
}

export interface UdpTelemetrySinkOptions {
  readonly host: string;
  readonly port: number;
  readonly socketFactory?: () => DatagramSocket;
}

/**
 * Fire-and-forget OSC over UDP. The socket is unref'd so an idle sink never
 * keeps the process alive. Failures are reported once and then dropped.
 */
export class UdpTelemetrySink implements TelemetrySink {
  private readonly host: string;
  private readonly port: number;
  private readonly socketFactory: () => DatagramSocket;
  private socket: DatagramSocket | null = null;
  private closed = false;
  private failureReported = false;

  constructor(options: UdpTelemetrySinkOptions) {
    this.host = options.host;
    this.port = options.port;
    this.socketFactory = options.socketFactory ?? (() => createSocket('udp4'));
  }

  send(message: TelemetryMessage): void {
    if (this.closed) {
      return;
    }
    try {
      const packet = encodeOscMessage(message);
      this.ensureSocket().send(packet, this.port, this.host, (error) => {
        if (error) {
          this.reportFailure(error);
        }
      });
    } catch (error) {
      this.reportFailure(error);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const socket = this.socket;
    this.socket = null;
    if (!socket) {
      return;
    }
    try {
      socket.close();
    } catch (error) {
      this.reportFailure(error);
    }
  }

  private ensureSocket(): DatagramSocket {
    if (this.socket) {
      return this.socket;
    }
    const socket = this.socketFactory();
    socket.on('error', (error) => this.reportFailure(error));
    socket.unref();
    this.socket = socket;
    return socket;
  }

  private reportFailure(error: unknown): void {
    if (this.failureReported) {
      return;
    }
    this.failureReported = true;
    console.warn(`Telemetry to ${this.host}:${this.port} is failing; further errors are dropped`, error);
  }
}
