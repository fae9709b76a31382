/**
 * Line-oriented transport over a serial endpoint.
 *
 * Every operation resolves through a promise and is bounded by a timeout, so
 * the device link never performs a blocking read itself and a hung device can
 * only ever slow a command down.
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import { ChannelLogger, linkLogger } from './logger';

export interface SerialAddress {
  path: string;
  baudRate: number;
  /** Upper bound for a single write (including flush) and the default read wait. */
  ioTimeoutMs: number;
}

/** The endpoint failed: open, write or read error, or the device vanished. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface LineTransport {
  readonly isOpen: boolean;
  open(): Promise<void>;
  /** Writes `line` followed by `\n` and waits for the bytes to leave the buffer. */
  writeLine(line: string): Promise<void>;
  /** Next complete line, or `null` when none arrives within `timeoutMs`. */
  readLine(timeoutMs: number): Promise<string | null>;
  /** Drops every line already received; returns how many were dropped. */
  discardInput(): number;
  close(): Promise<void>;
  onClose(listener: () => void): void;
}

export type TransportFactory = (address: SerialAddress) => LineTransport;

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class SerialPortTransport implements LineTransport {
  private readonly port: SerialPort;
  private readonly parser: ReadlineParser;
  private lines: string[] = [];
  private pendingRead?: PendingRead;
  private readonly closeListeners: Array<() => void> = [];

  constructor(
    private readonly address: SerialAddress,
    private readonly log: ChannelLogger = linkLogger
  ) {
    this.port = new SerialPort({
      path: address.path,
      baudRate: address.baudRate,
      autoOpen: false
    });
    this.parser = this.port.pipe(new ReadlineParser({ delimiter: '\n' }));
    this.parser.on('data', (line: string) => this.handleLine(line));
    this.port.on('error', (err: Error) => this.log.warn(`Serial port error on ${address.path}: ${err.message}`));
    this.port.on('close', () => this.handleClose());
  }

  get isOpen(): boolean {
    return this.port.isOpen;
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((err) => {
        if (err) {
          reject(new TransportError(`Failed to open ${this.address.path}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  writeLine(line: string): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.reject(new TransportError(`${this.address.path} is not open`));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TransportError(`Write to ${this.address.path} timed out after ${this.address.ioTimeoutMs}ms`));
      }, this.address.ioTimeoutMs);

      const fail = (err: Error) => {
        clearTimeout(timer);
        reject(new TransportError(`Write to ${this.address.path} failed: ${err.message}`, { cause: err }));
      };

      this.port.write(`${line}\n`, (writeErr) => {
        if (writeErr) {
          fail(writeErr);
          return;
        }
        this.port.drain((drainErr) => {
          if (drainErr) {
            fail(drainErr);
            return;
          }
          clearTimeout(timer);
          resolve();
        });
      });
    });
  }

  readLine(timeoutMs: number): Promise<string | null> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (!this.port.isOpen) {
      return Promise.reject(new TransportError(`${this.address.path} is not open`));
    }
    if (this.pendingRead) {
      return Promise.reject(new TransportError('A read is already pending'));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = undefined;
        resolve(null);
      }, timeoutMs);
      this.pendingRead = { resolve, reject, timer };
    });
  }

  discardInput(): number {
    const dropped = this.lines.length;
    this.lines = [];
    return dropped;
  }

  close(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.port.close((err) => {
        if (err) {
          reject(new TransportError(`Failed to close ${this.address.path}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  private handleLine(raw: string): void {
    const line = raw.trim();
    if (!line) return;
    this.log.debug(`RX ${line}`);
    const pending = this.pendingRead;
    if (pending) {
      clearTimeout(pending.timer);
      this.pendingRead = undefined;
      pending.resolve(line);
      return;
    }
    this.lines.push(line);
  }

  private handleClose(): void {
    const pending = this.pendingRead;
    if (pending) {
      clearTimeout(pending.timer);
      this.pendingRead = undefined;
      pending.reject(new TransportError(`${this.address.path} closed`));
    }
    this.lines = [];
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

export const createSerialTransport: TransportFactory = (address) => new SerialPortTransport(address);

export interface ControllerPort {
  path: string;
  manufacturer?: string;
  vendorId?: string;
  productId?: string;
}

/**
 * Serial ports that look like a microcontroller board: an "Arduino"
 * manufacturer string or a CDC-ACM device node.
 */
export async function listControllerPorts(): Promise<ControllerPort[]> {
  const ports = await SerialPort.list();
  return ports
    .filter((p) => (p.manufacturer ?? '').toLowerCase().includes('arduino') || p.path.includes('ttyACM'))
    .map((p) => ({
      path: p.path,
      manufacturer: p.manufacturer,
      vendorId: p.vendorId,
      productId: p.productId
    }));
}
