/**
 * Device Link - exclusive owner of the serial connection to the motor controller.
 *
 * Every operation that touches the endpoint (connect, execute, disconnect)
 * runs inside a single-slot queue, including its I/O waits, so the device
 * only ever sees one request at a time and each request's bytes are written
 * contiguously.
 *
 * State transitions are published on the `state` event; nothing outside this
 * class ever holds the transport.
 */

import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { ChannelLogger, linkLogger } from './logger';
import { Command, CommandResult, LinkState } from './models';
import {
  LineTransport,
  SerialAddress,
  TransportFactory,
  createSerialTransport,
} from './serialTransport';

export interface DeviceLinkTiming {
  /** Board resets when the port opens; wait this long before talking to it. */
  resetDelayMs: number;
  drainAttempts: number;
  drainPauseMs: number;
  pingAttempts: number;
  /** Wait per handshake read. */
  pingWaitMs: number;
  /** Pause between writing a command and reading its reply. */
  commandSettleMs: number;
  /** Pause after the best-effort STOP written on disconnect. */
  stopSettleMs: number;
}

export const DEFAULT_LINK_TIMING: DeviceLinkTiming = {
  resetDelayMs: 2000,
  drainAttempts: 5,
  drainPauseMs: 100,
  pingAttempts: 3,
  pingWaitMs: 150,
  commandSettleMs: 50,
  stopSettleMs: 100,
};

export interface DeviceLinkOptions {
  address: SerialAddress;
  reconnectDelayMs: number;
  maxReconnectAttempts: number;
  transportFactory?: TransportFactory;
  timing?: Partial<DeviceLinkTiming>;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  logger?: ChannelLogger;
}

interface PendingRequest {
  verb: string;
  bytes: string;
  deadline: number;
  response: string | null;
}

interface ReconnectRun {
  cancelled: boolean;
  wake?: () => void;
}

const NOT_CONNECTED: CommandResult = {
  success: false,
  response: 'Device not connected',
  failure: 'not_connected',
};

export interface DeviceLinkEvents {
  state: [next: LinkState, previous: LinkState];
  'reconnect-exhausted': [attempts: number];
}

export class DeviceLink {
  private readonly events = new EventEmitter();
  private readonly lock = new PQueue({ concurrency: 1 });
  private readonly address: SerialAddress;
  private readonly reconnectDelayMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly transportFactory: TransportFactory;
  private readonly timing: DeviceLinkTiming;
  private readonly now: () => number;
  private readonly log: ChannelLogger;

  private linkState: LinkState = 'disconnected';
  private transport?: LineTransport;
  private lastCommandAt: number | null = null;
  private attempts = 0;
  private reconnectRun?: ReconnectRun;
  private shutDown = false;

  constructor(options: DeviceLinkOptions) {
    this.address = options.address;
    this.reconnectDelayMs = options.reconnectDelayMs;
    this.maxReconnectAttempts = options.maxReconnectAttempts;
    this.transportFactory = options.transportFactory ?? createSerialTransport;
    this.timing = { ...DEFAULT_LINK_TIMING, ...options.timing };
    this.now = options.now ?? (() => performance.now());
    this.log = options.logger ?? linkLogger;
  }

  get state(): LinkState {
    return this.linkState;
  }

  get connected(): boolean {
    return this.linkState === 'connected';
  }

  /** Monotonic time of the last command written to the device, or `null` if none yet. */
  get lastAcceptedCommandAt(): number | null {
    return this.lastCommandAt;
  }

  get reconnectAttempts(): number {
    return this.attempts;
  }

  /** True once `close()` was called; the link never opens the port again. */
  get closed(): boolean {
    return this.shutDown;
  }

  get reconnecting(): boolean {
    return this.reconnectRun !== undefined;
  }

  on<E extends keyof DeviceLinkEvents>(event: E, listener: (...args: DeviceLinkEvents[E]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  off<E extends keyof DeviceLinkEvents>(event: E, listener: (...args: DeviceLinkEvents[E]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  connect(): Promise<boolean> {
    return this.lock.add(() => this.connectLocked());
  }

  /**
   * Sends one command and waits for its reply line. Never rejects: transport
   * and protocol problems come back as a failed result.
   */
  execute(command: Command): Promise<CommandResult> {
    return this.lock.add(() => this.executeLocked(command));
  }

  /** Best-effort STOP, then close. Always resolves. The link may connect again later. */
  disconnect(): Promise<void> {
    this.cancelReconnect();
    return this.lock.add(() => this.disconnectLocked());
  }

  /**
   * Final STOP and close for process shutdown. Requests already queued run
   * first; anything submitted afterwards fails with not connected.
   */
  close(): Promise<void> {
    this.shutDown = true;
    return this.disconnect();
  }

  private async connectLocked(): Promise<boolean> {
    if (this.shutDown) {
      return false;
    }
    if (this.linkState === 'connected' && this.transport?.isOpen) {
      return true;
    }

    this.setState('connecting');
    await this.releaseTransport();

    this.log.info(`Connecting to device on ${this.address.path} at ${this.address.baudRate} baud...`);
    const transport = this.transportFactory(this.address);
    this.transport = transport;
    transport.onClose(() => this.handleEndpointClosed(transport));

    try {
      await transport.open();
    } catch (err) {
      this.log.error(`Failed to connect to device: ${describe(err)}`);
      this.transport = undefined;
      this.setState('disconnected');
      return false;
    }

    await delay(this.timing.resetDelayMs);
    await this.drainStartupOutput(transport);

    if (await this.handshake(transport)) {
      this.attempts = 0;
      this.setState('connected');
      this.log.info('Device connected and responding');
      return true;
    }

    this.log.warn('Device opened but not responding to PING');
    await this.releaseTransport();
    this.setState('disconnected');
    return false;
  }

  private async drainStartupOutput(transport: LineTransport): Promise<void> {
    for (let attempt = 0; attempt < this.timing.drainAttempts; attempt++) {
      const dropped = transport.discardInput();
      if (dropped === 0) break;
      this.log.debug(`Cleared ${dropped} startup line(s)`);
      await delay(this.timing.drainPauseMs);
    }
  }

  private async handshake(transport: LineTransport): Promise<boolean> {
    try {
      await transport.writeLine('PING');
      for (let attempt = 1; attempt <= this.timing.pingAttempts; attempt++) {
        const line = await transport.readLine(this.timing.pingWaitMs);
        if (line === null) continue;
        this.log.debug(`PING response (attempt ${attempt}): ${line}`);
        if (line === 'OK:PING') return true;
        if (line.startsWith('OK:')) {
          this.log.info(`Device answered PING with ${line}, accepting as connected`);
          return true;
        }
      }
      this.log.warn(`No response to PING after ${this.timing.pingAttempts} attempts`);
      return false;
    } catch (err) {
      this.log.error(`PING failed: ${describe(err)}`);
      return false;
    }
  }

  private async executeLocked(command: Command): Promise<CommandResult> {
    if (this.linkState !== 'connected') {
      if (!(await this.connectLocked())) {
        return NOT_CONNECTED;
      }
    }
    const transport = this.transport;
    if (!transport) {
      return NOT_CONNECTED;
    }

    const stale = transport.discardInput();
    if (stale > 0) {
      this.log.debug(`Discarded ${stale} stale line(s) before ${command.verb}`);
    }

    const request: PendingRequest = {
      verb: command.verb,
      bytes: `${command.verb}\n`,
      deadline: 0,
      response: null,
    };

    const writtenAt = this.now();
    this.lastCommandAt = writtenAt;
    try {
      await transport.writeLine(request.verb);
      this.log.debug(`TX ${request.bytes.trimEnd()}`);
      await delay(this.timing.commandSettleMs);
      request.deadline = this.now() + this.address.ioTimeoutMs;
      request.response = await transport.readLine(Math.max(0, request.deadline - this.now()));
    } catch (err) {
      return { ...(await this.failTransport(err)), writtenAt };
    }

    return { ...this.evaluate(request), writtenAt };
  }

  private evaluate(request: PendingRequest): CommandResult {
    const expected = `OK:${request.verb}`;
    const line = request.response;
    if (line === expected) {
      return { success: true, response: line };
    }
    if (line !== null && request.verb === 'PING' && line.startsWith('OK:')) {
      return { success: true, response: line };
    }
    this.log.warn(`Unexpected response: '${line ?? ''}' (expected '${expected}')`);
    return { success: false, response: line ?? 'No response', failure: 'protocol' };
  }

  private async failTransport(err: unknown): Promise<CommandResult> {
    const message = describe(err);
    this.log.error(`Serial error: ${message}`);
    await this.releaseTransport();
    this.setState('disconnected');
    this.startReconnectLoop();
    return { success: false, response: `Serial error: ${message}`, failure: 'transport' };
  }

  private async disconnectLocked(): Promise<void> {
    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      try {
        if (transport.isOpen) {
          await transport.writeLine('STOP');
          await delay(this.timing.stopSettleMs);
        }
      } catch (err) {
        this.log.warn(`Error sending STOP during disconnect: ${describe(err)}`);
      }
      await this.closeTransport(transport);
      this.log.info('Device disconnected');
    }
    this.setState('disconnected');
  }

  /** Detaches the current transport first so its close event is not taken for a device loss. */
  private async releaseTransport(): Promise<void> {
    const transport = this.transport;
    this.transport = undefined;
    if (transport) {
      await this.closeTransport(transport);
    }
  }

  private async closeTransport(transport: LineTransport): Promise<void> {
    try {
      await transport.close();
    } catch (err) {
      this.log.warn(`Error closing serial port: ${describe(err)}`);
    }
  }

  private handleEndpointClosed(transport: LineTransport): void {
    if (transport !== this.transport) return;
    this.lock
      .add(async () => {
        if (transport !== this.transport || this.linkState !== 'connected') return;
        await this.failTransport(new Error('device closed the connection'));
      })
      .catch((err: unknown) => this.log.error('Failed to handle endpoint close', err));
  }

  private setState(next: LinkState): void {
    const previous = this.linkState;
    if (previous === next) return;
    this.linkState = next;
    this.log.debug(`state ${previous} -> ${next}`);
    this.publish('state', next, previous);
  }

  private publish<E extends keyof DeviceLinkEvents>(event: E, ...args: DeviceLinkEvents[E]): void {
    this.events.emit(event, ...args);
  }

  // ======================
  // Background reconnect
  // ======================

  private startReconnectLoop(): void {
    if (this.reconnectRun || this.shutDown) return;
    const run: ReconnectRun = { cancelled: false };
    this.reconnectRun = run;
    this.runReconnect(run)
      .catch((err: unknown) => this.log.error('Reconnect loop failed', err))
      .finally(() => {
        if (this.reconnectRun === run) {
          this.reconnectRun = undefined;
        }
      });
  }

  private async runReconnect(run: ReconnectRun): Promise<void> {
    this.attempts = 0;
    while (this.attempts < this.maxReconnectAttempts) {
      await this.sleepFor(run, this.reconnectDelayMs);
      if (run.cancelled || this.connected) return;

      this.attempts += 1;
      this.log.info(`Reconnection attempt ${this.attempts}/${this.maxReconnectAttempts}...`);
      const ok = await this.lock.add(async () => (run.cancelled ? false : this.connectLocked()));
      if (run.cancelled) return;
      if (ok) {
        this.log.info('Reconnected to device');
        return;
      }
    }
    this.log.error('Max reconnection attempts reached. Giving up.');
    this.publish('reconnect-exhausted', this.attempts);
  }

  private sleepFor(run: ReconnectRun, ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        run.wake = undefined;
        resolve();
      }, ms);
      run.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }

  private cancelReconnect(): void {
    const run = this.reconnectRun;
    if (!run) return;
    run.cancelled = true;
    run.wake?.();
    this.reconnectRun = undefined;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
