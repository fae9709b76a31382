import { LineTransport, TransportError } from '../serialTransport';
import { SessionChannel } from '../sessionRegistry';

/**
 * In-process stand-in for a serial endpoint. Answers every written verb with
 * `OK:<VERB>` unless `reply` says otherwise, and records what crossed it.
 */
export class FakeTransport implements LineTransport {
  isOpen = false;
  failOpen = false;
  writeError?: Error;
  writeDelayMs = 0;
  reply: (line: string) => string | null = (line) => `OK:${line}`;

  readonly written: string[] = [];
  readonly events: string[] = [];
  private lines: string[] = [];
  private readonly closeListeners: Array<() => void> = [];

  constructor(private readonly startupLines: string[] = []) {}

  async open(): Promise<void> {
    if (this.failOpen) {
      throw new TransportError('could not open port');
    }
    this.isOpen = true;
    this.lines.push(...this.startupLines);
  }

  async writeLine(line: string): Promise<void> {
    if (!this.isOpen) {
      throw new TransportError('port is not open');
    }
    if (this.writeError) {
      throw this.writeError;
    }
    this.events.push(`write:${line}`);
    await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    this.written.push(line);
    this.events.push(`flushed:${line}`);
    const answer = this.reply(line);
    if (answer !== null) {
      this.lines.push(answer);
    }
  }

  async readLine(): Promise<string | null> {
    const line = this.lines.shift() ?? null;
    this.events.push(`read:${line ?? '-'}`);
    return line;
  }

  discardInput(): number {
    const dropped = this.lines.length;
    this.lines = [];
    return dropped;
  }

  async close(): Promise<void> {
    if (!this.isOpen) return;
    this.isOpen = false;
    this.fireClose();
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  /** A line the device sent on its own, e.g. a late reply. */
  inject(line: string): void {
    this.lines.push(line);
  }

  /** Device pulled out: the port closes on its own and writes start failing. */
  unplug(): void {
    this.isOpen = false;
    this.writeError = new TransportError('device vanished');
    this.fireClose();
  }

  private fireClose(): void {
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

/** Hands out the given transports in order, then keeps returning failing ones. */
export function transportSequence(...transports: FakeTransport[]) {
  const handedOut: FakeTransport[] = [];
  const factory = () => {
    const next = transports.shift() ?? Object.assign(new FakeTransport(), { failOpen: true });
    handedOut.push(next);
    return next;
  };
  return { factory, handedOut };
}

export class FakeChannel implements SessionChannel {
  open = true;
  failSend = false;
  readonly sent: string[] = [];
  closed?: { code: number; reason: string };

  constructor(readonly remoteAddress = '127.0.0.1:50000') {}

  isOpen(): boolean {
    return this.open;
  }

  async send(payload: string): Promise<void> {
    if (this.failSend) {
      throw new Error('socket hang up');
    }
    this.sent.push(payload);
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
    this.open = false;
  }

  messages(): unknown[] {
    return this.sent.map((payload) => JSON.parse(payload) as unknown);
  }
}

export const ZERO_TIMING = {
  resetDelayMs: 0,
  drainPauseMs: 0,
  pingWaitMs: 0,
  commandSettleMs: 0,
  stopSettleMs: 0,
};
