import { ChannelLogger, sessionLogger } from './logger';
import { OutboundMessage, SessionCounts } from './models';

/** Outbound side of one client connection. */
export interface SessionChannel {
  readonly remoteAddress: string;
  isOpen(): boolean;
  send(payload: string): Promise<void>;
  close(code: number, reason: string): void;
}

let nextSessionId = 1;

export class Session {
  readonly id: number;
  authenticated = false;
  subscribedToBroadcast = true;
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly channel: SessionChannel) {
    this.id = nextSessionId++;
  }

  get label(): string {
    return `#${this.id} (${this.channel.remoteAddress})`;
  }

  /**
   * Runs `task` after every task queued before it has settled, so one
   * session's messages are handled strictly in arrival order.
   */
  enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.tail.then(task);
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Sends unless the connection has gone away. Resolves `false` when skipped. */
  async deliver(message: OutboundMessage): Promise<boolean> {
    if (!this.channel.isOpen()) return false;
    await this.channel.send(JSON.stringify(message));
    return true;
  }
}

export class SessionRegistry {
  private readonly connected = new Set<Session>();
  private readonly authenticated = new Set<Session>();

  constructor(
    private readonly authToken: string,
    private readonly log: ChannelLogger = sessionLogger
  ) {}

  register(session: Session): void {
    this.connected.add(session);
    this.log.info(`Client connected: ${session.label}`);
  }

  /** Safe to call more than once for the same session. */
  remove(session: Session): boolean {
    const removed = this.connected.delete(session);
    this.authenticated.delete(session);
    session.authenticated = false;
    if (removed) {
      this.log.info(`Client removed: ${session.label}`);
    }
    return removed;
  }

  authenticate(session: Session, token: string): boolean {
    if (!this.connected.has(session) || token !== this.authToken) {
      this.log.warn(`Authentication failed for: ${session.label}`);
      return false;
    }
    this.authenticated.add(session);
    session.authenticated = true;
    this.log.info(`Client authenticated: ${session.label}`);
    return true;
  }

  isAuthenticated(session: Session): boolean {
    return this.authenticated.has(session);
  }

  setSubscribed(session: Session, subscribed: boolean): void {
    session.subscribedToBroadcast = subscribed;
  }

  counts(): SessionCounts {
    return {
      connected: this.connected.size,
      authenticated: this.authenticated.size,
    };
  }

  sessions(): Session[] {
    return Array.from(this.connected);
  }

  /**
   * Sends `message` to every subscribed target. A session whose send fails is
   * removed once the fan-out is over; the others still get the message.
   * Resolves with the number of sessions reached.
   */
  async broadcast(message: OutboundMessage, onlyAuthenticated = true): Promise<number> {
    const pool = onlyAuthenticated ? this.authenticated : this.connected;
    const targets = Array.from(pool).filter((s) => s.subscribedToBroadcast);
    if (targets.length === 0) return 0;

    const payload = JSON.stringify(message);
    const outcomes = await Promise.allSettled(targets.map((s) => s.channel.send(payload)));

    let delivered = 0;
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        delivered++;
        return;
      }
      const session = targets[index];
      this.log.warn(`Broadcast to ${session.label} failed, dropping session`, outcome.reason);
      this.remove(session);
    });
    return delivered;
  }

  closeAll(code: number, reason: string): void {
    for (const session of this.sessions()) {
      try {
        session.channel.close(code, reason);
      } catch (err) {
        this.log.warn(`Failed to close ${session.label}`, err);
      }
      this.remove(session);
    }
  }
}
