/**
 * Failsafe Watchdog - stops the motors when command flow goes quiet.
 *
 * Runs independently of the session side: it only looks at when the link
 * last wrote a command, and its STOP queues behind whatever is in flight on
 * the link like any other command.
 */

import { ChannelLogger, failsafeLogger } from './logger';
import { Command, CommandResult, Commands, LinkState } from './models';

/** The slice of the device link the watchdog needs. */
export interface FailsafeTarget {
  readonly state: LinkState;
  readonly lastAcceptedCommandAt: number | null;
  execute(command: Command): Promise<CommandResult>;
}

export interface FailsafeWatchdogOptions {
  timeoutMs: number;
  intervalMs: number;
  now?: () => number;
  logger?: ChannelLogger;
}

export class FailsafeWatchdog {
  private timer?: NodeJS.Timeout;
  private stopInFlight = false;
  // Idle time is measured from here until the link has written a command
  private armedAt: number;

  private readonly timeoutMs: number;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly log: ChannelLogger;

  constructor(
    private readonly link: FailsafeTarget,
    options: FailsafeWatchdogOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.intervalMs = options.intervalMs;
    this.now = options.now ?? (() => performance.now());
    this.log = options.logger ?? failsafeLogger;
    this.armedAt = this.now();
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;
    this.armedAt = this.now();
    this.log.info(`Watchdog armed: STOP after ${this.timeoutMs}ms without commands`);
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => this.log.error('Watchdog tick failed', err));
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  /**
   * One inspection of the link. Exposed for the timer and for tests.
   * The STOP itself counts as a command, so an idle link gets one STOP per
   * timeout rather than one per tick.
   */
  async tick(): Promise<void> {
    if (this.stopInFlight) return;
    if (this.link.state !== 'connected') return;

    const last = this.link.lastAcceptedCommandAt ?? this.armedAt;
    const silence = this.now() - last;
    if (silence <= this.timeoutMs) return;

    this.stopInFlight = true;
    try {
      this.log.warn(`No command for ${Math.round(silence)}ms, issuing STOP`);
      const result = await this.link.execute(Commands.STOP);
      if (!result.success) {
        this.log.warn(`Failsafe STOP not acknowledged: ${result.response}`);
      }
    } finally {
      this.stopInFlight = false;
    }
  }
}
