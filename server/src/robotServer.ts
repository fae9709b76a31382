/**
 * Composition root: owns the link, watchdog, registry, router and ws hub,
 * and runs startup and the ordered shutdown.
 */

import http from 'http';
import { CommandRouter } from './commandRouter';
import { DeviceLink } from './deviceLink';
import { FailsafeWatchdog } from './failsafeWatchdog';
import { linkLogger, logger } from './logger';
import { SessionRegistry } from './sessionRegistry';
import { WsHub, WsHubOptions } from './wsHub';

export const NORMAL_CLOSURE = 1000;

/** What shutdown has to reach, in the order it reaches them. */
export interface ShutdownTargets {
  watchdog: Pick<FailsafeWatchdog, 'stop'>;
  link: Pick<DeviceLink, 'close'>;
  sessions: { close(code: number, reason: string): Promise<void> };
}

/**
 * Motors are told to stop before the serial port closes, and the port closes
 * before the sessions go away. The link stays closed: commands still in
 * flight from sessions cannot reopen it.
 */
export async function shutdownInOrder(targets: ShutdownTargets): Promise<void> {
  targets.watchdog.stop();
  await targets.link.close();
  await targets.sessions.close(NORMAL_CLOSURE, 'Server shutting down');
}

export interface RobotServerOptions {
  link: DeviceLink;
  authToken: string;
  failsafe: { timeoutMs: number; intervalMs: number };
  ws: Omit<WsHubOptions, 'isDeviceConnected'>;
}

export class RobotServer {
  readonly link: DeviceLink;
  readonly registry: SessionRegistry;
  readonly router: CommandRouter;
  readonly watchdog: FailsafeWatchdog;
  readonly hub: WsHub;
  private shuttingDown?: Promise<void>;

  constructor(
    private readonly httpServer: http.Server,
    options: RobotServerOptions
  ) {
    this.link = options.link;
    this.registry = new SessionRegistry(options.authToken);
    this.router = new CommandRouter(this.link, this.registry);
    this.watchdog = new FailsafeWatchdog(this.link, options.failsafe);
    this.hub = new WsHub(httpServer, this.registry, this.router, {
      ...options.ws,
      isDeviceConnected: () => this.link.connected,
    });

    this.link.on('state', (next, previous) => linkLogger.info(`Link ${previous} -> ${next}`));
    this.link.on('reconnect-exhausted', (attempts) =>
      linkLogger.error(`Device still absent after ${attempts} attempts; waiting for the next command`)
    );
  }

  async start(): Promise<void> {
    linkLogger.info('Connecting to device...');
    if (await this.link.connect()) {
      linkLogger.info('Device ready');
    } else {
      linkLogger.warn('Device not available - will retry on client commands');
    }
    this.watchdog.start();
    this.hub.start();
  }

  /** Runs once; later calls wait on the first. */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      logger.info('[SERVER]', 'Shutting down...');
      this.shuttingDown = shutdownInOrder({
        watchdog: this.watchdog,
        link: this.link,
        sessions: this.hub,
      }).then(
        () =>
          new Promise<void>((resolve, reject) => {
            this.httpServer.close((err) => (err ? reject(err) : resolve()));
          })
      );
    }
    return this.shuttingDown;
  }
}
