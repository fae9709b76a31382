import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CommandLink, CommandRouter } from '../commandRouter';
import { DeviceLink } from '../deviceLink';
import { silentLogger } from '../logger';
import { Command, CommandResult, LinkState } from '../models';
import { TransportError } from '../serialTransport';
import { Session, SessionRegistry } from '../sessionRegistry';
import { FakeChannel, FakeTransport, ZERO_TIMING, transportSequence } from './fakes';

class StubLink implements CommandLink {
  state: LinkState = 'connected';
  readonly execute = vi.fn(
    async (command: Command): Promise<CommandResult> => ({ success: true, response: `OK:${command.verb}` })
  );

  get connected(): boolean {
    return this.state === 'connected';
  }
}

describe('CommandRouter', () => {
  let link: StubLink;
  let registry: SessionRegistry;
  let router: CommandRouter;
  let session: Session;

  const send = (message: unknown) => router.handle(session, JSON.stringify(message));
  const login = () => send({ cmd: 'auth', token: 'test-secret' });

  beforeEach(() => {
    link = new StubLink();
    registry = new SessionRegistry('test-secret', silentLogger);
    router = new CommandRouter(link, registry, silentLogger);
    session = new Session(new FakeChannel());
    registry.register(session);
  });

  describe('envelope', () => {
    it('rejects text that is not JSON', async () => {
      const result = await router.handle(session, '{cmd: move');
      expect(result).toMatchObject({ type: 'error', code: 'validation' });
      expect(result.type === 'error' && result.message.startsWith('Invalid JSON:')).toBe(true);
    });

    it('requires a cmd field', async () => {
      await expect(send({ dir: 'forward' })).resolves.toMatchObject({
        type: 'error',
        code: 'validation',
        message: "Missing 'cmd' field",
      });
      await expect(send(null)).resolves.toMatchObject({ message: "Missing 'cmd' field" });
    });

    it('names an unknown command', async () => {
      await expect(send({ cmd: 'fly' })).resolves.toMatchObject({
        type: 'error',
        code: 'validation',
        message: 'Unknown command: fly. Valid commands: auth, move, status, ping, raw, subscribe',
      });
    });

    it('matches command names case-insensitively', async () => {
      await expect(send({ cmd: 'PING' })).resolves.toMatchObject({ type: 'pong' });
    });
  });

  describe('auth', () => {
    it('reports a wrong token as a failed auth, not an error', async () => {
      await expect(send({ cmd: 'auth', token: 'nope' })).resolves.toEqual({
        type: 'auth',
        success: false,
        message: 'Invalid token',
      });
    });

    it('reports a missing token as a failed auth', async () => {
      await expect(send({ cmd: 'auth' })).resolves.toEqual({
        type: 'auth',
        success: false,
        message: "Missing 'token' parameter",
      });
    });

    it('authenticates with the shared secret', async () => {
      await expect(login()).resolves.toEqual({
        type: 'auth',
        success: true,
        message: 'Authenticated successfully',
      });
      expect(registry.isAuthenticated(session)).toBe(true);
    });
  });

  describe('move', () => {
    it('refuses an unauthenticated session without touching the link', async () => {
      await send({ cmd: 'auth', token: 'nope' });

      await expect(send({ cmd: 'move', dir: 'forward' })).resolves.toMatchObject({
        type: 'error',
        code: 'authorization',
        message: 'Not authenticated',
      });
      expect(link.execute).not.toHaveBeenCalled();
    });

    it('forwards the mapped verb and relays the reply', async () => {
      await login();

      const result = await send({ cmd: 'move', dir: 'Forward' });

      expect(result).toMatchObject({
        type: 'move',
        success: true,
        direction: 'forward',
        response: 'OK:FORWARD',
      });
      expect(link.execute).toHaveBeenCalledWith({ kind: 'motion', verb: 'FORWARD' });
    });

    it('validates the direction', async () => {
      await login();

      await expect(send({ cmd: 'move' })).resolves.toMatchObject({
        type: 'error',
        code: 'validation',
        message: "Missing 'dir' parameter",
      });
      await expect(send({ cmd: 'move', dir: 'up' })).resolves.toMatchObject({
        type: 'error',
        code: 'validation',
        message: 'Invalid direction: up. Valid: forward, backward, left, right, stop',
      });
      await expect(send({ cmd: 'move', dir: 5 })).resolves.toMatchObject({
        type: 'error',
        code: 'validation',
        message: "Invalid 'dir' parameter: Expected string, received number",
      });
      expect(link.execute).not.toHaveBeenCalled();
    });

    it('relays a failed link result', async () => {
      await login();
      link.execute.mockResolvedValueOnce({
        success: false,
        response: 'Device not connected',
        failure: 'not_connected',
      });

      await expect(send({ cmd: 'move', dir: 'stop' })).resolves.toMatchObject({
        type: 'move',
        success: false,
        direction: 'stop',
        response: 'Device not connected',
      });
    });

    it('turns an unexpected handler fault into an internal error', async () => {
      await login();
      link.execute.mockRejectedValueOnce(new Error('kaboom'));

      await expect(send({ cmd: 'move', dir: 'left' })).resolves.toMatchObject({
        type: 'error',
        code: 'internal',
        message: "Command 'move' failed",
      });
    });
  });

  describe('raw', () => {
    it('is gated on authentication', async () => {
      await expect(send({ cmd: 'raw', command: 'led_on' })).resolves.toMatchObject({
        type: 'error',
        code: 'authorization',
      });
      expect(link.execute).not.toHaveBeenCalled();
    });

    it('trims and uppercases a single token', async () => {
      await login();

      await expect(send({ cmd: 'raw', command: '  led_on ' })).resolves.toMatchObject({
        type: 'raw',
        success: true,
        command: 'LED_ON',
        response: 'OK:LED_ON',
      });
      expect(link.execute).toHaveBeenCalledWith({ kind: 'raw', verb: 'LED_ON' });
    });

    it('rejects anything that could smuggle a second line', async () => {
      await login();

      for (const command of ['STOP\nFORWARD', 'LED ON', 'A\tB']) {
        await expect(send({ cmd: 'raw', command })).resolves.toMatchObject({
          type: 'error',
          code: 'validation',
          message: 'Raw command must be a single token without whitespace',
        });
      }
      expect(link.execute).not.toHaveBeenCalled();
    });

    it('requires the command field', async () => {
      await login();
      await expect(send({ cmd: 'raw' })).resolves.toMatchObject({
        type: 'error',
        message: "Missing 'command' parameter",
      });
    });
  });

  describe('status, ping and subscribe', () => {
    it('reports a read-only snapshot', async () => {
      const other = new Session(new FakeChannel());
      registry.register(other);
      registry.authenticate(other, 'test-secret');
      link.state = 'disconnected';

      const result = await send({ cmd: 'status' });

      expect(result).toMatchObject({
        type: 'status',
        arduino_connected: false,
        link_state: 'disconnected',
        authenticated: false,
        clients_connected: 2,
        clients_authenticated: 1,
      });
      expect(link.execute).not.toHaveBeenCalled();
    });

    it('answers ping without the link', async () => {
      const result = await send({ cmd: 'ping' });
      expect(result.type).toBe('pong');
      expect(link.execute).not.toHaveBeenCalled();
    });

    it('toggles the broadcast subscription', async () => {
      await expect(send({ cmd: 'subscribe', enabled: false })).resolves.toEqual({
        type: 'subscribe',
        success: true,
        subscribed: false,
      });
      expect(session.subscribedToBroadcast).toBe(false);

      await expect(send({ cmd: 'subscribe' })).resolves.toMatchObject({
        type: 'error',
        message: "Missing 'enabled' parameter",
      });
    });
  });
});

describe('CommandRouter with a device link', () => {
  let link: DeviceLink;

  afterEach(async () => {
    await link.disconnect();
  });

  function setup(...transports: FakeTransport[]) {
    const sequence = transportSequence(...transports);
    link = new DeviceLink({
      address: { path: '/dev/ttyTEST0', baudRate: 9600, ioTimeoutMs: 50 },
      reconnectDelayMs: 60_000,
      maxReconnectAttempts: 3,
      transportFactory: sequence.factory,
      timing: ZERO_TIMING,
      logger: silentLogger,
    });
    const registry = new SessionRegistry('test-secret', silentLogger);
    const router = new CommandRouter(link, registry, silentLogger);
    const open = async () => {
      const session = new Session(new FakeChannel());
      registry.register(session);
      await router.handle(session, JSON.stringify({ cmd: 'auth', token: 'test-secret' }));
      return (message: unknown) => router.handle(session, JSON.stringify(message));
    };
    return { router, open, handedOut: sequence.handedOut };
  }

  it('gives each of two simultaneous sessions its own reply', async () => {
    const transport = new FakeTransport();
    transport.writeDelayMs = 3;
    const { open } = setup(transport);
    const alice = await open();
    const bob = await open();

    const [a, b] = await Promise.all([
      alice({ cmd: 'move', dir: 'forward' }),
      bob({ cmd: 'move', dir: 'left' }),
    ]);

    expect(a).toMatchObject({ type: 'move', success: true, response: 'OK:FORWARD' });
    expect(b).toMatchObject({ type: 'move', success: true, response: 'OK:LEFT' });
  });

  it('advances the command time on an acknowledged move', async () => {
    const { open } = setup(new FakeTransport());
    const client = await open();

    await expect(client({ cmd: 'move', dir: 'forward' })).resolves.toMatchObject({
      success: true,
      response: 'OK:FORWARD',
    });
    expect(link.lastAcceptedCommandAt).not.toBeNull();
  });

  it('recovers from an unplugged device on the next move', async () => {
    const first = new FakeTransport();
    const { open, handedOut } = setup(first, new FakeTransport());
    const client = await open();
    await client({ cmd: 'move', dir: 'forward' });
    first.writeError = new TransportError('device vanished');

    await expect(client({ cmd: 'move', dir: 'forward' })).resolves.toMatchObject({
      type: 'move',
      success: false,
      response: 'Serial error: device vanished',
    });
    await expect(client({ cmd: 'status' })).resolves.toMatchObject({ arduino_connected: false });

    await expect(client({ cmd: 'move', dir: 'backward' })).resolves.toMatchObject({
      success: true,
      response: 'OK:BACKWARD',
    });
    expect(handedOut).toHaveLength(2);
  });
});
