/**
 * Command Router - turns one inbound session frame into one outbound record.
 *
 * `handle` never rejects: bad JSON, unknown commands, missing fields and
 * unauthenticated callers all come back as `error` records, and link
 * problems come back inside the handler's own result.
 */

import { z } from 'zod';
import { ChannelLogger, sessionLogger } from './logger';
import {
  Command,
  CommandResult,
  ErrorCode,
  LinkState,
  OutboundMessage,
  VALID_DIRECTIONS,
  authPayloadSchema,
  commandForDirection,
  directionSchema,
  inboundEnvelopeSchema,
  movePayloadSchema,
  parseRawCommand,
  rawPayloadSchema,
  subscribePayloadSchema,
} from './models';
import { Session, SessionRegistry } from './sessionRegistry';

/** The slice of the device link the router drives. */
export interface CommandLink {
  readonly state: LinkState;
  readonly connected: boolean;
  execute(command: Command): Promise<CommandResult>;
}

type Payload = Record<string, unknown>;
type Handler = (session: Session, payload: Payload) => Promise<OutboundMessage>;

export const COMMAND_NAMES = ['auth', 'move', 'status', 'ping', 'raw', 'subscribe'] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

function timestamp(): string {
  return new Date().toISOString();
}

function errorResult(code: ErrorCode, message: string): OutboundMessage {
  return { type: 'error', code, message, timestamp: timestamp() };
}

export class CommandRouter {
  private readonly handlers: Record<CommandName, Handler> = {
    auth: (session, payload) => this.handleAuth(session, payload),
    move: (session, payload) => this.handleMove(session, payload),
    status: (session) => this.handleStatus(session),
    ping: () => this.handlePing(),
    raw: (session, payload) => this.handleRaw(session, payload),
    subscribe: (session, payload) => this.handleSubscribe(session, payload),
  };

  constructor(
    private readonly link: CommandLink,
    private readonly registry: SessionRegistry,
    private readonly log: ChannelLogger = sessionLogger
  ) {}

  get commands(): string[] {
    return [...COMMAND_NAMES];
  }

  async handle(session: Session, text: string): Promise<OutboundMessage> {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn(`Invalid JSON from ${session.label}: ${reason}`);
      return errorResult('validation', `Invalid JSON: ${reason}`);
    }

    const envelope = inboundEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      return errorResult('validation', "Missing 'cmd' field");
    }

    const cmd = envelope.data.cmd.toLowerCase();
    if (!isCommandName(cmd)) {
      return errorResult('validation', `Unknown command: ${cmd}. Valid commands: ${COMMAND_NAMES.join(', ')}`);
    }

    try {
      return await this.handlers[cmd](session, envelope.data);
    } catch (err) {
      this.log.error(`Handler '${cmd}' failed for ${session.label}`, err);
      return errorResult('internal', `Command '${cmd}' failed`);
    }
  }

  private async handleAuth(session: Session, payload: Payload): Promise<OutboundMessage> {
    const parsed = authPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return { type: 'auth', success: false, message: "Missing 'token' parameter" };
    }
    if (this.registry.authenticate(session, parsed.data.token)) {
      return { type: 'auth', success: true, message: 'Authenticated successfully' };
    }
    return { type: 'auth', success: false, message: 'Invalid token' };
  }

  private async handleMove(session: Session, payload: Payload): Promise<OutboundMessage> {
    if (!this.registry.isAuthenticated(session)) {
      return errorResult('authorization', 'Not authenticated');
    }

    const parsed = movePayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return errorResult('validation', describeIssue(parsed.error, 'dir'));
    }

    const requested = parsed.data.dir.toLowerCase();
    const direction = directionSchema.safeParse(requested);
    if (!direction.success) {
      return errorResult(
        'validation',
        `Invalid direction: ${requested}. Valid: ${VALID_DIRECTIONS.join(', ')}`
      );
    }

    const result = await this.link.execute(commandForDirection(direction.data));
    return {
      type: 'move',
      success: result.success,
      direction: direction.data,
      response: result.response,
      timestamp: timestamp(),
    };
  }

  private async handleStatus(session: Session): Promise<OutboundMessage> {
    const counts = this.registry.counts();
    return {
      type: 'status',
      arduino_connected: this.link.connected,
      link_state: this.link.state,
      authenticated: this.registry.isAuthenticated(session),
      clients_connected: counts.connected,
      clients_authenticated: counts.authenticated,
      timestamp: timestamp(),
    };
  }

  private async handlePing(): Promise<OutboundMessage> {
    return { type: 'pong', timestamp: timestamp() };
  }

  private async handleRaw(session: Session, payload: Payload): Promise<OutboundMessage> {
    if (!this.registry.isAuthenticated(session)) {
      return errorResult('authorization', 'Not authenticated');
    }

    const parsed = rawPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return errorResult('validation', describeIssue(parsed.error, 'command'));
    }

    const raw = parseRawCommand(parsed.data.command);
    if (!raw.ok) {
      return errorResult('validation', raw.message);
    }

    this.log.info(`Raw command ${raw.command.verb} from ${session.label}`);
    const result = await this.link.execute(raw.command);
    return {
      type: 'raw',
      success: result.success,
      command: raw.command.verb,
      response: result.response,
      timestamp: timestamp(),
    };
  }

  private async handleSubscribe(session: Session, payload: Payload): Promise<OutboundMessage> {
    const parsed = subscribePayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return errorResult('validation', describeIssue(parsed.error, 'enabled'));
    }
    this.registry.setSubscribed(session, parsed.data.enabled);
    return { type: 'subscribe', success: true, subscribed: session.subscribedToBroadcast };
  }
}

function describeIssue(error: z.ZodError, field: string): string {
  const issue = error.issues[0];
  if (!issue || (issue.code === 'invalid_type' && issue.received === 'undefined')) {
    return `Missing '${field}' parameter`;
  }
  return `Invalid '${field}' parameter: ${issue.message}`;
}
