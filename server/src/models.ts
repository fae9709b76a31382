import { z } from 'zod';

// ---- Device commands ----

export const directionSchema = z.enum(['forward', 'backward', 'left', 'right', 'stop']);
export type Direction = z.infer<typeof directionSchema>;

export const VALID_DIRECTIONS: readonly Direction[] = directionSchema.options;

export type MotionVerb = 'FORWARD' | 'BACKWARD' | 'LEFT' | 'RIGHT' | 'STOP' | 'PING';

export const DIRECTION_TO_VERB: Record<Direction, MotionVerb> = {
  forward: 'FORWARD',
  backward: 'BACKWARD',
  left: 'LEFT',
  right: 'RIGHT',
  stop: 'STOP'
};

export const RAW_TOKEN_MAX_LENGTH = 32;

/**
 * Diagnostic passthrough token. Trimmed and uppercased, then it must be a
 * single run of printable ASCII so it can never carry a line terminator onto
 * the serial line.
 */
export const rawTokenSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(
    z
      .string()
      .min(1, 'Raw command is empty')
      .max(RAW_TOKEN_MAX_LENGTH, `Raw command exceeds ${RAW_TOKEN_MAX_LENGTH} characters`)
      .regex(/^[\x21-\x7E]+$/, 'Raw command must be a single token without whitespace')
  );

export type Command =
  | { kind: 'motion'; verb: MotionVerb }
  | { kind: 'raw'; verb: string };

export const Commands = {
  FORWARD: { kind: 'motion', verb: 'FORWARD' },
  BACKWARD: { kind: 'motion', verb: 'BACKWARD' },
  LEFT: { kind: 'motion', verb: 'LEFT' },
  RIGHT: { kind: 'motion', verb: 'RIGHT' },
  STOP: { kind: 'motion', verb: 'STOP' },
  PING: { kind: 'motion', verb: 'PING' }
} as const satisfies Record<MotionVerb, Command>;

export function commandForDirection(direction: Direction): Command {
  return Commands[DIRECTION_TO_VERB[direction]];
}

export type RawCommandParse =
  | { ok: true; command: Command }
  | { ok: false; message: string };

export function parseRawCommand(input: string): RawCommandParse {
  const parsed = rawTokenSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, message: parsed.error.issues[0]?.message ?? 'Invalid raw command' };
  }
  return { ok: true, command: { kind: 'raw', verb: parsed.data } };
}

// ---- Link ----

export type LinkState = 'disconnected' | 'connecting' | 'connected';

export type LinkFailure = 'not_connected' | 'transport' | 'protocol';

export interface CommandResult {
  success: boolean;
  /** Reply line from the device, or a description of why there is none. */
  response: string;
  failure?: LinkFailure;
  /** Monotonic time the command was written, when it got that far. */
  writtenAt?: number;
}

// ---- Session wire protocol ----

export const inboundEnvelopeSchema = z
  .object({
    cmd: z.string().min(1)
  })
  .passthrough();

export const authPayloadSchema = z.object({ token: z.string() });
export const movePayloadSchema = z.object({ dir: z.string().min(1) });
export const rawPayloadSchema = z.object({ command: z.string().min(1) });
export const subscribePayloadSchema = z.object({ enabled: z.boolean() });

export type ErrorCode = 'validation' | 'authorization' | 'internal';

export type OutboundMessage =
  | { type: 'welcome'; message: string; version: string; commands: string[]; arduino_connected: boolean }
  | { type: 'auth'; success: boolean; message: string }
  | {
      type: 'move';
      success: boolean;
      direction: Direction;
      response: string;
      timestamp: string;
    }
  | {
      type: 'status';
      arduino_connected: boolean;
      link_state: LinkState;
      authenticated: boolean;
      clients_connected: number;
      clients_authenticated: number;
      timestamp: string;
    }
  | { type: 'pong'; timestamp: string }
  | {
      type: 'raw';
      success: boolean;
      command: string;
      response: string;
      timestamp: string;
    }
  | { type: 'subscribe'; success: boolean; subscribed: boolean }
  | { type: 'heartbeat'; arduino_connected: boolean; timestamp: string }
  | { type: 'error'; code: ErrorCode; message: string; timestamp: string };

export interface SessionCounts {
  connected: number;
  authenticated: number;
}
