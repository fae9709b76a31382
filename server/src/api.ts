// server/src/api.ts
import express from 'express';
import { z } from 'zod';
import { DeviceLink } from './deviceLink';
import { httpLog } from './logger';
import { Commands, LinkState, SessionCounts } from './models';
import { ControllerPort } from './serialTransport';
import { SessionRegistry } from './sessionRegistry';

// ---- Validation schemas ----
const stopPayloadSchema = z
  .object({
    reason: z.string().max(200).optional(),
  })
  .optional();

export interface ApiDeps {
  link: DeviceLink;
  registry: SessionRegistry;
  authToken: string;
  listPorts: () => Promise<ControllerPort[]>;
}

export interface LinkStatusSnapshot {
  arduino_connected: boolean;
  link_state: LinkState;
  reconnecting: boolean;
  reconnect_attempts: number;
  /** Milliseconds since the last command was written, `null` before the first one. */
  idle_ms: number | null;
  sessions: SessionCounts;
  timestamp: string;
}

export function buildStatusSnapshot(
  link: Pick<DeviceLink, 'connected' | 'state' | 'reconnecting' | 'reconnectAttempts' | 'lastAcceptedCommandAt'>,
  registry: Pick<SessionRegistry, 'counts'>,
  now: number = performance.now()
): LinkStatusSnapshot {
  const last = link.lastAcceptedCommandAt;
  return {
    arduino_connected: link.connected,
    link_state: link.state,
    reconnecting: link.reconnecting,
    reconnect_attempts: link.reconnectAttempts,
    idle_ms: last === null ? null : Math.round(now - last),
    sessions: registry.counts(),
    timestamp: new Date().toISOString(),
  };
}

// ---- Helpers ----
export function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1];
}

export function buildRouter(deps: ApiDeps): express.Router {
  const router = express.Router();

  router.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  router.get('/robot/status', (_req, res) => {
    res.json(buildStatusSnapshot(deps.link, deps.registry));
  });

  // Candidate controller ports on this host
  router.get('/robot/ports', async (_req, res, next) => {
    try {
      const ports = await deps.listPorts();
      res.json({ ports });
    } catch (err) {
      next(err);
    }
  });

  // Emergency stop over plain HTTP, same shared secret as the sessions
  router.post('/robot/stop', async (req, res, next) => {
    try {
      if (bearerToken(req.header('authorization')) !== deps.authToken) {
        httpLog('POST /robot/stop rejected: bad or missing token');
        res.status(401).json({ error: 'unauthorized' });
        return;
      }
      const parsed = stopPayloadSchema.parse(req.body);
      httpLog(`POST /robot/stop${parsed?.reason ? ` reason=${parsed.reason}` : ''}`);
      const result = await deps.link.execute(Commands.STOP);
      res.json({ success: result.success, response: result.response });
    } catch (err) {
      next(err);
    }
  });

  // Error handler
  router.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof z.ZodError) {
        res.status(400).json({ error: 'invalid_payload', details: err.errors });
        return;
      }
      httpLog('Unexpected error', err);
      res.status(500).json({ error: 'internal_error' });
    }
  );

  return router;
}
