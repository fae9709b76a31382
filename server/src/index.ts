import cors from 'cors';
import express from 'express';
import http from 'http';
import { buildRouter } from './api';
import {
  AUTH_TOKEN,
  FAILSAFE_TIMEOUT_MS,
  HEARTBEAT_BROADCAST_MS,
  HTTP_HOST,
  HTTP_PORT,
  MAX_RECONNECT_ATTEMPTS,
  SERIAL_BAUD,
  SERIAL_PORT,
  SERIAL_RECONNECT_DELAY_MS,
  SERIAL_TIMEOUT_MS,
  SERVER_VERSION,
  WATCHDOG_INTERVAL_MS,
  WS_HEARTBEAT_MS,
  WS_MAX_PAYLOAD,
  WS_PATH,
  WS_PERMESSAGE_DEFLATE,
} from './config';
import { DeviceLink } from './deviceLink';
import { httpLog, logger, wsLog } from './logger';
import { RobotServer } from './robotServer';
import { listControllerPorts } from './serialTransport';

const app = express();
app.use(cors());
app.use(express.json());

const server = http.createServer(app);

const link = new DeviceLink({
  address: { path: SERIAL_PORT, baudRate: SERIAL_BAUD, ioTimeoutMs: SERIAL_TIMEOUT_MS },
  reconnectDelayMs: SERIAL_RECONNECT_DELAY_MS,
  maxReconnectAttempts: MAX_RECONNECT_ATTEMPTS,
});

const robot = new RobotServer(server, {
  link,
  authToken: AUTH_TOKEN,
  failsafe: { timeoutMs: FAILSAFE_TIMEOUT_MS, intervalMs: WATCHDOG_INTERVAL_MS },
  ws: {
    path: WS_PATH,
    maxPayload: WS_MAX_PAYLOAD,
    perMessageDeflate: WS_PERMESSAGE_DEFLATE,
    livenessIntervalMs: WS_HEARTBEAT_MS,
    heartbeatIntervalMs: HEARTBEAT_BROADCAST_MS,
    version: SERVER_VERSION,
  },
});

// API routes
app.use(buildRouter({ link, registry: robot.registry, authToken: AUTH_TOKEN, listPorts: listControllerPorts }));

function handleSignal(signal: NodeJS.Signals): void {
  logger.info('[SERVER]', `${signal} received`);
  robot
    .shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error('[SERVER]', 'Shutdown failed', err);
      process.exit(1);
    });
}

process.on('SIGINT', handleSignal);
process.on('SIGTERM', handleSignal);

robot
  .start()
  .then(() => {
    server.listen(HTTP_PORT, HTTP_HOST, () => {
      httpLog(`HTTP server listening on http://${HTTP_HOST}:${HTTP_PORT}`);
      wsLog(`WebSocket endpoint ws://${HTTP_HOST}:${HTTP_PORT}${WS_PATH}`);
      httpLog('Robot control server ready');
    });
  })
  .catch((err: unknown) => {
    logger.error('[SERVER]', 'Startup failed', err);
    process.exit(1);
  });
