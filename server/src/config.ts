export const HTTP_PORT = parseInt(process.env.PORT || '8765', 10);
export const HTTP_HOST = process.env.HOST || '0.0.0.0';

// WebSocket (ws) tuning for low-latency LAN control
export const WS_PATH = process.env.WS_PATH || '/robot';
// protocol-level ping every 20s; no pong by the next round ⇒ drop
export const WS_HEARTBEAT_MS = parseInt(process.env.WS_HEARTBEAT_MS || '20000', 10);

// keep payloads tight; control frames are tiny JSON objects
export const WS_MAX_PAYLOAD = 16 * 1024;   // 16KB upper bound
export const WS_PERMESSAGE_DEFLATE = false;// disable compression for low CPU/latency

// Application heartbeat pushed to authenticated sessions
export const HEARTBEAT_BROADCAST_MS = parseInt(process.env.HEARTBEAT_BROADCAST_MS || '5000', 10);

// Serial link to the motor controller
export const SERIAL_PORT = process.env.SERIAL_PORT || '/dev/ttyACM0';
export const SERIAL_BAUD = parseInt(process.env.SERIAL_BAUD || '9600', 10);
export const SERIAL_TIMEOUT_MS = parseInt(process.env.SERIAL_TIMEOUT_MS || '1000', 10);
export const SERIAL_RECONNECT_DELAY_MS = parseInt(process.env.SERIAL_RECONNECT_DELAY_MS || '5000', 10);
export const MAX_RECONNECT_ATTEMPTS = parseInt(process.env.MAX_RECONNECT_ATTEMPTS || '10', 10);

// Safety
export const FAILSAFE_TIMEOUT_MS = parseInt(process.env.FAILSAFE_TIMEOUT_MS || '2000', 10);
export const WATCHDOG_INTERVAL_MS = parseInt(process.env.WATCHDOG_INTERVAL_MS || '500', 10);

// Shared secret for session auth. Override in any real deployment.
export const AUTH_TOKEN = process.env.AUTH_TOKEN || 'change-me';

export const SERVER_VERSION = '1.0.0';
