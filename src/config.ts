import { ConfigError } from './errors';
import { isValidDeviceId } from './protocol';
import { BridgeConfig, DeviceConfig } from './types';

type Env = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function readString(env: Env, key: string, fallback?: string): string {
  const value = env[key]?.trim();
  if (value) {
    return value;
  }
  if (fallback === undefined) {
    throw new ConfigError(`Missing required setting ${key}`);
  }
  return fallback;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got ${JSON.stringify(raw)}`);
  }
  return value;
}

function readNonNegative(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (value < 0) {
    throw new ConfigError(`${key} must not be negative`);
  }
  return value;
}

function readPort(env: Env, key: string, fallback: number): number {
  const port = readNumber(env, key, fallback);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`${key} must be a TCP port, got ${port}`);
  }
  return port;
}

const seconds = (value: number): number => Math.round(value * 1000);

function parseDevices(raw: string): DeviceConfig[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError('Invalid DEVICES configuration. Must be a valid JSON array.', { cause: error });
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigError('Invalid DEVICES configuration. Must be a valid JSON array.');
  }

  const seen = new Set<string>();
  return parsed.map((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new ConfigError(`DEVICES[${index}] must be an object`);
    }
    const rawId: unknown = 'id' in entry ? entry.id : undefined;
    const id = typeof rawId === 'number' ? String(rawId) : rawId;
    if (typeof id !== 'string' || !isValidDeviceId(id)) {
      throw new ConfigError(`DEVICES[${index}].id must be a gateway device id`);
    }
    if (seen.has(id)) {
      throw new ConfigError(`DEVICES contains duplicate id ${id}`);
    }
    seen.add(id);
    const rawName: unknown = 'name' in entry ? entry.name : undefined;
    const name = typeof rawName === 'string' && rawName.trim() ? rawName.trim() : `Device_${id}`;
    return { id, name };
  });
}

/**
 * Build the immutable settings snapshot from environment variables.
 * Throws ConfigError on the first missing or malformed value.
 */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const code = readString(env, 'ZENSE_CODE');
  if (!/^\d+$/.test(code)) {
    throw new ConfigError('ZENSE_CODE must be numeric');
  }

  const mqttHost = readString(env, 'MQTT_HOST', '127.0.0.1');
  const mqttPort = readPort(env, 'MQTT_PORT', 1883);
  const brokerUrl = readString(env, 'MQTT_BROKER_URL', `mqtt://${mqttHost}:${mqttPort}`);

  const reconnectMinMs = seconds(readNonNegative(env, 'RECONNECT_MIN_SEC', 1));
  const reconnectMaxMs = seconds(readNonNegative(env, 'RECONNECT_MAX_SEC', 60));
  if (reconnectMaxMs < reconnectMinMs) {
    throw new ConfigError('RECONNECT_MAX_SEC must not be below RECONNECT_MIN_SEC');
  }

  const maxProtocolErrors = readNumber(env, 'MAX_PROTOCOL_ERRORS', 3);
  if (!Number.isInteger(maxProtocolErrors) || maxProtocolErrors < 1) {
    throw new ConfigError('MAX_PROTOCOL_ERRORS must be a positive integer');
  }

  const config: BridgeConfig = {
    gateway: {
      host: readString(env, 'ZENSE_IP'),
      port: readPort(env, 'ZENSE_PORT', 10001),
      code,
      socketTimeoutMs: seconds(readNonNegative(env, 'SOCKET_TIMEOUT', 12)),
      cmdGapMs: seconds(readNonNegative(env, 'CMD_GAP_SEC', 0.1)),
      keepAliveMs: 30000,
      reconnectMinMs,
      reconnectMaxMs,
      authCooldownMs: seconds(readNonNegative(env, 'AUTH_COOLDOWN_SEC', 300)),
      maxProtocolErrors,
    },
    mqtt: {
      brokerUrl,
      username: env.MQTT_USER?.trim() || undefined,
      password: env.MQTT_PASS || undefined,
    },
    topics: {
      discoveryPrefix: readString(env, 'DISCOVERY_PREFIX', 'homeassistant'),
      baseTopic: readString(env, 'BASE', 'homeassistant/zense_bridge'),
      uidPrefix: readString(env, 'UID_PREFIX', 'zensebridge_'),
    },
    devices: parseDevices(readString(env, 'DEVICES', '[]')),
    // <= 0 disables polling
    statePollMs: seconds(readNumber(env, 'STATE_POLL_SEC', 600)),
    debounceMs: readNonNegative(env, 'DEBOUNCE_MS', 120),
    levelOnWindowMs: seconds(readNonNegative(env, 'LEVEL_ON_WINDOW_SEC', 1)),
    debug: TRUTHY.has((env.DEBUG_MQTT ?? '').trim().toLowerCase()),
  };

  return Object.freeze(config);
}
