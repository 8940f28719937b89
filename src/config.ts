import * as CONST from './constants';
import { SetpointCacheMode } from './command-gateway';
import { ConfigError } from './errors';
import { DEFAULT_REGISTER_MAP } from './registry';

export interface BridgeConfig {
    modbus: {
        host: string;
        port: number;
        unitId: number;
        timeout: number;
    };
    acquisition: {
        readIntervalMs: number;
        reconnectCooldownMs: number;
        connectAttempts: number;
        connectBackoffMs: number;
    };
    publishIntervalMs: number;
    httpPort: number;
    registerMap: string;
    setpointCacheMode: SetpointCacheMode;
    history: {
        file: string | null;
        intervalMs: number;
        maxEntries: number;
    };
}

type Env = Record<string, string | undefined>;

/**
 * Missing or unparseable numbers fall back to the default; parsed numbers must satisfy `min`/`max`.
 */
function readInt(env: Env, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const parsed = parseInt(env[key] ?? '', 10);
    if (isNaN(parsed)) return fallback;
    if (parsed < min || parsed > max) {
        throw new ConfigError(key, `${parsed} is outside ${min}-${max}`);
    }
    return parsed;
}

function readString(env: Env, key: string, fallback: string): string {
    const value = env[key]?.trim();
    return value ? value : fallback;
}

function readCacheMode(env: Env): SetpointCacheMode {
    const value = readString(env, 'SETPOINT_CACHE_MODE', 'reset');
    if (value !== 'reset' && value !== 'written') {
        throw new ConfigError('SETPOINT_CACHE_MODE', `"${value}" must be "reset" or "written"`);
    }
    return value;
}

/**
 * Build the bridge configuration from environment variables
 * @throws {ConfigError} If a value is present but invalid
 */
export function loadConfig(env: Env = process.env): BridgeConfig {
    const historyFile = env.HISTORY_FILE?.trim();

    return {
        modbus: {
            host: readString(env, 'MODBUS_HOST', CONST.DEFAULT_HOST),
            port: readInt(env, 'MODBUS_PORT', CONST.DEFAULT_MODBUS_PORT, 1, 65535),
            unitId: readInt(env, 'MODBUS_UNIT_ID', CONST.DEFAULT_UNIT_ID, CONST.MIN_UNIT_ID, CONST.MAX_UNIT_ID),
            timeout: readInt(env, 'MODBUS_TIMEOUT_MS', CONST.DEFAULT_TIMEOUT, 1)
        },
        acquisition: {
            readIntervalMs: readInt(env, 'READ_INTERVAL_MS', CONST.DEFAULT_READ_INTERVAL, 1),
            reconnectCooldownMs: readInt(env, 'RECONNECT_COOLDOWN_MS', CONST.DEFAULT_RECONNECT_COOLDOWN, 1),
            connectAttempts: readInt(env, 'CONNECT_ATTEMPTS', CONST.DEFAULT_CONNECT_ATTEMPTS, 1),
            connectBackoffMs: readInt(env, 'CONNECT_BACKOFF_MS', CONST.DEFAULT_CONNECT_BACKOFF, 0)
        },
        publishIntervalMs: readInt(env, 'PUBLISH_INTERVAL_MS', CONST.DEFAULT_PUBLISH_INTERVAL, 1),
        httpPort: readInt(env, 'HTTP_PORT', CONST.DEFAULT_HTTP_PORT, 0, 65535),
        registerMap: readString(env, 'REGISTER_MAP', DEFAULT_REGISTER_MAP),
        setpointCacheMode: readCacheMode(env),
        history: {
            file: historyFile ? historyFile : null,
            intervalMs: readInt(env, 'HISTORY_INTERVAL_MS', CONST.DEFAULT_HISTORY_INTERVAL, 0),
            maxEntries: readInt(env, 'HISTORY_MAX_ENTRIES', CONST.DEFAULT_HISTORY_MAX_ENTRIES, 1)
        }
    };
}
