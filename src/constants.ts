/**
 * Bridge Constants
 * Centralized definitions for protocol values, timing and defaults
 */

// Register encoding
export const FLOAT_DECIMAL_FACTOR = 100;       // Floats travel as value * 100 (2 decimals)
export const UINT16_MAX = 0xFFFF;              // Largest value a holding register holds
export const MAX_BLOCK_REGISTERS = 125;        // FC3 read limit per request

// Default block windows
export const VARIABLE_BLOCK_START = 0;         // Process variables start here
export const VARIABLE_BLOCK_COUNT = 20;        // Registers read per cycle
export const SETPOINT_BLOCK_START = 100;       // Setpoint offset block
export const SETPOINT_BLOCK_COUNT = 10;        // Setpoint registers read per cycle

// Default Connection
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_MODBUS_PORT = 502;        // Standard Modbus TCP port
export const DEFAULT_UNIT_ID = 1;
export const DEFAULT_TIMEOUT = 5000;           // Request timeout (ms)

// Unit ID Ranges
export const MIN_UNIT_ID = 1;                  // Minimum valid Modbus unit ID
export const MAX_UNIT_ID = 247;                // Maximum valid Modbus unit ID

// Acquisition timing (ms)
export const DEFAULT_READ_INTERVAL = 1000;     // Sleep between read cycles
export const DEFAULT_RECONNECT_COOLDOWN = 5000;// Wait after an exhausted reconnect sequence
export const DEFAULT_CONNECT_ATTEMPTS = 3;     // Attempts per reconnect sequence
export const DEFAULT_CONNECT_BACKOFF = 2000;   // Wait between connect attempts

// Live feed
export const DEFAULT_PUBLISH_INTERVAL = 1000;  // Push cadence per viewer (ms)

// HTTP
export const DEFAULT_HTTP_PORT = 5000;

// History
export const DEFAULT_HISTORY_INTERVAL = 60000; // Minimum spacing of persisted readings (ms)
export const DEFAULT_HISTORY_MAX_ENTRIES = 1000;

