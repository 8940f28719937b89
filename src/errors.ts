/**
 * Custom Error Classes for Bridge Operations
 * Provides specific error types so callers can tell recoverable failures from caller errors
 */

/**
 * Error thrown when the TCP connection to the controller cannot be opened
 */
export class ConnectionError extends Error {
    public host: string;
    public port: number;

    constructor(host: string, port: number, message: string) {
        super(`Connection failed to ${host}:${port}: ${message}`);
        this.name = 'ConnectionError';
        this.host = host;
        this.port = port;
    }
}

export type ProtocolErrorKind = 'transport' | 'protocol';

/**
 * Error thrown when a read or write round-trip fails.
 * `transport` means the socket failed; `protocol` means the controller answered with an exception.
 */
export class ProtocolError extends Error {
    public kind: ProtocolErrorKind;
    public operation: string;
    public modbusCode?: number;

    constructor(kind: ProtocolErrorKind, operation: string, message: string, modbusCode?: number) {
        super(`${operation} failed (${kind}): ${message}`);
        this.name = 'ProtocolError';
        this.kind = kind;
        this.operation = operation;
        this.modbusCode = modbusCode;
    }
}

export type CommandErrorCode = 'UNKNOWN_SETPOINT' | 'INVALID_COMMAND' | 'INVALID_REQUEST' | 'WRITE_FAILED';

/**
 * Error returned to operators when a setpoint or command write is refused or fails
 */
export class CommandError extends Error {
    public code: CommandErrorCode;

    constructor(code: CommandErrorCode, message: string) {
        super(message);
        this.name = 'CommandError';
        this.code = code;
    }
}

/**
 * Error thrown when the register map or a descriptor is invalid
 */
export class RegistryError extends Error {
    constructor(message: string) {
        super(`Invalid register map: ${message}`);
        this.name = 'RegistryError';
    }
}

/**
 * Error thrown when the environment configuration is invalid
 */
export class ConfigError extends Error {
    public key: string;

    constructor(key: string, message: string) {
        super(`Invalid configuration ${key}: ${message}`);
        this.name = 'ConfigError';
        this.key = key;
    }
}
