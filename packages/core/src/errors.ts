/**
 * Typed error hierarchy for Pratidhvani.
 *
 * All Pratidhvani errors extend {@link PratidhvaniError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all Pratidhvani errors.
 *
 * Carries a machine-readable `code` field (e.g. `"BIND_ERROR"`) for
 * programmatic error detection in addition to the human-readable `message`.
 */
export class PratidhvaniError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "PratidhvaniError";
		this.code = code;
	}
}

/**
 * Configuration error (invalid address, unreadable config file, bad value, etc.).
 */
export class ConfigError extends PratidhvaniError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * The listening socket could not be bound. Fatal to the listener.
 *
 * `osCode` is the errno string reported by the OS (e.g. `"EADDRINUSE"`).
 */
export class BindError extends PratidhvaniError {
	readonly address: string;
	readonly osCode?: string;

	constructor(address: string, osCode?: string, cause?: Error) {
		super(`Failed to bind ${address}${osCode ? ` (${osCode})` : ""}`, "BIND_ERROR", cause);
		this.name = "BindError";
		this.address = address;
		this.osCode = osCode;
	}
}

/**
 * The opening handshake was rejected. `status` is the HTTP status
 * written back to the peer before the socket is dropped.
 */
export class HandshakeError extends PratidhvaniError {
	readonly status: number;

	constructor(message: string, status: number = 400) {
		super(message, "HANDSHAKE_ERROR");
		this.name = "HandshakeError";
		this.status = status;
	}
}

/**
 * The peer violated the framing protocol. `closeCode` is the
 * WebSocket status code sent in the failing Close frame.
 */
export class ProtocolError extends PratidhvaniError {
	readonly closeCode: number;

	constructor(message: string, closeCode: number = 1002) {
		super(message, "PROTOCOL_ERROR");
		this.name = "ProtocolError";
		this.closeCode = closeCode;
	}
}

/**
 * Reading from or writing to a connection's socket failed.
 */
export class TransportError extends PratidhvaniError {
	readonly phase: "read" | "write";

	constructor(message: string, phase: "read" | "write", cause?: Error) {
		super(message, "TRANSPORT_ERROR", cause);
		this.name = "TransportError";
		this.phase = phase;
	}
}

/** Narrow an unknown thrown value to an `Error`. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
