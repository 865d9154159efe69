/**
 * Opening handshake — HTTP Upgrade to WebSocket (RFC 6455 section 4).
 */

import { STATUS_CODES } from "node:http";
import type { IncomingHttpHeaders } from "node:http";
import { createHash } from "node:crypto";
import type { Duplex } from "node:stream";
import { HandshakeError } from "@pratidhvani/core";

/** The magic GUID specified in RFC 6455 section 4.2.2 */
export const WS_MAGIC_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

export const SUPPORTED_VERSION = "13";

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/** The parts of an upgrade request the handshake looks at. */
export interface UpgradeRequest {
	method?: string;
	headers: IncomingHttpHeaders;
}

/**
 * Compute the Sec-WebSocket-Accept value per RFC 6455 section 4.2.2.
 */
export function computeAcceptKey(secWebSocketKey: string): string {
	return createHash("sha1")
		.update(secWebSocketKey + WS_MAGIC_GUID)
		.digest("base64");
}

function headerTokens(value: string | string[] | undefined): string[] {
	if (value === undefined) return [];
	const joined = Array.isArray(value) ? value.join(",") : value;
	return joined.split(",").map((t) => t.trim().toLowerCase()).filter(Boolean);
}

/**
 * Validate the handshake request and return its Sec-WebSocket-Key.
 *
 * @throws {HandshakeError} 405 for non-GET requests, 426 for unsupported
 *   versions and 400 for anything else that is malformed.
 */
export function validateHandshake(req: UpgradeRequest): string {
	if (req.method !== undefined && req.method.toUpperCase() !== "GET") {
		throw new HandshakeError(`Method ${req.method} not allowed for WebSocket upgrade`, 405);
	}

	if (!headerTokens(req.headers["upgrade"]).includes("websocket")) {
		throw new HandshakeError("Missing or invalid Upgrade header", 400);
	}

	if (!headerTokens(req.headers["connection"]).includes("upgrade")) {
		throw new HandshakeError("Connection header must include Upgrade", 400);
	}

	const version = req.headers["sec-websocket-version"];
	if (version !== SUPPORTED_VERSION) {
		throw new HandshakeError(`Unsupported WebSocket version ${version ?? "(none)"}`, 426);
	}

	const key = req.headers["sec-websocket-key"];
	if (typeof key !== "string" || !BASE64_RE.test(key.trim()) || Buffer.from(key.trim(), "base64").length !== 16) {
		throw new HandshakeError("Missing or invalid Sec-WebSocket-Key", 400);
	}

	return key.trim();
}

/**
 * Build the 101 Switching Protocols response that completes the handshake.
 */
export function buildHandshakeResponse(acceptKey: string): string {
	return [
		"HTTP/1.1 101 Switching Protocols",
		"Upgrade: websocket",
		"Connection: Upgrade",
		`Sec-WebSocket-Accept: ${acceptKey}`,
		"",
		"",
	].join("\r\n");
}

/**
 * Build an HTTP error response for a refused upgrade.
 */
export function buildRejectionResponse(status: number, message: string): string {
	const body = JSON.stringify({ error: message });
	const lines = [
		`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? "Error"}`,
		"Content-Type: application/json",
		`Content-Length: ${Buffer.byteLength(body)}`,
		"Connection: close",
	];
	if (status === 426) {
		lines.push(`Sec-WebSocket-Version: ${SUPPORTED_VERSION}`);
	}
	lines.push("", body);
	return lines.join("\r\n");
}

/**
 * Send an HTTP error response on the raw socket and destroy it once flushed.
 */
export function rejectUpgrade(socket: Duplex, status: number, message: string): void {
	if (!socket.writable) {
		socket.destroy();
		return;
	}
	socket.write(buildRejectionResponse(status, message), () => socket.destroy());
}
