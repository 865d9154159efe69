/**
 * Bind address parsing — `host:port` and `[ipv6]:port`.
 */

import { isIP } from "node:net";
import { ConfigError } from "./errors.js";

export interface BindAddress {
	host: string;
	port: number;
}

const HOSTNAME_RE = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)*$/;

/**
 * Parse a port number from a string or number.
 *
 * @throws {ConfigError} Unless the value is an integer in 0..65535.
 */
export function parsePort(value: string | number): number {
	const text = typeof value === "number" ? String(value) : value.trim();
	if (!/^\d{1,5}$/.test(text)) {
		throw new ConfigError(`Invalid port "${value}": expected an integer between 0 and 65535`);
	}
	const port = Number(text);
	if (port > 65535) {
		throw new ConfigError(`Invalid port "${value}": expected an integer between 0 and 65535`);
	}
	return port;
}

/**
 * Check that a host is an IPv4/IPv6 literal or a DNS hostname.
 *
 * @throws {ConfigError} For anything else.
 */
export function validateHost(host: string): string {
	if (isIP(host) !== 0 || HOSTNAME_RE.test(host)) return host;
	throw new ConfigError(`Invalid host "${host}"`);
}

/**
 * Parse a bind address such as `127.0.0.1:8080`, `localhost:0`
 * or `[::1]:9000`.
 *
 * @throws {ConfigError} If the string is not a syntactically valid address.
 */
export function parseBindAddress(input: string): BindAddress {
	const text = input.trim();

	if (text.startsWith("[")) {
		const end = text.indexOf("]");
		if (end === -1 || text[end + 1] !== ":") {
			throw new ConfigError(`Invalid address "${input}": expected [host]:port`);
		}
		const host = text.slice(1, end);
		if (isIP(host) !== 6) {
			throw new ConfigError(`Invalid address "${input}": "${host}" is not an IPv6 literal`);
		}
		return { host, port: parsePort(text.slice(end + 2)) };
	}

	const sep = text.lastIndexOf(":");
	if (sep <= 0) {
		throw new ConfigError(`Invalid address "${input}": expected host:port`);
	}
	const host = text.slice(0, sep);
	if (host.includes(":")) {
		throw new ConfigError(`Invalid address "${input}": IPv6 hosts must be bracketed, e.g. [::1]:8080`);
	}
	return { host: validateHost(host), port: parsePort(text.slice(sep + 1)) };
}

/** Render an address back to `host:port`, bracketing IPv6 literals. */
export function formatAddress(address: BindAddress): string {
	return address.host.includes(":")
		? `[${address.host}]:${address.port}`
		: `${address.host}:${address.port}`;
}
