/**
 * Listener — binds one address and hands every upgrade request to its
 * own task without waiting for it.
 *
 * Built on node:http so request parsing, `clientError` handling and the
 * `upgrade` event come from the platform. A bind failure rejects
 * `listen()`; errors after that (including failed accepts) are logged and
 * the server keeps accepting.
 */

import http from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import { BindError, createLogger, formatAddress } from "@pratidhvani/core";
import type { BindAddress, Logger } from "@pratidhvani/core";

/** Handles one upgrade request. The returned promise is the connection's whole lifetime. */
export type UpgradeHandler = (req: http.IncomingMessage, socket: Duplex, head: Buffer) => Promise<void>;

export interface ListenerOptions {
	onUpgrade: UpgradeHandler;
	logger?: Logger;
}

const UPGRADE_REQUIRED_BODY = "Upgrade Required: this endpoint only speaks WebSocket\n";

export class Listener {
	private readonly server: http.Server;
	private readonly onUpgrade: UpgradeHandler;
	private readonly log: Logger;
	private listening = false;

	constructor(opts: ListenerOptions) {
		this.onUpgrade = opts.onUpgrade;
		this.log = opts.logger ?? createLogger("listener");

		this.server = http.createServer((_req, res) => {
			res.writeHead(426, {
				"Content-Type": "text/plain; charset=utf-8",
				"Upgrade": "websocket",
				"Connection": "Upgrade",
			});
			res.end(UPGRADE_REQUIRED_BODY);
		});

		this.server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
			this.onUpgrade(req, socket, head).catch((err: unknown) => {
				this.log.error("Upgrade handler failed", err);
				socket.destroy();
			});
		});

		this.server.on("clientError", (err: NodeJS.ErrnoException, socket: Duplex) => {
			this.log.warn("Malformed request from client", { error: err.message, code: err.code });
			if (err.code === "ECONNRESET" || !socket.writable) {
				socket.destroy();
				return;
			}
			socket.end("HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n");
		});

		this.server.on("error", (err: NodeJS.ErrnoException) => {
			if (this.listening) this.handleRuntimeError(err);
		});
	}

	/** Underlying HTTP server. */
	get httpServer(): http.Server {
		return this.server;
	}

	/** Bound address, or null before `listen()` resolves. */
	get address(): AddressInfo | null {
		const addr = this.server.address();
		return typeof addr === "object" && addr !== null ? addr : null;
	}

	/**
	 * Bind and start accepting.
	 *
	 * @throws {BindError} If the address cannot be bound (in use, no permission, ...).
	 */
	listen(address: BindAddress): Promise<AddressInfo> {
		const label = formatAddress(address);
		return new Promise<AddressInfo>((resolve, reject) => {
			const onError = (err: NodeJS.ErrnoException) => {
				this.server.off("listening", onListening);
				reject(new BindError(label, err.code, err));
			};
			const onListening = () => {
				this.server.off("error", onError);
				this.listening = true;
				const info = this.address;
				if (!info) {
					reject(new BindError(label, undefined));
					return;
				}
				resolve(info);
			};

			this.server.once("error", onError);
			this.server.once("listening", onListening);
			this.server.listen(address.port, address.host);
		});
	}

	/**
	 * Stop accepting and resolve once the socket and every connection on
	 * it are released.
	 */
	close(): Promise<void> {
		if (!this.listening) return Promise.resolve();
		this.listening = false;
		return new Promise<void>((resolve, reject) => {
			this.server.close((err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	private handleRuntimeError(err: NodeJS.ErrnoException): void {
		if (err.syscall === "accept") {
			this.log.warn("Accept failed; still listening", { code: err.code, error: err.message });
			return;
		}
		this.log.error("Listener error", err);
	}
}
