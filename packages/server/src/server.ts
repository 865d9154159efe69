/**
 * Pratidhvani — WebSocket echo server.
 * Sanskrit: Pratidhvani (प्रतिध्वनि) = echo, resonance.
 *
 * Composes the listener, handshake, per-connection loop and dispatcher
 * policy. Every connection is isolated: it owns its reader and writer,
 * and nothing is ever broadcast.
 */

import type http from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import {
	DEFAULT_SETTINGS,
	HandshakeError,
	createLogger,
	formatAddress,
	parseBindAddress,
	toError,
} from "@pratidhvani/core";
import type { BindAddress, BinaryMode, Logger, ServerSettings, TextMode } from "@pratidhvani/core";
import { EchoConnection } from "./connection.js";
import type { ConnectionOutcome } from "./connection.js";
import { createEchoPolicy, describePolicy } from "./dispatcher.js";
import type { DispatchPolicy } from "./dispatcher.js";
import { CloseCode } from "./frame.js";
import { buildHandshakeResponse, computeAcceptKey, rejectUpgrade, validateHandshake } from "./handshake.js";
import { Listener } from "./listener.js";

// ─── Public Types ───────────────────────────────────────────────────────────

export interface EchoServerOptions {
	/** `host:port`; takes precedence over `host` and `port`. */
	address?: string;
	/** Default: 127.0.0.1 */
	host?: string;
	/** Default: 8080. Use 0 for an ephemeral port. */
	port?: number;
	textMode?: TextMode;
	prefix?: string;
	binaryMode?: BinaryMode;
	/** Custom text transform; overrides `textMode`. */
	transform?: (text: string) => string;
	/** Custom policy; overrides every option above it. */
	policy?: DispatchPolicy;
	/** Default: 1024. */
	maxConnections?: number;
	/** Default: 16 MiB. */
	maxPayloadBytes?: number;
	/** Linger before a half-closed socket is destroyed. Default: 500 ms. */
	closeTimeoutMs?: number;
	logger?: Logger;
}

export interface EchoServerEvents {
	/** Called after the handshake, before the first frame is read. */
	onConnect?: (connection: EchoConnection) => void;
	/** Called when a connection's loop has ended. */
	onDisconnect?: (connectionId: string, outcome: ConnectionOutcome) => void;
	/** Called when an upgrade is refused. */
	onReject?: (error: HandshakeError) => void;
}

// ─── Server ─────────────────────────────────────────────────────────────────

export class EchoServer {
	private readonly connections = new Map<string, EchoConnection>();
	private readonly tasks = new Set<Promise<void>>();
	private readonly listener: Listener;
	private readonly policy: DispatchPolicy;
	private readonly bindAddress: BindAddress;
	private readonly maxConnections: number;
	private readonly maxPayloadBytes: number;
	private readonly closeTimeoutMs?: number;
	private readonly policyLabel: string;
	private readonly log: Logger;

	/** External event hooks. */
	events: EchoServerEvents = {};

	constructor(options: EchoServerOptions = {}) {
		this.bindAddress = options.address
			? parseBindAddress(options.address)
			: { host: options.host ?? DEFAULT_SETTINGS.host, port: options.port ?? DEFAULT_SETTINGS.port };
		this.policy = options.policy ?? createEchoPolicy(options);
		this.policyLabel = options.policy ? "custom" : describePolicy(options);
		this.maxConnections = options.maxConnections ?? DEFAULT_SETTINGS.maxConnections;
		this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_SETTINGS.maxPayloadBytes;
		this.closeTimeoutMs = options.closeTimeoutMs;
		this.log = options.logger ?? createLogger("echo-server");

		this.listener = new Listener({
			logger: this.log.child("listener"),
			onUpgrade: (req, socket, head) => this.track(this.handleUpgrade(req, socket, head)),
		});
	}

	/** Build a server from resolved settings. */
	static fromSettings(settings: ServerSettings, logger?: Logger): EchoServer {
		return new EchoServer({
			host: settings.host,
			port: settings.port,
			textMode: settings.textMode,
			prefix: settings.prefix,
			binaryMode: settings.binaryMode,
			maxConnections: settings.maxConnections,
			maxPayloadBytes: settings.maxPayloadBytes,
			logger,
		});
	}

	/**
	 * Bind and start serving.
	 *
	 * @throws {BindError} If the address cannot be bound.
	 */
	async start(): Promise<AddressInfo> {
		const info = await this.listener.listen(this.bindAddress);
		this.log.info(`Listening on ${this.url ?? formatAddress(this.bindAddress)}`, { policy: this.policyLabel });
		return info;
	}

	/**
	 * Stop accepting, close every open connection with 1001 and resolve
	 * once all of them have finished.
	 */
	async stop(): Promise<void> {
		for (const connection of this.connections.values()) {
			connection.close(CloseCode.GoingAway, "Server shutting down");
		}
		await Promise.all([this.listener.close(), Promise.allSettled(this.tasks)]);
		this.log.info("Server stopped");
	}

	get connectionCount(): number {
		return this.connections.size;
	}

	/** Bound address, or null when not listening. */
	get address(): AddressInfo | null {
		return this.listener.address;
	}

	/** `ws://host:port` of the bound socket, or null when not listening. */
	get url(): string | null {
		const info = this.address;
		if (!info) return null;
		return `ws://${formatAddress({ host: info.address, port: info.port })}`;
	}

	/** The listener, for callers that need the raw HTTP server. */
	get httpServer(): http.Server {
		return this.listener.httpServer;
	}

	// ─── Internal ─────────────────────────────────────────────────────────

	private track(task: Promise<void>): Promise<void> {
		this.tasks.add(task);
		return task.finally(() => this.tasks.delete(task));
	}

	private async handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
		const peer = `${req.socket.remoteAddress ?? "?"}:${req.socket.remotePort ?? "?"}`;
		socket.on("error", (err) => this.log.debug("Socket error before handshake completed", { peer, error: err.message }));

		let wsKey: string;
		try {
			wsKey = validateHandshake(req);
		} catch (err) {
			if (!(err instanceof HandshakeError)) throw err;
			this.refuse(socket, err, peer);
			return;
		}

		if (this.connections.size >= this.maxConnections) {
			this.refuse(socket, new HandshakeError("max connections reached", 503), peer);
			return;
		}

		socket.write(buildHandshakeResponse(computeAcceptKey(wsKey)));

		const connection = new EchoConnection({
			socket,
			head,
			policy: this.policy,
			maxPayloadBytes: this.maxPayloadBytes,
			closeTimeoutMs: this.closeTimeoutMs,
			logger: this.log.child("conn"),
		});
		this.connections.set(connection.id, connection);
		this.log.info("Client connected", { connectionId: connection.id, peer });
		this.notify("onConnect", () => this.events.onConnect?.(connection));

		const outcome = await connection.run();

		this.connections.delete(connection.id);
		this.log.info("Client disconnected", { connectionId: connection.id, reason: outcome.reason });
		this.notify("onDisconnect", () => this.events.onDisconnect?.(connection.id, outcome));
	}

	private refuse(socket: Duplex, err: HandshakeError, peer: string): void {
		this.log.warn(`Handshake refused: ${err.message}`, { peer, status: err.status });
		rejectUpgrade(socket, err.status, err.message);
		this.notify("onReject", () => this.events.onReject?.(err));
	}

	private notify(hook: keyof EchoServerEvents, fn: () => void): void {
		try {
			fn();
		} catch (err) {
			// Hook errors are logged, never rethrown.
			this.log.error(`${hook} hook threw`, toError(err));
		}
	}
}
