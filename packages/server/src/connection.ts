/**
 * Sandhana — one accepted WebSocket connection, end to end.
 * Sanskrit: Sandhana (संधान) = connection, junction.
 *
 * Owns the connection's read half and write half. `run()` drives the
 * per-connection loop: await the next frame, apply the dispatcher policy,
 * await the reply, repeat. The loop moves through
 * `open → closing → closed` and always resolves with an outcome instead
 * of throwing, so a failing connection never disturbs the listener.
 */

import { randomUUID } from "node:crypto";
import type { Duplex } from "node:stream";
import { ProtocolError, TransportError, createLogger, toError } from "@pratidhvani/core";
import type { Logger } from "@pratidhvani/core";
import type { DispatchPolicy } from "./dispatcher.js";
import { CloseCode, DEFAULT_MAX_PAYLOAD } from "./frame.js";
import type { Frame } from "./frame.js";
import { readFrames } from "./frame-reader.js";
import { FrameWriter } from "./frame-writer.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export type ConnectionState = "open" | "closing" | "closed";

export type CloseReason =
	/** Peer sent a Close frame. */
	| "close-frame"
	/** Peer ended the TCP stream without a Close frame. */
	| "peer-ended"
	/** The server closed the connection (shutdown). */
	| "server-close"
	| "protocol-error"
	| "read-error"
	| "write-error"
	| "internal-error";

export interface ConnectionOutcome {
	reason: CloseReason;
	/** Frames read from the peer, control frames included. */
	framesReceived: number;
	/** Text/Binary replies written to the peer. */
	framesSent: number;
	/** Status code of the Close frame that ended the connection, if any. */
	closeCode?: number;
	error?: Error;
}

export interface EchoConnectionOptions {
	socket: Duplex;
	policy: DispatchPolicy;
	/** Bytes received together with the upgrade request. */
	head?: Buffer;
	id?: string;
	/** Default: 16 MiB. */
	maxPayloadBytes?: number;
	/** How long a half-closed socket may linger before it is destroyed. Default: 500. */
	closeTimeoutMs?: number;
	logger?: Logger;
}

const DEFAULT_CLOSE_TIMEOUT = 500;

// ─── Connection ─────────────────────────────────────────────────────────────

export class EchoConnection {
	readonly id: string;

	private state: ConnectionState = "open";
	private framesReceived = 0;
	private framesSent = 0;
	private lingerTimer: ReturnType<typeof setTimeout> | null = null;

	private readonly socket: Duplex;
	private readonly policy: DispatchPolicy;
	private readonly reader: AsyncGenerator<Frame, void, undefined>;
	private readonly writer: FrameWriter;
	private readonly closeTimeoutMs: number;
	private readonly log: Logger;

	constructor(opts: EchoConnectionOptions) {
		this.id = opts.id ?? randomUUID();
		this.socket = opts.socket;
		this.policy = opts.policy;
		this.closeTimeoutMs = opts.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT;
		this.log = (opts.logger ?? createLogger("connection")).withContext({ connectionId: this.id });

		const source: AsyncIterable<Buffer> = this.socket.iterator({ destroyOnReturn: false });
		this.reader = readFrames(source, opts.head ?? Buffer.alloc(0), {
			maxPayload: opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD,
			requireMask: true,
		});
		this.writer = new FrameWriter(this.socket);

		this.socket.once("close", () => this.clearLinger());
		// Errors also surface through the reader or writer; this keeps late ones from going unhandled.
		this.socket.on("error", (err) => this.log.debug("Socket error", { error: err.message }));
	}

	/**
	 * Run the per-connection loop until the connection ends.
	 * Never rejects.
	 */
	async run(): Promise<ConnectionOutcome> {
		try {
			for await (const frame of this.reader) {
				this.framesReceived++;

				if (this.state !== "open") {
					// Waiting for the peer to answer our Close; only that matters now.
					if (frame.kind === "close") return this.finishGraceful("server-close", frame.code);
					continue;
				}

				if (frame.kind === "ping") {
					await this.writer.send({ kind: "pong", payload: frame.payload });
					continue;
				}

				const action = this.policy(frame);
				switch (action.kind) {
					case "reply":
						await this.writer.send(action.frame);
						this.framesSent++;
						break;
					case "ignore":
						this.log.debug(`Ignored ${frame.kind} frame`);
						break;
					case "close": {
						const code = frame.kind === "close" ? frame.code : CloseCode.Normal;
						this.state = "closing";
						await this.sendCloseBestEffort(code, "");
						return this.finishGraceful("close-frame", code);
					}
				}
			}
			return this.finishGraceful(this.state === "open" ? "peer-ended" : "server-close");
		} catch (err) {
			return this.fail(toError(err));
		}
	}

	/**
	 * Start closing from the server side: send Close, stop writing, and
	 * destroy the socket if the peer has not gone within the close timeout.
	 */
	close(code: number = CloseCode.Normal, reason: string = ""): void {
		if (this.state !== "open") return;
		this.state = "closing";
		this.log.debug("Closing connection", { code, reason });
		this.sendCloseBestEffort(code, reason).catch((err: unknown) => {
			this.log.error("Close frame failed", err);
		});
		this.writer.end();
		this.scheduleDestroy();
	}

	// ─── Internal ─────────────────────────────────────────────────────────

	private async sendCloseBestEffort(code: number | undefined, reason: string): Promise<void> {
		if (!this.writer.writable) return;
		try {
			await this.writer.send({ kind: "close", code, reason });
		} catch (err) {
			this.log.debug("Peer gone before Close frame was written", { error: toError(err).message });
		}
	}

	private finishGraceful(reason: CloseReason, closeCode?: number): ConnectionOutcome {
		this.writer.end();
		// Drain anything the peer still sends so its FIN is seen and the socket closes.
		this.socket.resume();
		this.scheduleDestroy();
		return this.finish({ reason, closeCode });
	}

	private async fail(error: Error): Promise<ConnectionOutcome> {
		if (this.state !== "open") {
			// The socket was torn down while we were closing it ourselves.
			this.destroy();
			return this.finish({ reason: "server-close" });
		}

		if (error instanceof ProtocolError) {
			this.log.warn(`Protocol violation: ${error.message}`, { closeCode: error.closeCode });
			this.state = "closing";
			await this.sendCloseBestEffort(error.closeCode, error.message.slice(0, 120));
			this.destroy();
			return this.finish({ reason: "protocol-error", closeCode: error.closeCode, error });
		}

		this.destroy();
		if (error instanceof TransportError) {
			this.log.warn(`Connection ${error.phase} failed`, { error: toError(error.cause).message });
			return this.finish({ reason: error.phase === "read" ? "read-error" : "write-error", error });
		}

		this.log.error("Connection loop failed", error);
		return this.finish({ reason: "internal-error", error });
	}

	private finish(partial: { reason: CloseReason; closeCode?: number; error?: Error }): ConnectionOutcome {
		this.state = "closed";
		const outcome: ConnectionOutcome = {
			reason: partial.reason,
			framesReceived: this.framesReceived,
			framesSent: this.framesSent,
			...(partial.closeCode !== undefined ? { closeCode: partial.closeCode } : {}),
			...(partial.error ? { error: partial.error } : {}),
		};
		this.log.debug("Connection closed", {
			reason: outcome.reason,
			framesReceived: outcome.framesReceived,
			framesSent: outcome.framesSent,
		});
		return outcome;
	}

	private scheduleDestroy(): void {
		if (this.lingerTimer || this.socket.destroyed) return;
		this.lingerTimer = setTimeout(() => {
			this.lingerTimer = null;
			this.socket.destroy();
		}, this.closeTimeoutMs);
		this.lingerTimer.unref();
	}

	private destroy(): void {
		this.clearLinger();
		this.socket.destroy();
	}

	private clearLinger(): void {
		if (this.lingerTimer) {
			clearTimeout(this.lingerTimer);
			this.lingerTimer = null;
		}
	}
}
