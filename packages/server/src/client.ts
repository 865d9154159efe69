/**
 * Minimal WebSocket client over a raw TCP socket.
 *
 * Performs the HTTP Upgrade handshake by hand, masks every frame it sends
 * and queues received frames for `nextFrame()`. Used by the `probe`
 * command and by the test suite.
 */

import net from "node:net";
import { randomBytes } from "node:crypto";
import { HandshakeError, PratidhvaniError, toError } from "@pratidhvani/core";
import { FrameParser } from "./frame.js";
import type { Frame } from "./frame.js";
import { FrameWriter } from "./frame-writer.js";
import { computeAcceptKey } from "./handshake.js";

export interface EchoClientOptions {
	/** Handshake timeout. Default: 2000 ms. */
	timeoutMs?: number;
	/** Extra request headers. */
	headers?: Record<string, string>;
	/** Override the Sec-WebSocket-Key (16 random bytes by default). */
	key?: string;
}

interface Waiter {
	resolve: (frame: Frame) => void;
	reject: (err: Error) => void;
	timer: ReturnType<typeof setTimeout>;
}

const DEFAULT_TIMEOUT = 2000;

export class EchoClient {
	/** Settles when the TCP socket has closed. Never rejects. */
	readonly closed: Promise<void>;

	private readonly parser = new FrameParser();
	private readonly writer: FrameWriter;
	private readonly queue: Frame[] = [];
	private readonly waiters: Waiter[] = [];
	private ended = false;
	private closeSent = false;
	private lastError: Error | null = null;

	private constructor(private readonly socket: net.Socket, leftover: Buffer) {
		this.writer = new FrameWriter(socket, { mask: true });
		this.closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));

		socket.on("data", (chunk: Buffer) => this.onData(chunk));
		socket.on("end", () => this.onEnd());
		socket.on("close", () => this.onEnd());
		socket.on("error", (err) => {
			this.lastError = err;
		});

		if (leftover.length > 0) this.onData(leftover);
	}

	/**
	 * Connect to a `ws://host:port/path` URL and complete the handshake.
	 *
	 * @throws {HandshakeError} If the server refuses the upgrade or answers with a bad accept key.
	 */
	static connect(url: string, opts: EchoClientOptions = {}): Promise<EchoClient> {
		const parsed = new URL(url);
		if (parsed.protocol !== "ws:") {
			return Promise.reject(new PratidhvaniError(`Unsupported URL scheme ${parsed.protocol}`, "CLIENT_ERROR"));
		}
		const host = parsed.hostname.replace(/^\[|\]$/g, "");
		const port = parseInt(parsed.port || "80", 10);
		const path = `${parsed.pathname || "/"}${parsed.search}`;
		const key = opts.key ?? randomBytes(16).toString("base64");
		const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT;

		return new Promise<EchoClient>((resolve, reject) => {
			const socket = net.createConnection({ host, port });
			let received = Buffer.alloc(0);

			const timer = setTimeout(() => {
				cleanup();
				socket.destroy();
				reject(new PratidhvaniError(`Handshake with ${url} timed out after ${timeoutMs}ms`, "CLIENT_TIMEOUT"));
			}, timeoutMs);

			const onError = (err: Error) => {
				cleanup();
				reject(err);
			};

			const onData = (chunk: Buffer) => {
				received = Buffer.concat([received, chunk]);
				const headerEnd = received.indexOf("\r\n\r\n");
				if (headerEnd === -1) return;
				cleanup();

				const head = received.subarray(0, headerEnd).toString("latin1");
				const leftover = received.subarray(headerEnd + 4);
				const statusLine = head.split("\r\n")[0];
				const status = parseInt(statusLine.split(" ")[1] ?? "", 10);

				if (status !== 101) {
					socket.destroy();
					reject(new HandshakeError(`Server refused upgrade: ${statusLine}`, Number.isNaN(status) ? 400 : status));
					return;
				}

				const accept = /^sec-websocket-accept:\s*(.+)$/im.exec(head)?.[1]?.trim();
				if (accept !== computeAcceptKey(key)) {
					socket.destroy();
					reject(new HandshakeError("Invalid Sec-WebSocket-Accept", 400));
					return;
				}

				resolve(new EchoClient(socket, leftover));
			};

			const cleanup = () => {
				clearTimeout(timer);
				socket.off("data", onData);
				socket.off("error", onError);
			};

			socket.on("data", onData);
			socket.on("error", onError);
			socket.once("connect", () => {
				const lines = [
					`GET ${path} HTTP/1.1`,
					`Host: ${parsed.host}`,
					"Upgrade: websocket",
					"Connection: Upgrade",
					`Sec-WebSocket-Key: ${key}`,
					"Sec-WebSocket-Version: 13",
				];
				for (const [name, value] of Object.entries(opts.headers ?? {})) {
					lines.push(`${name}: ${value}`);
				}
				lines.push("", "");
				socket.write(lines.join("\r\n"));
			});
		});
	}

	// ─── Sending ──────────────────────────────────────────────────────────

	sendText(text: string): Promise<void> {
		return this.writer.send({ kind: "text", payload: text });
	}

	sendBinary(data: Buffer): Promise<void> {
		return this.writer.send({ kind: "binary", payload: data });
	}

	sendPing(payload: Buffer = Buffer.alloc(0)): Promise<void> {
		return this.writer.send({ kind: "ping", payload });
	}

	/** Send a Close frame. Omit `code` for an empty Close payload. */
	sendClose(code?: number, reason: string = ""): Promise<void> {
		this.closeSent = true;
		return this.writer.send({ kind: "close", code, reason });
	}

	/** Write pre-encoded bytes, e.g. a deliberately malformed frame. */
	sendRaw(data: Buffer): Promise<void> {
		return this.writer.writeRaw(data);
	}

	// ─── Receiving ────────────────────────────────────────────────────────

	/**
	 * Resolve with the next received frame.
	 *
	 * @throws If nothing arrives within `timeoutMs`, or the connection ends first.
	 */
	nextFrame(timeoutMs: number = DEFAULT_TIMEOUT): Promise<Frame> {
		const queued = this.queue.shift();
		if (queued) return Promise.resolve(queued);
		if (this.ended) return Promise.reject(this.endedError());

		return new Promise<Frame>((resolve, reject) => {
			const waiter: Waiter = {
				resolve,
				reject,
				timer: setTimeout(() => {
					const idx = this.waiters.indexOf(waiter);
					if (idx !== -1) this.waiters.splice(idx, 1);
					reject(new PratidhvaniError(`No frame received within ${timeoutMs}ms`, "CLIENT_TIMEOUT"));
				}, timeoutMs),
			};
			this.waiters.push(waiter);
		});
	}

	/** Frames received but not yet taken with `nextFrame()`. */
	get pendingFrames(): number {
		return this.queue.length;
	}

	/** Last socket error, if any. */
	get error(): Error | null {
		return this.lastError;
	}

	/** Tear down the socket without a close handshake. */
	destroy(): void {
		this.socket.destroy();
	}

	// ─── Internal ─────────────────────────────────────────────────────────

	private onData(chunk: Buffer): void {
		try {
			for (const frame of this.parser.feed(chunk)) {
				this.onFrame(frame);
			}
		} catch (err) {
			this.lastError = toError(err);
			this.socket.destroy();
		}
	}

	private onFrame(frame: Frame): void {
		if (frame.kind === "ping") {
			this.writer.send({ kind: "pong", payload: frame.payload }).catch((err: unknown) => {
				this.lastError = toError(err);
			});
		}
		if (frame.kind === "close" && !this.closeSent) {
			// Answer a server-initiated close, then stop writing.
			this.sendClose(frame.code).catch((err: unknown) => {
				this.lastError = toError(err);
			});
			this.writer.end();
		}

		const waiter = this.waiters.shift();
		if (waiter) {
			clearTimeout(waiter.timer);
			waiter.resolve(frame);
		} else {
			this.queue.push(frame);
		}
	}

	private onEnd(): void {
		if (this.ended) return;
		this.ended = true;
		for (const waiter of this.waiters.splice(0)) {
			clearTimeout(waiter.timer);
			waiter.reject(this.endedError());
		}
	}

	private endedError(): Error {
		return new PratidhvaniError("Connection ended", "CLIENT_CLOSED", this.lastError ?? undefined);
	}
}
