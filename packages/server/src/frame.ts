/**
 * Tantu — WebSocket frame codec.
 * Sanskrit: Tantu (तन्तु) = thread, the strand a fabric is woven from.
 *
 * Encodes and parses RFC 6455 frames, and reassembles fragmented
 * messages into the {@link Frame} union the rest of the server works with.
 */

import { randomBytes } from "node:crypto";
import { ProtocolError } from "@pratidhvani/core";

// ─── Constants ──────────────────────────────────────────────────────────────

/** WebSocket frame opcodes */
export enum Opcode {
	Continuation = 0x0,
	Text = 0x1,
	Binary = 0x2,
	Close = 0x8,
	Ping = 0x9,
	Pong = 0xa,
}

/** Close status codes used by the server (RFC 6455 section 7.4.1). */
export const CloseCode = {
	Normal: 1000,
	GoingAway: 1001,
	ProtocolError: 1002,
	UnsupportedData: 1003,
	NoStatus: 1005,
	InvalidPayload: 1007,
	PolicyViolation: 1008,
	MessageTooBig: 1009,
	InternalError: 1011,
} as const;

/** Default maximum message size (16 MiB). */
export const DEFAULT_MAX_PAYLOAD = 16 * 1024 * 1024;

/** Control frames may carry at most this many payload bytes. */
const MAX_CONTROL_PAYLOAD = 125;

// ─── Types ──────────────────────────────────────────────────────────────────

/** One complete message or control frame, as seen by connection logic. */
export type Frame =
	| { kind: "text"; payload: string }
	| { kind: "binary"; payload: Buffer }
	| { kind: "close"; code?: number; reason: string }
	| { kind: "ping"; payload: Buffer }
	| { kind: "pong"; payload: Buffer };

export type FrameKind = Frame["kind"];

/** A Text or Binary frame. */
export type DataFrame = Extract<Frame, { kind: "text" | "binary" }>;

/**
 * Result of parsing a single wire frame from a buffer.
 */
export interface RawFrame {
	/** Whether FIN bit is set (final fragment). */
	fin: boolean;
	opcode: Opcode;
	masked: boolean;
	/** Unmasked payload data. */
	payload: Buffer;
	/** Total bytes consumed from the buffer. */
	bytesConsumed: number;
}

export interface ParseOptions {
	/** Largest payload accepted for a single frame. Default: 16 MiB. */
	maxPayload?: number;
	/** Reject unmasked frames (server side). Default: false. */
	requireMask?: boolean;
}

function toOpcode(value: number): Opcode {
	switch (value) {
		case Opcode.Continuation:
			return Opcode.Continuation;
		case Opcode.Text:
			return Opcode.Text;
		case Opcode.Binary:
			return Opcode.Binary;
		case Opcode.Close:
			return Opcode.Close;
		case Opcode.Ping:
			return Opcode.Ping;
		case Opcode.Pong:
			return Opcode.Pong;
		default:
			throw new ProtocolError(`Unknown opcode 0x${value.toString(16)}`, CloseCode.ProtocolError);
	}
}

function isControl(opcode: Opcode): boolean {
	return (opcode & 0x8) !== 0;
}

// ─── Encoding ───────────────────────────────────────────────────────────────

/**
 * Encode a WebSocket frame.
 *
 * Server-to-client frames are NOT masked (RFC 6455 section 5.1). Pass
 * `mask: true` (random key) or a 4-byte key for client frames.
 */
export function encodeFrame(
	opcode: Opcode,
	payload: Buffer,
	opts: { mask?: boolean | Buffer; fin?: boolean } = {},
): Buffer {
	const len = payload.length;
	const maskKey = opts.mask === true ? randomBytes(4) : opts.mask || null;
	if (maskKey && maskKey.length !== 4) {
		throw new RangeError("Mask key must be exactly 4 bytes");
	}

	let headerLen: number;
	if (len < 126) {
		headerLen = 2;
	} else if (len < 65536) {
		headerLen = 4;
	} else {
		headerLen = 10;
	}
	const maskLen = maskKey ? 4 : 0;

	const frame = Buffer.alloc(headerLen + maskLen + len);
	frame[0] = ((opts.fin ?? true) ? 0x80 : 0) | opcode;

	const maskBit = maskKey ? 0x80 : 0;
	if (headerLen === 2) {
		frame[1] = maskBit | len;
	} else if (headerLen === 4) {
		frame[1] = maskBit | 126;
		frame.writeUInt16BE(len, 2);
	} else {
		frame[1] = maskBit | 127;
		frame.writeUInt32BE(Math.floor(len / 0x100000000), 2);
		frame.writeUInt32BE(len >>> 0, 6);
	}

	if (maskKey) {
		maskKey.copy(frame, headerLen);
		const start = headerLen + 4;
		for (let i = 0; i < len; i++) {
			frame[start + i] = payload[i] ^ maskKey[i % 4];
		}
	} else {
		payload.copy(frame, headerLen);
	}
	return frame;
}

/** Build a Close payload: 2-byte status code followed by a UTF-8 reason. */
export function encodeClosePayload(code?: number, reason: string = ""): Buffer {
	if (code === undefined) return Buffer.alloc(0);
	const reasonBuf = Buffer.from(reason, "utf-8");
	const payload = Buffer.alloc(2 + reasonBuf.length);
	payload.writeUInt16BE(code, 0);
	reasonBuf.copy(payload, 2);
	return payload;
}

/** Encode a {@link Frame} for the wire. */
export function serializeFrame(frame: Frame, opts: { mask?: boolean | Buffer } = {}): Buffer {
	switch (frame.kind) {
		case "text":
			return encodeFrame(Opcode.Text, Buffer.from(frame.payload, "utf-8"), opts);
		case "binary":
			return encodeFrame(Opcode.Binary, frame.payload, opts);
		case "close":
			return encodeFrame(Opcode.Close, encodeClosePayload(frame.code, frame.reason), opts);
		case "ping":
			return encodeFrame(Opcode.Ping, frame.payload, opts);
		case "pong":
			return encodeFrame(Opcode.Pong, frame.payload, opts);
	}
}

// ─── Decoding ───────────────────────────────────────────────────────────────

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode strict UTF-8.
 *
 * @throws {ProtocolError} 1007 when the bytes are not valid UTF-8.
 */
export function decodeUtf8(data: Buffer): string {
	try {
		return utf8.decode(data);
	} catch {
		throw new ProtocolError("Invalid UTF-8 in text payload", CloseCode.InvalidPayload);
	}
}

function isValidCloseCode(code: number): boolean {
	if (code >= 3000 && code <= 4999) return true;
	return (code >= 1000 && code <= 1003) || (code >= 1007 && code <= 1014);
}

/**
 * Decode a Close payload into its status code and reason.
 *
 * @throws {ProtocolError} On a 1-byte payload, a reserved code, or a non-UTF-8 reason.
 */
export function decodeClosePayload(payload: Buffer): { code?: number; reason: string } {
	if (payload.length === 0) return { reason: "" };
	if (payload.length === 1) {
		throw new ProtocolError("Close payload must be empty or at least 2 bytes", CloseCode.ProtocolError);
	}
	const code = payload.readUInt16BE(0);
	if (!isValidCloseCode(code)) {
		throw new ProtocolError(`Invalid close code ${code}`, CloseCode.ProtocolError);
	}
	return { code, reason: decodeUtf8(payload.subarray(2)) };
}

/**
 * Try to parse one WebSocket frame from the buffer.
 *
 * Returns null if the buffer does not yet contain a complete frame.
 *
 * @throws {ProtocolError} On reserved bits, unknown opcodes, malformed
 *   control frames, missing masks (when required) or oversized payloads.
 */
export function parseFrame(buffer: Buffer, offset: number = 0, opts: ParseOptions = {}): RawFrame | null {
	const available = buffer.length - offset;
	if (available < 2) return null;

	const byte0 = buffer[offset];
	const byte1 = buffer[offset + 1];

	if ((byte0 & 0x70) !== 0) {
		throw new ProtocolError("Reserved bits set without a negotiated extension", CloseCode.ProtocolError);
	}

	const fin = (byte0 & 0x80) !== 0;
	const opcode = toOpcode(byte0 & 0x0f);
	const masked = (byte1 & 0x80) !== 0;
	let payloadLen = byte1 & 0x7f;

	if (opts.requireMask && !masked) {
		throw new ProtocolError("Client frames must be masked", CloseCode.ProtocolError);
	}
	if (isControl(opcode) && (!fin || payloadLen > MAX_CONTROL_PAYLOAD)) {
		throw new ProtocolError("Control frames must be final and at most 125 bytes", CloseCode.ProtocolError);
	}

	let headerLen = 2;
	if (payloadLen === 126) {
		if (available < 4) return null;
		payloadLen = buffer.readUInt16BE(offset + 2);
		headerLen = 4;
	} else if (payloadLen === 127) {
		if (available < 10) return null;
		const high = buffer.readUInt32BE(offset + 2);
		if (high !== 0) {
			throw new ProtocolError("Frame payload exceeds 4 GiB", CloseCode.MessageTooBig);
		}
		payloadLen = buffer.readUInt32BE(offset + 6);
		headerLen = 10;
	}

	const maxPayload = opts.maxPayload ?? DEFAULT_MAX_PAYLOAD;
	if (payloadLen > maxPayload) {
		throw new ProtocolError(`Frame payload of ${payloadLen} bytes exceeds limit of ${maxPayload}`, CloseCode.MessageTooBig);
	}

	const maskLen = masked ? 4 : 0;
	const totalLen = headerLen + maskLen + payloadLen;
	if (available < totalLen) return null;

	const start = offset + headerLen + maskLen;
	let payload: Buffer;
	if (masked) {
		const maskKey = buffer.subarray(offset + headerLen, offset + headerLen + 4);
		payload = Buffer.allocUnsafe(payloadLen);
		for (let i = 0; i < payloadLen; i++) {
			payload[i] = buffer[start + i] ^ maskKey[i % 4];
		}
	} else {
		payload = Buffer.from(buffer.subarray(start, start + payloadLen));
	}

	return { fin, opcode, masked, payload, bytesConsumed: totalLen };
}

/**
 * Total size of the frame starting at `offset`, or the header size still
 * missing when the length field is incomplete.
 */
function frameLength(buffer: Buffer, offset: number = 0): number {
	const available = buffer.length - offset;
	if (available < 2) return 2;
	const byte1 = buffer[offset + 1];
	const maskLen = (byte1 & 0x80) !== 0 ? 4 : 0;
	const len = byte1 & 0x7f;
	if (len === 126) {
		return available < 4 ? 4 : 4 + maskLen + buffer.readUInt16BE(offset + 2);
	}
	if (len === 127) {
		return available < 10 ? 10 : 10 + maskLen + buffer.readUInt32BE(offset + 6);
	}
	return 2 + maskLen + len;
}

// ─── Message Assembly ───────────────────────────────────────────────────────

/**
 * Incremental frame parser. Feed it socket chunks and it yields complete
 * {@link Frame}s, joining continuation frames into one message.
 *
 * Nothing is yielded after a Close frame.
 */
export class FrameParser {
	private chunks: Buffer[] = [];
	private buffered = 0;
	/** Bytes the next frame needs before parsing is worth retrying. */
	private needed = 0;
	private fragments: Buffer[] = [];
	private fragmentBytes = 0;
	private fragmentOpcode: Opcode.Text | Opcode.Binary | null = null;
	private closed = false;

	private readonly maxPayload: number;
	private readonly requireMask: boolean;

	constructor(opts: ParseOptions = {}) {
		this.maxPayload = opts.maxPayload ?? DEFAULT_MAX_PAYLOAD;
		this.requireMask = opts.requireMask ?? false;
	}

	/** Whether a Close frame has been parsed. */
	get isClosed(): boolean {
		return this.closed;
	}

	/** Bytes received but not yet part of a complete frame. */
	get bufferedBytes(): number {
		return this.buffered;
	}

	*feed(chunk: Buffer): Generator<Frame> {
		if (this.closed) return;
		this.chunks.push(chunk);
		this.buffered += chunk.length;
		if (this.buffered < this.needed) return;

		let buffer = this.take();
		while (!this.closed) {
			const raw = parseFrame(buffer, 0, { maxPayload: this.maxPayload, requireMask: this.requireMask });
			if (!raw) {
				this.keep(buffer);
				this.needed = frameLength(buffer);
				return;
			}
			buffer = buffer.subarray(raw.bytesConsumed);

			const frame = this.assemble(raw);
			if (!frame) continue;
			if (frame.kind === "close") {
				this.closed = true;
				buffer = Buffer.alloc(0);
			}
			this.keep(buffer);
			yield frame;
			buffer = this.take();
		}
	}

	/** Join the pending chunks into one buffer and clear them. */
	private take(): Buffer {
		let buffer: Buffer;
		if (this.chunks.length === 0) buffer = Buffer.alloc(0);
		else if (this.chunks.length === 1) buffer = this.chunks[0];
		else buffer = Buffer.concat(this.chunks, this.buffered);
		this.chunks = [];
		this.buffered = 0;
		this.needed = 0;
		return buffer;
	}

	private keep(buffer: Buffer): void {
		this.chunks = buffer.length > 0 ? [buffer] : [];
		this.buffered = buffer.length;
	}

	private assemble(raw: RawFrame): Frame | null {
		switch (raw.opcode) {
			case Opcode.Close:
				return { kind: "close", ...decodeClosePayload(raw.payload) };
			case Opcode.Ping:
				return { kind: "ping", payload: raw.payload };
			case Opcode.Pong:
				return { kind: "pong", payload: raw.payload };
			case Opcode.Continuation: {
				if (this.fragmentOpcode === null) {
					throw new ProtocolError("Continuation frame without a message in progress", CloseCode.ProtocolError);
				}
				this.addFragment(raw.payload);
				if (!raw.fin) return null;
				const opcode = this.fragmentOpcode;
				const data = Buffer.concat(this.fragments);
				this.fragments = [];
				this.fragmentBytes = 0;
				this.fragmentOpcode = null;
				return toMessage(opcode, data);
			}
			case Opcode.Text:
			case Opcode.Binary: {
				if (this.fragmentOpcode !== null) {
					throw new ProtocolError("New message started before the previous one finished", CloseCode.ProtocolError);
				}
				if (raw.fin) return toMessage(raw.opcode, raw.payload);
				this.fragmentOpcode = raw.opcode;
				this.addFragment(raw.payload);
				return null;
			}
		}
	}

	private addFragment(payload: Buffer): void {
		this.fragmentBytes += payload.length;
		if (this.fragmentBytes > this.maxPayload) {
			throw new ProtocolError(`Message exceeds limit of ${this.maxPayload} bytes`, CloseCode.MessageTooBig);
		}
		this.fragments.push(payload);
	}
}

function toMessage(opcode: Opcode.Text | Opcode.Binary, data: Buffer): DataFrame {
	return opcode === Opcode.Text
		? { kind: "text", payload: decodeUtf8(data) }
		: { kind: "binary", payload: data };
}
