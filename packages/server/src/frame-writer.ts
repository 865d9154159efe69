import type { Duplex } from "node:stream";
import { TransportError } from "@pratidhvani/core";
import { serializeFrame } from "./frame.js";
import type { Frame } from "./frame.js";

/**
 * Write half of a connection. Each write resolves once the frame has been
 * handed to the OS, so a connection that awaits every write never has
 * more than one frame in flight.
 */
export class FrameWriter {
	private ended = false;

	constructor(
		private readonly socket: Duplex,
		private readonly opts: { mask?: boolean } = {},
	) {}

	/** Whether frames can still be written. */
	get writable(): boolean {
		return !this.ended && !this.socket.destroyed && this.socket.writable;
	}

	/**
	 * Write one frame.
	 *
	 * @throws {TransportError} (phase "write") if the socket is gone or the write fails.
	 */
	send(frame: Frame): Promise<void> {
		return this.writeRaw(serializeFrame(frame, { mask: this.opts.mask }));
	}

	writeRaw(data: Buffer): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			if (!this.writable) {
				reject(new TransportError("Socket is no longer writable", "write"));
				return;
			}
			this.socket.write(data, (err) => {
				if (err) reject(new TransportError("Socket write failed", "write", err));
				else resolve();
			});
		});
	}

	/** Half-close: no further frames will be written. */
	end(): void {
		if (this.ended) return;
		this.ended = true;
		if (!this.socket.destroyed) this.socket.end();
	}
}
