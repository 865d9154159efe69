import { TransportError, toError } from "@pratidhvani/core";
import { FrameParser } from "./frame.js";
import type { Frame, ParseOptions } from "./frame.js";

/**
 * Read half of a connection: turns a stream of socket chunks into frames.
 *
 * Ends when the source ends or after a Close frame. Failures of the
 * source are rethrown as {@link TransportError} (phase "read"); framing
 * violations surface as the parser's ProtocolError.
 *
 * @param head - Bytes that arrived together with the upgrade request.
 */
export async function* readFrames(
	source: AsyncIterable<Buffer>,
	head: Buffer,
	opts: ParseOptions = {},
): AsyncGenerator<Frame, void, undefined> {
	const parser = new FrameParser(opts);
	if (head.length > 0) {
		yield* parser.feed(Buffer.from(head));
	}

	const iterator = source[Symbol.asyncIterator]();
	try {
		while (!parser.isClosed) {
			let next: IteratorResult<Buffer>;
			try {
				next = await iterator.next();
			} catch (err) {
				throw new TransportError("Socket read failed", "read", toError(err));
			}
			if (next.done) return;
			yield* parser.feed(next.value);
		}
	} finally {
		await iterator.return?.();
	}
}
