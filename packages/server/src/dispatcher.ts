/**
 * Dispatcher policy — decides what the server does with each received frame.
 *
 * Defaults: Text frames are echoed verbatim, Binary frames are forwarded
 * back unchanged, Close ends the connection, Ping/Pong are left to the
 * transport.
 */

import type { BinaryMode, TextMode } from "@pratidhvani/core";
import type { DataFrame, Frame } from "./frame.js";

export type DispatchAction =
	| { kind: "reply"; frame: DataFrame }
	| { kind: "ignore" }
	| { kind: "close" };

/** Pure function from one received frame to the outgoing action. */
export type DispatchPolicy = (frame: Frame) => DispatchAction;

export interface EchoPolicyOptions {
	/** Default: "echo". */
	textMode?: TextMode;
	/** Literal used in "prefix" mode. Default: "Echo: ". */
	prefix?: string;
	/** Default: "forward". */
	binaryMode?: BinaryMode;
	/** Replaces both text modes when set. */
	transform?: (text: string) => string;
}

export const DEFAULT_PREFIX = "Echo: ";

const IGNORE: DispatchAction = { kind: "ignore" };
const CLOSE: DispatchAction = { kind: "close" };

/** Build the text transform for the given options. */
export function textTransform(opts: EchoPolicyOptions = {}): (text: string) => string {
	if (opts.transform) return opts.transform;
	if ((opts.textMode ?? "echo") === "prefix") {
		const prefix = opts.prefix ?? DEFAULT_PREFIX;
		return (text) => prefix + text;
	}
	return (text) => text;
}

/**
 * Create the echo dispatcher policy.
 *
 * @example
 * ```ts
 * const policy = createEchoPolicy({ textMode: "prefix" });
 * policy({ kind: "text", payload: "hi" }); // reply with "Echo: hi"
 * ```
 */
export function createEchoPolicy(opts: EchoPolicyOptions = {}): DispatchPolicy {
	const transform = textTransform(opts);
	const forwardBinary = (opts.binaryMode ?? "forward") === "forward";

	return (frame) => {
		switch (frame.kind) {
			case "text":
				return { kind: "reply", frame: { kind: "text", payload: transform(frame.payload) } };
			case "binary":
				return forwardBinary ? { kind: "reply", frame: { kind: "binary", payload: frame.payload } } : IGNORE;
			case "close":
				return CLOSE;
			case "ping":
			case "pong":
				return IGNORE;
		}
	};
}

/** One-line summary for start-up logs, e.g. `text=prefix("Echo: ") binary=forward`. */
export function describePolicy(opts: EchoPolicyOptions = {}): string {
	const text = opts.transform
		? "custom"
		: (opts.textMode ?? "echo") === "prefix"
			? `prefix(${JSON.stringify(opts.prefix ?? DEFAULT_PREFIX)})`
			: "echo";
	return `text=${text} binary=${opts.binaryMode ?? "forward"}`;
}
