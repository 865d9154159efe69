import { describe, it, expect } from "vitest";
import { createEchoPolicy, describePolicy, textTransform } from "../src/dispatcher.js";

describe("Dispatcher policy", () => {
	describe("default policy", () => {
		const policy = createEchoPolicy();

		it("should echo text verbatim", () => {
			expect(policy({ kind: "text", payload: "ping" })).toEqual({
				kind: "reply",
				frame: { kind: "text", payload: "ping" },
			});
		});

		it("should echo the empty string", () => {
			expect(policy({ kind: "text", payload: "" })).toEqual({ kind: "reply", frame: { kind: "text", payload: "" } });
		});

		it("should forward binary unchanged", () => {
			const payload = Buffer.from([0, 1, 255]);
			expect(policy({ kind: "binary", payload })).toEqual({ kind: "reply", frame: { kind: "binary", payload } });
		});

		it("should close on Close", () => {
			expect(policy({ kind: "close", code: 1000, reason: "" })).toEqual({ kind: "close" });
		});

		it("should ignore Ping and Pong", () => {
			expect(policy({ kind: "ping", payload: Buffer.alloc(0) })).toEqual({ kind: "ignore" });
			expect(policy({ kind: "pong", payload: Buffer.alloc(0) })).toEqual({ kind: "ignore" });
		});
	});

	describe("configured policy", () => {
		it("should prefix text in prefix mode", () => {
			const policy = createEchoPolicy({ textMode: "prefix" });
			expect(policy({ kind: "text", payload: "hi" })).toEqual({
				kind: "reply",
				frame: { kind: "text", payload: "Echo: hi" },
			});
		});

		it("should use a custom prefix", () => {
			const policy = createEchoPolicy({ textMode: "prefix", prefix: ">> " });
			expect(policy({ kind: "text", payload: "hi" })).toEqual({
				kind: "reply",
				frame: { kind: "text", payload: ">> hi" },
			});
		});

		it("should ignore binary in drop mode", () => {
			const policy = createEchoPolicy({ binaryMode: "drop" });
			expect(policy({ kind: "binary", payload: Buffer.from([1]) })).toEqual({ kind: "ignore" });
		});

		it("should let a transform override the text mode", () => {
			const transform = textTransform({ textMode: "prefix", transform: (t) => t.toUpperCase() });
			expect(transform("abc")).toBe("ABC");
		});

		it("should be a pure function of the frame", () => {
			const policy = createEchoPolicy({ textMode: "prefix" });
			const first = policy({ kind: "text", payload: "x" });
			const second = policy({ kind: "text", payload: "x" });
			expect(first).toEqual(second);
		});
	});

	describe("describePolicy", () => {
		it("should summarize the defaults", () => {
			expect(describePolicy()).toBe("text=echo binary=forward");
		});

		it("should show the prefix", () => {
			expect(describePolicy({ textMode: "prefix", binaryMode: "drop" })).toBe('text=prefix("Echo: ") binary=drop');
		});
	});
});
