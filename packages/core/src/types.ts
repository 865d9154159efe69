// ─── Config ─────────────────────────────────────────────────────────────────

/** Config sources, lowest priority first. */
export type ConfigLayer = "defaults" | "global" | "project" | "env" | "flags" | "resolved";

/** A configuration store with dot-notation key access and layer awareness. */
export interface Config {
	get(key: string): unknown;
	set(key: string, value: unknown): void;
	has(key: string): boolean;
	delete(key: string): void;
	layer: ConfigLayer;
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

// ─── Server Settings ────────────────────────────────────────────────────────

/** How Text frames are answered. */
export type TextMode = "echo" | "prefix";

/** What happens to Binary frames. */
export type BinaryMode = "forward" | "drop";

export type LogFormat = "pretty" | "json";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";

/** Fully resolved settings for one echo server process. */
export interface ServerSettings {
	host: string;
	port: number;
	textMode: TextMode;
	/** Literal prepended to Text replies when `textMode` is "prefix". */
	prefix: string;
	binaryMode: BinaryMode;
	/** Upgrades beyond this many open connections are refused with 503. */
	maxConnections: number;
	/** Largest message (after reassembly) a peer may send, in bytes. */
	maxPayloadBytes: number;
	logLevel: LogLevelName;
	logFormat: LogFormat;
}

export const DEFAULT_SETTINGS: ServerSettings = {
	host: "127.0.0.1",
	port: 8080,
	textMode: "echo",
	prefix: "Echo: ",
	binaryMode: "forward",
	maxConnections: 1024,
	maxPayloadBytes: 16 * 1024 * 1024,
	logLevel: "info",
	logFormat: "pretty",
};
