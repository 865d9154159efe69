import fs from "fs";
import path from "path";
import { parseBindAddress, parsePort, validateHost } from "./address.js";
import { ConfigError, toError } from "./errors.js";
import type {
	BinaryMode,
	Config,
	ConfigLayer,
	LogFormat,
	LogLevelName,
	ServerSettings,
	TextMode,
} from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";

/** Type guard for plain JSON-style objects. */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-get a nested value from an object using dot-notation keys.
 */
function deepGet(obj: Record<string, unknown>, key: string): unknown {
	let current: unknown = obj;
	for (const part of key.split(".")) {
		if (!isRecord(current)) return undefined;
		current = current[part];
	}
	return current;
}

/**
 * Deep-set a nested value on an object using dot-notation keys.
 */
function deepSet(obj: Record<string, unknown>, key: string, value: unknown): void {
	const parts = key.split(".");
	let current = obj;
	for (let i = 0; i < parts.length - 1; i++) {
		const next = current[parts[i]];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: Record<string, unknown> = {};
			current[parts[i]] = created;
			current = created;
		}
	}
	current[parts[parts.length - 1]] = value;
}

function deepDelete(obj: Record<string, unknown>, key: string): void {
	const parts = key.split(".");
	let current = obj;
	for (let i = 0; i < parts.length - 1; i++) {
		const next = current[parts[i]];
		if (!isRecord(next)) return;
		current = next;
	}
	delete current[parts[parts.length - 1]];
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not
 * concatenated; undefined values are skipped.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const key of Object.keys(source)) {
		const sv = source[key];
		if (sv === undefined) continue;
		const tv = target[key];
		if (isRecord(sv)) {
			const into: Record<string, unknown> = isRecord(tv) ? tv : {};
			deepMerge(into, sv);
			target[key] = into;
		} else {
			target[key] = sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object with dot-notation key support.
 *
 * @example
 * ```ts
 * const cfg = createConfig("project", { port: 9000 });
 * cfg.set("prefix", ">> ");
 * cfg.get("prefix"); // ">> "
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	return {
		layer,

		get(key: string): unknown {
			return deepGet(data, key);
		},

		set(key: string, value: unknown): void {
			deepSet(data, key, value);
		},

		has(key: string): boolean {
			return deepGet(data, key) !== undefined;
		},

		delete(key: string): void {
			deepDelete(data, key);
		},

		all(): Record<string, unknown> {
			return { ...data };
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade multiple config layers into a single merged config.
 *
 * Layers are applied left-to-right, so later layers override earlier ones
 * on key conflicts. The result has layer type "resolved".
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("resolved");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

// ─── Files ──────────────────────────────────────────────────────────────────

/** Project-level config file name, looked up in the working directory. */
export const PROJECT_CONFIG_FILE = "pratidhvani.json";

/**
 * Get the Pratidhvani home directory (~/.pratidhvani).
 *
 * Honors `PRATIDHVANI_HOME` when set, otherwise `$HOME/.pratidhvani`
 * (`$USERPROFILE` on Windows).
 */
export function getPratidhvaniHome(env: NodeJS.ProcessEnv = process.env): string {
	const override = env.PRATIDHVANI_HOME?.trim();
	if (override) return override;
	return path.join(env.HOME || env.USERPROFILE || "~", ".pratidhvani");
}

/**
 * Load global settings from `<home>/config/settings.json`.
 *
 * Returns an empty object if the file is missing or corrupted, so the
 * defaults apply.
 */
export function loadGlobalSettings(home: string = getPratidhvaniHome()): Record<string, unknown> {
	const settingsPath = path.join(home, "config", "settings.json");
	try {
		if (fs.existsSync(settingsPath)) {
			const parsed: unknown = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
			if (isRecord(parsed)) return parsed;
		}
	} catch {
		// Corrupted settings file: fall back to defaults
	}
	return {};
}

/**
 * Load a project config file. With no explicit path, reads
 * `<cwd>/pratidhvani.json` and returns `{}` when it does not exist.
 *
 * @throws {ConfigError} If an explicit file is missing, or any file is not a JSON object.
 */
export function loadProjectConfig(cwd: string, explicitPath?: string): Record<string, unknown> {
	const configPath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, PROJECT_CONFIG_FILE);
	if (!fs.existsSync(configPath)) {
		if (explicitPath) throw new ConfigError(`Config file not found: ${configPath}`);
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${configPath}`, toError(err));
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`${configPath} must contain a JSON object`);
	}
	return parsed;
}

// ─── Environment ────────────────────────────────────────────────────────────

const ENV_KEYS: ReadonlyArray<[string, string]> = [
	["PRATIDHVANI_ADDRESS", "address"],
	["PRATIDHVANI_HOST", "host"],
	["PRATIDHVANI_PORT", "port"],
	["PRATIDHVANI_TEXT_MODE", "textMode"],
	["PRATIDHVANI_PREFIX", "prefix"],
	["PRATIDHVANI_BINARY_MODE", "binaryMode"],
	["PRATIDHVANI_MAX_CONNECTIONS", "maxConnections"],
	["PRATIDHVANI_MAX_PAYLOAD", "maxPayloadBytes"],
	["LOG_LEVEL", "logLevel"],
	["PRATIDHVANI_LOG_FORMAT", "logFormat"],
];

/** Collect the settings that are set through environment variables. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [name, key] of ENV_KEYS) {
		const value = env[name];
		if (value !== undefined && value !== "") out[key] = value;
	}
	return out;
}

// ─── Validation ─────────────────────────────────────────────────────────────

const TEXT_MODES: readonly TextMode[] = ["echo", "prefix"];
const BINARY_MODES: readonly BinaryMode[] = ["forward", "drop"];
const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];
const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error", "fatal"];
const SETTING_KEYS = new Set<string>(Object.keys(DEFAULT_SETTINGS));

function oneOf<T extends string>(key: string, value: unknown, allowed: readonly T[]): T {
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw new ConfigError(`Invalid ${key} ${JSON.stringify(value)}: expected one of ${allowed.join(", ")}`);
	}
	return match;
}

function positiveInt(key: string, value: unknown): number {
	const n = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value) : value;
	if (typeof n !== "number" || !Number.isInteger(n) || n <= 0) {
		throw new ConfigError(`Invalid ${key} ${JSON.stringify(value)}: expected a positive integer`);
	}
	return n;
}

function str(key: string, value: unknown): string {
	if (typeof value !== "string") {
		throw new ConfigError(`Invalid ${key} ${JSON.stringify(value)}: expected a string`);
	}
	return value;
}

/**
 * Expand an `address` entry into `host` and `port` so a later layer can
 * override either half on its own.
 */
function expandAddress(layer: Record<string, unknown>): Record<string, unknown> {
	if (layer.address === undefined) return layer;
	const { address, ...rest } = layer;
	const parsed = parseBindAddress(str("address", address));
	return { ...rest, host: parsed.host, port: parsed.port };
}

/**
 * Validate and coerce a merged settings object.
 *
 * @throws {ConfigError} On unknown keys or invalid values.
 */
export function validateSettings(raw: Record<string, unknown>): ServerSettings {
	for (const key of Object.keys(raw)) {
		if (!SETTING_KEYS.has(key)) throw new ConfigError(`Unknown setting "${key}"`);
	}
	const merged: Record<string, unknown> = { ...DEFAULT_SETTINGS, ...raw };
	const port = merged.port;

	return {
		host: validateHost(str("host", merged.host)),
		port: parsePort(typeof port === "number" ? port : str("port", port)),
		textMode: oneOf("textMode", merged.textMode, TEXT_MODES),
		prefix: str("prefix", merged.prefix),
		binaryMode: oneOf("binaryMode", merged.binaryMode, BINARY_MODES),
		maxConnections: positiveInt("maxConnections", merged.maxConnections),
		maxPayloadBytes: positiveInt("maxPayloadBytes", merged.maxPayloadBytes),
		logLevel: oneOf("logLevel", typeof merged.logLevel === "string" ? merged.logLevel.toLowerCase() : merged.logLevel, LOG_LEVELS),
		logFormat: oneOf("logFormat", merged.logFormat, LOG_FORMATS),
	};
}

export interface ResolveSettingsOptions {
	/** Directory searched for pratidhvani.json. Default: process.cwd(). */
	cwd?: string;
	/** Explicit config file (the --config flag). */
	configPath?: string;
	/** Environment to read. Default: process.env. */
	env?: NodeJS.ProcessEnv;
	/** Highest-priority values, typically from CLI flags. */
	overrides?: Record<string, unknown>;
}

/**
 * Resolve server settings from every layer: defaults, global settings,
 * project file, environment, then overrides.
 *
 * @throws {ConfigError} If any layer holds an invalid value.
 */
export function resolveSettings(opts: ResolveSettingsOptions = {}): ServerSettings {
	const env = opts.env ?? process.env;
	const cwd = opts.cwd ?? process.cwd();

	const layers = [
		createConfig("global", expandAddress(loadGlobalSettings(getPratidhvaniHome(env)))),
		createConfig("project", expandAddress(loadProjectConfig(cwd, opts.configPath))),
		createConfig("env", expandAddress(loadEnvConfig(env))),
		createConfig("flags", expandAddress(opts.overrides ?? {})),
	];

	return validateSettings(cascadeConfigs(...layers).all());
}
