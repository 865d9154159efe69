/**
 * @pratidhvani/server — Argument parser.
 *
 * Parses flags, the subcommand and positional arguments from argv.
 */

export type Command = "serve" | "probe";

export interface ParsedArgs {
	command?: Command;
	help?: boolean;
	version?: boolean;
	/** --address host:port */
	address?: string;
	host?: string;
	port?: string;
	/** --mode echo|prefix */
	mode?: string;
	prefix?: string;
	/** --binary forward|drop */
	binary?: string;
	maxConnections?: string;
	maxPayload?: string;
	/** --config <file> */
	config?: string;
	logFormat?: string;
	logLevel?: string;
	/** --timeout <ms> for probe. */
	timeout?: string;
	/** Positional arguments after the command. */
	positionals: string[];
	/** Problems found while parsing (unknown flags, missing values). */
	errors: string[];
}

const COMMANDS = new Set<string>(["serve", "probe"]);

type ValueFlag = Exclude<keyof ParsedArgs, "command" | "help" | "version" | "positionals" | "errors">;

const VALUE_FLAGS: Record<string, ValueFlag> = {
	"--address": "address",
	"-a": "address",
	"--host": "host",
	"--port": "port",
	"-p": "port",
	"--mode": "mode",
	"--prefix": "prefix",
	"--binary": "binary",
	"--max-connections": "maxConnections",
	"--max-payload": "maxPayload",
	"--config": "config",
	"-c": "config",
	"--log-format": "logFormat",
	"--log-level": "logLevel",
	"--timeout": "timeout",
};

function isCommand(value: string): value is Command {
	return COMMANDS.has(value);
}

/**
 * Parse argv into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e. pass `process.argv.slice(2)`. Accepts both `--flag value` and
 * `--flag=value`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = { positionals: [], errors: [] };

	let i = 0;
	while (i < argv.length) {
		const arg = argv[i];

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		if (arg === "-v" || arg === "--version") {
			result.version = true;
			i++;
			continue;
		}

		// ─── Flags with values ──────────────────────────────────────────
		const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
		const name = eq === -1 ? arg : arg.slice(0, eq);
		const field = Object.prototype.hasOwnProperty.call(VALUE_FLAGS, name) ? VALUE_FLAGS[name] : undefined;
		if (field) {
			if (eq !== -1) {
				result[field] = arg.slice(eq + 1);
				i++;
				continue;
			}
			if (i + 1 >= argv.length) {
				result.errors.push(`Missing value for ${name}`);
				i++;
				continue;
			}
			result[field] = argv[i + 1];
			i += 2;
			continue;
		}

		if (arg.startsWith("-") && arg !== "-") {
			result.errors.push(`Unknown option ${arg}`);
			i++;
			continue;
		}

		// ─── Subcommand, then positionals ───────────────────────────────
		if (!result.command && result.positionals.length === 0) {
			if (isCommand(arg)) {
				result.command = arg;
			} else {
				result.errors.push(`Unknown command "${arg}"`);
			}
			i++;
			continue;
		}

		result.positionals.push(arg);
		i++;
	}

	return result;
}

/**
 * Map parsed flags onto settings keys for the highest-priority config layer.
 *
 * `--prefix` on its own implies `--mode prefix`.
 */
export function toSettingsOverrides(args: ParsedArgs): Record<string, unknown> {
	const overrides: Record<string, unknown> = {
		address: args.address,
		host: args.host,
		port: args.port,
		textMode: args.mode ?? (args.prefix !== undefined ? "prefix" : undefined),
		prefix: args.prefix,
		binaryMode: args.binary,
		maxConnections: args.maxConnections,
		maxPayloadBytes: args.maxPayload,
		logFormat: args.logFormat,
		logLevel: args.logLevel,
	};
	return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

export const HELP_TEXT = `
Pratidhvani — WebSocket echo server

Usage:
  pratidhvani serve [options]             Start the echo server
  pratidhvani probe <ws-url> [message…]   Send messages and print the replies

Server options:
  -a, --address <host:port>     Bind address (default 127.0.0.1:8080)
  --host <host>                 Bind host
  -p, --port <port>             Bind port (0 picks a free port)
  --mode <echo|prefix>          Text reply mode (default echo)
  --prefix <text>               Prefix for prefix mode (default "Echo: ")
  --binary <forward|drop>       Binary frame handling (default forward)
  --max-connections <n>         Refuse upgrades beyond n open connections
  --max-payload <bytes>         Largest accepted message
  -c, --config <file>           JSON config file (default ./pratidhvani.json)
  --log-format <pretty|json>    Log output format
  --log-level <level>           debug, info, warn, error or fatal

Probe options:
  --timeout <ms>                Reply timeout (default 2000)

  -h, --help                    Show this help
  -v, --version                 Show version

Environment:
  PRATIDHVANI_ADDRESS, PRATIDHVANI_HOST, PRATIDHVANI_PORT, PRATIDHVANI_TEXT_MODE,
  PRATIDHVANI_PREFIX, PRATIDHVANI_BINARY_MODE, PRATIDHVANI_MAX_CONNECTIONS,
  PRATIDHVANI_MAX_PAYLOAD, PRATIDHVANI_LOG_FORMAT, LOG_LEVEL, PRATIDHVANI_HOME
`;
