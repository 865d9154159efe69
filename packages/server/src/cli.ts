/**
 * @pratidhvani/server — Command routing.
 *
 * `run()` resolves settings, configures logging and routes to `serve` or
 * `probe`. It returns the exit status instead of exiting so it can be
 * driven in-process; `bin.ts` is the executable wrapper.
 */

import {
	BindError,
	ConfigError,
	ConsoleTransport,
	JsonTransport,
	PratidhvaniError,
	configureLogging,
	createLogger,
	parseLogLevel,
	resolveSettings,
	toError,
} from "@pratidhvani/core";
import type { LogTransport, ServerSettings, WritableSink } from "@pratidhvani/core";
import { HELP_TEXT, parseArgs, toSettingsOverrides } from "./args.js";
import type { ParsedArgs } from "./args.js";
import { EchoClient } from "./client.js";
import type { Frame } from "./frame.js";
import { EchoServer } from "./server.js";

export const VERSION = "0.1.0";

export interface CliIO {
	stdout: WritableSink;
	stderr: WritableSink;
	/** Default: process.cwd() */
	cwd?: string;
	/** Default: process.env */
	env?: NodeJS.ProcessEnv;
	/** Colour pretty logs. Default: whether stdout is a TTY. */
	colors?: boolean;
	/** Resolves when the server should shut down. Default: first SIGINT or SIGTERM. */
	waitForShutdown?: (server: EchoServer) => Promise<void>;
}

const DEFAULT_PROBE_TIMEOUT = 2000;

/**
 * Run the CLI with the given arguments (without `node` and the script path).
 *
 * @returns The process exit status.
 */
export async function run(argv: string[], io: CliIO = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
	const args = parseArgs(argv);

	if (args.errors.length > 0) {
		for (const message of args.errors) io.stderr.write(`Error: ${message}\n`);
		io.stderr.write("Run `pratidhvani --help` for usage.\n");
		return 1;
	}

	if (args.version) {
		io.stdout.write(`pratidhvani v${VERSION}\n`);
		return 0;
	}

	if (args.help || !args.command) {
		io.stdout.write(HELP_TEXT);
		return args.help ? 0 : 1;
	}

	let settings: ServerSettings;
	try {
		settings = resolveSettings({
			cwd: io.cwd,
			env: io.env,
			configPath: args.config,
			overrides: toSettingsOverrides(args),
		});
	} catch (err) {
		if (err instanceof ConfigError) {
			io.stderr.write(`Error: ${err.message}\n`);
			return 1;
		}
		throw err;
	}

	configureLogging({
		level: parseLogLevel(settings.logLevel),
		transports: [createTransport(settings, io)],
	});

	switch (args.command) {
		case "serve":
			return serve(settings, io);
		case "probe":
			return probe(args, io);
	}
}

function createTransport(settings: ServerSettings, io: CliIO): LogTransport {
	if (settings.logFormat === "json") {
		return new JsonTransport({ stdout: io.stdout, stderr: io.stderr });
	}
	return new ConsoleTransport({
		colors: io.colors ?? (process.stdout.isTTY ?? false),
		stdout: io.stdout,
		stderr: io.stderr,
	});
}

// ─── serve ──────────────────────────────────────────────────────────────────

async function serve(settings: ServerSettings, io: CliIO): Promise<number> {
	const log = createLogger("cli");
	const server = EchoServer.fromSettings(settings, createLogger("echo-server"));

	try {
		await server.start();
	} catch (err) {
		if (err instanceof BindError) {
			log.fatal(err.message, err, { address: err.address, osCode: err.osCode });
			return 1;
		}
		throw err;
	}

	const waitForShutdown = io.waitForShutdown ?? waitForSignal;
	await waitForShutdown(server);

	log.info("Shutting down", { connections: server.connectionCount });
	await server.stop();
	return 0;
}

/** Resolve on the first SIGINT or SIGTERM. */
function waitForSignal(): Promise<void> {
	return new Promise<void>((resolve) => {
		const onSignal = (signal: NodeJS.Signals) => {
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
			createLogger("cli").info(`Received ${signal}`);
			resolve();
		};
		process.on("SIGINT", onSignal);
		process.on("SIGTERM", onSignal);
	});
}

// ─── probe ──────────────────────────────────────────────────────────────────

async function probe(args: ParsedArgs, io: CliIO): Promise<number> {
	const [url, ...messages] = args.positionals;
	if (!url) {
		io.stderr.write("Error: probe needs a ws:// URL.\nUsage: pratidhvani probe <ws-url> [message...]\n");
		return 1;
	}

	const timeoutMs = args.timeout === undefined
		? DEFAULT_PROBE_TIMEOUT
		: /^\d+$/.test(args.timeout) ? Number(args.timeout) : NaN;
	if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
		io.stderr.write(`Error: Invalid --timeout "${args.timeout ?? ""}"\n`);
		return 1;
	}

	let client: EchoClient;
	try {
		client = await EchoClient.connect(url, { timeoutMs });
	} catch (err) {
		io.stderr.write(`Error: ${toError(err).message}\n`);
		return 1;
	}

	try {
		for (const message of messages) {
			await client.sendText(message);
			io.stdout.write(`${describeFrame(await client.nextFrame(timeoutMs))}\n`);
		}
		await client.sendClose(1000);
		const reply = await client.nextFrame(timeoutMs);
		if (reply.kind !== "close") {
			io.stderr.write(`Error: expected a Close reply, got ${reply.kind}\n`);
			return 1;
		}
		return 0;
	} catch (err) {
		const error = toError(err);
		io.stderr.write(`Error: ${error instanceof PratidhvaniError ? error.message : String(error)}\n`);
		return 1;
	} finally {
		client.destroy();
	}
}

function describeFrame(frame: Frame): string {
	switch (frame.kind) {
		case "text":
			return frame.payload;
		case "binary":
			return `<binary ${frame.payload.length} bytes>`;
		case "close":
			return `<close ${frame.code ?? "-"}>`;
		case "ping":
		case "pong":
			return `<${frame.kind}>`;
	}
}
