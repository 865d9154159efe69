// @pratidhvani/server — WebSocket echo server, client and CLI
export { EchoServer } from "./server.js";
export type { EchoServerOptions, EchoServerEvents } from "./server.js";
export { EchoConnection } from "./connection.js";
export type { ConnectionState, CloseReason, ConnectionOutcome, EchoConnectionOptions } from "./connection.js";
export { Listener } from "./listener.js";
export type { ListenerOptions, UpgradeHandler } from "./listener.js";
export { createEchoPolicy, describePolicy, textTransform, DEFAULT_PREFIX } from "./dispatcher.js";
export type { DispatchAction, DispatchPolicy, EchoPolicyOptions } from "./dispatcher.js";
export {
	Opcode,
	CloseCode,
	DEFAULT_MAX_PAYLOAD,
	encodeFrame,
	encodeClosePayload,
	serializeFrame,
	decodeUtf8,
	decodeClosePayload,
	parseFrame,
	FrameParser,
} from "./frame.js";
export type { Frame, FrameKind, DataFrame, RawFrame, ParseOptions } from "./frame.js";
export { FrameWriter } from "./frame-writer.js";
export { readFrames } from "./frame-reader.js";
export {
	WS_MAGIC_GUID,
	SUPPORTED_VERSION,
	computeAcceptKey,
	validateHandshake,
	buildHandshakeResponse,
	buildRejectionResponse,
	rejectUpgrade,
} from "./handshake.js";
export type { UpgradeRequest } from "./handshake.js";
export { EchoClient } from "./client.js";
export type { EchoClientOptions } from "./client.js";
export { run, VERSION } from "./cli.js";
export type { CliIO } from "./cli.js";
export { parseArgs, toSettingsOverrides, HELP_TEXT } from "./args.js";
export type { ParsedArgs, Command } from "./args.js";
