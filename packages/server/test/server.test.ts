import { describe, it, expect, beforeEach, afterEach } from "vitest";
import http from "node:http";
import net from "node:net";
import type { Duplex } from "node:stream";
import { BindError, HandshakeError, LogLevel, Logger } from "@pratidhvani/core";
import type { LogEntry, LogTransport } from "@pratidhvani/core";
import { EchoClient } from "../src/client.js";
import type { ConnectionOutcome } from "../src/connection.js";
import { Opcode, encodeFrame, serializeFrame } from "../src/frame.js";
import type { Frame } from "../src/frame.js";
import { EchoServer } from "../src/server.js";
import type { EchoServerOptions } from "../src/server.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
	find(message: string): LogEntry | undefined {
		return this.entries.find((e) => e.message === message);
	}
}

/** Resolve with the outcome of the next connection to finish. */
function nextDisconnect(server: EchoServer): Promise<ConnectionOutcome> {
	return new Promise((resolve) => {
		server.events.onDisconnect = (_id, outcome) => resolve(outcome);
	});
}

/** Send raw HTTP over TCP and collect everything until the server closes. */
function rawRequest(port: number, lines: string[]): Promise<string> {
	return new Promise((resolve, reject) => {
		const socket = net.createConnection({ host: "127.0.0.1", port }, () => {
			socket.write([...lines, "", ""].join("\r\n"));
		});
		let data = "";
		socket.on("data", (chunk: Buffer) => {
			data += chunk.toString("latin1");
		});
		socket.on("close", () => resolve(data));
		socket.on("error", reject);
		socket.setTimeout(2000, () => socket.destroy(new Error("raw request timed out")));
	});
}

function upgradeLines(port: number, extra: string[]): string[] {
	return [
		"GET / HTTP/1.1",
		`Host: 127.0.0.1:${port}`,
		"Upgrade: websocket",
		"Connection: Upgrade",
		...extra,
	];
}

interface Upgraded {
	response: http.IncomingMessage;
	socket: net.Socket;
	head: Buffer;
}

/** Upgrade with node:http, leaving the accept key for the caller to check. */
function httpUpgrade(port: number, key: string): Promise<Upgraded> {
	return new Promise((resolve, reject) => {
		const req = http.request({
			host: "127.0.0.1",
			port,
			path: "/",
			agent: false,
			headers: {
				Connection: "Upgrade",
				Upgrade: "websocket",
				"Sec-WebSocket-Key": key,
				"Sec-WebSocket-Version": "13",
			},
		});
		req.on("upgrade", (response: http.IncomingMessage, socket: net.Socket, head: Buffer) => {
			resolve({ response, socket, head });
		});
		req.on("response", (res: http.IncomingMessage) => reject(new Error(`unexpected status ${res.statusCode}`)));
		req.on("error", reject);
		req.end();
	});
}

/** Read from `socket` until at least `length` bytes have arrived. */
function readBytes(socket: net.Socket, length: number, initial: Buffer = Buffer.alloc(0)): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		let data = initial;
		const check = (): void => {
			if (data.length < length) return;
			socket.off("data", onData);
			resolve(data);
		};
		const onData = (chunk: Buffer): void => {
			data = Buffer.concat([data, chunk]);
			check();
		};
		socket.on("data", onData);
		socket.once("error", reject);
		check();
	});
}

function masked(...frames: Frame[]): Buffer {
	return Buffer.concat(frames.map((frame) => serializeFrame(frame, { mask: true })));
}

describe("EchoServer", () => {
	let transport: TestTransport;
	let servers: EchoServer[];
	let clients: EchoClient[];

	beforeEach(() => {
		transport = new TestTransport();
		servers = [];
		clients = [];
	});

	afterEach(async () => {
		for (const client of clients) client.destroy();
		await Promise.all(servers.map((s) => s.stop()));
	});

	async function startServer(opts: EchoServerOptions = {}): Promise<EchoServer> {
		const server = new EchoServer({
			host: "127.0.0.1",
			port: 0,
			closeTimeoutMs: 100,
			logger: new Logger("test", { level: LogLevel.DEBUG, transports: [transport] }),
			...opts,
		});
		servers.push(server);
		await server.start();
		return server;
	}

	async function connect(server: EchoServer): Promise<EchoClient> {
		const url = server.url;
		if (!url) throw new Error("server is not listening");
		const client = await EchoClient.connect(url);
		clients.push(client);
		return client;
	}

	function portOf(server: EchoServer): number {
		const info = server.address;
		if (!info) throw new Error("server is not listening");
		return info.port;
	}

	// ═══════════════════════════════════════════════════════════════════════
	// Echo
	// ═══════════════════════════════════════════════════════════════════════

	describe("echo", () => {
		it("should echo text verbatim by default", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendText("ping");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "ping" });
		});

		it("should prefix text in prefix mode", async () => {
			const server = await startServer({ textMode: "prefix" });
			const client = await connect(server);
			await client.sendText("hello");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "Echo: hello" });
		});

		it("should answer messages in order", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendRaw(masked(
				{ kind: "text", payload: "one" },
				{ kind: "text", payload: "two" },
				{ kind: "text", payload: "three" },
			));
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "one" });
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "two" });
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "three" });
		});

		it("should forward binary frames unchanged", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendBinary(Buffer.from([1, 2, 3]));
			expect(await client.nextFrame()).toEqual({ kind: "binary", payload: Buffer.from([1, 2, 3]) });
		});

		it("should drop binary frames in drop mode", async () => {
			const server = await startServer({ binaryMode: "drop" });
			const client = await connect(server);
			await client.sendBinary(Buffer.from([1, 2, 3]));
			await client.sendText("after");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "after" });
		});

		it("should reassemble fragmented messages", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendRaw(Buffer.concat([
				encodeFrame(Opcode.Text, Buffer.from("Hel"), { mask: true, fin: false }),
				encodeFrame(Opcode.Continuation, Buffer.from("lo"), { mask: true }),
			]));
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "Hello" });
		});

		it("should answer Ping with Pong", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendPing(Buffer.from("hb"));
			expect(await client.nextFrame()).toEqual({ kind: "pong", payload: Buffer.from("hb") });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Isolation
	// ═══════════════════════════════════════════════════════════════════════

	describe("isolation", () => {
		it("should return each client only its own payload", async () => {
			const server = await startServer();
			const a = await connect(server);
			const b = await connect(server);

			await Promise.all([a.sendText("A"), b.sendText("B")]);
			expect(await a.nextFrame()).toEqual({ kind: "text", payload: "A" });
			expect(await b.nextFrame()).toEqual({ kind: "text", payload: "B" });

			// A Pong round trip proves nothing else was queued ahead of it.
			await Promise.all([a.sendPing(), b.sendPing()]);
			expect((await a.nextFrame()).kind).toBe("pong");
			expect((await b.nextFrame()).kind).toBe("pong");
			expect(server.connectionCount).toBe(2);
		});

		it("should keep serving others when one client drops", async () => {
			const server = await startServer();
			const a = await connect(server);
			const b = await connect(server);
			const gone = nextDisconnect(server);

			a.destroy();
			expect((await gone).reason).toBe("peer-ended");

			await b.sendText("still here");
			expect(await b.nextFrame()).toEqual({ kind: "text", payload: "still here" });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Close
	// ═══════════════════════════════════════════════════════════════════════

	describe("close", () => {
		it("should complete ping, echo, close with no further messages", async () => {
			const server = await startServer();
			const client = await connect(server);
			const done = nextDisconnect(server);

			await client.sendText("ping");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "ping" });

			await client.sendRaw(masked(
				{ kind: "close", code: 1000, reason: "" },
				{ kind: "text", payload: "after" },
			));
			expect(await client.nextFrame()).toEqual({ kind: "close", code: 1000, reason: "" });

			await client.closed;
			expect(client.pendingFrames).toBe(0);
			expect(await done).toEqual({ reason: "close-frame", framesReceived: 2, framesSent: 1, closeCode: 1000 });
			expect(server.connectionCount).toBe(0);
		});

		it("should answer an empty Close with an empty Close", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendClose();
			expect(await client.nextFrame()).toEqual({ kind: "close", reason: "" });
		});

		it("should close every client with 1001 on stop", async () => {
			const server = await startServer();
			const client = await connect(server);

			const stopping = server.stop();
			expect(await client.nextFrame()).toEqual({ kind: "close", code: 1001, reason: "Server shutting down" });
			await stopping;
			await client.closed;
			expect(server.address).toBeNull();
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Protocol errors
	// ═══════════════════════════════════════════════════════════════════════

	describe("protocol errors", () => {
		it("should close with 1002 on an unmasked frame", async () => {
			const server = await startServer();
			const client = await connect(server);
			const done = nextDisconnect(server);

			await client.sendRaw(encodeFrame(Opcode.Text, Buffer.from("x")));
			expect(await client.nextFrame()).toEqual({
				kind: "close",
				code: 1002,
				reason: "Client frames must be masked",
			});
			const outcome = await done;
			expect(outcome.reason).toBe("protocol-error");
			expect(outcome.closeCode).toBe(1002);
		});

		it("should close with 1007 on invalid UTF-8", async () => {
			const server = await startServer();
			const client = await connect(server);
			await client.sendRaw(encodeFrame(Opcode.Text, Buffer.from([0xff]), { mask: true }));
			expect(await client.nextFrame()).toEqual({
				kind: "close",
				code: 1007,
				reason: "Invalid UTF-8 in text payload",
			});
		});

		it("should close with 1009 when a message is too big", async () => {
			const server = await startServer({ maxPayloadBytes: 8 });
			const client = await connect(server);
			await client.sendText("123456789");
			const frame = await client.nextFrame();
			expect(frame.kind === "close" ? frame.code : undefined).toBe(1009);
		});

		it("should log the violation at WARN", async () => {
			const server = await startServer();
			const client = await connect(server);
			const done = nextDisconnect(server);
			await client.sendRaw(Buffer.from([0xc1, 0x80, 0, 0, 0, 0]));
			await done;
			const entry = transport.find("Protocol violation: Reserved bits set without a negotiated extension");
			expect(entry?.level).toBe(LogLevel.WARN);
			expect(entry?.connectionId).toBeDefined();
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Transport failures
	// ═══════════════════════════════════════════════════════════════════════

	describe("transport failures", () => {
		it("should end with read-error when the peer resets the connection", async () => {
			const server = await startServer();
			const done = nextDisconnect(server);
			const { socket } = await httpUpgrade(portOf(server), "dGhlIHNhbXBsZSBub25jZQ==");
			socket.resetAndDestroy();

			const outcome = await done;
			expect(outcome.reason).toBe("read-error");
			expect(outcome.error?.message).toBe("Socket read failed");
			expect(transport.find("Connection read failed")?.level).toBe(LogLevel.WARN);
		});

		it("should end with write-error when the reply cannot be written", async () => {
			let serverSide: Duplex | undefined;
			const server = await startServer({
				transform: (text) => {
					serverSide?.destroy();
					return text;
				},
			});
			server.httpServer.on("upgrade", (_req: http.IncomingMessage, socket: Duplex) => {
				serverSide = socket;
			});
			const done = nextDisconnect(server);
			const client = await connect(server);
			await client.sendText("lost");

			const outcome = await done;
			expect(outcome.reason).toBe("write-error");
			expect(outcome.framesReceived).toBe(1);
			expect(outcome.framesSent).toBe(0);
			expect(outcome.error?.message).toBe("Socket is no longer writable");
			expect(transport.find("Connection write failed")?.level).toBe(LogLevel.WARN);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Handshake
	// ═══════════════════════════════════════════════════════════════════════

	describe("handshake", () => {
		it("should refuse a request without a key with 400", async () => {
			const server = await startServer();
			const rejected: HandshakeError[] = [];
			server.events.onReject = (err) => rejected.push(err);

			const response = await rawRequest(portOf(server), upgradeLines(portOf(server), ["Sec-WebSocket-Version: 13"]));
			expect(response.startsWith("HTTP/1.1 400 Bad Request\r\n")).toBe(true);
			expect(response.endsWith('{"error":"Missing or invalid Sec-WebSocket-Key"}')).toBe(true);
			expect(rejected.map((e) => e.status)).toEqual([400]);
		});

		it("should answer a node:http upgrade with the RFC 6455 accept key", async () => {
			const server = await startServer();
			const { response, socket, head } = await httpUpgrade(portOf(server), "dGhlIHNhbXBsZSBub25jZQ==");
			try {
				expect(response.statusCode).toBe(101);
				expect(response.headers["sec-websocket-accept"]).toBe("s3pPLMBiTxaQ9kYGzzhZRbK+xOo=");

				// "hi" in a masked text frame with an all-zero mask key
				socket.write(Buffer.from([0x81, 0x82, 0, 0, 0, 0, 0x68, 0x69]));
				const reply = await readBytes(socket, 4, head);
				expect([...reply.subarray(0, 4)]).toEqual([0x81, 0x02, 0x68, 0x69]);
			} finally {
				socket.destroy();
			}
		});

		it("should answer a malformed request line with 400", async () => {
			const server = await startServer();
			const response = await rawRequest(portOf(server), ["NOT A REQUEST"]);
			expect(response).toBe("HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n");
			expect(transport.find("Malformed request from client")?.level).toBe(LogLevel.WARN);
		});

		it("should refuse an unsupported version with 426", async () => {
			const server = await startServer();
			const response = await rawRequest(portOf(server), upgradeLines(portOf(server), [
				"Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==",
				"Sec-WebSocket-Version: 8",
			]));
			expect(response.startsWith("HTTP/1.1 426 Upgrade Required\r\n")).toBe(true);
			expect(response).toContain("\r\nSec-WebSocket-Version: 13\r\n");
		});

		it("should keep accepting after a refused handshake", async () => {
			const server = await startServer();
			await rawRequest(portOf(server), upgradeLines(portOf(server), ["Sec-WebSocket-Version: 13"]));
			const client = await connect(server);
			await client.sendText("ok");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "ok" });
		});

		it("should answer plain HTTP with 426", async () => {
			const server = await startServer();
			const status = await new Promise<number | undefined>((resolve, reject) => {
				http.get({ host: "127.0.0.1", port: portOf(server), path: "/", agent: false }, (res) => {
					res.resume();
					res.on("end", () => resolve(res.statusCode));
				}).on("error", reject);
			});
			expect(status).toBe(426);
		});

		it("should refuse upgrades past maxConnections with 503", async () => {
			const server = await startServer({ maxConnections: 1 });
			await connect(server);
			const url = server.url ?? "";
			await expect(EchoClient.connect(url)).rejects.toBeInstanceOf(HandshakeError);
			await expect(EchoClient.connect(url)).rejects.toMatchObject({ status: 503 });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Listener
	// ═══════════════════════════════════════════════════════════════════════

	describe("listener", () => {
		it("should report the bound URL", async () => {
			const server = await startServer();
			expect(server.url).toBe(`ws://127.0.0.1:${portOf(server)}`);
			expect(transport.find(`Listening on ws://127.0.0.1:${portOf(server)}`)?.context).toEqual({
				policy: "text=echo binary=forward",
			});
		});

		it("should fail with BindError when the port is taken", async () => {
			const first = await startServer();
			const second = new EchoServer({
				host: "127.0.0.1",
				port: portOf(first),
				logger: new Logger("test", { level: LogLevel.DEBUG, transports: [transport] }),
			});
			const err = await second.start().then(
				() => null,
				(e: unknown) => e,
			);
			expect(err).toBeInstanceOf(BindError);
			expect(err).toMatchObject({ osCode: "EADDRINUSE", address: `127.0.0.1:${portOf(first)}` });
		});

		it("should keep accepting after an accept error", async () => {
			const server = await startServer();
			const acceptError = Object.assign(new Error("accept EMFILE"), { code: "EMFILE", syscall: "accept" });
			server.httpServer.emit("error", acceptError);

			expect(transport.find("Accept failed; still listening")?.level).toBe(LogLevel.WARN);
			expect(server.address).not.toBeNull();

			const client = await connect(server);
			await client.sendText("ping");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "ping" });
		});

		it("should log connects and disconnects with the connection id", async () => {
			const server = await startServer();
			let connectedId: string | undefined;
			server.events.onConnect = (conn) => {
				connectedId = conn.id;
			};
			const done = nextDisconnect(server);
			const client = await connect(server);
			client.destroy();
			await done;

			expect(connectedId).toBeDefined();
			expect(transport.find("Client connected")?.connectionId).toBe(connectedId);
			expect(transport.find("Client disconnected")?.context.reason).toBe("peer-ended");
		});

		it("should survive a throwing event hook", async () => {
			const server = await startServer();
			server.events.onConnect = () => {
				throw new Error("hook failure");
			};
			const client = await connect(server);
			await client.sendText("ping");
			expect(await client.nextFrame()).toEqual({ kind: "text", payload: "ping" });
			expect(transport.find("onConnect hook threw")?.level).toBe(LogLevel.ERROR);
		});
	});
});

describe("EchoClient", () => {
	it("should reject non-ws URLs", async () => {
		await expect(EchoClient.connect("http://127.0.0.1:1")).rejects.toThrow("Unsupported URL scheme http:");
	});
});
