import { describe, expect, it } from "vitest";
import { DataType } from "../src/constants/constants.js";
import {
	ConfigError,
	RequestAbortedError,
	TcpTransportError,
	TransportTimeoutError,
} from "../src/errors.js";
import { defineWindow } from "../src/framers/window-descriptor.js";
import { encodeRequest } from "../src/framers/window-framer.js";
import { TransportSession } from "../src/transport/transport-session.js";
import { ScriptedTransport, dataReply, windowOf } from "./helpers/scripted-transport.js";

const request = (win: number) =>
	encodeRequest(defineWindow(win, false, DataType.Numeric, `window ${win}`));

const echoWindow = (frame: Uint8Array) => dataReply(0, windowOf(frame), "000001");

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("TransportSession", () => {
	it("returns the reply through its checksum digits", async () => {
		const transport = new ScriptedTransport(echoWindow);
		const session = new TransportSession(transport);

		const reply = await session.send(request(205));

		expect(Array.from(reply)).toEqual(Array.from(dataReply(0, "205", "000001")));
	});

	it("runs one exchange at a time in call order", async () => {
		const transport = new ScriptedTransport(echoWindow, 10);
		const session = new TransportSession(transport);

		const replies = await Promise.all([
			session.send(request(1)),
			session.send(request(2)),
			session.send(request(3)),
		]);

		expect(transport.log).toEqual([
			"write:001",
			"reply:001",
			"write:002",
			"reply:002",
			"write:003",
			"reply:003",
		]);
		expect(replies.map((r) => Array.from(r))).toEqual([
			Array.from(dataReply(0, "001", "000001")),
			Array.from(dataReply(0, "002", "000001")),
			Array.from(dataReply(0, "003", "000001")),
		]);
	});

	it("keeps a separate gate per session", async () => {
		const lineA = new ScriptedTransport(echoWindow, 20);
		const lineB = new ScriptedTransport(echoWindow, 20);
		const sessionA = new TransportSession(lineA);
		const sessionB = new TransportSession(lineB);

		const all = Promise.all([sessionA.send(request(1)), sessionB.send(request(2))]);
		await delay(10);

		expect(sessionA.isBusy).toBe(true);
		expect(sessionB.isBusy).toBe(true);
		expect(lineA.log).toEqual(["write:001"]);
		expect(lineB.log).toEqual(["write:002"]);
		await all;
	});

	it("counts requests waiting for the line", async () => {
		const transport = new ScriptedTransport(echoWindow, 20);
		const session = new TransportSession(transport);

		const all = Promise.all([session.send(request(1)), session.send(request(2))]);
		expect(session.pendingCount).toBe(2);
		await delay(10);
		expect(session.isBusy).toBe(true);
		expect(session.pendingCount).toBe(1);
		await all;
		expect(session.isBusy).toBe(false);
		expect(session.pendingCount).toBe(0);
	});

	it("drops stale bytes before writing", async () => {
		const transport = new ScriptedTransport(echoWindow);
		const session = new TransportSession(transport);
		transport.inject(Uint8Array.of(0x41, 0x03, 0x42));

		const reply = await session.send(request(205));

		expect(transport.flushCount).toBe(1);
		expect(Array.from(reply)).toEqual(Array.from(dataReply(0, "205", "000001")));
	});

	it("stops after ETX when no trailer is expected", async () => {
		const transport = new ScriptedTransport(echoWindow);
		const session = new TransportSession(transport, { trailerLength: 0 });

		const reply = await session.send(request(205));

		const full = dataReply(0, "205", "000001");
		expect(Array.from(reply)).toEqual(Array.from(full.subarray(0, full.length - 2)));
	});

	it("times out and releases the line", async () => {
		const transport = new ScriptedTransport(() => null);
		const session = new TransportSession(transport, { readTimeout: 30 });

		await expect(session.send(request(205))).rejects.toBeInstanceOf(TransportTimeoutError);
		expect(session.isBusy).toBe(false);

		transport.respond = echoWindow;
		const reply = await session.send(request(206));
		expect(Array.from(reply)).toEqual(Array.from(dataReply(0, "206", "000001")));
	});

	it("releases the line when the write fails", async () => {
		const transport = new ScriptedTransport(echoWindow);
		const session = new TransportSession(transport);
		transport.failWrite = true;

		await expect(session.send(request(205))).rejects.toBeInstanceOf(TcpTransportError);

		transport.failWrite = false;
		await expect(session.send(request(205))).resolves.toBeInstanceOf(Uint8Array);
	});

	it("removes an aborted request from the queue without disturbing the others", async () => {
		const transport = new ScriptedTransport(echoWindow, 20);
		const session = new TransportSession(transport);
		const controller = new AbortController();

		const first = session.send(request(1));
		const second = session.send(request(2), { signal: controller.signal });
		const third = session.send(request(3));
		controller.abort();

		await expect(second).rejects.toBeInstanceOf(RequestAbortedError);
		await first;
		await third;
		expect(transport.written.map(windowOf)).toEqual(["001", "003"]);
		expect(session.isBusy).toBe(false);
	});

	it("aborts a request waiting for its reply", async () => {
		const transport = new ScriptedTransport(() => null);
		const session = new TransportSession(transport, { readTimeout: 2000 });
		const controller = new AbortController();

		const pending = session.send(request(205), { signal: controller.signal });
		await delay(20);
		const started = Date.now();
		controller.abort();

		await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
		expect(Date.now() - started).toBeLessThan(1000);
		expect(session.isBusy).toBe(false);
	});

	it("rejects an already aborted signal without writing", async () => {
		const transport = new ScriptedTransport(echoWindow);
		const session = new TransportSession(transport);

		await expect(
			session.send(request(205), { signal: AbortSignal.abort() }),
		).rejects.toBeInstanceOf(RequestAbortedError);
		expect(transport.written).toHaveLength(0);
	});

	it("rejects invalid options", () => {
		const transport = new ScriptedTransport(echoWindow);
		expect(() => new TransportSession(transport, { readTimeout: 0 })).toThrow(ConfigError);
		expect(() => new TransportSession(transport, { trailerLength: -1 })).toThrow(ConfigError);
	});
});
