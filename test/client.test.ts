import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WindowClient } from "../src/client.js";
import {
	ControllerEmulator,
	EmulatorTransport,
} from "../src/controller-emulator/controller-emulator.js";
import { DataType, ResultCode } from "../src/constants/constants.js";
import {
	ConfigError,
	InvalidAddressError,
	MalformedFrameError,
	OutOfRangeError,
	RequestAbortedError,
	TransportTimeoutError,
	UnknownWindowError,
	WinDisabledError,
} from "../src/errors.js";
import { defineWindow } from "../src/framers/window-descriptor.js";
import { latin1Decode } from "../src/utils/utils.js";
import { ScriptedTransport, controlReply, dataReply } from "./helpers/scripted-transport.js";

const REMOTE = defineWindow(8, true, DataType.Logic, "Remote");
const STATUS = defineWindow(205, false, DataType.Numeric, "Status");
const UNIT = defineWindow(600, true, DataType.Numeric, "Unit pressure");
const MISSING = defineWindow(999, false, DataType.Numeric, "Not on this controller");

describe("WindowClient", () => {
	let emulator: ControllerEmulator;
	let transport: EmulatorTransport;

	beforeEach(async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		emulator = new ControllerEmulator(0);
		emulator.defineWindow(REMOTE, false);
		emulator.defineWindow(STATUS, 5);
		emulator.defineWindow(UNIT, 1);
		transport = new EmulatorTransport(emulator, { replyDelay: 2 });
	});

	afterEach(async () => {
		await transport.disconnect();
		vi.restoreAllMocks();
	});

	it("reads a window", async () => {
		const client = new WindowClient(transport);
		await client.connect();

		const response = await client.read(STATUS);

		expect(response.addr).toBe(0);
		expect(response.win).toBe(205);
		expect(latin1Decode(response.data)).toBe("000005");
	});

	it("writes a window and returns the ACK", async () => {
		const client = new WindowClient(transport);
		await client.connect();

		const response = await client.write(REMOTE, true);

		expect(response).toEqual({ kind: "control", addr: 0, resultCode: ResultCode.ACK, write: true });
		expect(emulator.getValue(8)).toBe(true);
	});

	it("writes nothing when the request fails local validation", async () => {
		const client = new WindowClient(transport);
		await client.connect();

		await expect(client.write(STATUS, 1)).rejects.toBeInstanceOf(WinDisabledError);
		await expect(client.write(REMOTE, 3)).rejects.toBeInstanceOf(OutOfRangeError);
		expect(transport.written).toHaveLength(0);
	});

	it("raises the error carried by a negative reply", async () => {
		const client = new WindowClient(transport);
		await client.connect();
		emulator.setResultCode(600, ResultCode.OUT_OF_RANGE);

		await expect(client.write(UNIT, 7)).rejects.toBeInstanceOf(OutOfRangeError);
		expect(emulator.getValue(600)).toBe(1);
	});

	it("serializes concurrent reads", async () => {
		const client = new WindowClient(transport);
		await client.connect();

		const [a, b, c] = await Promise.all([
			client.read(STATUS),
			client.read(REMOTE),
			client.read(UNIT),
		]);

		expect([a.win, b.win, c.win]).toEqual([205, 8, 600]);
		expect([a, b, c].map((r) => latin1Decode(r.data))).toEqual(["000005", "0", "000001"]);
		expect(client.isBusy).toBe(false);
		expect(client.pendingCount).toBe(0);
	});

	it("times out when no controller answers at the address", async () => {
		const client = new WindowClient(transport, { readTimeout: 50 });
		await client.connect();

		await expect(client.read(STATUS, { address: 3 })).rejects.toBeInstanceOf(TransportTimeoutError);
	});

	it("rejects a request whose signal is already aborted", async () => {
		const client = new WindowClient(transport);
		await client.connect();

		await expect(client.read(STATUS, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
			RequestAbortedError,
		);
		expect(transport.written).toHaveLength(0);
	});

	it("collects diagnostics when enabled", async () => {
		const client = new WindowClient(transport, { diagnostics: true });
		await client.connect();

		await client.read(STATUS);
		await expect(client.read(MISSING)).rejects.toBeInstanceOf(UnknownWindowError);

		const stats = client.getDiagnostics();
		expect(stats.totalRequests).toBe(2);
		expect(stats.successfulResponses).toBe(1);
		expect(stats.errorResponses).toBe(1);
		expect(stats.errorsByKind).toEqual({ "unknown-window": 1 });
		// two 9-byte reads; a 15-byte data reply and a 6-byte control reply
		expect(stats.totalDataSent).toBe(18);
		expect(stats.totalDataReceived).toBe(21);

		client.resetDiagnostics();
		expect(client.getDiagnostics().totalRequests).toBe(0);
	});

	it("leaves diagnostics untouched when disabled", async () => {
		const client = new WindowClient(transport);
		await client.connect();

		await client.read(STATUS);

		expect(client.getDiagnostics().totalRequests).toBe(0);
	});

	it("validates its options", () => {
		expect(() => new WindowClient(transport, { address: 32 })).toThrow(InvalidAddressError);
		expect(() => new WindowClient(transport, { readTimeout: -5 })).toThrow(ConfigError);
	});
});

describe("WindowClient reply checks", () => {
	it("rejects a reply from another address", async () => {
		const client = new WindowClient(new ScriptedTransport(() => dataReply(1, "205", "000005")));

		await expect(client.read(STATUS)).rejects.toBeInstanceOf(MalformedFrameError);
	});

	it("rejects a reply for another window", async () => {
		const client = new WindowClient(new ScriptedTransport(() => dataReply(0, "206", "000000")));

		await expect(client.read(STATUS)).rejects.toBeInstanceOf(MalformedFrameError);
	});

	it("rejects a read answered with a bare ACK", async () => {
		const client = new WindowClient(new ScriptedTransport(() => controlReply(0, ResultCode.ACK)));

		await expect(client.read(STATUS)).rejects.toBeInstanceOf(MalformedFrameError);
	});

	it("accepts a write echoed back as a data reply", async () => {
		const client = new WindowClient(new ScriptedTransport(() => dataReply(0, "008", "1")));

		const response = await client.write(REMOTE, true);

		expect(response.kind).toBe("data");
	});
});
