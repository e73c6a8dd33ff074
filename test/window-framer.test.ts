import { describe, expect, it } from "vitest";
import { DataType, ResultCode } from "../src/constants/constants.js";
import {
	ChecksumMismatchError,
	ConfigError,
	DataTypeError,
	IncompleteFrameError,
	InvalidAddressError,
	MalformedFrameError,
	NackError,
	OutOfRangeError,
	UnknownWindowError,
	UnrecognizedResultCodeError,
	WinDisabledError,
} from "../src/errors.js";
import { compareWindows, defineWindow } from "../src/framers/window-descriptor.js";
import {
	decodeAddress,
	decodeResponse,
	encodeAddress,
	encodeRequest,
} from "../src/framers/window-framer.js";
import { latin1Decode } from "../src/utils/utils.js";
import { ascii, controlReply, dataReply, withTrailer } from "./helpers/scripted-transport.js";

const REMOTE = defineWindow(8, true, DataType.Logic, "Remote");
const STATUS = defineWindow(205, false, DataType.Numeric, "Status");
const UNIT = defineWindow(600, true, DataType.Numeric, "Unit pressure");
const LABEL = defineWindow(890, true, DataType.Alphanumeric, "Label");

describe("address bias", () => {
	it("maps 0-31 onto 0x80-0x9F and back", () => {
		for (let address = 0; address <= 31; address++) {
			expect(decodeAddress(encodeAddress(address))).toBe(address);
		}
		expect(encodeAddress(0)).toBe(0x80);
		expect(encodeAddress(31)).toBe(0x9f);
	});

	it("rejects addresses outside the 5-bit field", () => {
		expect(() => encodeAddress(32)).toThrow(InvalidAddressError);
		expect(() => encodeAddress(-1)).toThrow(InvalidAddressError);
		expect(() => encodeAddress(1.5)).toThrow(InvalidAddressError);
	});
});

describe("encodeRequest", () => {
	it("encodes a logic write", () => {
		const frame = encodeRequest(REMOTE, { value: true, write: true, address: 0 });
		expect(Array.from(frame)).toEqual([
			0x02, 0x80, 0x30, 0x30, 0x38, 0x31, 0x31, 0x03, 0x42, 0x42,
		]);
	});

	it("encodes a read without payload", () => {
		const frame = encodeRequest(STATUS);
		// XOR of 80 32 30 35 30 03 = 0x84
		expect(Array.from(frame)).toEqual([
			0x02, 0x80, 0x32, 0x30, 0x35, 0x30, 0x03, 0x38, 0x34,
		]);
	});

	it("biases the device address", () => {
		const frame = encodeRequest(STATUS, { address: 5 });
		expect(frame[1]).toBe(0x85);
	});

	it("formats numeric values as six digits", () => {
		const frame = encodeRequest(UNIT, { value: 1, write: true });
		expect(latin1Decode(frame.subarray(2, frame.length - 3))).toBe("6001000001");
	});

	it("refuses to write a read-only window", () => {
		expect(() => encodeRequest(STATUS, { value: 1, write: true })).toThrow(WinDisabledError);
	});

	it("refuses a write without value", () => {
		expect(() => encodeRequest(REMOTE, { write: true })).toThrow(DataTypeError);
	});

	it("refuses values of the wrong type or range", () => {
		expect(() => encodeRequest(REMOTE, { value: "on", write: true })).toThrow(DataTypeError);
		expect(() => encodeRequest(REMOTE, { value: 2, write: true })).toThrow(OutOfRangeError);
	});

	it("refuses text outside ISO-8859-1 or carrying frame delimiters", () => {
		expect(() => encodeRequest(LABEL, { value: "5€", write: true })).toThrow(DataTypeError);
		expect(() => encodeRequest(LABEL, { value: "a\u0003b", write: true })).toThrow(DataTypeError);
	});

	it("checks the address before anything else", () => {
		expect(() => encodeRequest(STATUS, { address: 40, value: 1, write: true })).toThrow(
			InvalidAddressError,
		);
	});

	it("refuses window numbers above 999", () => {
		const descriptor = { win: 1000, writable: false, datatype: DataType.Numeric, description: "x" };
		expect(() => encodeRequest(descriptor)).toThrow(UnknownWindowError);
	});
});

describe("defineWindow", () => {
	it("returns frozen descriptors ordered by window number", () => {
		expect(Object.isFrozen(REMOTE)).toBe(true);
		expect([LABEL, REMOTE, STATUS].sort(compareWindows).map((d) => d.win)).toEqual([8, 205, 890]);
	});

	it("rejects window numbers outside 0-999", () => {
		expect(() => defineWindow(1000, true, DataType.Logic, "x")).toThrow(ConfigError);
	});
});

describe("decodeResponse", () => {
	it("returns a frozen ACK control response", () => {
		const response = decodeResponse(controlReply(0, ResultCode.ACK));
		expect(response).toEqual({
			kind: "control",
			addr: 0,
			resultCode: ResultCode.ACK,
			write: true,
		});
		expect(Object.isFrozen(response)).toBe(true);
	});

	it("raises the error of each negative result code", () => {
		expect(() => decodeResponse(controlReply(0, 0x15))).toThrow(NackError);
		expect(() => decodeResponse(controlReply(0, 0x32))).toThrow(UnknownWindowError);
		expect(() => decodeResponse(controlReply(0, 0x33))).toThrow(DataTypeError);
		expect(() => decodeResponse(controlReply(0, 0x34))).toThrow(OutOfRangeError);
		expect(() => decodeResponse(controlReply(0, 0x35))).toThrow(WinDisabledError);
	});

	it("raises on an unknown result code", () => {
		expect(() => decodeResponse(controlReply(0, 0x40))).toThrow(UnrecognizedResultCodeError);
	});

	it("parses a data reply", () => {
		const response = decodeResponse(dataReply(1, "205", "000005"));
		expect(response.kind).toBe("data");
		if (response.kind !== "data") return;
		expect(response.addr).toBe(1);
		expect(response.win).toBe(205);
		expect(response.write).toBe(false);
		expect(latin1Decode(response.data)).toBe("000005");
	});

	it("decodes an encoded request back to its fields", () => {
		const response = decodeResponse(encodeRequest(REMOTE, { value: true, write: true, address: 7 }));
		expect(response.kind).toBe("data");
		if (response.kind !== "data") return;
		expect(response.addr).toBe(7);
		expect(response.win).toBe(8);
		expect(response.write).toBe(true);
		expect(latin1Decode(response.data)).toBe("1");
	});

	it.each([
		{ descriptor: UNIT, value: 42, text: "000042" },
		{ descriptor: UNIT, value: -12, text: "-00012" },
		{ descriptor: UNIT, value: "5.0E-09", text: "5.0E-09" },
		{ descriptor: LABEL, value: "pump-1", text: "pump-1" },
	])("decodes a write of $value to window $descriptor.win back to its payload", ({ descriptor, value, text }) => {
		const response = decodeResponse(encodeRequest(descriptor, { value, write: true }));
		expect(response.kind).toBe("data");
		if (response.kind !== "data") return;
		expect(response.win).toBe(descriptor.win);
		expect(response.write).toBe(true);
		expect(Array.from(response.data)).toEqual(ascii(text));
	});

	it("reports a frame without ETX as incomplete", () => {
		expect(() => decodeResponse(Uint8Array.from([0x02, 0x80, ...ascii("2050")]))).toThrow(
			IncompleteFrameError,
		);
	});

	it("rejects a wrong checksum", () => {
		const frame = controlReply(0, ResultCode.ACK);
		frame[frame.length - 1] = 0x30;
		expect(() => decodeResponse(frame)).toThrow(ChecksumMismatchError);
	});

	it("rejects a missing checksum", () => {
		const frame = Uint8Array.of(0x02, 0x80, 0x06, 0x03);
		try {
			decodeResponse(frame);
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(ChecksumMismatchError);
			if (err instanceof ChecksumMismatchError) {
				expect(err.received).toBeNull();
				expect(err.calculated).toBe("85");
			}
		}
	});

	it("skips checksum validation on request", () => {
		const response = decodeResponse(Uint8Array.of(0x02, 0x80, 0x06, 0x03), { verifyChecksum: false });
		expect(response.kind).toBe("control");
	});

	it("validates the checksum before the structure", () => {
		const frame = withTrailer([0x00, 0x80, 0x06, 0x03]);
		frame[frame.length - 1] = 0x30;
		expect(() => decodeResponse(frame)).toThrow(ChecksumMismatchError);
	});

	it("rejects frames with broken structure", () => {
		expect(() => decodeResponse(withTrailer([0x00, 0x80, 0x06, 0x03]))).toThrow(MalformedFrameError);
		expect(() => decodeResponse(withTrailer([0x02, 0x20, 0x06, 0x03]))).toThrow(MalformedFrameError);
		expect(() => decodeResponse(withTrailer([0x02, 0x80, 0x32, 0x30, 0x03]))).toThrow(
			MalformedFrameError,
		);
		expect(() => decodeResponse(withTrailer([0x02, 0x80, ...ascii("2A50"), 0x03]))).toThrow(
			MalformedFrameError,
		);
		expect(() => decodeResponse(withTrailer([0x02, 0x80, ...ascii("2052"), 0x03]))).toThrow(
			MalformedFrameError,
		);
	});
});
