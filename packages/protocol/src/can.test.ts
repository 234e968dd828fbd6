import { describe, expect, it } from "vitest";
import {
  CAN_FRAME_WIRE_LEN,
  ProtocolError,
  createCanFrame,
  decodeCanFrame,
  encodeCanFrame,
  formatCanFrame,
} from "./can";
import { catchError } from "./test-helpers";

describe("CAN frame codec", () => {
  it("lays out id, length and zero padded payload", () => {
    const encoded = encodeCanFrame(createCanFrame(0x7df, [0x02, 0x01, 0x0c]));

    expect(encoded.length).toBe(CAN_FRAME_WIRE_LEN);
    expect(encoded.toString("hex")).toBe("df070000" + "03" + "02010c0000000000");
  });

  it("round-trips id, length and meaningful bytes", () => {
    const frames = [
      createCanFrame(0, []),
      createCanFrame(0x7e8, [0x04, 0x41, 0x0c, 0x1a, 0xf8]),
      createCanFrame(0xffffffff, [1, 2, 3, 4, 5, 6, 7, 8]),
    ];
    for (const frame of frames) {
      const decoded = decodeCanFrame(encodeCanFrame(frame));
      expect(decoded.arbitrationId).toBe(frame.arbitrationId);
      expect(decoded.length).toBe(frame.data.length);
      expect(Array.from(decoded.data)).toEqual(Array.from(frame.data));
    }
  });

  it("truncates the payload to the length byte", () => {
    const wire = Buffer.from("e8070000" + "02" + "4344aabbccddeeff", "hex");
    const decoded = decodeCanFrame(wire);

    expect(decoded.length).toBe(2);
    expect(decoded.dataHex).toBe("4344");
  });

  it("rejects payloads over eight bytes", () => {
    const error = catchError(() => encodeCanFrame(createCanFrame(0x7df, new Array<number>(9).fill(0))));
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ code: "PAYLOAD_TOO_LARGE" });
  });

  it("rejects identifiers outside 32 bits", () => {
    expect(() => encodeCanFrame(createCanFrame(-1, []))).toThrow(ProtocolError);
    expect(catchError(() => encodeCanFrame(createCanFrame(0x100000000, [])))).toMatchObject({
      code: "ID_OUT_OF_RANGE",
    });
  });

  it("treats anything but thirteen bytes as malformed", () => {
    expect(catchError(() => decodeCanFrame(Buffer.alloc(12)))).toMatchObject({
      code: "MALFORMED_FRAME",
    });
    expect(() => decodeCanFrame(Buffer.alloc(14))).toThrow(ProtocolError);
  });

  it("treats a length byte over eight as malformed", () => {
    const wire = Buffer.alloc(CAN_FRAME_WIRE_LEN);
    wire.writeUInt8(9, 4);
    expect(catchError(() => decodeCanFrame(wire))).toMatchObject({ code: "MALFORMED_FRAME" });
  });

  it("formats frames for logs", () => {
    expect(formatCanFrame(createCanFrame(0x7e8, [0x03, 0x41, 0x0d, 0x32]))).toBe(
      "7E8 [4] 03 41 0D 32"
    );
    expect(formatCanFrame(createCanFrame(0x7df, []))).toBe("7DF [0]");
  });
});
