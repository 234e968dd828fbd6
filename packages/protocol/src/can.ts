import { ErrorCodes, type ErrorCode } from "@ecu-sim/shared";

export type CanFrame = {
  arbitrationId: number;
  data: Buffer;
};

export type CanFrameDecoded = CanFrame & {
  length: number;
  dataHex: string;
};

export const CAN_FRAME_WIRE_LEN = 13;
export const CAN_MAX_DATA_LEN = 8;

const MAX_ARBITRATION_ID = 0xffffffff;
const ID_OFFSET = 0;
const LENGTH_OFFSET = 4;
const PAYLOAD_OFFSET = 5;

export type ProtocolErrorCode = Extract<
  ErrorCode,
  "MALFORMED_FRAME" | "PAYLOAD_TOO_LARGE" | "ID_OUT_OF_RANGE"
>;

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

export const createCanFrame = (arbitrationId: number, data: ArrayLike<number>): CanFrame => ({
  arbitrationId,
  data: Buffer.from(Array.from(data)),
});

/**
 * Wire layout: `uint32 LE id | uint8 length | 8 bytes payload`. The payload is
 * left-justified and zero padded; bytes past `length` carry no meaning.
 */
export const encodeCanFrame = (frame: CanFrame) => {
  const length = frame.data.length;
  if (length > CAN_MAX_DATA_LEN) {
    throw new ProtocolError(ErrorCodes.PAYLOAD_TOO_LARGE, "CAN payload too large.");
  }
  if (
    !Number.isInteger(frame.arbitrationId) ||
    frame.arbitrationId < 0 ||
    frame.arbitrationId > MAX_ARBITRATION_ID
  ) {
    throw new ProtocolError(ErrorCodes.ID_OUT_OF_RANGE, "CAN arbitration id out of range.");
  }
  const payload = Buffer.alloc(CAN_FRAME_WIRE_LEN);
  payload.writeUInt32LE(frame.arbitrationId >>> 0, ID_OFFSET);
  payload.writeUInt8(length, LENGTH_OFFSET);
  frame.data.copy(payload, PAYLOAD_OFFSET);
  return payload;
};

export const decodeCanFrame = (payload: Buffer): CanFrameDecoded => {
  if (payload.length !== CAN_FRAME_WIRE_LEN) {
    throw new ProtocolError(
      ErrorCodes.MALFORMED_FRAME,
      `CAN frame must be ${CAN_FRAME_WIRE_LEN} bytes, got ${payload.length}.`
    );
  }
  const arbitrationId = payload.readUInt32LE(ID_OFFSET);
  const length = payload.readUInt8(LENGTH_OFFSET);
  if (length > CAN_MAX_DATA_LEN) {
    throw new ProtocolError(ErrorCodes.MALFORMED_FRAME, `CAN length ${length} out of range.`);
  }
  // Copy so the frame does not pin the socket's receive buffer.
  const data = Buffer.from(payload.subarray(PAYLOAD_OFFSET, PAYLOAD_OFFSET + length));
  return {
    arbitrationId,
    length,
    data,
    dataHex: data.toString("hex"),
  };
};

export const formatCanFrame = (frame: CanFrame) => {
  const id = frame.arbitrationId.toString(16).toUpperCase().padStart(3, "0");
  const bytes = Array.from(frame.data, (byte) => byte.toString(16).toUpperCase().padStart(2, "0"));
  return `${id} [${frame.data.length}] ${bytes.join(" ")}`.trimEnd();
};
