import { describe, expect, it } from "vitest";
import { createCanFrame } from "./can";
import {
  OBD_REQUEST_ID,
  OBD_RESPONSE_ID,
  ObdService,
  PID_DECODERS,
  Pid,
  buildClearResponse,
  buildCurrentDataResponse,
  buildDtcReport,
  buildObdRequest,
  decodePidResponse,
  decodeSupportedPids,
  matchesResponse,
  parseDtcReport,
} from "./obd";

const bytes = (frame: { data: Buffer }) => Array.from(frame.data);

describe("OBD-II requests", () => {
  it("builds a current-data request with service and PID", () => {
    const frame = buildObdRequest(ObdService.CURRENT_DATA, Pid.RPM);
    expect(frame.arbitrationId).toBe(OBD_REQUEST_ID);
    expect(bytes(frame)).toEqual([0x02, 0x01, 0x0c, 0, 0, 0, 0, 0]);
  });

  it("builds a read-codes request with the service alone", () => {
    expect(bytes(buildObdRequest(ObdService.READ_DTCS))).toEqual([0x01, 0x03, 0, 0, 0, 0, 0, 0]);
    expect(bytes(buildObdRequest(ObdService.CLEAR_DTCS))).toEqual([0x01, 0x04, 0, 0, 0, 0, 0, 0]);
  });
});

describe("OBD-II responses", () => {
  it("counts the bytes after byte 0 in current-data responses", () => {
    const frame = buildCurrentDataResponse(Pid.RPM, [0x1a, 0xf8]);
    expect(frame.arbitrationId).toBe(OBD_RESPONSE_ID);
    expect(bytes(frame)).toEqual([0x04, 0x41, 0x0c, 0x1a, 0xf8]);
  });

  it("reports zero codes with a count byte of one", () => {
    expect(bytes(buildDtcReport([]))).toEqual([0x01, 0x43, 0, 0, 0, 0, 0, 0]);
  });

  it("reports a single code", () => {
    expect(bytes(buildDtcReport([[0x03, 0x00]]))).toEqual([0x03, 0x43, 0x03, 0x00, 0, 0, 0, 0]);
  });

  it("keeps only the first three of five codes", () => {
    const frame = buildDtcReport([
      [0x01, 0x33],
      [0x01, 0x71],
      [0x03, 0x01],
      [0x04, 0x20],
      [0x05, 0x62],
    ]);
    expect(bytes(frame)).toEqual([0x07, 0x43, 0x01, 0x33, 0x01, 0x71, 0x03, 0x01]);
  });

  it("builds the clear acknowledgement", () => {
    expect(bytes(buildClearResponse())).toEqual([0x01, 0x44, 0, 0, 0, 0, 0, 0]);
  });

  it("matches on response id, service and PID", () => {
    const rpm = buildCurrentDataResponse(Pid.RPM, [0x20, 0x00]);
    expect(matchesResponse(rpm, ObdService.CURRENT_DATA, Pid.RPM)).toBe(true);
    expect(matchesResponse(rpm, ObdService.CURRENT_DATA, Pid.SPEED)).toBe(false);
    expect(matchesResponse(rpm, ObdService.READ_DTCS)).toBe(false);
    expect(matchesResponse(createCanFrame(0x7e9, rpm.data), ObdService.CURRENT_DATA, Pid.RPM)).toBe(
      false
    );
    expect(matchesResponse(createCanFrame(OBD_RESPONSE_ID, [0x01]), ObdService.CLEAR_DTCS)).toBe(
      false
    );
  });

  it("parses codes bounded by the count byte", () => {
    const frame = createCanFrame(OBD_RESPONSE_ID, [0x05, 0x43, 0x03, 0x01, 0x00, 0x33, 0x04, 0x20]);
    expect(parseDtcReport(frame)).toEqual([
      [0x03, 0x01],
      [0x00, 0x33],
    ]);
  });

  it("skips empty pairs", () => {
    const frame = createCanFrame(OBD_RESPONSE_ID, [0x05, 0x43, 0x00, 0x00, 0x04, 0x40, 0, 0]);
    expect(parseDtcReport(frame)).toEqual([[0x04, 0x40]]);
  });
});

describe("PID decoding", () => {
  it("decodes RPM as ((A*256)+B)/4", () => {
    const frame = buildCurrentDataResponse(Pid.RPM, [18, 255]);
    expect(decodePidResponse(frame, PID_DECODERS.RPM)).toBe((18 * 256 + 255) / 4);
    expect(decodePidResponse(buildCurrentDataResponse(Pid.RPM, [70, 0]), PID_DECODERS.RPM)).toBe(
      4480
    );
  });

  it("decodes temperatures as A-40", () => {
    const coolant = buildCurrentDataResponse(Pid.COOLANT_TEMP, [130]);
    const intake = buildCurrentDataResponse(Pid.INTAKE_AIR_TEMP, [60]);
    expect(decodePidResponse(coolant, PID_DECODERS.COOLANT_TEMP)).toBe(90);
    expect(decodePidResponse(intake, PID_DECODERS.INTAKE_AIR_TEMP)).toBe(20);
  });

  it("decodes throttle and load as A*100/255", () => {
    const throttle = buildCurrentDataResponse(Pid.THROTTLE, [51]);
    const load = buildCurrentDataResponse(Pid.ENGINE_LOAD, [255]);
    expect(decodePidResponse(throttle, PID_DECODERS.THROTTLE)).toBe(20);
    expect(decodePidResponse(load, PID_DECODERS.ENGINE_LOAD)).toBe(100);
  });

  it("decodes MAF flow in grams per second", () => {
    const maf = buildCurrentDataResponse(Pid.MAF_FLOW, [0x00, 0xfa]);
    expect(decodePidResponse(maf, PID_DECODERS.MAF_FLOW)).toBe(2.5);
  });

  it("returns null for a short or mismatched frame", () => {
    const short = createCanFrame(OBD_RESPONSE_ID, [0x03, 0x41, 0x0c, 0x10]);
    expect(decodePidResponse(short, PID_DECODERS.RPM)).toBeNull();
    const other = buildCurrentDataResponse(Pid.SPEED, [50]);
    expect(decodePidResponse(other, PID_DECODERS.RPM)).toBeNull();
  });

  it("expands the supported-PID bitmap", () => {
    expect(decodeSupportedPids(Buffer.from([0x80, 0x00, 0x00, 0x01]))).toEqual([0x01, 0x20]);
    expect(decodeSupportedPids(Buffer.from([0x18, 0x00, 0x00, 0x00]))).toEqual([0x04, 0x05]);
  });
});
