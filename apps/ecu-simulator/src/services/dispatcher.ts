import {
  OBD_REQUEST_ID,
  ObdService,
  buildClearResponse,
  buildCurrentDataResponse,
  buildDtcReport,
  formatCanFrame,
  type CanFrame,
} from "@ecu-sim/protocol";
import { createLogger, type Logger } from "@ecu-sim/shared";
import type { DtcStore } from "../dtc/store";
import type { RandomSource } from "../random";
import { PID_RESPONDERS } from "./pids";

export type ServiceDispatcherOptions = {
  store: DtcStore;
  random?: RandomSource;
  logger?: Logger;
};

export type ServiceDispatcher = {
  /** Response for a request frame, or null when the ECU stays silent. */
  handle: (frame: CanFrame) => CanFrame | null;
};

const hex = (value: number) => `0x${value.toString(16).padStart(2, "0")}`;

export const createServiceDispatcher = (opts: ServiceDispatcherOptions): ServiceDispatcher => {
  const store = opts.store;
  const random = opts.random ?? Math.random;
  const log = opts.logger ?? createLogger("dispatcher");

  const currentData = (frame: CanFrame) => {
    if (frame.data.length < 3) {
      log.warn("Service 1 request without a PID");
      return null;
    }
    const pid = frame.data[2];
    const responder = PID_RESPONDERS.get(pid);
    if (!responder) {
      log.warn(`Service 1, unknown PID ${hex(pid)}`);
      return null;
    }
    log.debug(`>> ${responder.label}`);
    return buildCurrentDataResponse(pid, responder.generate(random));
  };

  const readCodes = () => {
    log.debug(">> Service 03: Read DTCs");
    return buildDtcReport(store.snapshot());
  };

  const clearCodes = () => {
    const cleared = store.clear();
    log.debug(`>> Service 04: Clear DTCs (${cleared} cleared)`);
    return buildClearResponse();
  };

  const handle = (frame: CanFrame) => {
    if (frame.arbitrationId !== OBD_REQUEST_ID || frame.data.length < 2) {
      log.warn(`Unknown ID or malformed request: ${formatCanFrame(frame)}`);
      return null;
    }
    const service = frame.data[1];
    switch (service) {
      case ObdService.CURRENT_DATA:
        return currentData(frame);
      case ObdService.READ_DTCS:
        return readCodes();
      case ObdService.CLEAR_DTCS:
        return clearCodes();
      default:
        log.warn(`Unknown service code ${hex(service)}`);
        return null;
    }
  };

  return { handle };
};
