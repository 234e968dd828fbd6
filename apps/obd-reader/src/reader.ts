import {
  ObdService,
  PID_DECODERS,
  Pid,
  buildObdRequest,
  decodePidResponse,
  decodeSupportedPids,
  formatCanFrame,
  formatDtc,
  matchesResponse,
  parseDtcReport,
  pidValueBytes,
  type CanFrame,
  type FrameLink,
  type PidDecoder,
} from "@ecu-sim/protocol";
import { AsyncQueue, createLogger, type Logger } from "@ecu-sim/shared";

export type ObdReaderOptions = {
  link: FrameLink;
  timeoutMs?: number;
  /** Unclaimed responses kept before the oldest is dropped. */
  maxPending?: number;
  logger?: Logger;
};

export const DEFAULT_QUERY_TIMEOUT_MS = 1000;
export const DEFAULT_MAX_PENDING = 64;

/**
 * OBD-II client over any frame link. One query is in flight at a time; a
 * query claims the first response matching its service (and PID) and leaves
 * every other frame queued in arrival order.
 */
export class ObdReader {
  readonly timeoutMs: number;
  private readonly link: FrameLink;
  private readonly responses: AsyncQueue<CanFrame>;
  private readonly log: Logger;
  private readonly unsubscribe: () => void;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(opts: ObdReaderOptions) {
    this.link = opts.link;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.log = opts.logger ?? createLogger("obd-reader");
    this.responses = new AsyncQueue<CanFrame>({
      maxSize: opts.maxPending ?? DEFAULT_MAX_PENDING,
      onDrop: (frame) => this.log.warn(`response queue full, dropped ${formatCanFrame(frame)}`),
    });
    this.unsubscribe = this.link.onFrame((frame) => this.responses.push(frame));
  }

  get pendingResponses() {
    return this.responses.size;
  }

  /** Matching response frame, or null when none arrives within the timeout. */
  query(service: number, pid?: number): Promise<CanFrame | null> {
    const run = () => this.exchange(service, pid);
    const result = this.tail.then(run, run);
    this.tail = result.catch(() => undefined);
    return result;
  }

  private async exchange(service: number, pid?: number) {
    try {
      await this.link.send(buildObdRequest(service, pid));
    } catch (error) {
      this.log.warn(`request not sent: ${(error as Error).message}`);
      return null;
    }
    const response = await this.responses.take(
      (frame) => matchesResponse(frame, service, pid),
      this.timeoutMs
    );
    if (!response) {
      const target = pid === undefined ? "" : ` PID 0x${pid.toString(16).padStart(2, "0")}`;
      this.log.debug(`no response to service 0x${service.toString(16).padStart(2, "0")}${target}`);
    }
    return response;
  }

  async readPid(decoder: PidDecoder) {
    const response = await this.query(ObdService.CURRENT_DATA, decoder.pid);
    return response ? decodePidResponse(response, decoder) : null;
  }

  readRpm() {
    return this.readPid(PID_DECODERS.RPM);
  }

  readSpeed() {
    return this.readPid(PID_DECODERS.SPEED);
  }

  readCoolantTemp() {
    return this.readPid(PID_DECODERS.COOLANT_TEMP);
  }

  readThrottle() {
    return this.readPid(PID_DECODERS.THROTTLE);
  }

  readEngineLoad() {
    return this.readPid(PID_DECODERS.ENGINE_LOAD);
  }

  readIntakeTemp() {
    return this.readPid(PID_DECODERS.INTAKE_AIR_TEMP);
  }

  readMaf() {
    return this.readPid(PID_DECODERS.MAF_FLOW);
  }

  readIntakePressure() {
    return this.readPid(PID_DECODERS.INTAKE_PRESSURE);
  }

  readBarometricPressure() {
    return this.readPid(PID_DECODERS.BAROMETRIC_PRESSURE);
  }

  async readSupportedPids() {
    const response = await this.query(ObdService.CURRENT_DATA, Pid.SUPPORTED_PIDS);
    const bitmap = response ? pidValueBytes(response, 4) : null;
    return bitmap ? decodeSupportedPids(bitmap) : null;
  }

  /** Active codes as text (`P0300`), or null when the ECU does not answer. */
  async readDtcs() {
    const response = await this.query(ObdService.READ_DTCS);
    return response ? parseDtcReport(response).map(formatDtc) : null;
  }

  async clearDtcs() {
    const response = await this.query(ObdService.CLEAR_DTCS);
    return response !== null;
  }

  close() {
    this.unsubscribe();
    this.responses.close();
    this.link.close();
  }
}
