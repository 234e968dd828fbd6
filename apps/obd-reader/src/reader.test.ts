import { afterEach, describe, expect, it, vi } from "vitest";
import {
  VirtualBus,
  connectBridge,
  createCanFrame,
  type BusEndpoint,
  type CanFrame,
  type FrameLink,
} from "@ecu-sim/protocol";
import { createLogger } from "@ecu-sim/shared";
import { createEcuSimulator, type EcuSimulator } from "@ecu-sim/ecu-simulator";
import { ObdReader } from "./reader";

const logger = createLogger("test");

const reply = (...bytes: number[]) => createCanFrame(0x7e8, bytes);

/** Fake ECU on the bus answering each request with `answer(request)`. */
const fakeEcu = (ecu: BusEndpoint, answer: (request: CanFrame) => CanFrame[]) => {
  const requests: CanFrame[] = [];
  ecu.onFrame((request) => {
    requests.push(request);
    for (const frame of answer(request)) {
      void ecu.send(frame);
    }
  });
  return requests;
};

describe("ObdReader", () => {
  let reader: ObdReader | null = null;

  afterEach(() => {
    reader?.close();
    reader = null;
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  const setup = (timeoutMs = 200, maxPending?: number) => {
    const bus = new VirtualBus();
    const ecu = bus.attach("fake-ecu");
    const created = new ObdReader({ link: bus.attach("reader"), timeoutMs, maxPending, logger });
    reader = created;
    return { ecu, reader: created };
  };

  it("sends a functional request and decodes RPM", async () => {
    const { ecu, reader } = setup();
    const requests = fakeEcu(ecu, () => [reply(0x04, 0x41, 0x0c, 0x1a, 0xf8)]);

    expect(await reader.readRpm()).toBe(1726);
    expect(requests).toHaveLength(1);
    expect(requests[0].arbitrationId).toBe(0x7df);
    expect(Array.from(requests[0].data)).toEqual([0x02, 0x01, 0x0c, 0, 0, 0, 0, 0]);
  });

  it("claims only the matching response and keeps the rest in order", async () => {
    const { ecu, reader } = setup();
    fakeEcu(ecu, () => [reply(0x03, 0x41, 0x0d, 50), reply(0x04, 0x41, 0x0c, 0x0f, 0xa0)]);

    expect(await reader.readRpm()).toBe(1000);
    expect(reader.pendingResponses).toBe(1);

    expect(await reader.readSpeed()).toBe(50);
    expect(reader.pendingResponses).toBe(2);
  });

  it("returns null exactly at the timeout for an unsupported PID", async () => {
    vi.useFakeTimers();
    const { reader } = setup(1000);
    let settled = false;

    const pending = reader.query(0x01, 0x99).then((frame) => {
      settled = true;
      return frame;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(settled).toBe(true);
    expect(await pending).toBeNull();
  });

  it("runs concurrent queries one at a time", async () => {
    const { ecu, reader } = setup();
    const seen: number[] = [];
    ecu.onFrame((request) => {
      const pid = request.data[2];
      seen.push(pid);
      const value = pid === 0x0c ? [0x1a, 0xf8] : [77];
      setTimeout(() => {
        void ecu.send(reply(2 + value.length, 0x41, pid, ...value));
      }, 5);
    });

    const [rpm, speed] = await Promise.all([reader.readRpm(), reader.readSpeed()]);

    expect(rpm).toBe(1726);
    expect(speed).toBe(77);
    expect(seen).toEqual([0x0c, 0x0d]);
  });

  it("drops the oldest unclaimed response past the bound", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { ecu, reader } = setup(200, 2);

    await ecu.send(reply(0x03, 0x41, 0x0d, 1));
    await ecu.send(reply(0x03, 0x41, 0x0d, 2));
    await ecu.send(reply(0x03, 0x41, 0x0d, 3));

    expect(reader.pendingResponses).toBe(2);
    expect(warn).toHaveBeenCalledWith("[test] response queue full, dropped 7E8 [4] 03 41 0D 01");
    expect(await reader.readSpeed()).toBe(2);
  });

  it("parses reported trouble codes", async () => {
    const { ecu, reader } = setup();
    const requests = fakeEcu(ecu, () => [reply(0x05, 0x43, 0x03, 0x00, 0x04, 0x20, 0, 0)]);

    expect(await reader.readDtcs()).toEqual(["P0300", "P0420"]);
    expect(Array.from(requests[0].data)).toEqual([0x01, 0x03, 0, 0, 0, 0, 0, 0]);
  });

  it("reports no data when the ECU stays silent", async () => {
    const { reader } = setup(20);

    expect(await reader.readDtcs()).toBeNull();
    expect(await reader.clearDtcs()).toBe(false);
    expect(await reader.readCoolantTemp()).toBeNull();
  });

  it("acknowledges a clear", async () => {
    const { ecu, reader } = setup();
    fakeEcu(ecu, () => [reply(0x01, 0x44, 0, 0, 0, 0, 0, 0)]);

    expect(await reader.clearDtcs()).toBe(true);
  });

  it("lists supported PIDs from the bitmap", async () => {
    const { ecu, reader } = setup();
    fakeEcu(ecu, () => [reply(0x06, 0x41, 0x00, 0xbf, 0xdf, 0xb9, 0x91)]);

    expect(await reader.readSupportedPids()).toEqual([
      1, 3, 4, 5, 6, 7, 8, 9, 10, 12, 13, 14, 15, 16, 17, 19, 20, 21, 24, 25, 28, 32,
    ]);
  });

  it("returns null when the request cannot be sent", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const link: FrameLink = {
      send: () => Promise.reject(new Error("link down")),
      onFrame: () => () => undefined,
      close: () => undefined,
    };
    reader = new ObdReader({ link, logger });

    expect(await reader.readRpm()).toBeNull();
    expect(warn).toHaveBeenCalledWith("[test] request not sent: link down");
  });
});

describe("ObdReader against the simulator", () => {
  let simulator: EcuSimulator | null = null;
  let reader: ObdReader | null = null;

  afterEach(async () => {
    reader?.close();
    reader = null;
    await simulator?.stop();
    simulator = null;
    vi.restoreAllMocks();
  });

  const boot = async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const sim = createEcuSimulator({
      host: "127.0.0.1",
      port: 0,
      pollIntervalMs: 5,
      generator: false,
      random: () => 0,
      logger,
    });
    simulator = sim;
    const address = await sim.start();
    const link = await connectBridge({ host: "127.0.0.1", port: address.port, logger });
    const created = new ObdReader({ link, logger });
    reader = created;
    return { sim, reader: created };
  };

  it("reads every live parameter over the TCP bridge", async () => {
    const { reader } = await boot();

    expect(await reader.readRpm()).toBe(1152);
    expect(await reader.readSpeed()).toBe(40);
    expect(await reader.readCoolantTemp()).toBe(88);
    expect(await reader.readThrottle()).toBeCloseTo(7.84, 2);
    expect(await reader.readEngineLoad()).toBeCloseTo(12.55, 2);
    expect(await reader.readIntakeTemp()).toBe(20);
    expect(await reader.readMaf()).toBe(2.5);
    expect(await reader.readIntakePressure()).toBe(10);
    expect(await reader.readBarometricPressure()).toBe(20);
  });

  it("reads and clears trouble codes", async () => {
    const { sim, reader } = await boot();
    sim.store.insertIfAbsent([0x04, 0x20]);
    sim.store.insertIfAbsent([0x01, 0x71]);

    expect(await reader.readDtcs()).toEqual(["P0420", "P0171"]);
    expect(await reader.clearDtcs()).toBe(true);
    expect(await reader.readDtcs()).toEqual([]);
  });
});
