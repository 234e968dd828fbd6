export type DashboardReadings = {
  rpm: number | null;
  speed: number | null;
  coolant: number | null;
  throttle: number | null;
  load: number | null;
  intake: number | null;
};

/** The reads the live view needs; `ObdReader` satisfies it. */
export type DashboardSource = {
  readRpm: () => Promise<number | null>;
  readSpeed: () => Promise<number | null>;
  readCoolantTemp: () => Promise<number | null>;
  readThrottle: () => Promise<number | null>;
  readEngineLoad: () => Promise<number | null>;
  readIntakeTemp: () => Promise<number | null>;
};

export const NO_RESPONSE_LINE = "No response from ECU - is the simulator running?";

const fixed = (value: number | null, width: number, digits: number) =>
  value === null ? "-".repeat(Math.min(width, 4)).padStart(width) : value.toFixed(digits).padStart(width);

export const formatDashboardLine = (r: DashboardReadings) =>
  [
    `RPM: ${fixed(r.rpm, 6, 0)}`,
    `Speed: ${fixed(r.speed, 3, 0)} km/h`,
    `Coolant: ${fixed(r.coolant, 3, 0)}°C`,
    `Throttle: ${fixed(r.throttle, 5, 1)}%`,
    `Load: ${fixed(r.load, 5, 1)}%`,
    `Intake: ${fixed(r.intake, 3, 0)}°C`,
  ].join(" | ");

export const readDashboard = async (source: DashboardSource): Promise<DashboardReadings> => ({
  rpm: await source.readRpm(),
  speed: await source.readSpeed(),
  coolant: await source.readCoolantTemp(),
  throttle: await source.readThrottle(),
  load: await source.readEngineLoad(),
  intake: await source.readIntakeTemp(),
});

export const isEcuSilent = (r: DashboardReadings) =>
  r.rpm === null && r.speed === null && r.coolant === null;

const pause = (ms: number, signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });

export type DashboardLoopOptions = {
  signal: AbortSignal;
  write: (line: string) => void;
  intervalMs?: number;
  retryMs?: number;
};

/** Refreshes until `signal` aborts. Returns how many lines were written. */
export const runDashboard = async (source: DashboardSource, opts: DashboardLoopOptions) => {
  const intervalMs = opts.intervalMs ?? 500;
  const retryMs = opts.retryMs ?? 1000;
  let lines = 0;
  while (!opts.signal.aborted) {
    const readings = await readDashboard(source);
    if (opts.signal.aborted) {
      break;
    }
    lines += 1;
    if (isEcuSilent(readings)) {
      opts.write(NO_RESPONSE_LINE);
      await pause(retryMs, opts.signal);
      continue;
    }
    opts.write(formatDashboardLine(readings));
    await pause(intervalMs, opts.signal);
  }
  return lines;
};
