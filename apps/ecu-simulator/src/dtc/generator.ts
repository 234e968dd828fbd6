import { DTC_POOL, formatDtc, type Dtc } from "@ecu-sim/protocol";
import { createLogger, type Logger } from "@ecu-sim/shared";
import { pickOne, randomInt, type RandomSource } from "../random";
import type { DtcStore } from "./store";

export type DtcGeneratorOptions = {
  store: DtcStore;
  pool?: readonly Dtc[];
  random?: RandomSource;
  minIntervalMs?: number;
  maxIntervalMs?: number;
  insertProbability?: number;
  removeProbability?: number;
  maxActive?: number;
  onChange?: (tick: DtcTick) => void;
  logger?: Logger;
};

export type DtcTick = {
  added: Dtc | null;
  removed: Dtc | null;
};

export type DtcGenerator = {
  tick: () => DtcTick;
  start: () => void;
  stop: () => void;
  isRunning: () => boolean;
};

export const createDtcGenerator = (opts: DtcGeneratorOptions): DtcGenerator => {
  const store = opts.store;
  const pool = opts.pool ?? DTC_POOL;
  const random = opts.random ?? Math.random;
  const minIntervalMs = opts.minIntervalMs ?? 5000;
  const maxIntervalMs = Math.max(minIntervalMs, opts.maxIntervalMs ?? 10000);
  const insertProbability = opts.insertProbability ?? 0.7;
  const removeProbability = opts.removeProbability ?? 0.1;
  const maxActive = opts.maxActive ?? 5;
  const log = opts.logger ?? createLogger("dtc-generator");
  let timer: NodeJS.Timeout | null = null;

  const tick = (): DtcTick => {
    let added: Dtc | null = null;
    let removed: Dtc | null = null;

    if (random() < insertProbability && store.size < maxActive) {
      const candidate = pickOne(pool, random);
      if (store.insertIfAbsent(candidate)) {
        added = candidate;
        log.info(`*** NEW DTC: ${formatDtc(candidate)}`);
      }
    }

    if (store.size > 0 && random() < removeProbability) {
      removed = store.removeAt(randomInt(0, store.size - 1, random));
      if (removed) {
        log.info(`*** CLEARED DTC: ${formatDtc(removed)}`);
      }
    }

    if (added || removed) {
      opts.onChange?.({ added, removed });
    }
    return { added, removed };
  };

  const schedule = () => {
    const delay = randomInt(minIntervalMs, maxIntervalMs, random);
    timer = setTimeout(() => {
      tick();
      if (timer) {
        schedule();
      }
    }, delay);
  };

  const start = () => {
    if (timer) {
      return;
    }
    log.info(`started, ticking every ${minIntervalMs}-${maxIntervalMs}ms`);
    schedule();
  };

  const stop = () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  return {
    tick,
    start,
    stop,
    isRunning: () => timer !== null,
  };
};
