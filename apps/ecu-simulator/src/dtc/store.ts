import { dtcEquals, isEmptyDtc, type Dtc } from "@ecu-sim/protocol";

/**
 * Active trouble codes in insertion order, without duplicates. Every method
 * runs to completion without yielding, so a snapshot always sees the set
 * either before or after any given mutation.
 */
export class DtcStore {
  private codes: Dtc[] = [];

  get size() {
    return this.codes.length;
  }

  snapshot(): Dtc[] {
    return this.codes.map(([high, low]): Dtc => [high, low]);
  }

  has(code: Dtc) {
    return this.codes.some((existing) => dtcEquals(existing, code));
  }

  insertIfAbsent(code: Dtc) {
    if (isEmptyDtc(code) || this.has(code)) {
      return false;
    }
    this.codes.push([code[0], code[1]]);
    return true;
  }

  remove(code: Dtc) {
    const idx = this.codes.findIndex((existing) => dtcEquals(existing, code));
    if (idx < 0) {
      return false;
    }
    this.codes.splice(idx, 1);
    return true;
  }

  removeAt(index: number): Dtc | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.codes.length) {
      return null;
    }
    const [removed] = this.codes.splice(index, 1);
    return removed;
  }

  /** Empties the set and returns how many codes were dropped. */
  clear() {
    const count = this.codes.length;
    this.codes = [];
    return count;
  }
}
