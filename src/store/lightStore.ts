import type { LightRecord, LightTable } from "../types.js";
import type { LightReadings } from "../engine/electrical.js";

export const LIGHT_COUNT = 4;

function initialRecord(index: number): LightRecord {
  return { id: index + 1, relay_state: "OFF", voltage: 0, current: 0, lux: 0 };
}

/**
 * The live table of light records. One instance per controller process (or per test).
 *
 * Writers go through `withLock`. Engine operations are synchronous, so a locked
 * section always runs to completion before another handler can touch the table.
 */
export class LightStore {
  private readonly records: LightTable;
  private locked = false;

  constructor(count = LIGHT_COUNT) {
    this.records = Array.from({ length: count }, (_, i) => initialRecord(i));
  }

  get size(): number {
    return this.records.length;
  }

  snapshot(): LightTable {
    return structuredClone(this.records);
  }

  get(index: number): LightRecord {
    const record = this.records[index];
    if (!record) throw new RangeError(`No light at index ${index}`);
    return structuredClone(record);
  }

  withLock<T>(fn: (writer: LightStoreWriter) => T): T {
    if (this.locked) {
      throw new Error("LightStore is already locked by another writer");
    }
    this.locked = true;
    try {
      return fn({ write: (index, readings) => this.write(index, readings) });
    } finally {
      this.locked = false;
    }
  }

  private write(index: number, readings: LightReadings): LightRecord {
    const record = this.records[index];
    if (!record) throw new RangeError(`No light at index ${index}`);
    record.relay_state = readings.relay_state;
    record.voltage = readings.voltage;
    record.current = readings.current;
    record.lux = readings.lux;
    return structuredClone(record);
  }
}

export interface LightStoreWriter {
  write(index: number, readings: LightReadings): LightRecord;
}
