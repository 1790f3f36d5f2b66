import { InvalidInputError } from "../errors.js";
import type { LightIoAdapter } from "../adapters/lightIo.js";
import type { LightStore, LightStoreWriter } from "../store/lightStore.js";
import type { LightRecord, LightTable, ManualAction, RandomSource } from "../types.js";
import { logger } from "../utils/logger.js";
import { faultReadings, offReadings, onReadings, type LightReadings } from "./electrical.js";

export interface ReconciliationEngineOptions {
  store: LightStore;
  adapter: LightIoAdapter;
  /** 0-based indexes pinned to fault mode and skipped by automatic control. */
  faultIndexes: readonly number[];
  random?: RandomSource;
}

type ChangeSource = "auto" | "manual";
type ChangeReason = "dark detected" | "bright detected" | "sensor fault" | "relay fault" | "web request";

export function parseManualAction(action: unknown): ManualAction {
  if (typeof action === "string") {
    const normalized = action.toLowerCase();
    if (normalized === "on" || normalized === "off") return normalized;
  }
  throw new InvalidInputError(`Invalid action: ${String(action)}. Must be "on" or "off".`);
}

export class ReconciliationEngine {
  private readonly store: LightStore;
  private readonly adapter: LightIoAdapter;
  private readonly faultIndexes: ReadonlySet<number>;
  private readonly random: RandomSource;

  constructor(opts: ReconciliationEngineOptions) {
    this.store = opts.store;
    this.adapter = opts.adapter;
    this.faultIndexes = new Set(opts.faultIndexes);
    this.random = opts.random ?? Math.random;
  }

  get lightCount(): number {
    return this.store.size;
  }

  isFaultLight(index: number): boolean {
    return this.faultIndexes.has(index);
  }

  /** One automatic pass over every light, in index order. */
  reconcileAll(): LightTable {
    return this.store.withLock((writer) => {
      for (let index = 0; index < this.store.size; index++) {
        if (this.isFaultLight(index)) {
          writer.write(index, faultReadings());
          continue;
        }

        const ambient = this.adapter.readAmbient(index);
        if (ambient.fault) {
          const off = this.adapter.setRelay(index, false);
          if (!off.ok) {
            logger.warn(
              { err: off.error, light: index + 1, source: "auto" },
              "Relay OFF failed for light with sensor fault"
            );
          }
          this.commit(writer, index, faultReadings(), "auto", "sensor fault");
          continue;
        }
        this.drive(writer, index, ambient.dark, "auto");
      }
      return this.store.snapshot();
    });
  }

  /**
   * Direct ON/OFF for one light (id 1..N), bypassing ambient sensing for this call only.
   * Not sticky: the next reconcileAll() decides again from the sensors.
   */
  setManual(lightId: number, action: string): LightRecord {
    if (!Number.isInteger(lightId) || lightId < 1 || lightId > this.store.size) {
      throw new InvalidInputError(`Invalid light_id: ${lightId}. Must be 1-${this.store.size}.`);
    }
    const on = parseManualAction(action) === "on";
    const index = lightId - 1;

    return this.store.withLock((writer) => this.drive(writer, index, on, "manual"));
  }

  private drive(writer: LightStoreWriter, index: number, on: boolean, source: ChangeSource): LightRecord {
    const result = this.adapter.setRelay(index, on);
    if (!result.ok) {
      logger.warn({ err: result.error, light: index + 1, source }, "Relay command failed, marking light as faulted");
      return this.commit(writer, index, faultReadings(), source, "relay fault");
    }
    const { luxProfile } = this.adapter;
    const readings = on ? onReadings(luxProfile.dark, this.random) : offReadings(luxProfile.bright, this.random);
    const reason: ChangeReason = source === "manual" ? "web request" : on ? "dark detected" : "bright detected";
    return this.commit(writer, index, readings, source, reason);
  }

  private commit(
    writer: LightStoreWriter,
    index: number,
    readings: LightReadings,
    source: ChangeSource,
    reason: ChangeReason
  ): LightRecord {
    const before = this.store.get(index).relay_state;
    const record = writer.write(index, readings);
    // Manual commands are always logged; automatic passes only on a transition.
    if (source === "manual" || before !== record.relay_state) {
      logger.info(
        { light: record.id, relay_state: record.relay_state, lux: record.lux, source },
        `Light ${record.id} turned ${record.relay_state} (${reason})`
      );
    }
    return record;
  }
}
