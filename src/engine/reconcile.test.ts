import assert from "node:assert/strict";
import { setImmediate as tick } from "node:timers/promises";
import { test } from "node:test";
import { HardwareError, InvalidInputError } from "../errors.js";
import type { AmbientReading, LightIoAdapter, RelayWriteResult } from "../adapters/lightIo.js";
import { SIMULATED_LUX, SimulatedLightAdapter } from "../adapters/simulated.js";
import { LightStore } from "../store/lightStore.js";
import { logger } from "../utils/logger.js";
import type { LightRecord, LightTable } from "../types.js";
import { ReconciliationEngine } from "./reconcile.js";
import { computeStats } from "./stats.js";

const ALWAYS_DARK = () => 0.1;
const ALWAYS_BRIGHT = () => 0.9;
const MID = () => 0.5;

function setup(params: { adapter?: LightIoAdapter; random?: () => number } = {}) {
  const store = new LightStore();
  const adapter = params.adapter ?? new SimulatedLightAdapter({ random: ALWAYS_DARK });
  const engine = new ReconciliationEngine({ store, adapter, faultIndexes: [2], random: params.random ?? MID });
  return { store, adapter, engine };
}

function assertCoupled(light: LightRecord) {
  if (light.relay_state === "ON") {
    assert.ok(light.voltage > 0 && light.current > 0, `light ${light.id} ON without load: ${JSON.stringify(light)}`);
  } else {
    assert.equal(light.voltage, 0, `light ${light.id} OFF with voltage`);
    assert.equal(light.current, 0, `light ${light.id} OFF with current`);
  }
}

class ScriptedAdapter implements LightIoAdapter {
  readonly kind = "simulated" as const;
  readonly luxProfile = SIMULATED_LUX;
  readonly relayCalls: Array<[number, boolean]> = [];

  constructor(
    private readonly readings: AmbientReading[],
    private readonly failingRelays: ReadonlySet<number> = new Set()
  ) {}

  open(): void {}
  close(): void {}

  readAmbient(lightIndex: number): AmbientReading {
    return this.readings[lightIndex] ?? { dark: false, fault: true };
  }

  setRelay(lightIndex: number, on: boolean): RelayWriteResult {
    this.relayCalls.push([lightIndex, on]);
    if (this.failingRelays.has(lightIndex)) {
      return { ok: false, error: new HardwareError("stuck relay", { lightIndex, operation: "write" }) };
    }
    return { ok: true };
  }
}

test("dark readings switch non-fault lights ON with sampled load", () => {
  const { engine, adapter } = setup();
  const table = engine.reconcileAll();

  assert.deepEqual(table, [
    { id: 1, relay_state: "ON", voltage: 12, current: 1.2, lux: 25 },
    { id: 2, relay_state: "ON", voltage: 12, current: 1.2, lux: 25 },
    { id: 3, relay_state: "OFF", voltage: 0, current: 0, lux: -1 },
    { id: 4, relay_state: "ON", voltage: 12, current: 1.2, lux: 25 }
  ]);
  assert.ok(adapter instanceof SimulatedLightAdapter);
  assert.deepEqual(adapter.relayStates(), [true, true, false, true]);
});

test("bright readings switch non-fault lights OFF with high lux", () => {
  const { engine } = setup({ adapter: new SimulatedLightAdapter({ random: ALWAYS_BRIGHT }) });
  const table = engine.reconcileAll();

  assert.deepEqual(table[0], { id: 1, relay_state: "OFF", voltage: 0, current: 0, lux: 500 });
  assert.deepEqual(table[3], { id: 4, relay_state: "OFF", voltage: 0, current: 0, lux: 500 });
  assert.deepEqual(table[2], { id: 3, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
});

test("fault light is never driven by automatic control", () => {
  const adapter = new ScriptedAdapter([
    { dark: true, fault: false },
    { dark: true, fault: false },
    { dark: true, fault: false },
    { dark: true, fault: false }
  ]);
  const { engine } = setup({ adapter });
  engine.reconcileAll();

  assert.deepEqual(
    adapter.relayCalls.map(([index]) => index),
    [0, 1, 3]
  );
});

test("fault light is restored after a manual command on the next pass", () => {
  const { engine, store } = setup();
  const manual = engine.setManual(3, "on");
  assert.equal(manual.relay_state, "ON");
  assert.equal(manual.voltage, 12);
  assert.equal(store.get(2).relay_state, "ON");

  engine.reconcileAll();
  assert.deepEqual(store.get(2), { id: 3, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
});

test("manual command is case-insensitive and shows up in stats", () => {
  const { engine, store } = setup({ random: Math.random });
  const light = engine.setManual(1, "ON");

  assert.equal(light.relay_state, "ON");
  assert.ok(light.voltage >= 11.5 && light.voltage <= 12.5);
  assert.ok(light.current >= 1.0 && light.current <= 1.4);

  const stats = computeStats(store.snapshot());
  assert.equal(stats.total_voltage, 12.0);
  assert.equal(stats.lights_on, 1);
  assert.equal(stats.total_current, Number(light.current.toFixed(1)));
});

test("manual OFF zeroes the load", () => {
  const { engine } = setup();
  engine.reconcileAll();
  const light = engine.setManual(2, "Off");

  assert.deepEqual(light, { id: 2, relay_state: "OFF", voltage: 0, current: 0, lux: 500 });
});

test("invalid manual input is rejected and leaves the table untouched", () => {
  const { engine, store } = setup();
  engine.reconcileAll();
  const before: LightTable = store.snapshot();

  assert.throws(() => engine.setManual(5, "on"), InvalidInputError);
  assert.throws(() => engine.setManual(0, "on"), InvalidInputError);
  assert.throws(() => engine.setManual(1.5, "on"), InvalidInputError);
  assert.throws(() => engine.setManual(1, "xyz"), {
    name: "InvalidInputError",
    message: 'Invalid action: xyz. Must be "on" or "off".'
  });
  assert.throws(() => engine.setManual(5, "on"), { message: "Invalid light_id: 5. Must be 1-4." });

  assert.deepEqual(store.snapshot(), before);
});

test("manual overrides are not sticky", () => {
  const { engine, store } = setup({ adapter: new SimulatedLightAdapter({ random: ALWAYS_BRIGHT }) });
  engine.setManual(1, "on");
  assert.equal(store.get(0).relay_state, "ON");

  engine.reconcileAll();
  assert.equal(store.get(0).relay_state, "OFF");
});

test("sensor fault turns the light OFF and marks lux as unmeasured", () => {
  const adapter = new ScriptedAdapter([
    { dark: true, fault: false },
    { dark: false, fault: true },
    { dark: true, fault: false },
    { dark: false, fault: false }
  ]);
  const { engine } = setup({ adapter });
  const table = engine.reconcileAll();

  assert.deepEqual(table[1], { id: 2, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
  assert.deepEqual(adapter.relayCalls, [
    [0, true],
    [1, false],
    [3, false]
  ]);
  assert.equal(table[0]?.relay_state, "ON");
  assert.equal(table[3]?.relay_state, "OFF");
});

test("failed OFF command on a faulted sensor is logged", (t) => {
  const warn = t.mock.method(logger, "warn", (..._args: unknown[]) => undefined);
  const adapter = new ScriptedAdapter(
    [
      { dark: true, fault: false },
      { dark: false, fault: true },
      { dark: true, fault: false },
      { dark: true, fault: false }
    ],
    new Set([1])
  );
  const { engine } = setup({ adapter });
  const table = engine.reconcileAll();

  assert.deepEqual(table[1], { id: 2, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
  const messages = warn.mock.calls.map((call) => call.arguments[1]);
  assert.deepEqual(messages, ["Relay OFF failed for light with sensor fault"]);
});

test("failed relay writes degrade the light to fault values", () => {
  const adapter = new ScriptedAdapter(
    [
      { dark: true, fault: false },
      { dark: true, fault: false },
      { dark: true, fault: false },
      { dark: true, fault: false }
    ],
    new Set([0])
  );
  const { engine } = setup({ adapter });

  const table = engine.reconcileAll();
  assert.deepEqual(table[0], { id: 1, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
  assert.equal(table[1]?.relay_state, "ON");

  const manual = engine.setManual(1, "on");
  assert.deepEqual(manual, { id: 1, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
});

test("repeated passes with the same ambient reading give the same relay states", () => {
  const adapter = new ScriptedAdapter([
    { dark: true, fault: false },
    { dark: false, fault: false },
    { dark: true, fault: false },
    { dark: true, fault: false }
  ]);
  const { engine } = setup({ adapter, random: Math.random });

  const first = engine.reconcileAll();
  const second = engine.reconcileAll();

  for (let i = 0; i < first.length; i++) {
    assert.equal(second[i]?.relay_state, first[i]?.relay_state);
    assert.equal(second[i]?.voltage === 0, first[i]?.voltage === 0);
    assert.equal(second[i]?.current === 0, first[i]?.current === 0);
  }
});

test("relay state and load stay coupled across random passes", () => {
  const { engine } = setup({ adapter: new SimulatedLightAdapter(), random: Math.random });
  for (let pass = 0; pass < 200; pass++) {
    const table = engine.reconcileAll();
    table.forEach(assertCoupled);
    assert.deepEqual(table[2], { id: 3, relay_state: "OFF", voltage: 0, current: 0, lux: -1 });
  }
});

test("interleaved manual and automatic updates never expose a torn record", async () => {
  const { engine, store } = setup({ adapter: new SimulatedLightAdapter(), random: Math.random });

  const worker = async (seed: number) => {
    for (let step = 0; step < 50; step++) {
      await tick();
      if ((seed + step) % 3 === 0) {
        engine.reconcileAll();
      } else {
        engine.setManual(((seed + step) % 4) + 1, step % 2 === 0 ? "on" : "off");
      }
      store.snapshot().forEach(assertCoupled);
    }
  };

  await Promise.all([0, 1, 2, 3, 4].map(worker));
  store.snapshot().forEach(assertCoupled);
});

test("store rejects a nested writer", () => {
  const store = new LightStore();
  assert.throws(
    () => store.withLock(() => store.withLock(() => undefined)),
    { message: "LightStore is already locked by another writer" }
  );
  // lock is released after the failed attempt
  assert.equal(
    store.withLock(() => "ok"),
    "ok"
  );
});
