import { loadConfig } from "./config.js";
import { createController, describeTable } from "./controller.js";
import { computeStats } from "./engine/stats.js";
import { startServer } from "./server.js";
import { logger } from "./utils/logger.js";

const cfg = loadConfig();
const { adapter, engine, lightsConfig } = createController(cfg);

try {
  adapter.open();
} catch (e) {
  logger.fatal({ err: e }, "Light I/O setup failed");
  adapter.close();
  process.exit(1);
}

const server = startServer({
  port: cfg.PORT,
  engine,
  adapterKind: adapter.kind,
  apiToken: cfg.API_TOKEN,
  currentWarningThresholdA: cfg.CURRENT_WARNING_THRESHOLD_A,
  timezone: cfg.TIMEZONE
});

function samplePass() {
  try {
    const table = engine.reconcileAll();
    const stats = computeStats(table, { currentWarningThresholdA: cfg.CURRENT_WARNING_THRESHOLD_A });
    logger.debug({ lights: describeTable(table), stats }, "Status update");
  } catch (e) {
    logger.error({ err: e }, "Sample pass crashed");
  }
}

let sampler: NodeJS.Timeout | null = null;
if (cfg.SAMPLE_INTERVAL_SECONDS > 0) {
  samplePass();
  sampler = setInterval(samplePass, cfg.SAMPLE_INTERVAL_SECONDS * 1000);
}

logger.info(
  {
    controller: lightsConfig.controller.id,
    adapter: adapter.kind,
    relay_pins: lightsConfig.lights.map((l) => l.relayPin),
    ldr_pins: lightsConfig.lights.map((l) => l.ldrPin),
    fault_lights: lightsConfig.faultLightIds,
    sample_interval_s: cfg.SAMPLE_INTERVAL_SECONDS
  },
  "Starting street light controller"
);

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutdown signal received, turning all lights off");
  if (sampler) clearInterval(sampler);
  server.close((err) => {
    if (err) logger.warn({ err }, "HTTP server close reported an error");
    adapter.close();
    process.exit(0);
  });
  server.closeAllConnections();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
