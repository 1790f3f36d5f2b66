import { loadConfig } from "../src/config.js";
import { createController, describeTable } from "../src/controller.js";
import { computeStats } from "../src/engine/stats.js";
import { logger } from "../src/utils/logger.js";

const cfg = loadConfig();
const { adapter, engine } = createController(cfg);

adapter.open();
try {
  const table = engine.reconcileAll();
  const stats = computeStats(table, { currentWarningThresholdA: cfg.CURRENT_WARNING_THRESHOLD_A });
  logger.info({ lights: describeTable(table), stats }, "Ran one reconcile pass");
} finally {
  adapter.close();
}
