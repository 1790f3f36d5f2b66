import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  API_TOKEN: z.string().min(1),

  LIGHT_ADAPTER: z.enum(["simulated", "gpio"]).default("simulated"),
  LIGHTS_CONFIG_PATH: z.string().default("./config/lights.config.json"),
  GPIO_SYSFS_ROOT: z.string().default("/sys/class/gpio"),

  CURRENT_WARNING_THRESHOLD_A: z.coerce.number().positive().default(6),
  SAMPLE_INTERVAL_SECONDS: z.coerce.number().int().nonnegative().default(0),
  TIMEZONE: z.string().default("UTC")
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}
