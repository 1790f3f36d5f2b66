import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { LIGHT_COUNT } from "./store/lightStore.js";

const LightSchema = z.object({
  id: z.number().int().min(1).max(LIGHT_COUNT),
  label: z.string().min(1),
  relayPin: z.number().int().nonnegative(),
  ldrPin: z.number().int().nonnegative()
});

const ControllerSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1)
});

const LightsConfigSchema = z
  .object({
    controller: ControllerSchema,
    lights: z.array(LightSchema).length(LIGHT_COUNT),
    faultLightIds: z.array(z.number().int().min(1).max(LIGHT_COUNT)).default([3])
  })
  .superRefine((cfg, ctx) => {
    cfg.lights.forEach((light, idx) => {
      if (light.id !== idx + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["lights", idx, "id"],
          message: `lights must be listed in id order; expected id ${idx + 1}, got ${light.id}`
        });
      }
    });
    const pins = cfg.lights.flatMap((l) => [l.relayPin, l.ldrPin]);
    if (new Set(pins).size !== pins.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["lights"], message: "GPIO pins must be unique" });
    }
  });

export type LightsConfig = z.infer<typeof LightsConfigSchema> & { sourcePath: string };
export type LightWiring = LightsConfig["lights"][number];

export function parseLightsConfig(raw: unknown, sourcePath = "<inline>"): LightsConfig {
  try {
    const validated = LightsConfigSchema.parse(raw);
    return { ...validated, sourcePath };
  } catch (e) {
    throw new Error(`Lights config validation error (${sourcePath}): ${errorMessage(e)}`);
  }
}

export function loadLightsConfig(lightsConfigPath: string): LightsConfig {
  const resolvedPath = path.resolve(lightsConfigPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e) {
    throw new Error(`Failed to read lights config at ${resolvedPath}: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Lights config JSON parse error (${resolvedPath}): ${errorMessage(e)}`);
  }

  return parseLightsConfig(parsed, resolvedPath);
}

export function faultIndexes(cfg: Pick<LightsConfig, "faultLightIds">): number[] {
  return cfg.faultLightIds.map((id) => id - 1);
}
