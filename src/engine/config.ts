import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_CONFIG } from "./types";
import type { Dimensions, GameConfig } from "./types";

export const DimensionsSchema = z.object({
  height: z.number().int().positive(),
  width: z.number().int().positive(),
});

export const GameConfigSchema = DimensionsSchema.extend({
  mines: z.number().int().nonnegative(),
  seed: z.number().int(),
  debug: z.boolean(),
}).refine((c) => c.mines <= c.height * c.width, {
  message: "cannot place more mines than the board has cells",
  path: ["mines"],
});

function parseWith<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return result.data;
}

// Partial configs are merged over DEFAULT_CONFIG before validation
export function resolveGameConfig(config: Partial<GameConfig> = {}): GameConfig {
  return parseWith(GameConfigSchema, { ...DEFAULT_CONFIG, ...config });
}

export function resolveDimensions(dims: Dimensions): Dimensions {
  return parseWith(DimensionsSchema, dims);
}
