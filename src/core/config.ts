import { z } from 'zod';
import { PREDICTOR_KINDS, type PredictorKind } from '../processing/predictors.js';

/**
 * Runtime settings, read from environment variables.
 *
 *   PORT           web server port (default 3005)
 *   KPI_PREDICTOR  linear | smoothing | none (default linear)
 *   KPI_TOP_N      movers per list (default 5)
 *   KPI_SHEET      workbook sheet to read (default: first sheet)
 */

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
  KPI_PREDICTOR: z.enum(PREDICTOR_KINDS).default('linear'),
  KPI_TOP_N: z.coerce.number().int().min(1).max(100).default(5),
  KPI_SHEET: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  predictor: PredictorKind;
  topN: number;
  sheet: string | undefined;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse({
    PORT: env.PORT || undefined,
    KPI_PREDICTOR: env.KPI_PREDICTOR || undefined,
    KPI_TOP_N: env.KPI_TOP_N || undefined,
    KPI_SHEET: env.KPI_SHEET || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const c = parsed.data;
  return { port: c.PORT, predictor: c.KPI_PREDICTOR, topN: c.KPI_TOP_N, sheet: c.KPI_SHEET };
}
