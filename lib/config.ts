import { z } from 'zod';

export type ScenarioSettings = {
  breakevenTolerance: number;
  defaultResolution: number;
  sensitivityPoints: number;
};

export const MIN_GRID_RESOLUTION = 15;
export const MAX_GRID_RESOLUTION = 100;

const DEFAULT_SETTINGS: ScenarioSettings = {
  breakevenTolerance: 0.01,
  defaultResolution: 30,
  sensitivityPoints: 100,
};

const readSetting = <T>(name: string, schema: z.ZodType<T>, fallback: T): T => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`Invalid ${name}="${raw}", falling back to ${String(fallback)}`);
    return fallback;
  }
  return parsed.data;
};

/** Read on every call so a changed environment is picked up without a restart. */
export const getScenarioSettings = (): ScenarioSettings => ({
  breakevenTolerance: readSetting(
    'SCENARIO_BREAKEVEN_TOLERANCE',
    z.coerce.number().positive().finite(),
    DEFAULT_SETTINGS.breakevenTolerance
  ),
  defaultResolution: readSetting(
    'SCENARIO_DEFAULT_RESOLUTION',
    z.coerce.number().int().min(MIN_GRID_RESOLUTION).max(MAX_GRID_RESOLUTION),
    DEFAULT_SETTINGS.defaultResolution
  ),
  sensitivityPoints: readSetting(
    'SCENARIO_SENSITIVITY_POINTS',
    z.coerce.number().int().min(10).max(500),
    DEFAULT_SETTINGS.sensitivityPoints
  ),
});
