import { z } from 'zod';

import { MAX_GRID_RESOLUTION, MIN_GRID_RESOLUTION } from '@/lib/config';

const rangeSchema = (min: number, max: number) =>
  z
    .tuple([z.number().min(min).max(max), z.number().min(min).max(max)])
    .refine(([low, high]) => low <= high, { message: 'Range low must not exceed range high' });

export const optionParametersSchema = z.object({
  spotPrice: z.number().min(0.01).finite(),
  strikePrice: z.number().min(0.01).finite(),
  timeToExpiration: z.number().min(0.001).max(5),
  riskFreeRate: z.number().min(0).max(0.2),
  volatility: z.number().min(0.001).max(1),
  optionType: z.enum(['call', 'put']),
});

export const gridConfigSchema = z.object({
  spotRangePct: rangeSchema(-80, 80).optional(),
  volRangePct: rangeSchema(-70, 200).optional(),
  resolution: z.number().int().min(MIN_GRID_RESOLUTION).max(MAX_GRID_RESOLUTION).optional(),
  position: z.enum(['long', 'short']).optional(),
  metric: z.enum(['pnl', 'price', 'pctPnl']).optional(),
});

export const scenarioRequestSchema = optionParametersSchema.extend({
  grid: gridConfigSchema.optional(),
});
