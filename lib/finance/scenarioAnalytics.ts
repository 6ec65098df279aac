import { selectMetricMatrix } from './scenarioGrid';
import type {
  BreakevenPoint,
  ScenarioGrid,
  ScenarioMetric,
  ScenarioSummary,
} from '@/types/options';

export const DEFAULT_BREAKEVEN_TOLERANCE = 0.01;

/**
 * Grid cells whose P&L is within `tolerance` currency units of zero, in
 * row-major order (volatility, then spot).
 *
 * This samples the grid rather than solving for the zero contour: a coarse
 * grid can miss the breakeven entirely, and a flat P&L surface can report
 * many neighbouring cells.
 */
export const breakevenPoints = (
  grid: ScenarioGrid,
  tolerance: number = DEFAULT_BREAKEVEN_TOLERANCE
): BreakevenPoint[] => {
  const points: BreakevenPoint[] = [];
  grid.pnl.forEach((row, i) => {
    row.forEach((pnl, j) => {
      if (Math.abs(pnl) < tolerance) {
        points.push({ spot: grid.spotPrices[j], volatility: grid.volatilities[i] });
      }
    });
  });
  return points;
};

export const summary = (grid: ScenarioGrid, metric: ScenarioMetric = 'pnl'): ScenarioSummary => {
  const values = selectMetricMatrix(grid, metric).flat();
  if (values.length === 0) {
    throw new Error('Cannot summarize an empty scenario grid');
  }

  const mean = values.reduce((acc, val) => acc + val, 0) / values.length;
  // population variance, not sample
  const variance = values.reduce((acc, val) => acc + (val - mean) ** 2, 0) / values.length;
  const stdDev = Math.sqrt(variance);
  const profitable = values.filter((val) => val > 0).length;

  return {
    maxProfit: Math.max(...values),
    maxLoss: Math.min(...values),
    profitProbability: (profitable / values.length) * 100,
    mean,
    stdDev,
    riskRewardRatio: stdDev > 0 ? mean / stdDev : 0,
  };
};
