import { linspace } from './math';
import { price } from './optionPricing';
import type {
  GridConfig,
  OptionParameters,
  PositionSide,
  ScenarioGrid,
  ScenarioMetric,
} from '@/types/options';

export const MIN_SCENARIO_VOLATILITY = 0.01;

export const spotAxis = (
  spotPrice: number,
  [low, high]: GridConfig['spotRangePct'],
  resolution: number
): number[] => linspace(spotPrice * (1 + low / 100), spotPrice * (1 + high / 100), resolution);

// The floor keeps sigma positive however far below -100% the low end is set.
export const volatilityAxis = (
  volatility: number,
  [low, high]: GridConfig['volRangePct'],
  resolution: number
): number[] =>
  linspace(
    Math.max(MIN_SCENARIO_VOLATILITY, volatility * (1 + low / 100)),
    volatility * (1 + high / 100),
    resolution
  );

const positionPnl = (position: PositionSide, scenarioPrice: number, anchorPrice: number) =>
  position === 'long' ? scenarioPrice - anchorPrice : anchorPrice - scenarioPrice;

// A zero anchor has no meaningful return; those cells read as 0%.
const percentPnl = (pnl: number, anchorPrice: number) =>
  anchorPrice === 0 ? 0 : (pnl / anchorPrice) * 100;

/**
 * Revalues the option over every (volatility, spot) pair of the configured
 * ranges and derives P&L against `anchorPrice`, which defaults to the option's
 * value at the unshocked parameters.
 */
export const buildGrid = (
  params: OptionParameters,
  config: Pick<GridConfig, 'spotRangePct' | 'volRangePct' | 'resolution' | 'position'>,
  anchorPrice: number = price(params)
): ScenarioGrid => {
  const spotPrices = spotAxis(params.spotPrice, config.spotRangePct, config.resolution);
  const volatilities = volatilityAxis(params.volatility, config.volRangePct, config.resolution);

  const priceMatrix: number[][] = [];
  const pnlMatrix: number[][] = [];
  const pctPnlMatrix: number[][] = [];

  for (const volatility of volatilities) {
    const priceRow: number[] = [];
    const pnlRow: number[] = [];
    const pctRow: number[] = [];
    for (const spotPrice of spotPrices) {
      const scenarioPrice = price({ ...params, spotPrice, volatility });
      const pnl = positionPnl(config.position, scenarioPrice, anchorPrice);
      priceRow.push(scenarioPrice);
      pnlRow.push(pnl);
      pctRow.push(percentPnl(pnl, anchorPrice));
    }
    priceMatrix.push(priceRow);
    pnlMatrix.push(pnlRow);
    pctPnlMatrix.push(pctRow);
  }

  return {
    spotPrices,
    volatilities,
    price: priceMatrix,
    pnl: pnlMatrix,
    pctPnl: pctPnlMatrix,
    anchorPrice,
    position: config.position,
  };
};

export const selectMetricMatrix = (grid: ScenarioGrid, metric: ScenarioMetric): number[][] => {
  switch (metric) {
    case 'pnl':
      return grid.pnl;
    case 'price':
      return grid.price;
    case 'pctPnl':
      return grid.pctPnl;
    default:
      throw new Error(`Unsupported scenario metric: ${metric satisfies never}`);
  }
};
