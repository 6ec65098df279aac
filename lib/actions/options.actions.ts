'use server';

import {
  MAX_GRID_RESOLUTION,
  MIN_GRID_RESOLUTION,
  getScenarioSettings,
  type ScenarioSettings,
} from '@/lib/config';
import { priceOption } from '@/lib/finance/optionPricing';
import { breakevenPoints, summary } from '@/lib/finance/scenarioAnalytics';
import { buildGrid, selectMetricMatrix } from '@/lib/finance/scenarioGrid';
import {
  heatmapLegend,
  heatmapTitle,
  moneynessLines,
  spotSensitivity,
  volatilitySensitivity,
} from '@/lib/finance/sensitivity';
import type {
  GridConfig,
  OptionParameters,
  PercentRange,
  OptionPricingRequestPayload,
  OptionPricingResponsePayload,
  OptionScenarioRequestPayload,
  OptionScenarioResponsePayload,
} from '@/types/options';

const ensurePositive = (value: number, label: string) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${label} must be a positive number`);
  }
  return value;
};

// Copies the inputs so every result below is computed from one snapshot.
const toParameters = (payload: OptionParameters): OptionParameters => {
  const { optionType, riskFreeRate } = payload;
  if (optionType !== 'call' && optionType !== 'put') {
    throw new Error(`Unsupported option type: ${String(optionType)}`);
  }
  if (!Number.isFinite(riskFreeRate) || riskFreeRate < 0) {
    throw new Error('Risk-free rate must be zero or positive');
  }
  return Object.freeze({
    spotPrice: ensurePositive(payload.spotPrice, 'Spot price'),
    strikePrice: ensurePositive(payload.strikePrice, 'Strike price'),
    timeToExpiration: ensurePositive(payload.timeToExpiration, 'Time to expiration'),
    riskFreeRate,
    volatility: ensurePositive(payload.volatility, 'Volatility'),
    optionType,
  });
};

const ensureRange = ([low, high]: PercentRange, label: string, floor: number) => {
  if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
    throw new Error(`${label} range must run from low to high`);
  }
  if (low <= floor) {
    throw new Error(`${label} range must start above ${floor}%`);
  }
};

const resolveGridConfig = (
  grid: Partial<GridConfig> | undefined,
  settings: ScenarioSettings
): GridConfig => {
  const config: GridConfig = {
    spotRangePct: grid?.spotRangePct ?? [-40, 40],
    volRangePct: grid?.volRangePct ?? [-30, 50],
    resolution: grid?.resolution ?? settings.defaultResolution,
    position: grid?.position ?? 'long',
    metric: grid?.metric ?? 'pnl',
  };
  const { resolution } = config;
  if (
    !Number.isInteger(resolution) ||
    resolution < MIN_GRID_RESOLUTION ||
    resolution > MAX_GRID_RESOLUTION
  ) {
    throw new Error(
      `Grid resolution must be an integer between ${MIN_GRID_RESOLUTION} and ${MAX_GRID_RESOLUTION}`
    );
  }
  // spot must stay positive; the volatility axis has its own floor
  ensureRange(config.spotRangePct, 'Spot', -100);
  ensureRange(config.volRangePct, 'Volatility', -Infinity);
  return config;
};

export async function priceOptionContract(
  payload: OptionPricingRequestPayload
): Promise<OptionPricingResponsePayload> {
  const parameters = toParameters(payload);
  return {
    parameters,
    result: priceOption(parameters),
  };
}

export async function analyzeOptionScenario(
  payload: OptionScenarioRequestPayload
): Promise<OptionScenarioResponsePayload> {
  const { grid: gridOverrides, ...rest } = payload;
  const parameters = toParameters(rest);
  const settings = getScenarioSettings();
  const gridConfig = resolveGridConfig(gridOverrides, settings);

  const pricing = priceOption(parameters);
  const grid = buildGrid(parameters, gridConfig, pricing.price);
  const showsPnl = gridConfig.metric !== 'price';

  if (pricing.price === 0 && gridConfig.metric === 'pctPnl') {
    console.warn('Option is worth 0 at current parameters; % P&L grid reported as 0');
  }

  return {
    parameters,
    gridConfig,
    pricing,
    grid,
    activeMatrix: selectMetricMatrix(grid, gridConfig.metric),
    legend: heatmapLegend(gridConfig.metric),
    title: heatmapTitle(gridConfig.position, parameters, gridConfig.metric),
    breakevens: showsPnl ? breakevenPoints(grid, settings.breakevenTolerance) : [],
    summary: summary(grid, 'pnl'),
    currentPnl: 0,
    currentPoint: { spot: parameters.spotPrice, volatility: parameters.volatility },
    moneyness: moneynessLines(parameters),
    sensitivity: {
      spot: spotSensitivity(parameters, settings.sensitivityPoints),
      volatility: volatilitySensitivity(parameters, settings.sensitivityPoints),
    },
  };
}
