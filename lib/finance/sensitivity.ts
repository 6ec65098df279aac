import { linspace } from './math';
import { price } from './optionPricing';
import type {
  HeatmapLegend,
  MoneynessLine,
  OptionParameters,
  PositionSide,
  ScenarioMetric,
  SensitivityCurve,
} from '@/types/options';

export const DEFAULT_SENSITIVITY_POINTS = 100;

const SPOT_SWEEP: [number, number] = [0.7, 1.3];
const VOLATILITY_SWEEP: [number, number] = [0.05, 1.0];

const METRIC_LABELS: Record<ScenarioMetric, string> = {
  pnl: 'P&L',
  price: 'Option Price',
  pctPnl: '% P&L',
};

/** Option value against spot, volatility held at the current level. */
export const spotSensitivity = (
  params: OptionParameters,
  points = DEFAULT_SENSITIVITY_POINTS
): SensitivityCurve => {
  const x = linspace(params.spotPrice * SPOT_SWEEP[0], params.spotPrice * SPOT_SWEEP[1], points);
  return {
    label: 'Price vs Stock Price',
    x,
    prices: x.map((spotPrice) => price({ ...params, spotPrice })),
    reference: params.spotPrice,
  };
};

/** Option value against volatility, spot held at the current level. */
export const volatilitySensitivity = (
  params: OptionParameters,
  points = DEFAULT_SENSITIVITY_POINTS
): SensitivityCurve => {
  const x = linspace(VOLATILITY_SWEEP[0], VOLATILITY_SWEEP[1], points);
  return {
    label: 'Price vs Volatility',
    x,
    prices: x.map((volatility) => price({ ...params, volatility })),
    reference: params.volatility,
  };
};

/** Strike plus the 10% in/out-of-the-money levels, which swap sides for puts. */
export const moneynessLines = ({ strikePrice, optionType }: OptionParameters): MoneynessLine[] => {
  const below = strikePrice * 0.9;
  const above = strikePrice * 1.1;
  return [
    { label: 'ATM', spot: strikePrice },
    { label: '10% OTM', spot: optionType === 'call' ? below : above },
    { label: '10% ITM', spot: optionType === 'call' ? above : below },
  ];
};

export const heatmapLegend = (metric: ScenarioMetric): HeatmapLegend => {
  switch (metric) {
    case 'pnl':
      return { title: 'P&L ($)', midpoint: 0 };
    case 'price':
      return { title: 'Option Price ($)' };
    case 'pctPnl':
      return { title: 'P&L (%)', midpoint: 0 };
    default:
      throw new Error(`Unsupported scenario metric: ${metric satisfies never}`);
  }
};

const capitalize = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

export const heatmapTitle = (
  position: PositionSide,
  { optionType }: OptionParameters,
  metric: ScenarioMetric
) => `${capitalize(position)} ${capitalize(optionType)} Option ${METRIC_LABELS[metric]} Heatmap`;
