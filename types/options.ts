export type OptionType = 'call' | 'put';

export type OptionPricingModel = 'blackScholes';

export type PositionSide = 'long' | 'short';

export type ScenarioMetric = 'pnl' | 'price' | 'pctPnl';

export type OptionParameters = {
  spotPrice: number;
  strikePrice: number;
  timeToExpiration: number; // in years
  riskFreeRate: number; // annualized, as decimal (e.g., 0.05)
  volatility: number; // annualized, as decimal (e.g., 0.2)
  optionType: OptionType;
};

export type PricingGreekSet = {
  delta: number;
  gamma: number;
  theta: number; // per calendar day
  vega: number; // per 1 vol point
  rho: number; // per 1 rate point
};

export type PricingMetadata = {
  label: string;
  computationTimeMs: number;
  warnings?: string[];
  parameters?: Record<string, number | string>;
};

export type OptionPricingResult = {
  model: OptionPricingModel;
  price: number;
  breakevenPrice: number;
  greeks: PricingGreekSet;
  metadata: PricingMetadata;
};

export type PercentRange = [low: number, high: number];

export type GridConfig = {
  spotRangePct: PercentRange;
  volRangePct: PercentRange;
  resolution: number;
  position: PositionSide;
  metric: ScenarioMetric;
};

/** Matrices are indexed `[volatilityIndex][spotIndex]`. */
export type ScenarioGrid = {
  spotPrices: number[];
  volatilities: number[];
  price: number[][];
  pnl: number[][];
  pctPnl: number[][];
  anchorPrice: number;
  position: PositionSide;
};

export type ScenarioPoint = {
  spot: number;
  volatility: number;
};

export type BreakevenPoint = ScenarioPoint;

export type ScenarioSummary = {
  maxProfit: number;
  maxLoss: number;
  profitProbability: number; // percent of grid cells with P&L > 0
  mean: number;
  stdDev: number;
  riskRewardRatio: number;
};

export type SensitivityCurve = {
  label: string;
  x: number[];
  prices: number[];
  reference: number;
};

export type MoneynessLine = {
  label: 'ATM' | '10% OTM' | '10% ITM';
  spot: number;
};

export type HeatmapLegend = {
  title: string;
  midpoint?: number;
};

export type OptionPricingRequestPayload = OptionParameters;

export type OptionPricingResponsePayload = {
  parameters: OptionParameters;
  result: OptionPricingResult;
};

export type OptionScenarioRequestPayload = OptionParameters & {
  grid?: Partial<GridConfig>;
};

export type OptionScenarioResponsePayload = {
  parameters: OptionParameters;
  gridConfig: GridConfig;
  pricing: OptionPricingResult;
  grid: ScenarioGrid;
  activeMatrix: number[][];
  legend: HeatmapLegend;
  title: string;
  breakevens: BreakevenPoint[];
  summary: ScenarioSummary;
  currentPnl: number;
  currentPoint: ScenarioPoint;
  moneyness: MoneynessLine[];
  sensitivity: {
    spot: SensitivityCurve;
    volatility: SensitivityCurve;
  };
};
