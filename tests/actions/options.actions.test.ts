import { afterEach, describe, expect, it, vi } from 'vitest';

import { analyzeOptionScenario, priceOptionContract } from '@/lib/actions/options.actions';
import { greeks, price } from '@/lib/finance/optionPricing';
import { summary } from '@/lib/finance/scenarioAnalytics';
import type { OptionParameters } from '@/types/options';

const params: OptionParameters = {
  spotPrice: 100,
  strikePrice: 100,
  timeToExpiration: 0.25,
  riskFreeRate: 0.05,
  volatility: 0.2,
  optionType: 'call',
};

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('priceOptionContract', () => {
  it('prices the contract with its greeks', async () => {
    const { parameters, result } = await priceOptionContract(params);
    expect(parameters).toEqual(params);
    expect(result.price).toBeCloseTo(4.61499, 4);
    expect(result.greeks).toEqual(greeks(params));
  });

  it('rejects non-positive inputs', async () => {
    await expect(priceOptionContract({ ...params, spotPrice: 0 })).rejects.toThrow(
      'Spot price must be a positive number'
    );
    await expect(priceOptionContract({ ...params, volatility: -0.2 })).rejects.toThrow(
      'Volatility must be a positive number'
    );
    await expect(priceOptionContract({ ...params, riskFreeRate: -0.01 })).rejects.toThrow(
      'Risk-free rate must be zero or positive'
    );
  });
});

describe('analyzeOptionScenario', () => {
  it('fills in the default grid configuration', async () => {
    vi.stubEnv('SCENARIO_DEFAULT_RESOLUTION', '');
    const snapshot = await analyzeOptionScenario(params);
    expect(snapshot.gridConfig).toEqual({
      spotRangePct: [-40, 40],
      volRangePct: [-30, 50],
      resolution: 30,
      position: 'long',
      metric: 'pnl',
    });
    expect(snapshot.grid.pnl).toHaveLength(30);
    expect(snapshot.grid.pnl[0]).toHaveLength(30);
    expect(snapshot.title).toBe('Long Call Option P&L Heatmap');
    expect(snapshot.legend).toEqual({ title: 'P&L ($)', midpoint: 0 });
  });

  it('computes every output from the same parameters', async () => {
    const snapshot = await analyzeOptionScenario({ ...params, grid: { resolution: 15 } });
    expect(snapshot.pricing.price).toBe(price(params));
    expect(snapshot.grid.anchorPrice).toBe(snapshot.pricing.price);
    expect(snapshot.activeMatrix).toBe(snapshot.grid.pnl);
    expect(snapshot.summary).toEqual(summary(snapshot.grid));
    expect(snapshot.currentPnl).toBe(0);
    expect(snapshot.currentPoint).toEqual({ spot: 100, volatility: 0.2 });
    expect(snapshot.moneyness[0]).toEqual({ label: 'ATM', spot: 100 });
    expect(snapshot.sensitivity.spot.reference).toBe(100);
    expect(snapshot.sensitivity.volatility.reference).toBe(0.2);
  });

  it('marks the unshocked point as a breakeven on a symmetric grid', async () => {
    const snapshot = await analyzeOptionScenario({
      ...params,
      grid: { resolution: 15, spotRangePct: [-40, 40], volRangePct: [-30, 30] },
    });
    const atCurrent = snapshot.breakevens.filter(
      (point) => Math.abs(point.spot - 100) < 1e-9 && Math.abs(point.volatility - 0.2) < 1e-9
    );
    expect(atCurrent).toHaveLength(1);
  });

  it('skips breakevens when showing option prices', async () => {
    const snapshot = await analyzeOptionScenario({
      ...params,
      grid: { resolution: 15, volRangePct: [-30, 30], metric: 'price', position: 'short' },
    });
    expect(snapshot.breakevens).toEqual([]);
    expect(snapshot.activeMatrix).toBe(snapshot.grid.price);
    expect(snapshot.legend).toEqual({ title: 'Option Price ($)' });
    expect(snapshot.title).toBe('Short Call Option Option Price Heatmap');
  });

  it('honours the configured sensitivity resolution', async () => {
    vi.stubEnv('SCENARIO_SENSITIVITY_POINTS', '25');
    const snapshot = await analyzeOptionScenario({ ...params, grid: { resolution: 15 } });
    expect(snapshot.sensitivity.spot.x).toHaveLength(25);
    expect(snapshot.sensitivity.volatility.prices).toHaveLength(25);
  });

  it('rejects an invalid grid resolution', async () => {
    await expect(
      analyzeOptionScenario({ ...params, grid: { resolution: 15.5 } })
    ).rejects.toThrow('Grid resolution must be an integer between 15 and 100');
    await expect(
      analyzeOptionScenario({ ...params, grid: { resolution: 101 } })
    ).rejects.toThrow('Grid resolution must be an integer between 15 and 100');
  });

  it('rejects a spot range that reaches zero or below', async () => {
    await expect(
      analyzeOptionScenario({ ...params, grid: { resolution: 15, spotRangePct: [-150, 40] } })
    ).rejects.toThrow('Spot range must start above -100%');
    await expect(
      analyzeOptionScenario({ ...params, grid: { resolution: 15, spotRangePct: [-100, 40] } })
    ).rejects.toThrow('Spot range must start above -100%');
  });

  it('rejects inverted ranges', async () => {
    await expect(
      analyzeOptionScenario({ ...params, grid: { resolution: 15, spotRangePct: [40, -40] } })
    ).rejects.toThrow('Spot range must run from low to high');
    await expect(
      analyzeOptionScenario({ ...params, grid: { resolution: 15, volRangePct: [50, -30] } })
    ).rejects.toThrow('Volatility range must run from low to high');
  });

  it('accepts a volatility range below -100% thanks to the floor', async () => {
    const snapshot = await analyzeOptionScenario({
      ...params,
      grid: { resolution: 15, volRangePct: [-300, 50] },
    });
    expect(snapshot.grid.volatilities[0]).toBe(0.01);
  });
});
