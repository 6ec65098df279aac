import { normCdf, normPdf } from './math';
import type {
  OptionParameters,
  OptionPricingResult,
  PricingGreekSet,
} from '@/types/options';

export type D1D2 = {
  d1: number;
  d2: number;
};

/**
 * Standardized Black-Scholes variables shared by {@link price} and
 * {@link greeks}, so a price and its Greeks never disagree on d1/d2.
 *
 * No guarding: S, K, T and sigma must be strictly positive.
 */
export const computeD1D2 = ({
  spotPrice,
  strikePrice,
  timeToExpiration,
  riskFreeRate,
  volatility,
}: OptionParameters): D1D2 => {
  const volSqrtT = volatility * Math.sqrt(timeToExpiration);
  const d1 =
    (Math.log(spotPrice / strikePrice) +
      (riskFreeRate + 0.5 * volatility * volatility) * timeToExpiration) /
    volSqrtT;
  return { d1, d2: d1 - volSqrtT };
};

const priceFromD1D2 = (params: OptionParameters, { d1, d2 }: D1D2): number => {
  const { spotPrice, strikePrice, timeToExpiration, riskFreeRate, optionType } = params;
  const discountedStrike = strikePrice * Math.exp(-riskFreeRate * timeToExpiration);

  return optionType === 'call'
    ? spotPrice * normCdf(d1) - discountedStrike * normCdf(d2)
    : discountedStrike * normCdf(-d2) - spotPrice * normCdf(-d1);
};

const greeksFromD1D2 = (params: OptionParameters, { d1, d2 }: D1D2): PricingGreekSet => {
  const { spotPrice, strikePrice, timeToExpiration, riskFreeRate, volatility, optionType } =
    params;
  const sqrtT = Math.sqrt(timeToExpiration);
  const pdfD1 = normPdf(d1);
  const discountedStrike = strikePrice * Math.exp(-riskFreeRate * timeToExpiration);
  const decay = (-spotPrice * pdfD1 * volatility) / (2 * sqrtT);

  return {
    delta: optionType === 'call' ? normCdf(d1) : normCdf(d1) - 1,
    gamma: pdfD1 / (spotPrice * volatility * sqrtT),
    theta:
      (optionType === 'call'
        ? decay - riskFreeRate * discountedStrike * normCdf(d2)
        : decay + riskFreeRate * discountedStrike * normCdf(-d2)) / 365,
    vega: (spotPrice * pdfD1 * sqrtT) / 100,
    rho:
      (optionType === 'call'
        ? timeToExpiration * discountedStrike * normCdf(d2)
        : -timeToExpiration * discountedStrike * normCdf(-d2)) / 100,
  };
};

/** Closed-form European option value. */
export const price = (params: OptionParameters): number =>
  priceFromD1D2(params, computeD1D2(params));

/**
 * Analytic sensitivities. Theta is per calendar day, vega and rho per
 * percentage point.
 */
export const greeks = (params: OptionParameters): PricingGreekSet =>
  greeksFromD1D2(params, computeD1D2(params));

export const priceOption = (params: OptionParameters): OptionPricingResult => {
  const start = performance.now();
  const d = computeD1D2(params);
  const fairValue = priceFromD1D2(params, d);

  const breakeven =
    params.optionType === 'call'
      ? params.strikePrice + fairValue
      : params.strikePrice - fairValue;

  return {
    model: 'blackScholes',
    price: fairValue,
    breakevenPrice: breakeven,
    greeks: greeksFromD1D2(params, d),
    metadata: {
      label: 'Black-Scholes',
      computationTimeMs: performance.now() - start,
      parameters: {
        d1: d.d1,
        d2: d.d2,
      },
    },
  };
};
