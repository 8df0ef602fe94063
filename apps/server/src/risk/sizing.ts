export interface SizingConfig {
  /** Fraction of capital a full-strength, calm, unexposed trade starts from. */
  baseFraction: number;
  /** Hard cap on a single position, as a fraction of capital. */
  maxPositionSize: number;
  /** Cap on total committed capital, as a fraction of capital. */
  maxTotalRisk: number;
  /** Smallest tradable size step in quote currency. */
  sizeIncrement: number;
  /** Scale size by min(1.2, winRate) once a win rate exists. */
  winRateScaling: boolean;
}

export const DEFAULT_SIZING_CONFIG: SizingConfig = {
  baseFraction: 0.01,
  maxPositionSize: 0.02,
  maxTotalRisk: 0.05,
  sizeIncrement: 0.00001,
  winRateScaling: false,
};

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Round down to a multiple of `increment`.
 * The epsilon absorbs binary noise such as 127.39999999999999 / 0.00001.
 */
export function floorToIncrement(value: number, increment: number): number {
  if (!(increment > 0) || !Number.isFinite(value)) return 0;
  const steps = Math.floor(value / increment + 1e-6);
  const decimals = Math.max(0, Math.ceil(-Math.log10(increment)));
  return Number((steps * increment).toFixed(decimals));
}

/**
 * Position size in quote currency.
 *
 * base × (0.5 + |strength|) × volatility dampener [0.5, 1] × exposure dampener [0, 1],
 * capped at capital × maxPositionSize and rounded down to the size increment.
 * Invalid input yields 0, which callers treat as "insufficient size".
 */
export function sizePosition(
  capital: number,
  signalStrength: number,
  volatility: number,
  currentExposure: number,
  config: SizingConfig = DEFAULT_SIZING_CONFIG,
  winRate: number | null = null,
): number {
  if (
    !Number.isFinite(capital) ||
    !Number.isFinite(signalStrength) ||
    !Number.isFinite(volatility) ||
    !Number.isFinite(currentExposure) ||
    capital <= 0 ||
    Math.abs(signalStrength) > 1 ||
    volatility < 0 ||
    currentExposure < 0 ||
    !(config.maxTotalRisk > 0)
  ) {
    return 0;
  }

  const base = capital * config.baseFraction;
  const signalMultiplier = 0.5 + Math.abs(signalStrength);
  const volatilityMultiplier = clamp(1 - volatility * 2, 0.5, 1.0);
  const exposureMultiplier = clamp(1 - currentExposure / config.maxTotalRisk, 0, 1.0);
  const winRateMultiplier =
    config.winRateScaling && winRate !== null && winRate > 0 ? Math.min(1.2, winRate) : 1.0;

  const raw = base * signalMultiplier * volatilityMultiplier * exposureMultiplier * winRateMultiplier;
  const capped = Math.min(raw, capital * config.maxPositionSize);

  return floorToIncrement(capped, config.sizeIncrement);
}
