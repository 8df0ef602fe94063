import type { Side, StopLevels } from "@shared/types/trading";

/** Target distance per unit of stop distance. Fixed policy, not fitted. */
export const REWARD_TO_RISK = 2;
export const EMERGENCY_STOP_MULTIPLIER = 1.5;
export const ATR_STOP_MULTIPLIER = 2;
export const TRAILING_STEP_FRACTION = 0.5;

export function sideSign(side: Side): 1 | -1 {
  return side === "long" ? 1 : -1;
}

/**
 * ATR-based protective levels.
 * Stop sits 2 ATR (widened by volatility) against the trade, the target twice
 * that distance in favour, the emergency stop 1.5× beyond entry.
 * Returns null when the inputs cannot produce meaningful levels.
 */
export function computeStops(
  entryPrice: number,
  side: Side,
  atr: number,
  volatility: number,
): StopLevels | null {
  if (
    !Number.isFinite(entryPrice) ||
    !Number.isFinite(atr) ||
    !Number.isFinite(volatility) ||
    entryPrice <= 0 ||
    atr <= 0 ||
    volatility < 0
  ) {
    return null;
  }

  const baseStop = atr * ATR_STOP_MULTIPLIER;
  const adjusted = baseStop * (1 + volatility);
  const sign = sideSign(side);

  return {
    stopLoss: entryPrice - sign * adjusted,
    emergencyStop: entryPrice - sign * adjusted * EMERGENCY_STOP_MULTIPLIER,
    takeProfit: entryPrice + sign * adjusted * REWARD_TO_RISK,
    trailingStep: baseStop * TRAILING_STEP_FRACTION,
  };
}
