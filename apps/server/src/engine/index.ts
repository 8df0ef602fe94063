export {
  TradingEngine,
  createTradingEngine,
  type EngineSnapshot,
  type MarketRequest,
  type SubmitResult,
  type TradeRequest,
  type TradingEngineOptions,
} from "./tradingEngine";
export {
  ManualPriceFeed,
  PaperOrderExecutor,
  type FillResult,
  type OrderExecutor,
  type OrderRequest,
  type PriceFeed,
  type SignalProvider,
  type VolatilityProvider,
} from "./collaborators";
export { SerialQueue } from "./serialQueue";
export { PatternMemory, canonicalPattern } from "../patterns/patternMemory";
export { TradeGate, type TradeGateConfig } from "../gate/tradeGate";
export { RiskEngine, type RiskConfig } from "../risk/riskEngine";
export { PositionLedger, type OpenPositionInput, type OpenResult } from "../portfolio/positionLedger";
export { createEngineBus, EngineEventBus, type EngineEventMap } from "../events/engineBus";
export { loadEngineConfig, resolveEngineConfig, type EngineConfig } from "../config/engine";
export { ConfigError, EngineError, OrderPlacementError, OrderTimeoutError } from "../errors";
