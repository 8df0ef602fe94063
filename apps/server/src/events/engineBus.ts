import { EventEmitter } from "events";
import type {
  PatternRecord,
  Position,
  RiskMetrics,
  TradeDecision,
  TradeRecord,
} from "@shared/types/trading";

export interface DayRolledEvent {
  previousDay: string;
  tradingDay: string;
}

export type EngineEventMap = {
  "decision:evaluated": TradeDecision;
  "position:opened": Position;
  "position:updated": Position;
  "position:closed": TradeRecord;
  "pattern:updated": PatternRecord;
  "risk:updated": RiskMetrics;
  "risk:dayRolled": DayRolledEvent;
};

export class EngineEventBus extends EventEmitter {
  emit<K extends keyof EngineEventMap>(event: K, data: EngineEventMap[K]): boolean {
    return super.emit(event, data);
  }

  on<K extends keyof EngineEventMap>(event: K, listener: (data: EngineEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  once<K extends keyof EngineEventMap>(event: K, listener: (data: EngineEventMap[K]) => void): this {
    return super.once(event, listener);
  }

  off<K extends keyof EngineEventMap>(event: K, listener: (data: EngineEventMap[K]) => void): this {
    return super.off(event, listener);
  }
}

export function createEngineBus(): EngineEventBus {
  const bus = new EngineEventBus();
  bus.setMaxListeners(100);
  return bus;
}
