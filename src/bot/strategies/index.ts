import { createOscillatorStrategy, type OscillatorSettings } from "./oscillator.js";
import { createPriorityStrategy, type PrioritySettings } from "./priority.js";
import { createModelAssistedStrategy, type ModelAssistedSettings } from "./model_assisted.js";
import type { StrategyKind, TradingStrategy } from "./types.js";

export type StrategySettings = {
  kind: StrategyKind;
  oscillator?: Partial<OscillatorSettings>;
  priority?: Partial<PrioritySettings>;
  model?: Partial<ModelAssistedSettings>;
};

export function createStrategy(settings: StrategySettings): TradingStrategy {
  switch (settings.kind) {
    case "oscillator":
      return createOscillatorStrategy(settings.oscillator);
    case "priority":
      return createPriorityStrategy(settings.priority);
    case "model":
      return createModelAssistedStrategy(settings.model);
  }
}

export * from "./types.js";
export { createOscillatorStrategy, DEFAULT_OSCILLATOR_SETTINGS } from "./oscillator.js";
export { createPriorityStrategy, DEFAULT_PRIORITY_SETTINGS } from "./priority.js";
export { createModelAssistedStrategy, DEFAULT_MODEL_SETTINGS } from "./model_assisted.js";
