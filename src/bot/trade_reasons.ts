export const TRADE_REASONS = {
  // Buy reasons
  BUY_OVERSOLD: 'oversold_buy',
  BUY_OVERSOLD_CROSS: 'oversold_cross_buy',
  BUY_PRIORITY_SOURCE: 'priority_source_buy',
  BUY_WHITELIST: 'whitelist_buy',
  BUY_MODEL: 'model_buy',

  // Sell reasons - strategy
  SELL_OVERBOUGHT: 'overbought_exit',
  SELL_BEARISH_DIVERGENCE: 'bearish_divergence_exit',
  SELL_NEUTRAL_CROSS: 'neutral_cross_exit',
  SELL_MODEL: 'model_exit',

  // Sell reasons - protective layers
  SELL_RUG_PULL: 'rug_pull_exit',
  SELL_HARD_STOP: 'hard_stop_exit',
  SELL_TRAILING_STOP: 'trailing_stop_exit',
  SELL_TIMEOUT: 'timeout_exit',
  SELL_PRICE_UNAVAILABLE: 'price_unavailable_exit',
  SELL_MANUAL: 'manual_exit',

  UNKNOWN: 'unknown',
} as const;

export type TradeReason = typeof TRADE_REASONS[keyof typeof TRADE_REASONS];
