export { TradingBot, DEFAULT_CANDLE_LIMIT, DEFAULT_ORDER_QUANTITY, type TradingBotOptions } from "./bot.js";
export { loadBotConfig, readEnvFile, type BotConfig, type LoadBotConfigOptions } from "./config.js";
export { BotLoop, type BotLoopOptions } from "./loop.js";
export { createBotSession, runCycle, type BotSession, type CycleResult } from "./run.js";
export type { CombineMode, MarketExchange, StrategyRun } from "./types.js";
