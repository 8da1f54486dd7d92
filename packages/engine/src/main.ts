import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { binance } from "ccxt";

import { createLogger } from "@perpsignal/logger";

import { loadBotConfig, type BotConfig } from "./config.js";
import { BotLoop } from "./loop.js";
import { createBotSession } from "./run.js";
import type { MarketExchange } from "./types.js";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");

const logger = createLogger("engine/main");

const createExchange = (config: BotConfig): MarketExchange => {
  const exchange = new binance({
    ...(config.exchange.apiKey === undefined ? {} : { apiKey: config.exchange.apiKey }),
    ...(config.exchange.secret === undefined ? {} : { secret: config.exchange.secret }),
  });
  if (config.exchange.sandbox) {
    exchange.setSandboxMode(true);
  }
  return exchange;
};

const main = async (): Promise<void> => {
  const config = await loadBotConfig({ envFile: join(REPO_ROOT, ".env") });
  const session = createBotSession(createExchange(config), config, logger);
  const loop = new BotLoop(session, config);

  const shutdown = async (): Promise<void> => {
    await loop.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  logger.info("Trading bot initialised", {
    symbol: config.symbol,
    timeframe: config.timeframe,
    strategies: config.strategies,
    sandbox: config.exchange.sandbox,
  });
  loop.start();
};

void main().catch((error) => {
  logger.error("Trading bot initialisation failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
