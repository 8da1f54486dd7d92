import { readFile } from "node:fs/promises";

import { parse } from "dotenv";
import { z } from "zod";

import {
  TimeframeSchema,
  assertValid,
  strategyKeys,
  type StrategyKey,
  type Timeframe,
} from "@perpsignal/sdk";

import type { CombineMode } from "./types.js";

export interface BotConfig {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  readonly candleLimit: number;
  readonly combineMode: CombineMode;
  readonly fundingThreshold: number;
  readonly orderQuantity: number;
  /** Where chart documents are written; charts are skipped when unset. */
  readonly chartDir?: string;
  /** Strategies the bot builds and activates. */
  readonly strategies: ReadonlyArray<StrategyKey>;
  readonly pollIntervalMs: number;
  /** Wait after a failed cycle before retrying. */
  readonly retryDelayMs: number;
  readonly exchange: {
    readonly apiKey?: string;
    readonly secret?: string;
    readonly sandbox: boolean;
  };
}

const StrategyListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  )
  .pipe(z.array(z.enum(strategyKeys)).min(1));

const FlagSchema = z.enum(["true", "false"]).transform((value) => value === "true");

const BotEnvSchema = z
  .object({
    BOT_SYMBOL: z.string().min(1).default("BTC/USDT"),
    BOT_TIMEFRAME: TimeframeSchema.default("1h"),
    BOT_CANDLE_LIMIT: z.coerce.number().int().positive().default(100),
    BOT_COMBINE_MODE: z.enum(["majority", "consensus", "any"]).default("majority"),
    FUNDING_THRESHOLD: z.coerce.number().finite().default(0.001),
    BOT_ORDER_QUANTITY: z.coerce.number().positive().default(0.001),
    BOT_CHART_DIR: z.string().min(1).optional(),
    BOT_STRATEGIES: StrategyListSchema.default(strategyKeys.join(",")),
    BOT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
    BOT_RETRY_DELAY_MS: z.coerce.number().int().positive().default(10_000),
    EXCHANGE_API_KEY: z.string().optional(),
    EXCHANGE_SECRET: z.string().optional(),
    EXCHANGE_SANDBOX: FlagSchema.default("true"),
  })
  .transform(
    (env): BotConfig => ({
      symbol: env.BOT_SYMBOL,
      timeframe: env.BOT_TIMEFRAME,
      candleLimit: env.BOT_CANDLE_LIMIT,
      combineMode: env.BOT_COMBINE_MODE,
      fundingThreshold: env.FUNDING_THRESHOLD,
      orderQuantity: env.BOT_ORDER_QUANTITY,
      ...(env.BOT_CHART_DIR === undefined ? {} : { chartDir: env.BOT_CHART_DIR }),
      strategies: env.BOT_STRATEGIES,
      pollIntervalMs: env.BOT_POLL_INTERVAL_MS,
      retryDelayMs: env.BOT_RETRY_DELAY_MS,
      exchange: {
        ...(env.EXCHANGE_API_KEY === undefined ? {} : { apiKey: env.EXCHANGE_API_KEY }),
        ...(env.EXCHANGE_SECRET === undefined ? {} : { secret: env.EXCHANGE_SECRET }),
        sandbox: env.EXCHANGE_SANDBOX,
      },
    }),
  );

// `KEY=` in a .env file means unset, not an empty value to coerce.
const dropBlankValues = (env: unknown): unknown =>
  env !== null && typeof env === "object"
    ? Object.fromEntries(
        Object.entries(env).filter(
          ([, value]) => value !== undefined && !(typeof value === "string" && value.trim() === ""),
        ),
      )
    : env;

const BotConfigSchema = z.preprocess(dropBlankValues, BotEnvSchema);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Parses a dotenv file. A missing file yields no variables.
 */
export const readEnvFile = async (path: string): Promise<Record<string, string>> => {
  try {
    return parse(await readFile(path, "utf-8"));
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
};

export interface LoadBotConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly envFile?: string;
}

/**
 * Resolves bot settings from the environment. Variables already present in
 * `env` win over the ones in `envFile`, as with dotenv's default loading.
 *
 * @throws Error when a variable holds an invalid value.
 */
export const loadBotConfig = async (options: LoadBotConfigOptions = {}): Promise<BotConfig> => {
  const fileEnv = options.envFile === undefined ? {} : await readEnvFile(options.envFile);
  const env = { ...fileEnv, ...(options.env ?? process.env) };
  return assertValid(BotConfigSchema, env, "bot config");
};
