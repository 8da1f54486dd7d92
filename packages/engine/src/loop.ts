import type { BotConfig } from "./config.js";
import { runCycle, type BotSession, type CycleResult } from "./run.js";

export interface BotLoopOptions {
  /** Defaults to `config.pollIntervalMs`. */
  readonly intervalMs?: number;
  /** Defaults to `config.retryDelayMs`. */
  readonly retryDelayMs?: number;
}

/**
 * Runs {@link runCycle} repeatedly: the next cycle starts `intervalMs` after
 * the previous one finished, or `retryDelayMs` after one that threw.
 */
export class BotLoop {
  private readonly intervalMs: number;
  private readonly retryDelayMs: number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private completed = 0;
  private failed = 0;
  private last: CycleResult | null = null;

  public constructor(
    private readonly session: BotSession,
    private readonly config: BotConfig,
    options: BotLoopOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? config.pollIntervalMs;
    this.retryDelayMs = options.retryDelayMs ?? config.retryDelayMs;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  /** Cycles that finished without throwing, including ones with no data. */
  public get completedCycles(): number {
    return this.completed;
  }

  public get failedCycles(): number {
    return this.failed;
  }

  public get lastResult(): CycleResult | null {
    return this.last;
  }

  /** Starts polling; the first cycle runs immediately. */
  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.session.logger.info("Bot loop started", {
      symbol: this.config.symbol,
      intervalMs: this.intervalMs,
    });
    this.schedule(0);
  }

  /** Cancels the pending cycle and waits for a running one to finish. */
  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.session.logger.info("Bot loop stopped", { symbol: this.config.symbol });
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let nextDelay = this.intervalMs;
    try {
      this.last = await runCycle(this.session, this.config);
      this.completed += 1;
    } catch (error) {
      this.failed += 1;
      nextDelay = this.retryDelayMs;
      const description = error instanceof Error ? error.message : String(error);
      this.session.logger.error(`Bot cycle failed: ${description}`, {
        symbol: this.config.symbol,
        retryInMs: nextDelay,
      });
    } finally {
      this.inFlight = null;
    }

    if (this.running) {
      this.schedule(nextDelay);
    }
  }
}
