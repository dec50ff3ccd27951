import { getErrorMessage, logger } from '@tutorbot/shared';

export const MAX_START_ATTEMPTS = 5;
export const CONFLICT_DELAY_MS = 20000;
export const ERROR_DELAY_MS = 10000;
export const ROUND_DELAY_MS = 30000;

export interface SupervisorOptions {
  maxAttempts?: number;
  /** Multiplied by the attempt number */
  conflictDelayMs?: number;
  errorDelayMs?: number;
  /** Wait after a round of failed attempts before starting over */
  roundDelayMs?: number;
  /** Wait before each round, so a previous instance can release the update stream */
  startupDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRestart?: (error: unknown, attempt: number) => void;
}

type RoundResult = 'stopped' | 'exhausted';

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Telegram answers a second concurrent getUpdates poller with
 * "409: Conflict: terminated by other getUpdates request".
 */
export function isConflictError(error: unknown): boolean {
  return getErrorMessage(error).includes('Conflict');
}

export function retryDelayMs(
  error: unknown,
  attempt: number,
  conflictDelayMs = CONFLICT_DELAY_MS,
  errorDelayMs = ERROR_DELAY_MS
): number {
  return isConflictError(error) ? conflictDelayMs * attempt : errorDelayMs;
}

/**
 * Keeps the polling loop alive. `runOnce` resolves when polling stops and
 * rejects when it fails to start or dies; either way it is started again
 * until `stop()` is called.
 */
export class Supervisor {
  private stopping = false;
  private readonly maxAttempts: number;
  private readonly conflictDelayMs: number;
  private readonly errorDelayMs: number;
  private readonly roundDelayMs: number;
  private readonly startupDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly runOnce: () => Promise<void>,
    private readonly options: SupervisorOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? MAX_START_ATTEMPTS;
    this.conflictDelayMs = options.conflictDelayMs ?? CONFLICT_DELAY_MS;
    this.errorDelayMs = options.errorDelayMs ?? ERROR_DELAY_MS;
    this.roundDelayMs = options.roundDelayMs ?? ROUND_DELAY_MS;
    this.startupDelayMs = options.startupDelayMs ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  stop(): void {
    this.stopping = true;
  }

  async run(): Promise<void> {
    while (!this.stopping) {
      await this.pause(this.startupDelayMs);
      if (this.stopping) break;

      const result = await this.runRound();
      if (this.stopping) break;

      if (result === 'stopped') {
        logger.info(`🔄 Bot stopped, restarting in ${this.errorDelayMs / 1000} seconds...`);
        await this.pause(this.errorDelayMs);
      } else {
        logger.error(
          `💥 Max retries reached, restarting in ${this.roundDelayMs / 1000} seconds...`
        );
        await this.pause(this.roundDelayMs);
      }
    }

    logger.info('⏹️ Supervisor stopped');
  }

  private async runRound(): Promise<RoundResult> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (this.stopping) return 'stopped';

      logger.info(`🔄 Starting polling (attempt ${attempt}/${this.maxAttempts})...`);
      try {
        await this.runOnce();
        return 'stopped';
      } catch (error) {
        if (this.stopping) return 'stopped';

        const delay = retryDelayMs(error, attempt, this.conflictDelayMs, this.errorDelayMs);
        if (isConflictError(error)) {
          logger.info(`⚡ Conflict detected, waiting ${delay}ms before retry ${attempt}...`);
        } else {
          logger.error(`❌ Unexpected error: ${getErrorMessage(error)}`);
        }

        this.options.onRestart?.(error, attempt);
        await this.pause(delay);
      }
    }

    return 'exhausted';
  }

  private async pause(ms: number): Promise<void> {
    if (ms > 0 && !this.stopping) {
      await this.sleep(ms);
    }
  }
}
