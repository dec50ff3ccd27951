import { logger } from '@tutorbot/shared';
import type { ContextStoreStats, PipelineOutcome } from '@tutorbot/tutor';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export type OutcomeCounts = Record<PipelineOutcome, number>;

export interface BotMetrics {
  messagesReceived: number;
  outcomes: OutcomeCounts;
  sendErrors: number;
  transportErrors: number;
  restarts: number;
  averageResponseTime: number;
  maxResponseTime: number;
  uniqueUserCount: number;
  uptime: number;
}

export interface HealthSummary {
  status: HealthStatus;
  metrics: {
    messagesReceived: number;
    successRate: string;
    averageResponseTime: string;
    uniqueUsers: number;
    uptime: string;
  };
  issues: string[];
}

export interface TelemetryOptions {
  now?: () => number;
}

// Outcomes where the learner got the reply they asked for
const SUCCESS_OUTCOMES: readonly PipelineOutcome[] = ['welcome', 'hello-again', 'answered'];
const FAILURE_OUTCOMES: readonly PipelineOutcome[] = ['timeout', 'failed', 'file-error', 'unavailable'];

const RESPONSE_TIME_WINDOW = 100;

function emptyOutcomes(): OutcomeCounts {
  return {
    welcome: 0,
    'hello-again': 0,
    answered: 0,
    timeout: 0,
    failed: 0,
    unavailable: 0,
    rejected: 0,
    'file-error': 0,
    ignored: 0,
  };
}

/**
 * In-process counters for the Telegram transport, plus the periodic
 * health log line.
 */
export class BotTelemetry {
  private messagesReceived = 0;
  private outcomes: OutcomeCounts = emptyOutcomes();
  private sendErrors = 0;
  private transportErrors = 0;
  private restarts = 0;
  private uniqueUsers = new Set<string>();
  private responseTimes: number[] = [];
  private maxResponseTime = 0;
  private healthTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  private readonly startTime: number;

  constructor(options: TelemetryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  recordMessageReceived(userId: string): void {
    this.messagesReceived++;
    this.uniqueUsers.add(userId);
  }

  recordOutcome(userId: string, outcome: PipelineOutcome, durationMs: number): void {
    this.outcomes[outcome]++;

    if (outcome !== 'ignored') {
      this.recordResponseTime(durationMs);
    }

    if (FAILURE_OUTCOMES.includes(outcome)) {
      logger.warn(`📊 Message outcome: ${outcome}`, { userId, duration: durationMs });
    } else {
      logger.debug(`📊 Message outcome: ${outcome}`, { userId, duration: durationMs });
    }
  }

  incrementSendErrors(): void {
    this.sendErrors++;
  }

  incrementTransportErrors(): void {
    this.transportErrors++;
  }

  incrementRestarts(): void {
    this.restarts++;
  }

  getMetrics(): BotMetrics {
    const average =
      this.responseTimes.length > 0
        ? this.responseTimes.reduce((a, b) => a + b, 0) / this.responseTimes.length
        : 0;

    return {
      messagesReceived: this.messagesReceived,
      outcomes: { ...this.outcomes },
      sendErrors: this.sendErrors,
      transportErrors: this.transportErrors,
      restarts: this.restarts,
      averageResponseTime: average,
      maxResponseTime: this.maxResponseTime,
      uniqueUserCount: this.uniqueUsers.size,
      uptime: this.now() - this.startTime,
    };
  }

  getHealthSummary(): HealthSummary {
    const metrics = this.getMetrics();
    const issues: string[] = [];
    let status: HealthStatus = 'healthy';

    const handled = Math.max(metrics.messagesReceived, 1);
    const succeeded = SUCCESS_OUTCOMES.reduce((total, o) => total + metrics.outcomes[o], 0);
    const failed = FAILURE_OUTCOMES.reduce((total, o) => total + metrics.outcomes[o], 0);
    const errorRate = failed / handled;

    if (errorRate > 0.1) {
      issues.push(`High message error rate: ${(errorRate * 100).toFixed(1)}%`);
      status = 'degraded';
    }

    if (metrics.averageResponseTime > 30000) {
      issues.push(`Slow response times: ${(metrics.averageResponseTime / 1000).toFixed(1)}s avg`);
      status = 'degraded';
    }

    if (metrics.transportErrors > 10) {
      issues.push(`Multiple Telegram API errors: ${metrics.transportErrors}`);
      status = 'unhealthy';
    }

    if (errorRate > 0.5) {
      status = 'unhealthy';
    }

    return {
      status,
      metrics: {
        messagesReceived: metrics.messagesReceived,
        successRate: `${((succeeded / handled) * 100).toFixed(1)}%`,
        averageResponseTime: `${(metrics.averageResponseTime / 1000).toFixed(1)}s`,
        uniqueUsers: metrics.uniqueUserCount,
        uptime: `${Math.floor(metrics.uptime / 1000 / 60)}min`,
      },
      issues,
    };
  }

  /**
   * Log active users and stored turns every `intervalMs`
   */
  startHealthLog(intervalMs: number, getStats: () => ContextStoreStats): void {
    this.stopHealthLog();
    this.healthTimer = setInterval(() => this.logHealth(getStats), intervalMs);
    this.healthTimer.unref();
  }

  stopHealthLog(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  logHealth(getStats: () => ContextStoreStats): void {
    try {
      const stats = getStats();
      logger.info(
        `🤖 Health Check: ${stats.activeUsers} active users, ${stats.totalTurns} total messages`,
        { totalFiles: stats.totalFiles, messagesReceived: this.messagesReceived }
      );
    } catch (error) {
      logger.error('Health check error:', error);
    }
  }

  private recordResponseTime(duration: number): void {
    this.responseTimes.push(duration);
    if (this.responseTimes.length > RESPONSE_TIME_WINDOW) {
      this.responseTimes = this.responseTimes.slice(-RESPONSE_TIME_WINDOW);
    }
    this.maxResponseTime = Math.max(this.maxResponseTime, duration);
  }
}
