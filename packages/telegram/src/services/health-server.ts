import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { readFileSync } from 'fs';
import { getErrorMessage, logger } from '@tutorbot/shared';
import type { ContextStoreStats } from '@tutorbot/tutor';
import type { BotTelemetry, HealthStatus, HealthSummary } from './telemetry.js';

export interface HealthCheckResponse {
  status: HealthStatus;
  timestamp: string;
  service: 'telegram-bot';
  version: string;
  uptime: number;
  telegram: {
    polling: boolean;
  };
  backend: {
    available: boolean;
  };
  store: ContextStoreStats;
  telemetry: HealthSummary['metrics'];
  issues?: string[];
}

export interface LivenessResponse {
  alive: true;
  timestamp: string;
  uptime: number;
  pid: number;
}

export interface HealthSources {
  telemetry: BotTelemetry;
  isPolling: () => boolean;
  isBackendAvailable: () => boolean;
  getStats: () => ContextStoreStats;
}

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: getErrorMessage(error) });
  }
  return '1.0.0';
}

export class HealthServer {
  private server: Server | null = null;
  private readonly version = readVersion();

  constructor(
    private readonly port: number,
    private readonly sources: HealthSources
  ) {}

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  getHealthReport(): HealthCheckResponse {
    const summary = this.sources.telemetry.getHealthSummary();
    const polling = this.sources.isPolling();
    const available = this.sources.isBackendAvailable();

    let status = summary.status;
    const issues = [...summary.issues];

    if (!available) {
      issues.push('Completion backend unavailable');
      if (status === 'healthy') status = 'degraded';
    }

    if (!polling) {
      issues.push('Telegram polling not running');
      status = 'unhealthy';
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      service: 'telegram-bot',
      version: this.version,
      uptime: process.uptime(),
      telegram: { polling },
      backend: { available },
      store: this.sources.getStats(),
      telemetry: summary.metrics,
      issues: issues.length > 0 ? issues : undefined,
    };
  }

  getLivenessReport(): LivenessResponse {
    return {
      alive: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      pid: process.pid,
    };
  }

  start(): Promise<void> {
    const server = createServer((req, res) => this.handleRequest(req, res));
    this.server = server;

    server.on('error', (error: Error) => {
      logger.error('Health server error:', error);
    });

    return new Promise((resolve) => {
      server.listen(this.port, () => {
        logger.info(`🩺 Health server running on port ${this.port}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('Health server stopped');
        resolve();
      });
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    res.setHeader('Content-Type', 'application/json');

    if (req.method !== 'GET') {
      res.writeHead(405);
      res.end(JSON.stringify({ error: 'Method not allowed' }));
      return;
    }

    try {
      switch (req.url) {
        case '/health':
        case '/': {
          const report = this.getHealthReport();
          res.writeHead(report.status === 'unhealthy' ? 503 : 200);
          res.end(JSON.stringify(report, null, 2));
          break;
        }
        case '/live':
          res.writeHead(200);
          res.end(JSON.stringify(this.getLivenessReport(), null, 2));
          break;
        default:
          res.writeHead(404);
          res.end(JSON.stringify({ error: 'Not found' }));
      }
    } catch (error) {
      logger.error('Health server error:', error);
      res.writeHead(500);
      res.end(JSON.stringify({ error: 'Internal server error', message: getErrorMessage(error) }));
    }
  }
}
