/**
 * Health Check Module
 * Reports process state and whether the session store answers.
 */

import { Request, Response, Router } from 'express';
import os from 'os';
import type { SessionStore } from './services/stategraph/sessionStore';
import logger from './utils/logger';

type CheckResult = { status: 'pass' | 'fail'; message?: string };

interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  system: {
    platform: string;
    nodeVersion: string;
    memory: {
      total: number;
      free: number;
      usagePercent: number;
    };
  };
  graphs: string[];
  checks: Record<string, CheckResult>;
}

export interface HealthOptions {
  sessionStore?: SessionStore;
  graphNames?: string[];
  timeoutMs?: number;
}

/**
 * Run a check with a timeout
 */
async function checkWithTimeout(
  name: string,
  checkFn: () => Promise<void>,
  timeoutMs: number,
): Promise<CheckResult> {
  let timer: NodeJS.Timeout | undefined;
  try {
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), timeoutMs);
    });
    await Promise.race([checkFn(), timeout]);
    return { status: 'pass', message: `${name} is reachable` };
  } catch (error) {
    return {
      status: 'fail',
      message: `${name} unreachable: ${error instanceof Error ? error.message : 'Unknown error'}`,
    };
  } finally {
    clearTimeout(timer);
  }
}

async function performHealthChecks(options: HealthOptions): Promise<HealthCheck['checks']> {
  const checks: HealthCheck['checks'] = {};

  const uptime = process.uptime();
  checks.uptime = {
    status: uptime > 0 ? 'pass' : 'fail',
    message: `Process has been running for ${Math.floor(uptime)} seconds`,
  };

  const { sessionStore } = options;
  if (sessionStore) {
    // Read-only probe with an id no execution uses
    checks.sessionStore = await checkWithTimeout(
      'Session store',
      async () => {
        await sessionStore.load('__health_check__');
      },
      options.timeoutMs ?? 5000,
    );
  } else {
    checks.sessionStore = { status: 'fail', message: 'Session store not configured' };
  }

  return checks;
}

/**
 * Create health check router
 */
export function createHealthRouter(options: HealthOptions = {}): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const totalMem = os.totalmem();
    const freeMem = os.freemem();
    try {
      const checks = await performHealthChecks(options);
      const allChecksPassed = Object.values(checks).every((check) => check.status === 'pass');

      const healthData: HealthCheck = {
        status: allChecksPassed ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        version: process.env.npm_package_version || '0.1.0',
        environment: process.env.NODE_ENV || 'development',
        system: {
          platform: os.platform(),
          nodeVersion: process.version,
          memory: {
            total: totalMem,
            free: freeMem,
            usagePercent: ((totalMem - freeMem) / totalMem) * 100,
          },
        },
        graphs: options.graphNames ?? [],
        checks,
      };

      res.status(allChecksPassed ? 200 : 503).json(healthData);
    } catch (error) {
      logger.error('Health check failed', { error });
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
