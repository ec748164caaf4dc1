import type { Env, Hono } from 'hono';

/**
 * A named readiness check. Resolves when healthy, throws when not.
 */
export interface HealthCheck {
  name: string;
  check: () => Promise<unknown>;
  /** @default 5000 */
  timeoutMs?: number;
}

export interface HealthCheckResult {
  name: string;
  healthy: boolean;
  latency: number;
  message?: string;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  checks: HealthCheckResult[];
  timestamp: string;
  version?: string;
}

export interface HealthConfig {
  checks?: HealthCheck[];
  version?: string;
  /** @default '/health' */
  path?: string;
  /** @default '/ready' */
  readyPath?: string;
}

async function runCheck(check: HealthCheck): Promise<HealthCheckResult> {
  const start = Date.now();
  let timer: NodeJS.Timeout | undefined;

  try {
    await Promise.race([
      check.check(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Health check timed out')), check.timeoutMs ?? 5000);
      }),
    ]);
    return { name: check.name, healthy: true, latency: Date.now() - start };
  } catch (err) {
    return {
      name: check.name,
      healthy: false,
      latency: Date.now() - start,
      message: err instanceof Error ? err.message : String(err),
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Registers a liveness endpoint (always 200 while the process serves
 * requests) and a readiness endpoint that runs every check and answers 503
 * if any fails.
 */
export function createHealthEndpoints<E extends Env>(app: Hono<E>, config: HealthConfig = {}): void {
  const { checks = [], version, path = '/health', readyPath = '/ready' } = config;

  app.get(path, (c) => {
    const response: HealthResponse = {
      status: 'healthy',
      checks: [],
      timestamp: new Date().toISOString(),
      ...(version ? { version } : {}),
    };
    return c.json(response, 200);
  });

  app.get(readyPath, async (c) => {
    const results = await Promise.all(checks.map(runCheck));
    const healthy = results.every((r) => r.healthy);
    const response: HealthResponse = {
      status: healthy ? 'healthy' : 'unhealthy',
      checks: results,
      timestamp: new Date().toISOString(),
      ...(version ? { version } : {}),
    };
    return c.json(response, healthy ? 200 : 503);
  });
}
