import type { ApiClient, RequestOutcome } from './client/ApiClient.js';
import { classifyFailure } from './client/errors.js';
import { validateConfig } from './config/index.js';

export type CheckStatus = 'ok' | 'warning' | 'error';

export interface HealthCheckResult {
  status: CheckStatus;
  message: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  checks: {
    configuration: HealthCheckResult;
    authentication: HealthCheckResult;
    tokenStatus: HealthCheckResult;
    rateLimits: HealthCheckResult;
    connectivity: HealthCheckResult;
  };
}

/**
 * runHealthCheck — one-shot diagnosis of a client instance.
 *
 * Connectivity is probed with `users.me` only when the client holds a token;
 * otherwise the probe would just report the missing authentication twice.
 */
export async function runHealthCheck(
  client: ApiClient,
  options: { probeConnectivity?: boolean; now?: () => number } = {},
): Promise<HealthReport> {
  const now = options.now ?? Date.now;
  const configuration = checkConfiguration(client);
  const authenticated = await client.isAuthenticated();

  const authentication: HealthCheckResult = authenticated
    ? { status: 'ok', message: 'Valid tokens available' }
    : { status: 'error', message: 'Not authenticated' };

  const tokenInfo = await client.getTokenService().getTokenInfo();
  let tokenStatus: HealthCheckResult;
  if (!tokenInfo.hasAccessToken) {
    tokenStatus = { status: 'error', message: 'No token stored', details: { ...tokenInfo } };
  } else if (tokenInfo.needsRefresh) {
    tokenStatus = { status: 'warning', message: 'Token expires soon and will be refreshed', details: { ...tokenInfo } };
  } else {
    tokenStatus = { status: 'ok', message: 'Token valid', details: { ...tokenInfo } };
  }

  const stats = client.getRateLimitStats();
  const rateLimits: HealthCheckResult = stats.usagePercentage >= 90
    ? { status: 'warning', message: `Rate limit nearly exhausted (${stats.usagePercentage}%)`, details: { ...stats } }
    : { status: 'ok', message: `Rate limit usage ${stats.usagePercentage}%`, details: { ...stats } };

  let connectivity: HealthCheckResult = { status: 'warning', message: 'Skipped: not authenticated' };
  if (options.probeConnectivity !== false && authenticated) {
    connectivity = await checkConnectivity(client, now);
  } else if (options.probeConnectivity === false) {
    connectivity = { status: 'warning', message: 'Skipped' };
  }

  const checks = { configuration, authentication, tokenStatus, rateLimits, connectivity };
  const statuses = Object.values(checks).map((check) => check.status);

  return {
    status: configuration.status === 'error' || connectivity.status === 'error'
      ? 'unhealthy'
      : statuses.includes('error') || statuses.includes('warning') ? 'degraded' : 'healthy',
    timestamp: new Date(now()).toISOString(),
    checks,
  };
}

function checkConfiguration(client: ApiClient): HealthCheckResult {
  const issues = validateConfig(client.getConfig());
  const errors = issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    return { status: 'error', message: errors.map((issue) => issue.message).join('; '), details: { issues } };
  }
  if (issues.length > 0) {
    return { status: 'warning', message: `${issues.length} configuration warning(s)`, details: { issues } };
  }
  return { status: 'ok', message: 'Configuration valid' };
}

async function checkConnectivity(client: ApiClient, now: () => number): Promise<HealthCheckResult> {
  const startedAt = now();
  let outcome: RequestOutcome;
  try {
    outcome = await client.request('POST', 'users.me');
  } catch (error) {
    // Throw-mode clients surface the same failure as an exception
    const failure = classifyFailure(error);
    return {
      status: 'error',
      message: `API connectivity failed: ${failure.message}`,
      details: { kind: failure.kind, status: failure.statusCode },
    };
  }
  const responseTimeMs = now() - startedAt;

  if (outcome.type === 'error') {
    return {
      status: 'error',
      message: `API connectivity failed: ${outcome.error.message}`,
      details: { kind: outcome.error.kind, status: outcome.status },
    };
  }
  return { status: 'ok', message: 'API reachable', details: { responseTimeMs, status: outcome.status } };
}
