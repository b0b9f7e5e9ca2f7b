import { ZodError } from 'zod';
import { ApiClient } from './client/ApiClient.js';
import { ApiError } from './client/errors.js';
import { loadConfig, validateConfig, type ClientConfig } from './config/index.js';
import { runHealthCheck } from './health.js';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  createClient?: (config: ClientConfig) => ApiClient;
}

const USAGE = `Usage: teamleader-api <command>

Commands:
  status            Show authentication, token and rate-limit state
  health            Run the health check (probes users.me when authenticated)
  validate-config   Check TEAMLEADER_* settings without touching the network
  auth-url [state]  Print the OAuth authorization URL`;

function print(write: (line: string) => void, value: unknown): void {
  write(JSON.stringify(value, null, 2));
}

/**
 * runCli — command dispatch for the teamleader-api binary.
 * Returns the process exit code instead of exiting, so commands stay testable.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const createClient = deps.createClient ?? ((config: ClientConfig) => new ApiClient(config));
  const [command, ...rest] = args;

  if (command === undefined || command === 'help' || command === '--help') {
    stdout(USAGE);
    return 0;
  }

  let config: ClientConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      stderr('Invalid configuration:');
      for (const issue of error.issues) {
        stderr(`  ${issue.path.join('.')}: ${issue.message}`);
      }
      return 1;
    }
    throw error;
  }

  try {
    switch (command) {
      case 'validate-config': {
        const issues = validateConfig(config);
        print(stdout, { valid: !issues.some((issue) => issue.severity === 'error'), issues });
        return issues.some((issue) => issue.severity === 'error') ? 1 : 0;
      }

      case 'auth-url': {
        const client = createClient(config);
        stdout(client.getAuthorizationUrl(rest[0]));
        return 0;
      }

      case 'status': {
        const client = createClient(config);
        print(stdout, {
          authenticated: await client.isAuthenticated(),
          apiVersion: client.getApiVersion(),
          token: await client.getTokenService().getTokenInfo(),
          rateLimit: client.getRateLimitStats(),
        });
        return 0;
      }

      case 'health': {
        const report = await runHealthCheck(createClient(config));
        print(stdout, report);
        return report.status === 'unhealthy' ? 1 : 0;
      }

      default:
        stderr(`Unknown command: ${command}`);
        stderr(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof ApiError) {
      stderr(`${error.kind}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
