#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { CliUsageError } from '../shared/cli';
import { Config, ConfigError, DEFAULT_JWT_SECRET, loadConfig } from '../shared/env';
import { errorMessage } from '../shared/logger';

export const USAGE = `Usage: frontdesk-check-env [options]

Checks the environment the services would start with.

Options:
      --no-fail-on-error  Exit 0 even when errors are found
`;

export interface EnvironmentReport {
  ok: boolean;
  environment: string;
  errors: string[];
  warnings: string[];
  settings: Record<string, string>;
}

function mask(value: string | undefined): string {
  return value ? '***' : 'Not Set';
}

function describe(config: Config, source: NodeJS.ProcessEnv): Record<string, string> {
  return {
    APP_ENVIRONMENT: config.environment,
    DEBUG: String(config.debug),
    PORT: String(config.api.port),
    JWT_SECRET: mask(source.JWT_SECRET),
    ACCESS_TOKEN_LIFETIME: `${config.auth.accessTokenLifetimeSeconds}s`,
    REFRESH_TOKEN_LIFETIME: `${config.auth.refreshTokenLifetimeSeconds}s`,
    TOKEN_REFRESH_WARNING: `${config.auth.refreshWarningSeconds}s`,
    REDIS_URL: config.redisUrl.replace(/\/\/([^@/]*)@/, '//***@'),
    CORS_ALLOWED_ORIGINS: config.api.corsAllowedOrigins.join(', ') || 'Not Set',
    DELIVERY_LOCATIONS_FILE: config.deliveries.locationsFile,
    SYNC_INTERVAL_HOURS: String(config.deliveries.syncIntervalHours),
    SUPERUSER: config.superuser ? config.superuser.username : 'Not Set',
  };
}

/**
 * Validates the environment the services would start with. Errors make
 * the check fail; warnings are printed but pass.
 */
export function checkEnvironment(source: NodeJS.ProcessEnv = process.env): EnvironmentReport {
  let config: Config;
  try {
    config = loadConfig(source);
  } catch (error) {
    if (error instanceof ConfigError) {
      return { ok: false, environment: 'unknown', errors: [error.message], warnings: [], settings: {} };
    }
    throw error;
  }

  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.environment === 'production') {
    if (config.debug) {
      warnings.push('DEBUG is enabled in production');
    }
    if (!source.JWT_SECRET || source.JWT_SECRET === DEFAULT_JWT_SECRET) {
      errors.push('JWT_SECRET must be set to a non-default value in production');
    }
    if (config.api.corsAllowedOrigins.length === 0) {
      warnings.push('CORS_ALLOWED_ORIGINS is empty; browsers on other origins will be blocked');
    }
  }

  if (!config.superuser) {
    warnings.push('SUPERUSER_USERNAME/SUPERUSER_PASSWORD not set; no superuser will be created');
  }

  if (config.auth.refreshWarningSeconds >= config.auth.accessTokenLifetimeSeconds) {
    warnings.push('TOKEN_REFRESH_WARNING_SECONDS is not shorter than the access token lifetime; every request will warn');
  }

  return {
    ok: errors.length === 0,
    environment: config.environment.toUpperCase(),
    errors,
    warnings,
    settings: describe(config, source),
  };
}

export function formatReport(report: EnvironmentReport): string {
  const lines = ['Environment configuration check', ''];

  for (const [key, value] of Object.entries(report.settings)) {
    lines.push(`  ${key}: ${value}`);
  }
  if (Object.keys(report.settings).length > 0) {
    lines.push('');
  }

  for (const warning of report.warnings) {
    lines.push(`WARNING: ${warning}`);
  }
  for (const error of report.errors) {
    lines.push(`ERROR: ${error}`);
  }

  lines.push(
    report.ok
      ? `Environment configuration is correct for ${report.environment}`
      : `Environment configuration issues detected in ${report.environment}`
  );
  return lines.join('\n');
}

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        'no-fail-on-error': { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new CliUsageError(errorMessage(error));
  }
}

export function main(argv: string[], source: NodeJS.ProcessEnv = process.env): number {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  const report = checkEnvironment(source);
  console.log(formatReport(report));

  if (!report.ok && !values['no-fail-on-error']) {
    return 1;
  }
  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
