import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { plainToInstance } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import type { ValidationError } from 'class-validator';
import { ConfigurationError } from '../raw/errors.js';
import { isRawRecord } from '../raw/platform-client-interface.js';
import { TargetsFileDto, toSyncTarget } from './sync-target.js';
import type { Platform, SyncTarget } from './sync-target.js';

export const SYNC_CONFIG = Symbol('SYNC_CONFIG');

export const DEFAULT_TARGETS_FILE = 'config/targets.json';

export const DEFAULT_METRIC_KEYS = [
  'bugs',
  'vulnerabilities',
  'code_smells',
  'security_hotspots',
  'coverage',
  'duplicated_lines_density',
  'reliability_rating',
  'security_rating',
  'sqale_rating',
  'new_violations',
  'ncloc',
];

export class SyncConfig {
  @IsIn(['development', 'test', 'production'])
  nodeEnv = 'development';

  @IsOptional()
  @IsString()
  apiKey?: string;

  @IsOptional()
  @IsString()
  databaseUrl?: string;

  @IsOptional()
  @IsString()
  bitbucketToken?: string;

  @IsUrl({ require_tld: false })
  bitbucketApiUrl = 'https://api.bitbucket.org/2.0';

  @IsOptional()
  @IsString()
  sonarcloudToken?: string;

  @IsUrl({ require_tld: false })
  sonarcloudApiUrl = 'https://sonarcloud.io/api';

  @IsInt()
  @Min(1)
  @Max(500)
  pageSize = 100;

  @IsInt()
  @Min(1)
  @Max(10)
  retryAttempts = 3;

  @IsInt()
  @Min(0)
  backoffBaseMs = 1000;

  @IsInt()
  @Min(0)
  backoffMaxMs = 60_000;

  @IsInt()
  @Min(1)
  rateLimit = 1000;

  @IsInt()
  @Min(1)
  rateWindowMs = 3_600_000;

  @IsInt()
  @Min(1)
  timeoutMs = 30_000;

  @IsInt()
  @Min(1)
  @Max(16)
  concurrency = 1;

  @IsOptional()
  @IsInt()
  @Min(1)
  runTimeoutMs?: number;

  @IsBoolean()
  scheduleEnabled = false;

  @IsString({ each: true })
  @ArrayNotEmpty()
  metricKeys: string[] = [...DEFAULT_METRIC_KEYS];

  @IsString()
  targetsFile = DEFAULT_TARGETS_FILE;

  targets: SyncTarget[] = [];

  tokenFor(platform: Platform): string | undefined {
    return platform === 'bitbucket' ? this.bitbucketToken : this.sonarcloudToken;
  }
}

type Env = Record<string, string | undefined>;

/**
 * Builds the validated configuration from environment variables plus the
 * targets file. Throws ConfigurationError listing every violated constraint.
 */
export function loadSyncConfig(env: Env = process.env, cwd = process.cwd()): SyncConfig {
  const plain: Record<string, unknown> = {
    nodeEnv: env.NODE_ENV,
    apiKey: env.API_KEY,
    databaseUrl: env.DATABASE_URL,
    bitbucketToken: env.BITBUCKET_TOKEN,
    bitbucketApiUrl: env.BITBUCKET_API_URL,
    sonarcloudToken: env.SONARCLOUD_TOKEN,
    sonarcloudApiUrl: env.SONARCLOUD_API_URL,
    pageSize: num(env.SYNC_PAGE_SIZE),
    retryAttempts: num(env.API_RETRY_ATTEMPTS),
    backoffBaseMs: num(env.API_BACKOFF_BASE_MS),
    backoffMaxMs: num(env.API_BACKOFF_MAX_MS),
    rateLimit: num(env.API_RATE_LIMIT),
    rateWindowMs: num(env.API_RATE_WINDOW_MS),
    timeoutMs: num(env.API_TIMEOUT_MS),
    concurrency: num(env.SYNC_CONCURRENCY),
    runTimeoutMs: num(env.SYNC_RUN_TIMEOUT_MS),
    scheduleEnabled: bool(env.SYNC_SCHEDULE_ENABLED),
    metricKeys: csv(env.SONARCLOUD_METRIC_KEYS),
    targetsFile: env.SYNC_TARGETS_FILE,
  };

  const config = plainToInstance(SyncConfig, withoutUndefined(plain));
  const problems = flattenValidationErrors(validateSync(config));
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const targetsPath = path.resolve(cwd, config.targetsFile);
  if (existsSync(targetsPath)) {
    config.targets = loadSyncTargets(targetsPath);
  } else if (env.SYNC_TARGETS_FILE) {
    throw new ConfigurationError(`Targets file not found: ${targetsPath}`);
  }

  return config;
}

/** Reads and validates a `{ "targets": [...] }` JSON file. */
export function loadSyncTargets(file: string): SyncTarget[] {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read targets file ${file}: ${reason}`);
  }
  return parseSyncTargets(json, file);
}

export function parseSyncTargets(json: unknown, source = 'targets'): SyncTarget[] {
  if (!isRawRecord(json)) {
    throw new ConfigurationError(`Invalid ${source}: expected an object with a "targets" array`);
  }
  const dto = plainToInstance(TargetsFileDto, json);
  const problems = flattenValidationErrors(validateSync(dto));
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid ${source}: ${problems.join('; ')}`);
  }
  return dto.targets.map(toSyncTarget);
}

/** Ensures credentials exist for every platform the given targets touch. */
export function assertCredentials(config: SyncConfig, targets: readonly SyncTarget[]): void {
  const missing = [...new Set(targets.map((t) => t.platform))].filter((p) => !config.tokenFor(p));
  if (missing.length > 0) {
    const vars = missing.map((p) => (p === 'bitbucket' ? 'BITBUCKET_TOKEN' : 'SONARCLOUD_TOKEN'));
    throw new ConfigurationError(`Missing credentials: ${vars.join(', ')}`);
  }
}

export function flattenValidationErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      parent ? `${property}: ${message}` : message,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], property)];
  });
}

function num(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

function csv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function withoutUndefined(plain: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(plain).filter(([, value]) => value !== undefined));
}
