/**
 * Pipeline configuration.
 *
 * Settings come from three layers, later layers winning:
 *   1. built-in defaults
 *   2. environment variables
 *   3. an optional JSON or YAML file
 *
 * The merged settings are coerced, validated once, and never mutated
 * afterwards.
 *
 * Usage:
 *   const loaded = loadPipelineConfig({ env: process.env });
 *   if (!loaded.ok) throw new Error(loaded.error.message);
 *   const { config, warnings } = loaded.value;
 */

import { existsSync, readFileSync } from 'fs';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import { LLMProvider, LLM_PROVIDERS } from '../llm/types';
import { LogLevel, parseLogLevel } from '../logger';
import { configFileError, describeError, invalidConfigError, missingCredentialError } from '../domain/errors';
import { Result, failure, success } from '../domain/result';

export interface PipelineConfig {
  /** Generation provider backing the client. */
  provider: LLMProvider;
  /** Model identifier passed to the provider. */
  model: string;
  /** Endpoint override for the OpenAI-compatible adapter. */
  baseUrl?: string;
  /** Upper bound on generated tokens per request. */
  maxOutputTokens: number;
  /** Sampling temperature (0-2). */
  temperature: number;

  clusterName: string;
  region: string;
  accountId: string;
  ecrRepositoryName: string;
  vpcCidr: string;
  nodeInstanceTypes: string[];
  desiredCapacity: number;
  minCapacity: number;
  maxCapacity: number;

  appName: string;
  appPort: number;
  replicas: number;
  appRepository: string;

  /** Directory the artifact paths are resolved against. */
  outputDir: string;
  /** JSON-lines log file; empty string disables file logging. */
  logFile: string;
  logLevel: LogLevel;
}

/** Model used when none is configured. */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  gemini: 'gemini-2.5-pro',
  openai: 'gpt-4o-mini',
};

export const PLACEHOLDER_ACCOUNT_ID = '123456789012';

const DEFAULTS: PipelineConfig = {
  provider: 'gemini',
  model: DEFAULT_MODELS.gemini,
  maxOutputTokens: 65536,
  temperature: 0.3,
  clusterName: 'eks-cluster',
  region: 'us-east-1',
  accountId: PLACEHOLDER_ACCOUNT_ID,
  ecrRepositoryName: 'node-app',
  vpcCidr: '10.0.0.0/16',
  nodeInstanceTypes: ['t3.medium'],
  desiredCapacity: 2,
  minCapacity: 1,
  maxCapacity: 4,
  appName: 'node-app',
  appPort: 3005,
  replicas: 2,
  appRepository: 'https://github.com/example/sample-node-project',
  outputDir: '.',
  logFile: 'logs/pipeline.log',
  logLevel: LogLevel.Info,
};

/** Environment variable → setting. The first variable set wins when a setting has several. */
export const ENV_VARS: ReadonlyArray<readonly [envVar: string, key: keyof PipelineConfig]> = [
  ['LLM_PROVIDER', 'provider'],
  ['LLM_MODEL', 'model'],
  ['GEMINI_MODEL', 'model'],
  ['LLM_BASE_URL', 'baseUrl'],
  ['LLM_MAX_OUTPUT_TOKENS', 'maxOutputTokens'],
  ['LLM_TEMPERATURE', 'temperature'],
  ['EKS_CLUSTER_NAME', 'clusterName'],
  ['AWS_DEFAULT_REGION', 'region'],
  ['AWS_ACCOUNT_ID', 'accountId'],
  ['ECR_REPOSITORY', 'ecrRepositoryName'],
  ['VPC_CIDR', 'vpcCidr'],
  ['NODE_INSTANCE_TYPES', 'nodeInstanceTypes'],
  ['DESIRED_CAPACITY', 'desiredCapacity'],
  ['MIN_CAPACITY', 'minCapacity'],
  ['MAX_CAPACITY', 'maxCapacity'],
  ['APP_NAME', 'appName'],
  ['APP_PORT', 'appPort'],
  ['APP_REPLICAS', 'replicas'],
  ['APP_REPOSITORY', 'appRepository'],
  ['OUTPUT_DIR', 'outputDir'],
  ['LOG_FILE', 'logFile'],
  ['LOG_LEVEL', 'logLevel'],
];

/** Names the config file when no path is passed explicitly. */
export const CONFIG_PATH_ENV_VAR = 'PIPELINE_CONFIG';

/** Environment variables holding the provider credential, in lookup order. */
export const CREDENTIAL_ENV_VARS: Record<LLMProvider, string[]> = {
  gemini: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
  openai: ['OPENAI_API_KEY'],
};

export type Environment = Record<string, string | undefined>;

/** Raw, not yet coerced settings keyed by config field name. */
export type RawSettings = Record<string, unknown>;

/** Validation result for a pipeline configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface LoadedConfig {
  config: PipelineConfig;
  warnings: string[];
}

export interface LoadConfigOptions {
  env: Environment;
  /** Overrides the PIPELINE_CONFIG environment variable. */
  configPath?: string;
}

// ─── Construction ───────────────────────────────────────────────────────────

/** Create a config from defaults and already-typed overrides. */
export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const provider = overrides.provider ?? DEFAULTS.provider;
  return {
    ...DEFAULTS,
    model: DEFAULT_MODELS[provider],
    ...overrides,
    nodeInstanceTypes: [...(overrides.nodeInstanceTypes ?? DEFAULTS.nodeInstanceTypes)],
  };
}

/** Registry host derived from account and region. */
export function ecrRegistry(config: PipelineConfig): string {
  return `${config.accountId}.dkr.ecr.${config.region}.amazonaws.com`;
}

/** Full image reference of the application, tagged latest. */
export function ecrImage(config: PipelineConfig): string {
  return `${ecrRegistry(config)}/${config.ecrRepositoryName}:latest`;
}

// ─── Layers ─────────────────────────────────────────────────────────────────

/** Collect the settings present in the environment. */
export function settingsFromEnv(env: Environment): RawSettings {
  const settings: RawSettings = {};
  for (const [envVar, key] of ENV_VARS) {
    const value = env[envVar];
    if (value === undefined || key in settings) continue;
    // An empty LOG_FILE turns file logging off; elsewhere empty means unset.
    if (value === '' && key !== 'logFile') continue;
    settings[key] = value;
  }
  return settings;
}

/** Parse config file text; YAML for .yaml/.yml, JSON otherwise. */
export function parseConfigFile(filePath: string, text: string): Result<RawSettings> {
  let parsed: unknown;
  try {
    const ext = extname(filePath).toLowerCase();
    parsed = ext === '.yaml' || ext === '.yml' ? yaml.load(text) : JSON.parse(text);
  } catch (err) {
    return failure(configFileError(filePath, describeError(err)));
  }

  if (parsed === undefined || parsed === null) return success({});
  if (!isRecord(parsed)) {
    return failure(configFileError(filePath, 'top level must be a mapping'));
  }
  return success(parsed);
}

/** Coerce merged raw settings into a config. Every invalid value is reported. */
export function buildPipelineConfig(raw: RawSettings): { config: PipelineConfig; errors: string[] } {
  const errors: string[] = [];
  const read = new SettingReader(raw, errors);

  const provider = read.provider('provider') ?? DEFAULTS.provider;
  const config: PipelineConfig = {
    provider,
    model: read.string('model') ?? DEFAULT_MODELS[provider],
    baseUrl: read.string('baseUrl'),
    maxOutputTokens: read.integer('maxOutputTokens') ?? DEFAULTS.maxOutputTokens,
    temperature: read.number('temperature') ?? DEFAULTS.temperature,
    clusterName: read.string('clusterName') ?? DEFAULTS.clusterName,
    region: read.string('region') ?? DEFAULTS.region,
    accountId: read.string('accountId') ?? DEFAULTS.accountId,
    ecrRepositoryName: read.string('ecrRepositoryName') ?? DEFAULTS.ecrRepositoryName,
    vpcCidr: read.string('vpcCidr') ?? DEFAULTS.vpcCidr,
    nodeInstanceTypes: read.stringList('nodeInstanceTypes') ?? [...DEFAULTS.nodeInstanceTypes],
    desiredCapacity: read.integer('desiredCapacity') ?? DEFAULTS.desiredCapacity,
    minCapacity: read.integer('minCapacity') ?? DEFAULTS.minCapacity,
    maxCapacity: read.integer('maxCapacity') ?? DEFAULTS.maxCapacity,
    appName: read.string('appName') ?? DEFAULTS.appName,
    appPort: read.integer('appPort') ?? DEFAULTS.appPort,
    replicas: read.integer('replicas') ?? DEFAULTS.replicas,
    appRepository: read.string('appRepository') ?? DEFAULTS.appRepository,
    outputDir: read.string('outputDir') ?? DEFAULTS.outputDir,
    logFile: read.string('logFile', { allowEmpty: true }) ?? DEFAULTS.logFile,
    logLevel: read.logLevel('logLevel') ?? DEFAULTS.logLevel,
  };
  if (config.baseUrl === undefined) delete config.baseUrl;

  return { config, errors };
}

// ─── Validation ─────────────────────────────────────────────────────────────

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

/** Validate a config for consistency. */
export function validatePipelineConfig(config: PipelineConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!LLM_PROVIDERS.includes(config.provider)) {
    errors.push(`provider must be one of ${LLM_PROVIDERS.join(', ')}`);
  }
  if (!config.model.trim()) errors.push('model must not be empty');
  if (!Number.isInteger(config.maxOutputTokens) || config.maxOutputTokens <= 0) {
    errors.push('maxOutputTokens must be a positive integer');
  }
  if (!(config.temperature >= 0 && config.temperature <= 2)) {
    errors.push('temperature must be between 0 and 2');
  }

  if (!config.clusterName.trim()) errors.push('clusterName must not be empty');
  if (!config.region.trim()) errors.push('region must not be empty');
  if (!/^\d{12}$/.test(config.accountId)) {
    errors.push('accountId must be a 12-digit AWS account id');
  } else if (config.accountId === PLACEHOLDER_ACCOUNT_ID) {
    warnings.push(`accountId is the placeholder ${PLACEHOLDER_ACCOUNT_ID}; set AWS_ACCOUNT_ID for real image references`);
  }
  if (!isValidCidr(config.vpcCidr)) errors.push(`vpcCidr is not a valid IPv4 CIDR block: ${config.vpcCidr}`);
  if (config.nodeInstanceTypes.length === 0) errors.push('nodeInstanceTypes must list at least one instance type');

  for (const key of ['desiredCapacity', 'minCapacity', 'maxCapacity'] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) errors.push(`${key} must be a non-negative integer`);
  }
  if (config.minCapacity > config.maxCapacity) {
    errors.push('minCapacity must not exceed maxCapacity');
  } else if (config.desiredCapacity < config.minCapacity || config.desiredCapacity > config.maxCapacity) {
    errors.push('desiredCapacity must be between minCapacity and maxCapacity');
  }

  if (!Number.isInteger(config.appPort) || config.appPort < 1 || config.appPort > 65535) {
    errors.push('appPort must be an integer between 1 and 65535');
  }
  if (!Number.isInteger(config.replicas) || config.replicas < 1) errors.push('replicas must be a positive integer');
  if (!config.outputDir.trim()) errors.push('outputDir must not be empty');

  if (config.baseUrl !== undefined && config.provider === 'gemini') {
    warnings.push('baseUrl is ignored by the gemini provider');
  }

  return { valid: errors.length === 0, errors, warnings };
}

function isValidCidr(value: string): boolean {
  const match = CIDR_PATTERN.exec(value);
  if (!match) return false;
  const octets = match.slice(1, 5).map(Number);
  return octets.every((o) => o <= 255) && Number(match[5]) <= 32;
}

// ─── Loading ────────────────────────────────────────────────────────────────

/**
 * Load, merge and validate the configuration.
 *
 * A config path that does not exist is skipped with a warning. An
 * unreadable or malformed file, and any invalid value, is a
 * configuration error.
 */
export function loadPipelineConfig(options: LoadConfigOptions): Result<LoadedConfig> {
  const warnings: string[] = [];
  const envSettings = settingsFromEnv(options.env);
  let fileSettings: RawSettings = {};

  const configPath = options.configPath ?? options.env[CONFIG_PATH_ENV_VAR];
  if (configPath) {
    if (!existsSync(configPath)) {
      warnings.push(`Config file not found, using defaults and environment: ${configPath}`);
    } else {
      let text: string;
      try {
        text = readFileSync(configPath, 'utf-8');
      } catch (err) {
        return failure(configFileError(configPath, describeError(err)));
      }
      const parsed = parseConfigFile(configPath, text);
      if (!parsed.ok) return parsed;
      fileSettings = parsed.value;

      const known = new Set<string>(Object.keys(DEFAULTS).concat('baseUrl'));
      for (const key of Object.keys(fileSettings)) {
        if (!known.has(key)) warnings.push(`Unknown config key ignored: ${key}`);
      }
    }
  }

  const { config, errors } = buildPipelineConfig({ ...envSettings, ...fileSettings });
  if (errors.length > 0) return failure(invalidConfigError(errors));

  const validation = validatePipelineConfig(config);
  if (!validation.valid) return failure(invalidConfigError(validation.errors));

  return success({ config, warnings: [...warnings, ...validation.warnings] });
}

/** Find the provider credential in the environment. Empty values count as unset. */
export function resolveApiKey(provider: LLMProvider, env: Environment): Result<string> {
  const envVars = CREDENTIAL_ENV_VARS[provider];
  for (const envVar of envVars) {
    const value = env[envVar];
    if (value) return success(value);
  }
  return failure(missingCredentialError(envVars));
}

// ─── Coercion ───────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads one field at a time, recording an error for each value of the wrong shape. */
class SettingReader {
  constructor(
    private readonly raw: RawSettings,
    private readonly errors: string[],
  ) {}

  string(key: string, opts: { allowEmpty?: boolean } = {}): string | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || (!opts.allowEmpty && value.trim() === '')) {
      return this.reject(key, 'a non-empty string');
    }
    return value.trim();
  }

  number(key: string): number | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    const num = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
    if (!Number.isFinite(num)) return this.reject(key, 'a number');
    return num;
  }

  integer(key: string): number | undefined {
    if (this.raw[key] === undefined) return undefined;
    const num = this.number(key);
    if (num === undefined) return undefined;
    if (!Number.isInteger(num)) return this.reject(key, 'an integer');
    return num;
  }

  stringList(key: string): string[] | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string') {
      return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
    }
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
      return value.map((s) => s.trim()).filter((s) => s.length > 0);
    }
    return this.reject(key, 'a list of strings');
  }

  provider(key: string): LLMProvider | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    const match = LLM_PROVIDERS.find((p) => typeof value === 'string' && p === value.trim().toLowerCase());
    return match ?? this.reject(key, `one of ${LLM_PROVIDERS.join(', ')}`);
  }

  logLevel(key: string): LogLevel | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    const level = typeof value === 'string' ? parseLogLevel(value) : undefined;
    return level ?? this.reject(key, `one of ${Object.values(LogLevel).join(', ')}`);
  }

  private reject(key: string, expected: string): undefined {
    this.errors.push(`${key} must be ${expected}, got ${JSON.stringify(this.raw[key])}`);
    return undefined;
  }
}
