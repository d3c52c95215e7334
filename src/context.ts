/**
 * Run context construction.
 *
 * Loads the configuration, resolves the credential and wires the logger,
 * generation client and artifact writer together. Any configuration
 * problem comes back as a failure before a single generation call is made.
 */

import { resolve } from 'path';
import { v4 as uuid } from 'uuid';
import {
  Environment,
  loadPipelineConfig,
  resolveApiKey,
} from './config/pipeline-config';
import { failure, Result, success } from './domain/result';
import { createAdapter, GenerationClient, LLMAdapter } from './llm';
import {
  consoleLogHandler,
  createFileLogHandler,
  createLogger,
  fanOutLogHandler,
  LogHandler,
} from './logger';
import { FileSystemArtifactWriter } from './pipeline/artifact-writer';
import { PipelineContext } from './pipeline/orchestrator';

export interface CreateContextOptions {
  env: Environment;
  /** Overrides PIPELINE_CONFIG. */
  configPath?: string;
  /** Base for relative outputDir and logFile. Defaults to process.cwd(). */
  cwd?: string;
  /** Replaces the provider adapter chosen from config. */
  adapter?: LLMAdapter;
  /** Replaces the console handler; the file handler is still added when configured. */
  logHandler?: LogHandler;
  runId?: string;
}

export function createPipelineContext(options: CreateContextOptions): Result<PipelineContext> {
  const cwd = options.cwd ?? process.cwd();

  const loaded = loadPipelineConfig({ env: options.env, configPath: options.configPath });
  if (!loaded.ok) return loaded;
  const { config, warnings } = loaded.value;

  const apiKey = resolveApiKey(config.provider, options.env);
  if (!apiKey.ok) return failure(apiKey.error);

  const runId = options.runId ?? `run_${uuid()}`;
  const handlers: LogHandler[] = [options.logHandler ?? consoleLogHandler];
  if (config.logFile) {
    handlers.push(createFileLogHandler(resolve(cwd, config.logFile)));
  }
  const logger = createLogger({
    handler: handlers.length === 1 ? handlers[0] : fanOutLogHandler(...handlers),
    minLevel: config.logLevel,
    context: { component: 'infra-forge', runId },
  });

  for (const warning of warnings) logger.warn(warning);

  const generator = new GenerationClient({
    adapter: options.adapter ?? createAdapter(config.provider),
    provider: config.provider,
    model: config.model,
    apiKey: apiKey.value,
    baseUrl: config.baseUrl,
    maxOutputTokens: config.maxOutputTokens,
    temperature: config.temperature,
    logger,
  });
  const writer = new FileSystemArtifactWriter(resolve(cwd, config.outputDir));

  logger.info('Configuration loaded', {
    provider: config.provider,
    model: config.model,
    clusterName: config.clusterName,
    region: config.region,
    outputDir: writer.rootDir,
  });

  return success({ runId, config, logger, generator, writer });
}
