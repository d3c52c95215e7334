#!/usr/bin/env node
/**
 * Command-line entry point. Runs the pipeline once; no sub-commands.
 *
 * Exits 0 when every artifact was written and 1 when anything stopped
 * the run before that.
 */

import { createPipelineContext, CreateContextOptions } from './context';
import { PipelineRunStatus } from './domain/run';
import { Environment } from './config/pipeline-config';
import { createLogger } from './logger';
import { checkConnection, runPipeline } from './pipeline/orchestrator';

/** Context settings other than the environment; the binary passes none. */
export type MainOptions = Omit<CreateContextOptions, 'env'>;

export async function main(env: Environment = process.env, options: MainOptions = {}): Promise<number> {
  const created = createPipelineContext({ ...options, env });
  if (!created.ok) {
    createLogger({ handler: options.logHandler, context: { component: 'infra-forge' } }).error('Configuration error', {
      code: created.error.code,
      error: created.error.message,
    });
    return 1;
  }
  const context = created.value;

  const connection = await checkConnection(context);
  if (!connection.ok) return 1;

  const result = await runPipeline(context);
  return result.status === PipelineRunStatus.Succeeded ? 0 : 1;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
