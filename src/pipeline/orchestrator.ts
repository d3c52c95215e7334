/**
 * Orchestrator: runs the pipeline steps one after another.
 *
 * For each step: build the prompt, generate, extract, write. The next
 * step's generation call starts only after the previous step's files are
 * written. The first failure ends the run; nothing is retried or rolled
 * back.
 */

import { PipelineConfig } from '../config/pipeline-config';
import { ExtractedArtifact } from '../domain/artifact';
import { artifactWriteError, describeError, TypedError } from '../domain/errors';
import { PipelineRunResult, PipelineRunStatus, PipelineStepId } from '../domain/run';
import { GenerationResult, TextGenerator } from '../llm/generation-client';
import { Logger } from '../logger';
import { CONNECTION_CHECK_PROMPT } from '../prompts';
import { ArtifactWriter } from './artifact-writer';
import { PIPELINE_STEPS, PipelineStep } from './steps';

/** Everything a run needs, built once at startup. */
export interface PipelineContext {
  runId: string;
  config: PipelineConfig;
  logger: Logger;
  generator: TextGenerator;
  writer: ArtifactWriter;
}

/** Characters of a dropped fragment included in its warning. */
const DROPPED_PREVIEW_CHARS = 80;

/**
 * Send the connection-check prompt. A failure here means the run should
 * not start.
 */
export async function checkConnection(context: PipelineContext): Promise<GenerationResult> {
  const result = await context.generator.generate(CONNECTION_CHECK_PROMPT);
  if (result.ok) {
    context.logger.info('Connection check succeeded', { response: result.value.text.trim() });
  } else {
    context.logger.error('Connection check failed', { code: result.error.code, error: result.error.message });
  }
  return result;
}

/** Execute every step in order and report how far the run got. */
export async function runPipeline(
  context: PipelineContext,
  steps: readonly PipelineStep[] = PIPELINE_STEPS,
): Promise<PipelineRunResult> {
  const { config, logger, generator, writer } = context;
  const startedAt = new Date().toISOString();
  const completedSteps: PipelineStepId[] = [];
  const artifacts: ExtractedArtifact[] = [];

  const finish = (failedStep?: PipelineStepId, error?: TypedError): PipelineRunResult => {
    const result: PipelineRunResult = {
      runId: context.runId,
      status: error ? PipelineRunStatus.Failed : PipelineRunStatus.Succeeded,
      startedAt,
      completedAt: new Date().toISOString(),
      completedSteps,
      artifacts,
    };
    if (error) {
      result.failedStep = failedStep;
      result.error = { ...error, stepId: failedStep };
      logger.error('Pipeline failed', { step: failedStep, code: error.code, error: error.message });
    } else {
      logger.info('Pipeline completed', { artifacts: artifacts.map((a) => a.path) });
    }
    return result;
  };

  logger.info('Starting pipeline', { steps: steps.map((s) => s.id) });

  for (const step of steps) {
    const stepLogger = logger.child({ step: step.id });
    stepLogger.info(`Generating ${step.description}`);

    const generated = await generator.generate(step.buildPrompt(config));
    if (!generated.ok) {
      return finish(step.id, generated.error);
    }

    const stepArtifacts = step.toArtifacts(generated.value.text, {
      onDrop: (fragment, index) => {
        stepLogger.warn('Dropped document without a recognizable kind', {
          index,
          preview: fragment.slice(0, DROPPED_PREVIEW_CHARS),
        });
      },
    });
    if (stepArtifacts.length === 0) {
      stepLogger.warn('Response produced no artifacts');
    }

    for (const artifact of stepArtifacts) {
      try {
        const location = await writer.write(artifact);
        stepLogger.info('Wrote artifact', { path: artifact.path, location, bytes: Buffer.byteLength(artifact.content) });
      } catch (err) {
        return finish(step.id, artifactWriteError(artifact.path, describeError(err)));
      }
      artifacts.push(artifact);
    }

    completedSteps.push(step.id);
  }

  return finish();
}
