/**
 * Pipeline run model.
 *
 * A run is one pass through the fixed step sequence. It either completes
 * every step or stops at the first failing one.
 */

import { ExtractedArtifact } from './artifact';
import { TypedError } from './errors';

/** Terminal run states. */
export enum PipelineRunStatus {
  Succeeded = 'succeeded',
  Failed = 'failed',
}

/** Identifiers of the pipeline steps, in execution order. */
export type PipelineStepId =
  | 'terraform-stage1'
  | 'terraform-stage2'
  | 'terraform-variables'
  | 'kubernetes-manifests'
  | 'github-workflow'
  | 'dockerfile'
  | 'setup-script'
  | 'deploy-script';

/** Outcome of a single run. */
export interface PipelineRunResult {
  runId: string;
  status: PipelineRunStatus;
  startedAt: string;
  completedAt: string;
  /** Steps that finished, in order. */
  completedSteps: PipelineStepId[];
  /** Artifacts written before the run ended, in write order. */
  artifacts: ExtractedArtifact[];
  /** Set when status is Failed. */
  failedStep?: PipelineStepId;
  error?: TypedError;
}
