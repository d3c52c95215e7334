/**
 * Pipeline step definitions.
 *
 * A step pairs a prompt builder with the extractor for its artifact
 * family and the fixed path(s) the result is written to. The order of
 * PIPELINE_STEPS is the execution order.
 */

import { PipelineConfig } from '../config/pipeline-config';
import { ARTIFACT_PATHS, ArtifactKind, ExtractedArtifact, manifestPath } from '../domain/artifact';
import { PipelineStepId } from '../domain/run';
import {
  DOCKERFILE_FENCES,
  extractFenced,
  SHELL_FENCES,
  splitMultiDocument,
  SplitOptions,
  TERRAFORM_FENCES,
  YAML_FENCES,
} from '../extract';
import {
  buildDeployScriptPrompt,
  buildDockerfilePrompt,
  buildInfrastructureStage1Prompt,
  buildInfrastructureStage2Prompt,
  buildManifestsPrompt,
  buildSetupScriptPrompt,
  buildVariablesPrompt,
  buildWorkflowPrompt,
} from '../prompts';

export interface PipelineStep {
  id: PipelineStepId;
  /** Human-readable label used in log entries. */
  description: string;
  buildPrompt(config: PipelineConfig): string;
  /** Turn one model response into the artifacts to write. */
  toArtifacts(response: string, options?: SplitOptions): ExtractedArtifact[];
}

function fencedStep(params: {
  id: PipelineStepId;
  description: string;
  buildPrompt: (config: PipelineConfig) => string;
  patterns: readonly RegExp[];
  kind: ArtifactKind;
  path: string;
  executable?: boolean;
}): PipelineStep {
  return {
    id: params.id,
    description: params.description,
    buildPrompt: params.buildPrompt,
    toArtifacts: (response) => [
      {
        kind: params.kind,
        path: params.path,
        content: extractFenced(response, params.patterns),
        executable: params.executable ?? false,
      },
    ],
  };
}

const manifestsStep: PipelineStep = {
  id: 'kubernetes-manifests',
  description: 'Kubernetes manifests',
  buildPrompt: buildManifestsPrompt,
  toArtifacts: (response, options) =>
    Object.entries(splitMultiDocument(response, options)).map(([kind, content]): ExtractedArtifact => ({
      kind: 'kubernetes-manifest',
      path: manifestPath(kind),
      content,
      executable: false,
    })),
};

export const PIPELINE_STEPS: readonly PipelineStep[] = [
  fencedStep({
    id: 'terraform-stage1',
    description: 'Terraform stage 1 (VPC, EKS, ECR)',
    buildPrompt: buildInfrastructureStage1Prompt,
    patterns: TERRAFORM_FENCES,
    kind: 'terraform',
    path: ARTIFACT_PATHS.terraformStage1,
  }),
  fencedStep({
    id: 'terraform-stage2',
    description: 'Terraform stage 2 (ALB controller)',
    buildPrompt: buildInfrastructureStage2Prompt,
    patterns: TERRAFORM_FENCES,
    kind: 'terraform',
    path: ARTIFACT_PATHS.terraformStage2,
  }),
  fencedStep({
    id: 'terraform-variables',
    description: 'Terraform variables',
    buildPrompt: buildVariablesPrompt,
    patterns: TERRAFORM_FENCES,
    kind: 'terraform',
    path: ARTIFACT_PATHS.terraformVariables,
  }),
  manifestsStep,
  fencedStep({
    id: 'github-workflow',
    description: 'GitHub Actions workflow',
    buildPrompt: buildWorkflowPrompt,
    patterns: YAML_FENCES,
    kind: 'github-workflow',
    path: ARTIFACT_PATHS.githubWorkflow,
  }),
  fencedStep({
    id: 'dockerfile',
    description: 'Dockerfile',
    buildPrompt: buildDockerfilePrompt,
    patterns: DOCKERFILE_FENCES,
    kind: 'dockerfile',
    path: ARTIFACT_PATHS.dockerfile,
  }),
  fencedStep({
    id: 'setup-script',
    description: 'setup script',
    buildPrompt: buildSetupScriptPrompt,
    patterns: SHELL_FENCES,
    kind: 'shell-script',
    path: ARTIFACT_PATHS.setupScript,
    executable: true,
  }),
  fencedStep({
    id: 'deploy-script',
    description: 'deploy script',
    buildPrompt: buildDeployScriptPrompt,
    patterns: SHELL_FENCES,
    kind: 'shell-script',
    path: ARTIFACT_PATHS.deployScript,
    executable: true,
  }),
];
