/**
 * Artifact domain model.
 *
 * An artifact is one generated file: the body recovered from a single
 * model response, bound to the relative path it is written to.
 */

/** Artifact families, one per extractor pattern list or output format. */
export type ArtifactKind =
  | 'terraform'
  | 'kubernetes-manifest'
  | 'github-workflow'
  | 'dockerfile'
  | 'shell-script';

/** The final string written to disk. Terminal once written. */
export interface ExtractedArtifact {
  kind: ArtifactKind;
  /** Path relative to the configured output directory, '/'-separated. */
  path: string;
  content: string;
  /** Written with mode 0755 when true. */
  executable: boolean;
}

/** Fixed output locations, relative to the output directory. */
export const ARTIFACT_PATHS = {
  terraformStage1: 'terraform/Stage1/main.tf',
  terraformStage2: 'terraform/Stage2/main.tf',
  terraformVariables: 'terraform/Stage1/variables.tf',
  githubWorkflow: '.github/workflows/deploy.yml',
  dockerfile: 'Dockerfile',
  setupScript: 'scripts/setup.sh',
  deployScript: 'scripts/deploy.sh',
} as const;

/** Manifest files are named after their lower-cased kind. */
export function manifestPath(kind: string): string {
  return `${kind}.yaml`;
}
