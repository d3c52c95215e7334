/**
 * infra-forge: generates EKS deployment artifacts (Terraform, Kubernetes
 * manifests, CI workflow, Dockerfile, shell scripts) with a generative
 * language model.
 *
 * Public exports for programmatic use; the CLI lives in ./cli.
 */

export * from './domain';
export * from './extract';
export * from './llm';
export * from './logger';
export * from './pipeline';
export * from './prompts';
export * from './config/pipeline-config';
export { createPipelineContext, CreateContextOptions } from './context';
