export {
  extractFenced,
  TERRAFORM_FENCES,
  YAML_FENCES,
  DOCKERFILE_FENCES,
  SHELL_FENCES,
} from './fenced';
export {
  splitMultiDocument,
  SplitOptions,
  DOCUMENT_SEPARATOR,
  FALLBACK_KIND_MARKERS,
} from './multi-document';
