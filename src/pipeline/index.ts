export {
  ArtifactWriter,
  FileSystemArtifactWriter,
  MemoryArtifactWriter,
  EXECUTABLE_MODE,
} from './artifact-writer';
export { PipelineStep, PIPELINE_STEPS } from './steps';
export { PipelineContext, checkConnection, runPipeline } from './orchestrator';
