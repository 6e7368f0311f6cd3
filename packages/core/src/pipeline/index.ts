export {
  runSyncPipeline,
  planSync,
  selfExcludes,
  createWorkingTree,
  createRemoteWriter,
} from './sync_pipeline';
export type { PipelineResult, PipelineStage, SyncPipelineDependencies } from './sync_pipeline';
