export {
  ProgressStore,
  createProgressStore,
  type ProgressEvent,
  type ProgressStage,
  type ProgressStoreOptions,
  type WorkflowPhase,
  type WorkflowProgress,
} from './progress-store.js'
