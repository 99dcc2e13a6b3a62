export {
  createCommitCoordinator,
  CommitCoordinatorImpl,
  initialBranchName,
  healingBranchName,
  type CommitCoordinatorOptions,
} from './commit-coordinator-impl.js'
export type { CommitCoordinator, CommitOptions } from './commit-coordinator.js'
