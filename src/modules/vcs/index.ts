/**
 * Version-control module: GitLab client, repository URLs and analysis.
 */

export type {
  VcsClient,
  RepositoryRef,
  CommitAction,
  CommitActionKind,
  CommitRequest,
  ExecutionStatus,
  JobLogOptions,
  LintResult,
} from './vcs-client.js'
export { GitLabClient, mapPipelineStatus, mapJobStatus, type GitLabClientOptions } from './gitlab-client.js'
export { parseRepositoryUrl, repositoryWebUrl } from './repository-url.js'
export {
  createRepositoryAnalyzer,
  MarkerFileAnalyzer,
  detectLanguage,
  detectFramework,
  detectPackageManager,
  MARKER_TABLES,
  type RepositoryAnalyzer,
  type MarkerFileAnalyzerOptions,
  type MarkerTables,
} from './analyzer.js'
