/**
 * Core domain types shared across Pipewright modules.
 */

// ---------------------------------------------------------------------------
// Workflow request
// ---------------------------------------------------------------------------

/** Immutable input for a single workflow invocation */
export interface WorkflowRequest {
  readonly repositoryUrl: string
  readonly credential: string
  readonly additionalContext?: string
  /** Commit only the pipeline definition and leave the image-build file untouched */
  readonly pipelineOnly?: boolean
  /** Explicit branch for the initial commit (healing attempts derive from it) */
  readonly branchName?: string
}

// ---------------------------------------------------------------------------
// Repository profile
// ---------------------------------------------------------------------------

export interface RepositoryProfile {
  readonly language: string
  readonly framework: string
  readonly packageManager: string
  readonly hasExistingPipelineFiles: boolean
  /** Root-level file names the detection looked at */
  readonly files: readonly string[]
}

// ---------------------------------------------------------------------------
// Pipeline artifact
// ---------------------------------------------------------------------------

export type ArtifactSource = 'learned' | 'exact_template' | 'partial_template' | 'generated'

export interface ArtifactProvenance {
  readonly source: ArtifactSource
  readonly templateId?: string
}

/** Pipeline definition + image-build definition pair */
export interface PipelineArtifact {
  readonly pipelineDefinition: string
  readonly imageBuildDefinition: string
  readonly provenance: ArtifactProvenance
}

/** Either half of an artifact, as supplied by a partial template */
export interface PartialArtifact {
  readonly pipelineDefinition?: string
  readonly imageBuildDefinition?: string
}

// ---------------------------------------------------------------------------
// Learned configuration
// ---------------------------------------------------------------------------

export interface LearnedConfig {
  readonly id: string
  readonly language: string
  readonly framework: string
  readonly pipelineId: string
  readonly durationSeconds: number
  readonly stagesPassedCount: number
  readonly timestamp: string
  readonly content: {
    readonly pipelineDefinition: string
    readonly imageBuildDefinition: string
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export type ExecutionState = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELED' | 'TIMED_OUT'

export const TERMINAL_EXECUTION_STATES: ReadonlySet<ExecutionState> = new Set<ExecutionState>([
  'SUCCEEDED',
  'FAILED',
  'CANCELED',
])

/** Returned by the Commit Coordinator; consumed by the Execution Monitor */
export interface ExecutionHandle {
  readonly branch: string
  readonly commitId: string
  readonly startedAt: string
}

export type JobState =
  | 'created'
  | 'pending'
  | 'running'
  | 'success'
  | 'failed'
  | 'canceled'
  | 'skipped'
  | 'manual'

export interface JobStatus {
  readonly id: string
  readonly name: string
  readonly stage: string
  readonly state: JobState
  /** Failure of this job does not fail the execution */
  readonly allowFailure: boolean
}

export interface JobLog {
  readonly jobName: string
  readonly stage: string
  readonly state: JobState
  readonly logText: string
}

// ---------------------------------------------------------------------------
// Self-healing
// ---------------------------------------------------------------------------

export interface HealingAttempt {
  readonly attemptNumber: number
  readonly errorClass: string
  readonly fixDescription: string
  readonly newExecutionHandle: ExecutionHandle
}

/** A fix that made a failing pipeline pass, kept for later prompts */
export interface FixFeedback {
  readonly id: string
  readonly language: string
  readonly framework: string
  readonly errorClass: string
  readonly fixDescription: string
  readonly timestamp: string
}
