/**
 * Built-in default values for the Pipewright configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { PipewrightConfig } from './config-schema.js'

export const DEFAULT_CONFIG: PipewrightConfig = {
  global: {
    log_level: 'info',
    data_dir: '.pipewright',
  },
  vcs: {
    provider: 'gitlab',
    base_url: 'https://gitlab.com',
    request_timeout_ms: 10_000,
    branch_prefix: 'pipewright/pipeline',
    pipeline_file: '.gitlab-ci.yml',
    image_build_file: 'Dockerfile',
    commit_message: 'ci: add generated pipeline configuration',
    lint_before_commit: true,
  },
  model: {
    provider: 'ollama',
    base_url: 'http://localhost:11434',
    model: 'llama3.1',
    // below monitor.poll_interval_ms
    timeout_ms: 25_000,
    temperature: 0.2,
  },
  store: {
    backend: 'sqlite',
    sqlite_path: 'pipewright.db',
    chroma_url: 'http://localhost:8000',
    templates_collection: 'pipeline_templates',
    learned_collection: 'learned_pipelines',
    feedback_collection: 'pipeline_feedback',
    learned_candidates: 10,
    request_timeout_ms: 10_000,
  },
  monitor: {
    // 30 polls over a 15 minute budget
    poll_interval_ms: 30_000,
    max_wait_ms: 900_000,
  },
  healing: {
    max_attempts: 10,
    log_tail_chars: 3000,
    extra_patterns: [],
  },
  normalizer: {
    learning_stage: 'learn',
    notify_stage: 'notify',
    learning_job: 'learn_record',
    callback_variable: 'PIPEWRIGHT_CALLBACK_URL',
    callback_url: 'http://localhost:3000/api/v1/learn/record',
  },
  learning: {
    enabled: true,
    exempt_skipped_jobs: ['notify_failure'],
    feedback_limit: 3,
  },
  server: {
    host: '127.0.0.1',
    port: 3000,
  },
}
