/**
 * Built-in per-language default artifacts.
 *
 * The last retrieval tier: always available, never touches the store.
 * Pipelines end at the notification stage; the learning stage and job are
 * added by the artifact normalizer like for every other source.
 */

import type { PipelineArtifact } from '../../core/types.js'
import { dumpYaml } from '../../utils/yaml.js'
import { resolveStack, type LanguageStack } from './language-stacks.js'

export interface DefaultTemplateOptions {
  /** Image-build file the kaniko job builds from */
  imageBuildFile?: string
  notifyStage?: string
}

const KANIKO_IMAGE = 'gcr.io/kaniko-project/executor:v1.23.2-debug'
const CURL_IMAGE = 'curlimages/curl:8.8.0'

function buildPipeline(stack: LanguageStack, options: Required<DefaultTemplateOptions>): Record<string, unknown> {
  const compile: Record<string, unknown> = {
    stage: 'compile',
    image: stack.buildImage,
    script: [...stack.compile],
  }
  if (stack.artifacts.length > 0) {
    compile['artifacts'] = { paths: [...stack.artifacts], expire_in: '1 hour' }
  }

  return {
    stages: ['compile', 'test', 'build_image', options.notifyStage],
    variables: {
      DOCKER_IMAGE: '$CI_REGISTRY_IMAGE:$CI_COMMIT_SHORT_SHA',
    },
    compile,
    test: {
      stage: 'test',
      image: stack.buildImage,
      script: [...stack.test],
    },
    build_image: {
      stage: 'build_image',
      image: { name: KANIKO_IMAGE, entrypoint: [''] },
      script: [
        'mkdir -p /kaniko/.docker',
        'echo "{\\"auths\\":{\\"$CI_REGISTRY\\":{\\"username\\":\\"$CI_REGISTRY_USER\\",\\"password\\":\\"$CI_REGISTRY_PASSWORD\\"}}}" > /kaniko/.docker/config.json',
        `/kaniko/executor --context "$CI_PROJECT_DIR" --dockerfile "$CI_PROJECT_DIR/${options.imageBuildFile}" --destination "$DOCKER_IMAGE"`,
      ],
    },
    notify_success: {
      stage: options.notifyStage,
      image: CURL_IMAGE,
      script: ['echo "Pipeline $CI_PIPELINE_ID succeeded for $CI_PROJECT_NAME"'],
      when: 'on_success',
    },
    notify_failure: {
      stage: options.notifyStage,
      image: CURL_IMAGE,
      script: ['echo "Pipeline $CI_PIPELINE_ID failed for $CI_PROJECT_NAME"'],
      when: 'on_failure',
    },
  }
}

/**
 * Default artifact for a language. Unknown languages get the generic
 * polyglot stack. `framework` only labels the template id.
 */
export function buildDefaultArtifact(
  language: string,
  framework: string,
  options: DefaultTemplateOptions = {},
): PipelineArtifact {
  const stack = resolveStack(language)
  const resolved: Required<DefaultTemplateOptions> = {
    imageBuildFile: options.imageBuildFile ?? 'Dockerfile',
    notifyStage: options.notifyStage ?? 'notify',
  }
  return {
    pipelineDefinition: dumpYaml(buildPipeline(stack, resolved)),
    imageBuildDefinition: `${stack.imageBuild.join('\n')}\n`,
    provenance: {
      source: 'generated',
      templateId: `default_${stack.language}_${framework.toLowerCase() || 'generic'}`,
    },
  }
}
