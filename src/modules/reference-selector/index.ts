export { createReferenceSelector, ReferenceSelectorImpl } from './reference-selector-impl.js'
export type {
  ReferenceSelector,
  ReferenceSelectorOptions,
  Selection,
  SelectionKind,
  LearnedSelection,
  ExactTemplateSelection,
  PartialTemplateSelection,
  DefaultSelection,
} from './reference-selector.js'
export { compareLearnedConfigs, pickBestLearnedConfig } from './compare-learned-configs.js'
export { buildDefaultArtifact, type DefaultTemplateOptions } from './default-templates.js'
export { resolveStack, supportedLanguages, GENERIC_STACK, type LanguageStack } from './language-stacks.js'
