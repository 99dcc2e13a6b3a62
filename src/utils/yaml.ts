/**
 * js-yaml helpers shared by the artifact builders.
 */

import yaml, { type DumpOptions } from 'js-yaml'

const DUMP_OPTIONS: DumpOptions = {
  lineWidth: -1,
  noRefs: true,
  quotingType: '"',
}

/** Serialize a pipeline document; key order is preserved */
export function dumpYaml(value: unknown): string {
  return yaml.dump(value, DUMP_OPTIONS)
}

/**
 * Parse YAML text.
 * @returns the parsed value, or an Error describing the syntax problem
 */
export function loadYaml(text: string): unknown {
  try {
    return yaml.load(text)
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err))
  }
}
