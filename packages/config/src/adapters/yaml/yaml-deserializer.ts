import { parseDocument } from "yaml"
import type { Deserializer } from "../../ports/deserializer"

/**
 * Parses a single YAML 1.1 document, so `yes`/`no` and `on`/`off` are
 * booleans, `0644` is octal and `<<` merge keys are applied.
 *
 * Tags the 1.1 schema does not know (`!!js/function`, `!!python/object`,
 * ...) are rejected instead of being kept as plain scalars, and so are
 * multi-document streams.
 */
export const yamlDeserializer: Deserializer = (content) => {
  const doc = parseDocument(content, { version: "1.1", merge: true })

  const [error] = doc.errors
  if (error) throw error

  const unresolved = doc.warnings.find((warning) => warning.code === "TAG_RESOLVE_FAILED")
  if (unresolved) throw unresolved

  return doc.toJS()
}
