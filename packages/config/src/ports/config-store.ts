import type { Bindings } from "../core/bindings"
import type { Deserializer } from "./deserializer"
import type { MappingSource } from "./mapping-source"

export type LoadFileOptions = {
  /**
   * Resolve `false` instead of rejecting when the file does not exist or is
   * a directory. Any other read failure still rejects.
   *
   * @default false
   */
  silent?: boolean
}

/**
 * A mutable configuration mapping that only ever holds constant-style
 * (UPPER_CASE) keys.
 *
 * Every loader applies the same key filter: lowercase and mixed-case keys
 * are skipped without error. Later loads overwrite earlier ones key by key.
 *
 * @example
 * ```typescript
 * const config = new ConfigStore({ PORT: 8080 })
 *
 * config.loadFromObject(defaults)
 * await config.loadFromYAML("config.yaml", { silent: true })
 * config.loadFromMapping({ HOST: "0.0.0.0" }, bindings({ DEBUG: true }))
 *
 * config.get("PORT")      // 8080, unless a later load replaced it
 * config.explain("HOST")  // "mapping"
 * ```
 */
export interface IConfigStore extends Iterable<[string, unknown]> {
  readonly size: number

  get(key: string): unknown
  has(key: string): boolean
  keys(): IterableIterator<string>
  values(): IterableIterator<unknown>
  entries(): IterableIterator<[string, unknown]>

  /** Plain-object snapshot of the current values, in insertion order. */
  toObject(): Record<string, unknown>

  /**
   * Returns the name of the load that last wrote `key`: "defaults",
   * "object", "mapping", "bindings", "set" or "file:<resolved path>".
   */
  explain(key: string): string | undefined

  /** Distinct load names that provided at least one current value. */
  sourcesUsed(): string[]

  /** Copies every constant-style property visible on `source`, inherited ones included. */
  loadFromObject(source: object): void

  /**
   * Merges at most one positional source, then an optional trailing
   * `Bindings`. Throws `ConfigArgumentError` before writing anything when
   * given more than one source.
   *
   * @returns `true`
   */
  loadFromMapping(...args: ReadonlyArray<MappingSource | Bindings>): boolean

  /**
   * Reads `file`, runs `deserializer` over its text and merges the result.
   *
   * @returns `false` when `silent` suppressed a missing file, otherwise `true`
   */
  loadFromFile(file: string, deserializer: Deserializer, options?: LoadFileOptions): Promise<boolean>

  /** `loadFromFile` with a safe YAML parser. */
  loadFromYAML(file: string, options?: LoadFileOptions): Promise<boolean>

  /** `loadFromFile` with `JSON.parse`. */
  loadFromJSON(file: string, options?: LoadFileOptions): Promise<boolean>

  /** `loadFromFile` with dotenv's parser. */
  loadFromDotenv(file: string, options?: LoadFileOptions): Promise<boolean>
}
