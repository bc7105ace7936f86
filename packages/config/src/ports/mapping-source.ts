export type Pair = readonly [key: unknown, value: unknown]

/**
 * Anything `loadFromMapping` can read key/value pairs from.
 *
 * - `Map`: iterated by entries
 * - any other iterable: iterated directly, each item a `[key, value]` pair
 * - plain object: iterated with `Object.entries`
 */
export type MappingSource =
  | ReadonlyMap<unknown, unknown>
  | Iterable<Pair>
  | Readonly<Record<string, unknown>>
