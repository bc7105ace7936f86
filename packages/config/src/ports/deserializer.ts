/**
 * Turns the text of a configuration file into a mapping.
 *
 * The result must be a plain object, a `Map`, or an array of `[key, value]`
 * pairs. Malformed input should throw; the store lets that error through
 * unchanged, whatever the `silent` flag says.
 *
 * @example
 * ```ts
 * await store.loadFromFile("settings.json", (content) => JSON.parse(content))
 * ```
 */
export type Deserializer = (content: string) => unknown
