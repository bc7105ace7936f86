/**
 * Keyword-style key/value pairs for `loadFromMapping`.
 *
 * Passed last, after the positional source, and applied after it, so a
 * binding wins over the source for the same key.
 *
 * @example
 * ```ts
 * store.loadFromMapping(fileValues, bindings({ DEBUG: true }))
 * ```
 */
export class Bindings {
  readonly values: Readonly<Record<string, unknown>>

  constructor(values: Readonly<Record<string, unknown>>) {
    this.values = Object.freeze({ ...values })
  }
}

export function bindings(values: Readonly<Record<string, unknown>>): Bindings {
  return new Bindings(values)
}
