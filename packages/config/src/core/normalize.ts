import { z } from "zod"
import type { MappingSource, Pair } from "../ports/mapping-source"
import { Bindings } from "./bindings"
import { ConfigArgumentError } from "./errors"

export type MappingBatches = {
  source: Pair[]
  bindings: Pair[]
}

const pairSchema = z.custom<Pair>((value) => Array.isArray(value) && value.length === 2, {
  error: "Expected a [key, value] pair",
})

/**
 * What a deserializer must hand back for the store to merge it.
 */
export const mappingSchema = z.union([
  z.map(z.unknown(), z.unknown()),
  z.record(z.string(), z.unknown()),
  z.array(pairSchema),
])

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === "function"
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  return typeof value
}

/**
 * Flattens one mapping source into `[key, value]` pairs, in source order.
 *
 * Every item is checked before anything is returned, so a malformed source
 * never leaves a half-applied load behind.
 */
export function toPairs(source: unknown): Pair[] {
  if (source instanceof Map) return [...source.entries()]

  if (typeof source !== "object" || source === null) {
    throw new ConfigArgumentError(
      `Config mapping source must be a Map, an iterable of pairs or an object, got ${describeValue(source)}`,
      { received: describeValue(source) },
    )
  }

  if (!isIterable(source)) return Object.entries(source)

  return Array.from(source, (item, index) => {
    const result = pairSchema.safeParse(item)

    if (!result.success) {
      throw new ConfigArgumentError(
        `Config mapping item ${index} is not a [key, value] pair, got ${describeValue(item)}`,
        { index },
      )
    }

    return result.data
  })
}

/**
 * Splits `loadFromMapping` arguments into the positional batch and the
 * keyword batch.
 *
 * At most one positional source is accepted, and a `Bindings` value may
 * only come last.
 */
export function normalizeMappingArgs(
  args: ReadonlyArray<MappingSource | Bindings>,
): MappingBatches {
  const sources: MappingSource[] = []
  let keyword: Bindings | undefined

  for (const [index, arg] of args.entries()) {
    if (arg instanceof Bindings) {
      if (index !== args.length - 1) {
        throw new ConfigArgumentError("Config bindings must be the last argument", { index })
      }
      keyword = arg
    } else {
      sources.push(arg)
    }
  }

  if (sources.length > 1) {
    throw new ConfigArgumentError(
      `Config mapping expected at most 1 source, got ${sources.length}`,
      { received: sources.length },
    )
  }

  const [source] = sources

  return {
    source: source === undefined ? [] : toPairs(source),
    bindings: keyword === undefined ? [] : Object.entries(keyword.values),
  }
}
