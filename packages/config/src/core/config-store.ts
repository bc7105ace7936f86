import fs from "node:fs/promises"
import path from "node:path"
import { createNullLogger, type Logger } from "@constcfg/logger"
import { z } from "zod"
import { dotenvDeserializer } from "../adapters/dotenv/dotenv-deserializer"
import { jsonDeserializer } from "../adapters/json/json-deserializer"
import { yamlDeserializer } from "../adapters/yaml/yaml-deserializer"
import type { IConfigStore, LoadFileOptions } from "../ports/config-store"
import type { Deserializer } from "../ports/deserializer"
import type { MappingSource, Pair } from "../ports/mapping-source"
import type { Bindings } from "./bindings"
import {
  ConfigArgumentError,
  ConfigFileError,
  ConfigFormatError,
  isMissingFileError,
} from "./errors"
import { isConstantKey } from "./is-constant-key"
import { mappingSchema, normalizeMappingArgs, toPairs } from "./normalize"

export type ConfigStoreOptions = {
  /** Receives a debug entry per load. Defaults to a no-op logger. */
  logger?: Logger

  /**
   * Base directory for resolving relative file paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function visiblePropertyNames(source: object): string[] {
  const names = new Set<string>()

  for (
    let current: object | null = source;
    current !== null;
    current = Reflect.getPrototypeOf(current)
  ) {
    for (const name of Object.getOwnPropertyNames(current)) {
      names.add(name)
    }
  }

  return [...names]
}

export class ConfigStore implements IConfigStore {
  private readonly data = new Map<string, unknown>()
  private readonly provenance = new Map<string, string>()
  private readonly logger: Logger
  private readonly cwd: string | undefined

  constructor(defaults: MappingSource = {}, options: ConfigStoreOptions = {}) {
    this.logger = (options.logger ?? createNullLogger()).child({ module: "config-store" })
    this.cwd = options.cwd

    const pairs = toPairs(defaults)
    this.record("defaults", pairs.length, this.merge(pairs, "defaults"))
  }

  get size(): number {
    return this.data.size
  }

  get(key: string): unknown {
    return this.data.get(key)
  }

  has(key: string): boolean {
    return this.data.has(key)
  }

  keys(): IterableIterator<string> {
    return this.data.keys()
  }

  values(): IterableIterator<unknown> {
    return this.data.values()
  }

  entries(): IterableIterator<[string, unknown]> {
    return this.data.entries()
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this.data.entries()
  }

  set(key: string, value: unknown): this {
    if (!isConstantKey(key)) {
      throw new ConfigArgumentError(`Configuration keys must be upper case, got "${key}"`, {
        key,
      })
    }

    this.data.set(key, value)
    this.provenance.set(key, "set")

    return this
  }

  delete(key: string): boolean {
    this.provenance.delete(key)

    return this.data.delete(key)
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.data)
  }

  toJSON(): Record<string, unknown> {
    return this.toObject()
  }

  explain(key: string): string | undefined {
    return this.provenance.get(key)
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  loadFromObject(source: object): void {
    const pairs: Pair[] = []

    for (const name of visiblePropertyNames(source)) {
      if (isConstantKey(name)) {
        const value: unknown = Reflect.get(source, name)
        pairs.push([name, value])
      }
    }

    // Only the object's own lowercase names count as skipped, never the prototype's.
    const skipped = Object.getOwnPropertyNames(source).filter((name) => !isConstantKey(name))
    const loaded = this.merge(pairs, "object")

    this.record("object", loaded + skipped.length, loaded)
  }

  loadFromMapping(...args: ReadonlyArray<MappingSource | Bindings>): boolean {
    return this.update(args, "mapping")
  }

  async loadFromFile(
    file: string,
    deserializer: Deserializer,
    options: LoadFileOptions = {},
  ): Promise<boolean> {
    const filePath = path.resolve(this.cwd ?? process.cwd(), file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (options.silent && isMissingFileError(err)) {
        this.logger.debug("configuration file skipped", { file: filePath, err })

        return false
      }

      throw new ConfigFileError(filePath, err)
    }

    const result = mappingSchema.safeParse(deserializer(content))

    if (!result.success) {
      throw new ConfigFormatError(filePath, z.prettifyError(result.error))
    }

    return this.update([result.data], `file:${filePath}`)
  }

  loadFromYAML(file: string, options: LoadFileOptions = {}): Promise<boolean> {
    return this.loadFromFile(file, yamlDeserializer, options)
  }

  loadFromJSON(file: string, options: LoadFileOptions = {}): Promise<boolean> {
    return this.loadFromFile(file, jsonDeserializer, options)
  }

  loadFromDotenv(file: string, options: LoadFileOptions = {}): Promise<boolean> {
    return this.loadFromFile(file, dotenvDeserializer, options)
  }

  private update(args: ReadonlyArray<MappingSource | Bindings>, source: string): boolean {
    const batches = normalizeMappingArgs(args)
    const loaded = this.merge(batches.source, source) + this.merge(batches.bindings, "bindings")

    this.record(source, batches.source.length + batches.bindings.length, loaded)

    return true
  }

  private merge(pairs: readonly Pair[], source: string): number {
    let loaded = 0

    for (const [key, value] of pairs) {
      if (!isConstantKey(key)) continue

      this.data.set(key, value)
      this.provenance.set(key, source)
      loaded++
    }

    return loaded
  }

  private record(source: string, seen: number, loaded: number): void {
    this.logger.debug("configuration loaded", { source, loaded, skipped: seen - loaded })
  }
}
