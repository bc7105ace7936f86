import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Writable } from "node:stream"
import { PinoLogger } from "@constcfg/logger"
import { stringify } from "yaml"
import { ConfigStore } from "../config-store"
import { ConfigFileError, ConfigFormatError } from "../errors"

function parseJson(content: string): unknown {
  return JSON.parse(content)
}

function permissionDenied(filePath: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, open '${filePath}'`), {
    code: "EACCES",
    errno: -13,
    syscall: "open",
    path: filePath,
  })
}

describe("ConfigStore file loading e2e", () => {
  let cwd: string
  let store: ConfigStore

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-store-"))
    store = new ConfigStore({}, { cwd })
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  describe("loadFromFile", () => {
    it("hands the file text to the deserializer and merges the result", async () => {
      await fs.writeFile(path.join(cwd, "config.json"), '{"PORT":3000,"host":"localhost"}')
      const deserializer = vi.fn(parseJson)

      await expect(store.loadFromFile("config.json", deserializer)).resolves.toBe(true)

      expect(deserializer).toHaveBeenCalledWith('{"PORT":3000,"host":"localhost"}')
      expect(store.toObject()).toEqual({ PORT: 3000 })
      expect(store.explain("PORT")).toBe(`file:${path.join(cwd, "config.json")}`)
    })

    it("accepts absolute paths", async () => {
      const filePath = path.join(cwd, "absolute.json")
      await fs.writeFile(filePath, '{"KEY":"value"}')
      const elsewhere = new ConfigStore({}, { cwd: os.tmpdir() })

      await elsewhere.loadFromFile(filePath, parseJson)

      expect(elsewhere.toObject()).toEqual({ KEY: "value" })
      expect(elsewhere.explain("KEY")).toBe(`file:${filePath}`)
    })

    it("records the same resolved path in provenance and in the log", async () => {
      const entries: Record<string, unknown>[] = []
      const destination = new Writable({
        write(chunk, _encoding, callback) {
          entries.push(JSON.parse(chunk.toString("utf8")))
          callback()
        },
      })
      store = new ConfigStore(
        {},
        { cwd, logger: new PinoLogger({ level: "debug", destination }) },
      )
      await fs.mkdir(path.join(cwd, "conf"))
      await fs.writeFile(path.join(cwd, "conf", "app.json"), '{"PORT":3000}')
      entries.length = 0

      await store.loadFromFile("conf/../conf/app.json", parseJson)

      expect(store.explain("PORT")).toBe(`file:${path.join(cwd, "conf", "app.json")}`)
      expect(entries[0]).toMatchObject({
        msg: "configuration loaded",
        source: `file:${path.join(cwd, "conf", "app.json")}`,
        loaded: 1,
        skipped: 0,
      })
    })

    it("does not expose file values until the load has been awaited", async () => {
      await fs.writeFile(path.join(cwd, "config.json"), '{"PORT":3000}')

      const pending = store.loadFromFile("config.json", parseJson)

      expect(store.get("PORT")).toBeUndefined()
      await pending
      expect(store.get("PORT")).toBe(3000)
    })

    it("merges an array of pairs", async () => {
      await fs.writeFile(path.join(cwd, "pairs.json"), '[["A",1],["b",2]]')

      await store.loadFromFile("pairs.json", parseJson)

      expect(store.toObject()).toEqual({ A: 1 })
    })

    it("is idempotent", async () => {
      await fs.writeFile(path.join(cwd, "config.json"), '{"PORT":3000,"HOST":"localhost"}')

      await store.loadFromFile("config.json", parseJson)
      const once = store.toObject()
      await store.loadFromFile("config.json", parseJson)

      expect(store.toObject()).toEqual(once)
    })

    describe("missing files", () => {
      it("resolves false when silent and leaves the store unchanged", async () => {
        store = new ConfigStore({ PORT: 8080 }, { cwd })
        const deserializer = vi.fn(parseJson)

        await expect(
          store.loadFromFile("missing.yaml", deserializer, { silent: true }),
        ).resolves.toBe(false)

        expect(deserializer).not.toHaveBeenCalled()
        expect(store.toObject()).toEqual({ PORT: 8080 })
      })

      it("rejects with an annotated ConfigFileError when not silent", async () => {
        const filePath = path.join(cwd, "missing.yaml")

        const err = await store.loadFromFile("missing.yaml", parseJson).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(ConfigFileError)
        expect(err).toMatchObject({
          message: `Unable to load configuration file: ENOENT: no such file or directory, open '${filePath}'`,
          code: "config_file_unreadable",
          path: filePath,
          systemCode: "ENOENT",
          syscall: "open",
        })
        expect(err).toHaveProperty("cause.code", "ENOENT")
        expect(store.size).toBe(0)
      })

      it("treats an absolute missing path the same way", async () => {
        await expect(
          store.loadFromFile("/nonexistent/path.yaml", parseJson, { silent: true }),
        ).resolves.toBe(false)
        await expect(store.loadFromFile("/nonexistent/path.yaml", parseJson)).rejects.toThrow(
          ConfigFileError,
        )
      })
    })

    describe("directories", () => {
      it("resolves false when silent", async () => {
        await fs.mkdir(path.join(cwd, "conf.d"))

        await expect(store.loadFromFile("conf.d", parseJson, { silent: true })).resolves.toBe(
          false,
        )
        expect(store.size).toBe(0)
      })

      it("rejects with EISDIR when not silent", async () => {
        await fs.mkdir(path.join(cwd, "conf.d"))

        const err = await store.loadFromFile("conf.d", parseJson).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(ConfigFileError)
        expect(err).toMatchObject({ systemCode: "EISDIR", path: path.join(cwd, "conf.d") })
      })
    })

    describe("other read failures", () => {
      it("rejects on permission errors even when silent", async () => {
        const filePath = path.join(cwd, "locked.json")
        vi.spyOn(fs, "readFile").mockRejectedValueOnce(permissionDenied(filePath))

        const err = await store
          .loadFromFile("locked.json", parseJson, { silent: true })
          .catch((e: unknown) => e)

        expect(err).toBeInstanceOf(ConfigFileError)
        expect(err).toMatchObject({
          message: `Unable to load configuration file: EACCES: permission denied, open '${filePath}'`,
          systemCode: "EACCES",
          errno: -13,
          syscall: "open",
        })
      })
    })

    describe("deserializer output", () => {
      it("lets deserializer errors through unchanged, even when silent", async () => {
        await fs.writeFile(path.join(cwd, "broken.json"), "{ invalid json }")
        const failure = new SyntaxError("Unexpected token")

        const err = await store
          .loadFromFile(
            "broken.json",
            () => {
              throw failure
            },
            { silent: true },
          )
          .catch((e: unknown) => e)

        expect(err).toBe(failure)
        expect(store.size).toBe(0)
      })

      it("rejects output that is not a mapping", async () => {
        await fs.writeFile(path.join(cwd, "list.json"), '["A","B"]')

        const err = await store.loadFromFile("list.json", parseJson).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(ConfigFormatError)
        expect(err).toMatchObject({
          code: "config_format_invalid",
          path: path.join(cwd, "list.json"),
        })
        expect(store.size).toBe(0)
      })

      it("rejects malformed pairs without a partial write", async () => {
        await fs.writeFile(path.join(cwd, "pairs.json"), '[["A",1],["B"]]')

        await expect(store.loadFromFile("pairs.json", parseJson)).rejects.toThrow(
          ConfigFormatError,
        )
        expect(store.has("A")).toBe(false)
      })
    })

    it("logs a skipped file at debug level", async () => {
      const entries: Record<string, unknown>[] = []
      const destination = new Writable({
        write(chunk, _encoding, callback) {
          entries.push(JSON.parse(chunk.toString("utf8")))
          callback()
        },
      })
      store = new ConfigStore(
        {},
        { cwd, logger: new PinoLogger({ level: "debug", destination }) },
      )
      entries.length = 0

      await store.loadFromFile("missing.json", parseJson, { silent: true })

      expect(entries).toHaveLength(1)
      expect(entries[0]).toMatchObject({
        level: 20,
        msg: "configuration file skipped",
        module: "config-store",
        file: path.join(cwd, "missing.json"),
      })
      expect(entries[0]).toHaveProperty("err.code", "ENOENT")
    })
  })

  describe("loadFromYAML", () => {
    it("loads constant keys from a YAML mapping", async () => {
      await fs.writeFile(
        path.join(cwd, "config.yaml"),
        "PORT: 3000\nhost: localhost\nDATABASE:\n  url: postgres://localhost\n",
      )

      await expect(store.loadFromYAML("config.yaml")).resolves.toBe(true)

      expect(store.toObject()).toEqual({ PORT: 3000, DATABASE: { url: "postgres://localhost" } })
      expect(store.explain("PORT")).toBe(`file:${path.join(cwd, "config.yaml")}`)
    })

    it("round-trips a serialized mapping", async () => {
      const original = {
        PORT: 3000,
        HOST: "localhost",
        RATIO: 0.5,
        ENABLED: true,
        FLAGS: ["a", "b"],
        NESTED: { DEPTH: 2, NAME: "inner" },
        EMPTY: null,
      }
      await fs.writeFile(path.join(cwd, "round-trip.yaml"), stringify(original))

      await store.loadFromYAML("round-trip.yaml")

      expect(store.toObject()).toEqual(original)
    })

    it("follows the silent policy for missing files", async () => {
      await expect(store.loadFromYAML("missing.yaml", { silent: true })).resolves.toBe(false)
      await expect(store.loadFromYAML("missing.yaml")).rejects.toThrow(ConfigFileError)
    })

    it("rejects an empty document as a non-mapping", async () => {
      await fs.writeFile(path.join(cwd, "empty.yaml"), "")

      await expect(store.loadFromYAML("empty.yaml")).rejects.toThrow(ConfigFormatError)
    })

    it("rejects unsafe tags", async () => {
      await fs.writeFile(
        path.join(cwd, "unsafe.yaml"),
        "HOOK: !!js/function 'function () { return 1 }'\n",
      )

      await expect(store.loadFromYAML("unsafe.yaml")).rejects.toThrow(/Unresolved tag/)
      expect(store.size).toBe(0)
    })
  })

  describe("loadFromJSON", () => {
    it("loads constant keys from a JSON object", async () => {
      await fs.writeFile(
        path.join(cwd, "config.json"),
        JSON.stringify({ PORT: 3000, HOST: "localhost", debug: true }),
      )

      await expect(store.loadFromJSON("config.json")).resolves.toBe(true)

      expect(store.toObject()).toEqual({ PORT: 3000, HOST: "localhost" })
    })

    it("lets JSON syntax errors through", async () => {
      await fs.writeFile(path.join(cwd, "config.json"), "{ invalid json }")

      await expect(store.loadFromJSON("config.json", { silent: true })).rejects.toThrow(
        SyntaxError,
      )
    })
  })

  describe("loadFromDotenv", () => {
    it("loads constant keys as strings", async () => {
      await fs.writeFile(
        path.join(cwd, ".env"),
        "PORT=3000\nHOST=localhost\n# comment\nlog_level=debug\n",
      )

      await expect(store.loadFromDotenv(".env")).resolves.toBe(true)

      expect(store.toObject()).toEqual({ PORT: "3000", HOST: "localhost" })
      expect(store.explain("HOST")).toBe(`file:${path.join(cwd, ".env")}`)
    })

    it("skips a missing optional file", async () => {
      await expect(store.loadFromDotenv(".env.local", { silent: true })).resolves.toBe(false)
    })
  })

  describe("precedence", () => {
    it("later loads override earlier ones", async () => {
      await fs.writeFile(path.join(cwd, "base.json"), JSON.stringify({ A: "json", B: "json", C: "json" }))
      await fs.writeFile(path.join(cwd, ".env"), "B=dotenv\nC=dotenv")

      store.loadFromObject({ A: "object", B: "object", C: "object", D: "object" })
      await store.loadFromJSON("base.json")
      await store.loadFromDotenv(".env")
      store.loadFromMapping({ C: "mapping" })

      expect(store.toObject()).toEqual({ A: "json", B: "dotenv", C: "mapping", D: "object" })
      expect(store.sourcesUsed()).toEqual([
        `file:${path.join(cwd, "base.json")}`,
        `file:${path.join(cwd, ".env")}`,
        "mapping",
        "object",
      ])
    })
  })
})
