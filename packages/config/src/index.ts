export { dotenvDeserializer } from "./adapters/dotenv/dotenv-deserializer"
export { jsonDeserializer } from "./adapters/json/json-deserializer"
export { yamlDeserializer } from "./adapters/yaml/yaml-deserializer"
export { Bindings, bindings } from "./core/bindings"
export { ConfigStore, type ConfigStoreOptions } from "./core/config-store"
export {
  ConfigArgumentError,
  ConfigError,
  type ConfigErrorOptions,
  ConfigFileError,
  ConfigFormatError,
  isMissingFileError,
  type SystemErrorDetails,
  systemErrorDetails,
} from "./core/errors"
export { isConstantKey } from "./core/is-constant-key"
export type { IConfigStore, LoadFileOptions } from "./ports/config-store"
export type { Deserializer } from "./ports/deserializer"
export type { AppError, ErrorCode, ErrorContext } from "./ports/error"
export type { MappingSource, Pair } from "./ports/mapping-source"
