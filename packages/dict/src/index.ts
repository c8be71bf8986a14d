export {
  type DictionaryConfig,
  type Env,
  loadDictionaryConfig,
} from "./config/dictionary-config"
export {
  compressionSchema,
  type DictionaryOptionsInput,
  dictionaryOptionsSchema,
  type EnvConfig,
  envSchema,
} from "./config/schema"
export {
  type CompressionOptions,
  DEFAULT_LOCK_TIMEOUT_MS,
  type DictionaryOptions,
} from "./core/dictionary-options"
export {
  createEntry,
  type Entry,
  type Metadata,
  type StoredRecord,
  withMetadata,
  withValue,
} from "./core/entry/entry"
export { EntryCodec } from "./core/entry/entry-codec"
export { EngineIsolation } from "./core/isolation/engine-isolation"
export type { Isolation, IsolationMode } from "./core/isolation/isolation"
export {
  SerializedIsolation,
  type SerializedIsolationDeps,
  type SerializedIsolationOptions,
} from "./core/isolation/serialized-isolation"
export {
  type DictionaryState,
  type MergeOptions,
  type MergeSource,
  PersistentDictionary,
} from "./core/persistent-dictionary"
export { createMemoryDictionary, openDictionaryFromConfig, openPersistentDictionary } from "./create"
