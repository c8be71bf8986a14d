import type { StructuredValue } from "@vellum/codec"
import { createPinoLogger } from "@vellum/logger"
import { MEMORY_PATH, MemoryBytesStore } from "@vellum/store"
import type { DictionaryConfig } from "./config/dictionary-config"
import type { DictionaryOptions } from "./core/dictionary-options"
import { PersistentDictionary } from "./core/persistent-dictionary"

export async function openPersistentDictionary<V = StructuredValue>(
  path: string,
  options: DictionaryOptions<V> = {},
): Promise<PersistentDictionary<V>> {
  return new PersistentDictionary<V>(path, options)
}

/**
 * Dictionary over a process-local map. Same semantics, nothing on disk.
 */
export function createMemoryDictionary<V = StructuredValue>(
  options: Omit<DictionaryOptions<V>, "store" | "pool"> = {},
): PersistentDictionary<V> {
  const store = new MemoryBytesStore(
    options.pageSize !== undefined ? { pageSize: options.pageSize } : {},
  )

  return new PersistentDictionary<V>(MEMORY_PATH, { ...options, store })
}

/**
 * Build a dictionary and its pino logger from loaded configuration.
 */
export function openDictionaryFromConfig<V = StructuredValue>(
  config: DictionaryConfig,
  overrides: Pick<DictionaryOptions<V>, "serializer" | "clock" | "pool"> = {},
): PersistentDictionary<V> {
  const logger = createPinoLogger(
    { level: config.logging.level, prettify: config.logging.pretty },
    { service: config.logging.service },
  )

  return new PersistentDictionary<V>(config.path, {
    ...config.dictionary,
    ...overrides,
    logger,
  })
}
