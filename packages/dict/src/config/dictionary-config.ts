import { ConfigurationError } from "@vellum/errors"
import type { LogLevelName } from "@vellum/logger"
import type { JournalMode } from "@vellum/store"
import { z } from "zod/mini"
import type { CompressionOptions } from "../core/dictionary-options"
import type { IsolationMode } from "../core/isolation/isolation"
import { envSchema } from "./schema"

export type DictionaryConfig = {
  path: string
  dictionary: {
    isolation: IsolationMode
    compression: CompressionOptions
    busyTimeoutMs: number
    lockTimeoutMs: number
    journalMode: JournalMode
    pageSize: number
  }
  logging: {
    level: LogLevelName
    pretty: boolean
    service: string
  }
}

export type Env = Record<string, string | undefined>

/**
 * Read `VELLUM_*` and logging variables, applying defaults.
 *
 * @throws ConfigurationError listing every invalid variable.
 */
export function loadDictionaryConfig(env: Env = process.env): DictionaryConfig {
  const provided: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") provided[key] = value
  }

  const result = envSchema.safeParse(provided)

  if (!result.success) {
    throw new ConfigurationError(z.prettifyError(result.error))
  }

  const e = result.data

  return {
    path: e.VELLUM_PATH,
    dictionary: {
      isolation: e.VELLUM_ISOLATION,
      compression:
        e.VELLUM_COMPRESSION === "none"
          ? { kind: "none" }
          : { kind: "deflate", level: e.VELLUM_COMPRESSION_LEVEL },
      busyTimeoutMs: e.VELLUM_BUSY_TIMEOUT_MS,
      lockTimeoutMs: e.VELLUM_LOCK_TIMEOUT_MS,
      journalMode: e.VELLUM_JOURNAL_MODE,
      pageSize: e.VELLUM_PAGE_SIZE,
    },
    logging: {
      level: e.LOG_LEVEL,
      pretty: e.LOG_PRETTY,
      service: e.SERVICE_NAME,
    },
  }
}
