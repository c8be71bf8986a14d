import { logLevelNames } from "@vellum/logger"
import { z } from "zod/mini"

const integerIn = (min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  [
    z.refine<number>((n: number) => Number.isInteger(n), "Expected an integer"),
    z.minimum(min),
    z.maximum(max),
  ] as const

const isolationModes = ["serialized", "engine"] as const
const journalModes = ["wal", "delete"] as const

export const compressionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("deflate"),
    level: z.optional(z.number().check(...integerIn(0, 9))),
  }),
  z.object({ kind: z.literal("none") }),
])

/**
 * Plain-data dictionary options. Injected collaborators (serializer, clock,
 * logger, store, pool) are not part of the schema.
 */
export const dictionaryOptionsSchema = z.object({
  isolation: z.optional(z.enum(isolationModes)),
  compression: z.optional(compressionSchema),
  busyTimeoutMs: z.optional(z.number().check(...integerIn(0))),
  lockTimeoutMs: z.optional(z.number().check(...integerIn(0))),
  journalMode: z.optional(z.enum(journalModes)),
  pageSize: z.optional(z.number().check(...integerIn(1))),
})

export const envSchema = z.object({
  VELLUM_PATH: z._default(z.string().check(z.minLength(1)), "cache.db"),
  VELLUM_ISOLATION: z._default(z.enum(isolationModes), "serialized"),
  VELLUM_COMPRESSION: z._default(z.enum(["deflate", "none"]), "deflate"),
  VELLUM_COMPRESSION_LEVEL: z._default(z.coerce.number().check(...integerIn(0, 9)), 6),
  VELLUM_BUSY_TIMEOUT_MS: z._default(z.coerce.number().check(...integerIn(0)), 10_000),
  VELLUM_LOCK_TIMEOUT_MS: z._default(z.coerce.number().check(...integerIn(0)), 10_000),
  VELLUM_JOURNAL_MODE: z._default(z.enum(journalModes), "wal"),
  VELLUM_PAGE_SIZE: z._default(z.coerce.number().check(...integerIn(1)), 256),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
  SERVICE_NAME: z._default(z.string(), "vellum"),
})

export type DictionaryOptionsInput = z.infer<typeof dictionaryOptionsSchema>
export type EnvConfig = z.infer<typeof envSchema>
