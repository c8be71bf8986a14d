import { FakeClock } from "@vellum/clock"
import {
  ClosedError,
  CorruptionError,
  InvalidKeyError,
  KeyNotFoundError,
  SerializationError,
} from "@vellum/errors"
import type { BytesStore } from "@vellum/store"
import type { DictionaryOptions } from "../dictionary-options"
import type { PersistentDictionary } from "../persistent-dictionary"

export type DictionaryHarness = {
  name: string
  make: (opts: DictionaryOptions<unknown>) => {
    dict: PersistentDictionary<unknown>
    store: BytesStore
  }
}

async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const item of iter) out.push(item)
  return out
}

const frame = (...payload: number[]) => new Uint8Array([0x56, 1, 0, ...payload])

export function describePersistentDictionaryContract(harness: DictionaryHarness): void {
  describe(`PersistentDictionary Contract Tests - ${harness.name}`, () => {
    let clock: FakeClock
    let dict: PersistentDictionary<unknown>
    let store: BytesStore

    beforeEach(() => {
      clock = new FakeClock(1_000)
      ;({ dict, store } = harness.make({ clock }))
    })

    afterEach(async () => {
      await dict.close()
      await store.close()
    })

    describe("dictionary semantics", () => {
      it("walks the url/html scenario", async () => {
        expect(await dict.contains("u")).toBe(false)

        await dict.set("u", "html")
        expect(await dict.contains("u")).toBe(true)
        expect(await dict.getValue("u")).toBe("html")
        expect(await dict.meta("u")).toEqual({})

        await dict.meta("u", "tag")
        expect(await dict.meta("u")).toBe("tag")

        await dict.delete("u")
        expect(await dict.contains("u")).toBe(false)
      })

      it("round-trips structured values", async () => {
        const value = {
          title: "Example",
          links: ["http://a", "http://b"],
          fetched: new Date("2024-05-01T00:00:00.000Z"),
          headers: new Map([["content-type", "text/html"]]),
          body: new Uint8Array([60, 104, 62]),
          size: 1234n,
          missing: undefined,
        }

        await dict.set("k", value)

        expect(await dict.getValue("k")).toEqual(value)
      })

      it("returns the fallback for absent keys", async () => {
        expect(await dict.get("nope")).toBeUndefined()
        expect(await dict.get("nope", null)).toBeNull()
        expect(await dict.getValue("nope")).toBeUndefined()
        expect(await dict.getValue("nope", "default")).toBe("default")
      })

      it("returns the stored value even when it is undefined", async () => {
        await dict.set("k", undefined)

        expect(await dict.contains("k")).toBe(true)
        expect(await dict.getValue("k", "fallback")).toBeUndefined()
      })

      it("overwrites on a second set", async () => {
        await dict.set("k", 1)
        await dict.set("k", 2)

        expect(await dict.getValue("k")).toBe(2)
        expect(await dict.size()).toBe(1)
      })

      it("ignores deletes of absent keys", async () => {
        await expect(dict.delete("missing")).resolves.toBeUndefined()
      })
    })

    describe("entries and timestamps", () => {
      it("creates an entry with empty metadata and equal timestamps", async () => {
        await dict.set("k", "v")

        expect(await dict.get("k")).toEqual({
          value: "v",
          metadata: {},
          createdAt: new Date(1_000),
          updatedAt: new Date(1_000),
        })
      })

      it("keeps metadata and createdAt when the value changes", async () => {
        await dict.set("k", "v1")
        await dict.meta("k", "m1")
        clock.advance(500)
        await dict.set("k", "v2")

        expect(await dict.get("k")).toEqual({
          value: "v2",
          metadata: "m1",
          createdAt: new Date(1_000),
          updatedAt: new Date(1_500),
        })
      })

      it("keeps value and both timestamps when metadata changes", async () => {
        await dict.set("k", "v")
        clock.advance(250)
        await dict.setMeta("k", { etag: "abc" })

        expect(await dict.get("k")).toEqual({
          value: "v",
          metadata: { etag: "abc" },
          createdAt: new Date(1_000),
          updatedAt: new Date(1_000),
        })
        expect(await dict.getMeta("k")).toEqual({ etag: "abc" })
      })

      it("raises KeyNotFoundError for metadata of an absent key", async () => {
        await expect(dict.meta("missing")).rejects.toBeInstanceOf(KeyNotFoundError)
        await expect(dict.meta("missing", "m")).rejects.toThrow('Key "missing" does not exist')
        expect(await dict.contains("missing")).toBe(false)
      })

      it("removes value and metadata together", async () => {
        await dict.set("k", "v")
        await dict.meta("k", "m")
        await dict.delete("k")
        await dict.set("k", "again")

        expect(await dict.meta("k")).toEqual({})
      })
    })

    describe("iteration", () => {
      beforeEach(async () => {
        for (const key of ["c", "a", "d", "b", "e"]) {
          await dict.set(key, key.toUpperCase())
        }
      })

      it("yields keys in order", async () => {
        expect(await collect(dict.keys())).toEqual(["a", "b", "c", "d", "e"])
        expect(await collect(dict)).toEqual(["a", "b", "c", "d", "e"])
      })

      it("yields values, items and entries", async () => {
        expect(await collect(dict.values())).toEqual(["A", "B", "C", "D", "E"])
        expect((await collect(dict.items())).slice(0, 2)).toEqual([
          ["a", "A"],
          ["b", "B"],
        ])

        const [first] = await collect(dict.entries())
        expect(first).toEqual([
          "a",
          { value: "A", metadata: {}, createdAt: new Date(1_000), updatedAt: new Date(1_000) },
        ])
      })

      it("survives writes made while iterating", async () => {
        const seen: string[] = []

        for await (const key of dict.keys()) {
          seen.push(key)
          if (key === "a") {
            await dict.delete("c")
            await dict.set("f", "F")
          }
        }

        expect(seen).toEqual(["a", "b", "d", "e", "f"])
      })
    })

    describe("size, clear and merge", () => {
      it("counts and clears entries", async () => {
        await dict.set("a", 1)
        await dict.set("b", 2)
        expect(await dict.size()).toBe(2)

        await dict.clear()
        expect(await dict.size()).toBe(0)
        expect(await dict.contains("a")).toBe(false)
      })

      it("merges without overwriting by default", async () => {
        await dict.set("a", "old")

        const written = await dict.merge(
          new Map([
            ["a", "new"],
            ["b", "added"],
          ]),
        )

        expect(written).toBe(1)
        expect(await dict.getValue("a")).toBe("old")
        expect(await dict.getValue("b")).toBe("added")
      })

      it("merges with overwrite and keeps existing metadata", async () => {
        await dict.set("a", "old")
        await dict.meta("a", "kept")

        const written = await dict.merge([["a", "new"]], { overwrite: true })

        expect(written).toBe(1)
        expect(await dict.getValue("a")).toBe("new")
        expect(await dict.meta("a")).toBe("kept")
      })

      it("merges from an async source", async () => {
        async function* source(): AsyncGenerator<[string, unknown]> {
          yield ["x", 1]
          yield ["y", 2]
        }

        expect(await dict.merge(source())).toBe(2)
        expect(await collect(dict.items())).toEqual([
          ["x", 1],
          ["y", 2],
        ])
      })
    })

    describe("concurrency", () => {
      it("keeps value and metadata from racing set and meta", async () => {
        await dict.set("k", "v1")

        await Promise.all([dict.set("k", "v2"), dict.meta("k", "m"), dict.set("other", 1)])

        expect(await dict.getValue("k")).toBe("v2")
        expect(await dict.meta("k")).toBe("m")
      })

      it("leaves the last writer's value among racing same-key writers", async () => {
        await Promise.all(Array.from({ length: 20 }, (_, i) => dict.set("k", i)))

        expect(await dict.getValue("k")).toBe(19)
        expect(await dict.meta("k")).toEqual({})
      })

      it("accepts many keys at once", async () => {
        await Promise.all(Array.from({ length: 30 }, (_, i) => dict.set(`key-${i}`, i)))

        expect(await dict.size()).toBe(30)
      })
    })

    describe("errors", () => {
      it("surfaces a damaged header as CorruptionError", async () => {
        await store.put("k", new Uint8Array([1, 2, 3]))

        expect(await dict.contains("k")).toBe(true)
        await expect(dict.get("k")).rejects.toBeInstanceOf(CorruptionError)
        await expect(dict.getValue("k", "fallback")).rejects.toBeInstanceOf(CorruptionError)
      })

      it("surfaces an unreadable payload as SerializationError", async () => {
        await store.put("k", frame(...new TextEncoder().encode("not json")))

        await expect(dict.get("k")).rejects.toBeInstanceOf(SerializationError)
      })

      it("surfaces a payload that is not an entry as SerializationError", async () => {
        await store.put("k", frame(...new TextEncoder().encode('{"json":"hello"}')))

        await expect(dict.get("k")).rejects.toThrow(
          "Stored bytes are not a valid value: payload is not a stored entry",
        )
      })

      it("fails iteration over a damaged entry", async () => {
        await dict.set("a", 1)
        await store.put("b", new Uint8Array([0]))

        await expect(collect(dict.values())).rejects.toBeInstanceOf(CorruptionError)
      })

      it("lets a damaged entry be deleted and rewritten", async () => {
        await store.put("k", new Uint8Array([0]))

        await expect(dict.set("k", "v")).rejects.toBeInstanceOf(CorruptionError)
        await dict.delete("k")
        await dict.set("k", "v")

        expect(await dict.getValue("k")).toBe("v")
      })

      it("rejects values outside the structured model without writing", async () => {
        await expect(dict.set("k", { handler: () => 1 })).rejects.toThrow(
          "Cannot serialize value at $.value.handler: functions are not supported",
        )
        expect(await dict.contains("k")).toBe(false)
      })

      it("rejects empty keys", async () => {
        await expect(dict.set("", 1)).rejects.toBeInstanceOf(InvalidKeyError)
        await expect(dict.contains("")).rejects.toBeInstanceOf(InvalidKeyError)
      })
    })

    describe("close", () => {
      it("is idempotent", async () => {
        await dict.close()
        await dict.close()

        expect(dict.state).toBe("closed")
      })

      it("rejects operations afterwards", async () => {
        await dict.set("k", 1)
        await dict.close()

        await expect(dict.get("k")).rejects.toThrow("Cannot get: dictionary is closed")
        await expect(dict.set("k", 2)).rejects.toBeInstanceOf(ClosedError)
        await expect(dict.size()).rejects.toBeInstanceOf(ClosedError)
        await expect(collect(dict.keys())).rejects.toBeInstanceOf(ClosedError)
      })

      it("leaves an injected store open", async () => {
        await dict.close()

        expect(store.closed).toBe(false)
      })
    })
  })
}
