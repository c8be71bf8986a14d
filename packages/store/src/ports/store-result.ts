export type StoreFound = { kind: "found"; value: Uint8Array }
export type StoreNotFound = { kind: "not_found" }

export type StoreResult = StoreFound | StoreNotFound

export const notFound: StoreNotFound = Object.freeze({ kind: "not_found" })

export function found(value: Uint8Array): StoreFound {
  return { kind: "found", value }
}
