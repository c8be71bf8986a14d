export type StructuredPrimitive = string | number | boolean | bigint | null | undefined

/**
 * Values the default serializer round-trips: JSON-like data plus dates, byte
 * arrays, maps and sets.
 */
export type StructuredValue =
  | StructuredPrimitive
  | Date
  | Uint8Array
  | readonly StructuredValue[]
  | ReadonlyMap<StructuredValue, StructuredValue>
  | ReadonlySet<StructuredValue>
  | { readonly [key: string]: StructuredValue }
