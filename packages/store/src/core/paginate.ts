/**
 * Keyset pagination: each page starts strictly after the last key of the
 * previous one, so nothing is held open between pages.
 */
export async function* paginate<R extends { key: string }>(
  pageSize: number,
  fetchPage: (after: string | undefined, limit: number) => R[],
): AsyncGenerator<R, void, undefined> {
  let after: string | undefined

  for (;;) {
    const page = fetchPage(after, pageSize)

    for (const row of page) {
      yield row
    }

    const last = page.at(-1)
    if (page.length < pageSize || last === undefined) return

    after = last.key
  }
}
