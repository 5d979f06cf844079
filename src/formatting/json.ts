/** Pretty JSON with bigint byte counts written as decimal strings. */
export const toJson = (value: unknown): string =>
  JSON.stringify(
    value,
    (_key, field: unknown) => (typeof field === 'bigint' ? field.toString() : field),
    2
  )
