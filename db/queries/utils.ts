const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

/**
 * Ids arrive from URLs and request bodies; a malformed one cannot match any
 * row, and passing it to a uuid column would raise a cast error instead.
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value)
}
