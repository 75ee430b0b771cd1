/** One policy statement per line; blank lines are dropped. */
export function parsePolicies(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}
