/**
 * Splits `text` on `delimiter` into at most `limit` parts; the last part
 * keeps any further delimiters. `String.prototype.split` drops them instead.
 */
export function splitFields(text: string, delimiter: string, limit: number): string[] {
  const parts: string[] = []
  let start = 0
  while (parts.length < limit - 1) {
    const end = text.indexOf(delimiter, start)
    if (end === -1) break
    parts.push(text.slice(start, end))
    start = end + delimiter.length
  }
  parts.push(text.slice(start))
  return parts
}

export function splitLines(output: string): string[] {
  return output.split(/\r?\n/)
}
