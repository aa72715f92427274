/**
 * Subsequence match: every character of `filter` appears in `name`, in order,
 * ignoring case. An empty filter matches everything.
 */
export const shouldSelect = (name: string, filter: string): boolean => {
  if (filter.length === 0) return true

  const needle = [...filter.toLowerCase()]
  let cursor = 0
  for (const ch of name.toLowerCase()) {
    if (ch === needle[cursor]) {
      cursor += 1
      if (cursor === needle.length) return true
    }
  }
  return false
}
