/**
 * Shell-style glob matching for cache policy keys.
 *
 * Patterns follow fnmatch rules rather than path globbing: `*` also crosses
 * `/`, and the whole key has to match.
 *
 * - `*` any run of characters
 * - `?` exactly one character
 * - `[abc]`, `[a-z]` one character from the set
 * - `[!abc]` one character outside the set
 * - a `[` without a closing `]` is a literal bracket
 */

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&')
}

function translateClass(body: string): string {
  let negated = false
  let chars = body
  if (chars.startsWith('!')) {
    negated = true
    chars = chars.slice(1)
  }
  const escaped = chars.replace(/[\\\]^[]/g, '\\$&')
  return `[${negated ? '^' : ''}${escaped}]`
}

export function globToRegExp(pattern: string): RegExp {
  let source = ''
  let i = 0

  while (i < pattern.length) {
    const char = pattern.charAt(i)
    i++

    if (char === '*') {
      source += '.*'
    } else if (char === '?') {
      source += '.'
    } else if (char === '[') {
      // A `]` directly after `[` or `[!` belongs to the set
      let end = i
      if (pattern.charAt(end) === '!') end++
      if (pattern.charAt(end) === ']') end++
      while (end < pattern.length && pattern.charAt(end) !== ']') end++

      if (end >= pattern.length) {
        source += '\\['
      } else {
        source += translateClass(pattern.slice(i, end))
        i = end + 1
      }
    } else {
      source += escapeRegExp(char)
    }
  }

  return new RegExp(`^${source}$`, 's')
}

export function globMatch(key: string, pattern: string): boolean {
  return globToRegExp(pattern).test(key)
}
