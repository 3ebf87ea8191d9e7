/**
 * Memo Key Generation
 *
 * Turns a call's argument list into a deterministic string so that equal
 * arguments land on the same cache slot regardless of object key order, and
 * unequal arguments never share one.
 *
 * Plain objects and arrays are encoded structurally. Values JSON would lose
 * or merge get a tagged form, always an object with a single `$`-prefixed
 * key. Object keys starting with `$` are escaped with a second `$`, so no
 * argument can encode to a tag.
 *
 * - `undefined` → `{ $undefined: 1 }`
 * - `NaN`, `Infinity`, `-Infinity` → `{ $num: 'NaN' }`
 * - `bigint` → `{ $bigint: '12' }`
 * - typed arrays, DataView, Buffer, ArrayBuffer → `{ $bytes: [type, base64] }`
 * - `Date` → `{ $date: iso }`
 * - `RegExp` → `{ $regexp: '/a/g' }`, `URL` → `{ $url: href }`
 * - `Map` → `{ $map: [[key, value], ...] }`, `Set` → `{ $set: [...] }`
 *
 * Map entries and set members are sorted by their encoding. Functions,
 * symbols, class instances and circular structures have no stable identity
 * and are rejected with a TypeError.
 */

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function escapeObjectKey(key: string): string {
  return key.startsWith('$') ? `$${key}` : key
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function base64(buffer: ArrayBufferLike, byteOffset: number, byteLength: number): string {
  return Buffer.from(buffer, byteOffset, byteLength).toString('base64')
}

function encode(value: unknown, ancestors: Set<object>): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : { $num: String(value) }
  }
  if (typeof value === 'bigint') {
    return { $bigint: value.toString() }
  }
  if (value === undefined) {
    return { $undefined: 1 }
  }
  if (typeof value !== 'object' || value === null) {
    throw new TypeError(`Cannot derive a cache key from a ${typeof value}`)
  }

  if (ancestors.has(value)) {
    throw new TypeError('Cannot derive a cache key from a circular structure')
  }
  ancestors.add(value)
  try {
    return encodeObject(value, ancestors)
  } finally {
    ancestors.delete(value)
  }
}

function encodeObject(value: object, ancestors: Set<object>): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => encode(item, ancestors))
  }
  if (ArrayBuffer.isView(value)) {
    return {
      $bytes: [value.constructor.name, base64(value.buffer, value.byteOffset, value.byteLength)]
    }
  }
  if (value instanceof ArrayBuffer) {
    return { $bytes: ['ArrayBuffer', base64(value, 0, value.byteLength)] }
  }
  if (value instanceof Date) {
    return { $date: Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString() }
  }
  if (value instanceof RegExp) {
    return { $regexp: String(value) }
  }
  if (value instanceof URL) {
    return { $url: value.href }
  }
  if (value instanceof Map) {
    const entries: [unknown, unknown][] = []
    for (const [key, entry] of value) {
      entries.push([encode(key, ancestors), encode(entry, ancestors)])
    }
    return {
      $map: entries.sort(([a], [b]) => compareStrings(JSON.stringify(a), JSON.stringify(b)))
    }
  }
  if (value instanceof Set) {
    const members: unknown[] = []
    for (const member of value) {
      members.push(encode(member, ancestors))
    }
    return { $set: members.sort((a, b) => compareStrings(JSON.stringify(a), JSON.stringify(b))) }
  }
  if (!isPlainObject(value)) {
    throw new TypeError(
      `Cannot derive a cache key from a ${value.constructor.name || 'class'} instance`
    )
  }

  const sorted: Record<string, unknown> = {}
  const entries = Object.entries(value).sort(([a], [b]) => compareStrings(a, b))
  for (const [key, entry] of entries) {
    sorted[escapeObjectKey(key)] = encode(entry, ancestors)
  }
  return sorted
}

/**
 * JSON-safe encoding of a value with object keys sorted recursively.
 *
 * @throws TypeError for values without a stable encoding
 */
export function encodeKeyValue(value: unknown): unknown {
  return encode(value, new Set())
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(encodeKeyValue(value))
}

/**
 * Cache slot for a call.
 *
 * @example
 * ```ts
 * serializeArgs(['/a.txt', { end: 10, start: 0 }])
 * // '["/a.txt",{"end":10,"start":0}]'
 * ```
 *
 * @throws TypeError for arguments without a stable encoding
 */
export function serializeArgs(args: readonly unknown[]): string {
  return stableStringify(args)
}
