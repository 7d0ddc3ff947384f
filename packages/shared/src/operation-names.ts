export type OperationAliases = Record<string, readonly string[]>

const UPPER = /\p{Lu}/u
const LOWER = /\p{Ll}/u
const DIGIT = /\p{Nd}/u
const ALPHANUMERIC = /[\p{L}\p{N}]/u

/**
 * Canonical spelling of an operation name: snake_case, lower-case.
 *
 * `TransformStoryRawToTagged` and `transform story raw-to tagged` both become
 * `transform_story_raw_to_tagged`. Scoped names (`instruction_score/model-a`) are
 * only lower-cased so the scope suffix survives untouched.
 */
export function normalizeOperationName(raw: string | null | undefined): string {
  const value = (raw ?? '').trim()
  if (!value) return ''
  if (value.includes('/')) return value.toLowerCase()

  let out = ''
  let prevChar = ''
  for (const ch of value) {
    const last = out.length > 0 ? out[out.length - 1] : ''
    if (UPPER.test(ch)) {
      // word boundary only after a lower-case letter or digit, so `TTSRender` stays one word
      if (out.length > 0 && last !== '_' && (LOWER.test(prevChar) || DIGIT.test(prevChar))) {
        out += '_'
      }
      out += ch.toLowerCase()
    } else if (ALPHANUMERIC.test(ch)) {
      out += ch.toLowerCase()
    } else if (out.length > 0 && last !== '_') {
      out += '_'
    }
    prevChar = ch
  }

  return out.replace(/^_+|_+$/g, '')
}

/**
 * Keys under which a policy for `raw` may have been registered, most specific first.
 * Every key is lower-cased; lookups against the result are case-insensitive.
 */
export function getOperationLookupKeys(raw: string | null | undefined, aliases: OperationAliases = {}): string[] {
  const keys: string[] = []
  const add = (key: string | undefined) => {
    const lowered = key?.trim().toLowerCase()
    if (lowered && !keys.includes(lowered)) keys.push(lowered)
  }

  const trimmed = (raw ?? '').trim()
  if (!trimmed) return keys
  add(trimmed)

  const normalized = normalizeOperationName(trimmed)
  if (!normalized) return keys
  add(normalized)

  const slash = normalized.indexOf('/')
  if (slash > 0) {
    add(normalized.slice(0, slash))
  }

  for (const [canonical, spellings] of Object.entries(aliases)) {
    const canonicalKey = normalizeOperationName(canonical)
    const aliasKeys = spellings.map((spelling) => normalizeOperationName(spelling))
    if (aliasKeys.includes(normalized)) {
      add(canonicalKey)
    }
    if (canonicalKey === normalized) {
      aliasKeys.forEach(add)
    }
  }

  return keys
}
