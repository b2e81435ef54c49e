/**
 * Typed accessors over loosely-typed JSON payloads.
 */

import type { JsonObject, JsonValue } from '../schema/game-record.js'

export type SafeJsonParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: JsonValue = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** First key holding a non-empty string */
export function firstString(obj: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const v = obj[key]
    if (typeof v === 'string' && v.trim()) return v.trim()
  }
  return undefined
}

/** First key holding a non-empty string or a number, stringified */
export function firstId(obj: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const v = obj[key]
    if (typeof v === 'number' && Number.isFinite(v)) return String(v)
    if (typeof v === 'string' && v.trim()) return v.trim()
  }
  return undefined
}

/** First key holding a list (optionally non-empty) */
export function firstList(
  obj: JsonObject,
  keys: readonly string[],
  { nonEmpty = false }: { nonEmpty?: boolean } = {}
): JsonValue[] | undefined {
  for (const key of keys) {
    const v = obj[key]
    if (Array.isArray(v) && (!nonEmpty || v.length > 0)) return v
  }
  return undefined
}

/** First key holding a nested object */
export function firstObject(obj: JsonObject, keys: readonly string[]): JsonObject | undefined {
  for (const key of keys) {
    const v = obj[key]
    if (isJsonObject(v)) return v
  }
  return undefined
}

/** Resolve a possibly relative link against the page it came from */
export function absoluteUrl(link: string | undefined, base: string): string | undefined {
  if (!link) return undefined
  try {
    return new URL(link, base).href
  } catch {
    return undefined
  }
}
