/**
 * Canonical record schema — every store adapter normalizes into this.
 * This is the single shape the writer and the dedup clustering consume.
 *
 * Normalization happens at construction: createRecord() runs the zod schema,
 * which cleans the title, defaults the price, dedupes platforms and lower-cases
 * the rating. A record is frozen once built.
 */

import { z } from 'zod'
import { cleanTitle, dedupePlatforms } from '../lib/normalize.js'
import { ValidationError } from '../lib/errors.js'

/** Loosely-typed payload values as they come off the wire */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject
export interface JsonObject {
  [key: string]: JsonValue
}

export const STORES = ['steam', 'psn', 'xbox', 'nintendo'] as const
export type Store = (typeof STORES)[number]

export const RATINGS = [
  'everyone',
  'everyone 10+',
  'rating pending',
  'teen',
  'mature 17+',
  'none',
] as const
export type Rating = (typeof RATINGS)[number]

export const UNAVAILABLE = 'Unavailable'

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
)

export const gameRecordSchema = z.object({
  store: z.enum(STORES),
  name: z
    .string()
    .transform(cleanTitle)
    .pipe(z.string().min(1, 'name is empty after cleaning')),
  price: z
    .string()
    .nullish()
    .transform(v => (v ?? '').trim() || UNAVAILABLE),
  image: z.string().url(),
  href: z.string().url(),
  uuid: z.string().min(1).optional(),
  platforms: z
    .array(z.union([z.string(), z.number()]))
    .default([])
    .transform(dedupePlatforms),
  rating: z
    .string()
    .transform(v => v.trim().toLowerCase())
    .pipe(z.enum(RATINGS))
    .optional(),
  type: z.string().min(1).optional(),
  extra: z.record(jsonValue).default({}),
})

export type GameRecordInput = z.input<typeof gameRecordSchema>
export type CanonicalRecord = Readonly<z.output<typeof gameRecordSchema>>

/** Shape of one entry in a letter-bucket file (_.json, a.json … z.json) */
export interface OutputItem {
  name: string
  type?: string
  price: string
  image: string
  href: string
  uuid?: string
  platforms: string[]
  rating?: Rating
}

/**
 * Build a CanonicalRecord, applying every normalization rule.
 * Throws ValidationError when a required field fails its invariant.
 */
export function createRecord(input: GameRecordInput): CanonicalRecord {
  const result = gameRecordSchema.safeParse(input)
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    )
  }
  const record = result.data
  Object.freeze(record.platforms)
  return Object.freeze(record)
}

/** Project a record onto the output shape (drops store and extra, fixes key order) */
export function toOutputItem(record: CanonicalRecord): OutputItem {
  return {
    name: record.name,
    ...(record.type !== undefined && { type: record.type }),
    price: record.price,
    image: record.image,
    href: record.href,
    ...(record.uuid !== undefined && { uuid: record.uuid }),
    platforms: [...record.platforms],
    ...(record.rating !== undefined && { rating: record.rating }),
  }
}
