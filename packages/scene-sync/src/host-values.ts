/**
 * Conversion between host values and wire FieldValues.
 *
 * Host → wire:
 *   null / undefined           → null
 *   boolean                    → bool
 *   safe integer               → int
 *   other number               → float
 *   string                     → string
 *   Uint8Array                 → blob (copied)
 *   Float32Array/Float64Array  → floats
 *   number[] (finite)          → floats
 *   { $ref, name }             → ref
 */

import { z } from 'zod'
import type { FieldValue } from '@scenesync/wire-protocol'
import type { HostRef, HostValue } from './types'

const hostRefSchema = z.object({
  $ref: z.string().min(1),
  name: z.string().nullable(),
}).strict()

/** Parse a raw host value as a reference, or null if it is not one. */
export function asHostRef(raw: unknown): HostRef | null {
  const parsed = hostRefSchema.safeParse(raw)
  return parsed.success ? parsed.data : null
}

function describe(raw: unknown): string {
  if (Array.isArray(raw)) return 'array'
  if (raw instanceof Object && raw.constructor !== Object) return raw.constructor.name
  return typeof raw
}

function floatsFrom(raw: readonly unknown[]): number[] | string {
  const out: number[] = []
  for (let i = 0; i < raw.length; i++) {
    const element = raw[i]
    if (typeof element !== 'number' || !Number.isFinite(element)) {
      return `element ${i} is not a finite number`
    }
    out.push(element)
  }
  return out
}

/**
 * Convert a host value to its wire form.
 * Returns a reason string instead of a value when it has no wire form.
 */
export function toFieldValue(raw: unknown): FieldValue | string {
  if (raw === null || raw === undefined) return { type: 'null' }
  if (typeof raw === 'boolean') return { type: 'bool', value: raw }
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) && !Object.is(raw, -0)
      ? { type: 'int', value: raw }
      : { type: 'float', value: raw }
  }
  if (typeof raw === 'string') return { type: 'string', value: raw }
  if (raw instanceof Uint8Array) return { type: 'blob', value: raw.slice() }
  if (raw instanceof Float32Array || raw instanceof Float64Array) {
    return { type: 'floats', value: Array.from(raw) }
  }
  if (Array.isArray(raw)) {
    const floats = floatsFrom(raw)
    return typeof floats === 'string' ? floats : { type: 'floats', value: floats }
  }
  const ref = asHostRef(raw)
  if (ref) return { type: 'ref', blockType: ref.$ref, name: ref.name }
  return `unsupported value of type ${describe(raw)}`
}

/** Convert a wire value back to what the host accepts. */
export function toHostValue(value: FieldValue): HostValue {
  switch (value.type) {
    case 'null':   return null
    case 'int':    return value.value
    case 'float':  return value.value
    case 'bool':   return value.value
    case 'string': return value.value
    case 'blob':   return value.value.slice()
    case 'floats': return [...value.value]
    case 'ref':    return { $ref: value.blockType, name: value.name }
  }
}
