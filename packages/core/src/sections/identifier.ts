/**
 * Identifier classification. One string can name a section in four ways; the
 * shape alone picks the resolution mode, in this order:
 *
 *   1. UUID             `3f0c...-...`        → by id
 *   2. dotted positions `1`, `1.2.3`          → by path (recomputed at call time)
 *   3. slug chain       `annual-report/revenue` → by slug, one sibling scope per step
 *   4. anything else                          → by slug, whole collection
 *
 * There is no fallback between modes.
 */

import { UUIDSchema } from '../common/index.js'

const PATH_RE = /^\d+(?:\.\d+)*$/

export type SectionRef =
  | { kind: 'id'; id: string }
  | { kind: 'path'; path: string; positions: number[] }
  | { kind: 'slugPath'; slugs: string[] }
  | { kind: 'slug'; slug: string }

export function classifyIdentifier(raw: string): SectionRef {
  const identifier = raw.trim()

  if (UUIDSchema.safeParse(identifier).success) {
    return { kind: 'id', id: identifier.toLowerCase() }
  }

  if (PATH_RE.test(identifier)) {
    return {
      kind: 'path',
      path: identifier,
      positions: identifier.split('.').map(part => Number.parseInt(part, 10)),
    }
  }

  if (identifier.includes('/')) {
    const slugs = identifier.split('/').map(part => part.trim()).filter(part => part.length > 0)
    if (slugs.length > 1) return { kind: 'slugPath', slugs }
    if (slugs.length === 1) return { kind: 'slug', slug: slugs[0] }
  }

  return { kind: 'slug', slug: identifier }
}
