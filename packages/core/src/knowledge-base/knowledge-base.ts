/**
 * Knowledge base facade: the only entry point callers use.
 *
 * Every mutation writes the structured store first, then brings the section's
 * chunk set in the vector store up to date. The two stores share no
 * transaction: when the second half fails the section stays written and the
 * call reports UPSTREAM_FAILURE naming the section id. reindex() repairs the gap.
 *
 * Paths on returned sections are snapshots of the tree at read time.
 */

import { writeFile } from 'node:fs/promises'
import type Database from 'better-sqlite3'
import {
  Ok,
  Err,
  KnowledgeBaseError,
  describeError,
  collect,
  mapOk,
  validationError,
  IdentifierSchema,
  CollectionNameSchema,
} from '../common/index.js'
import type { Result } from '../common/index.js'
import { SectionRepository } from '../sections/repository.js'
import { classifyIdentifier } from '../sections/identifier.js'
import { slugify } from '../sections/slug.js'
import {
  AddSectionInputSchema,
  UpdateSectionInputSchema,
  MoveSectionInputSchema,
  HeaderSchema,
} from '../sections/schemas.js'
import type { Section, SectionRecord, UpdateSectionInput, MoveSectionInput } from '../sections/schemas.js'
import { ChunkRepository } from '../vectors/chunk-repository.js'
import { chunkSectionContent, expectedChunkCount, hashContent } from '../vectors/chunker.js'
import { embedChunks } from '../vectors/embedding-pipeline.js'
import { ChunkingOptionsSchema } from '../vectors/schemas.js'
import type { ChunkingOptions } from '../vectors/schemas.js'
import type { EmbeddingClient } from '../vectors/embedding-client.js'
import { SearchConfigSchema } from '../config/schemas.js'
import type { SearchConfig } from '../config/schemas.js'
import { renderSectionTree, flattenTree } from './exporter.js'
import type { SectionTreeNode } from './exporter.js'
import {
  SearchQuerySchema,
  SearchOptionsSchema,
  DeleteOptionsSchema,
  ReindexOptionsSchema,
} from './schemas.js'
import type {
  AddSectionOptions,
  SearchOptions,
  SearchHit,
  DeleteOptions,
  DeleteResult,
  ReindexOptions,
  ReindexSummary,
  ExportSummary,
} from './schemas.js'

export const DEFAULT_COLLECTION = 'knowledge_base'

/** Chunks fetched per requested result, so several hits on one section still leave room for others. */
const SEARCH_OVERFETCH = 3

export interface KnowledgeBaseOptions {
  structuredDb: Database.Database
  /** Defaults to `structuredDb`: both stores in one file. */
  vectorDb?: Database.Database
  embeddingClient: EmbeddingClient
  collection?: string
  chunking?: Partial<ChunkingOptions>
  search?: Partial<SearchConfig>
}

export class KnowledgeBase {
  readonly sectionStore: SectionRepository
  readonly vectorStore: ChunkRepository
  readonly collection: string

  private readonly structuredDb: Database.Database
  private readonly vectorDb: Database.Database
  private readonly embeddingClient: EmbeddingClient
  private readonly chunking: ChunkingOptions
  private readonly searchConfig: SearchConfig

  /** Throws a ZodError on malformed chunking or search options. */
  constructor(options: KnowledgeBaseOptions) {
    this.structuredDb = options.structuredDb
    this.vectorDb = options.vectorDb ?? options.structuredDb
    this.embeddingClient = options.embeddingClient
    this.collection = CollectionNameSchema.parse(options.collection ?? DEFAULT_COLLECTION)
    this.chunking = ChunkingOptionsSchema.parse(options.chunking ?? {})
    this.searchConfig = SearchConfigSchema.parse(options.search ?? {})

    this.sectionStore = new SectionRepository(this.structuredDb, this.collection)
    this.vectorStore = new ChunkRepository(this.vectorDb, this.collection)
  }

  // ── Mutations ──

  async add(header: string, content: string, options: AddSectionOptions = {}): Promise<Result<Section, KnowledgeBaseError>> {
    const parsed = AddSectionInputSchema.safeParse({ header, content, ...options })
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid section'))
    const input = parsed.data

    let parentId: string | null = null
    if (input.parent !== undefined) {
      const parent = this.resolve(input.parent)
      if (!parent.ok) return parent
      parentId = parent.value.id
    }

    const slug = this.assignSlug(parentId, input.header, input.slug)
    if (!slug.ok) return slug

    const inserted = this.sectionStore.insert({
      parentId,
      header: input.header,
      content: input.content,
      slug: slug.value,
      position: input.position,
    })
    if (!inserted.ok) return inserted

    const indexed = await this.indexSection(inserted.value)
    if (!indexed.ok) return indexed

    return this.toSection(inserted.value)
  }

  /**
   * Change header, content and/or slug. Only the given fields change; passing
   * `content` always rebuilds the chunk set, even for identical text.
   */
  async update(identifier: string, changes: UpdateSectionInput): Promise<Result<Section, KnowledgeBaseError>> {
    const parsed = UpdateSectionInputSchema.safeParse(changes)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid update'))
    const input = parsed.data

    const existing = this.resolve(identifier)
    if (!existing.ok) return existing
    const section = existing.value

    let slug: string | null | undefined
    if (input.slug !== undefined) {
      const assigned = this.assignSlug(section.parentId, section.header, input.slug, section.id)
      if (!assigned.ok) return assigned
      slug = assigned.value
    }

    const updated = this.sectionStore.updateFields(section.id, {
      header: input.header,
      content: input.content,
      slug,
    })
    if (!updated.ok) return updated

    if (input.content !== undefined) {
      const indexed = await this.indexSection(updated.value)
      if (!indexed.ok) return indexed
    }

    return this.toSection(updated.value)
  }

  /**
   * Delete a section. Without `recursive` a section with children is refused.
   * Sections go first, then the chunks of every deleted section.
   */
  async delete(identifier: string, options: DeleteOptions = {}): Promise<Result<DeleteResult, KnowledgeBaseError>> {
    const parsed = DeleteOptionsSchema.safeParse(options)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid delete options'))

    const target = this.resolve(identifier)
    if (!target.ok) return target
    const id = target.value.id

    const deleted = parsed.data.recursive
      ? this.sectionStore.deleteSubtree(id)
      : this.sectionStore.deleteById(id)
    if (!deleted.ok) return deleted

    const removed = this.vectorStore.deleteBySections(deleted.value)
    if (!removed.ok) {
      console.warn(`[kb] sections deleted but chunk removal failed for ${id}: ${removed.error.message}`)
      return Err(KnowledgeBaseError.upstream(
        `Section ${id} was deleted but its chunks could not be removed: ${removed.error.message}`,
        id,
      ))
    }

    return Ok({ deletedIds: deleted.value, removedChunks: removed.value })
  }

  /** Re-parent and/or reorder a section. Chunks are untouched: content does not change. */
  async move(identifier: string, options: MoveSectionInput): Promise<Result<Section, KnowledgeBaseError>> {
    const parsed = MoveSectionInputSchema.safeParse(options)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid move'))

    const target = this.resolve(identifier)
    if (!target.ok) return target

    let parentId = target.value.parentId
    if (parsed.data.parent === null) {
      parentId = null
    } else if (parsed.data.parent !== undefined) {
      const parent = this.resolve(parsed.data.parent)
      if (!parent.ok) return parent
      parentId = parent.value.id
    }

    const moved = this.sectionStore.move(target.value.id, parentId, parsed.data.position)
    if (!moved.ok) return moved

    return this.toSection(moved.value)
  }

  // ── Reads ──

  async get(identifier: string): Promise<Result<Section, KnowledgeBaseError>> {
    const record = this.resolve(identifier)
    if (!record.ok) return record
    return this.toSection(record.value)
  }

  /** Exact header match, oldest first. */
  async findByHeader(header: string): Promise<Result<Section[], KnowledgeBaseError>> {
    const parsed = HeaderSchema.safeParse(header)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid header'))

    const records = this.sectionStore.findByHeader(parsed.data)
    if (!records.ok) return records
    return collect(records.value.map(record => this.toSection(record)))
  }

  /** Children of `parent` in sibling order; the roots when `parent` is omitted. */
  async getChildren(parent?: string): Promise<Result<Section[], KnowledgeBaseError>> {
    let parentId: string | null = null
    let parentPath: string | null = null
    let depth = 0

    if (parent !== undefined) {
      const resolved = this.resolve(parent)
      if (!resolved.ok) return resolved
      const parentSection = this.toSection(resolved.value)
      if (!parentSection.ok) return parentSection
      parentId = parentSection.value.id
      parentPath = parentSection.value.path
      depth = parentSection.value.depth + 1
    }

    const children = this.sectionStore.findChildren(parentId)
    if (!children.ok) return children

    return Ok(children.value.map((record, i) => ({
      ...record,
      path: parentPath === null ? `${i + 1}` : `${parentPath}.${i + 1}`,
      depth,
    })))
  }

  /** The subtree under `root` (or the whole collection) rendered as indented text. */
  async getTree(root?: string): Promise<Result<string, KnowledgeBaseError>> {
    return mapOk(this.buildForest(root), renderSectionTree)
  }

  async export(filepath: string, root?: string): Promise<Result<ExportSummary, KnowledgeBaseError>> {
    const forest = this.buildForest(root)
    if (!forest.ok) return forest

    try {
      await writeFile(filepath, renderSectionTree(forest.value), 'utf-8')
    } catch (err) {
      return Err(KnowledgeBaseError.io(`Could not write export to ${filepath}: ${describeError(err)}`, filepath))
    }

    return Ok({ filepath, sectionCount: flattenTree(forest.value).length })
  }

  /**
   * Semantic search over chunk embeddings. Returns at most `nResults` distinct
   * sections, each with its best-scoring chunk, by non-increasing score.
   */
  async search(query: string, options: SearchOptions = {}): Promise<Result<SearchHit[], KnowledgeBaseError>> {
    const parsedQuery = SearchQuerySchema.safeParse(query)
    if (!parsedQuery.success) return Err(validationError(parsedQuery.error, 'Invalid search query'))
    const parsed = SearchOptionsSchema.safeParse(options)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid search options'))

    const nResults = parsed.data.nResults ?? this.searchConfig.defaultResults
    if (nResults > this.searchConfig.maxResults) {
      return Err(KnowledgeBaseError.validation(
        `Invalid search options: nResults cannot exceed ${this.searchConfig.maxResults}`,
        'nResults',
      ))
    }

    let sectionIds: Set<string> | undefined
    if (parsed.data.within !== undefined) {
      const root = this.resolve(parsed.data.within)
      if (!root.ok) return root
      const subtree = this.sectionStore.collectSubtree(root.value.id)
      if (!subtree.ok) return subtree
      sectionIds = new Set(subtree.value)
    }

    const queryEmbedding = await this.embedQuery(parsedQuery.data)
    if (!queryEmbedding.ok) return queryEmbedding

    const vectorHits = this.vectorStore.query(queryEmbedding.value, nResults * SEARCH_OVERFETCH, { sectionIds })
    if (!vectorHits.ok) return vectorHits

    const hits: SearchHit[] = []
    const seen = new Set<string>()

    for (const hit of vectorHits.value) {
      if (hits.length >= nResults) break
      if (seen.has(hit.sectionId)) continue

      const record = this.sectionStore.findById(hit.sectionId)
      if (!record.ok) {
        if (record.error.code !== 'NOT_FOUND') return record
        console.warn(`[kb] skipping orphan chunk ${hit.sectionId}#${hit.chunkIndex}: section no longer exists`)
        continue
      }

      const section = this.toSection(record.value)
      if (!section.ok) return section

      seen.add(hit.sectionId)
      hits.push({ section: section.value, score: hit.score, chunkIndex: hit.chunkIndex, text: hit.text })
    }

    return Ok(hits)
  }

  // ── Maintenance ──

  /**
   * Rebuild chunk sets from current content. Without `force`, sections whose
   * stored chunks already match their content are skipped. A whole-collection
   * run also drops chunk sets whose section is gone.
   */
  async reindex(options: ReindexOptions = {}): Promise<Result<ReindexSummary, KnowledgeBaseError>> {
    const parsed = ReindexOptionsSchema.safeParse(options)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid reindex options'))
    const { root, force } = parsed.data

    let records: SectionRecord[]
    if (root !== undefined) {
      const rootRecord = this.resolve(root)
      if (!rootRecord.ok) return rootRecord
      const subtree = this.sectionStore.collectSubtree(rootRecord.value.id)
      if (!subtree.ok) return subtree
      const found = collect(subtree.value.map(id => this.sectionStore.findById(id)))
      if (!found.ok) return found
      records = found.value
    } else {
      const all = this.sectionStore.listAll()
      if (!all.ok) return all
      records = all.value
    }

    const summary: ReindexSummary = { reindexed: 0, skipped: 0, orphansRemoved: 0 }

    for (const record of records) {
      if (!force) {
        const fresh = this.isIndexFresh(record)
        if (!fresh.ok) return fresh
        if (fresh.value) {
          summary.skipped++
          continue
        }
      }

      const indexed = await this.indexSection(record)
      if (!indexed.ok) return indexed
      summary.reindexed++
    }

    if (root === undefined) {
      const indexedIds = this.vectorStore.listSectionIds()
      if (!indexedIds.ok) return indexedIds
      const live = new Set(records.map(record => record.id))
      const orphans = indexedIds.value.filter(id => !live.has(id))
      if (orphans.length > 0) {
        const removed = this.vectorStore.deleteBySections(orphans)
        if (!removed.ok) return removed
        summary.orphansRemoved = orphans.length
      }
    }

    console.log(`[kb] reindex of ${this.collection}: ${summary.reindexed} reindexed, ${summary.skipped} skipped, ${summary.orphansRemoved} orphan chunk sets removed`)
    return Ok(summary)
  }

  /** The same stores scoped to another collection. */
  withCollection(name: string): Result<KnowledgeBase, KnowledgeBaseError> {
    const parsed = CollectionNameSchema.safeParse(name)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid collection name'))

    return Ok(new KnowledgeBase({
      structuredDb: this.structuredDb,
      vectorDb: this.vectorDb,
      embeddingClient: this.embeddingClient,
      collection: parsed.data,
      chunking: this.chunking,
      search: this.searchConfig,
    }))
  }

  /** Close both database handles. Safe to call more than once. */
  close(): void {
    if (this.structuredDb.open) this.structuredDb.close()
    if (this.vectorDb !== this.structuredDb && this.vectorDb.open) this.vectorDb.close()
  }

  // ── Internals ──

  private resolve(identifier: string): Result<SectionRecord, KnowledgeBaseError> {
    const parsed = IdentifierSchema.safeParse(identifier)
    if (!parsed.success) return Err(validationError(parsed.error, 'Invalid identifier'))

    const ref = classifyIdentifier(parsed.data)
    switch (ref.kind) {
      case 'id':
        return this.sectionStore.findById(ref.id)
      case 'path':
        return this.sectionStore.findByPath(ref.positions)
      case 'slugPath':
        return this.sectionStore.findBySlugPath(ref.slugs)
      case 'slug': {
        const matches = this.sectionStore.findBySlug(ref.slug)
        if (!matches.ok) return matches
        if (matches.value.length === 0) return Err(KnowledgeBaseError.notFound('Section', ref.slug))
        if (matches.value.length > 1) {
          return Err(KnowledgeBaseError.conflict(
            `Slug "${ref.slug}" matches ${matches.value.length} sections; use a slug path or an id`,
            ref.slug,
          ))
        }
        return Ok(matches.value[0])
      }
    }
  }

  private toSection(record: SectionRecord): Result<Section, KnowledgeBaseError> {
    const path = this.sectionStore.computePath(record.id)
    if (!path.ok) return path
    return Ok({ ...record, path: path.value, depth: path.value.split('.').length - 1 })
  }

  /**
   * Slug for a section under `parentId`. An explicit slug is normalised and
   * must be free among the siblings; a derived one takes the first free
   * numeric suffix.
   */
  private assignSlug(
    parentId: string | null,
    header: string,
    explicit: string | undefined,
    exceptId?: string,
  ): Result<string | null, KnowledgeBaseError> {
    if (explicit !== undefined) {
      const slug = slugify(explicit)
      if (slug.length === 0) {
        return Err(KnowledgeBaseError.validation(`Slug "${explicit}" has no letters or digits`, 'slug'))
      }
      const taken = this.sectionStore.isSlugTaken(parentId, slug, exceptId)
      if (!taken.ok) return taken
      if (taken.value) {
        return Err(KnowledgeBaseError.conflict(`Slug "${slug}" is already used by a sibling`, slug))
      }
      return Ok(slug)
    }

    const base = slugify(header)
    if (base.length === 0) return Ok(null)

    let candidate = base
    for (let suffix = 2; ; suffix++) {
      const taken = this.sectionStore.isSlugTaken(parentId, candidate, exceptId)
      if (!taken.ok) return taken
      if (!taken.value) return Ok(candidate)
      candidate = `${base}-${suffix}`
    }
  }

  /** Chunk, embed and store the current content of a section. Returns the chunk count. */
  private async indexSection(record: SectionRecord): Promise<Result<number, KnowledgeBaseError>> {
    const chunks = chunkSectionContent(record.content, this.chunking)
    const embedded = await embedChunks(chunks, this.embeddingClient, hashContent(record.content))
    if (!embedded.ok) return this.indexFailure(record.id, embedded.error)

    const written = this.vectorStore.replaceChunks(record.id, embedded.value)
    if (!written.ok) return this.indexFailure(record.id, written.error)

    return written
  }

  private indexFailure(sectionId: string, cause: KnowledgeBaseError): Result<never, KnowledgeBaseError> {
    console.warn(`[kb] indexing section ${sectionId} failed: ${cause.message}`)
    return Err(KnowledgeBaseError.upstream(
      `Section ${sectionId} is saved but its chunks are not indexed: ${cause.message}`,
      sectionId,
    ))
  }

  private isIndexFresh(record: SectionRecord): Result<boolean, KnowledgeBaseError> {
    const count = this.vectorStore.countBySection(record.id)
    if (!count.ok) return count

    const expected = expectedChunkCount(record.content, this.chunking)
    if (count.value !== expected) return Ok(false)
    if (expected === 0) return Ok(true)

    const stamp = this.vectorStore.getIndexStamp(record.id)
    if (!stamp.ok) return stamp
    if (stamp.value === null) return Ok(false)
    return Ok(
      stamp.value.sectionContentHash === hashContent(record.content)
      && stamp.value.modelName === this.embeddingClient.modelName
      && stamp.value.providerFingerprint === this.embeddingClient.providerFingerprint,
    )
  }

  private async embedQuery(query: string): Promise<Result<number[], KnowledgeBaseError>> {
    let vectors: number[][]
    try {
      vectors = (await this.embeddingClient.embed([query])).embeddings
    } catch (err) {
      return Err(KnowledgeBaseError.upstream(`Embedding provider ${this.embeddingClient.modelName} failed: ${describeError(err)}`))
    }

    const [vector] = vectors
    if (vectors.length !== 1 || vector === undefined) {
      return Err(KnowledgeBaseError.upstream(
        `Embedding provider ${this.embeddingClient.modelName} returned ${vectors.length} vectors for 1 query`,
      ))
    }
    return Ok(vector)
  }

  private buildForest(root?: string): Result<SectionTreeNode[], KnowledgeBaseError> {
    if (root !== undefined) {
      const record = this.resolve(root)
      if (!record.ok) return record
      const section = this.toSection(record.value)
      if (!section.ok) return section
      const node = this.buildNode(section.value)
      if (!node.ok) return node
      return Ok([node.value])
    }

    const roots = this.sectionStore.findChildren(null)
    if (!roots.ok) return roots
    return collect(roots.value.map((record, i) => this.buildNode({ ...record, path: `${i + 1}`, depth: 0 })))
  }

  private buildNode(section: Section): Result<SectionTreeNode, KnowledgeBaseError> {
    const children = this.sectionStore.findChildren(section.id)
    if (!children.ok) return children

    const nodes = collect(children.value.map((record, i) => this.buildNode({
      ...record,
      path: `${section.path}.${i + 1}`,
      depth: section.depth + 1,
    })))
    if (!nodes.ok) return nodes

    return Ok({ section, children: nodes.value })
  }
}
