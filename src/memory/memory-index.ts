import path from 'node:path'
import { z } from 'zod'
import { errorMessage, IndexUnavailableError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { Mutex } from '../core/mutex.js'
import type { Embedder } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { parseLine } from './session-log.js'
import { type IndexEntry, IndexEntrySchema, type MemoryItem, RUN_START_TAG, type SearchHit } from './types.js'
import { FlatL2Index } from './vector-store.js'

export const VECTOR_FILE = 'index.bin'
export const METADATA_FILE = 'metadata.json'

const MetadataSchema = z.array(IndexEntrySchema)

export interface MemoryIndexOptions {
    sessionsDir: string
    indexDir: string
    maxResults: number
    distanceThreshold: number
}

interface CompletedPair {
    userQuery: string
    finalAnswer: string
    timestamp: number
}

/** Completed (query, answer) pairs in log order: a run start with a query, then a successful final answer to it. */
export function extractCompletedPairs(items: readonly MemoryItem[]): CompletedPair[] {
    const pairs: CompletedPair[] = []
    let pending: string | undefined

    for (const item of items) {
        if (item.type === 'run_metadata' && item.user_query !== undefined && item.tags.includes(RUN_START_TAG)) {
            pending = item.user_query
            continue
        }
        if (item.type === 'final_answer' && item.success === true && pending !== undefined) {
            if (item.user_query !== undefined && item.user_query !== pending) continue
            pairs.push({ userQuery: pending, finalAnswer: item.text, timestamp: item.timestamp })
            pending = undefined
        }
    }
    return pairs
}

export function embeddingText(userQuery: string, finalAnswer: string): string {
    return `User Question: ${userQuery}\nFinal Answer: ${finalAnswer}`
}

export function formatInjection(query: string, hits: readonly SearchHit[]): string {
    if (hits.length === 0) return query
    let out = 'Relevant past conversations for context:\n'
    for (const { entry } of hits) {
        out += `- User asked: '${entry.user_query}'\n  Agent answered: '${entry.final_answer}'\n`
    }
    return `${out}\nUser task: ${query}`
}

/**
 * Similarity index over the (query, answer) pairs of completed sessions.
 *
 * Vectors and metadata live side by side in `indexDir`. The vector file is
 * always written first, so on load the metadata can never be ahead of the
 * vectors unless something else went wrong; that case and unreadable
 * metadata both trigger a full rebuild from the session logs.
 */
export class MemoryIndex {
    private vectors: FlatL2Index | undefined
    private entries: IndexEntry[] = []
    private sources = new Set<string>()
    private scanned = new Map<string, number>()
    private loaded = false
    private mutex = new Mutex()

    constructor(
        private fs: FileSystem,
        private embedder: Embedder,
        private logger: Logger,
        private options: MemoryIndexOptions
    ) {}

    get vectorPath(): string {
        return path.join(this.options.indexDir, VECTOR_FILE)
    }

    get metadataPath(): string {
        return path.join(this.options.indexDir, METADATA_FILE)
    }

    get size(): number {
        return this.entries.length
    }

    getEntries(): readonly IndexEntry[] {
        return this.entries
    }

    /** Indexes session logs added or changed since the last scan. Returns how many pairs were added. */
    async ensureFresh(signal?: AbortSignal): Promise<number> {
        return this.mutex.runExclusive(async () => {
            if (!this.loaded) await this.load()

            const files = await this.fs.listFiles(this.options.sessionsDir, '.jsonl')
            let added = 0
            try {
                for (const file of files) {
                    if (this.sources.has(file)) continue
                    const mtime = await this.fs.mtime(file)
                    if (this.scanned.get(file) === mtime) continue

                    const items = await this.readLog(file)
                    if (!items) {
                        this.scanned.set(file, mtime)
                        continue
                    }

                    // A file is appended only once all its pairs are embedded, so a failed
                    // embedding leaves it unscanned and it is retried whole next time.
                    const pairs = extractCompletedPairs(items)
                    const embedded: Array<{ pair: CompletedPair; vector: number[] }> = []
                    for (const pair of pairs) {
                        const vector = await this.embedder.embed(embeddingText(pair.userQuery, pair.finalAnswer), signal)
                        embedded.push({ pair, vector })
                    }
                    for (const { pair, vector } of embedded) {
                        this.append(vector, {
                            user_query: pair.userQuery,
                            final_answer: pair.finalAnswer,
                            source_file: file,
                            timestamp: pair.timestamp,
                        })
                        added++
                    }
                    if (pairs.length > 0) this.sources.add(file)
                    this.scanned.set(file, mtime)
                }
            } finally {
                if (added > 0) {
                    await this.persist()
                    this.logger.info({ added, total: this.entries.length }, 'memory-index:updated')
                }
            }
            return added
        })
    }

    async search(query: string, k: number = this.options.maxResults, signal?: AbortSignal): Promise<SearchHit[]> {
        await this.ensureFresh(signal)
        if (!this.vectors || this.vectors.size === 0 || k <= 0) return []

        const embedding = await this.embedder.embed(query, signal)
        if (embedding.length !== this.vectors.dimension) {
            throw new IndexUnavailableError(
                `Embedding dimension ${embedding.length} does not match index dimension ${this.vectors.dimension}`
            )
        }

        const hits: SearchHit[] = []
        for (const { index, distance } of this.vectors.search(embedding, k)) {
            const entry = this.entries[index]
            if (entry) hits.push({ entry, distance })
        }
        return hits
    }

    /**
     * Prepends relevant history to `query`. Candidates at or beyond
     * `threshold` are dropped; with none left, or on any failure, `query` is
     * returned unchanged.
     */
    async selectForInjection(
        query: string,
        k = 2,
        threshold: number = this.options.distanceThreshold,
        signal?: AbortSignal
    ): Promise<string> {
        let hits: SearchHit[]
        try {
            hits = await this.search(query, k, signal)
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'memory-index:search-failed')
            return query
        }

        const relevant = hits.filter((hit) => hit.distance < threshold)
        this.logger.debug(
            { candidates: hits.map((h) => h.distance), kept: relevant.length, threshold },
            'memory-index:injection'
        )
        return formatInjection(query, relevant)
    }

    private async readLog(file: string): Promise<MemoryItem[] | undefined> {
        let content: string
        try {
            content = await this.fs.readText(file)
        } catch (error) {
            this.logger.warn({ file, error: errorMessage(error) }, 'memory-index:unreadable-log')
            return undefined
        }

        const items: MemoryItem[] = []
        for (const line of content.split('\n')) {
            if (!line.trim()) continue
            const item = parseLine(line)
            if (!item) {
                this.logger.warn({ file }, 'memory-index:malformed-log')
                return undefined
            }
            items.push(item)
        }
        return items
    }

    private append(vector: number[], entry: IndexEntry): void {
        if (!this.vectors) this.vectors = new FlatL2Index(vector.length)
        this.vectors.add(vector)
        this.entries.push(entry)
    }

    private async persist(): Promise<void> {
        if (!this.vectors) return
        await this.fs.mkdir(this.options.indexDir)
        await this.fs.writeBytes(this.vectorPath, this.vectors.toBytes())
        await this.fs.writeJSON(this.metadataPath, this.entries)
    }

    private async load(): Promise<void> {
        this.loaded = true
        this.vectors = undefined
        this.entries = []
        this.sources.clear()
        this.scanned.clear()

        const hasMetadata = await this.fs.exists(this.metadataPath)
        const hasVectors = await this.fs.exists(this.vectorPath)
        if (!hasMetadata && !hasVectors) return

        let entries: IndexEntry[]
        try {
            entries = MetadataSchema.parse(await this.fs.readJSON<unknown>(this.metadataPath))
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'memory-index:metadata-unreadable, rebuilding')
            await this.reset()
            return
        }

        let vectors: FlatL2Index | undefined
        if (hasVectors) {
            try {
                vectors = FlatL2Index.fromBytes(await this.fs.readBytes(this.vectorPath))
            } catch (error) {
                this.logger.warn({ error: errorMessage(error) }, 'memory-index:vectors-unreadable')
            }
        }

        const rows = vectors?.size ?? 0
        if (rows < entries.length) {
            this.logger.warn({ rows, entries: entries.length }, 'memory-index:metadata-ahead, rebuilding')
            await this.reset()
            return
        }

        if (vectors && rows > entries.length) {
            this.logger.warn({ rows, entries: entries.length }, 'memory-index:truncating-vectors')
            vectors.truncate(entries.length)
            await this.fs.writeBytes(this.vectorPath, vectors.toBytes())
        }

        this.vectors = vectors && vectors.size > 0 ? vectors : undefined
        this.entries = entries
        for (const entry of entries) this.sources.add(entry.source_file)
        this.logger.debug({ entries: entries.length }, 'memory-index:loaded')
    }

    private async reset(): Promise<void> {
        this.vectors = undefined
        this.entries = []
        await this.fs.remove(this.vectorPath)
        await this.fs.remove(this.metadataPath)
    }
}
