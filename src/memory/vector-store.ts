const HEADER_BYTES = 8

export function squaredL2(a: ArrayLike<number>, b: ArrayLike<number>): number {
    let sum = 0
    for (let i = 0; i < a.length; i++) {
        const d = (a[i] ?? 0) - (b[i] ?? 0)
        sum += d * d
    }
    return sum
}

/**
 * Exact nearest-neighbour index over float32 rows.
 *
 * File layout, little-endian: uint32 dimension, uint32 row count, then
 * `count * dimension` float32 values.
 */
export class FlatL2Index {
    private data: Float32Array
    private rows: number

    constructor(
        readonly dimension: number,
        data?: Float32Array
    ) {
        if (!Number.isInteger(dimension) || dimension <= 0) {
            throw new Error(`Invalid vector dimension: ${dimension}`)
        }
        this.data = data ?? new Float32Array(0)
        this.rows = Math.floor(this.data.length / dimension)
    }

    get size(): number {
        return this.rows
    }

    add(vector: readonly number[]): void {
        if (vector.length !== this.dimension) {
            throw new Error(`Vector dimension ${vector.length} does not match index dimension ${this.dimension}`)
        }
        const next = new Float32Array((this.rows + 1) * this.dimension)
        next.set(this.data.subarray(0, this.rows * this.dimension))
        next.set(vector, this.rows * this.dimension)
        this.data = next
        this.rows++
    }

    row(index: number): Float32Array {
        return this.data.subarray(index * this.dimension, (index + 1) * this.dimension)
    }

    /** The `k` closest rows, nearest first. Ties keep insertion order. */
    search(query: readonly number[], k: number): Array<{ index: number; distance: number }> {
        if (query.length !== this.dimension) {
            throw new Error(`Query dimension ${query.length} does not match index dimension ${this.dimension}`)
        }
        const scored: Array<{ index: number; distance: number }> = []
        for (let i = 0; i < this.rows; i++) {
            scored.push({ index: i, distance: squaredL2(query, this.row(i)) })
        }
        scored.sort((a, b) => a.distance - b.distance || a.index - b.index)
        return scored.slice(0, Math.max(0, k))
    }

    truncate(count: number): void {
        if (count >= this.rows) return
        this.rows = Math.max(0, count)
        this.data = this.data.slice(0, this.rows * this.dimension)
    }

    toBytes(): Uint8Array {
        const bytes = new Uint8Array(HEADER_BYTES + this.rows * this.dimension * 4)
        const view = new DataView(bytes.buffer)
        view.setUint32(0, this.dimension, true)
        view.setUint32(4, this.rows, true)
        for (let i = 0; i < this.rows * this.dimension; i++) {
            view.setFloat32(HEADER_BYTES + i * 4, this.data[i] ?? 0, true)
        }
        return bytes
    }

    static fromBytes(bytes: Uint8Array): FlatL2Index {
        if (bytes.byteLength < HEADER_BYTES) throw new Error('Vector file is truncated')
        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
        const dimension = view.getUint32(0, true)
        const count = view.getUint32(4, true)
        if (bytes.byteLength < HEADER_BYTES + count * dimension * 4) {
            throw new Error('Vector file is shorter than its header claims')
        }
        const data = new Float32Array(count * dimension)
        for (let i = 0; i < data.length; i++) {
            data[i] = view.getFloat32(HEADER_BYTES + i * 4, true)
        }
        return new FlatL2Index(dimension, data)
    }
}
