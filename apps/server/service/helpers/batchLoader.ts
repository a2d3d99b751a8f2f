import type { BatchResult, Property } from "@unclaimed/core";
import type { PropertyStore } from "@unclaimed/store";
import debug from "debug";
import { LOADING_CHUNK_SIZE, VERBOSE } from "../config";
import { LoadFailedError, type LoadStage } from "../errors";

/**
 * Loggers for the batch loader.
 */
const logger = debug("api:load");
const error = debug("error:load");

/**
 * Progress reported after every committed chunk.
 */
export type ChunkProgress = {
    /** Offset of the chunk within the input */
    chunkOffset: number;
    /** Records in the chunk */
    chunkSize: number;
    /** Records handled so far, including this chunk */
    processed: number;
    /** Records inserted so far */
    inserted: number;
    /** Duplicates skipped so far */
    skipped: number;
    /** Rows added to the index by this chunk */
    indexed: number;
};

/**
 * Options for loading a record sequence.
 */
export type LoadAllOptions = {
    /** Called once per committed chunk */
    onChunk?: (progress: ChunkProgress) => void;
    /** Checked between chunks; an aborted signal stops the load */
    signal?: AbortSignal;
};

/**
 * Totals for a loaded record sequence.
 */
export type LoadSummary = BatchResult & {
    /** Records handled, inserted or skipped */
    processed: number;
};

/**
 * Commits normalized records to the store in chunks, extending the full-text
 * index after every chunk so the two never drift apart by more than the chunk
 * in flight.
 */
export class BatchLoader {
    private readonly store: PropertyStore;

    /** Records per chunk */
    readonly chunkSize: number;

    /**
     * @param store - The record store to write to.
     * @param chunkSize - Records per chunk.
     */
    constructor(store: PropertyStore, chunkSize = LOADING_CHUNK_SIZE) {
        if (!Number.isInteger(chunkSize) || chunkSize < 1) {
            throw new RangeError(
                `Chunk size must be a positive integer, got ${chunkSize}`,
            );
        }
        this.store = store;
        this.chunkSize = chunkSize;
    }

    /**
     * Extends the index over every committed row it does not cover yet.
     *
     * @returns The number of rows indexed.
     */
    catchUp(): number {
        const indexed = this.store.extendIndex();
        if (indexed > 0) logger(`indexed ${indexed} previously unindexed row(s)`);
        return indexed;
    }

    /**
     * Loads one batch: commits the records with insert-if-absent semantics,
     * then extends the index over the new rows. Both steps have committed
     * when this returns.
     *
     * @param records - The batch, in source order.
     * @returns Inserted and skipped counts for the batch.
     * @throws {LoadFailedError} If either step fails.
     */
    loadBatch(records: readonly Property[]): BatchResult {
        return this.loadChunk(records, 0, { inserted: 0, skipped: 0 }).result;
    }

    /**
     * Loads a lazy record sequence chunk by chunk, strictly in order.
     *
     * @param records - The record sequence.
     * @param options - Progress callback and cancellation signal.
     * @returns Totals for the records loaded.
     * @throws {LoadFailedError} If a chunk fails; earlier chunks stay committed.
     * @throws {Error} The signal's reason, when it aborts between chunks.
     */
    async loadAll(
        records: AsyncIterable<Property> | Iterable<Property>,
        options: LoadAllOptions = {},
    ): Promise<LoadSummary> {
        const { onChunk, signal } = options;
        const totals = { processed: 0, inserted: 0, skipped: 0 };
        let chunk: Property[] = [];

        const flush = () => {
            const { result, indexed } = this.loadChunk(
                chunk,
                totals.processed,
                totals,
            );
            const chunkSize = chunk.length;
            const chunkOffset = totals.processed;
            totals.processed += chunkSize;
            totals.inserted += result.inserted;
            totals.skipped += result.skipped;
            chunk = [];

            if (VERBOSE)
                logger(
                    `chunk at ${chunkOffset}: ${result.inserted} inserted, ${result.skipped} skipped`,
                );
            onChunk?.({ chunkOffset, chunkSize, indexed, ...totals });
        };

        signal?.throwIfAborted();
        for await (const record of records) {
            chunk.push(record);
            if (chunk.length >= this.chunkSize) {
                flush();
                // Cancellation only takes effect on a chunk boundary
                signal?.throwIfAborted();
            }
        }
        if (chunk.length > 0) flush();

        return totals;
    }

    /**
     * Runs the two-step chunk protocol.
     *
     * @param records - The chunk.
     * @param chunkOffset - Offset of the chunk within its input.
     * @param committed - Counts committed from the input before this chunk.
     * @returns The chunk's counts and the number of rows indexed.
     */
    private loadChunk(
        records: readonly Property[],
        chunkOffset: number,
        committed: BatchResult,
    ): { result: BatchResult; indexed: number } {
        const fail = (stage: LoadStage, cause: unknown, counts: BatchResult) => {
            error(`failed to ${stage} chunk at offset ${chunkOffset}`, cause);
            return new LoadFailedError(
                {
                    stage,
                    chunkOffset,
                    chunkSize: records.length,
                    inserted: counts.inserted,
                    skipped: counts.skipped,
                },
                cause,
            );
        };

        // Step 1: commit the chunk
        let result: BatchResult;
        try {
            result = this.store.insertIfAbsent(records);
        } catch (error_) {
            throw fail("insert", error_, committed);
        }

        // Step 2: extend the index from the watermark
        let indexed: number;
        try {
            indexed = this.store.extendIndex();
        } catch (error_) {
            throw fail("index", error_, {
                inserted: committed.inserted + result.inserted,
                skipped: committed.skipped + result.skipped,
            });
        }

        return { result, indexed };
    }
}
