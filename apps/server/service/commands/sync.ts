import type { RawRow } from "@unclaimed/core";
import type { PropertyStore } from "@unclaimed/store";
import debug from "debug";
import { LOADING_CHUNK_SIZE } from "../config";
import {
    type CommittedCounts,
    IngestionInProgressError,
    IngestionRunError,
    LoadFailedError,
} from "../errors";
import { BatchLoader } from "../helpers/batchLoader";
import { SourceFetcher } from "../helpers/fetcher";
import { normalizeRows } from "../helpers/normalize";
import type * as Types from "../types/index";

/**
 * Loggers for ingestion runs.
 */
const logger = debug("api:sync");
const error = debug("error:sync");

/**
 * Options for the sync orchestrator.
 */
export type SyncOrchestratorOptions = {
    /** Source fetcher; a default one is created when omitted */
    fetcher?: SourceFetcher;
    /** Records per chunk */
    chunkSize?: number;
};

/**
 * Drives ingestion runs: fetch, normalize and load each location in order.
 *
 * Only one run may be in flight per orchestrator. Serializing writers across
 * processes is the deployment's concern.
 */
export class SyncOrchestrator {
    private readonly fetcher: SourceFetcher;
    private readonly loader: BatchLoader;
    private running = false;

    /**
     * @param store - The record store ingestion writes to.
     * @param options - Fetcher and chunk size overrides.
     */
    constructor(store: PropertyStore, options: SyncOrchestratorOptions = {}) {
        this.fetcher = options.fetcher ?? new SourceFetcher();
        this.loader = new BatchLoader(
            store,
            options.chunkSize ?? LOADING_CHUNK_SIZE,
        );
    }

    /**
     * Whether a run is currently in flight.
     */
    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Ingests the given locations in order.
     *
     * The run starts by indexing any rows a previous, interrupted run committed
     * but never indexed. Re-running with the same locations inserts nothing new.
     *
     * @param locations - Archive locations, processed in order.
     * @param options - Progress callback and cancellation signal.
     * @returns Totals for the run.
     * @throws {IngestionInProgressError} If a run is already in flight.
     * @throws {IngestionRunError} If a location fails; earlier chunks stay committed.
     */
    async run(
        locations: readonly string[],
        options: Types.RunOptions = {},
    ): Promise<Types.RunSummary> {
        if (this.running) {
            throw new IngestionInProgressError();
        }
        this.running = true;

        try {
            return await this.runLocations(locations, options);
        } finally {
            this.running = false;
        }
    }

    /**
     * Runs every location, accumulating the run's totals.
     */
    private async runLocations(
        locations: readonly string[],
        options: Types.RunOptions,
    ): Promise<Types.RunSummary> {
        const { onProgress } = options;
        const summary: Types.RunSummary = {
            processed: 0,
            inserted: 0,
            skipped: 0,
            dropped: 0,
            recovered: 0,
            locations: [],
        };

        // Resume: index whatever an interrupted run committed
        try {
            summary.recovered = this.loader.catchUp();
        } catch (error_) {
            error("failed to index previously committed rows", error_);
            throw new IngestionRunError(
                "(catch-up)",
                undefined,
                { processed: 0, inserted: 0, skipped: 0 },
                { processed: 0, inserted: 0, skipped: 0 },
                error_,
            );
        }
        if (summary.recovered > 0) {
            onProgress?.({ kind: "recovered", indexed: summary.recovered });
        }

        for (const [index, location] of locations.entries()) {
            onProgress?.({
                kind: "location-start",
                location,
                index,
                total: locations.length,
            });

            const result = await this.runLocation(location, summary, options);
            summary.processed += result.processed;
            summary.inserted += result.inserted;
            summary.skipped += result.skipped;
            summary.dropped += result.dropped;
            summary.locations.push(result);

            logger(
                `ingested '${location}': ${result.inserted} inserted, ${result.skipped} skipped, ${result.dropped} dropped`,
            );
            onProgress?.({ kind: "location-done", summary: result });
        }

        return summary;
    }

    /**
     * Fetches, normalizes and loads one location.
     */
    private async runLocation(
        location: string,
        run: CommittedCounts,
        options: Types.RunOptions,
    ): Promise<Types.LocationSummary> {
        const { onProgress, signal } = options;
        const startedAt = Date.now();
        const counts = { rows: 0, dropped: 0 };
        const committed: CommittedCounts = {
            processed: 0,
            inserted: 0,
            skipped: 0,
        };

        try {
            signal?.throwIfAborted();

            const archive = await this.fetcher.fetch(location);
            onProgress?.({ kind: "fetched", location, bytes: archive.length });

            const rows = this.countRows(
                this.fetcher.openFirstTable(archive, location),
                counts,
            );
            const records = normalizeRows(rows, () => {
                counts.dropped += 1;
            });

            const totals = await this.loader.loadAll(records, {
                signal,
                onChunk: (progress) => {
                    committed.processed = progress.processed;
                    committed.inserted = progress.inserted;
                    committed.skipped = progress.skipped;
                    onProgress?.({
                        kind: "chunk",
                        location,
                        processed: progress.processed,
                        inserted: progress.inserted,
                        skipped: progress.skipped,
                    });
                },
            });

            return {
                location,
                rows: counts.rows,
                dropped: counts.dropped,
                processed: totals.processed,
                inserted: totals.inserted,
                skipped: totals.skipped,
                durationMs: Date.now() - startedAt,
            };
        } catch (error_) {
            const chunkOffset =
                error_ instanceof LoadFailedError
                    ? error_.chunkOffset
                    : undefined;
            if (error_ instanceof LoadFailedError) {
                // The failed chunk's own insert may have committed before its index step failed
                committed.processed =
                    error_.stage === "index"
                        ? error_.chunkOffset + error_.chunkSize
                        : error_.chunkOffset;
                committed.inserted = error_.inserted;
                committed.skipped = error_.skipped;
            }

            error(`ingestion of '${location}' failed`, error_);
            throw new IngestionRunError(
                location,
                chunkOffset,
                committed,
                {
                    processed: run.processed + committed.processed,
                    inserted: run.inserted + committed.inserted,
                    skipped: run.skipped + committed.skipped,
                },
                error_,
            );
        }
    }

    /**
     * Passes rows through while counting them.
     */
    private async *countRows(
        rows: AsyncIterable<RawRow>,
        counts: { rows: number },
    ): AsyncGenerator<RawRow> {
        for await (const row of rows) {
            counts.rows += 1;
            yield row;
        }
    }
}
