/**
 * Ingest Command Implementation
 *
 * Runs an ingestion over the requested archives with spinner progress and a
 * closing summary. Ctrl+C stops the run at the next chunk boundary.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { PropertyStore } from "@unclaimed/store";
import debug from "debug";
import {
    ALL_RECORDS_FILE,
    DB_PATH,
    LOADING_CHUNK_SIZE,
    SOURCE_BASE_URL,
    TIER_FILES,
    VERBOSE,
    parsePositiveInt,
} from "../../service/config";
import { IngestionRunError } from "../../service/errors";
import { SourceFetcher } from "../../service/helpers/fetcher";
import {
    displayKeyValue,
    displayNotice,
    displaySection,
    failSpinner,
    formatBytes,
    formatCount,
    formatDuration,
    formatLocationSummary,
    getDaemonMode,
    logError,
    logInfo,
    logSuccess,
    runSummaryRows,
    startSpinner,
    succeedSpinner,
    updateSpinner,
    warnSpinner,
} from "../../service/helpers/terminalUI";
import { createPropertyService } from "../../service/index";
import type * as Types from "../../service/types/index";

/** Debug logger for API operations */
const logger = debug("api");

/** Debug logger for error operations */
const error = debug("error");

/**
 * Command options for the ingest command.
 */
export interface IngestCommandOptions {
    /** Run in daemon (background) mode */
    daemon: boolean;
    /** Ingest the four amount tiers instead of the full archive */
    tiers: boolean;
    /** Records per chunk */
    chunkSize?: string;
    /** Database file path */
    db?: string;
}

/**
 * Picks the archives an ingest command should process.
 *
 * @param locations - Locations named on the command line.
 * @param tiers - Whether the tier archives were requested.
 * @returns The locations, in processing order.
 */
export const resolveLocations = (
    locations: readonly string[],
    tiers: boolean,
): string[] => {
    if (locations.length > 0) return [...locations];
    return tiers ? [...TIER_FILES] : [ALL_RECORDS_FILE];
};

/**
 * Opens the writable store, creating its directory first.
 *
 * @param dbPath - Database file path.
 * @returns The opened store.
 */
export const openWritableStore = async (dbPath: string): Promise<PropertyStore> => {
    await fs.promises.mkdir(path.dirname(path.resolve(dbPath)), {
        recursive: true,
    });
    return PropertyStore.open(dbPath, { verbose: VERBOSE });
};

/**
 * Renders run progress events on the spinner.
 *
 * @param event - The progress event.
 */
const reportProgress = (event: Types.RunProgressEvent): void => {
    switch (event.kind) {
        case "recovered":
            logInfo(
                `Indexed ${formatCount(event.indexed)} record(s) left unindexed by an earlier run`,
            );
            break;
        case "location-start":
            startSpinner(
                `[${event.index + 1}/${event.total}] Fetching ${event.location}...`,
            );
            break;
        case "fetched":
            updateSpinner(
                `Loading ${event.location} (${formatBytes(event.bytes)})...`,
            );
            break;
        case "chunk":
            updateSpinner(
                `Loading ${event.location}: ${formatCount(event.processed)} processed, ${formatCount(event.inserted)} new`,
            );
            break;
        case "location-done":
            succeedSpinner(formatLocationSummary(event.summary));
            break;
    }
};

/**
 * Executes the ingest command.
 *
 * @param locations - Locations named on the command line.
 * @param options - Command options from the CLI.
 * @returns The run summary.
 * @throws {IngestionRunError} If the run fails or is cancelled.
 */
export async function runIngestCommand(
    locations: readonly string[],
    options: IngestCommandOptions,
): Promise<Types.RunSummary> {
    const startTime = Date.now();
    const isDaemon = getDaemonMode();
    const dbPath = options.db ?? DB_PATH;
    const chunkSize = parsePositiveInt(options.chunkSize, LOADING_CHUNK_SIZE);
    const targets = resolveLocations(locations, options.tiers);

    // Enable debug loggers if not in daemon mode
    if (!isDaemon && process.env.DEBUG === undefined) {
        debug.enable("api,error");
    }

    displaySection("Configuration");
    displayKeyValue({
        Database: dbPath,
        Source: SOURCE_BASE_URL,
        "Chunk Size": formatCount(chunkSize),
        Archives: targets.join(", "),
    });
    displaySection("Ingestion");

    const store = await openWritableStore(dbPath);
    const service = createPropertyService({
        store,
        fetcher: new SourceFetcher({ baseUrl: SOURCE_BASE_URL }),
        chunkSize,
    });

    // Ctrl+C cancels at the next chunk boundary
    const controller = new AbortController();
    const onInterrupt = () => {
        updateSpinner("Stopping after the current chunk...");
        controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
        const summary = await service.triggerIngestion(targets, {
            signal: controller.signal,
            onProgress: reportProgress,
        });
        const duration = Date.now() - startTime;
        logger("ingestion complete", summary);

        displaySection("Summary");
        displayKeyValue(runSummaryRows(summary, duration));
        if (!isDaemon) console.log();
        displayNotice(`Ingestion completed in ${formatDuration(duration)}`, "success");
        logSuccess(`${formatCount(store.count())} records searchable`);

        return summary;
    } catch (err) {
        if (controller.signal.aborted) {
            warnSpinner("Ingestion cancelled");
        } else {
            failSpinner("Ingestion failed");
            logError("Ingestion error", err);
        }
        error("error ingesting data", err);

        if (err instanceof IngestionRunError) {
            displayKeyValue({
                "Failed Archive": err.location,
                "Chunk Offset": err.chunkOffset ?? "n/a",
                "Committed (run)": formatCount(err.runCommitted.inserted),
            });
        }
        throw err;
    } finally {
        process.removeListener("SIGINT", onInterrupt);
        store.close();
    }
}
