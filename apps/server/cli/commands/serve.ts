/**
 * Serve Command Implementation
 *
 * Starts the HTTP API. A missing or empty database is built from the full
 * archive first.
 */

import * as fs from "node:fs";
import { PropertyStore } from "@unclaimed/store";
import debug from "debug";
import { startServer, stopServer } from "../../server";
import {
    ACCESS_CONTROL_ALLOW_ORIGIN,
    ALL_RECORDS_FILE,
    DB_PATH,
    LOADING_CHUNK_SIZE,
    SERVER_PORT,
    SOURCE_BASE_URL,
    parsePositiveInt,
} from "../../service/config";
import { SourceFetcher } from "../../service/helpers/fetcher";
import {
    displayKeyValue,
    displayNotice,
    displaySection,
    failSpinner,
    getDaemonMode,
    logError,
    logInfo,
    startSpinner,
    succeedSpinner,
    theme,
} from "../../service/helpers/terminalUI";
import { createPropertyService } from "../../service/index";
import { openWritableStore, runIngestCommand } from "./ingest";

/** Debug logger for API operations */
const logger = debug("api");

/**
 * Command options for the serve command.
 */
export interface ServeCommandOptions {
    /** Run in daemon (background) mode */
    daemon: boolean;
    /** Port to listen on */
    port?: string;
    /** Database file path */
    db?: string;
}

/**
 * Checks whether the database still has to be built. A file left behind by a
 * failed first ingest holds no records and counts as missing.
 *
 * @param dbPath - Database file path.
 * @returns Whether an ingest must run before serving.
 */
export const needsInitialIngest = (dbPath: string): boolean => {
    if (!fs.existsSync(dbPath)) return true;

    const store = PropertyStore.open(dbPath);
    try {
        return store.count() === 0;
    } finally {
        store.close();
    }
};

/**
 * Executes the serve command.
 *
 * @param options - Command options from the CLI.
 * @returns Resolves once the server is listening.
 */
export async function runServeCommand(
    options: ServeCommandOptions,
): Promise<void> {
    const isDaemon = getDaemonMode();
    const port = parsePositiveInt(options.port, SERVER_PORT);
    const dbPath = options.db ?? DB_PATH;

    // Enable debug loggers if not in daemon mode
    if (!isDaemon && process.env.DEBUG === undefined) {
        debug.enable("api,error");
    }

    // Build the database on first start, or after a first ingest that failed
    if (needsInitialIngest(dbPath)) {
        logInfo(`No records in ${dbPath}; ingesting ${ALL_RECORDS_FILE} first`);
        await runIngestCommand([], {
            daemon: isDaemon,
            tiers: false,
            db: dbPath,
        });
    }

    displaySection("Server Configuration");
    displayKeyValue({
        Port: port,
        Environment: process.env.NODE_ENV || "development",
        Database: dbPath,
        "CORS Origin": ACCESS_CONTROL_ALLOW_ORIGIN || "(not set)",
    });
    displaySection("Server Startup");

    const store = await openWritableStore(dbPath);
    const service = createPropertyService({
        store,
        fetcher: new SourceFetcher({ baseUrl: SOURCE_BASE_URL }),
        chunkSize: LOADING_CHUNK_SIZE,
    });

    startSpinner("Starting REST API server...");
    let url: string;
    try {
        url = await startServer({ service }, port);
        succeedSpinner(`REST API server started on port ${theme.highlight(String(port))}`);
        logger("server started", url);
    } catch (err) {
        failSpinner("Failed to start REST API server");
        logError("Server startup error", err);
        store.close();
        throw err;
    }

    // Close the store once the server has drained
    process.once("SIGINT", () => {
        stopServer()
            .catch((err: unknown) => logError("Error stopping server", err))
            .finally(() => {
                store.close();
                process.exit(0);
            });
    });

    if (!isDaemon) {
        console.log();
        displayNotice(`Server is ready at ${url}`, "success");
        console.log();
    }
}
