/**
 * Centralized configuration module for the unclaimed property service.
 *
 * This module parses all environment variables once at startup. Components
 * take their defaults from it; the CLI and server entry points override them
 * through constructor options.
 *
 * @module config
 */

import * as path from "node:path";

/**
 * Parses a positive integer environment variable, falling back to a default
 * when it is missing or not a positive number.
 *
 * @param value - The raw environment value.
 * @param fallback - Default to use.
 * @returns The parsed value.
 */
export const parsePositiveInt = (
    value: string | undefined,
    fallback: number,
): number => {
    const parsed = Number.parseInt(value ?? "", 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

// ---------------------------------------------------------------------------------
// Source Configuration
// ---------------------------------------------------------------------------------

/**
 * Base URL of the State Controller's download site. Bare archive names are
 * resolved against it.
 *
 * @default "https://dpupd.sco.ca.gov"
 * @env SCO_BASE
 */
export const SOURCE_BASE_URL =
    process.env.SCO_BASE ?? "https://dpupd.sco.ca.gov";

/**
 * Archive holding every published record.
 */
export const ALL_RECORDS_FILE = "00_All_Records.zip";

/**
 * Archives splitting the records by reported amount. They overlap with
 * {@link ALL_RECORDS_FILE}, which deduplication absorbs.
 */
export const TIER_FILES = [
    "01_From_0_To_Below_10.zip",
    "02_From_10_To_Below_100.zip",
    "03_From_100_To_Below_500.zip",
    "04_From_500_To_Beyond.zip",
] as const;

/**
 * Every archive name the HTTP API accepts. Names resolve against
 * {@link SOURCE_BASE_URL}.
 */
export const PUBLISHED_ARCHIVES = [ALL_RECORDS_FILE, ...TIER_FILES] as const;

/**
 * Timeout in milliseconds for fetching one archive.
 *
 * @default 60000
 * @env UNCLAIMED_FETCH_TIMEOUT_MS
 */
export const FETCH_TIMEOUT_MS = parsePositiveInt(
    process.env.UNCLAIMED_FETCH_TIMEOUT_MS,
    60000,
);

// ---------------------------------------------------------------------------------
// Storage Configuration
// ---------------------------------------------------------------------------------

/**
 * Directory for local data files.
 *
 * @default "data"
 * @env DATA_DIR
 */
export const DATA_DIR = process.env.DATA_DIR ?? "data";

/**
 * Path of the SQLite database file.
 *
 * @default "data/unclaimed.db"
 * @env DB_PATH
 */
export const DB_PATH = process.env.DB_PATH ?? path.join(DATA_DIR, "unclaimed.db");

/**
 * Number of records committed (and indexed) per chunk.
 *
 * @default 10000
 * @env UNCLAIMED_CHUNK_SIZE
 */
export const LOADING_CHUNK_SIZE = parsePositiveInt(
    process.env.UNCLAIMED_CHUNK_SIZE,
    10000,
);

// ---------------------------------------------------------------------------------
// Search Configuration
// ---------------------------------------------------------------------------------

/**
 * Shortest accepted search query.
 */
export const MIN_QUERY_LENGTH = 2;

/**
 * Result limit used when the caller supplies none.
 *
 * @default 50
 * @env UNCLAIMED_DEFAULT_LIMIT
 */
export const DEFAULT_SEARCH_LIMIT = parsePositiveInt(
    process.env.UNCLAIMED_DEFAULT_LIMIT,
    50,
);

/**
 * Largest result limit a caller may request; larger values are clamped.
 *
 * @default 500
 * @env UNCLAIMED_MAX_LIMIT
 */
export const MAX_SEARCH_LIMIT = parsePositiveInt(
    process.env.UNCLAIMED_MAX_LIMIT,
    500,
);

// ---------------------------------------------------------------------------------
// Server Configuration
// ---------------------------------------------------------------------------------

/**
 * HTTP port for the API server.
 *
 * @default 8000
 * @env PORT
 */
export const SERVER_PORT = parsePositiveInt(process.env.PORT, 8000);

/**
 * Value of the Access-Control-Allow-Origin header, when set.
 *
 * @env UNCLAIMED_ACCESS_CONTROL_ALLOW_ORIGIN
 */
export const ACCESS_CONTROL_ALLOW_ORIGIN =
    process.env.UNCLAIMED_ACCESS_CONTROL_ALLOW_ORIGIN;

/**
 * Value of the Access-Control-Allow-Headers header, when set.
 *
 * @env UNCLAIMED_ACCESS_CONTROL_ALLOW_HEADERS
 */
export const ACCESS_CONTROL_ALLOW_HEADERS =
    process.env.UNCLAIMED_ACCESS_CONTROL_ALLOW_HEADERS;

/**
 * Whether to enable verbose logging.
 *
 * @default false
 * @env VERBOSE
 */
export const VERBOSE = process.env.VERBOSE === "true";
