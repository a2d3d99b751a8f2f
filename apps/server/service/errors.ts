/**
 * Error taxonomy for the ingestion pipeline and the read path.
 *
 * Every error carries a stable `code` so the request layer and the CLI can
 * react to the kind of failure without matching on messages.
 */

/**
 * Stable error codes.
 */
export type PipelineErrorCode =
    | "FETCH_FAILED"
    | "ARCHIVE_EMPTY"
    | "LOAD_FAILED"
    | "INGESTION_FAILED"
    | "INGESTION_IN_PROGRESS"
    | "QUERY_TOO_SHORT"
    | "NOT_FOUND";

/**
 * Base class for all pipeline errors.
 */
export class PropertyPipelineError extends Error {
    /** Stable machine-readable error code */
    readonly code: PipelineErrorCode;

    /**
     * @param code - Stable error code.
     * @param message - Human-readable description.
     * @param cause - The underlying error, when there is one.
     */
    constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = "PropertyPipelineError";
        this.code = code;
    }
}

/**
 * A source archive could not be fetched or read.
 */
export class FetchFailedError extends PropertyPipelineError {
    /** The location that failed */
    readonly location: string;

    constructor(location: string, cause: unknown) {
        const reason = cause instanceof Error ? `: ${cause.message}` : "";
        super("FETCH_FAILED", `Failed to fetch '${location}'${reason}`, cause);
        this.name = "FetchFailedError";
        this.location = location;
    }
}

/**
 * A source archive holds no table.
 */
export class ArchiveEmptyError extends PropertyPipelineError {
    constructor() {
        super("ARCHIVE_EMPTY", "Archive does not contain a table");
        this.name = "ArchiveEmptyError";
    }
}

/**
 * Which step of the chunk protocol failed.
 */
export type LoadStage = "insert" | "index";

/**
 * Context attached to a failed chunk load.
 */
export type LoadFailureContext = {
    /** The chunk protocol step that failed */
    stage: LoadStage;
    /** Number of records of the input handled before the failed chunk */
    chunkOffset: number;
    /** Size of the failed chunk */
    chunkSize: number;
    /** Records committed from this input before the failure */
    inserted: number;
    /** Duplicates skipped from this input before the failure */
    skipped: number;
};

/**
 * A storage fault while loading a chunk. The store and index are left
 * consistent with the last committed chunk.
 */
export class LoadFailedError extends PropertyPipelineError {
    readonly stage: LoadStage;
    readonly chunkOffset: number;
    readonly chunkSize: number;
    readonly inserted: number;
    readonly skipped: number;

    constructor(context: LoadFailureContext, cause: unknown) {
        const reason = cause instanceof Error ? `: ${cause.message}` : "";
        super(
            "LOAD_FAILED",
            `Failed to ${context.stage === "insert" ? "insert" : "index"} chunk at offset ${context.chunkOffset}${reason}`,
            cause,
        );
        this.name = "LoadFailedError";
        this.stage = context.stage;
        this.chunkOffset = context.chunkOffset;
        this.chunkSize = context.chunkSize;
        this.inserted = context.inserted;
        this.skipped = context.skipped;
    }
}

/**
 * Counts committed before a run was aborted.
 */
export type CommittedCounts = {
    processed: number;
    inserted: number;
    skipped: number;
};

/**
 * An ingestion run was aborted. Reports enough context for a manual retry.
 */
export class IngestionRunError extends PropertyPipelineError {
    /** The location being processed when the run failed */
    readonly location: string;
    /** Offset of the chunk that failed within the location, when known */
    readonly chunkOffset: number | undefined;
    /** Counts committed from the failed location */
    readonly locationCommitted: CommittedCounts;
    /** Counts committed by the whole run */
    readonly runCommitted: CommittedCounts;

    constructor(
        location: string,
        chunkOffset: number | undefined,
        locationCommitted: CommittedCounts,
        runCommitted: CommittedCounts,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? `: ${cause.message}` : "";
        super(
            "INGESTION_FAILED",
            `Ingestion of '${location}' failed after ${locationCommitted.inserted} inserted record(s)${reason}`,
            cause,
        );
        this.name = "IngestionRunError";
        this.location = location;
        this.chunkOffset = chunkOffset;
        this.locationCommitted = locationCommitted;
        this.runCommitted = runCommitted;
    }
}

/**
 * Another ingestion run is already in flight on the same orchestrator.
 */
export class IngestionInProgressError extends PropertyPipelineError {
    constructor() {
        super("INGESTION_IN_PROGRESS", "An ingestion run is already in progress");
        this.name = "IngestionInProgressError";
    }
}

/**
 * The search text is shorter than the minimum query length.
 */
export class QueryTooShortError extends PropertyPipelineError {
    /** The minimum accepted length */
    readonly minLength: number;

    constructor(minLength: number) {
        super(
            "QUERY_TOO_SHORT",
            `Search query must be at least ${minLength} characters`,
        );
        this.name = "QueryTooShortError";
        this.minLength = minLength;
    }
}

/**
 * No property exists with the requested id.
 */
export class NotFoundError extends PropertyPipelineError {
    readonly propertyId: string;

    constructor(propertyId: string) {
        super("NOT_FOUND", `Property '${propertyId}' does not exist`);
        this.name = "NotFoundError";
        this.propertyId = propertyId;
    }
}
