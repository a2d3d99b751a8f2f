/**
 * Counts for one location of an ingestion run.
 */
export type LocationSummary = {
    /** The location as it was requested */
    location: string;
    /** Rows read from the source table */
    rows: number;
    /** Rows dropped by the normalizer for lacking an id */
    dropped: number;
    /** Normalized records handed to the loader */
    processed: number;
    /** Records newly committed */
    inserted: number;
    /** Records skipped as duplicates of a committed id */
    skipped: number;
    /** Wall-clock duration in milliseconds */
    durationMs: number;
};

/**
 * Totals for a completed ingestion run.
 */
export type RunSummary = {
    /** Normalized records handed to the loader */
    processed: number;
    /** Records newly committed */
    inserted: number;
    /** Records skipped as duplicates */
    skipped: number;
    /** Rows dropped for lacking an id */
    dropped: number;
    /** Rows indexed by the catch-up pass at the start of the run */
    recovered: number;
    /** Per-location breakdown, in processing order */
    locations: LocationSummary[];
};

/**
 * Progress events emitted while a run is in flight.
 */
export type RunProgressEvent =
    | { kind: "recovered"; indexed: number }
    | { kind: "location-start"; location: string; index: number; total: number }
    | { kind: "fetched"; location: string; bytes: number }
    | {
          kind: "chunk";
          location: string;
          processed: number;
          inserted: number;
          skipped: number;
      }
    | { kind: "location-done"; summary: LocationSummary };

/**
 * Options for an ingestion run.
 */
export type RunOptions = {
    /** Called for every progress event */
    onProgress?: (event: RunProgressEvent) => void;
    /** Cancels the run at the next chunk boundary */
    signal?: AbortSignal;
};
