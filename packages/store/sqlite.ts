import type { BatchResult, Property } from "@unclaimed/core";
import Database from "better-sqlite3";
import debug from "debug";

/**
 * Logger for record store operations.
 */
const logger = debug("api:store");

/**
 * Persisted shape of a property row.
 */
export type PropertyRow = {
    seq: number;
    property_id: string;
    owner_name: string;
    owner_address: string;
    owner_city: string;
    owner_state: string;
    owner_zip: string;
    amount_reported: number;
    cash_reported: string;
    property_type: string;
    holder_name: string;
    holder_address: string;
    reported_date: string;
    raw_json: string;
};

/**
 * Named parameters bound by the insert statement.
 */
type PropertyInsertParams = Omit<PropertyRow, "seq">;

/**
 * Options for opening a record store.
 */
export type StoreOptions = {
    /** Open the database read-only (for query-only processes) */
    readonly?: boolean;
    /** Milliseconds a connection waits on a locked database before failing */
    busyTimeoutMs?: number;
    /** Whether to log statements through the `api:store:sql` namespace */
    verbose?: boolean;
};

/**
 * Schema for the record store and its derived full-text index.
 *
 * `seq` is the store-assigned sequence position. AUTOINCREMENT guarantees a
 * sequence number is never reused, so the index watermark can only move forward.
 * The FTS table keeps its own copy of the projected text and uses `seq` as its
 * rowid, which is what makes "highest indexed rowid" a usable watermark.
 */
const SCHEMA = `
CREATE TABLE IF NOT EXISTS properties (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    property_id TEXT NOT NULL UNIQUE,
    owner_name TEXT NOT NULL DEFAULT '',
    owner_address TEXT NOT NULL DEFAULT '',
    owner_city TEXT NOT NULL DEFAULT '',
    owner_state TEXT NOT NULL DEFAULT '',
    owner_zip TEXT NOT NULL DEFAULT '',
    amount_reported REAL NOT NULL DEFAULT 0,
    cash_reported TEXT NOT NULL DEFAULT '',
    property_type TEXT NOT NULL DEFAULT '',
    holder_name TEXT NOT NULL DEFAULT '',
    holder_address TEXT NOT NULL DEFAULT '',
    reported_date TEXT NOT NULL DEFAULT '',
    raw_json TEXT NOT NULL DEFAULT ''
);

CREATE VIRTUAL TABLE IF NOT EXISTS properties_fts USING fts5(
    owner_name,
    owner_address,
    owner_city,
    holder_name,
    tokenize = 'unicode61 remove_diacritics 2'
);
`;

/**
 * Maps a persisted row to the canonical property record.
 *
 * @param row - The row read from the `properties` table.
 * @returns The property record.
 */
export const rowToProperty = (row: PropertyRow): Property => ({
    propertyId: row.property_id,
    ownerName: row.owner_name,
    ownerAddress: row.owner_address,
    ownerCity: row.owner_city,
    ownerState: row.owner_state,
    ownerZip: row.owner_zip,
    amountReported: row.amount_reported,
    cashReported: row.cash_reported,
    propertyType: row.property_type,
    holderName: row.holder_name,
    holderAddress: row.holder_address,
    reportedDate: row.reported_date,
    rawPayload: row.raw_json,
});

/**
 * Maps a property record to the insert statement's named parameters.
 *
 * @param property - The canonical property record.
 * @returns The bound parameters.
 */
const propertyToParams = (property: Property): PropertyInsertParams => ({
    property_id: property.propertyId,
    owner_name: property.ownerName,
    owner_address: property.ownerAddress,
    owner_city: property.ownerCity,
    owner_state: property.ownerState,
    owner_zip: property.ownerZip,
    amount_reported: property.amountReported,
    cash_reported: property.cashReported,
    property_type: property.propertyType,
    holder_name: property.holderName,
    holder_address: property.holderAddress,
    reported_date: property.reportedDate,
    raw_json: property.rawPayload,
});

/**
 * SQLite-backed record store holding the `properties` table and the derived
 * `properties_fts` index.
 *
 * Writers should be a single logical ingestion run at a time. Readers open
 * their own connection; WAL mode lets them run alongside chunk commits and
 * only ever see whole chunks.
 */
export class PropertyStore {
    /** The underlying connection */
    readonly db: Database.Database;

    /** Whether this handle was opened read-only */
    readonly readonly: boolean;

    /**
     * Wraps an open connection. Use {@link PropertyStore.open} to create one
     * with the schema and pragmas applied.
     *
     * @param db - An open better-sqlite3 connection.
     */
    constructor(db: Database.Database) {
        this.db = db;
        this.readonly = db.readonly;
    }

    /**
     * Opens (creating if needed) a record store.
     *
     * @param filename - Database file path, or `:memory:` for a private in-memory store.
     * @param options - Connection options.
     * @returns The opened store.
     */
    static open(filename: string, options: StoreOptions = {}): PropertyStore {
        const { readonly = false, busyTimeoutMs = 5000, verbose = false } =
            options;
        const sqlLogger = debug("api:store:sql");

        const db = new Database(filename, {
            readonly,
            fileMustExist: readonly,
            ...(verbose && {
                verbose: (message?: unknown) => sqlLogger(message),
            }),
        });
        db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);

        if (!readonly) {
            // WAL gives readers a consistent snapshot while chunks commit
            db.pragma("journal_mode = WAL");
            db.pragma("synchronous = NORMAL");
            db.exec(SCHEMA);
            logger(`opened record store '${filename}'`);
        }

        return new PropertyStore(db);
    }

    /**
     * Inserts the records in one transaction, keeping the first committed
     * version of every `propertyId`.
     *
     * Either every record in the batch is visible afterwards or none is.
     *
     * @param records - Records in source order.
     * @returns Inserted and skipped counts.
     */
    insertIfAbsent(records: readonly Property[]): BatchResult {
        const insert = this.db.prepare<PropertyInsertParams>(`
            INSERT INTO properties (
                property_id, owner_name, owner_address, owner_city, owner_state,
                owner_zip, amount_reported, cash_reported, property_type,
                holder_name, holder_address, reported_date, raw_json
            ) VALUES (
                @property_id, @owner_name, @owner_address, @owner_city, @owner_state,
                @owner_zip, @amount_reported, @cash_reported, @property_type,
                @holder_name, @holder_address, @reported_date, @raw_json
            )
            ON CONFLICT (property_id) DO NOTHING
        `);

        const tx = this.db.transaction(
            (batch: readonly Property[]): BatchResult => {
                let inserted = 0;
                for (const record of batch) {
                    inserted += insert.run(propertyToParams(record)).changes;
                }
                return { inserted, skipped: batch.length - inserted };
            },
        );

        return tx(records);
    }

    /**
     * Returns the highest sequence number covered by the full-text index, or 0.
     */
    watermark(): number {
        const row = this.db
            .prepare<[], { rowid: number }>(
                "SELECT rowid FROM properties_fts ORDER BY rowid DESC LIMIT 1",
            )
            .get();
        return row?.rowid ?? 0;
    }

    /**
     * Returns the highest sequence number ever assigned by the store, or 0.
     */
    maxSequence(): number {
        const row = this.db
            .prepare<[], { seq: number | null }>(
                "SELECT MAX(seq) AS seq FROM properties",
            )
            .get();
        return row?.seq ?? 0;
    }

    /**
     * Counts the committed property records.
     */
    count(): number {
        const row = this.db
            .prepare<[], { total: number }>(
                "SELECT COUNT(*) AS total FROM properties",
            )
            .get();
        return row?.total ?? 0;
    }

    /**
     * Counts the entries in the full-text index.
     */
    indexedCount(): number {
        const row = this.db
            .prepare<[], { total: number }>(
                "SELECT COUNT(*) AS total FROM properties_fts",
            )
            .get();
        return row?.total ?? 0;
    }

    /**
     * Extends the full-text index over every store row beyond the current
     * watermark. The delta is computed from store state alone, so calling this
     * again after a failure indexes the same rows once, never twice.
     *
     * @returns The number of rows added to the index.
     */
    extendIndex(): number {
        const tx = this.db.transaction((): number => {
            const from = this.watermark();
            const result = this.db
                .prepare<[number]>(`
                    INSERT INTO properties_fts (rowid, owner_name, owner_address, owner_city, holder_name)
                    SELECT seq, owner_name, owner_address, owner_city, holder_name
                    FROM properties
                    WHERE seq > ?
                    ORDER BY seq
                `)
                .run(from);
            return result.changes;
        });

        // IMMEDIATE takes the write lock up front so the watermark cannot move underneath us
        return tx.immediate();
    }

    /**
     * Runs a full-text match and returns property ids ordered by relevance,
     * ties broken by store insertion order.
     *
     * @param match - An FTS5 match expression.
     * @param limit - Maximum number of ids to return.
     * @returns Matching property ids.
     */
    matchIds(match: string, limit: number): string[] {
        const rows = this.db
            .prepare<[string, number], { property_id: string }>(`
                SELECT p.property_id
                FROM properties_fts
                JOIN properties p ON p.seq = properties_fts.rowid
                WHERE properties_fts MATCH ?
                ORDER BY properties_fts.rank, properties_fts.rowid
                LIMIT ?
            `)
            .all(match, limit);
        return rows.map((row) => row.property_id);
    }

    /**
     * Fetches one property by its identity key.
     *
     * @param propertyId - The property id.
     * @returns The property, or undefined when absent.
     */
    findById(propertyId: string): Property | undefined {
        const row = this.db
            .prepare<[string], PropertyRow>(
                "SELECT * FROM properties WHERE property_id = ?",
            )
            .get(propertyId);
        return row === undefined ? undefined : rowToProperty(row);
    }

    /**
     * Closes the connection.
     */
    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }
}
