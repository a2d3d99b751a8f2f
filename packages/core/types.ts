/**
 * A raw row read from a source table. Keys are the header names exactly as they
 * appear in the file; values are whatever the CSV parser produced for them
 * (papaparse stores surplus columns under `__parsed_extra` as an array).
 */
export type RawRow = Record<string, unknown>;

/**
 * Canonical unclaimed property record, as produced by the normalizer and
 * persisted by the record store.
 */
export type Property = {
    /** Identity key of the record */
    propertyId: string;
    /** Owner name (last name, then first name when present) */
    ownerName: string;
    /** Owner street address */
    ownerAddress: string;
    /** Owner city */
    ownerCity: string;
    /** Owner state code */
    ownerState: string;
    /** Owner postal code */
    ownerZip: string;
    /** Reported amount in dollars, zero when absent or unparsable */
    amountReported: number;
    /** Cash reported flag or amount, as published */
    cashReported: string;
    /** Property type code */
    propertyType: string;
    /** Name of the business that reported the property */
    holderName: string;
    /** Address of the reporting business */
    holderAddress: string;
    /** Date the property was reported, as published */
    reportedDate: string;
    /** Serialized source row, kept for audit */
    rawPayload: string;
};

/**
 * Counts returned after writing a batch of records.
 */
export type BatchResult = {
    /** Records newly committed */
    inserted: number;
    /** Records discarded because their id already existed */
    skipped: number;
};
