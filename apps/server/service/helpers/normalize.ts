import type { Property, RawRow } from "@unclaimed/core";

/**
 * Logical text fields of a property record that are read straight from a
 * source column.
 */
type TextField = Exclude<
    keyof Property,
    "propertyId" | "ownerName" | "amountReported" | "rawPayload"
>;

/**
 * Header spellings accepted for the property id, in priority order.
 */
export const PROPERTY_ID_HEADERS = ["PROPERTY_ID", "Property ID"] as const;

/**
 * Header spellings accepted for the owner's (last) name, in priority order.
 */
export const OWNER_NAME_HEADERS = [
    "OWNER_NAME",
    "Owner Name",
    "OWNER_LAST_NAME",
] as const;

/**
 * Header spellings accepted for the owner's first name, in priority order.
 */
export const OWNER_FIRST_NAME_HEADERS = [
    "OWNER_FIRST_NAME",
    "Owner First Name",
] as const;

/**
 * Header spellings accepted for the reported amount, in priority order.
 */
export const AMOUNT_HEADERS = ["AMOUNT_REPORTED", "Amount Reported"] as const;

/**
 * Header spellings for every plain text field, in priority order.
 */
export const TEXT_FIELD_HEADERS: Readonly<
    Record<TextField, readonly string[]>
> = {
    ownerAddress: ["OWNER_ADDRESS", "Owner Address", "OWNER_STREET_1"],
    ownerCity: ["OWNER_CITY", "Owner City"],
    ownerState: ["OWNER_STATE", "Owner State"],
    ownerZip: ["OWNER_ZIP", "Owner Zip", "OWNER_ZIP_CODE"],
    cashReported: ["CASH_REPORTED", "Cash Reported"],
    propertyType: ["PROPERTY_TYPE", "Property Type"],
    holderName: ["HOLDER_NAME", "Holder Name"],
    holderAddress: ["HOLDER_ADDRESS", "Holder Address"],
    reportedDate: ["REPORTED_DATE", "Reported Date"],
};

/**
 * Returns the first non-blank string found under any of the given headers.
 *
 * @param row - The raw row.
 * @param headers - Header spellings in priority order.
 * @returns The trimmed value, or an empty string when none is present.
 */
export const pickField = (row: RawRow, headers: readonly string[]): string => {
    for (const header of headers) {
        const value = row[header];
        if (typeof value === "string" && value.trim() !== "") {
            return value.trim();
        }
    }
    return "";
};

/**
 * Plain decimal notation; hex, binary and octal literals are not amounts.
 */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a published amount such as "12.50", "$1,204.10" or " 7 ".
 *
 * @param value - The raw amount text.
 * @returns The amount, or 0 when it is blank or not a finite decimal.
 */
export const parseAmount = (value: string): number => {
    const cleaned = value.replace(/[$,\s]/g, "");
    if (!DECIMAL_PATTERN.test(cleaned)) return 0;

    const amount = Number(cleaned);
    return Number.isFinite(amount) ? amount : 0;
};

/**
 * Maps one raw source row to a canonical property record.
 *
 * Missing text fields default to empty strings and an unparsable amount to 0.
 * A row with no id-bearing field cannot be stored and is dropped.
 *
 * @param row - The raw row, keyed by header.
 * @returns The property, or undefined when the row has no id.
 */
export const normalizeRow = (row: RawRow): Property | undefined => {
    const propertyId = pickField(row, PROPERTY_ID_HEADERS);
    if (propertyId === "") return undefined;

    // Owner name is published as last name plus an optional first name
    const ownerName = [
        pickField(row, OWNER_NAME_HEADERS),
        pickField(row, OWNER_FIRST_NAME_HEADERS),
    ]
        .filter((part) => part !== "")
        .join(" ");

    return {
        propertyId,
        ownerName,
        ownerAddress: pickField(row, TEXT_FIELD_HEADERS.ownerAddress),
        ownerCity: pickField(row, TEXT_FIELD_HEADERS.ownerCity),
        ownerState: pickField(row, TEXT_FIELD_HEADERS.ownerState),
        ownerZip: pickField(row, TEXT_FIELD_HEADERS.ownerZip),
        amountReported: parseAmount(pickField(row, AMOUNT_HEADERS)),
        cashReported: pickField(row, TEXT_FIELD_HEADERS.cashReported),
        propertyType: pickField(row, TEXT_FIELD_HEADERS.propertyType),
        holderName: pickField(row, TEXT_FIELD_HEADERS.holderName),
        holderAddress: pickField(row, TEXT_FIELD_HEADERS.holderAddress),
        reportedDate: pickField(row, TEXT_FIELD_HEADERS.reportedDate),
        rawPayload: JSON.stringify(row),
    };
};

/**
 * Lazily normalizes a row sequence, dropping rows without an id.
 *
 * @param rows - Raw rows in source order.
 * @param onDropped - Called once for every dropped row.
 * @returns The normalized records, in source order.
 */
export async function* normalizeRows(
    rows: AsyncIterable<RawRow>,
    onDropped?: (row: RawRow) => void,
): AsyncGenerator<Property> {
    for await (const row of rows) {
        const property = normalizeRow(row);
        if (property === undefined) {
            onDropped?.(row);
            continue;
        }
        yield property;
    }
}
