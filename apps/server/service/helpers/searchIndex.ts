import type { Property } from "@unclaimed/core";
import type { PropertyStore } from "@unclaimed/store";
import debug from "debug";
import { MAX_SEARCH_LIMIT, MIN_QUERY_LENGTH, VERBOSE } from "../config";
import { NotFoundError, QueryTooShortError } from "../errors";

/**
 * Logger for the search index.
 */
const logger = debug("api:search");

/**
 * Collapses runs of whitespace and trims the ends.
 *
 * @param text - The raw search text.
 * @returns The normalized text.
 */
export const normalizeSearchString = (text: string): string =>
    text.replace(/\s+/g, " ").trim();

/**
 * Turns normalized search text into an FTS5 match expression.
 *
 * Every term becomes a quoted phrase, so operators and punctuation in user
 * input are matched literally and every term must match. Terms without a
 * letter or digit produce no tokens and are dropped.
 *
 * @param text - Normalized search text.
 * @returns The match expression, or undefined when no term is left.
 */
export const buildMatchExpression = (text: string): string | undefined => {
    const phrases = text
        .split(" ")
        .filter((term) => /[\p{L}\p{N}]/u.test(term))
        .map((term) => `"${term.replace(/"/g, '""')}"`);

    return phrases.length > 0 ? phrases.join(" ") : undefined;
};

/**
 * Clamps a requested result limit to `[1, max]`.
 *
 * @param limit - The requested limit.
 * @param max - The largest accepted limit.
 * @returns The effective limit.
 */
export const clampLimit = (limit: number, max = MAX_SEARCH_LIMIT): number => {
    if (!Number.isFinite(limit)) return max;
    return Math.min(Math.max(Math.floor(limit), 1), max);
};

/**
 * Read path over the record store and its full-text index.
 */
export class SearchIndex {
    private readonly store: PropertyStore;
    private readonly maxLimit: number;

    /**
     * @param store - The record store to read from.
     * @param maxLimit - The largest result limit honoured.
     */
    constructor(store: PropertyStore, maxLimit = MAX_SEARCH_LIMIT) {
        this.store = store;
        this.maxLimit = maxLimit;
    }

    /**
     * The limit a query with the requested limit actually runs with.
     */
    effectiveLimit(limit: number): number {
        return clampLimit(limit, this.maxLimit);
    }

    /**
     * Returns the ids of the best matching properties, most relevant first.
     *
     * @param text - Free-text query, at least two characters once normalized.
     * @param limit - Maximum number of ids to return.
     * @returns Matching property ids, possibly empty.
     * @throws {QueryTooShortError} If the query is too short.
     */
    query(text: string, limit: number): string[] {
        const normalized = normalizeSearchString(text);
        if (normalized.length < MIN_QUERY_LENGTH) {
            throw new QueryTooShortError(MIN_QUERY_LENGTH);
        }

        const match = buildMatchExpression(normalized);
        if (match === undefined) return [];

        const ids = this.store.matchIds(match, this.effectiveLimit(limit));
        if (VERBOSE) logger(`query ${match} matched ${ids.length} record(s)`);
        return ids;
    }

    /**
     * Fetches a property by id.
     *
     * @param propertyId - The property id.
     * @returns The property record.
     * @throws {NotFoundError} If no property has the id.
     */
    lookup(propertyId: string): Property {
        const property = this.store.findById(propertyId);
        if (property === undefined) {
            throw new NotFoundError(propertyId);
        }
        return property;
    }
}
