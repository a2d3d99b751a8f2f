import type { Property } from "@unclaimed/core";
import type { PropertyStore } from "@unclaimed/store";
import debug from "debug";
import { SyncOrchestrator } from "./commands/sync";
import { DEFAULT_SEARCH_LIMIT, VERBOSE } from "./config";
import { SearchIndex } from "./helpers/searchIndex";
import type { SourceFetcher } from "./helpers/fetcher";
import type * as Types from "./types/index";

/**
 * Loggers for the API.
 */
export const logger = debug("api");
export const error = debug("error");

/**
 * Options for building the property service.
 */
export type PropertyServiceOptions = {
    /** The record store shared by the read and write paths */
    store: PropertyStore;
    /** Source fetcher used by ingestion runs */
    fetcher?: SourceFetcher;
    /** Records per ingestion chunk */
    chunkSize?: number;
    /** Largest search limit honoured */
    maxLimit?: number;
};

/**
 * The operations exposed to the request layer and the CLI.
 */
export type PropertyService = {
    /**
     * Searches properties by owner, address, city or holder.
     *
     * @throws {QueryTooShortError} If the query is shorter than two characters.
     */
    search: (query: string, limit?: number) => Property[];
    /** The result limit a search with the requested limit runs with */
    effectiveLimit: (limit?: number) => number;
    /**
     * Fetches a property by id.
     *
     * @throws {NotFoundError} If no property has the id.
     */
    getById: (propertyId: string) => Property;
    /**
     * Runs an ingestion over the given locations.
     *
     * @throws {IngestionInProgressError} If a run is already in flight.
     * @throws {IngestionRunError} If the run fails.
     */
    triggerIngestion: (
        locations: readonly string[],
        options?: Types.RunOptions,
    ) => Promise<Types.RunSummary>;
    /**
     * Accepts a claim request for an existing property.
     *
     * @throws {NotFoundError} If no property has the id.
     */
    startClaim: (request: Types.ClaimRequest) => Types.ClaimAcknowledgement;
    /** Whether an ingestion run is in flight */
    isIngesting: () => boolean;
};

/**
 * Builds the property service over a record store.
 *
 * @param options - The store and component overrides.
 * @returns The property service.
 */
export const createPropertyService = (
    options: PropertyServiceOptions,
): PropertyService => {
    const { store, fetcher, chunkSize, maxLimit } = options;
    const index = new SearchIndex(store, maxLimit);
    const orchestrator = new SyncOrchestrator(store, { fetcher, chunkSize });

    const search = (query: string, limit = DEFAULT_SEARCH_LIMIT): Property[] => {
        const ids = index.query(query, limit);
        if (VERBOSE) logger(`search '${query}' returned ${ids.length} id(s)`);

        // Hydrate in rank order; ids come from the same store so none are missing
        return ids.map((propertyId) => index.lookup(propertyId));
    };

    const effectiveLimit = (limit = DEFAULT_SEARCH_LIMIT): number =>
        index.effectiveLimit(limit);

    const getById = (propertyId: string): Property => index.lookup(propertyId);

    const triggerIngestion = (
        locations: readonly string[],
        runOptions?: Types.RunOptions,
    ): Promise<Types.RunSummary> => orchestrator.run(locations, runOptions);

    const startClaim = (
        request: Types.ClaimRequest,
    ): Types.ClaimAcknowledgement => {
        const property = index.lookup(request.propertyId);
        logger(`claim initiated for '${property.propertyId}'`);
        return { message: "Claim initiated", property };
    };

    return {
        search,
        effectiveLimit,
        getById,
        triggerIngestion,
        startClaim,
        isIngesting: () => orchestrator.isRunning,
    };
};

export { SyncOrchestrator } from "./commands/sync";
export * from "./errors";
export * from "./helpers/index";
export type * from "./types/index";
