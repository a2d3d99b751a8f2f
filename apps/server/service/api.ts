import type { ZodError } from "zod";
import { ALL_RECORDS_FILE } from "./config";
import {
    ArchiveEmptyError,
    FetchFailedError,
    IngestionInProgressError,
    IngestionRunError,
    NotFoundError,
    QueryTooShortError,
} from "./errors";
import {
    ErrorDocuments,
    JSONAPI_CONTENT_TYPE,
    RESOURCE_TYPES,
    buildErrorDocument,
    buildError,
    buildPropertyDocument,
    buildRunDocument,
    buildSearchDocument,
} from "./helpers/jsonapi";
import { normalizeSearchString } from "./helpers/searchIndex";
import { type PropertyService, error } from "./index";
import {
    claimRequestSchema,
    ingestRequestSchema,
    searchQuerySchema,
} from "./schemas";
import type * as Types from "./types/index";

/**
 * Builds a JSON:API response.
 */
const jsonApi = (statusCode: number, json: unknown): Types.ApiResponse => ({
    statusCode,
    json,
    contentType: JSONAPI_CONTENT_TYPE,
});

/**
 * Builds a 400 response listing every invalid field of a request.
 *
 * @param issues - The validation error.
 * @param location - Whether the fields came from the query string or the body.
 * @returns The error response.
 */
const validationFailure = (
    issues: ZodError,
    location: "query" | "body",
): Types.ApiResponse =>
    jsonApi(
        400,
        buildErrorDocument(
            issues.issues.map((issue) =>
                buildError(
                    "400",
                    "Bad Request",
                    issue.message,
                    "VALIDATION_FAILED",
                    location === "query"
                        ? { parameter: issue.path.join(".") }
                        : { pointer: `/${issue.path.join("/")}` },
                ),
            ),
        ),
    );

/**
 * Maps an unexpected failure to a 500 response.
 */
const unexpected = (context: string, error_: unknown): Types.ApiResponse => {
    error(`unexpected error while ${context}`, error_);
    return jsonApi(500, ErrorDocuments.internalError());
};

/**
 * Handles `GET /search`.
 *
 * @param service - The property service.
 * @param query - The parsed query string.
 * @returns The search document, or an error document.
 */
export const searchProperties = (
    service: PropertyService,
    query: unknown,
): Types.ApiResponse => {
    const parsed = searchQuerySchema.safeParse(query);
    if (!parsed.success) return validationFailure(parsed.error, "query");

    const { q, limit } = parsed.data;
    if (q === undefined || q.trim() === "") {
        return jsonApi(400, ErrorDocuments.missingRequiredParameter("q"));
    }

    try {
        const properties = service.search(q, limit);
        return jsonApi(
            200,
            buildSearchDocument(
                properties,
                normalizeSearchString(q),
                service.effectiveLimit(limit),
            ),
        );
    } catch (error_) {
        if (error_ instanceof QueryTooShortError) {
            return jsonApi(
                400,
                ErrorDocuments.badRequest(error_.message, error_.code, {
                    parameter: "q",
                }),
            );
        }
        return unexpected("searching", error_);
    }
};

/**
 * Handles `GET /property/:propertyId`.
 *
 * @param service - The property service.
 * @param propertyId - The requested id.
 * @returns The property document, or an error document.
 */
export const getProperty = (
    service: PropertyService,
    propertyId: string,
): Types.ApiResponse => {
    try {
        return jsonApi(200, buildPropertyDocument(service.getById(propertyId)));
    } catch (error_) {
        if (error_ instanceof NotFoundError) {
            return jsonApi(
                404,
                ErrorDocuments.notFound(RESOURCE_TYPES.PROPERTY, propertyId),
            );
        }
        return unexpected("fetching a property", error_);
    }
};

/**
 * Handles `POST /claim`.
 *
 * @param service - The property service.
 * @param body - The request body.
 * @returns The claim acknowledgement, or an error document.
 */
export const claimProperty = (
    service: PropertyService,
    body: unknown,
): Types.ApiResponse => {
    const parsed = claimRequestSchema.safeParse(body);
    if (!parsed.success) return validationFailure(parsed.error, "body");

    try {
        return {
            statusCode: 200,
            json: service.startClaim(parsed.data),
            contentType: "application/json",
        };
    } catch (error_) {
        if (error_ instanceof NotFoundError) {
            return jsonApi(
                404,
                ErrorDocuments.notFound(
                    RESOURCE_TYPES.PROPERTY,
                    parsed.data.propertyId,
                ),
            );
        }
        return unexpected("starting a claim", error_);
    }
};

/**
 * Handles `POST /ingest`.
 *
 * @param service - The property service.
 * @param body - The request body.
 * @param defaultLocations - Locations ingested when the body names none.
 * @returns The run summary, or an error document.
 */
export const ingestLocations = async (
    service: PropertyService,
    body: unknown,
    defaultLocations: readonly string[] = [ALL_RECORDS_FILE],
): Promise<Types.ApiResponse> => {
    const parsed = ingestRequestSchema.safeParse(body ?? {});
    if (!parsed.success) return validationFailure(parsed.error, "body");

    try {
        const summary = await service.triggerIngestion(
            parsed.data.locations ?? defaultLocations,
        );
        return jsonApi(200, buildRunDocument(summary));
    } catch (error_) {
        if (error_ instanceof IngestionInProgressError) {
            return jsonApi(409, ErrorDocuments.conflict(error_.message, error_.code));
        }
        if (error_ instanceof IngestionRunError) {
            const meta = {
                location: error_.location,
                chunkOffset: error_.chunkOffset,
                committed: error_.runCommitted,
            };
            const cause = error_.cause;
            if (
                cause instanceof FetchFailedError ||
                cause instanceof ArchiveEmptyError
            ) {
                return jsonApi(
                    502,
                    buildErrorDocument(
                        [buildError("502", "Bad Gateway", cause.message, cause.code)],
                        meta,
                    ),
                );
            }
            error("ingestion run failed", error_);
            return jsonApi(
                500,
                buildErrorDocument(
                    [
                        buildError(
                            "500",
                            "Internal Server Error",
                            error_.message,
                            error_.code,
                        ),
                    ],
                    meta,
                ),
            );
        }
        return unexpected("ingesting", error_);
    }
};
