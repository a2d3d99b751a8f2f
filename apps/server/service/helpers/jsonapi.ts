/**
 * JSON:API Response Builder Utilities
 *
 * Helpers that construct JSON:API compliant response documents for the
 * property API, so every endpoint formats results and errors the same way.
 */

import type { Property } from "@unclaimed/core";
import type {
    JsonApiError,
    JsonApiErrorDocument,
    JsonApiImplementation,
    JsonApiMeta,
    JsonApiResource,
    PropertyAttributes,
    PropertyDetailDocument,
    PropertySearchDocument,
} from "../types/jsonapi-types";
import type { RunSummary } from "../types/loader-types";

/**
 * Current JSON:API implementation information.
 */
const JSONAPI_IMPLEMENTATION: JsonApiImplementation = {
    version: "1.1",
};

/**
 * Resource type constants for consistent naming across the API.
 */
export const RESOURCE_TYPES = {
    /** Resource type for unclaimed property records */
    PROPERTY: "property",
} as const;

/**
 * Builds a JSON:API resource object for a property.
 *
 * @param property - The property record.
 * @returns A JSON:API resource object for the property.
 */
export const buildPropertyResource = (
    property: Property,
): JsonApiResource<PropertyAttributes> => {
    const { propertyId, ...attributes } = property;
    return {
        type: RESOURCE_TYPES.PROPERTY,
        id: propertyId,
        attributes,
        links: {
            self: `/property/${encodeURIComponent(propertyId)}`,
        },
    };
};

/**
 * Builds a complete JSON:API document for search results.
 *
 * @param properties - Matching properties, most relevant first.
 * @param query - The normalized query text.
 * @param limit - The effective result limit.
 * @returns Complete JSON:API document for the search.
 */
export const buildSearchDocument = (
    properties: Property[],
    query: string,
    limit: number,
): PropertySearchDocument => {
    return {
        jsonapi: JSONAPI_IMPLEMENTATION,
        data: properties.map(buildPropertyResource),
        links: {
            self: `/search?q=${encodeURIComponent(query)}&limit=${limit}`,
        },
        meta: {
            query,
            limit,
            count: properties.length,
        },
    };
};

/**
 * Builds a complete JSON:API document for a single property.
 *
 * @param property - The property record.
 * @returns Complete JSON:API document for the property.
 */
export const buildPropertyDocument = (
    property: Property,
): PropertyDetailDocument => {
    const resource = buildPropertyResource(property);
    return {
        jsonapi: JSONAPI_IMPLEMENTATION,
        data: resource,
        links: {
            self: resource.links?.self,
        },
    };
};

/**
 * Builds a meta-only JSON:API document describing a completed ingestion run.
 *
 * @param summary - The run totals.
 * @returns Complete JSON:API document for the run.
 */
export const buildRunDocument = (
    summary: RunSummary,
): { jsonapi: JsonApiImplementation; meta: JsonApiMeta } => {
    return {
        jsonapi: JSONAPI_IMPLEMENTATION,
        meta: summary,
    };
};

/**
 * Builds a JSON:API error object.
 *
 * @param status - HTTP status code as a string.
 * @param title - Short human-readable summary of the error.
 * @param detail - Detailed explanation of the error.
 * @param code - Optional application-specific error code.
 * @param source - Optional error source information.
 * @returns JSON:API error object.
 */
export const buildError = (
    status: string,
    title: string,
    detail?: string,
    code?: string,
    source?: JsonApiError["source"],
): JsonApiError => {
    return {
        status,
        title,
        ...(detail !== undefined && { detail }),
        ...(code !== undefined && { code }),
        ...(source !== undefined && { source }),
    };
};

/**
 * Builds a complete JSON:API error document.
 *
 * @param errors - Array of error objects.
 * @param meta - Optional document-level metadata.
 * @returns Complete JSON:API error document.
 */
export const buildErrorDocument = (
    errors: JsonApiError[],
    meta?: JsonApiMeta,
): JsonApiErrorDocument => {
    return {
        jsonapi: JSONAPI_IMPLEMENTATION,
        errors,
        ...(meta !== undefined && { meta }),
    };
};

/**
 * Common error document builders for standard HTTP errors.
 */
export const ErrorDocuments = {
    /**
     * Builds a 400 Bad Request error document.
     *
     * @param detail - Detailed explanation of what was invalid.
     * @param code - Application-specific error code.
     * @param source - Optional pointer to the invalid parameter or field.
     * @returns JSON:API error document for bad request.
     */
    badRequest: (
        detail: string,
        code = "INVALID_REQUEST",
        source?: JsonApiError["source"],
    ): JsonApiErrorDocument => {
        return buildErrorDocument([
            buildError("400", "Bad Request", detail, code, source),
        ]);
    },

    /**
     * Builds a 400 Bad Request error document for missing required parameter.
     *
     * @param paramName - The name of the missing required parameter.
     * @returns JSON:API error document for missing parameter.
     */
    missingRequiredParameter: (paramName: string): JsonApiErrorDocument => {
        return buildErrorDocument([
            buildError(
                "400",
                "Bad Request",
                `The '${paramName}' query parameter is required and must not be empty.`,
                "MISSING_REQUIRED_PARAMETER",
                { parameter: paramName },
            ),
        ]);
    },

    /**
     * Builds a 404 Not Found error document.
     *
     * @param resourceType - Type of resource that was not found.
     * @param resourceId - ID of the resource that was not found.
     * @returns JSON:API error document for not found.
     */
    notFound: (
        resourceType: string,
        resourceId: string,
    ): JsonApiErrorDocument => {
        return buildErrorDocument([
            buildError(
                "404",
                "Not Found",
                `The ${resourceType} with ID '${resourceId}' does not exist.`,
                "RESOURCE_NOT_FOUND",
            ),
        ]);
    },

    /**
     * Builds a 409 Conflict error document.
     *
     * @param detail - What the request conflicts with.
     * @param code - Application-specific error code.
     * @returns JSON:API error document for conflict.
     */
    conflict: (detail: string, code = "CONFLICT"): JsonApiErrorDocument => {
        return buildErrorDocument([buildError("409", "Conflict", detail, code)]);
    },

    /**
     * Builds a 500 Internal Server Error document.
     *
     * @param detail - Optional detail about the error (be careful not to leak internals).
     * @returns JSON:API error document for server error.
     */
    internalError: (detail?: string): JsonApiErrorDocument => {
        return buildErrorDocument([
            buildError(
                "500",
                "Internal Server Error",
                detail ??
                    "An unexpected error occurred while processing your request.",
                "INTERNAL_ERROR",
            ),
        ]);
    },
};

/**
 * The JSON:API media type constant.
 */
export const JSONAPI_CONTENT_TYPE = "application/vnd.api+json";
