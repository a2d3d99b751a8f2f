import { writeJson } from "@unclaimed/core";
import debug from "debug";
import type { Request, Response } from "express";
import { claimProperty, getProperty, searchProperties } from "../service/api";
import type { PropertyService } from "../service/index";
import type * as Types from "../service/types/index";

/**
 * The logger for the property controller.
 */
const logger = debug("api:properties");

/**
 * Request handlers for the property endpoints.
 */
export type PropertyController = {
    search: (request: Request, response: Response) => void;
    getProperty: (request: Request<{ propertyId: string }>, response: Response) => void;
    claim: (request: Request, response: Response) => void;
};

/**
 * Writes a request-layer response to the client.
 *
 * @param response - Express response.
 * @param result - The structured response.
 */
export const writeApiResponse = (
    response: Response,
    result: Types.ApiResponse,
): void => {
    writeJson(response, result.json, result.statusCode, result.contentType);
};

/**
 * Builds the property request handlers over a service.
 *
 * @param service - The property service.
 * @returns The request handlers.
 */
export const createPropertyController = (
    service: PropertyService,
): PropertyController => ({
    /**
     * Searches properties by owner name, owner address, city or holder.
     *
     * @example
     * GET /search?q=smith&limit=5
     */
    search: (request, response) => {
        logger("IN search");
        writeApiResponse(response, searchProperties(service, request.query));
    },

    /**
     * Fetches a single property by its id.
     *
     * @example
     * GET /property/P1
     */
    getProperty: (request, response) => {
        logger("IN getProperty");
        writeApiResponse(
            response,
            getProperty(service, request.params.propertyId),
        );
    },

    /**
     * Starts a claim on a property.
     *
     * @example
     * POST /claim
     * { "propertyId": "P1", "claimantName": "...", ... }
     */
    claim: (request, response) => {
        logger("IN claim");
        writeApiResponse(response, claimProperty(service, request.body));
    },
});
