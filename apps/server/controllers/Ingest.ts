import debug from "debug";
import type { Request, Response } from "express";
import { ingestLocations } from "../service/api";
import { ErrorDocuments, JSONAPI_CONTENT_TYPE } from "../service/helpers/jsonapi";
import type { PropertyService } from "../service/index";
import { writeApiResponse } from "./Properties";

/**
 * The logger for the ingest controller.
 */
const logger = debug("api:ingest");

/**
 * The logger for errors.
 */
const errorLogger = debug("error:ingest");

/**
 * Builds the ingestion request handler over a service.
 *
 * The request stays open until the run finishes.
 *
 * @param service - The property service.
 * @param defaultLocations - Locations ingested when the body names none.
 * @returns The request handler.
 */
export const createIngestController =
    (service: PropertyService, defaultLocations?: readonly string[]) =>
    (request: Request, response: Response): void => {
        logger("IN ingest");

        ingestLocations(service, request.body, defaultLocations)
            .then((result) => writeApiResponse(response, result))
            .catch((error: unknown) => {
                errorLogger("Error running ingestion", error);
                response.setHeader("Content-Type", JSONAPI_CONTENT_TYPE);
                response.status(500).json(ErrorDocuments.internalError());
            });
    };
