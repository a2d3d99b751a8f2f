import { type Server, createServer } from "node:http";
import debug from "debug";
import express, {
    type Express,
    type NextFunction,
    type Request,
    type Response,
} from "express";
import { createIngestController } from "./controllers/Ingest";
import { createPropertyController } from "./controllers/Properties";
import {
    ACCESS_CONTROL_ALLOW_HEADERS,
    ACCESS_CONTROL_ALLOW_ORIGIN,
    SERVER_PORT,
} from "./service/config";
import { ErrorDocuments, JSONAPI_CONTENT_TYPE } from "./service/helpers/jsonapi";
import type { PropertyService } from "./service/index";

/**
 * The logger for the API.
 */
const logger = debug("api");

/**
 * The logger for errors.
 */
const error = debug("error");

/**
 * Set the error log to the console error.
 */
error.log = console.error.bind(console);

/**
 * Options for building the HTTP app.
 */
export type AppOptions = {
    /** The property service behind every route */
    service: PropertyService;
    /** Locations `POST /ingest` uses when the body names none */
    defaultLocations?: readonly string[];
    /** `Access-Control-Allow-Origin` value; no header when unset */
    allowOrigin?: string;
    /** `Access-Control-Allow-Headers` value; no header when unset */
    allowHeaders?: string;
};

/**
 * Builds the express app with the property routes and CORS headers.
 *
 * @param options - The service and route defaults.
 * @returns The express app.
 */
export function createApp(options: AppOptions): Express {
    const {
        service,
        defaultLocations,
        allowOrigin = ACCESS_CONTROL_ALLOW_ORIGIN,
        allowHeaders = ACCESS_CONTROL_ALLOW_HEADERS,
    } = options;
    const app = express();
    const properties = createPropertyController(service);

    app.use((request, response, next) => {
        // Add the access control allow origin header
        if (allowOrigin !== undefined) {
            response.append("Access-Control-Allow-Origin", allowOrigin);
        }

        // Add the access control allow headers header
        if (allowHeaders !== undefined) {
            response.append("Access-Control-Allow-Headers", allowHeaders);
        }

        next();
    });

    app.use(express.json());

    app.get("/search", properties.search);
    app.get("/property/:propertyId", properties.getProperty);
    app.post("/claim", properties.claim);
    app.post("/ingest", createIngestController(service, defaultLocations));

    // Malformed JSON bodies and anything else a handler did not answer
    app.use(
        (
            error_: unknown,
            request: Request,
            response: Response,
            next: NextFunction,
        ) => {
            if (response.headersSent) {
                next(error_);
                return;
            }

            response.setHeader("Content-Type", JSONAPI_CONTENT_TYPE);
            if (error_ instanceof SyntaxError) {
                response
                    .status(400)
                    .json(
                        ErrorDocuments.badRequest(
                            "Request body is not valid JSON",
                            "MALFORMED_BODY",
                        ),
                    );
                return;
            }

            error(`unhandled error on ${request.method} ${request.path}`, error_);
            response.status(500).json(ErrorDocuments.internalError());
        },
    );

    return app;
}

/**
 * The server instance.
 */
let server: Server | undefined;

/**
 * Starts the HTTP server.
 *
 * @param options - The service and route defaults.
 * @param port - Port to listen on.
 * @returns Base URL once the server is listening.
 */
export function startServer(
    options: AppOptions,
    port = SERVER_PORT,
): Promise<string> {
    return new Promise((resolve, reject) => {
        // Create the server
        server = createServer(createApp(options));
        server.once("error", reject);

        // Listen on the server port
        server.listen(port, () => {
            logger(
                "📡  Unclaimed property search is listening on port %d ( http://localhost:%d ) ",
                port,
                port,
            );
            resolve(`http://localhost:${port}`);
        });
    });
}

/**
 * Stops the HTTP server if running.
 *
 * @returns Resolves once open connections have closed.
 */
export function stopServer(): Promise<void> {
    return new Promise((resolve, reject) => {
        if (server === undefined) {
            resolve();
            return;
        }
        server.close((error_) => (error_ ? reject(error_) : resolve()));
        server = undefined;
    });
}
