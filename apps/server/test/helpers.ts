import type { Server } from "node:http";
import * as path from "node:path";
import type { Property } from "@unclaimed/core";

/**
 * Absolute path of a checked-in fixture archive.
 */
export const fixturePath = (name: string): string =>
    path.join(__dirname, "fixtures", name);

/**
 * Builds a property record with empty defaults.
 */
export const makeProperty = (
    propertyId: string,
    overrides: Partial<Property> = {},
): Property => ({
    propertyId,
    ownerName: "",
    ownerAddress: "",
    ownerCity: "",
    ownerState: "",
    ownerZip: "",
    amountReported: 0,
    cashReported: "",
    propertyType: "",
    holderName: "",
    holderAddress: "",
    reportedDate: "",
    rawPayload: "{}",
    ...overrides,
});

/**
 * Drains an async sequence into an array.
 */
export const collect = async <T>(items: AsyncIterable<T>): Promise<T[]> => {
    const result: T[] = [];
    for await (const item of items) result.push(item);
    return result;
};

/**
 * Starts a server on an ephemeral loopback port.
 *
 * @returns The server's base URL.
 */
export const listen = (server: Server): Promise<string> =>
    new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (address === null || typeof address === "string") {
                reject(new Error("server is not listening on a TCP port"));
                return;
            }
            resolve(`http://127.0.0.1:${address.port}`);
        });
    });

/**
 * Stops a server, dropping connections that are still open.
 */
export const closeServer = (server: Server): Promise<void> =>
    new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
    });

/**
 * Extracts the `code` of every error in a JSON:API error document.
 */
export const errorCodes = (json: unknown): unknown[] => {
    if (typeof json !== "object" || json === null || !("errors" in json)) return [];
    const { errors } = json;
    if (!Array.isArray(errors)) return [];
    return errors.map((entry: unknown) =>
        typeof entry === "object" && entry !== null && "code" in entry
            ? entry.code
            : undefined,
    );
};
