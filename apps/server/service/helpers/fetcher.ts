import * as fs from "node:fs";
import * as path from "node:path";
import * as stream from "node:stream";
import { fileURLToPath } from "node:url";
import type { RawRow } from "@unclaimed/core";
import debug from "debug";
import got, { type Got } from "got";
import * as Papa from "papaparse";
import * as unzip from "unzip-stream";
import { FETCH_TIMEOUT_MS, VERBOSE } from "../config";
import { ArchiveEmptyError, FetchFailedError } from "../errors";

/**
 * Loggers for the source fetcher.
 */
const logger = debug("api:fetch");
const error = debug("error:fetch");

/**
 * Minimal view of an `unzip-stream` entry.
 */
interface ArchiveEntry extends NodeJS.ReadableStream {
    /** Path of the entry inside the archive */
    path: string;
    /** Entry kind */
    type: "Directory" | "File";
    /** Discards the entry's contents */
    autodrain: () => void;
}

/**
 * Narrows an object-mode chunk emitted by `unzip.Parse()` to an entry.
 *
 * @param value - The emitted chunk.
 * @returns Whether the chunk is an archive entry.
 */
const isArchiveEntry = (value: unknown): value is ArchiveEntry =>
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "type" in value &&
    "autodrain" in value &&
    typeof value.autodrain === "function";

/**
 * Signature of the ZIP end of central directory record.
 */
const END_OF_CENTRAL_DIRECTORY = Buffer.from([0x50, 0x4b, 0x05, 0x06]);

/**
 * Size of the end of central directory record without its trailing comment.
 */
const END_OF_CENTRAL_DIRECTORY_SIZE = 22;

/**
 * Checks that the archive ends with a ZIP end of central directory record.
 * Partial downloads and files that are not ZIP archives have none.
 *
 * @param archive - The archive bytes.
 * @returns Whether the archive is complete.
 */
export const isCompleteArchive = (archive: Buffer): boolean => {
    const offset = archive.lastIndexOf(END_OF_CENTRAL_DIRECTORY);
    if (offset < 0 || offset + END_OF_CENTRAL_DIRECTORY_SIZE > archive.length) {
        return false;
    }
    // The record is followed only by its comment
    const commentLength = archive.readUInt16LE(offset + 20);
    return offset + END_OF_CENTRAL_DIRECTORY_SIZE + commentLength === archive.length;
};

/**
 * Narrows a parsed CSV record to a raw row.
 *
 * @param value - The parsed record.
 * @returns Whether the record is a header-keyed row.
 */
const isRawRow = (value: unknown): value is RawRow =>
    typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Options for the source fetcher.
 */
export type SourceFetcherOptions = {
    /** Base URL that bare archive names resolve against */
    baseUrl?: string;
    /** Timeout in milliseconds for a single HTTP fetch */
    timeoutMs?: number;
    /** HTTP client to use instead of the shared one */
    client?: Got;
};

/**
 * Shared HTTP client for source downloads. Retries are left to the operator.
 */
export const gotClient = got.extend({
    retry: { limit: 0 },
    headers: { "user-agent": "unclaimed-search" },
});

/**
 * Retrieves published source archives and exposes their first table as a lazy
 * row sequence.
 */
export class SourceFetcher {
    private readonly baseUrl: string | undefined;
    private readonly timeoutMs: number;
    private readonly client: Got;

    constructor(options: SourceFetcherOptions = {}) {
        this.baseUrl = options.baseUrl?.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
        this.client = options.client ?? gotClient;
    }

    /**
     * Resolves a location to either an HTTP(S) URL or a filesystem path.
     *
     * A bare archive name (no directory part) resolves against the base URL
     * when one is configured.
     *
     * @param location - URL, `file://` URL, path or bare archive name.
     * @returns The resolved target.
     */
    resolve(location: string): { kind: "http" | "file"; target: string } {
        if (/^https?:\/\//i.test(location)) {
            return { kind: "http", target: location };
        }
        if (location.startsWith("file:")) {
            return { kind: "file", target: fileURLToPath(location) };
        }
        if (
            this.baseUrl !== undefined &&
            this.baseUrl !== "" &&
            !location.includes("/") &&
            !location.includes(path.sep)
        ) {
            return {
                kind: "http",
                target: `${this.baseUrl}/${encodeURIComponent(location)}`,
            };
        }
        return { kind: "file", target: location };
    }

    /**
     * Retrieves the bytes of the archive at the given location.
     *
     * @param location - URL, `file://` URL, path or bare archive name.
     * @returns The archive bytes.
     * @throws {FetchFailedError} If the transport or the disk read fails.
     */
    async fetch(location: string): Promise<Buffer> {
        const { kind, target } = this.resolve(location);
        if (VERBOSE) logger(`fetching ${kind} '${target}'`);

        try {
            const body =
                kind === "http"
                    ? await this.client
                          .get(target, {
                              timeout: { request: this.timeoutMs },
                          })
                          .buffer()
                    : await fs.promises.readFile(target);

            logger(`fetched '${location}' (${body.length} bytes)`);
            return body;
        } catch (error_) {
            error(`failed to fetch '${location}'`, error_);
            throw new FetchFailedError(location, error_);
        }
    }

    /**
     * Streams the first table out of a ZIP archive.
     *
     * Directory entries and every entry after the first file are drained.
     * Rows are parsed lazily; the table is never held in memory as a whole.
     *
     * @param archive - The archive bytes.
     * @param location - Location the archive came from, used in errors.
     * @returns Header-keyed rows in file order.
     * @throws {ArchiveEmptyError} If the archive holds no file entry.
     * @throws {FetchFailedError} If the archive is truncated or cannot be read.
     */
    async *openFirstTable(
        archive: Buffer,
        location = "archive",
    ): AsyncGenerator<RawRow> {
        if (!isCompleteArchive(archive)) {
            error(`'${location}' is truncated or not a ZIP archive`);
            throw new FetchFailedError(
                location,
                new Error("Archive is truncated or is not a ZIP file"),
            );
        }

        const table = await this.extractFirstEntry(archive, location);

        const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
            header: true,
            skipEmptyLines: true,
            transformHeader: (header: string) =>
                header.replace(/^\uFEFF/, "").trim(),
        });
        table.on("error", (error_: Error) => parser.destroy(error_));
        table.pipe(parser);

        try {
            for await (const record of parser) {
                if (isRawRow(record)) yield record;
            }
        } catch (error_) {
            error(`failed to read table from '${location}'`, error_);
            throw new FetchFailedError(location, error_);
        } finally {
            table.destroy();
        }
    }

    /**
     * Locates the first file entry in the archive and exposes its contents as
     * UTF-8 text.
     *
     * @param archive - The archive bytes.
     * @param location - Location the archive came from, used in errors.
     * @returns The text stream of the first file entry.
     */
    private extractFirstEntry(
        archive: Buffer,
        location: string,
    ): Promise<stream.PassThrough> {
        return new Promise((resolve, reject) => {
            let table: stream.PassThrough | undefined;

            stream.pipeline(
                stream.Readable.from([archive]),
                // Parse the archive entries
                unzip.Parse(),
                new stream.Transform({
                    objectMode: true,
                    transform: (entry: unknown, _encoding, callback) => {
                        if (!isArchiveEntry(entry)) {
                            callback();
                            return;
                        }

                        // Only the first file entry is read, the rest are drained
                        if (entry.type !== "File" || table !== undefined) {
                            if (VERBOSE) logger(`skipping entry '${entry.path}'`);
                            entry.autodrain();
                            callback();
                            return;
                        }

                        if (VERBOSE) logger(`reading table '${entry.path}'`);
                        const text = new stream.PassThrough();
                        text.setEncoding("utf8");
                        table = text;

                        // A damaged entry fails the table rather than the process
                        entry.on("error", (error_: Error) => text.destroy(error_));

                        // Hold the archive until the table has been consumed
                        text.on("end", () => callback());
                        text.on("close", () => {
                            if (text.readableEnded) return;
                            // Abandoned early: release the rest of the entry
                            entry.unpipe(text);
                            entry.resume();
                            callback();
                        });
                        entry.pipe(text);
                        resolve(text);
                    },
                }),
                (error_) => {
                    if (error_) {
                        if (table === undefined) {
                            error(`failed to open '${location}'`, error_);
                            reject(new FetchFailedError(location, error_));
                        } else if (!table.destroyed) {
                            table.destroy(error_);
                        }
                        return;
                    }
                    if (table === undefined) {
                        reject(new ArchiveEmptyError());
                    }
                },
            );
        });
    }
}
