import { strict as assert } from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { PropertyStore } from "@unclaimed/store";
import {
    claimProperty,
    getProperty,
    ingestLocations,
    searchProperties,
} from "../service/api";
import { IngestionInProgressError } from "../service/errors";
import { BatchLoader } from "../service/helpers/batchLoader";
import {
    JSONAPI_CONTENT_TYPE,
    buildPropertyDocument,
} from "../service/helpers/jsonapi";
import { type PropertyService, createPropertyService } from "../service/index";
import { errorCodes, fixturePath, makeProperty } from "./helpers";

const garcia = makeProperty("P100", {
    ownerName: "GARCIA MARIA",
    ownerCity: "FRESNO",
    amountReported: 1204.1,
});

const seed = (): PropertyService => {
    const store = PropertyStore.open(":memory:");
    new BatchLoader(store, 10).loadBatch([
        garcia,
        makeProperty("P101", { ownerName: "NGUYEN TAN", ownerCity: "SAN JOSE" }),
    ]);
    return createPropertyService({ store, chunkSize: 10 });
};

describe("searchProperties", () => {
    let service: PropertyService;
    beforeEach(() => {
        service = seed();
    });

    it("returns matches as a JSON:API document", () => {
        const response = searchProperties(service, { q: "  nguyen   tan ", limit: "3" });

        assert.equal(response.statusCode, 200);
        assert.equal(response.contentType, JSONAPI_CONTENT_TYPE);
        assert.deepEqual(response.json, {
            jsonapi: { version: "1.1" },
            data: [
                {
                    type: "property",
                    id: "P101",
                    attributes: {
                        ownerName: "NGUYEN TAN",
                        ownerAddress: "",
                        ownerCity: "SAN JOSE",
                        ownerState: "",
                        ownerZip: "",
                        amountReported: 0,
                        cashReported: "",
                        propertyType: "",
                        holderName: "",
                        holderAddress: "",
                        reportedDate: "",
                        rawPayload: "{}",
                    },
                    links: { self: "/property/P101" },
                },
            ],
            links: { self: "/search?q=nguyen%20tan&limit=3" },
            meta: { query: "nguyen tan", limit: 3, count: 1 },
        });
    });

    it("reports the limit the service applied", () => {
        const store = PropertyStore.open(":memory:");
        new BatchLoader(store, 10).loadBatch([
            garcia,
            makeProperty("P102", { ownerName: "GARCIA LUIS" }),
        ]);
        const narrow = createPropertyService({ store, maxLimit: 1 });

        const response = searchProperties(narrow, { q: "garcia", limit: "5" });

        assert.equal(response.statusCode, 200);
        const { json } = response;
        assert.ok(
            typeof json === "object" && json !== null && "meta" in json && "links" in json,
        );
        assert.deepEqual(json.meta, { query: "garcia", limit: 1, count: 1 });
        assert.deepEqual(json.links, { self: "/search?q=garcia&limit=1" });
    });

    it("requires the q parameter", () => {
        const response = searchProperties(service, { q: "   " });

        assert.equal(response.statusCode, 400);
        assert.deepEqual(errorCodes(response.json), ["MISSING_REQUIRED_PARAMETER"]);
    });

    it("rejects a one-character query", () => {
        const response = searchProperties(service, { q: "a" });

        assert.equal(response.statusCode, 400);
        assert.deepEqual(errorCodes(response.json), ["QUERY_TOO_SHORT"]);
    });

    it("rejects a limit that is not a number", () => {
        const response = searchProperties(service, { q: "garcia", limit: "many" });

        assert.equal(response.statusCode, 400);
        assert.deepEqual(errorCodes(response.json), ["VALIDATION_FAILED"]);
    });
});

describe("getProperty", () => {
    it("returns the property", () => {
        const response = getProperty(seed(), "P100");

        assert.equal(response.statusCode, 200);
        assert.deepEqual(response.json, buildPropertyDocument(garcia));
    });

    it("returns 404 for an unknown id", () => {
        const response = getProperty(seed(), "P999");

        assert.equal(response.statusCode, 404);
        assert.deepEqual(errorCodes(response.json), ["RESOURCE_NOT_FOUND"]);
    });
});

describe("claimProperty", () => {
    const claim = {
        propertyId: "P100",
        claimantName: "Maria Garcia",
        claimantAddress: "12 Oak St, Fresno CA",
        claimantEmail: "maria@example.test",
    };

    it("acknowledges a claim for an existing property", () => {
        const response = claimProperty(seed(), claim);

        assert.equal(response.statusCode, 200);
        assert.equal(response.contentType, "application/json");
        assert.deepEqual(response.json, {
            message: "Claim initiated",
            property: garcia,
        });
    });

    it("points at every invalid field", () => {
        const response = claimProperty(seed(), {
            ...claim,
            claimantName: " ",
            claimantEmail: "not-an-email",
        });

        assert.equal(response.statusCode, 400);
        assert.deepEqual(response.json, {
            jsonapi: { version: "1.1" },
            errors: [
                {
                    status: "400",
                    title: "Bad Request",
                    detail: "Claimant name is required",
                    code: "VALIDATION_FAILED",
                    source: { pointer: "/claimantName" },
                },
                {
                    status: "400",
                    title: "Bad Request",
                    detail: "Claimant email must be valid",
                    code: "VALIDATION_FAILED",
                    source: { pointer: "/claimantEmail" },
                },
            ],
        });
    });

    it("returns 404 for an unknown property", () => {
        const response = claimProperty(seed(), { ...claim, propertyId: "P999" });

        assert.equal(response.statusCode, 404);
    });
});

describe("ingestLocations", () => {
    it("returns the run summary", async () => {
        const service = seed();

        const response = await ingestLocations(service, {}, [
            fixturePath("duplicates.zip"),
        ]);

        assert.equal(response.statusCode, 200);
        assert.equal(service.getById("P1").ownerName, "Smith");
        assert.equal(service.isIngesting(), false);
    });

    it("uses the default locations when there is no body", async () => {
        const response = await ingestLocations(seed(), undefined, [
            fixturePath("duplicates.zip"),
        ]);

        assert.equal(response.statusCode, 200);
    });

    it("accepts published archive names only", async () => {
        for (const location of [
            fixturePath("duplicates.zip"),
            "/etc/hostname",
            "file:///etc/hostname",
            "http://internal.example.test/a.zip",
        ]) {
            const response = await ingestLocations(seed(), { locations: [location] });

            assert.equal(response.statusCode, 400);
            assert.deepEqual(errorCodes(response.json), ["VALIDATION_FAILED"]);
        }
    });

    it("maps an unreachable source to 502", async () => {
        // Without a base URL the archive name is a relative path that does not exist
        const response = await ingestLocations(seed(), {
            locations: ["00_All_Records.zip"],
        });

        assert.equal(response.statusCode, 502);
        assert.deepEqual(errorCodes(response.json), ["FETCH_FAILED"]);
    });

    it("maps an empty archive to 502", async () => {
        const response = await ingestLocations(seed(), {}, [
            fixturePath("empty.zip"),
        ]);

        assert.equal(response.statusCode, 502);
        assert.deepEqual(errorCodes(response.json), ["ARCHIVE_EMPTY"]);
    });

    it("returns 409 while a run is in flight", async () => {
        const busy: PropertyService = {
            ...seed(),
            triggerIngestion: () => Promise.reject(new IngestionInProgressError()),
        };

        const response = await ingestLocations(busy, {});

        assert.equal(response.statusCode, 409);
        assert.deepEqual(errorCodes(response.json), ["INGESTION_IN_PROGRESS"]);
    });

    it("rejects an empty location list", async () => {
        const response = await ingestLocations(seed(), { locations: [] });

        assert.equal(response.statusCode, 400);
        assert.deepEqual(errorCodes(response.json), ["VALIDATION_FAILED"]);
    });
});
