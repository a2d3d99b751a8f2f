import { strict as assert } from "node:assert";
import { type Server, createServer } from "node:http";
import { after, before, describe, it } from "node:test";
import { PropertyStore } from "@unclaimed/store";
import got from "got";
import { createApp } from "../server";
import { BatchLoader } from "../service/helpers/batchLoader";
import { createPropertyService } from "../service/index";
import { closeServer, errorCodes, listen, makeProperty } from "./helpers";

const client = got.extend({ throwHttpErrors: false, retry: { limit: 0 } });

const parse = (body: string): unknown => JSON.parse(body);

describe("createApp", () => {
    let store: PropertyStore;
    let server: Server;
    let baseUrl: string;

    before(async () => {
        store = PropertyStore.open(":memory:");
        new BatchLoader(store, 10).loadBatch([
            makeProperty("P100", { ownerName: "GARCIA MARIA", ownerCity: "FRESNO" }),
        ]);
        const service = createPropertyService({ store });
        server = createServer(
            createApp({
                service,
                allowOrigin: "*",
                allowHeaders: "Content-Type",
            }),
        );
        baseUrl = await listen(server);
    });

    after(async () => {
        await closeServer(server);
        store.close();
    });

    it("serves search results as JSON:API", async () => {
        const response = await client.get(`${baseUrl}/search?q=garcia&limit=5`);

        assert.equal(response.statusCode, 200);
        assert.match(
            String(response.headers["content-type"]),
            /^application\/vnd\.api\+json/,
        );
        assert.deepEqual(parse(response.body), {
            jsonapi: { version: "1.1" },
            data: [
                {
                    type: "property",
                    id: "P100",
                    attributes: {
                        ownerName: "GARCIA MARIA",
                        ownerAddress: "",
                        ownerCity: "FRESNO",
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
                    links: { self: "/property/P100" },
                },
            ],
            links: { self: "/search?q=garcia&limit=5" },
            meta: { query: "garcia", limit: 5, count: 1 },
        });
    });

    it("adds the configured CORS headers", async () => {
        const response = await client.get(`${baseUrl}/property/P100`);

        assert.equal(response.statusCode, 200);
        assert.equal(response.headers["access-control-allow-origin"], "*");
        assert.equal(response.headers["access-control-allow-headers"], "Content-Type");
    });

    it("returns 404 for an unknown property", async () => {
        const response = await client.get(`${baseUrl}/property/P999`);

        assert.equal(response.statusCode, 404);
        assert.deepEqual(errorCodes(parse(response.body)), ["RESOURCE_NOT_FOUND"]);
    });

    it("acknowledges a claim", async () => {
        const response = await client.post(`${baseUrl}/claim`, {
            json: {
                propertyId: "P100",
                claimantName: "Maria Garcia",
                claimantAddress: "12 Oak St, Fresno CA",
                claimantEmail: "maria@example.test",
            },
        });

        assert.equal(response.statusCode, 200);
        assert.match(String(response.headers["content-type"]), /^application\/json/);
        const body = parse(response.body);
        assert.ok(typeof body === "object" && body !== null && "message" in body);
        assert.equal(body.message, "Claim initiated");
    });

    it("rejects a malformed JSON body", async () => {
        const response = await client.post(`${baseUrl}/claim`, {
            body: '{"propertyId": ',
            headers: { "content-type": "application/json" },
        });

        assert.equal(response.statusCode, 400);
        assert.match(
            String(response.headers["content-type"]),
            /^application\/vnd\.api\+json/,
        );
        assert.deepEqual(errorCodes(parse(response.body)), ["MALFORMED_BODY"]);
    });

    it("rejects ingest locations that are not published archives", async () => {
        const response = await client.post(`${baseUrl}/ingest`, {
            json: { locations: ["/etc/hostname"] },
        });

        assert.equal(response.statusCode, 400);
        assert.deepEqual(errorCodes(parse(response.body)), ["VALIDATION_FAILED"]);
    });
});

describe("createApp without CORS settings", () => {
    it("sends no CORS headers", async () => {
        const store = PropertyStore.open(":memory:");
        const server = createServer(
            createApp({ service: createPropertyService({ store }) }),
        );
        const baseUrl = await listen(server);

        try {
            const response = await client.get(`${baseUrl}/search?q=zz`);

            assert.equal(response.statusCode, 200);
            assert.equal(response.headers["access-control-allow-origin"], undefined);
        } finally {
            await closeServer(server);
            store.close();
        }
    });
});
