import { strict as assert } from "node:assert";
import { describe, it } from "node:test";
import { PropertyStore } from "@unclaimed/store";
import { NotFoundError, QueryTooShortError } from "../service/errors";
import {
    SearchIndex,
    buildMatchExpression,
    clampLimit,
    normalizeSearchString,
} from "../service/helpers/searchIndex";
import { makeProperty } from "./helpers";

const seededIndex = (maxLimit?: number) => {
    const store = PropertyStore.open(":memory:");
    store.insertIfAbsent([
        makeProperty("P1", {
            ownerName: "SMITH JOHN",
            ownerCity: "FRESNO",
            holderName: "ACME BANK",
        }),
        makeProperty("P2", {
            ownerName: "SMITH ANNA",
            ownerCity: "OAKLAND",
            holderName: "BAY CREDIT UNION",
        }),
        makeProperty("P3", {
            ownerName: "JONES MARY",
            ownerAddress: "9 SMITHFIELD RD",
            ownerCity: "FRESNO",
        }),
    ]);
    store.extendIndex();
    return { store, index: new SearchIndex(store, maxLimit) };
};

describe("normalizeSearchString", () => {
    it("collapses and trims whitespace", () => {
        assert.equal(normalizeSearchString("  smith \t  john \n"), "smith john");
    });
});

describe("buildMatchExpression", () => {
    it("quotes every term as a phrase", () => {
        assert.equal(buildMatchExpression("smith john"), '"smith" "john"');
    });

    it("escapes embedded quotes", () => {
        assert.equal(buildMatchExpression('smith "x'), '"smith" """x"');
    });

    it("drops terms without letters or digits", () => {
        assert.equal(buildMatchExpression("-- smith *"), '"smith"');
        assert.equal(buildMatchExpression("-- *"), undefined);
    });
});

describe("clampLimit", () => {
    it("keeps limits within [1, max]", () => {
        assert.equal(clampLimit(0, 10), 1);
        assert.equal(clampLimit(-4, 10), 1);
        assert.equal(clampLimit(3.7, 10), 3);
        assert.equal(clampLimit(50, 10), 10);
        assert.equal(clampLimit(Number.NaN, 10), 10);
    });
});

describe("SearchIndex.query", () => {
    it("rejects queries shorter than two characters", () => {
        const { store, index } = seededIndex();
        assert.throws(() => index.query("a", 5), QueryTooShortError);
        assert.throws(() => index.query("   a  ", 5), QueryTooShortError);
        assert.throws(() => index.query("", 5), QueryTooShortError);
        store.close();
    });

    it("accepts a two character query", () => {
        const { store, index } = seededIndex();
        assert.deepEqual(index.query("zz", 5), []);
        store.close();
    });

    it("matches whole tokens across the indexed fields", () => {
        const { store, index } = seededIndex();
        assert.deepEqual(index.query("smith", 10), ["P1", "P2"]);
        assert.deepEqual(index.query("fresno", 10), ["P1", "P3"]);
        assert.deepEqual(index.query("credit", 10), ["P2"]);
        store.close();
    });

    it("requires every term to match", () => {
        const { store, index } = seededIndex();
        assert.deepEqual(index.query("smith fresno", 10), ["P1"]);
        assert.deepEqual(index.query("jones oakland", 10), []);
        store.close();
    });

    it("is case insensitive", () => {
        const { store, index } = seededIndex();
        assert.deepEqual(index.query("SmItH JoHn", 10), ["P1"]);
        store.close();
    });

    it("treats operator characters literally", () => {
        const { store, index } = seededIndex();
        assert.deepEqual(index.query('smith OR "', 10), []);
        assert.deepEqual(index.query("--", 10), []);
        store.close();
    });

    it("clamps the limit", () => {
        const { store, index } = seededIndex(1);
        assert.deepEqual(index.query("smith", 10), ["P1"]);
        assert.deepEqual(index.query("smith", 0), ["P1"]);
        store.close();
    });
});

describe("SearchIndex.lookup", () => {
    it("returns the stored record", () => {
        const { store, index } = seededIndex();
        assert.equal(index.lookup("P2").ownerName, "SMITH ANNA");
        store.close();
    });

    it("throws NotFoundError for an unknown id", () => {
        const { store, index } = seededIndex();
        assert.throws(
            () => index.lookup("P404"),
            (error: unknown) =>
                error instanceof NotFoundError && error.propertyId === "P404",
        );
        store.close();
    });
});
