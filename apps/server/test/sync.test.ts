import { strict as assert } from "node:assert";
import { describe, it } from "node:test";
import { PropertyStore } from "@unclaimed/store";
import { SyncOrchestrator } from "../service/commands/sync";
import {
    ArchiveEmptyError,
    FetchFailedError,
    IngestionInProgressError,
    IngestionRunError,
    LoadFailedError,
} from "../service/errors";
import { createPropertyService } from "../service/index";
import type { RunProgressEvent } from "../service/types/index";
import { fixturePath } from "./helpers";

/**
 * Store whose index extension fails on one chosen call.
 */
class FlakyIndexStore extends PropertyStore {
    failOnCall = 0;
    private calls = 0;

    extendIndex(): number {
        this.calls += 1;
        if (this.calls === this.failOnCall) {
            throw new Error("simulated crash before indexing");
        }
        return super.extendIndex();
    }
}

const isRunError =
    (check: (cause: unknown) => boolean) =>
    (error: unknown): boolean =>
        error instanceof IngestionRunError && check(error.cause);

describe("SyncOrchestrator", () => {
    it("keeps the first record for a repeated id", async () => {
        const store = PropertyStore.open(":memory:");
        const service = createPropertyService({ store, chunkSize: 10 });

        const summary = await service.triggerIngestion([
            fixturePath("duplicates.zip"),
        ]);

        assert.equal(summary.inserted, 1);
        assert.equal(summary.skipped, 1);
        assert.deepEqual(
            service.search("Smith", 5).map((property) => property.propertyId),
            ["P1"],
        );
        assert.deepEqual(service.search("Jones", 5), []);
        assert.equal(service.getById("P1").amountReported, 10);
        store.close();
    });

    it("inserts nothing when the same archive is ingested again", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store, { chunkSize: 10 });
        await orchestrator.run([fixturePath("duplicates.zip")]);

        const again = await orchestrator.run([fixturePath("duplicates.zip")]);

        assert.equal(again.inserted, 0);
        assert.equal(again.skipped, 2);
        assert.equal(store.count(), 1);
        assert.equal(store.indexedCount(), 1);
        store.close();
    });

    it("counts rows dropped for a missing id", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store, { chunkSize: 2 });
        const location = fixturePath("records.zip");

        const summary = await orchestrator.run([location]);

        assert.equal(summary.processed, 3);
        assert.equal(summary.inserted, 3);
        assert.equal(summary.dropped, 1);
        assert.equal(summary.locations.length, 1);
        assert.equal(summary.locations[0]?.location, location);
        assert.equal(summary.locations[0]?.rows, 4);
        assert.equal(store.indexedCount(), 3);
        store.close();
    });

    it("processes locations in order and totals them", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store, { chunkSize: 10 });
        const events: RunProgressEvent[] = [];

        const summary = await orchestrator.run(
            [fixturePath("records.zip"), fixturePath("duplicates.zip")],
            { onProgress: (event) => events.push(event) },
        );

        assert.equal(summary.inserted, 4);
        assert.equal(summary.skipped, 1);
        assert.equal(summary.processed, 5);
        assert.deepEqual(
            events.map((event) => event.kind),
            [
                "location-start",
                "fetched",
                "chunk",
                "location-done",
                "location-start",
                "fetched",
                "chunk",
                "location-done",
            ],
        );
        store.close();
    });

    it("reports an archive without a table", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store);

        await assert.rejects(
            orchestrator.run([fixturePath("empty.zip")]),
            isRunError((cause) => cause instanceof ArchiveEmptyError),
        );
        assert.equal(orchestrator.isRunning, false);
        store.close();
    });

    it("fails a partial download and accepts the next run", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store, { chunkSize: 10 });

        await assert.rejects(
            orchestrator.run([fixturePath("truncated.zip")]),
            isRunError((cause) => cause instanceof FetchFailedError),
        );
        assert.equal(orchestrator.isRunning, false);

        const summary = await orchestrator.run([fixturePath("duplicates.zip")]);
        assert.equal(summary.inserted, 1);
        store.close();
    });

    it("stops at the first failing location and keeps earlier ones", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store, { chunkSize: 10 });
        const missing = fixturePath("missing.zip");

        await assert.rejects(
            orchestrator.run([fixturePath("duplicates.zip"), missing]),
            (error: unknown) =>
                error instanceof IngestionRunError &&
                error.cause instanceof FetchFailedError &&
                error.location === missing &&
                error.chunkOffset === undefined &&
                error.runCommitted.inserted === 1,
        );
        assert.equal(store.count(), 1);
        assert.equal(store.indexedCount(), 1);
        store.close();
    });

    it("rejects a second run while one is in flight", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store);

        const first = orchestrator.run([fixturePath("duplicates.zip")]);
        assert.equal(orchestrator.isRunning, true);
        await assert.rejects(
            orchestrator.run([fixturePath("duplicates.zip")]),
            IngestionInProgressError,
        );

        await first;
        assert.equal(orchestrator.isRunning, false);
        store.close();
    });

    it("indexes rows left behind by an interrupted run", async () => {
        const base = PropertyStore.open(":memory:");
        const store = new FlakyIndexStore(base.db);
        // Call 1 is the catch-up, call 2 the first chunk
        store.failOnCall = 2;
        const orchestrator = new SyncOrchestrator(store, { chunkSize: 10 });

        await assert.rejects(
            orchestrator.run([fixturePath("duplicates.zip")]),
            (error: unknown) =>
                error instanceof IngestionRunError &&
                error.cause instanceof LoadFailedError &&
                error.cause.stage === "index" &&
                error.chunkOffset === 0 &&
                error.locationCommitted.processed === 2 &&
                error.locationCommitted.inserted === 1,
        );
        assert.equal(store.count(), 1);
        assert.equal(store.indexedCount(), 0);

        const events: RunProgressEvent[] = [];
        const summary = await orchestrator.run([fixturePath("duplicates.zip")], {
            onProgress: (event) => events.push(event),
        });

        assert.equal(summary.recovered, 1);
        assert.deepEqual(events[0], { kind: "recovered", indexed: 1 });
        assert.equal(summary.inserted, 0);
        assert.equal(store.indexedCount(), 1);
        base.close();
    });

    it("stops before fetching when cancelled", async () => {
        const store = PropertyStore.open(":memory:");
        const orchestrator = new SyncOrchestrator(store);
        const controller = new AbortController();
        controller.abort();

        await assert.rejects(
            orchestrator.run([fixturePath("duplicates.zip")], {
                signal: controller.signal,
            }),
            isRunError(
                (cause) =>
                    typeof cause === "object" &&
                    cause !== null &&
                    "name" in cause &&
                    cause.name === "AbortError",
            ),
        );
        assert.equal(store.count(), 0);
        store.close();
    });
});
