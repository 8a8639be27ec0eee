import { describe, it, expect, vi, beforeEach } from "vitest";
import { VectorRetriever } from "../vectorRetriever.js";
import { FakeChunkStore, chunk } from "./fakes.js";

function setup() {
    const store = new FakeChunkStore(() => [
        { content: "Aurora Dynamics builds batteries.", score: 0.91234, metadata: { section: 0 } },
        chunk("HelioSoft sells software.", 0.5),
    ]);
    return { store, retriever: new VectorRetriever(store) };
}

describe("VectorRetriever", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
    });

    it("numbers the retrieved documents", async () => {
        const { store, retriever } = setup();

        const context = await retriever.retrieve("What does Aurora Dynamics build?");

        expect(context).toBe("Document 1:\nAurora Dynamics builds batteries.\n\nDocument 2:\nHelioSoft sells software.");
        expect(store.calls).toEqual([{ query: "What does Aurora Dynamics build?", k: 4 }]);
    });

    it("formats similarity scores to four decimals", async () => {
        const { retriever } = setup();

        const formatted = await retriever.retrieveFormatted("batteries", 2);

        expect(formatted).toBe(
            "Document 1 (Similarity Score: 0.9123):\nAurora Dynamics builds batteries.\n\n" +
                "Document 2 (Similarity Score: 0.5000):\nHelioSoft sells software.\n",
        );
    });

    it("reports ranked chunks with metadata", async () => {
        const { retriever } = setup();

        const report = await retriever.getMostRelevantChunks("batteries");

        expect(report).toEqual({
            query: "batteries",
            numResults: 2,
            documents: [
                { rank: 1, similarityScore: 0.91234, content: "Aurora Dynamics builds batteries.", metadata: { section: 0 } },
                { rank: 2, similarityScore: 0.5, content: "HelioSoft sells software.", metadata: {} },
            ],
        });
    });

    it("returns raw chunks with scores", async () => {
        const { retriever } = setup();

        const chunks = await retriever.retrieveWithScores("batteries", 1);

        expect(chunks.map((c) => c.score)).toEqual([0.91234, 0.5]);
    });

    it("returns an empty context when nothing is found", async () => {
        const retriever = new VectorRetriever(new FakeChunkStore());
        expect(await retriever.retrieve("anything")).toBe("");
    });
});
