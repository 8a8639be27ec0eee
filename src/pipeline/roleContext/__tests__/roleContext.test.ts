import { describe, it, expect } from "vitest";
import { RoleContextScanner } from "../index.js";
import { FakeChunkStore, chunk } from "../../__tests__/fakes.js";

describe("RoleContextScanner", () => {
    it("keeps sentences that mention the role next to a name", async () => {
        const store = new FakeChunkStore(() => [
            chunk("Priya Nair serves as CFO of Aurora Dynamics. The CFO reports quarterly. Revenue grew."),
        ]);
        const scanner = new RoleContextScanner();

        const context = await scanner.scan("Who is the CFO of Aurora Dynamics?", (q, k) => store.similaritySearch(q, k));

        expect(context).toBe("Role context: Priya Nair serves as CFO of Aurora Dynamics\n");
        expect(store.calls).toEqual([{ query: "CFO person name who", k: 3 }]);
    });

    it("matches role indicators case-insensitively", async () => {
        const store = new FakeChunkStore(() => []);
        const scanner = new RoleContextScanner();

        await scanner.scan("who is the cfo?", (q, k) => store.similaritySearch(q, k));

        expect(store.calls).toEqual([{ query: "CFO person name who", k: 3 }]);
    });

    it("does not search when the question names no role", async () => {
        const store = new FakeChunkStore(() => [chunk("Priya Nair is the CFO.")]);
        const scanner = new RoleContextScanner();

        const context = await scanner.scan("Where is HelioSoft based?", (q, k) => store.similaritySearch(q, k));

        expect(context).toBe("");
        expect(store.calls).toHaveLength(0);
    });

    it("drops sentences with fewer than two name-like tokens", async () => {
        const store = new FakeChunkStore(() => [chunk("The CFO approved it. By then the CFO had left.")]);
        const scanner = new RoleContextScanner();

        const context = await scanner.scan("Who is the CFO?", (q, k) => store.similaritySearch(q, k));

        expect(context).toBe("");
    });

    it("accepts custom indicators and search depth", async () => {
        const store = new FakeChunkStore(() => [chunk("Amelia Green is Treasurer at NorthBridge Capital.")]);
        const scanner = new RoleContextScanner({ roleIndicators: ["Treasurer"], k: 5 });

        const context = await scanner.scan("Who is the treasurer?", (q, k) => store.similaritySearch(q, k));

        expect(context).toBe("Role context: Amelia Green is Treasurer at NorthBridge Capital\n");
        expect(store.calls).toEqual([{ query: "Treasurer person name who", k: 5 }]);
    });
});

describe("RoleContextScanner.nameLikeTokens", () => {
    it("keeps capitalized tokens longer than two characters outside the stoplist", () => {
        const scanner = new RoleContextScanner();
        expect(scanner.nameLikeTokens("By The In As Al Bob met carol and Carol")).toEqual(["Bob", "Carol"]);
    });

    it("uses a custom stoplist", () => {
        const scanner = new RoleContextScanner({ stoplist: ["Bob"] });
        expect(scanner.nameLikeTokens("The Bob Carol")).toEqual(["The", "Carol"]);
    });
});
