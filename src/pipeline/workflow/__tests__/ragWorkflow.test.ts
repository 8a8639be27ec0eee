import { describe, it, expect, vi, beforeEach } from "vitest";
import { createRagWorkflow, formatChatHistory, runRagWorkflow } from "../ragWorkflow.js";
import { BackendError } from "../../../utils/errors.js";
import { FakeGenerator, FakeRetriever } from "../../__tests__/fakes.js";

function answeringGenerator() {
    return new FakeGenerator((prompt) =>
        prompt.includes("Standalone question:") ? "Who is the CFO of Aurora Dynamics?" : "Priya Nair",
    );
}

describe("formatChatHistory", () => {
    it("renders human and assistant turns", () => {
        expect(
            formatChatHistory([
                ["Who acquired SolarOptima?", "Aurora Dynamics"],
                ["When?", "In 2023"],
            ]),
        ).toBe("Human: Who acquired SolarOptima?\nAssistant: Aurora Dynamics\nHuman: When?\nAssistant: In 2023");
    });

    it("renders an empty history as an empty string", () => {
        expect(formatChatHistory([])).toBe("");
    });
});

describe("RAG workflow", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    it("retrieves with the question itself when there is no history", async () => {
        const retriever = new FakeRetriever("Fake", (question) => `context for ${question}`);
        const generator = answeringGenerator();
        const workflow = createRagWorkflow(retriever, generator);

        const answer = await runRagWorkflow(workflow, "Who is the CFO?");

        expect(answer).toBe("Priya Nair");
        expect(retriever.questions).toEqual(["Who is the CFO?"]);
        expect(generator.prompts).toHaveLength(1);
        expect(generator.prompts[0]?.prompt).toContain("context for Who is the CFO?");
        expect(generator.prompts[0]?.prompt).toContain("Question: Who is the CFO?");
    });

    it("condenses follow-up questions before retrieving", async () => {
        const retriever = new FakeRetriever("Fake", () => "Priya Nair is the CFO of Aurora Dynamics.");
        const generator = answeringGenerator();
        const workflow = createRagWorkflow(retriever, generator);

        const answer = await runRagWorkflow(workflow, "And its CFO?", [["Who acquired SolarOptima?", "Aurora Dynamics"]]);

        expect(answer).toBe("Priya Nair");
        expect(retriever.questions).toEqual(["Who is the CFO of Aurora Dynamics?"]);
        expect(generator.prompts).toHaveLength(2);
        expect(generator.prompts[0]?.prompt).toContain("Human: Who acquired SolarOptima?\nAssistant: Aurora Dynamics");
        expect(generator.prompts[1]?.prompt).toContain("Question: And its CFO?");
    });

    it("rethrows the original retrieval failure", async () => {
        const failure = new BackendError("graph", "connection refused");
        const retriever = new FakeRetriever("Fake", () => {
            throw failure;
        });
        const generator = answeringGenerator();
        const workflow = createRagWorkflow(retriever, generator);

        await expect(runRagWorkflow(workflow, "Who is the CFO?")).rejects.toBe(failure);
        expect(generator.prompts).toHaveLength(0);
    });

    it("rethrows answer generation failures", async () => {
        const retriever = new FakeRetriever("Fake", () => "context");
        const generator = new FakeGenerator(() => {
            throw new Error("429 Too Many Requests");
        });
        const workflow = createRagWorkflow(retriever, generator);

        await expect(runRagWorkflow(workflow, "Who is the CFO?")).rejects.toThrow("429 Too Many Requests");
    });
});
