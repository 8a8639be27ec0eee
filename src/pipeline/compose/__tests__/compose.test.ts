import { describe, it, expect } from "vitest";
import { composeContext } from "../index.js";

const INSTRUCTIONS = [
    "Instructions for role resolution:",
    "- When you see a role mentioned (like CFO, CTO, etc.), look through ALL the context to find who holds that role",
    "- Connect actions performed by roles to the specific people who hold those roles",
    "- If someone \"approved\" something and they're described by a role, identify the person's name",
].join("\n");

describe("composeContext", () => {
    it("lays out structured data, chunks and instructions", () => {
        const context = composeContext("A - R -> B\n", ["one", "two"]);

        expect(context).toBe(
            "Structured data (Graph relationships):\n" +
                "A - R -> B\n" +
                "\n\n" +
                "Unstructured data (Document chunks):\n" +
                "one#Document two" +
                "\n\n" +
                INSTRUCTIONS +
                "\n",
        );
    });

    it("keeps the section headers when both parts are empty", () => {
        const context = composeContext("", []);

        expect(context).toBe(
            "Structured data (Graph relationships):\n\n\nUnstructured data (Document chunks):\n\n\n" + INSTRUCTIONS + "\n",
        );
    });
});
