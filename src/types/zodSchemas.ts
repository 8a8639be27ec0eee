import { z } from "zod";

export const EntitiesSchema = z.object({
  names: z
    .array(z.string())
    .describe(
      "All the person, organization, business entities, and job titles/roles that appear in the text",
    ),
});

export type Entities = z.infer<typeof EntitiesSchema>;

export const GraphExtractionSchema = z.object({
  nodes: z.array(
    z.object({
      id: z.string(),
      type: z.string().default(""),
    }),
  ),
  relationships: z
    .array(
      z.object({
        source: z.string(),
        target: z.string(),
        type: z.string(),
      }),
    )
    .default([]),
});

export type GraphExtraction = z.infer<typeof GraphExtractionSchema>;

export const RagModeSchema = z.enum(["vector", "graph", "compare"]);

export type RagMode = z.infer<typeof RagModeSchema>;

export const CliArgsSchema = z.object({
  mode: RagModeSchema.default("compare"),
  question: z.string().trim().min(1).optional(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;
