import * as fs from "fs/promises";
import * as path from "path";
import { createHash } from "crypto";
import { SentenceSplitter } from "llamaindex";
import { config } from "../config/index.js";
import type { ChunkInput } from "../types/domain.js";

export interface LoadedCorpus {
    path: string;
    text: string;
    checksum: string;
}

export interface ICorpusLoader {
    load(filePath: string): Promise<LoadedCorpus>;
}

export class TextCorpusLoader implements ICorpusLoader {
    async load(filePath: string): Promise<LoadedCorpus> {
        console.log(`[TextCorpusLoader] Loading documents from ${path.basename(filePath)}`);
        // The synthetic corpus is not guaranteed to be valid UTF-8
        const text = await fs.readFile(filePath, "latin1");
        const checksum = createHash("sha256").update(text).digest("hex");
        return { path: path.resolve(filePath), text, checksum };
    }
}

export interface ChunkingOptions {
    chunkSize?: number;
    chunkOverlap?: number;
    sectionSeparator?: string;
}

/**
 * Split on section separators first, then into overlapping sentence-aware chunks
 */
export function chunkCorpus(corpus: LoadedCorpus, options: ChunkingOptions = {}): ChunkInput[] {
    const splitter = new SentenceSplitter({
        chunkSize: options.chunkSize ?? config.chunking.chunkSize,
        chunkOverlap: options.chunkOverlap ?? config.chunking.chunkOverlap,
    });
    const separator = options.sectionSeparator ?? config.chunking.sectionSeparator;

    const sections = corpus.text
        .split(separator)
        .map((section) => section.trim())
        .filter((section) => section.length > 0);

    const chunks: ChunkInput[] = [];
    sections.forEach((section, sectionIndex) => {
        for (const content of splitter.splitText(section)) {
            chunks.push({
                content,
                metadata: { source: corpus.path, section: sectionIndex, chunk: chunks.length },
            });
        }
    });

    console.log(`[Chunker] Loaded ${chunks.length} chunks from ${sections.length} sections`);
    return chunks;
}
