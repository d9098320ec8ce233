/**
 * Plain-text extractor
 *
 * Reads documents that are already text. PDF and scanned images need an
 * OCR-capable extractor behind the same TextExtractor port.
 */

import { readFile } from "fs/promises";
import { extname } from "path";
import type { TextExtractor } from "@legal-cascade/engine";
import { ExtractionError } from "../../domain/errors.js";

const kTEXT_EXTENSIONS = new Set([".txt", ".text", ".md"]);

export class PlainTextExtractor implements TextExtractor {
    supports(filePath: string): boolean {
        return kTEXT_EXTENSIONS.has(extname(filePath).toLowerCase());
    }

    async extract(filePath: string): Promise<string> {
        if (!this.supports(filePath)) {
            throw new ExtractionError(filePath, `unsupported file type "${extname(filePath) || "(none)"}"`);
        }

        try {
            return await readFile(filePath, "utf-8");
        }
        catch (error) {
            throw new ExtractionError(filePath, error instanceof Error ? error.message : String(error));
        }
    }
}
