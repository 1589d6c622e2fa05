import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadDocument } from "./document";
import { DocumentLoadError } from "../errors";

describe("loadDocument", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "campus-doc-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("reads the file and normalises line endings", async () => {
        const file = path.join(dir, "campus.txt");
        await fs.writeFile(file, "Line one\r\nLine two\rLine three\n", "utf8");

        const document = await loadDocument(file);

        expect(document).toEqual({ source: "campus.txt", content: "Line one\nLine two\nLine three\n" });
    });

    it("wraps read failures in DocumentLoadError", async () => {
        const missing = path.join(dir, "missing.txt");

        await expect(loadDocument(missing)).rejects.toBeInstanceOf(DocumentLoadError);
        await expect(loadDocument(missing)).rejects.toThrow(`Failed to load knowledge document from "${missing}"`);
    });
});
