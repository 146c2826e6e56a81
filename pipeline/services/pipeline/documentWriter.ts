import { readFile } from "node:fs/promises";
import path from "node:path";

import { isMissingFileError, writeFileAtomic } from "../../utils/files";
import { PageFileNames } from "../../utils/url";

export interface DocumentWriter {
  /** Persists the translated page and returns where it went. */
  write(url: string, html: string): Promise<string>;
}

/** Translated pages that later steps read back and rewrite. */
export interface TranslatedPages extends DocumentWriter {
  /** The saved page, or null when it has not been written yet. */
  read(url: string): Promise<string | null>;
}

export class FileDocumentWriter implements TranslatedPages {
  constructor(
    private readonly transDir: string,
    private readonly fileNames = new PageFileNames(),
  ) {}

  pathFor(url: string): string {
    return path.join(this.transDir, this.fileNames.resolve(url));
  }

  async write(url: string, html: string): Promise<string> {
    const outputPath = this.pathFor(url);
    await writeFileAtomic(outputPath, html);
    return outputPath;
  }

  async read(url: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(url), "utf8");
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw error;
    }
  }
}
