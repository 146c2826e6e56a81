import { mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";

/** Writes through a temp file and a rename so readers never see half a file. */
export const writeFileAtomic = async (filePath: string, contents: string): Promise<void> => {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, contents, "utf8");
  await rename(tmpPath, filePath);
};

export const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
