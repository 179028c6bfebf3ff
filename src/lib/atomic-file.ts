import fsPromises from "node:fs/promises";
import path from "node:path";

/**
 * The subset of node:fs/promises used for snapshot persistence.
 * Tests substitute it to simulate disk failures.
 */
export interface FileSystem {
  readFile(filePath: string, encoding: "utf-8"): Promise<string>;
  writeFile(filePath: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(
    dirPath: string,
    options: { recursive: true },
  ): Promise<string | undefined>;
  rm(filePath: string, options: { force: true }): Promise<void>;
}

export const nodeFileSystem: FileSystem = fsPromises;

export type ReadJsonResult =
  | { status: "ok"; value: unknown }
  | { status: "missing" }
  | { status: "invalid"; error: string };

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/** Read and parse a JSON document. Never throws. */
export async function readJsonFile(
  filePath: string,
  fs: FileSystem = nodeFileSystem,
): Promise<ReadJsonResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return { status: "missing" };
    }
    return {
      status: "invalid",
      error: error instanceof Error ? error.message : String(error),
    };
  }

  try {
    return { status: "ok", value: JSON.parse(content) };
  } catch (error) {
    return {
      status: "invalid",
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export function tempPathFor(filePath: string): string {
  return `${filePath}.tmp`;
}

/**
 * Atomic write: write to .tmp, then rename over the target.
 * A failure before the rename leaves the target untouched.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  fs: FileSystem = nodeFileSystem,
): Promise<void> {
  const tmpPath = tempPathFor(filePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw error;
  }
}
