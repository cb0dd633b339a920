import { mkdir, open, rename, unlink } from "node:fs/promises";
import { dirname } from "node:path";

export interface AtomicWriteOptions {
  fsync?: boolean;
}

/**
 * Writes `content` to a sibling tmp file and renames it over `filePath`,
 * so readers see either the old file or the new one, never a mix.
 */
export async function writeFileAtomic(filePath: string, content: string, options?: AtomicWriteOptions): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = filePath + ".tmp";
  try {
    const fh = await open(tmpPath, "w");
    try {
      await fh.writeFile(content, "utf-8");
      if (options?.fsync ?? true) await fh.sync();
    } finally {
      await fh.close();
    }
    await rename(tmpPath, filePath);
  } catch (err) {
    // Clean up orphaned tmp file
    try { await unlink(tmpPath); } catch { /* tmp may not exist */ }
    throw err;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown, options?: AtomicWriteOptions): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(value, null, 2) + "\n", options);
}
