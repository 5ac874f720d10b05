// src/integrations/snapshot_writer.ts
// Artifacts become visible only once complete: write beside the target, then rename over it.

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

export async function writeArtifactAtomic(file: string, value: unknown): Promise<void> {
  const dir = path.dirname(file);
  await mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await writeFile(tmp, JSON.stringify(value, null, 2) + "\n", "utf8");
    await rename(tmp, file);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
