// src/adapters/files.ts
// Fail-soft artifact readers. A missing file and a malformed file both come back
// as null; neither is allowed to throw into the caller.

import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export type ArtifactRead<T> =
  | { status: "loaded"; data: T }
  | { status: "missing" }
  | { status: "malformed"; reason: string };

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function describe(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues.slice(0, 3).map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

export async function readTextArtifact(file: string, label: string): Promise<string | null> {
  try {
    return await readFile(file, "utf8");
  } catch (err) {
    if (isMissing(err)) {
      console.log(`  [${label}] Not found: ${file} (will continue without)`);
    } else {
      console.warn(`  [${label}] Unreadable: ${file}: ${describe(err)}`);
    }
    return null;
  }
}

/** Read and validate a JSON artifact, reporting why it could not be used. */
export async function readJsonArtifactDetailed<S extends z.ZodTypeAny>(
  file: string,
  label: string,
  schema: S
): Promise<ArtifactRead<z.output<S>>> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (isMissing(err)) {
      console.log(`  [${label}] Not found: ${file} (will serve without)`);
      return { status: "missing" };
    }
    const reason = describe(err);
    console.warn(`  [${label}] Unreadable: ${file}: ${reason}`);
    return { status: "malformed", reason };
  }

  try {
    const data: z.output<S> = schema.parse(JSON.parse(text));
    console.log(`  [${label}] Loaded ${path.basename(file)}`);
    return { status: "loaded", data };
  } catch (err) {
    const reason = describe(err);
    console.warn(`  [${label}] Malformed: ${file}: ${reason} (treated as missing)`);
    return { status: "malformed", reason };
  }
}

export async function readJsonArtifact<S extends z.ZodTypeAny>(
  file: string,
  label: string,
  schema: S
): Promise<z.output<S> | null> {
  const r = await readJsonArtifactDetailed(file, label, schema);
  return r.status === "loaded" ? r.data : null;
}
