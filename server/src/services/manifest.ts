// server/src/services/manifest.ts
import fs from "node:fs/promises";
import path from "node:path";
import { ManifestSchema, type ManifestEntry } from "../schemas/questionRecordSchemas";
import { errorMessage, type Logger } from "../utils/logger";

/** Missing, unreadable or malformed manifests read as an empty list. */
export async function readManifest(file: string, logger: Logger = console): Promise<ManifestEntry[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    logger.warn(`⚠️ Could not read manifest ${file}: ${errorMessage(err)}`);
    return [];
  }

  try {
    const parsed = ManifestSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn(`⚠️ Ignoring malformed manifest ${file}: ${parsed.error.message}`);
  } catch (err) {
    logger.warn(`⚠️ Ignoring malformed manifest ${file}: ${errorMessage(err)}`);
  }
  return [];
}

/** Replaces the entry with the same filename, or appends a new one. */
export function upsertEntry(manifest: readonly ManifestEntry[], entry: ManifestEntry): ManifestEntry[] {
  const found = manifest.some((e) => e.filename === entry.filename);
  if (!found) return [...manifest, entry];
  return manifest.map((e) => (e.filename === entry.filename ? { ...e, name: entry.name } : e));
}

export async function updateManifest(
  file: string,
  entry: ManifestEntry,
  logger: Logger = console
): Promise<ManifestEntry[]> {
  const next = upsertEntry(await readManifest(file, logger), entry);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(next, null, 2), "utf8");
  return next;
}
