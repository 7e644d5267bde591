import archiver from "archiver";
import { PassThrough } from "stream";
import { sha256Bytes } from "../shared/hash.js";

export interface BundleFile {
  /** Path inside the archive, e.g. "audit/trace.jsonl" */
  name: string;
  content: Buffer | string;
}

export interface BundleMeta {
  caseId: string;
  /** Stamped on every entry and on the manifest */
  generatedAt: Date;
  fingerprint: string;
}

export interface BundleManifest {
  caseId: string;
  generatedAt: string;
  fingerprint: string;
  files: Array<{ name: string; bytes: number; sha256: string }>;
}

export const BUNDLE_MANIFEST_NAME = "MANIFEST.json";

function toBuffer(content: Buffer | string): Buffer {
  return typeof content === "string" ? Buffer.from(content, "utf-8") : content;
}

/**
 * Inventory of a case bundle: size and SHA-256 of every file, in name order.
 */
export function buildBundleManifest(files: readonly BundleFile[], meta: BundleMeta): BundleManifest {
  const ordered = [...files].sort((a, b) => a.name.localeCompare(b.name));
  const seen = new Set<string>();
  for (const file of ordered) {
    if (file.name === BUNDLE_MANIFEST_NAME || seen.has(file.name)) {
      throw new Error(`Bundle entry "${file.name}" is reserved or duplicated`);
    }
    seen.add(file.name);
  }

  return {
    caseId: meta.caseId,
    generatedAt: meta.generatedAt.toISOString(),
    fingerprint: meta.fingerprint,
    files: ordered.map((file) => {
      const data = toBuffer(file.content);
      return { name: file.name, bytes: data.length, sha256: sha256Bytes(data) };
    }),
  };
}

/**
 * Zip the outputs of one analysis case together with MANIFEST.json.
 * Entries are written in name order with the case timestamp.
 */
export async function createCaseBundle(
  files: readonly BundleFile[],
  meta: BundleMeta
): Promise<Buffer> {
  const manifest = buildBundleManifest(files, meta);
  const byName = new Map(files.map((f) => [f.name, toBuffer(f.content)]));

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const sink = new PassThrough();
    sink.on("data", (chunk: Buffer) => chunks.push(chunk));
    sink.on("end", () => resolve(Buffer.concat(chunks)));

    const archive = archiver("zip", { zlib: { level: 9 } });
    archive.on("error", reject);
    archive.pipe(sink);

    archive.append(JSON.stringify(manifest, null, 2), {
      name: BUNDLE_MANIFEST_NAME,
      date: meta.generatedAt,
    });
    for (const entry of manifest.files) {
      const data = byName.get(entry.name);
      if (data) archive.append(data, { name: entry.name, date: meta.generatedAt });
    }

    archive.finalize().catch(reject);
  });
}
