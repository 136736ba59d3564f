// ─────────────────────────────────────────────────────────────
// Layout Export — Mobile layout JSON & fingerprint output
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import CryptoJS from "crypto-js";
import { LayoutFingerprint, MobileLayout, PipelineResult } from "../schema/layoutSchema";

const FINGERPRINT_VERSION = "1.0.0";

/** Sections hashed individually into the Merkle root, in this order */
const LAYOUT_SECTIONS = [
  "hero",
  "quickHighlights",
  "pledgeCards",
  "timelineItems",
  "achievements",
  "contactSection",
  "districtPledges",
  "pageTypes",
] as const;

/**
 * Write the layout (and the per-object hints a renderer may want)
 * as `<name>.layout.json`.
 */
export async function exportLayoutJSON(
  result: PipelineResult,
  outputDir: string,
  options?: { filename?: string; pretty?: boolean }
): Promise<string> {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const baseName = sanitizeFilename(options?.filename || result.layout.hero.candidate || "layout");
  const jsonPath = path.join(outputDir, `${baseName}.layout.json`);

  const payload = {
    layout: result.layout,
    pages: result.analysis.documentStructure,
    objects: result.objects.map((o) => ({
      id: o.id,
      type: o.type,
      confidence: o.confidence,
      content: o.content,
      page: o.boundingBox.page,
      groupId: o.groupId ?? null,
      htmlHint: o.htmlHint,
    })),
  };

  const content = options?.pretty !== false ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
  await fs.promises.writeFile(jsonPath, content, "utf-8");
  console.log(`[EXPORT] Layout JSON → ${jsonPath}`);

  return jsonPath;
}

/**
 * Fingerprint a layout. Keys are sorted before hashing, so equal
 * layouts always produce equal fingerprints.
 */
export function fingerprintLayout(layout: MobileLayout): LayoutFingerprint {
  const sectionHashes = LAYOUT_SECTIONS.map((section) =>
    CryptoJS.SHA256(`${section}:${canonicalJSON(layout[section])}`).toString()
  );

  return {
    sha256: CryptoJS.SHA256(canonicalJSON(layout)).toString(),
    merkleRoot: buildMerkleRoot(sectionHashes),
    sectionCount: sectionHashes.length,
    version: FINGERPRINT_VERSION,
  };
}

/** Verify a layout against a stored fingerprint */
export function verifyLayoutFingerprint(
  layout: MobileLayout,
  stored: LayoutFingerprint
): { valid: boolean; details: string } {
  const current = fingerprintLayout(layout);
  if (current.sha256 === stored.sha256 && current.merkleRoot === stored.merkleRoot) {
    return { valid: true, details: "Layout fingerprint matches." };
  }
  return {
    valid: false,
    details: `Fingerprint mismatch.\nExpected: ${stored.sha256}\nActual:   ${current.sha256}`,
  };
}

// ── Helpers ──────────────────────────────────────────────────

/** JSON with object keys sorted at every level */
export function canonicalJSON(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val !== null && typeof val === "object" && !Array.isArray(val)) {
      return Object.fromEntries(Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    }
    return val;
  });
}

/** Build a Merkle root from an array of hashes */
function buildMerkleRoot(hashes: string[]): string {
  if (hashes.length === 0) return CryptoJS.SHA256("empty").toString();
  if (hashes.length === 1) return hashes[0];

  const nextLevel: string[] = [];
  for (let i = 0; i < hashes.length; i += 2) {
    const left = hashes[i];
    const right = i + 1 < hashes.length ? hashes[i + 1] : left;
    nextLevel.push(CryptoJS.SHA256(left + right).toString());
  }

  return buildMerkleRoot(nextLevel);
}

/** Keep letters (any script), digits, dash and underscore */
function sanitizeFilename(name: string): string {
  return (
    name
      .replace(/[^\p{L}\p{N}\s\-_]/gu, "")
      .replace(/\s+/g, "-")
      .toLowerCase()
      .substring(0, 80) || "layout"
  );
}
