// ─────────────────────────────────────────────────────────────
// Fragment Ingest — Validate extracted text fragments
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { z } from "zod";
import { FONT_STYLES, TEXT_ALIGNMENTS, TextFragment } from "../schema/layoutSchema";
import { formatIssues } from "../config/engineConfig";

const styleSchema = z
  .object({
    fontName: z.string(),
    fontSize: z.number().nonnegative(),
    fontStyle: z.enum(FONT_STYLES),
    color: z.string().regex(/^#[0-9a-f]{6}$/i, "expected #RRGGBB"),
    alignment: z.enum(TEXT_ALIGNMENTS),
  })
  .partial();

const boundingBoxSchema = z
  .object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
    page: z.number().int().positive(),
  })
  .partial();

const fragmentSchema = z.object({
  id: z.string().min(1).optional(),
  text: z.string(),
  style: styleSchema.optional(),
  boundingBox: boundingBoxSchema.optional(),
});

const fragmentListSchema = z.array(fragmentSchema).superRefine((fragments, ctx) => {
  const seen = new Set<string>();
  fragments.forEach((fragment, index) => {
    if (fragment.id === undefined) return;
    if (seen.has(fragment.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "id"],
        message: `duplicate fragment id "${fragment.id}"`,
      });
    }
    seen.add(fragment.id);
  });
});

const payloadSchema = z.union([
  fragmentListSchema,
  z.object({ fragments: fragmentListSchema }).transform((payload) => payload.fragments),
]);

/**
 * Validate a decoded JSON payload: either an array of fragments or an
 * object with a `fragments` array.
 */
export function parseFragments(raw: unknown): TextFragment[] {
  const parsed = payloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid fragment payload: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Read and validate a UTF-8 JSON fragment file */
export function readFragmentsFile(filePath: string): TextFragment[] {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Fragment file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Fragment file is not valid JSON: ${absolutePath} (${err instanceof Error ? err.message : String(err)})`);
  }

  const fragments = parseFragments(decoded);
  console.log(`[INGEST] ${path.basename(absolutePath)}: ${fragments.length} fragment(s)`);
  return fragments;
}
