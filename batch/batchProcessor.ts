// ─────────────────────────────────────────────────────────────
// Batch Processor — Run the layout pipeline over a directory
// of fragment files, one independent document per file
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { readFragmentsFile } from "../ingest/fragmentIngest";
import { LayoutPipeline, PageHeights } from "../transform/layoutPipeline";
import { exportLayoutJSON, fingerprintLayout } from "../export/layoutExport";

/** Outcome for one brochure of a batch */
export interface BatchDocument {
  file: string;
  status: "success" | "failed";
  error?: string;
  outputPath?: string;
  duration: number;
  candidate?: string;
  pages?: number;
  objects?: number;
  cards?: number;
  pledges?: number;
  fingerprint?: string;
}

export interface BatchResult {
  total: number;
  succeeded: number;
  failed: number;
  documents: BatchDocument[];
  totals: { objects: number; cards: number; pledges: number };
}

export interface BatchOptions {
  recursive?: boolean;
  continueOnError?: boolean;
  pageHeight?: PageHeights;
  /** Record the layout SHA-256 for each document */
  fingerprint?: boolean;
}

/**
 * Discover fragment files in a directory (non-recursive by default).
 * Exported `*.layout.json` files are skipped.
 */
export function discoverFragmentFiles(dir: string, recursive = false): string[] {
  if (!fs.existsSync(dir)) {
    throw new Error(`Directory not found: ${dir}`);
  }

  const files: string[] = [];

  const walk = (currentDir: string) => {
    const entries = fs.readdirSync(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory() && recursive) {
        walk(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".json") && !entry.name.endsWith(".layout.json")) {
        files.push(fullPath);
      }
    }
  };

  walk(dir);
  return files.sort();
}

/** Export name for a discovered file: its path under the input dir, flattened */
export function layoutNameFor(inputDir: string, file: string): string {
  const relative = path.relative(inputDir, file);
  return relative.slice(0, relative.length - path.extname(relative).length).split(path.sep).join("-");
}

/**
 * Ingest, run and export every fragment file in `inputDir`, one after
 * another. Each document is written to `<outputDir>/<name>.layout.json`.
 * Without `continueOnError` the first failure aborts the batch.
 */
export async function processBatch(
  pipeline: LayoutPipeline,
  inputDir: string,
  outputDir: string,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const files = discoverFragmentFiles(inputDir, options.recursive);
  const result: BatchResult = {
    total: files.length,
    succeeded: 0,
    failed: 0,
    documents: [],
    totals: { objects: 0, cards: 0, pledges: 0 },
  };

  if (files.length === 0) {
    console.log(`[BATCH] No fragment files found in ${inputDir}`);
    return result;
  }

  console.log(`[BATCH] Found ${files.length} fragment file(s) to process`);

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const name = path.relative(inputDir, file);
    console.log(`[BATCH] (${i + 1}/${files.length}) ${name}`);
    const start = Date.now();

    try {
      const run = pipeline.run(readFragmentsFile(file), { pageHeight: options.pageHeight });
      const outputPath = await exportLayoutJSON(run, outputDir, { filename: layoutNameFor(inputDir, file) });

      const doc: BatchDocument = {
        file: name,
        status: "success",
        outputPath,
        duration: Date.now() - start,
        pages: run.analysis.documentStructure.pageCount,
        objects: run.objects.length,
        cards: run.cards.length,
        pledges: run.layout.pledgeCards.length,
      };
      if (run.layout.hero.candidate !== undefined) doc.candidate = run.layout.hero.candidate;
      if (options.fingerprint) doc.fingerprint = fingerprintLayout(run.layout).sha256;

      result.succeeded++;
      result.totals.objects += run.objects.length;
      result.totals.cards += run.cards.length;
      result.totals.pledges += run.layout.pledgeCards.length;
      result.documents.push(doc);
      console.log(`[BATCH] ✓ ${run.cards.length} card(s), ${run.layout.pledgeCards.length} pledge(s) in ${doc.duration}ms`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result.failed++;
      result.documents.push({ file: name, status: "failed", error: message, duration: Date.now() - start });
      console.error(`[BATCH] ✗ Failed: ${message}`);

      if (!options.continueOnError) {
        throw new Error(`Batch aborted at ${name}: ${message}`);
      }
    }
  }

  return result;
}

/**
 * Print one row per document and the batch totals.
 */
export function printBatchSummary(result: BatchResult): void {
  console.log("═══════════════════════════════════════════════════════");
  console.log("  BATCH SUMMARY");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Total:     ${result.total}`);
  console.log(`  Succeeded: ${result.succeeded}`);
  console.log(`  Failed:    ${result.failed}`);
  console.log("");

  for (const doc of result.documents) {
    if (doc.status === "success") {
      console.log(
        `  ✓ ${doc.file.padEnd(28)} ${doc.candidate ?? "-"}  ` +
          `${doc.pages ?? 0}p  ${doc.cards ?? 0} card(s)  ${doc.pledges ?? 0} pledge(s)`
      );
      if (doc.fingerprint) console.log(`      ${doc.fingerprint}`);
    } else {
      console.log(`  ✗ ${doc.file.padEnd(28)} ${doc.error ?? ""}`);
    }
  }
  console.log("");

  const totalTime = result.documents.reduce((sum, d) => sum + d.duration, 0);
  console.log(
    `  Objects: ${result.totals.objects}  Cards: ${result.totals.cards}  Pledges: ${result.totals.pledges}`
  );
  console.log(`  Total time: ${(totalTime / 1000).toFixed(1)}s`);
  console.log("");
}
