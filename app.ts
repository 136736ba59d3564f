// ─────────────────────────────────────────────────────────────
// Mobile Layout Engine — Command-line entry point
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   npx tsx app.ts <fragments.json> [options]
//   npx tsx app.ts --batch <dir> [options]
//
// Examples:
//   npx tsx app.ts ./input/brochure.json
//   npx tsx app.ts ./input/brochure.json --page-height 1190 --fingerprint
//   npx tsx app.ts ./input/brochure.json --page-height 1:842,2:1190
//   npx tsx app.ts --batch ./input --output ./output --continue-on-error
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { PipelineResult } from "./schema/layoutSchema";
import { readFragmentsFile } from "./ingest/fragmentIngest";
import { LayoutPipeline, PageHeights, createLayoutPipeline } from "./transform/layoutPipeline";
import { exportLayoutJSON, fingerprintLayout } from "./export/layoutExport";
import { processBatch, printBatchSummary } from "./batch/batchProcessor";

interface CLIOptions {
  filePath: string;
  outputDir: string;
  pageHeight: PageHeights | undefined;
  batch: string | null;
  recursive: boolean;
  continueOnError: boolean;
  fingerprint: boolean;
  verbose: boolean;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const getFlag = (flag: string): string | null => {
    const idx = args.indexOf(flag);
    return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : null;
  };

  // Determine the file path: skip flags and their values
  let filePath = "";
  const flagsWithValues = new Set(["--output", "--page-height", "--batch"]);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (flagsWithValues.has(arg)) i++;
      continue;
    }
    filePath = arg;
    break;
  }

  const rawPageHeight = getFlag("--page-height");

  return {
    filePath,
    outputDir: getFlag("--output") || "./output",
    pageHeight: rawPageHeight !== null ? parsePageHeights(rawPageHeight) : undefined,
    batch: getFlag("--batch"),
    recursive: args.includes("--recursive"),
    continueOnError: args.includes("--continue-on-error"),
    fingerprint: args.includes("--fingerprint"),
    verbose: args.includes("--verbose"),
  };
}

/** "842" for every page, or "1:842,2:1190" per page */
function parsePageHeights(raw: string): PageHeights {
  const positive = (value: string): number => {
    const n = Number(value);
    if (!Number.isFinite(n) || n <= 0) {
      throw new Error(`--page-height must be a positive number or page:height list, got "${raw}"`);
    }
    return n;
  };

  if (!raw.includes(":")) return positive(raw);

  const heights: Record<number, number> = {};
  for (const pair of raw.split(",")) {
    const [page, height] = pair.split(":");
    const pageNumber = Number(page);
    if (!Number.isInteger(pageNumber) || pageNumber < 1 || height === undefined) {
      throw new Error(`--page-height must be a positive number or page:height list, got "${raw}"`);
    }
    heights[pageNumber] = positive(height);
  }
  return heights;
}

function printHelp(): void {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║         MOBILE LAYOUT ENGINE v1.0.0                          ║
║         Brochure fragments → mobile layout                   ║
╚══════════════════════════════════════════════════════════════╝

USAGE:
  npx tsx app.ts <fragments.json> [options]
  npx tsx app.ts --batch <dir> [options]

OPTIONS:
  --output <dir>        Output directory (default: ./output)
  --page-height <n>     Page height in points (default: 842), or
                        per page as 1:842,2:1190
  --fingerprint         Print the layout fingerprint
  --verbose             Log one summary line per pipeline run

BATCH OPTIONS:
  --batch <dir>         Process every fragment file in a directory
  --recursive           Include subdirectories
  --continue-on-error   Keep going when a document fails
`);
}

/** Ingest, run and export a single fragment file */
async function processFile(pipeline: LayoutPipeline, options: CLIOptions): Promise<PipelineResult> {
  const { filePath, outputDir } = options;
  const fragments = readFragmentsFile(filePath);
  const result = pipeline.run(fragments, { pageHeight: options.pageHeight });
  const baseName = path.basename(filePath, path.extname(filePath));
  await exportLayoutJSON(result, outputDir, { filename: baseName });
  return result;
}

function printLayoutSummary(result: PipelineResult, fingerprint: boolean): void {
  const { layout, analysis } = result;

  console.log("");
  console.log("═══════════════════════════════════════════════════════");
  console.log("  MOBILE LAYOUT");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Candidate:    ${layout.hero.candidate ?? "-"}`);
  console.log(`  Party:        ${layout.hero.party ?? "-"}`);
  console.log(`  Slogan:       ${layout.hero.slogan ?? "-"}`);
  console.log(`  Pages:        ${analysis.documentStructure.pageCount}`);
  console.log(
    `  Page types:   ${Object.entries(layout.pageTypes).map(([page, type]) => `${page}:${type}`).join(", ") || "-"}`
  );
  console.log(`  Objects:      ${result.objects.length}`);
  console.log(`  Cards:        ${result.cards.length}`);
  console.log("");

  console.log(`  HIGHLIGHTS (${layout.quickHighlights.length}):`);
  for (const pledge of layout.quickHighlights) {
    console.log(`    ★ ${pledge.title} [${pledge.category}]`);
  }
  console.log("");

  console.log(`  PLEDGES (${layout.pledgeCards.length}):`);
  for (const pledge of layout.pledgeCards) {
    console.log(`    ${pledge.number}. ${pledge.title} [${pledge.category}] — ${pledge.details.length} detail(s)`);
  }
  console.log("");

  console.log(`  Timeline:     ${layout.timelineItems.length} item(s)`);
  console.log(`  Achievements: ${layout.achievements.length}`);
  console.log(`  Districts:    ${Object.keys(layout.districtPledges).join(", ") || "-"}`);
  console.log(`  Contacts:     ${layout.contactSection.map((c) => `${c.kind}:${c.value}`).join(", ") || "-"}`);

  if (fingerprint) {
    const fp = fingerprintLayout(layout);
    console.log("");
    console.log(`  SHA-256:      ${fp.sha256}`);
    console.log(`  Merkle root:  ${fp.merkleRoot}`);
  }
  console.log("");
}

async function main(): Promise<void> {
  const options = parseArgs();
  const pipeline = createLayoutPipeline({ verbose: options.verbose });

  if (options.batch) {
    const result = await processBatch(pipeline, options.batch, options.outputDir, {
      recursive: options.recursive,
      continueOnError: options.continueOnError,
      pageHeight: options.pageHeight,
      fingerprint: options.fingerprint,
    });
    printBatchSummary(result);
    if (result.failed > 0) process.exitCode = 1;
    return;
  }

  if (!options.filePath) {
    throw new Error("No fragment file given. Run with --help for usage.");
  }
  if (!fs.existsSync(options.filePath)) {
    throw new Error(`File not found: ${options.filePath}`);
  }

  const result = await processFile(pipeline, options);
  printLayoutSummary(result, options.fingerprint);
}

// ── Run ──────────────────────────────────────────────────────

main().catch((err: unknown) => {
  console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : err);
  process.exit(1);
});
