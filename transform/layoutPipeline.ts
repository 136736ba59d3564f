// ─────────────────────────────────────────────────────────────
// Layout Pipeline — Composition root for the four stages
//
//   fragments → classify → analyze layout → detect cards → synthesize
// ─────────────────────────────────────────────────────────────

import { ClassificationRule, ClassifiedObject, PipelineResult, TextFragment } from "../schema/layoutSchema";
import { EngineConfig, EngineConfigOverrides, resolveEngineConfig } from "../config/engineConfig";
import { Dictionaries, DictionaryOverrides, loadDictionaries } from "../config/dictionaries";
import { ObjectClassifier } from "../parser/objectClassifier";
import { DEFAULT_RULES, rulesForDistricts } from "../parser/ruleTable";
import { LayoutAnalyzer } from "../parser/layoutAnalyzer";
import { CardDetector } from "../parser/cardDetector";
import { CorrectionLog, CorrectionSink } from "../parser/correctionLog";
import { MobileLayoutSynthesizer } from "./mobileLayoutSynthesizer";

/** One height for every page, or heights by page number */
export type PageHeights = number | Readonly<Record<number, number>>;

export interface PipelineOptions {
  config?: EngineConfigOverrides;
  dictionaries?: DictionaryOverrides;
  rules?: readonly ClassificationRule[];
  correctionSink?: CorrectionSink;
  /** Print a one-line summary per run */
  verbose?: boolean;
}

export class LayoutPipeline {
  readonly config: Readonly<EngineConfig>;
  readonly dictionaries: Readonly<Dictionaries>;
  readonly classifier: ObjectClassifier;
  readonly analyzer: LayoutAnalyzer;
  readonly cardDetector: CardDetector;
  readonly synthesizer: MobileLayoutSynthesizer;
  private readonly verbose: boolean;

  constructor(options: PipelineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.dictionaries = loadDictionaries(options.dictionaries);
    this.verbose = options.verbose ?? false;

    const deps = { config: this.config, dictionaries: this.dictionaries };
    this.classifier = new ObjectClassifier({
      rules: options.rules ?? rulesForDistricts(DEFAULT_RULES, this.dictionaries.districts),
      config: this.config,
      correctionLog: new CorrectionLog({ sink: options.correctionSink }),
    });
    this.analyzer = new LayoutAnalyzer(deps);
    this.cardDetector = new CardDetector(deps);
    this.synthesizer = new MobileLayoutSynthesizer(deps);
  }

  /**
   * Run all four stages over one document. Pure with respect to the
   * pipeline: nothing from one run is visible to the next.
   */
  run(fragments: readonly TextFragment[], options: { pageHeight?: PageHeights } = {}): PipelineResult {
    if (fragments.length > this.config.maxFragmentsPerDocument) {
      throw new Error(
        `Document has ${fragments.length} fragments; the limit is ${this.config.maxFragmentsPerDocument}`
      );
    }
    const pageHeight = options.pageHeight ?? this.config.pageHeight;
    assertPageHeights(pageHeight);

    const classified = this.classifier.classifyBatch(fragments, pageHeight);
    const analysis = this.analyzer.analyzeLayout(classified);
    const readingOrder = documentReadingOrder(analysis.pages);

    // Ids are unique once classifyBatch accepts the document
    const groupIds = new Map(readingOrder.map((obj): [string, string | undefined] => [obj.id, obj.groupId]));
    const objects = classified.map((obj): ClassifiedObject => ({ ...obj, groupId: groupIds.get(obj.id) }));
    const cards = this.cardDetector.detectCards(readingOrder);
    const layout = this.synthesizer.synthesize(readingOrder, cards, analysis.documentStructure.pageTypes);

    if (this.verbose) {
      console.log(
        `[PIPELINE] ${objects.length} objects, ${analysis.documentStructure.pageCount} pages, ` +
          `${cards.length} cards, ${layout.pledgeCards.length} pledges`
      );
    }

    return { objects, analysis, cards, layout };
  }
}

function assertPageHeights(pageHeight: PageHeights): void {
  if (typeof pageHeight === "number") {
    if (!Number.isFinite(pageHeight) || pageHeight <= 0) throw new Error(`Invalid page height: ${pageHeight}`);
    return;
  }
  for (const [page, height] of Object.entries(pageHeight)) {
    if (!Number.isFinite(height) || height <= 0) {
      throw new Error(`Invalid page height for page ${page}: ${height}`);
    }
  }
}

/** Concatenate per-page reading orders by ascending page number */
export function documentReadingOrder(pages: Record<number, { readingOrder: ClassifiedObject[] }>): ClassifiedObject[] {
  return Object.keys(pages)
    .map(Number)
    .sort((a, b) => a - b)
    .flatMap((page) => pages[page].readingOrder);
}

export function createLayoutPipeline(options: PipelineOptions = {}): LayoutPipeline {
  return new LayoutPipeline(options);
}
