// ─────────────────────────────────────────────────────────────
// Layout Analyzer — Columns, groups, reading order and zones
// ─────────────────────────────────────────────────────────────

import {
  ClassifiedObject,
  ContentZone,
  LayoutAnalysis,
  ObjectGroup,
  ObjectType,
  PageLayout,
  PageType,
} from "../schema/layoutSchema";
import { DEFAULT_ENGINE_CONFIG, EngineConfig, analyzerConfigSchema, validateConfig } from "../config/engineConfig";
import { Dictionaries, DictionaryOverrides, loadDictionaries } from "../config/dictionaries";

type AnalyzerConfig = Pick<
  EngineConfig,
  "columnThreshold" | "groupThreshold" | "zoneRatios" | "coverMaxObjects" | "minPageKeywordHits"
>;

/** Keyword lists are tried in this order; the first qualifying one wins */
const KEYWORD_PAGE_TYPES = ["profile", "pledge", "achievement", "contact"] as const;

/** Object types whose presence decides a page type when keywords don't */
const TYPE_PRESENCE_RULES: { types: ObjectType[]; pageType: PageType }[] = [
  { types: ["table"], pageType: "profile" },
  { types: ["promise-number", "promise-title"], pageType: "pledge" },
  { types: ["achievement"], pageType: "achievement" },
];

export class LayoutAnalyzer {
  private readonly config: AnalyzerConfig;
  private readonly dictionaries: Pick<Dictionaries, "pageTypeKeywords" | "contactKeywords">;

  constructor(
    options: {
      config?: AnalyzerConfig;
      dictionaries?: DictionaryOverrides;
    } = {}
  ) {
    this.config = validateConfig(analyzerConfigSchema, options.config ?? DEFAULT_ENGINE_CONFIG);
    this.dictionaries = loadDictionaries(options.dictionaries);
  }

  /**
   * Analyze every page of a document and infer each page's type.
   * An empty document is one degenerate single-column page with no
   * groups and no inferred type.
   */
  analyzeLayout(objects: readonly ClassifiedObject[]): LayoutAnalysis {
    if (objects.length === 0) {
      return {
        pages: { 1: this.analyzePage([], 1) },
        documentStructure: { pageCount: 1, totalObjects: 0, pageTypes: {}, columnsPerPage: { 1: 1 } },
      };
    }

    const byPage = new Map<number, ClassifiedObject[]>();
    for (const obj of objects) {
      const bucket = byPage.get(obj.boundingBox.page) ?? [];
      bucket.push(obj);
      byPage.set(obj.boundingBox.page, bucket);
    }

    const pageNumbers = [...byPage.keys()].sort((a, b) => a - b);
    const lastPage = pageNumbers.length > 0 ? pageNumbers[pageNumbers.length - 1] : 0;

    const pages: Record<number, PageLayout> = {};
    const pageTypes: Record<number, PageType> = {};
    const columnsPerPage: Record<number, number> = {};

    for (const page of pageNumbers) {
      const pageObjects = byPage.get(page) ?? [];
      const layout = this.analyzePage(pageObjects, page);
      pages[page] = layout;
      columnsPerPage[page] = layout.columns;
      pageTypes[page] = this.inferPageType(page, pageObjects, page === lastPage);
    }

    return {
      pages,
      documentStructure: {
        pageCount: pageNumbers.length,
        totalObjects: objects.length,
        pageTypes,
        columnsPerPage,
      },
    };
  }

  /** Analyze the objects of a single page */
  analyzePage(objects: readonly ClassifiedObject[], page = 1): PageLayout {
    if (objects.length === 0) {
      return {
        page,
        columns: 1,
        columnPositions: [],
        groups: [],
        readingOrder: [],
        zones: { header: [], body: [], footer: [] },
      };
    }

    const columnPositions = this.detectColumns(objects.map((o) => o.boundingBox.x));
    const runs = this.proximityRuns(objects);
    const groups = runs.map((members, index) => toGroup(members, page, index));

    // Keyed by object; ids are not assumed unique here
    const groupOf = new Map<ClassifiedObject, string>();
    runs.forEach((members, index) => {
      for (const member of members) groupOf.set(member, groups[index].id);
    });

    const readingOrder = this.determineReadingOrder(objects, columnPositions).map(
      (obj): ClassifiedObject => ({ ...obj, groupId: groupOf.get(obj) })
    );

    return {
      page,
      columns: Math.max(1, columnPositions.length),
      columnPositions,
      groups,
      readingOrder,
      zones: this.detectZones(objects),
    };
  }

  /** Column anchors from x origins: a new anchor once the gap exceeds the threshold */
  detectColumns(xCoords: readonly number[]): number[] {
    const distinct = [...new Set(xCoords)].sort((a, b) => a - b);
    if (distinct.length < 2) return distinct;

    const columns = [distinct[0]];
    for (const x of distinct.slice(1)) {
      if (x - columns[columns.length - 1] > this.config.columnThreshold) {
        columns.push(x);
      }
    }
    return columns;
  }

  /** Sort by (y, x) and cut a new group whenever the y gap exceeds the threshold */
  groupByProximity(objects: readonly ClassifiedObject[], page = 1): ObjectGroup[] {
    return this.proximityRuns(objects).map((members, index) => toGroup(members, page, index));
  }

  private proximityRuns(objects: readonly ClassifiedObject[]): ClassifiedObject[][] {
    if (objects.length === 0) return [];

    const sorted = sortByPosition(objects);
    const runs: ClassifiedObject[][] = [[sorted[0]]];

    for (const obj of sorted.slice(1)) {
      const current = runs[runs.length - 1];
      const last = current[current.length - 1];
      if (Math.abs(obj.boundingBox.y - last.boundingBox.y) <= this.config.groupThreshold) {
        current.push(obj);
      } else {
        runs.push([obj]);
      }
    }

    return runs;
  }

  /** Top-to-bottom for one column; column by column for several */
  determineReadingOrder(objects: readonly ClassifiedObject[], columns: readonly number[]): ClassifiedObject[] {
    if (columns.length <= 1) return sortByPosition(objects);

    const buckets: ClassifiedObject[][] = columns.map(() => []);
    for (const obj of objects) {
      let column = columns.findIndex((anchor) => obj.boundingBox.x < anchor + this.config.columnThreshold);
      if (column === -1) column = columns.length - 1;
      buckets[column].push(obj);
    }

    return buckets.flatMap((bucket) => [...bucket].sort((a, b) => a.boundingBox.y - b.boundingBox.y));
  }

  /** Header/body/footer membership relative to the page's own y range */
  detectZones(objects: readonly ClassifiedObject[]): Record<ContentZone, string[]> {
    const zones: Record<ContentZone, string[]> = { header: [], body: [], footer: [] };
    if (objects.length === 0) return zones;

    const ys = objects.map((o) => o.boundingBox.y);
    const minY = Math.min(...ys);
    const maxY = Math.max(...ys);
    const span = maxY - minY;

    for (const obj of sortByPosition(objects)) {
      const y = obj.boundingBox.y;
      if (span > 0 && y < minY + span * this.config.zoneRatios.header) {
        zones.header.push(obj.id);
      } else if (span > 0 && y > maxY - span * this.config.zoneRatios.footer) {
        zones.footer.push(obj.id);
      } else {
        zones.body.push(obj.id);
      }
    }
    return zones;
  }

  /** Coarse purpose of a page from its size, keywords and object types */
  inferPageType(page: number, objects: readonly ClassifiedObject[], isLastPage: boolean): PageType {
    if (page === 1 && objects.length <= this.config.coverMaxObjects) return "cover";

    const text = objects.map((o) => o.content).join(" ").toLowerCase();

    if (isLastPage && this.dictionaries.contactKeywords.some((kw) => containsKeyword(text, kw))) {
      return "contact";
    }

    for (const pageType of KEYWORD_PAGE_TYPES) {
      const hits = new Set(
        this.dictionaries.pageTypeKeywords[pageType].filter((kw) => containsKeyword(text, kw))
      ).size;
      if (hits >= this.config.minPageKeywordHits) return pageType;
    }

    const types = new Set(objects.map((o) => o.type));
    for (const rule of TYPE_PRESENCE_RULES) {
      if (rule.types.some((t) => types.has(t))) return rule.pageType;
    }

    return "content";
  }
}

function toGroup(members: readonly ClassifiedObject[], page: number, index: number): ObjectGroup {
  return {
    id: `p${page}-g${index + 1}`,
    page,
    objectIds: members.map((m) => m.id),
    bounds: {
      top: Math.min(...members.map((m) => m.boundingBox.y)),
      bottom: Math.max(...members.map((m) => m.boundingBox.y + m.boundingBox.height)),
      left: Math.min(...members.map((m) => m.boundingBox.x)),
      right: Math.max(...members.map((m) => m.boundingBox.x + m.boundingBox.width)),
    },
  };
}

/**
 * Substring match for Hangul keywords; Latin keywords ("tel", "e-mail")
 * must stand as whole words so "hotel" or "intel" do not count.
 */
function containsKeyword(lowerText: string, keyword: string): boolean {
  const kw = keyword.toLowerCase();
  if (!/[a-z]/.test(kw)) return lowerText.includes(kw);

  let from = lowerText.indexOf(kw);
  while (from !== -1) {
    const before = lowerText.charAt(from - 1);
    const after = lowerText.charAt(from + kw.length);
    if (!/[a-z0-9]/.test(before) && !/[a-z0-9]/.test(after)) return true;
    from = lowerText.indexOf(kw, from + 1);
  }
  return false;
}

/** Stable (y, x) ordering */
function sortByPosition(objects: readonly ClassifiedObject[]): ClassifiedObject[] {
  return [...objects].sort((a, b) => a.boundingBox.y - b.boundingBox.y || a.boundingBox.x - b.boundingBox.x);
}
