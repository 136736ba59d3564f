// ─────────────────────────────────────────────────────────────
// Object Classifier — Rule-driven semantic typing of fragments
// ─────────────────────────────────────────────────────────────

import {
  BoundingBox,
  Classification,
  ClassificationRule,
  ClassifiedObject,
  CorrectionSample,
  FONT_STYLES,
  FontStyle,
  OBJECT_TYPES,
  OBJECT_TYPE_FAMILIES,
  ObjectType,
  TEXT_ALIGNMENTS,
  TextAlignment,
  TextFragment,
  TextStyle,
} from "../schema/layoutSchema";
import { DEFAULT_ENGINE_CONFIG, EngineConfig, classifierConfigSchema, validateConfig } from "../config/engineConfig";
import { CompiledRule, DEFAULT_RULES, compileRules } from "./ruleTable";
import { CorrectionLog } from "./correctionLog";
import { htmlHintFor } from "./htmlHints";

/** Confidence multipliers applied while evaluating a rule */
const WEIGHTS = {
  contentMatch: 1.2,
  colorMatch: 1.3,
  fontSizeMiss: 0.5,
  fontStyleMatch: 1.1,
  fontStyleMiss: 0.7,
  edgePositionMatch: 1.1,
} as const;

const FALLBACK_CONFIDENCE = 0.5;

const DEFAULT_STYLE: TextStyle = {
  fontName: "Unknown",
  fontSize: 12,
  fontStyle: "regular",
  color: "#000000",
  alignment: "left",
};

export interface ClassifierOptions {
  rules?: readonly ClassificationRule[];
  config?: Pick<EngineConfig, "pageHeight" | "positionBands">;
  correctionLog?: CorrectionLog;
}

export interface RuleCandidate {
  ruleName: string;
  type: ObjectType;
  priority: number;
  confidence: number;
}

export class ObjectClassifier {
  private readonly rules: readonly CompiledRule[];
  private readonly config: Pick<EngineConfig, "pageHeight" | "positionBands">;
  readonly corrections: CorrectionLog;

  constructor(options: ClassifierOptions = {}) {
    this.rules = compileRules(options.rules ?? DEFAULT_RULES);
    this.config = validateConfig(classifierConfigSchema, options.config ?? DEFAULT_ENGINE_CONFIG);
    this.corrections = options.correctionLog ?? new CorrectionLog();
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  /**
   * Classify a single text span.
   *
   * Every rule is evaluated; the surviving rule with the highest priority
   * wins, then the highest confidence, then the earliest declared.
   */
  classify(
    text: string,
    style?: Partial<TextStyle>,
    boundingBox?: Partial<BoundingBox>,
    pageHeight: number = this.config.pageHeight
  ): Classification {
    const normalized = text.trim();
    if (!normalized) {
      return { type: "paragraph", confidence: 0, ruleName: null };
    }

    let best: { rule: CompiledRule; confidence: number } | null = null;

    for (const rule of this.rules) {
      const confidence = this.evaluateRule(rule, normalized, style, boundingBox, pageHeight);
      if (confidence <= 0) continue;

      if (
        best === null ||
        rule.priority > best.rule.priority ||
        (rule.priority === best.rule.priority && confidence > best.confidence)
      ) {
        best = { rule, confidence };
      }
    }

    if (best === null) {
      return { type: "paragraph", confidence: FALLBACK_CONFIDENCE, ruleName: null };
    }
    return { type: best.rule.targetType, confidence: best.confidence, ruleName: best.rule.name };
  }

  /** Every surviving rule for a text, in selection order */
  explain(
    text: string,
    style?: Partial<TextStyle>,
    boundingBox?: Partial<BoundingBox>,
    pageHeight: number = this.config.pageHeight
  ): RuleCandidate[] {
    const normalized = text.trim();
    if (!normalized) return [];

    return this.rules
      .map((rule) => ({ rule, confidence: this.evaluateRule(rule, normalized, style, boundingBox, pageHeight) }))
      .filter((c) => c.confidence > 0)
      .sort((a, b) => b.rule.priority - a.rule.priority || b.confidence - a.confidence || a.rule.order - b.rule.order)
      .map(({ rule, confidence }) => ({
        ruleName: rule.name,
        type: rule.targetType,
        priority: rule.priority,
        confidence,
      }));
  }

  /** Evaluate one rule; 0 means the rule was rejected */
  private evaluateRule(
    rule: CompiledRule,
    text: string,
    style: Partial<TextStyle> | undefined,
    boundingBox: Partial<BoundingBox> | undefined,
    pageHeight: number
  ): number {
    let confidence = rule.baseConfidence;
    let met = 0;
    let total = 0;

    if (rule.contentRegex) {
      total++;
      if (!rule.contentRegex.test(text)) return 0;
      met++;
      confidence *= WEIGHTS.contentMatch;
    }

    if (style) {
      const fontSize = isFiniteNumber(style.fontSize) ? style.fontSize : undefined;

      if (rule.minFontSize !== undefined && fontSize !== undefined) {
        total++;
        if (fontSize >= rule.minFontSize) met++;
        else confidence *= WEIGHTS.fontSizeMiss;
      }

      if (rule.maxFontSize !== undefined && fontSize !== undefined) {
        total++;
        if (fontSize <= rule.maxFontSize) met++;
        else confidence *= WEIGHTS.fontSizeMiss;
      }

      if (rule.fontStyle !== undefined && style.fontStyle !== undefined) {
        total++;
        if (style.fontStyle === rule.fontStyle) {
          met++;
          confidence *= WEIGHTS.fontStyleMatch;
        } else {
          confidence *= WEIGHTS.fontStyleMiss;
        }
      }

      if (rule.colorRegex && typeof style.color === "string") {
        total++;
        if (!rule.colorRegex.test(style.color)) return 0;
        met++;
        confidence *= WEIGHTS.colorMatch;
      }
    }

    if (rule.positionRule && boundingBox && isFiniteNumber(boundingBox.y) && pageHeight > 0) {
      total++;
      const relativeY = boundingBox.y / pageHeight;
      const bands = this.config.positionBands;

      if (rule.positionRule === "top" && relativeY < bands.top) {
        met++;
        confidence *= WEIGHTS.edgePositionMatch;
      } else if (rule.positionRule === "center" && relativeY > bands.centerMin && relativeY < bands.centerMax) {
        met++;
      } else if (rule.positionRule === "bottom" && relativeY > bands.bottom) {
        met++;
        confidence *= WEIGHTS.edgePositionMatch;
      }
    }

    if (total > 0) {
      confidence *= 0.5 + 0.5 * (met / total);
    }

    return Math.min(Math.max(confidence, 0), 1);
  }

  /**
   * Classify a whole document. Output order matches input order and
   * every fragment yields exactly one object. Object ids must be unique:
   * a repeated caller id, or one that collides with a positional id,
   * throws before anything is classified.
   *
   * `pageHeight` is one height for every page, or a per-page map whose
   * missing pages use the configured height.
   */
  classifyBatch(
    fragments: readonly TextFragment[],
    pageHeight: number | Readonly<Record<number, number>> = this.config.pageHeight
  ): ClassifiedObject[] {
    const ids = fragments.map((fragment, index) => fragment.id ?? `obj_${index}`);
    const seen = new Set<string>();
    ids.forEach((id, index) => {
      if (seen.has(id)) throw new Error(`Duplicate fragment id "${id}" at index ${index}`);
      seen.add(id);
    });

    return fragments.map((fragment, index): ClassifiedObject => {
      const text = typeof fragment.text === "string" ? fragment.text : "";
      const style = normalizeStyle(fragment.style);
      const box = normalizeBoundingBox(fragment.boundingBox);
      const height = typeof pageHeight === "number" ? pageHeight : pageHeight[box?.page ?? 1] ?? this.config.pageHeight;
      const { type, confidence, ruleName } = this.classify(text, style, box, height);

      return {
        id: ids[index],
        type,
        confidence,
        content: text.trim(),
        boundingBox: box ?? { x: 0, y: 0, width: 0, height: 0, page: 1 },
        style,
        htmlHint: htmlHintFor(type),
        ruleName,
      };
    });
  }

  /**
   * Record a user correction for offline analysis. Classification
   * results are not affected.
   */
  recordCorrection(
    originalType: ObjectType,
    correctedType: ObjectType,
    text: string,
    style?: Partial<TextStyle>
  ): Readonly<CorrectionSample> {
    return this.corrections.append(originalType, correctedType, text, style);
  }
}

// ── Statistics ───────────────────────────────────────────────

export interface ClassificationSummary {
  total: number;
  byType: Partial<Record<ObjectType, { count: number; averageConfidence: number }>>;
  byFamily: Record<string, number>;
}

/** Per-type counts, mean confidence and per-family counts over classified output */
export function summarizeClassifications(objects: readonly ClassifiedObject[]): ClassificationSummary {
  const sums: Partial<Record<ObjectType, { count: number; confidence: number }>> = {};
  for (const obj of objects) {
    const entry = sums[obj.type] ?? { count: 0, confidence: 0 };
    entry.count++;
    entry.confidence += obj.confidence;
    sums[obj.type] = entry;
  }

  const byType: ClassificationSummary["byType"] = {};
  for (const type of OBJECT_TYPES) {
    const entry = sums[type];
    if (!entry) continue;
    byType[type] = { count: entry.count, averageConfidence: entry.confidence / entry.count };
  }

  const byFamily: Record<string, number> = {};
  for (const [family, types] of Object.entries(OBJECT_TYPE_FAMILIES)) {
    const count = types.reduce((sum, type) => sum + (sums[type]?.count ?? 0), 0);
    if (count > 0) byFamily[family] = count;
  }

  return { total: objects.length, byType, byFamily };
}

// ── Normalization helpers ───────────────────────────────────

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** Rebuild a full style from a partial one; empty or absent styles stay absent */
export function normalizeStyle(raw: Readonly<Partial<TextStyle>> | undefined): TextStyle | undefined {
  if (!raw || typeof raw !== "object" || Object.keys(raw).length === 0) return undefined;

  return {
    fontName: typeof raw.fontName === "string" && raw.fontName ? raw.fontName : DEFAULT_STYLE.fontName,
    fontSize: isFiniteNumber(raw.fontSize) ? raw.fontSize : DEFAULT_STYLE.fontSize,
    fontStyle: isFontStyle(raw.fontStyle) ? raw.fontStyle : DEFAULT_STYLE.fontStyle,
    color: typeof raw.color === "string" && raw.color ? raw.color : DEFAULT_STYLE.color,
    alignment: isAlignment(raw.alignment) ? raw.alignment : DEFAULT_STYLE.alignment,
  };
}

/** Rebuild a full bounding box; empty or absent boxes stay absent */
export function normalizeBoundingBox(raw: Readonly<Partial<BoundingBox>> | undefined): BoundingBox | undefined {
  if (!raw || typeof raw !== "object" || Object.keys(raw).length === 0) return undefined;

  return {
    x: isFiniteNumber(raw.x) ? raw.x : 0,
    y: isFiniteNumber(raw.y) ? raw.y : 0,
    width: isFiniteNumber(raw.width) ? raw.width : 0,
    height: isFiniteNumber(raw.height) ? raw.height : 0,
    page: isFiniteNumber(raw.page) && raw.page >= 1 ? Math.floor(raw.page) : 1,
  };
}

function isFontStyle(value: unknown): value is FontStyle {
  return FONT_STYLES.some((s) => s === value);
}

function isAlignment(value: unknown): value is TextAlignment {
  return TEXT_ALIGNMENTS.some((a) => a === value);
}
