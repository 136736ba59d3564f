// ─────────────────────────────────────────────────────────────
// Mobile Layout Engine — Core Schema Definitions
// ─────────────────────────────────────────────────────────────

/** Semantic object types assigned by the classifier */
export const OBJECT_TYPES = [
  // text hierarchy
  "main-title",
  "section-title",
  "sub-title",
  "paragraph",
  "quote",
  "caption",
  // lists
  "bullet-list",
  "numbered-list",
  // structural
  "card",
  "timeline",
  "table",
  "box",
  // visual
  "image",
  "photo",
  "chart",
  "logo",
  "icon",
  "signature",
  // metadata
  "header",
  "footer",
  "page-number",
  "contact",
  "sns",
  // campaign material
  "candidate-name",
  "party-info",
  "slogan",
  "pledge",
  "achievement",
  "promise-number",
  "promise-title",
  "district-info",
  "profile",
  "career",
  "vision",
] as const;

export type ObjectType = (typeof OBJECT_TYPES)[number];

/** Type families, used for reporting and rendering decisions */
export const OBJECT_TYPE_FAMILIES: Record<string, readonly ObjectType[]> = {
  text: ["main-title", "section-title", "sub-title", "paragraph", "quote", "caption"],
  list: ["bullet-list", "numbered-list"],
  structural: ["card", "timeline", "table", "box"],
  visual: ["image", "photo", "chart", "logo", "icon", "signature"],
  metadata: ["header", "footer", "page-number", "contact", "sns"],
  domain: [
    "candidate-name",
    "party-info",
    "slogan",
    "pledge",
    "achievement",
    "promise-number",
    "promise-title",
    "district-info",
    "profile",
    "career",
    "vision",
  ],
};

export const FONT_STYLES = ["regular", "bold", "italic", "bold_italic"] as const;
export type FontStyle = (typeof FONT_STYLES)[number];

export const TEXT_ALIGNMENTS = ["left", "center", "right", "justify"] as const;
export type TextAlignment = (typeof TEXT_ALIGNMENTS)[number];

export const POSITION_RULES = ["top", "center", "bottom"] as const;
export type PositionRule = (typeof POSITION_RULES)[number];

/** Visual style of a text span */
export interface TextStyle {
  fontName: string;
  fontSize: number;        // points
  fontStyle: FontStyle;
  color: string;           // "#RRGGBB"
  alignment: TextAlignment;
}

/** Position of a span in PDF coordinates (origin top-left) */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
  page: number;            // 1-based
}

/** A raw text span handed over by the extraction service */
export interface TextFragment {
  readonly id?: string;
  readonly text: string;
  readonly style?: Readonly<Partial<TextStyle>>;
  readonly boundingBox?: Readonly<Partial<BoundingBox>>;
}

/** Declarative classification rule */
export interface ClassificationRule {
  name: string;
  targetType: ObjectType;
  priority: number;        // higher wins
  minFontSize?: number;
  maxFontSize?: number;
  fontStyle?: FontStyle;
  colorPattern?: string;   // regex source, matched against the hex color
  contentPattern?: string; // regex source, matched against the text
  positionRule?: PositionRule;
  baseConfidence: number;  // (0, 1]
}

/** Result of a single classification */
export interface Classification {
  type: ObjectType;
  confidence: number;
  /** Winning rule, null when the paragraph fallback applied */
  ruleName: string | null;
}

/** Rendering suggestion; never binding for the renderer */
export interface HtmlHint {
  tag: string;
  className: string;
}

/** A fragment after classification */
export interface ClassifiedObject {
  readonly id: string;
  readonly type: ObjectType;
  readonly confidence: number;
  readonly content: string;
  readonly boundingBox: Readonly<BoundingBox>;
  readonly style?: Readonly<TextStyle>;
  readonly groupId?: string;
  readonly htmlHint: Readonly<HtmlHint>;
  readonly ruleName: string | null;
}

/** Proximity group on a single page */
export interface ObjectGroup {
  id: string;
  page: number;
  objectIds: string[];
  bounds: { top: number; bottom: number; left: number; right: number };
}

export type ContentZone = "header" | "body" | "footer";

export type PageType = "cover" | "profile" | "pledge" | "achievement" | "contact" | "content";

/** Layout analysis of one page */
export interface PageLayout {
  page: number;
  columns: number;
  columnPositions: number[];
  groups: ObjectGroup[];
  /** Objects of the page in reading order, with their groupId set */
  readingOrder: ClassifiedObject[];
  zones: Record<ContentZone, string[]>;
}

export interface DocumentStructure {
  pageCount: number;
  totalObjects: number;
  pageTypes: Record<number, PageType>;
  columnsPerPage: Record<number, number>;
}

export interface LayoutAnalysis {
  pages: Record<number, PageLayout>;
  documentStructure: DocumentStructure;
}

export const CARD_CATEGORIES = [
  "education",
  "transport",
  "welfare",
  "development",
  "culture",
  "safety",
  "economy",
  "family",
] as const;

export type CardCategory = (typeof CARD_CATEGORIES)[number] | "general";

/** Sequential group opened by a heading-like object */
export interface Card {
  id: string;
  header: ClassifiedObject;
  content: ClassifiedObject[];
  category: CardCategory;
  boundingBox: Readonly<BoundingBox>;
}

// ── Mobile layout (final artifact) ──────────────────────────

export interface HeroSection {
  candidate?: string;
  slogan?: string;
  party?: string;
}

export interface PledgeCard {
  number: number;
  title: string;
  category: CardCategory;
  details: string[];
  page: number;
}

export interface TimelineItem {
  year: string;
  content: string;
}

export interface AchievementItem {
  content: string;
  page: number;
}

export type ContactKind = "phone" | "email" | "sns" | "other";

export interface ContactItem {
  kind: ContactKind;
  value: string;
}

export interface MobileLayout {
  readonly hero: Readonly<HeroSection>;
  readonly quickHighlights: readonly PledgeCard[];
  readonly pledgeCards: readonly PledgeCard[];
  readonly timelineItems: readonly TimelineItem[];
  readonly achievements: readonly AchievementItem[];
  readonly contactSection: readonly ContactItem[];
  readonly districtPledges: Readonly<Record<string, readonly string[]>>;
  readonly pageTypes: Readonly<Record<number, PageType>>;
}

/** Correction sample recorded for offline analysis */
export interface CorrectionSample {
  originalType: ObjectType;
  correctedType: ObjectType;
  textSample: string;
  textLength: number;
  style: Partial<TextStyle> | null;
  recordedAt: string;      // ISO timestamp
}

/** Everything one pipeline run produces */
export interface PipelineResult {
  objects: ClassifiedObject[];
  analysis: LayoutAnalysis;
  cards: Card[];
  layout: MobileLayout;
}

/** Layout fingerprint for reproducibility checks */
export interface LayoutFingerprint {
  sha256: string;
  merkleRoot: string;
  sectionCount: number;
  version: string;
}
