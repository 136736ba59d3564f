// ─────────────────────────────────────────────────────────────
// Rule Table — Declarative classification rules
// ─────────────────────────────────────────────────────────────

import { z } from "zod";
import {
  ClassificationRule,
  FONT_STYLES,
  OBJECT_TYPES,
  POSITION_RULES,
} from "../schema/layoutSchema";
import { deepFreeze, formatIssues } from "../config/engineConfig";
import { districtAlternation, loadDictionaries } from "../config/dictionaries";

/** Short single-line text; gates the style-driven tier */
const SHORT_LINE = "^.{1,40}$";

/** A known district name followed by a separator or the end of the line */
export function districtRulePattern(districts: readonly string[]): string {
  return `^${districtAlternation(districts)}(\\s|:|·|-|$)`;
}

/**
 * Default rule table. Priorities are a tuned reference table: change
 * them together with the parity tests in test/objectClassifier.test.ts.
 *
 * Rules without a hard gate (content or color pattern) would survive every
 * fragment, so every rule here carries one. The style tier shares one
 * priority and is decided by confidence.
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = deepFreeze<ClassificationRule[]>([
  // ── Campaign material ──
  {
    name: "party_info",
    targetType: "party-info",
    priority: 105,
    contentPattern: "(국민의힘|더불어민주당|정의당|녹색당|기본소득당|진보당|개혁신당|조국혁신당|무소속)",
    baseConfidence: 0.99,
  },
  {
    name: "candidate_name",
    targetType: "candidate-name",
    priority: 100,
    minFontSize: 20,
    contentPattern: "^[가-힣]{2,4}$",
    positionRule: "top",
    baseConfidence: 0.9,
  },

  // ── Lists (outrank the promise-number card rule) ──
  {
    name: "numbered_list",
    targetType: "numbered-list",
    priority: 99,
    contentPattern: "^\\s*(\\d+[.)]\\s|[①②③④⑤⑥⑦⑧⑨⑩])",
    baseConfidence: 0.98,
  },
  {
    name: "bullet_list",
    targetType: "bullet-list",
    priority: 99,
    contentPattern: "^\\s*[·•\\-▶▷◆◇★☆✓✔→►]",
    baseConfidence: 0.98,
  },
  {
    name: "promise_number",
    targetType: "promise-number",
    priority: 97,
    contentPattern: "^(공약|약속)?\\s*\\d+\\s*$|^제?\\s*\\d+\\s*(호|번)?\\s*공약|^\\d+\\.\\s*\\S",
    baseConfidence: 0.95,
  },

  // ── Contact / media ──
  {
    name: "contact_phone",
    targetType: "contact",
    priority: 96,
    contentPattern: "(전화|TEL|☎)?\\s*0\\d{1,2}[-.\\s]?\\d{3,4}[-.\\s]?\\d{4}",
    baseConfidence: 0.98,
  },
  {
    name: "contact_email",
    targetType: "contact",
    priority: 96,
    contentPattern: "[a-z0-9._%+-]+@[a-z0-9.-]+\\.[a-z]{2,}",
    baseConfidence: 0.99,
  },
  {
    name: "image_placeholder",
    targetType: "image",
    priority: 96,
    contentPattern: "^\\[(image|img|이미지|그림)[^\\]]*\\]$",
    baseConfidence: 0.95,
  },
  {
    name: "sns_link",
    targetType: "sns",
    priority: 95,
    contentPattern: "(facebook|instagram|twitter|youtube|blog|naver|kakao|@)",
    baseConfidence: 0.95,
  },

  // ── Dated / page furniture ──
  {
    name: "timeline_year",
    targetType: "timeline",
    priority: 94,
    contentPattern: "^(19|20)\\d{2}[\\s.\\-년~]",
    baseConfidence: 0.95,
  },
  {
    name: "page_number",
    targetType: "page-number",
    priority: 93,
    contentPattern: "^\\s*-?\\s*\\d{1,3}\\s*-?\\s*$",
    positionRule: "bottom",
    baseConfidence: 0.9,
  },
  {
    name: "caption",
    targetType: "caption",
    priority: 93,
    contentPattern: "^(그림|사진|표|figure|fig\\.|table)\\s*\\d+",
    baseConfidence: 0.9,
  },
  {
    name: "quote",
    targetType: "quote",
    priority: 92,
    contentPattern: "^[\"'“‘].*[\"'”’]$|^「.*」$|^『.*』$",
    baseConfidence: 0.92,
  },

  // ── Headings ──
  {
    name: "promise_title",
    targetType: "promise-title",
    priority: 91,
    contentPattern: "^(교육|교통|복지|경제|문화|안전|주거|환경|일자리|청년|육아|보육)[가-힣·\\s]{1,14}$",
    baseConfidence: 0.9,
  },
  {
    name: "district_info",
    targetType: "district-info",
    priority: 89,
    contentPattern: districtRulePattern(loadDictionaries().districts),
    baseConfidence: 0.92,
  },
  {
    name: "slogan",
    targetType: "slogan",
    priority: 88,
    minFontSize: 16,
    contentPattern: "!$|함께|약속|미래|변화|희망",
    baseConfidence: 0.85,
  },
  {
    name: "table_row",
    targetType: "table",
    priority: 87,
    contentPattern: "\\S\\s*\\|\\s*\\S.*\\|\\s*\\S|\\S\\t+\\S.*\\t+\\S",
    baseConfidence: 0.9,
  },
  {
    name: "career_entry",
    targetType: "career",
    priority: 86,
    contentPattern: "^\\(?(전|현|前|現)\\)?\\s+\\S",
    baseConfidence: 0.85,
  },
  {
    name: "achievement",
    targetType: "achievement",
    priority: 85,
    contentPattern: "(실적|성과|완료|달성|유치|확보|신설|개통|증가|감소|\\d+%|\\d+억|\\d+만)",
    baseConfidence: 0.8,
  },
  {
    name: "pledge",
    targetType: "pledge",
    priority: 84,
    contentPattern: "(추진|조성|확대|건립|지원|개선|설립|도입)",
    baseConfidence: 0.8,
  },

  // ── Style tier (decided by confidence) ──
  // A color condition is skipped when the fragment has no color, so the
  // color-keyed headings live here rather than above the content rules.
  {
    name: "body_text",
    targetType: "paragraph",
    priority: 10,
    minFontSize: 10,
    maxFontSize: 13,
    fontStyle: "regular",
    contentPattern: SHORT_LINE,
    baseConfidence: 0.9,
  },
  {
    name: "main_title_large",
    targetType: "main-title",
    priority: 10,
    minFontSize: 24,
    fontStyle: "bold",
    contentPattern: SHORT_LINE,
    positionRule: "top",
    baseConfidence: 0.95,
  },
  {
    name: "section_title_size",
    targetType: "section-title",
    priority: 10,
    minFontSize: 14,
    maxFontSize: 24,
    fontStyle: "bold",
    contentPattern: SHORT_LINE,
    baseConfidence: 0.85,
  },
  {
    name: "sub_title",
    targetType: "sub-title",
    priority: 10,
    minFontSize: 13.5,
    maxFontSize: 18,
    fontStyle: "regular",
    contentPattern: SHORT_LINE,
    baseConfidence: 0.8,
  },
  {
    name: "section_title_blue",
    targetType: "section-title",
    priority: 10,
    colorPattern: "#(2563EB|1E40AF|3B82F6|0066CC|0000FF)",
    fontStyle: "bold",
    contentPattern: SHORT_LINE,
    baseConfidence: 0.95,
  },
  {
    name: "section_title_red",
    targetType: "section-title",
    priority: 10,
    colorPattern: "#(DC2626|EF4444|B91C1C|FF0000|CC0000)",
    fontStyle: "bold",
    contentPattern: SHORT_LINE,
    baseConfidence: 0.95,
  },
  {
    name: "header",
    targetType: "header",
    priority: 10,
    maxFontSize: 10,
    contentPattern: SHORT_LINE,
    positionRule: "top",
    baseConfidence: 0.9,
  },
  {
    name: "footer",
    targetType: "footer",
    priority: 10,
    maxFontSize: 10,
    contentPattern: SHORT_LINE,
    positionRule: "bottom",
    baseConfidence: 0.9,
  },
]);

// ── Validation & compilation ───────────────────────────────

/** The given table with the district rule rebuilt over another district list */
export function rulesForDistricts(
  rules: readonly ClassificationRule[],
  districts: readonly string[]
): ClassificationRule[] {
  return rules.map((rule) =>
    rule.name === "district_info" ? { ...rule, contentPattern: districtRulePattern(districts) } : rule
  );
}

const ruleSchema = z
  .object({
    name: z.string().trim().min(1),
    targetType: z.enum(OBJECT_TYPES),
    priority: z.number().int(),
    minFontSize: z.number().nonnegative().optional(),
    maxFontSize: z.number().nonnegative().optional(),
    fontStyle: z.enum(FONT_STYLES).optional(),
    colorPattern: z.string().min(1).optional(),
    contentPattern: z.string().min(1).optional(),
    positionRule: z.enum(POSITION_RULES).optional(),
    baseConfidence: z.number().gt(0).lte(1),
  })
  .strict()
  .refine(
    (rule) => rule.minFontSize === undefined || rule.maxFontSize === undefined || rule.minFontSize <= rule.maxFontSize,
    { message: "minFontSize must not exceed maxFontSize", path: ["minFontSize"] }
  );

/** A validated rule with its patterns compiled */
export interface CompiledRule extends Readonly<ClassificationRule> {
  readonly order: number;
  readonly contentRegex?: RegExp;
  readonly colorRegex?: RegExp;
}

/**
 * Validate and compile a rule table. Any problem is a configuration
 * error and throws here, before a single fragment is classified.
 */
export function compileRules(rules: readonly ClassificationRule[]): readonly CompiledRule[] {
  if (rules.length === 0) {
    throw new Error("Invalid rule table: at least one rule is required");
  }

  const seen = new Set<string>();
  const compiled = rules.map((raw, order): CompiledRule => {
    const parsed = ruleSchema.safeParse(raw);
    const label = typeof raw.name === "string" && raw.name ? raw.name : `#${order}`;
    if (!parsed.success) {
      throw new Error(`Invalid rule "${label}": ${formatIssues(parsed.error)}`);
    }

    const rule = parsed.data;
    if (seen.has(rule.name)) {
      throw new Error(`Invalid rule table: duplicate rule name "${rule.name}"`);
    }
    seen.add(rule.name);

    return Object.freeze({
      ...rule,
      order,
      contentRegex: rule.contentPattern !== undefined ? compilePattern(rule.name, "contentPattern", rule.contentPattern) : undefined,
      colorRegex: rule.colorPattern !== undefined ? compilePattern(rule.name, "colorPattern", rule.colorPattern) : undefined,
    });
  });

  return Object.freeze(compiled);
}

function compilePattern(ruleName: string, field: string, source: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid rule "${ruleName}": ${field} is not a valid regular expression (${reason})`);
  }
}
