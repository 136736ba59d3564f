// ─────────────────────────────────────────────────────────────
// Engine Configuration — Thresholds and limits for every stage
// ─────────────────────────────────────────────────────────────

import { z } from "zod";
import { OBJECT_TYPES } from "../schema/layoutSchema";

const ratio = z.number().min(0).max(1);

const positionBandsSchema = z
  .object({
    top: ratio,
    centerMin: ratio,
    centerMax: ratio,
    bottom: ratio,
  })
  .refine((b) => b.top <= b.centerMin && b.centerMin < b.centerMax && b.centerMax <= b.bottom, {
    message: "bands must satisfy top <= centerMin < centerMax <= bottom",
  });

const sloganSchema = z
  .object({
    minLength: z.number().int().nonnegative(),
    maxLength: z.number().int().positive(),
  })
  .refine((s) => s.minLength <= s.maxLength, { message: "minLength must not exceed maxLength" });

const engineConfigSchema = z.object({
  /** Page height used by position rules (A4 at 72 DPI) */
  pageHeight: z.number().positive(),
  /** Max x distance between column anchors */
  columnThreshold: z.number().nonnegative(),
  /** Max y distance inside one proximity group */
  groupThreshold: z.number().nonnegative(),
  /** Max vertical span of a card from its opening object */
  cardSpanThreshold: z.number().nonnegative(),
  positionBands: positionBandsSchema,
  zoneRatios: z.object({
    header: z.number().min(0).max(0.5),
    footer: z.number().min(0).max(0.5),
  }),
  coverMaxObjects: z.number().int().nonnegative(),
  minPageKeywordHits: z.number().int().positive(),
  cardOpeningTypes: z.array(z.enum(OBJECT_TYPES)).min(1),
  maxHighlights: z.number().int().nonnegative(),
  minPledgeTitleLength: z.number().int().nonnegative(),
  slogan: sloganSchema,
  maxFragmentsPerDocument: z.number().int().positive(),
});

// Per-stage slices, so a stage built on its own validates what it is given
export const classifierConfigSchema = engineConfigSchema.pick({ pageHeight: true, positionBands: true });
export const analyzerConfigSchema = engineConfigSchema.pick({
  columnThreshold: true,
  groupThreshold: true,
  zoneRatios: true,
  coverMaxObjects: true,
  minPageKeywordHits: true,
});
export const cardConfigSchema = engineConfigSchema.pick({ cardOpeningTypes: true, cardSpanThreshold: true });
export const synthesizerConfigSchema = engineConfigSchema.pick({
  maxHighlights: true,
  minPledgeTitleLength: true,
  slogan: true,
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export type EngineConfigOverrides = Partial<Omit<EngineConfig, "positionBands" | "zoneRatios" | "slogan">> & {
  positionBands?: Partial<EngineConfig["positionBands"]>;
  zoneRatios?: Partial<EngineConfig["zoneRatios"]>;
  slogan?: Partial<EngineConfig["slogan"]>;
};

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = deepFreeze<EngineConfig>({
  pageHeight: 842,
  columnThreshold: 50,
  groupThreshold: 30,
  cardSpanThreshold: 300,
  positionBands: { top: 0.2, centerMin: 0.3, centerMax: 0.7, bottom: 0.8 },
  zoneRatios: { header: 0.1, footer: 0.1 },
  coverMaxObjects: 5,
  minPageKeywordHits: 2,
  cardOpeningTypes: ["promise-number", "promise-title", "section-title", "main-title"],
  maxHighlights: 6,
  minPledgeTitleLength: 5,
  slogan: { minLength: 5, maxLength: 50 },
  maxFragmentsPerDocument: 10_000,
});

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on the first misconfiguration so it never reaches a document.
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): Readonly<EngineConfig> {
  const merged = {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    positionBands: { ...DEFAULT_ENGINE_CONFIG.positionBands, ...overrides.positionBands },
    zoneRatios: { ...DEFAULT_ENGINE_CONFIG.zoneRatios, ...overrides.zoneRatios },
    slogan: { ...DEFAULT_ENGINE_CONFIG.slogan, ...overrides.slogan },
  };

  return validateConfig(engineConfigSchema, merged);
}

/**
 * Validate a full config or one stage's slice of it. The result is a
 * frozen copy.
 */
export function validateConfig<T extends z.ZodTypeAny>(schema: T, value: unknown): Readonly<z.infer<T>> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid engine configuration: ${formatIssues(parsed.error)}`);
  }
  return deepFreeze<z.infer<T>>(parsed.data);
}

/** Render zod issues as "path: message; path: message" */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Recursively freeze a plain data structure */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
