// ─────────────────────────────────────────────────────────────
// Mobile Layout Synthesizer — Aggregate objects and cards into
// the named sections a mobile renderer consumes
// ─────────────────────────────────────────────────────────────

import {
  AchievementItem,
  Card,
  ClassifiedObject,
  ContactItem,
  HeroSection,
  MobileLayout,
  ObjectType,
  PageType,
  PledgeCard,
  TimelineItem,
} from "../schema/layoutSchema";
import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfig,
  deepFreeze,
  synthesizerConfigSchema,
  validateConfig,
} from "../config/engineConfig";
import { Dictionaries, DictionaryOverrides, districtAlternation, loadDictionaries } from "../config/dictionaries";

type SynthesizerConfig = Pick<EngineConfig, "maxHighlights" | "minPledgeTitleLength" | "slogan">;

/** Types the pattern-based name fallback considers */
const NAME_TYPES: ReadonlySet<ObjectType> = new Set<ObjectType>(["candidate-name"]);

const HANGUL_NAME = /^[가-힣]{2,4}$/;
const EMAIL = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;
const PHONE = /0\d{1,2}[-.\s]?\d{3,4}[-.\s]?\d{4}/;
const TIMELINE_ENTRY = /^((?:19|20)\d{2})[\s.\-년~]*(.*)$/;

export class MobileLayoutSynthesizer {
  private readonly config: SynthesizerConfig;
  private readonly dictionaries: Readonly<Dictionaries>;
  private readonly districtEntry: RegExp;

  constructor(options: { config?: SynthesizerConfig; dictionaries?: DictionaryOverrides } = {}) {
    this.config = validateConfig(synthesizerConfigSchema, options.config ?? DEFAULT_ENGINE_CONFIG);
    this.dictionaries = loadDictionaries(options.dictionaries);
    this.districtEntry = new RegExp(`^(${districtAlternation(this.dictionaries.districts)})(?:[\\s:·\\-]+(.*))?$`);
  }

  /**
   * Build the mobile layout. The returned record is deeply frozen.
   */
  synthesize(
    objects: readonly ClassifiedObject[],
    cards: readonly Card[],
    pageTypes: Readonly<Record<number, PageType>> = {}
  ): MobileLayout {
    const pledgeCards = this.buildPledgeCards(cards);

    return deepFreeze<MobileLayout>({
      hero: this.buildHero(objects),
      quickHighlights: this.pickHighlights(pledgeCards),
      pledgeCards,
      timelineItems: this.collectTimeline(objects),
      achievements: this.collectAchievements(objects),
      contactSection: this.collectContacts(objects),
      districtPledges: this.collectDistricts(objects),
      pageTypes: { ...pageTypes },
    });
  }

  // ── Hero ───────────────────────────────────────────────────

  buildHero(objects: readonly ClassifiedObject[]): HeroSection {
    const hero: HeroSection = {};

    const candidate = this.findCandidate(objects);
    if (candidate !== undefined) hero.candidate = candidate;

    const { minLength, maxLength } = this.config.slogan;
    const slogan = objects.find(
      (o) => o.type === "slogan" && o.content.length >= minLength && o.content.length <= maxLength && o.content.includes("!")
    );
    if (slogan) hero.slogan = slogan.content;

    const party = this.findParty(objects);
    if (party !== undefined) hero.party = party;

    return hero;
  }

  /** Known-name literal match anywhere wins over the first pattern match */
  findCandidate(objects: readonly ClassifiedObject[]): string | undefined {
    const known = objects.find((o) => this.dictionaries.knownNames.includes(o.content));
    if (known) return known.content;

    const byPattern = objects.find(
      (o) =>
        NAME_TYPES.has(o.type) &&
        HANGUL_NAME.test(o.content) &&
        !this.dictionaries.nameExclusions.includes(o.content) &&
        this.dictionaries.nameInitials.includes(o.content.charAt(0))
    );
    return byPattern?.content;
  }

  findParty(objects: readonly ClassifiedObject[]): string | undefined {
    for (const obj of objects) {
      const party = this.dictionaries.partyNames.find((name) => obj.content.includes(name));
      if (party !== undefined) return party;
    }
    return undefined;
  }

  // ── Pledges ────────────────────────────────────────────────

  buildPledgeCards(cards: readonly Card[]): PledgeCard[] {
    const seen = new Set<string>();
    const pledges: PledgeCard[] = [];

    for (const card of cards) {
      const title = card.header.content;
      if (card.category === "general") continue;
      if (title.length < this.config.minPledgeTitleLength) continue;
      if (this.dictionaries.pledgeExclusionKeywords.some((kw) => title.includes(kw))) continue;
      if (seen.has(title)) continue;
      seen.add(title);

      pledges.push({
        number: pledges.length + 1,
        title,
        category: card.category,
        details: card.content.map((c) => c.content).filter((text) => text.length > 0),
        page: card.header.boundingBox.page,
      });
    }

    return pledges;
  }

  /** Highlight-keyword pledges first, then the rest, capped */
  pickHighlights(pledges: readonly PledgeCard[]): PledgeCard[] {
    const keywords = this.dictionaries.highlightKeywords;
    const highlighted = pledges.filter((p) => keywords.some((kw) => p.title.includes(kw)));
    const others = pledges.filter((p) => !keywords.some((kw) => p.title.includes(kw)));
    return [...highlighted, ...others].slice(0, this.config.maxHighlights).map((p) => ({ ...p, details: [...p.details] }));
  }

  // ── Other sections ─────────────────────────────────────────

  collectTimeline(objects: readonly ClassifiedObject[]): TimelineItem[] {
    return objects
      .filter((o) => o.type === "timeline")
      .map((o) => {
        const match = TIMELINE_ENTRY.exec(o.content);
        return match ? { year: match[1], content: match[2].trim() } : { year: "", content: o.content };
      });
  }

  collectAchievements(objects: readonly ClassifiedObject[]): AchievementItem[] {
    return objects
      .filter((o) => o.type === "achievement")
      .map((o) => ({ content: o.content, page: o.boundingBox.page }));
  }

  collectContacts(objects: readonly ClassifiedObject[]): ContactItem[] {
    return objects
      .filter((o) => o.type === "contact" || o.type === "sns")
      .map((o): ContactItem => {
        if (o.type === "sns") return { kind: "sns", value: o.content };
        if (EMAIL.test(o.content)) return { kind: "email", value: o.content };
        if (PHONE.test(o.content)) return { kind: "phone", value: o.content };
        return { kind: "other", value: o.content };
      });
  }

  collectDistricts(objects: readonly ClassifiedObject[]): Record<string, string[]> {
    const districts: Record<string, string[]> = {};

    for (const obj of objects) {
      if (obj.type !== "district-info") continue;
      const match = this.districtEntry.exec(obj.content);
      if (!match || !match[1]) continue;

      const entries = districts[match[1]] ?? [];
      const detail = (match[2] ?? "").trim();
      if (detail) entries.push(detail);
      districts[match[1]] = entries;
    }

    return districts;
  }
}
