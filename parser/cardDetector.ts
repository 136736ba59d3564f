// ─────────────────────────────────────────────────────────────
// Card Detector — Sequential card segmentation
// ─────────────────────────────────────────────────────────────

import { CARD_CATEGORIES, Card, CardCategory, ClassifiedObject, ObjectType } from "../schema/layoutSchema";
import { DEFAULT_ENGINE_CONFIG, EngineConfig, cardConfigSchema, validateConfig } from "../config/engineConfig";
import { Dictionaries, DictionaryOverrides, loadDictionaries } from "../config/dictionaries";

type CardConfig = Pick<EngineConfig, "cardOpeningTypes" | "cardSpanThreshold">;

export class CardDetector {
  private readonly openingTypes: ReadonlySet<ObjectType>;
  private readonly spanThreshold: number;
  private readonly categoryKeywords: Dictionaries["categoryKeywords"];

  constructor(options: { config?: CardConfig; dictionaries?: DictionaryOverrides } = {}) {
    const config = validateConfig(cardConfigSchema, options.config ?? DEFAULT_ENGINE_CONFIG);
    this.openingTypes = new Set(config.cardOpeningTypes);
    this.spanThreshold = config.cardSpanThreshold;
    this.categoryKeywords = loadDictionaries(options.dictionaries).categoryKeywords;
  }

  isOpening(obj: ClassifiedObject): boolean {
    return this.openingTypes.has(obj.type);
  }

  /**
   * Walk a reading-ordered sequence and cut it into cards.
   *
   * A card runs from an opening object until the next opening object,
   * a page change, or an object further than the span threshold from
   * the opener. Objects after a span break wait for the next opener.
   */
  detectCards(objects: readonly ClassifiedObject[]): Card[] {
    const cards: Card[] = [];
    let i = 0;

    while (i < objects.length) {
      const header = objects[i];
      if (!this.isOpening(header)) {
        i++;
        continue;
      }

      const content: ClassifiedObject[] = [];
      let j = i + 1;
      while (j < objects.length) {
        const next = objects[j];
        if (this.isOpening(next)) break;
        if (next.boundingBox.page !== header.boundingBox.page) break;
        if (Math.abs(next.boundingBox.y - header.boundingBox.y) > this.spanThreshold) break;
        content.push(next);
        j++;
      }

      cards.push({
        id: `card-${cards.length + 1}`,
        header,
        content,
        category: this.categorize(header.content),
        boundingBox: header.boundingBox,
      });
      i = j;
    }

    return cards;
  }

  /** First category whose keyword list hits the text */
  categorize(text: string): CardCategory {
    const normalized = text.toLowerCase();
    for (const category of CARD_CATEGORIES) {
      if (this.categoryKeywords[category].some((kw) => normalized.includes(kw.toLowerCase()))) {
        return category;
      }
    }
    return "general";
  }
}
