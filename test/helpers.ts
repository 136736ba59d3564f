// ─────────────────────────────────────────────────────────────
// Test helpers — Hand-built classified objects and cards
// ─────────────────────────────────────────────────────────────

import { Card, CardCategory, ClassifiedObject, ObjectType } from "../schema/layoutSchema";
import { htmlHintFor } from "../parser/htmlHints";

export function makeObject(
  id: string,
  fields: { type?: ObjectType; content?: string; x?: number; y?: number; page?: number; height?: number } = {}
): ClassifiedObject {
  const type = fields.type ?? "paragraph";
  return {
    id,
    type,
    confidence: 1,
    content: fields.content ?? "",
    boundingBox: { x: fields.x ?? 0, y: fields.y ?? 0, width: 100, height: fields.height ?? 10, page: fields.page ?? 1 },
    htmlHint: htmlHintFor(type),
    ruleName: null,
  };
}

export function makeCard(id: string, title: string, category: CardCategory, details: string[] = [], page = 1): Card {
  const header = makeObject(`${id}-h`, { type: "promise-title", content: title, page });
  return {
    id,
    header,
    content: details.map((text, i) => makeObject(`${id}-d${i}`, { content: text, page })),
    category,
    boundingBox: header.boundingBox,
  };
}
