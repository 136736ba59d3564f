// ─────────────────────────────────────────────────────────────
// HTML Hints — Default markup suggestion per object type
// ─────────────────────────────────────────────────────────────

import { HtmlHint, ObjectType } from "../schema/layoutSchema";

const HTML_HINTS: Record<ObjectType, HtmlHint> = {
  "main-title": { tag: "h2", className: "main-title" },
  "section-title": { tag: "h3", className: "section-title" },
  "sub-title": { tag: "h4", className: "sub-title" },
  paragraph: { tag: "p", className: "paragraph" },
  quote: { tag: "blockquote", className: "quote" },
  caption: { tag: "figcaption", className: "caption" },
  "bullet-list": { tag: "ul", className: "bullet-list" },
  "numbered-list": { tag: "ol", className: "numbered-list" },
  card: { tag: "div", className: "card" },
  timeline: { tag: "div", className: "timeline-item" },
  table: { tag: "table", className: "data-table" },
  box: { tag: "div", className: "box" },
  image: { tag: "figure", className: "image-container" },
  photo: { tag: "figure", className: "photo" },
  chart: { tag: "figure", className: "chart" },
  logo: { tag: "img", className: "logo" },
  icon: { tag: "span", className: "icon" },
  signature: { tag: "div", className: "signature-section" },
  header: { tag: "header", className: "page-header" },
  footer: { tag: "footer", className: "page-footer" },
  "page-number": { tag: "span", className: "page-number" },
  contact: { tag: "address", className: "contact-info" },
  sns: { tag: "a", className: "sns-link" },
  "candidate-name": { tag: "h1", className: "candidate-name" },
  "party-info": { tag: "div", className: "party" },
  slogan: { tag: "div", className: "slogan" },
  pledge: { tag: "div", className: "promise-card" },
  achievement: { tag: "li", className: "achievement" },
  "promise-number": { tag: "span", className: "promise-number" },
  "promise-title": { tag: "div", className: "promise-title" },
  "district-info": { tag: "div", className: "district" },
  profile: { tag: "section", className: "profile" },
  career: { tag: "li", className: "career-item" },
  vision: { tag: "div", className: "vision" },
};

/** Rendering hint for an object type (a fresh copy per call) */
export function htmlHintFor(type: ObjectType): HtmlHint {
  return { ...HTML_HINTS[type] };
}
