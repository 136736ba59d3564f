// ─────────────────────────────────────────────────────────────
// Layout Pipeline — end-to-end runs over a small brochure
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { ClassifiedObject, CorrectionSample, TextFragment } from "../schema/layoutSchema";
import { createLayoutPipeline, documentReadingOrder } from "../transform/layoutPipeline";
import { makeObject } from "./helpers";

const brochure: TextFragment[] = [
  // page 1: cover
  { id: "f1", text: "이재명", style: { fontSize: 32, fontStyle: "bold" }, boundingBox: { x: 50, y: 60, page: 1 } },
  { id: "f2", text: "더불어민주당", boundingBox: { x: 50, y: 110, page: 1 } },
  { id: "f3", text: "함께 만드는 미래!", style: { fontSize: 20, fontStyle: "bold" }, boundingBox: { x: 50, y: 200, page: 1 } },
  // page 2: pledges
  { id: "f4", text: "교육특구 지정 추진", style: { fontSize: 18, fontStyle: "bold" }, boundingBox: { x: 50, y: 100, page: 2 } },
  { id: "f5", text: "영재 교실 운영 확충 계획", boundingBox: { x: 50, y: 140, page: 2 } },
  { id: "f6", text: "교통 환승센터 건립", style: { fontSize: 18, fontStyle: "bold" }, boundingBox: { x: 50, y: 300, page: 2 } },
  { id: "f7", text: "버스 노선 다변화 검토", boundingBox: { x: 50, y: 340, page: 2 } },
  // page 3: contact
  { id: "f8", text: "연락처 안내", boundingBox: { x: 50, y: 100, page: 3 } },
  { id: "f9", text: "TEL 02-123-4567", boundingBox: { x: 50, y: 130, page: 3 } },
  { id: "f10", text: "test@example.com", boundingBox: { x: 50, y: 160, page: 3 } },
];

describe("LayoutPipeline.run", () => {
  const pipeline = createLayoutPipeline();
  const result = pipeline.run(brochure);

  it("classifies every fragment in input order", () => {
    assert.deepEqual(
      result.objects.map((o) => [o.id, o.type]),
      [
        ["f1", "candidate-name"],
        ["f2", "party-info"],
        ["f3", "slogan"],
        ["f4", "promise-title"],
        ["f5", "paragraph"],
        ["f6", "promise-title"],
        ["f7", "paragraph"],
        ["f8", "paragraph"],
        ["f9", "contact"],
        ["f10", "contact"],
      ]
    );
  });

  it("attaches group ids from the page layouts", () => {
    assert.deepEqual(
      result.objects.map((o) => o.groupId),
      ["p1-g1", "p1-g2", "p1-g3", "p2-g1", "p2-g2", "p2-g3", "p2-g4", "p3-g1", "p3-g1", "p3-g1"]
    );
  });

  it("infers page types", () => {
    assert.deepEqual(result.analysis.documentStructure.pageTypes, { 1: "cover", 2: "pledge", 3: "contact" });
  });

  it("detects categorized cards", () => {
    assert.deepEqual(
      result.cards.map((c) => [c.header.id, c.content.map((o) => o.id), c.category]),
      [
        ["f4", ["f5"], "education"],
        ["f6", ["f7"], "transport"],
      ]
    );
  });

  it("synthesizes the mobile layout", () => {
    const { layout } = result;
    assert.deepEqual(layout.hero, { candidate: "이재명", slogan: "함께 만드는 미래!", party: "더불어민주당" });
    assert.deepEqual(layout.pledgeCards, [
      { number: 1, title: "교육특구 지정 추진", category: "education", details: ["영재 교실 운영 확충 계획"], page: 2 },
      { number: 2, title: "교통 환승센터 건립", category: "transport", details: ["버스 노선 다변화 검토"], page: 2 },
    ]);
    assert.deepEqual(
      layout.quickHighlights.map((p) => p.number),
      [1, 2]
    );
    assert.deepEqual(layout.contactSection, [
      { kind: "phone", value: "TEL 02-123-4567" },
      { kind: "email", value: "test@example.com" },
    ]);
    assert.deepEqual(layout.pageTypes, { 1: "cover", 2: "pledge", 3: "contact" });
  });

  it("is deterministic and leaves the input untouched", () => {
    const snapshot = JSON.stringify(brochure);
    const again = pipeline.run(brochure);
    assert.deepEqual(again, result);
    assert.equal(JSON.stringify(brochure), snapshot);
  });

  it("handles an empty document", () => {
    const empty = pipeline.run([]);
    assert.deepEqual(empty.objects, []);
    assert.deepEqual(empty.cards, []);
    assert.equal(empty.analysis.documentStructure.pageCount, 1);
    assert.deepEqual(empty.analysis.pages[1].groups, []);
    assert.deepEqual(empty.layout.hero, {});
  });

  it("rejects repeated fragment ids", () => {
    assert.throws(
      () =>
        pipeline.run([
          { id: "x", text: "교육특구 지정 추진", boundingBox: { y: 0 } },
          { id: "x", text: "도서관 확충 계획", boundingBox: { y: 500 } },
        ]),
      /Duplicate fragment id "x" at index 1/
    );
  });

  it("accepts page heights per page", () => {
    const fragments: TextFragment[] = [
      { id: "a", text: "안내 문구", style: { fontSize: 8 }, boundingBox: { y: 800, page: 1 } },
      { id: "b", text: "안내 문구", style: { fontSize: 8 }, boundingBox: { y: 800, page: 2 } },
    ];
    const run = pipeline.run(fragments, { pageHeight: { 2: 5000 } });
    assert.deepEqual(
      run.objects.map((o) => o.ruleName),
      ["footer", "header"]
    );
    assert.throws(() => pipeline.run(fragments, { pageHeight: { 2: 0 } }), /Invalid page height for page 2: 0/);
  });

  it("keeps district pledges to the listed neighbourhoods", () => {
    const { objects, layout } = pipeline.run([
      { text: "사당1동: 공원 조성", boundingBox: { y: 100 } },
      { text: "아동 돌봄센터 확대 추진", boundingBox: { y: 200 } },
      { text: "노동 상담소 설립 지원", boundingBox: { y: 300 } },
    ]);
    assert.deepEqual(
      objects.map((o) => o.type),
      ["district-info", "pledge", "pledge"]
    );
    assert.deepEqual(layout.districtPledges, { "사당1동": ["공원 조성"] });
  });

  it("rejects documents above the fragment limit", () => {
    const small = createLayoutPipeline({ config: { maxFragmentsPerDocument: 2 } });
    assert.throws(() => small.run(brochure.slice(0, 3)), /Document has 3 fragments; the limit is 2/);
  });
});

describe("LayoutPipeline options", () => {
  it("validates configuration at construction", () => {
    assert.throws(() => createLayoutPipeline({ config: { groupThreshold: -1 } }), /Invalid engine configuration/);
    assert.throws(() => createLayoutPipeline({ dictionaries: { partyNames: [] } }), /Invalid dictionaries/);
  });

  it("uses dictionary overrides in synthesis", () => {
    const custom = createLayoutPipeline({ dictionaries: { knownNames: ["홍길동"] } });
    const { layout } = custom.run([{ text: "홍길동" }, { text: "이재명" }]);
    assert.equal(layout.hero.candidate, "홍길동");
  });

  it("classifies districts from an overridden list", () => {
    const custom = createLayoutPipeline({ dictionaries: { districts: ["역삼1동"] } });
    const { objects, layout } = custom.run([{ text: "역삼1동: 공원 조성" }, { text: "사당1동: 도서관 신설" }]);
    assert.deepEqual(
      objects.map((o) => o.type),
      ["district-info", "achievement"]
    );
    assert.deepEqual(layout.districtPledges, { "역삼1동": ["공원 조성"] });
  });

  it("forwards corrections to the sink", () => {
    const received: Readonly<CorrectionSample>[] = [];
    const pipeline = createLayoutPipeline({ correctionSink: (sample) => received.push(sample) });
    pipeline.classifier.recordCorrection("paragraph", "vision", "더 나은 내일");
    assert.equal(received.length, 1);
    assert.equal(received[0].correctedType, "vision");
  });
});

describe("documentReadingOrder", () => {
  it("concatenates pages in numeric order", () => {
    const a: ClassifiedObject = makeObject("a", { page: 10 });
    const b: ClassifiedObject = makeObject("b", { page: 2 });
    const order = documentReadingOrder({ 10: { readingOrder: [a] }, 2: { readingOrder: [b] } });
    assert.deepEqual(
      order.map((o) => o.id),
      ["b", "a"]
    );
  });
});
