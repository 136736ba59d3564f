// ─────────────────────────────────────────────────────────────
// Object Classifier — rule evaluation, selection and batch mode
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { ClassificationRule, CorrectionSample } from "../schema/layoutSchema";
import { ObjectClassifier, summarizeClassifications } from "../parser/objectClassifier";
import { DEFAULT_RULES, compileRules } from "../parser/ruleTable";
import { CorrectionLog } from "../parser/correctionLog";

const classifier = new ObjectClassifier();

function approx(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

describe("ObjectClassifier.classify", () => {
  it("classifies a large top-of-page name as candidate-name", () => {
    const result = classifier.classify("나경원", { fontSize: 30, fontStyle: "bold" }, { y: 50 });
    assert.deepEqual(result, { type: "candidate-name", confidence: 1, ruleName: "candidate_name" });
  });

  it("classifies a party name as party-info", () => {
    const result = classifier.classify("국민의힘");
    assert.equal(result.type, "party-info");
    assert.equal(result.ruleName, "party_info");
  });

  it("lets the numbered-list rule outrank the promise-number rule", () => {
    const result = classifier.classify("1. 교육특구 동작");
    assert.equal(result.type, "numbered-list");
    assert.equal(result.confidence, 1);

    const candidates = classifier.explain("1. 교육특구 동작").map((c) => c.ruleName);
    assert.equal(candidates[0], "numbered_list");
    assert.ok(candidates.includes("promise_number"));
  });

  it("classifies a category-led heading as promise-title", () => {
    assert.equal(classifier.classify("교육특구 동작").type, "promise-title");
  });

  it("recognizes listed districts and not words ending in 동", () => {
    assert.deepEqual(classifier.classify("사당1동: 공원 조성"), {
      type: "district-info",
      confidence: 1,
      ruleName: "district_info",
    });
    assert.equal(classifier.classify("아동 돌봄센터 확대 추진").type, "pledge");
    assert.equal(classifier.classify("노동 상담소 설립 지원").type, "pledge");
    assert.ok(!classifier.explain("활동 보고").some((c) => c.ruleName === "district_info"));
  });

  it("returns paragraph with zero confidence for blank text", () => {
    assert.deepEqual(classifier.classify("   "), { type: "paragraph", confidence: 0, ruleName: null });
  });

  it("falls back to paragraph at 0.5 when no rule survives", () => {
    const result = classifier.classify("The quick brown fox jumps over the lazy dog near the river bank");
    assert.deepEqual(result, { type: "paragraph", confidence: 0.5, ruleName: null });
  });

  it("resolves an unstyled short line through the style tier", () => {
    assert.deepEqual(classifier.classify("hello world"), { type: "paragraph", confidence: 1, ruleName: "body_text" });
  });

  it("uses font size and weight within the style tier", () => {
    assert.equal(classifier.classify("본문 내용입니다", { fontSize: 12, fontStyle: "regular" }).ruleName, "body_text");
    assert.equal(classifier.classify("주요 정책 안내", { fontSize: 16, fontStyle: "bold" }).type, "section-title");
  });

  it("never lets a rule with a failed content pattern survive", () => {
    const names = classifier.explain("교육특구 동작").map((c) => c.ruleName);
    assert.ok(!names.includes("candidate_name"));
    assert.ok(!names.includes("numbered_list"));
  });

  it("returns candidates in non-increasing priority order", () => {
    const candidates = classifier.explain("2018년 교육특구 지정 추진 완료", { fontSize: 12 }, { y: 400 });
    for (let i = 1; i < candidates.length; i++) {
      assert.ok(candidates[i - 1].priority >= candidates[i].priority);
    }
    assert.equal(classifier.classify("2018년 교육특구 지정 추진 완료").type, candidates[0].type);
  });

  it("is deterministic", () => {
    const style = { fontSize: 18, fontStyle: "bold" as const, color: "#2563EB" };
    const first = classifier.classify("주요 공약", style, { y: 300 });
    const second = classifier.classify("주요 공약", style, { y: 300 });
    assert.deepEqual(first, second);
  });

  it("keeps every confidence within [0, 1]", () => {
    for (const text of ["나경원", "1. 교육", "test@example.com", "가나다라마바사아자차카타파하 가나다라마바사아자차카타파하 가나다"]) {
      const { confidence } = classifier.classify(text, { fontSize: 40, fontStyle: "bold" }, { y: 10 });
      assert.ok(confidence >= 0 && confidence <= 1);
    }
  });
});

describe("rule conditions", () => {
  const colorRule: ClassificationRule = {
    name: "blue_heading",
    targetType: "section-title",
    priority: 50,
    colorPattern: "#0000FF",
    baseConfidence: 0.7,
  };

  it("hard-rejects a rule whose color pattern fails", () => {
    const custom = new ObjectClassifier({ rules: [colorRule] });
    assert.deepEqual(custom.classify("Hello", { color: "#FF0000" }), { type: "paragraph", confidence: 0.5, ruleName: null });
  });

  it("boosts a color match case-insensitively", () => {
    const custom = new ObjectClassifier({ rules: [colorRule] });
    const result = custom.classify("Hello", { color: "#0000ff" });
    assert.equal(result.type, "section-title");
    approx(result.confidence, 0.7 * 1.3);
  });

  it("skips a color condition when the style has no color", () => {
    const custom = new ObjectClassifier({ rules: [colorRule] });
    assert.equal(custom.classify("Hello", {}).confidence, 0.7);
  });

  it("treats a font size miss as a soft penalty", () => {
    const custom = new ObjectClassifier({
      rules: [{ name: "big", targetType: "main-title", priority: 5, minFontSize: 20, baseConfidence: 0.8 }],
    });
    assert.equal(custom.classify("x", { fontSize: 25 }).confidence, 0.8);
    approx(custom.classify("x", { fontSize: 10 }).confidence, 0.2);
  });

  it("rewards a font style match and penalizes a mismatch", () => {
    const custom = new ObjectClassifier({
      rules: [{ name: "bold", targetType: "sub-title", priority: 5, fontStyle: "bold", baseConfidence: 0.8 }],
    });
    approx(custom.classify("x", { fontStyle: "bold" }).confidence, 0.88);
    approx(custom.classify("x", { fontStyle: "italic" }).confidence, 0.28);
  });

  it("scores position bands against the page height", () => {
    const custom = new ObjectClassifier({
      rules: [{ name: "low", targetType: "footer", priority: 5, positionRule: "bottom", baseConfidence: 0.8 }],
    });
    approx(custom.classify("x", undefined, { y: 800 }).confidence, 0.88);
    approx(custom.classify("x", undefined, { y: 400 }).confidence, 0.4);
    approx(custom.classify("x", undefined, { y: 1800 }, 2000).confidence, 0.88);
  });

  it("breaks priority ties by confidence, then by declaration order", () => {
    const custom = new ObjectClassifier({
      rules: [
        { name: "first", targetType: "quote", priority: 5, baseConfidence: 0.6 },
        { name: "second", targetType: "caption", priority: 5, baseConfidence: 0.6 },
        { name: "third", targetType: "vision", priority: 5, baseConfidence: 0.7 },
      ],
    });
    assert.equal(custom.classify("x").ruleName, "third");
    assert.deepEqual(
      custom.explain("x").map((c) => c.ruleName),
      ["third", "first", "second"]
    );
  });
});

describe("ObjectClassifier construction", () => {
  it("rejects an invalid page height and unordered bands", () => {
    const positionBands = { top: 0.2, centerMin: 0.3, centerMax: 0.7, bottom: 0.8 };
    assert.throws(
      () => new ObjectClassifier({ config: { pageHeight: 0, positionBands } }),
      /Invalid engine configuration: pageHeight:/
    );
    assert.throws(
      () => new ObjectClassifier({ config: { pageHeight: 842, positionBands: { ...positionBands, top: 0.5 } } }),
      /Invalid engine configuration: positionBands: bands must satisfy top <= centerMin < centerMax <= bottom/
    );
  });
});

describe("compileRules", () => {
  it("accepts the default table", () => {
    assert.equal(compileRules(DEFAULT_RULES).length, DEFAULT_RULES.length);
    assert.equal(classifier.ruleCount, DEFAULT_RULES.length);
  });

  it("rejects an empty table", () => {
    assert.throws(() => new ObjectClassifier({ rules: [] }), /at least one rule is required/);
  });

  it("rejects duplicate names", () => {
    const rule: ClassificationRule = { name: "dup", targetType: "quote", priority: 1, baseConfidence: 0.5 };
    assert.throws(() => compileRules([rule, rule]), /duplicate rule name "dup"/);
  });

  it("rejects an invalid regular expression", () => {
    assert.throws(
      () => compileRules([{ name: "bad", targetType: "quote", priority: 1, contentPattern: "(", baseConfidence: 0.5 }]),
      /Invalid rule "bad": contentPattern is not a valid regular expression/
    );
  });

  it("rejects out-of-range confidence and inverted font bounds", () => {
    assert.throws(
      () => compileRules([{ name: "zero", targetType: "quote", priority: 1, baseConfidence: 0 }]),
      /Invalid rule "zero"/
    );
    assert.throws(
      () =>
        compileRules([
          { name: "inverted", targetType: "quote", priority: 1, minFontSize: 20, maxFontSize: 10, baseConfidence: 0.5 },
        ]),
      /minFontSize must not exceed maxFontSize/
    );
  });
});

describe("ObjectClassifier.classifyBatch", () => {
  const objects = classifier.classifyBatch([
    { text: " 나경원 ", style: { fontSize: 30 }, boundingBox: { x: 10, y: 40, page: 1 } },
    { text: "본문 내용" },
    { id: "custom-id", text: "국민의힘", boundingBox: { page: 2 } },
  ]);

  it("keeps input order and assigns positional ids", () => {
    assert.deepEqual(
      objects.map((o) => o.id),
      ["obj_0", "obj_1", "custom-id"]
    );
  });

  it("trims content and attaches the html hint", () => {
    assert.equal(objects[0].content, "나경원");
    assert.equal(objects[0].type, "candidate-name");
    assert.deepEqual(objects[0].htmlHint, { tag: "h1", className: "candidate-name" });
    assert.deepEqual(objects[1].htmlHint, { tag: "p", className: "paragraph" });
  });

  it("fills in style and box defaults", () => {
    assert.deepEqual(objects[0].style, {
      fontName: "Unknown",
      fontSize: 30,
      fontStyle: "regular",
      color: "#000000",
      alignment: "left",
    });
    assert.equal(objects[1].style, undefined);
    assert.deepEqual(objects[1].boundingBox, { x: 0, y: 0, width: 0, height: 0, page: 1 });
    assert.equal(objects[2].boundingBox.page, 2);
  });

  it("rejects repeated ids before classifying", () => {
    assert.throws(
      () =>
        classifier.classifyBatch([
          { id: "x", text: "교육특구 지정", boundingBox: { y: 0 } },
          { id: "x", text: "도서관 확충", boundingBox: { y: 500 } },
        ]),
      /Duplicate fragment id "x" at index 1/
    );
    assert.throws(
      () => classifier.classifyBatch([{ text: "첫째" }, { id: "obj_0", text: "둘째" }]),
      /Duplicate fragment id "obj_0" at index 1/
    );
  });

  it("uses per-page heights for position rules", () => {
    const custom = new ObjectClassifier({
      rules: [{ name: "low", targetType: "footer", priority: 5, positionRule: "bottom", baseConfidence: 0.8 }],
    });
    const [first, second, third] = custom.classifyBatch(
      [
        { text: "x", boundingBox: { y: 800, page: 1 } },
        { text: "x", boundingBox: { y: 800, page: 2 } },
        { text: "x", boundingBox: { y: 800, page: 3 } },
      ],
      { 2: 2000 }
    );
    approx(first.confidence, 0.88);
    approx(second.confidence, 0.4);
    approx(third.confidence, 0.88);
  });

  it("summarizes counts per type", () => {
    const summary = summarizeClassifications(objects);
    assert.equal(summary.total, 3);
    assert.deepEqual(summary.byType["candidate-name"], { count: 1, averageConfidence: 1 });
    assert.equal(summary.byType["party-info"]?.count, 1);
    assert.equal(summary.byType.paragraph?.count, 1);
    assert.deepEqual(summary.byFamily, { text: 1, domain: 2 });
  });
});

describe("corrections", () => {
  it("records samples without changing classification", () => {
    const received: Readonly<CorrectionSample>[] = [];
    const log = new CorrectionLog({ sink: (s) => received.push(s), clock: () => new Date("2024-05-01T00:00:00.000Z") });
    const custom = new ObjectClassifier({ correctionLog: log });

    const before = custom.classify("교육특구 동작");
    const sample = custom.recordCorrection("promise-title", "section-title", "교육특구 동작");
    const after = custom.classify("교육특구 동작");

    assert.deepEqual(before, after);
    assert.equal(log.size, 1);
    assert.equal(received.length, 1);
    assert.deepEqual(sample, {
      originalType: "promise-title",
      correctedType: "section-title",
      textSample: "교육특구 동작",
      textLength: 7,
      style: null,
      recordedAt: "2024-05-01T00:00:00.000Z",
    });
    assert.ok(Object.isFrozen(sample));
  });

  it("truncates long text samples and groups by corrected type", () => {
    const log = new CorrectionLog();
    log.append("paragraph", "quote", "가".repeat(250));
    log.append("paragraph", "quote", "나");
    log.append("paragraph", "caption", "다", { fontSize: 9 });

    const [first] = log.entries();
    assert.equal(first.textSample.length, 200);
    assert.equal(first.textLength, 250);
    assert.equal(log.byCorrectedType().quote?.length, 2);
    assert.deepEqual(log.byCorrectedType().caption?.[0].style, { fontSize: 9 });
  });
});
