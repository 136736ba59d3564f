// ─────────────────────────────────────────────────────────────
// Correction Log — Append-only telemetry of user corrections
//
// Samples are kept for offline analysis only. Nothing here feeds
// back into classification.
// ─────────────────────────────────────────────────────────────

import { CorrectionSample, ObjectType, TextStyle } from "../schema/layoutSchema";

/** Receives every sample; use one that is safe for concurrent writers */
export type CorrectionSink = (sample: Readonly<CorrectionSample>) => void;

const TEXT_SAMPLE_LENGTH = 200;

export class CorrectionLog {
  private readonly samples: Readonly<CorrectionSample>[] = [];
  private readonly sink?: CorrectionSink;
  private readonly clock: () => Date;

  constructor(options: { sink?: CorrectionSink; clock?: () => Date } = {}) {
    this.sink = options.sink;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Append a correction sample */
  append(
    originalType: ObjectType,
    correctedType: ObjectType,
    text: string,
    style?: Partial<TextStyle>
  ): Readonly<CorrectionSample> {
    const sample: Readonly<CorrectionSample> = Object.freeze({
      originalType,
      correctedType,
      textSample: text.slice(0, TEXT_SAMPLE_LENGTH),
      textLength: text.length,
      style: style ? { ...style } : null,
      recordedAt: this.clock().toISOString(),
    });

    this.samples.push(sample);
    this.sink?.(sample);
    console.log(`[CLASSIFIER] Correction ${originalType} → ${correctedType}: ${text.slice(0, 50)}`);

    return sample;
  }

  get size(): number {
    return this.samples.length;
  }

  /** Snapshot of all samples, oldest first */
  entries(): Readonly<CorrectionSample>[] {
    return [...this.samples];
  }

  /** Samples grouped by the corrected type */
  byCorrectedType(): Partial<Record<ObjectType, Readonly<CorrectionSample>[]>> {
    const grouped: Partial<Record<ObjectType, Readonly<CorrectionSample>[]>> = {};
    for (const sample of this.samples) {
      const bucket = grouped[sample.correctedType] ?? [];
      bucket.push(sample);
      grouped[sample.correctedType] = bucket;
    }
    return grouped;
  }
}
