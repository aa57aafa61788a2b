/**
 * Aggregates coercion warnings into per-field counts
 */

import type { CoercionWarning, DatasetName } from "../../types/data-model.js";
import type { CoercionLogSink, CoercionSummary } from "./types.js";

export const DEFAULT_SAMPLES_PER_FIELD = 5;

export class CoercionLog implements CoercionLogSink {
  private counts = new Map<string, number>();
  private samples = new Map<string, CoercionWarning[]>();
  private total = 0;

  constructor(
    private readonly dataset: DatasetName,
    private readonly samplesPerField = DEFAULT_SAMPLES_PER_FIELD,
  ) {}

  record(warning: CoercionWarning): void {
    this.total++;
    this.counts.set(warning.field, (this.counts.get(warning.field) ?? 0) + 1);

    const fieldSamples = this.samples.get(warning.field) ?? [];
    if (fieldSamples.length < this.samplesPerField) {
      fieldSamples.push(warning);
      this.samples.set(warning.field, fieldSamples);
    }
  }

  get size(): number {
    return this.total;
  }

  countFor(field: string): number {
    return this.counts.get(field) ?? 0;
  }

  summarize(): CoercionSummary {
    return {
      dataset: this.dataset,
      total: this.total,
      byField: Object.fromEntries(this.counts),
      samples: Object.fromEntries(this.samples),
    };
  }
}
