// ---------------------------------------------------------------------------
// Benchmark Aggregator
// ---------------------------------------------------------------------------
// Collects per-instance benchmark documents by group and merges them into one
// document per group:
//   - records are ordered by job (in the order given), then instance index,
//     then arrival
//   - the first payload is the base document
//   - every key that holds an array in any record becomes the concatenation
//     of those arrays, in record order
//   - a declared group with no records merges to null
// ---------------------------------------------------------------------------

import type { BenchmarkPayload, BenchmarkRecord } from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class BenchmarkAggregator {
  private readonly groups = new Map<string, BenchmarkRecord[]>();
  private readonly jobRank: Map<string, number>;

  /** `jobOrder` ranks records of different jobs; unlisted jobs sort last. */
  constructor(jobOrder: readonly string[] = []) {
    this.jobRank = new Map(jobOrder.map((jobId, rank) => [jobId, rank]));
  }

  private rankOf(record: BenchmarkRecord): number {
    return this.jobRank.get(record.jobId) ?? this.jobRank.size;
  }

  /** Make a group known so it is reported even when no instance produced data. */
  declare(group: string): void {
    if (!this.groups.has(group)) {
      this.groups.set(group, []);
    }
  }

  add(record: BenchmarkRecord): void {
    if (!isPlainObject(record.payload)) {
      throw new TypeError(`Benchmark payload for group "${record.group}" must be a JSON object`);
    }
    this.declare(record.group);
    this.groups.get(record.group)?.push({ ...record, payload: structuredClone(record.payload) });
  }

  /** Declared group names in declaration order. */
  listGroups(): string[] {
    return [...this.groups.keys()];
  }

  records(group: string): BenchmarkRecord[] {
    // Array.prototype.sort is stable, so equal keys keep arrival order.
    return [...(this.groups.get(group) ?? [])].sort(
      (a, b) => this.rankOf(a) - this.rankOf(b) || a.instanceIndex - b.instanceIndex,
    );
  }

  merge(group: string): BenchmarkPayload | null {
    const records = this.records(group);
    if (records.length === 0) {
      return null;
    }

    const merged: BenchmarkPayload = structuredClone(records[0].payload);
    const arrayKeys = new Set<string>();
    for (const record of records) {
      for (const [key, value] of Object.entries(record.payload)) {
        if (Array.isArray(value)) {
          arrayKeys.add(key);
        }
      }
    }

    for (const key of arrayKeys) {
      const combined: unknown[] = [];
      for (const record of records) {
        const value = record.payload[key];
        if (Array.isArray(value)) {
          combined.push(...structuredClone(value));
        }
      }
      merged[key] = combined;
    }

    return merged;
  }

  mergeAll(): Record<string, BenchmarkPayload | null> {
    const out: Record<string, BenchmarkPayload | null> = {};
    for (const group of this.listGroups()) {
      out[group] = this.merge(group);
    }
    return out;
  }
}
