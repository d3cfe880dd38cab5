export interface CategoryCount<T> {
  /** `null` is the shared bucket for absent values. */
  readonly value: T | null;
  readonly count: number;
}

/** Occurrence counts of an optional categorical field. Diagnostics only. */
export class CategoricalCounter<T> {
  private readonly buckets = new Map<string, { value: T; count: number }>();
  private noValue = 0;

  constructor(private readonly keyOf: (value: T) => string) {}

  static ofStrings(): CategoricalCounter<string> {
    return new CategoricalCounter<string>((value) => value);
  }

  /** Returns the bucket's new count. */
  increment(value: T | null | undefined): number {
    if (value === null || value === undefined) {
      this.noValue += 1;
      return this.noValue;
    }
    const key = this.keyOf(value);
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.count += 1;
      return bucket.count;
    }
    this.buckets.set(key, { value, count: 1 });
    return 1;
  }

  count(value: T | null | undefined): number {
    if (value === null || value === undefined) return this.noValue;
    return this.buckets.get(this.keyOf(value))?.count ?? 0;
  }

  get noValueCount(): number {
    return this.noValue;
  }

  get total(): number {
    let sum = this.noValue;
    for (const bucket of this.buckets.values()) sum += bucket.count;
    return sum;
  }

  /** Buckets by descending count; ties keep first-seen order, no-value first. */
  entries(): CategoryCount<T>[] {
    const all: CategoryCount<T>[] = [];
    if (this.noValue > 0) all.push({ value: null, count: this.noValue });
    for (const { value, count } of this.buckets.values()) all.push({ value, count });
    return all.sort((a, b) => b.count - a.count);
  }
}
