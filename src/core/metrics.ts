/**
 * Metrics — in-process counters and histograms for engine decisions.
 */

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { values: number[]; tags?: Tags }[]>;
  collectedAt: string;
}

/** Adapter interface for external metrics systems (Prometheus, StatsD, etc.) */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
  onHistogram(name: string, value: number, tags?: Tags): void;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, { value: number; tags?: Tags }>>();
  private histograms = new Map<string, Map<string, { values: number[]; tags?: Tags }>>();
  private adapters: MetricsAdapter[] = [];

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = this.bucket(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = this.bucket(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      byTags.set(key, { values: [value], tags });
    }
    for (const a of this.adapters) a.onHistogram(name, value, tags);
  }

  /** Counter value for specific tags, or summed across all tag combinations */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return byTags.get(tagsKey(tags))?.values ?? [];
    return Array.from(byTags.values()).flatMap(e => e.values);
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) counters[name] = Array.from(byTags.values());
    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) histograms[name] = Array.from(byTags.values());
    return { counters, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private bucket<V>(store: Map<string, Map<string, V>>, name: string): Map<string, V> {
    let byTags = store.get(name);
    if (!byTags) {
      byTags = new Map();
      store.set(name, byTags);
    }
    return byTags;
  }
}
