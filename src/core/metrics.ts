/**
 * Metrics — counters, gauges and histograms kept per bus context.
 */

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  gauges: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { count: number; sum: number; max: number; tags?: Tags }[]>;
  collectedAt: string;
}

interface ValueEntry {
  value: number;
  tags?: Tags;
}

interface HistogramEntry {
  values: number[];
  tags?: Tags;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function slot<V>(store: Map<string, Map<string, V>>, name: string): Map<string, V> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, ValueEntry>>();
  private gauges = new Map<string, Map<string, ValueEntry>>();
  private histograms = new Map<string, Map<string, HistogramEntry>>();

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = slot(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
  }

  gauge(name: string, value: number, tags?: Tags): void {
    slot(this.gauges, name).set(tagsKey(tags), { value, tags });
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = slot(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      byTags.set(key, { values: [value], tags });
    }
  }

  /** Sum across all tag combinations, or the value for exactly `tags`. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getGauge(name: string, tags?: Tags): number | undefined {
    return this.gauges.get(name)?.get(tagsKey(tags))?.value;
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values(), e => ({ ...e }));
    }

    const gauges: MetricsSnapshot['gauges'] = {};
    for (const [name, byTags] of this.gauges) {
      gauges[name] = Array.from(byTags.values(), e => ({ ...e }));
    }

    // Histograms are summarised; raw samples stay internal.
    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) {
      histograms[name] = Array.from(byTags.values(), e => ({
        count: e.values.length,
        sum: e.values.reduce((a, b) => a + b, 0),
        max: Math.max(...e.values),
        tags: e.tags,
      }));
    }

    return { counters, gauges, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}
