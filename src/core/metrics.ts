export type MetricTags = Record<string, string>;

export interface Metrics {
  increment(name: string, value?: number, tags?: MetricTags): void;
}

/** Series key in the `name{k="v",...}` form, tags sorted by key. */
export const seriesKey = (name: string, tags?: MetricTags): string => {
  const pairs = Object.entries(tags ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`);
  return pairs.length > 0 ? `${name}{${pairs.join(',')}}` : name;
};

export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>();

  increment(name: string, value = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters.entries());
  }
}
