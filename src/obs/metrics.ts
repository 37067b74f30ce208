type CounterName =
  | "link_preview_cache_hit"
  | "link_preview_cache_miss"
  | "link_preview_success"
  | "link_preview_fail";
type GaugeName = "link_preview_cache_entries";

const counters: Record<CounterName, number> = {
  link_preview_cache_hit: 0,
  link_preview_cache_miss: 0,
  link_preview_success: 0,
  link_preview_fail: 0,
};

const gauges: Record<GaugeName, number> = {
  link_preview_cache_entries: 0,
};

export function incCounter(name: CounterName, by: number = 1) {
  counters[name] = (counters[name] ?? 0) + by;
}

export function setGauge(name: GaugeName, value: number) {
  gauges[name] = value;
}

export function getMetricsSnapshot() {
  return {
    counters: { ...counters },
    gauges: { ...gauges },
    ts: Date.now(),
  };
}
