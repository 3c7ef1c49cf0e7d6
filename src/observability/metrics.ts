type GaugeMetricName =
  | 'mosmix_refresh_ok'
  | 'mosmix_refresh_consecutive_failures'
  | 'mosmix_db_up'
  | 'mosmix_snapshot_observations'
  | 'mosmix_snapshot_excluded'
  | 'mosmix_snapshot_published_timestamp_seconds';

type CounterMetricName =
  | 'mosmix_refresh_total'
  | 'mosmix_sink_error_total'
  | 'mosmix_db_error_total';

type HistogramMetricName = 'mosmix_refresh_duration_seconds' | 'mosmix_sink_write_duration_seconds';

type MetricDef = { help: string; type: 'gauge' | 'counter' | 'histogram' };
const metricDefs: Record<GaugeMetricName | CounterMetricName | HistogramMetricName, MetricDef> = {
  mosmix_refresh_ok: { help: 'Refresh loop status (1=healthy,0=error/stalled)', type: 'gauge' },
  mosmix_refresh_consecutive_failures: {
    help: 'Number of failed refresh attempts since the last success',
    type: 'gauge',
  },
  mosmix_db_up: { help: 'Database connectivity (1=healthy,0=down)', type: 'gauge' },
  mosmix_snapshot_observations: {
    help: 'Observations in the currently published snapshot',
    type: 'gauge',
  },
  mosmix_snapshot_excluded: {
    help: 'Axis timestamps dropped from the current snapshot for missing values',
    type: 'gauge',
  },
  mosmix_snapshot_published_timestamp_seconds: {
    help: 'Unix time the current snapshot was published',
    type: 'gauge',
  },
  mosmix_refresh_total: {
    help: 'Refresh attempts grouped by outcome (published|unchanged|fetch_failed|parse_failed)',
    type: 'counter',
  },
  mosmix_sink_error_total: { help: 'Sink write failures grouped by sink', type: 'counter' },
  mosmix_db_error_total: { help: 'Total DB errors grouped by operation', type: 'counter' },
  mosmix_refresh_duration_seconds: {
    help: 'Duration of one fetch/parse/publish attempt (seconds)',
    type: 'histogram',
  },
  mosmix_sink_write_duration_seconds: {
    help: 'Duration of a sink write (seconds)',
    type: 'histogram',
  },
};

const gaugeValues: Record<GaugeMetricName, number> = {
  mosmix_refresh_ok: 0,
  mosmix_refresh_consecutive_failures: 0,
  mosmix_db_up: 0,
  mosmix_snapshot_observations: 0,
  mosmix_snapshot_excluded: 0,
  mosmix_snapshot_published_timestamp_seconds: 0,
};

const labeledCounters: Record<CounterMetricName, Map<string, number>> = {
  mosmix_refresh_total: new Map(),
  mosmix_sink_error_total: new Map(),
  mosmix_db_error_total: new Map(),
};

const histogramBucketsSeconds = [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60];

type HistogramStore = { buckets: number[]; counts: number[]; sum: number; count: number };

const histograms: Record<HistogramMetricName, { buckets: number[]; data: Map<string, HistogramStore> }> = {
  mosmix_refresh_duration_seconds: {
    buckets: histogramBucketsSeconds,
    data: new Map(),
  },
  mosmix_sink_write_duration_seconds: {
    buckets: histogramBucketsSeconds,
    data: new Map(),
  },
};

function renderLabeledCounters(name: CounterMetricName): string[] {
  const lines: string[] = [];
  labeledCounters[name].forEach((value, labelKey) => {
    lines.push(`${name}${labelKey} ${value}`);
  });
  return lines;
}

function renderHistograms(name: HistogramMetricName): string[] {
  const lines: string[] = [];
  const hist = histograms[name];
  hist.data.forEach((store, labelKey) => {
    let cumulative = 0;
    store.buckets.forEach((bucket, idx) => {
      cumulative += store.counts[idx];
      const labels = labelKey ? `${labelKey.slice(0, -1)},le="${bucket}"}` : `{le="${bucket}"}`;
      lines.push(`${name}_bucket${labels} ${cumulative}`);
    });
    const labels = labelKey ? `${labelKey.slice(0, -1)},le="+Inf"}` : '{le="+Inf"}';
    lines.push(`${name}_bucket${labels} ${store.count}`);
    lines.push(`${name}_sum${labelKey} ${store.sum}`);
    lines.push(`${name}_count${labelKey} ${store.count}`);
  });
  if (hist.data.size === 0) {
    hist.buckets.forEach((bucket) => {
      lines.push(`${name}_bucket{le="${bucket}"} 0`);
    });
    lines.push(`${name}_bucket{le="+Inf"} 0`);
    lines.push(`${name}_sum 0`);
    lines.push(`${name}_count 0`);
  }
  return lines;
}

export function metricsContentType(): string {
  return 'text/plain; version=0.0.4';
}

export function renderPrometheus(): string {
  const lines: string[] = [];
  (Object.keys(metricDefs) as (GaugeMetricName | CounterMetricName | HistogramMetricName)[]).forEach((name) => {
    const def = metricDefs[name];
    lines.push(`# HELP ${name} ${def.help}`);
    lines.push(`# TYPE ${name} ${def.type}`);
    if (isGauge(name)) {
      lines.push(`${name} ${gaugeValues[name]}`);
    } else if (isCounter(name)) {
      lines.push(...renderLabeledCounters(name));
    } else {
      lines.push(...renderHistograms(name));
    }
  });
  return lines.join('\n') + '\n';
}

function isGauge(name: string): name is GaugeMetricName {
  return name in gaugeValues;
}

function isCounter(name: string): name is CounterMetricName {
  return name in labeledCounters;
}

function labelsToKey(labels: Record<string, string | number>): string {
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${labels[k]}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

export function setGaugeValue(name: GaugeMetricName, value: number) {
  gaugeValues[name] = value;
}

export function incrementCounter(
  name: CounterMetricName,
  labels: Record<string, string | number> = {},
  amount = 1,
): void {
  const key = labelsToKey(labels);
  const current = labeledCounters[name].get(key) ?? 0;
  labeledCounters[name].set(key, current + amount);
}

export function observeHistogram(
  name: HistogramMetricName,
  value: number,
  labels: Record<string, string | number> = {},
): void {
  const hist = histograms[name];
  const key = labelsToKey(labels);
  const store: HistogramStore = hist.data.get(key) ?? {
    buckets: [...hist.buckets],
    counts: hist.buckets.map(() => 0),
    sum: 0,
    count: 0,
  };
  hist.data.set(key, store);

  store.count += 1;
  store.sum += value;
  // Per-bucket counts; the renderer accumulates them.
  const idx = store.buckets.findIndex((bucket) => value <= bucket);
  if (idx >= 0) {
    store.counts[idx] += 1;
  }
}

export function resetMetricsForTest(): void {
  (Object.keys(gaugeValues) as GaugeMetricName[]).forEach((name) => {
    gaugeValues[name] = 0;
  });

  (Object.keys(labeledCounters) as CounterMetricName[]).forEach((name) =>
    labeledCounters[name].clear(),
  );

  (Object.keys(histograms) as HistogramMetricName[]).forEach((name) => {
    histograms[name].data.clear();
  });
}
