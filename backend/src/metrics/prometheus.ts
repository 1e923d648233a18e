type LabelKey = string;

function labelsKey(labels: Record<string, string | number | undefined>): LabelKey {
  const entries = Object.entries(labels)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`)
    .sort();
  return entries.join(',');
}

function renderLabels(key: LabelKey): string {
  if (!key) return '';
  return key
    .split(',')
    .map((p) => p.split('='))
    .map(([k, v]) => `${k}="${String(v).replace(/"/g, '\\"')}"`)
    .join(',');
}

function increment(counter: Map<LabelKey, number>, labels: Record<string, string | number | undefined>) {
  const key = labelsKey(labels);
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

const requestCounter = new Map<LabelKey, number>();

const durationBuckets = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000];
type Hist = { count: number; sum: number; buckets: number[] };
const requestHistogram = new Map<LabelKey, Hist>();

// Domain metrics: gate decisions, key set refreshes, propagated calls
const gateDecisionCounter = new Map<LabelKey, number>();
const keySetFetchCounter = new Map<LabelKey, number>();
const propagatedCallCounter = new Map<LabelKey, number>();

export function recordHttpRequest(labels: { method: string; route: string; status: number }, durationMs: number) {
  increment(requestCounter, { method: labels.method, route: labels.route, status: labels.status });

  const hKey = labelsKey({ method: labels.method, route: labels.route });
  const hist = requestHistogram.get(hKey) ?? { count: 0, sum: 0, buckets: Array<number>(durationBuckets.length).fill(0) };
  hist.count += 1;
  hist.sum += durationMs;
  for (let i = 0; i < durationBuckets.length; i++) {
    if (durationMs <= durationBuckets[i]) {
      hist.buckets[i] += 1;
      break;
    }
  }
  requestHistogram.set(hKey, hist);
}

export function recordGateDecision(labels: { outcome: 'authorized' | 'rejected' | 'public'; reason?: string }) {
  increment(gateDecisionCounter, { outcome: labels.outcome, reason: labels.reason });
}

export function recordKeySetFetch(labels: { result: 'ok' | 'error' | 'invalid' }) {
  increment(keySetFetchCounter, { result: labels.result });
}

export function recordPropagatedCall(labels: { service: string; result: 'ok' | 'error' | 'timeout' | 'cancelled'; authenticated: boolean }) {
  increment(propagatedCallCounter, {
    service: labels.service,
    result: labels.result,
    authenticated: labels.authenticated ? 'true' : 'false',
  });
}

function renderCounter(lines: string[], name: string, help: string, counter: Map<LabelKey, number>) {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} counter`);
  for (const [key, value] of counter.entries()) {
    lines.push(`${name}{${renderLabels(key)}} ${value}`);
  }
}

export function renderPrometheus(): string {
  const lines: string[] = [];
  renderCounter(lines, 'http_requests_total', 'Total number of HTTP requests', requestCounter);
  renderCounter(lines, 'auth_gate_decisions_total', 'Validation gate decisions by outcome and reason', gateDecisionCounter);
  renderCounter(lines, 'auth_key_set_fetches_total', 'Issuer key set fetches by result', keySetFetchCounter);
  renderCounter(lines, 'propagated_calls_total', 'Outbound service calls carrying the inbound bearer token', propagatedCallCounter);

  lines.push('# HELP http_request_duration_ms HTTP request duration in ms');
  lines.push('# TYPE http_request_duration_ms histogram');
  for (const [key, hist] of requestHistogram.entries()) {
    const baseLbl = renderLabels(key);
    let cumulative = 0;
    for (let i = 0; i < durationBuckets.length; i++) {
      cumulative += hist.buckets[i] ?? 0;
      lines.push(`http_request_duration_ms_bucket{${baseLbl},le="${durationBuckets[i]}"} ${cumulative}`);
    }
    // +Inf bucket
    lines.push(`http_request_duration_ms_bucket{${baseLbl},le="+Inf"} ${hist.count}`);
    lines.push(`http_request_duration_ms_count{${baseLbl}} ${hist.count}`);
    lines.push(`http_request_duration_ms_sum{${baseLbl}} ${hist.sum}`);
  }

  return lines.join('\n') + '\n';
}
