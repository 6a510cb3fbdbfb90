type Labels<TName extends string> = Record<TName, string>;

interface RenderableMetric {
  render(): string[];
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(pairs: ReadonlyArray<readonly [string, string]>): string {
  if (pairs.length === 0) {
    return "";
  }
  return `{${pairs.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

/** Series are keyed by label values in declaration order, so rendering keeps that order too. */
class LabeledSeries<TName extends string, TValue> {
  private readonly series = new Map<string, { pairs: Array<readonly [string, string]>; value: TValue }>();

  constructor(private readonly labelNames: readonly TName[]) {}

  upsert(labels: Labels<TName>, create: () => TValue): TValue {
    const pairs = this.labelNames.map((name) => [name, labels[name]] as const);
    const key = pairs.map(([, value]) => value).join("\u0000");
    const existing = this.series.get(key);
    if (existing) {
      return existing.value;
    }
    const value = create();
    this.series.set(key, { pairs, value });
    return value;
  }

  entries(): Array<{ pairs: Array<readonly [string, string]>; value: TValue }> {
    return [...this.series.values()];
  }
}

class Counter<TName extends string> implements RenderableMetric {
  private readonly series: LabeledSeries<TName, { total: number }>;

  constructor(
    private readonly name: string,
    private readonly help: string,
    labelNames: readonly TName[],
  ) {
    this.series = new LabeledSeries(labelNames);
  }

  inc(labels: Labels<TName>, amount = 1): void {
    this.series.upsert(labels, () => ({ total: 0 })).total += amount;
  }

  render(): string[] {
    return [
      `# HELP ${this.name} ${this.help}`,
      `# TYPE ${this.name} counter`,
      ...this.series.entries().map(({ pairs, value }) => `${this.name}${formatLabels(pairs)} ${value.total}`),
    ];
  }
}

interface HistogramState {
  count: number;
  sum: number;
  bucketCounts: number[];
}

class Histogram<TName extends string> implements RenderableMetric {
  private readonly series: LabeledSeries<TName, HistogramState>;

  constructor(
    private readonly name: string,
    private readonly help: string,
    labelNames: readonly TName[],
    private readonly upperBounds: readonly number[],
  ) {
    this.series = new LabeledSeries(labelNames);
  }

  observe(labels: Labels<TName>, value: number): void {
    const state = this.series.upsert(labels, () => ({
      count: 0,
      sum: 0,
      bucketCounts: this.upperBounds.map(() => 0),
    }));
    state.count += 1;
    state.sum += value;
    state.bucketCounts = state.bucketCounts.map((count, index) =>
      value <= (this.upperBounds[index] ?? Number.POSITIVE_INFINITY) ? count + 1 : count,
    );
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const { pairs, value } of this.series.entries()) {
      this.upperBounds.forEach((bound, index) => {
        lines.push(`${this.name}_bucket${formatLabels([...pairs, ["le", String(bound)] as const])} ${value.bucketCounts[index] ?? 0}`);
      });
      lines.push(`${this.name}_bucket${formatLabels([...pairs, ["le", "+Inf"] as const])} ${value.count}`);
      lines.push(`${this.name}_sum${formatLabels(pairs)} ${value.sum}`);
      lines.push(`${this.name}_count${formatLabels(pairs)} ${value.count}`);
    }
    return lines;
  }
}

export class ServiceMetricsRegistry {
  private readonly httpRequests = new Counter(
    "payhook_http_requests_total",
    "HTTP requests handled, by method, route and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new Histogram(
    "payhook_http_request_duration_seconds",
    "HTTP request duration in seconds, by method and route.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 15, 30],
  );
  private readonly webhookAdmissions = new Counter(
    "payhook_webhook_admissions_total",
    "Inbound webhook deliveries, by provider and admission outcome.",
    ["provider", "outcome"],
  );
  private readonly webhookFailures = new Counter(
    "payhook_webhook_failures_total",
    "Webhook handler failures, by provider.",
    ["provider"],
  );
  private readonly gatewayAuthorizations = new Counter(
    "payhook_gateway_authorizations_total",
    "Payment authorization outcomes, by result and path.",
    ["outcome", "path"],
  );
  private readonly gatewaySessions = new Counter(
    "payhook_gateway_sessions_total",
    "Card payment session initializations, by flow and source.",
    ["flow", "source"],
  );
  private readonly fundOperations = new Counter(
    "payhook_gateway_fund_operations_total",
    "Capture, refund and cancel outcomes, by status.",
    ["status"],
  );

  private readonly all: RenderableMetric[] = [
    this.httpRequests,
    this.httpDuration,
    this.webhookAdmissions,
    this.webhookFailures,
    this.gatewayAuthorizations,
    this.gatewaySessions,
    this.fundOperations,
  ];

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const normalizedMethod = method.toUpperCase();
    this.httpRequests.inc({ method: normalizedMethod, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: normalizedMethod, route }, durationSeconds);
  }

  recordWebhookAdmission(provider: string, outcome: string): void {
    this.webhookAdmissions.inc({ provider, outcome });
  }

  recordWebhookFailure(provider: string): void {
    this.webhookFailures.inc({ provider });
  }

  recordAuthorization(outcome: string, path: string): void {
    this.gatewayAuthorizations.inc({ outcome, path });
  }

  recordSession(flow: string, source: string): void {
    this.gatewaySessions.inc({ flow, source });
  }

  recordFundOperation(status: string): void {
    this.fundOperations.inc({ status });
  }

  renderPrometheus(): string {
    return `${this.all.flatMap((metric) => metric.render()).join("\n")}\n`;
  }
}
