import { Counter, Gauge, Histogram, Registry } from "prom-client";

export type OperationOutcome = "ok" | string;

export class BucketMetrics {
  private readonly registry: Registry;
  private readonly operations: Counter<string>;
  private readonly latency: Histogram<string>;
  private readonly renewalSpend: Counter<string>;
  private readonly balance: Gauge<string>;

  constructor(registry?: Registry) {
    this.registry = registry ?? new Registry();
    this.operations = new Counter({
      name: "bucket_operations_total",
      help: "Bucket operations by outcome",
      labelNames: ["op", "outcome"],
      registers: [this.registry],
    });

    this.latency = new Histogram({
      name: "bucket_operation_latency_ms",
      help: "Latency of bucket operations",
      labelNames: ["op"],
      buckets: [1, 5, 10, 50, 100, 250, 500, 1000, 5000],
      registers: [this.registry],
    });

    this.renewalSpend = new Counter({
      name: "bucket_renewal_spend_total",
      help: "Balance units consumed by self-funded renewals",
      registers: [this.registry],
    });

    this.balance = new Gauge({
      name: "bucket_balance_units",
      help: "Escrow balance per bucket",
      labelNames: ["bucket"],
      registers: [this.registry],
    });
  }

  recordOperation(op: string, outcome: OperationOutcome, durationMs: number) {
    this.operations.labels(op, outcome).inc();
    this.latency.labels(op).observe(durationMs);
  }

  recordRenewalSpend(units: bigint) {
    if (units > 0n) {
      this.renewalSpend.inc(Number(units));
    }
  }

  setBalance(bucketId: string, units: bigint) {
    this.balance.labels(bucketId).set(Number(units));
  }

  getRegistry() {
    return this.registry;
  }
}
