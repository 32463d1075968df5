import { Registry, Histogram, Counter } from "prom-client";

export const registry = new Registry();

export const packHist = new Histogram({
  name: "keystore_pack_ms",
  help: "Latency of serialising a keystore to JKS bytes (ms)",
  buckets: [1, 5, 10, 25, 50, 100, 250, 1000],
  registers: [registry],
});

export const packedEntries = new Counter({
  name: "keystore_pack_entries_total",
  help: "Number of keystore entries written",
  labelNames: ["kind"] as const,
  registers: [registry],
});

export const packFailures = new Counter({
  name: "keystore_pack_failures_total",
  help: "Number of pack calls that failed, by error code",
  labelNames: ["code"] as const,
  registers: [registry],
});
