import { Counter, Gauge, Histogram, register } from "prom-client";

export const VIRTUAL_HOSTS_NAME = "orchestrator_virtual_hosts";
export const RECONFIGURATIONS_NAME = "orchestrator_reconfigurations_total";
export const RECONFIGURATION_SECONDS_NAME = "orchestrator_reconfiguration_seconds";
export const BIND_MISMATCHES_NAME = "orchestrator_bind_mismatches_total";
export const ACTIVE_SESSIONS_NAME = "orchestrator_active_sessions";

function getOrCreateVirtualHostGauge(): Gauge<string> {
  const existing = register.getSingleMetric(VIRTUAL_HOSTS_NAME) as Gauge<string> | undefined;
  if (existing) {
    return existing;
  }
  return new Gauge({
    name: VIRTUAL_HOSTS_NAME,
    help: "Number of virtual hosts in the published topology",
    labelNames: ["origin"]
  });
}

function getOrCreateReconfigurationCounter(): Counter<string> {
  const existing = register.getSingleMetric(RECONFIGURATIONS_NAME) as Counter<string> | undefined;
  if (existing) {
    return existing;
  }
  return new Counter({
    name: RECONFIGURATIONS_NAME,
    help: "Virtual host reconfigurations by operation and result",
    labelNames: ["operation", "result"]
  });
}

function getOrCreateReconfigurationHistogram(): Histogram<string> {
  const existing = register.getSingleMetric(RECONFIGURATION_SECONDS_NAME) as
    | Histogram<string>
    | undefined;
  if (existing) {
    return existing;
  }
  return new Histogram({
    name: RECONFIGURATION_SECONDS_NAME,
    help: "Time spent applying a virtual host reconfiguration in seconds",
    labelNames: ["operation"],
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5]
  });
}

function getOrCreateBindMismatchCounter(): Counter<string> {
  const existing = register.getSingleMetric(BIND_MISMATCHES_NAME) as Counter<string> | undefined;
  if (existing) {
    return existing;
  }
  return new Counter({
    name: BIND_MISMATCHES_NAME,
    help: "Configuration values kept because an override had another kind",
    labelNames: ["source"]
  });
}

function getOrCreateSessionGauge(): Gauge<string> {
  const existing = register.getSingleMetric(ACTIVE_SESSIONS_NAME) as Gauge<string> | undefined;
  if (existing) {
    return existing;
  }
  return new Gauge({
    name: ACTIVE_SESSIONS_NAME,
    help: "Open sessions per virtual host",
    labelNames: ["vhost"]
  });
}

export const virtualHostGauge = getOrCreateVirtualHostGauge();
export const reconfigurationCounter = getOrCreateReconfigurationCounter();
export const reconfigurationHistogram = getOrCreateReconfigurationHistogram();
export const bindMismatchCounter = getOrCreateBindMismatchCounter();
export const activeSessionGauge = getOrCreateSessionGauge();

export function resetMetrics(): void {
  register.resetMetrics();
  virtualHostGauge.reset();
  reconfigurationCounter.reset();
  reconfigurationHistogram.reset();
  bindMismatchCounter.reset();
  activeSessionGauge.reset();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

export type ReconfigurationOperation = "create" | "delete";

/**
 * Starts the duration timer for one reconfiguration; the returned function
 * records the result and stops the timer.
 */
export function startReconfiguration(
  operation: ReconfigurationOperation
): (result: string) => void {
  const stop = reconfigurationHistogram.startTimer({ operation });
  return (result) => {
    stop();
    reconfigurationCounter.labels(operation, result).inc();
  };
}
