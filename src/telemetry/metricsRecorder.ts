import { Histogram, Logger, SimulatorMetrics } from "../types";

export type RequestOutcome = {
  status: number;
  deploymentName?: string;
  tokenCount?: number;
  /** From authentication to limiter resolution. */
  baseDurationMs: number;
  /** From authentication to the end of the latency stage. */
  fullDurationMs: number;
};

export class MetricsRecorder {
  constructor(private readonly metrics: SimulatorMetrics, private readonly logger: Logger) {}

  record(outcome: RequestOutcome): void {
    const latencyAttributes = { status_code: outcome.status, deployment: outcome.deploymentName };
    this.observe(this.metrics.latencyBase, outcome.baseDurationMs / 1000, latencyAttributes);
    this.observe(this.metrics.latencyFull, outcome.fullDurationMs / 1000, latencyAttributes);

    if (!outcome.tokenCount) return;
    const tokenAttributes = { deployment: outcome.deploymentName };
    this.observe(this.metrics.tokensRequested, outcome.tokenCount, tokenAttributes);
    // limited or failed requests never count as used
    if (outcome.status < 300) {
      this.observe(this.metrics.tokensUsed, outcome.tokenCount, tokenAttributes);
    }
  }

  private observe(histogram: Histogram, value: number, attributes: Record<string, string | number | undefined>): void {
    try {
      histogram.record(value, attributes);
    } catch (err) {
      this.logger.warn("failed to record metric: %s", err instanceof Error ? err.message : String(err));
    }
  }
}
