import { trace } from "@opentelemetry/api";
import { RequestContext, SimResponse } from "../types";
import { sleep } from "../utils/time";

export const ADDED_LATENCY_ATTRIBUTE = "simulator.added_latency";

/**
 * Pads successful responses so the caller observes the duration recorded for
 * the exchange. `elapsedMs` is the time already spent since authentication.
 * Returns the delay applied, in milliseconds.
 */
export class LatencyEmulator {
  constructor(private readonly sleeper: (ms: number) => Promise<void> = sleep) {}

  extraDelayMs(context: RequestContext, response: SimResponse, elapsedMs: number): number {
    if (response.status >= 300) return 0;
    const targetMs = context.values.recordedDurationMs ?? 0;
    return Math.max(0, targetMs - elapsedMs);
  }

  async apply(context: RequestContext, response: SimResponse, elapsedMs: number): Promise<number> {
    const delayMs = this.extraDelayMs(context, response, elapsedMs);
    if (delayMs <= 0) return 0;
    trace.getActiveSpan()?.setAttribute(ADDED_LATENCY_ATTRIBUTE, delayMs / 1000);
    await this.sleeper(delayMs);
    return delayMs;
  }
}
