import { trace } from "@opentelemetry/api";
import { AuthResult, CredentialValidator } from "../auth/credentialValidator";
import { PipelineFault, StageResult, describeError, runStage } from "../errors";
import { LatencyEmulator } from "../latency/latencyEmulator";
import { LimiterRegistry } from "../limiters/limiterRegistry";
import { emptyResponse, unauthorizedResponse } from "../responses";
import { MetricsRecorder } from "../telemetry/metricsRecorder";
import { Logger, RequestContext, ResponseProducer, SimRequest, SimResponse, SimulatorConfig } from "../types";
import { now } from "../utils/time";
import { createRequestContext } from "./requestContext";

export type PipelineDeps = {
  config: SimulatorConfig;
  validator: CredentialValidator;
  producer: ResponseProducer;
  limiters: LimiterRegistry;
  latency: LatencyEmulator;
  metrics: MetricsRecorder;
  logger: Logger;
  clock?: () => number;
};

const tracer = trace.getTracer("aoai-simulator");

/**
 * Request lifecycle: authenticate, dispatch to the producer, apply the limiter,
 * pad latency, record metrics. Stage failures come back as faults and are
 * turned into a bare 500; nothing thrown by a collaborator reaches the caller.
 */
export class SimulatorPipeline {
  private readonly clock: () => number;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? now;
  }

  authenticate(request: SimRequest): AuthResult {
    return this.deps.validator.validate(request);
  }

  async handle(request: SimRequest): Promise<SimResponse> {
    if (!this.authenticate(request).ok) {
      return unauthorizedResponse();
    }
    const startedAt = this.clock();

    return tracer.startActiveSpan("simulator.request", async (span) => {
      try {
        const context = createRequestContext(this.deps.config, request);
        const result = await this.run(context, startedAt);
        const response = result.ok ? result.value : this.faultResponse(result.fault);
        span.setAttribute("http.status_code", response.status);
        return response;
      } finally {
        span.end();
      }
    });
  }

  private async run(context: RequestContext, startedAt: number): Promise<StageResult<SimResponse>> {
    const dispatched = await runStage("dispatch", () => this.deps.producer.handle(context));
    if (!dispatched.ok) return dispatched;
    const produced = dispatched.value;
    if (!produced) {
      return { ok: false, fault: { kind: "dispatch_fault", path: context.request.url } };
    }

    // limits run before latency so throttled responses return immediately
    const limited = await runStage("limit", () => this.deps.limiters.apply(context, produced));
    if (!limited.ok) return limited;
    const response = limited.value;
    const baseDurationMs = this.clock() - startedAt;

    const delayed = await runStage("latency", () => this.deps.latency.apply(context, response, baseDurationMs));
    if (!delayed.ok) return delayed;
    const fullDurationMs = this.clock() - startedAt;

    const recorded = await runStage("metrics", () =>
      this.deps.metrics.record({
        status: response.status,
        deploymentName: context.values.deploymentName,
        tokenCount: context.values.tokenCount,
        baseDurationMs,
        fullDurationMs
      })
    );
    if (!recorded.ok) return recorded;

    return { ok: true, value: response };
  }

  private faultResponse(fault: PipelineFault): SimResponse {
    switch (fault.kind) {
      case "dispatch_fault":
        this.deps.logger.error("no response generated for request: %s", fault.path);
        return emptyResponse(500);
      case "internal_fault":
        this.deps.logger.error("error in %s stage: %s", fault.stage, describeError(fault.error));
        return emptyResponse(500);
      default: {
        const unreachable: never = fault;
        throw new Error(`unhandled pipeline fault: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
