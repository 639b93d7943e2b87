import { jsonResponse } from "../responses";
import { Limiter, Logger, OpenAIDeployment, RequestContext, SimResponse } from "../types";
import { TokenBucket } from "./tokenBucket";

export const OPENAI_LIMITER_KEY = "openai";

// retry-after reported when a deployment's quota can never admit the request
const MAX_RETRY_AFTER_SECONDS = 60;

/**
 * Tokens-per-minute admission per deployment. Each deployment owns a bucket
 * holding one minute of quota that refills continuously.
 */
export class OpenAILimiter implements Limiter {
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(
    deployments: Readonly<Record<string, OpenAIDeployment>>,
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {
    const start = clock();
    for (const [name, deployment] of Object.entries(deployments)) {
      this.buckets.set(
        name,
        new TokenBucket({ capacity: deployment.tokensPerMinute, refillPerSecond: deployment.tokensPerMinute / 60 }, start)
      );
    }
  }

  check(context: RequestContext, _response: SimResponse): SimResponse | undefined {
    const deployment = context.values.deploymentName;
    const bucket = deployment ? this.buckets.get(deployment) : undefined;
    if (!deployment || !bucket) {
      this.logger.debug("no token quota configured for deployment %s", deployment ?? "<unknown>");
      return undefined;
    }

    const cost = Math.max(1, context.values.tokenCount ?? 0);
    const now = this.clock();
    if (bucket.tryAcquire(cost, now)) return undefined;

    const wait = bucket.timeUntil(cost, now);
    const retryAfter = Number.isFinite(wait) ? Math.max(1, Math.ceil(wait)) : MAX_RETRY_AFTER_SECONDS;
    this.logger.debug("deployment %s over token quota (cost=%d, retry-after=%ds)", deployment, cost, retryAfter);
    return jsonResponse(
      429,
      {
        error: {
          code: "429",
          message: `Requests to the OpenAI API Simulator have exceeded call rate limit. Please retry after ${retryAfter} seconds.`
        }
      },
      { "retry-after": String(retryAfter) }
    );
  }
}
