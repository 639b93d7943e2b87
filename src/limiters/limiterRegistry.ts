import { Limiter, Logger, RequestContext, SimResponse, SimulatorConfig } from "../types";
import { DOC_INTELLIGENCE_LIMITER_KEY, DocIntelligenceLimiter } from "./docIntelligenceLimiter";
import { OPENAI_LIMITER_KEY, OpenAILimiter } from "./openaiLimiter";

export class LimiterRegistry {
  private readonly limiters = new Map<string, Limiter>();

  constructor(private readonly logger: Logger) {}

  register(key: string, limiter: Limiter): this {
    this.limiters.set(key, limiter);
    return this;
  }

  get(key: string): Limiter | undefined {
    return this.limiters.get(key);
  }

  /**
   * Returns the response the caller should see: the limiter's replacement when
   * the request is over quota, otherwise the original response untouched.
   */
  apply(context: RequestContext, response: SimResponse): SimResponse {
    const key = context.values.limiterKey;
    const limiter = key ? this.limiters.get(key) : undefined;
    if (!limiter) {
      this.logger.debug("no limiter found for request: %s", context.request.url);
      return response;
    }
    return limiter.check(context, response) ?? response;
  }
}

export function createLimiterRegistry(config: SimulatorConfig, logger: Logger): LimiterRegistry {
  logger.info("using OpenAI deployments: %s", Object.keys(config.openaiDeployments).join(", ") || "<none>");
  logger.info("using Doc Intelligence RPS: %d", config.docIntelligenceRps);
  return new LimiterRegistry(logger)
    .register(OPENAI_LIMITER_KEY, new OpenAILimiter(config.openaiDeployments, logger))
    .register(DOC_INTELLIGENCE_LIMITER_KEY, new DocIntelligenceLimiter(config.docIntelligenceRps));
}
