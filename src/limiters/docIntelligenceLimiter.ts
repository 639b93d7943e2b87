import { jsonResponse } from "../responses";
import { Limiter, RequestContext, SimResponse } from "../types";
import { TokenBucket } from "./tokenBucket";

export const DOC_INTELLIGENCE_LIMITER_KEY = "docintelligence";

export class DocIntelligenceLimiter implements Limiter {
  private readonly bucket: TokenBucket;

  constructor(requestsPerSecond: number, private readonly clock: () => number = Date.now) {
    this.bucket = new TokenBucket({ capacity: requestsPerSecond, refillPerSecond: requestsPerSecond }, clock());
  }

  check(_context: RequestContext, _response: SimResponse): SimResponse | undefined {
    if (this.bucket.tryAcquire(1, this.clock())) return undefined;
    return jsonResponse(
      429,
      {
        error: {
          code: "429",
          message: "Requests to the Document Intelligence API Simulator have exceeded rate limit. Please retry after 1 second."
        }
      },
      { "retry-after": "1" }
    );
  }
}
