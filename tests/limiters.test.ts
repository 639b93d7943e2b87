import { describe, expect, it, vi } from "vitest";
import { DocIntelligenceLimiter } from "../src/limiters/docIntelligenceLimiter";
import { LimiterRegistry, createLimiterRegistry } from "../src/limiters/limiterRegistry";
import { OpenAILimiter } from "../src/limiters/openaiLimiter";
import { TokenBucket } from "../src/limiters/tokenBucket";
import { NullLogger } from "../src/logging/logger";
import { jsonResponse } from "../src/responses";
import { Limiter } from "../src/types";
import { makeConfig, makeContext } from "./helpers/fixtures";

const ok = jsonResponse(200, { ok: true });

describe("TokenBucket", () => {
  it("starts full, drains and refills continuously up to capacity", () => {
    const bucket = new TokenBucket({ capacity: 100, refillPerSecond: 10 }, 0);
    expect(bucket.tryAcquire(80, 0)).toBe(true);
    expect(bucket.tryAcquire(30, 0)).toBe(false);
    expect(bucket.timeUntil(30, 0)).toBe(1);
    expect(bucket.tryAcquire(30, 1000)).toBe(true);
    bucket.refill(60_000);
    expect(bucket.getState().tokens).toBe(100);
  });

  it("reports Infinity when the cost can never fit", () => {
    const bucket = new TokenBucket({ capacity: 0, refillPerSecond: 0 }, 0);
    expect(bucket.tryAcquire(1, 0)).toBe(false);
    expect(bucket.timeUntil(1, 0)).toBe(Infinity);
  });
});

describe("OpenAILimiter", () => {
  it("denies every request to a deployment with a zero quota", () => {
    const limiter = new OpenAILimiter({ "gpt-4": { model: "gpt-4", tokensPerMinute: 0 } }, new NullLogger(), () => 0);
    const denied = limiter.check(makeContext({ deploymentName: "gpt-4", tokenCount: 0 }), ok);
    expect(denied?.status).toBe(429);
    expect(denied?.headers["retry-after"]).toBe("60");
    expect(JSON.parse(denied?.body ?? "{}").error.code).toBe("429");
  });

  it("charges the token count and reports when enough quota returns", () => {
    let clock = 0;
    const limiter = new OpenAILimiter({ small: { model: "gpt-35-turbo", tokensPerMinute: 600 } }, new NullLogger(), () => clock);

    expect(limiter.check(makeContext({ deploymentName: "small", tokenCount: 500 }), ok)).toBeUndefined();
    const denied = limiter.check(makeContext({ deploymentName: "small", tokenCount: 200 }), ok);
    // 100 tokens left, 10 tokens/s refill: 100 short → 10 seconds
    expect(denied?.status).toBe(429);
    expect(denied?.headers["retry-after"]).toBe("10");
    expect(JSON.parse(denied?.body ?? "{}").error.message).toBe(
      "Requests to the OpenAI API Simulator have exceeded call rate limit. Please retry after 10 seconds."
    );

    clock = 10_000;
    expect(limiter.check(makeContext({ deploymentName: "small", tokenCount: 200 }), ok)).toBeUndefined();
  });

  it("passes through deployments without a configured quota", () => {
    const limiter = new OpenAILimiter({}, new NullLogger());
    expect(limiter.check(makeContext({ deploymentName: "unknown", tokenCount: 10 }), ok)).toBeUndefined();
    expect(limiter.check(makeContext({}), ok)).toBeUndefined();
  });
});

describe("DocIntelligenceLimiter", () => {
  it("admits up to the configured requests per second", () => {
    let clock = 0;
    const limiter = new DocIntelligenceLimiter(2, () => clock);
    const ctx = makeContext({ limiterKey: "docintelligence" });
    expect(limiter.check(ctx, ok)).toBeUndefined();
    expect(limiter.check(ctx, ok)).toBeUndefined();
    const denied = limiter.check(ctx, ok);
    expect(denied?.status).toBe(429);
    expect(denied?.headers["retry-after"]).toBe("1");
    clock = 500;
    expect(limiter.check(ctx, ok)).toBeUndefined();
  });
});

describe("LimiterRegistry", () => {
  it("returns the original response when no limiter matches the key", () => {
    const logger = new NullLogger();
    const debug = vi.spyOn(logger, "debug");
    const registry = new LimiterRegistry(logger);
    expect(registry.apply(makeContext({ limiterKey: "missing" }), ok)).toBe(ok);
    expect(registry.apply(makeContext({}), ok)).toBe(ok);
    expect(debug).toHaveBeenCalledTimes(2);
  });

  it("keeps the response when the limiter passes and replaces it when it denies", () => {
    const denial = jsonResponse(429, { error: "slow down" });
    const calls: string[] = [];
    const pass: Limiter = {
      check: () => {
        calls.push("pass");
        return undefined;
      }
    };
    const deny: Limiter = {
      check: () => {
        calls.push("deny");
        return denial;
      }
    };
    const registry = new LimiterRegistry(new NullLogger()).register("a", pass).register("b", deny);

    expect(registry.apply(makeContext({ limiterKey: "a" }), ok)).toBe(ok);
    expect(registry.apply(makeContext({ limiterKey: "b" }), ok)).toBe(denial);
    expect(calls).toEqual(["pass", "deny"]);
  });

  it("registers the openai and docintelligence limiters from config", () => {
    const registry = createLimiterRegistry(
      makeConfig({ openaiDeployments: { "gpt-4": { model: "gpt-4", tokensPerMinute: 0 } } }),
      new NullLogger()
    );
    expect(registry.get("openai")).toBeInstanceOf(OpenAILimiter);
    expect(registry.get("docintelligence")).toBeInstanceOf(DocIntelligenceLimiter);
    expect(registry.apply(makeContext({ limiterKey: "openai", deploymentName: "gpt-4", tokenCount: 5 }), ok).status).toBe(429);
  });
});
