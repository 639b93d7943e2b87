import { trace } from "@opentelemetry/api";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ADDED_LATENCY_ATTRIBUTE, LatencyEmulator } from "../src/latency/latencyEmulator";
import { jsonResponse } from "../src/responses";
import { makeContext } from "./helpers/fixtures";

const ok = jsonResponse(200, {});

describe("LatencyEmulator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sleeps for the remainder of the recorded duration on success", async () => {
    const sleeper = vi.fn(async (_ms: number) => undefined);
    const emulator = new LatencyEmulator(sleeper);

    const applied = await emulator.apply(makeContext({ recordedDurationMs: 500 }), ok, 50);

    expect(applied).toBe(450);
    expect(sleeper).toHaveBeenCalledTimes(1);
    expect(sleeper).toHaveBeenCalledWith(450);
  });

  it("adds nothing when the hint is absent or already exceeded", async () => {
    const sleeper = vi.fn(async (_ms: number) => undefined);
    const emulator = new LatencyEmulator(sleeper);

    expect(await emulator.apply(makeContext({}), ok, 10)).toBe(0);
    expect(await emulator.apply(makeContext({ recordedDurationMs: 100 }), ok, 100)).toBe(0);
    expect(await emulator.apply(makeContext({ recordedDurationMs: 100 }), ok, 250)).toBe(0);
    expect(sleeper).not.toHaveBeenCalled();
  });

  it("never delays non-success responses", async () => {
    const sleeper = vi.fn(async (_ms: number) => undefined);
    const emulator = new LatencyEmulator(sleeper);

    for (const status of [300, 429, 500]) {
      expect(await emulator.apply(makeContext({ recordedDurationMs: 5000 }), jsonResponse(status, {}), 0)).toBe(0);
    }
    expect(sleeper).not.toHaveBeenCalled();
  });

  it("records the added latency in seconds on the active span", async () => {
    const span = trace.wrapSpanContext({ traceId: "0af7651916cd43dd8448eb211c80319c", spanId: "b7ad6b7169203331", traceFlags: 1 });
    const setAttribute = vi.spyOn(span, "setAttribute");
    vi.spyOn(trace, "getActiveSpan").mockReturnValue(span);

    const emulator = new LatencyEmulator(async () => undefined);
    await emulator.apply(makeContext({ recordedDurationMs: 300 }), ok, 100);

    expect(setAttribute).toHaveBeenCalledWith(ADDED_LATENCY_ATTRIBUTE, 0.2);
  });

  it("really waits with the default sleeper", async () => {
    const emulator = new LatencyEmulator();
    const start = Date.now();
    await emulator.apply(makeContext({ recordedDurationMs: 80 }), ok, 0);
    expect(Date.now() - start).toBeGreaterThanOrEqual(75);
  });
});
