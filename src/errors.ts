export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid simulator configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class RecordingError extends Error {
  constructor(message: string, readonly file?: string) {
    super(file ? `${message} (${file})` : message);
    this.name = "RecordingError";
  }
}

export class ForwarderError extends Error {
  constructor(message: string, readonly target: string) {
    super(`${message}: ${target}`);
    this.name = "ForwarderError";
  }
}

export type PipelineStage = "dispatch" | "limit" | "latency" | "metrics";

export type PipelineFault =
  | { kind: "dispatch_fault"; path: string }
  | { kind: "internal_fault"; stage: PipelineStage; error: unknown };

export type StageResult<T> = { ok: true; value: T } | { ok: false; fault: PipelineFault };

export async function runStage<T>(stage: PipelineStage, fn: () => Promise<T> | T): Promise<StageResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, fault: { kind: "internal_fault", stage, error } };
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`;
  return String(error);
}
