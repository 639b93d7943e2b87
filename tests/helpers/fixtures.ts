import { createRequestContext } from "../../src/pipeline/requestContext";
import { RecordedInteraction, RecordingPersister } from "../../src/recordReplay/types";
import { RequestContext, SimRequest, SimulatorConfig } from "../../src/types";

export const SECRET = "test-secret";

export function makeConfig(overrides: Partial<SimulatorConfig> = {}): SimulatorConfig {
  return {
    mode: "generate",
    apiKey: SECRET,
    recording: { dir: ".recording", autosave: false },
    openaiDeployments: {},
    docIntelligenceRps: 15,
    logLevel: "error",
    host: "127.0.0.1",
    port: 0,
    ...overrides
  };
}

export function makeRequest(overrides: Partial<SimRequest> & { json?: unknown } = {}): SimRequest {
  const { json, ...rest } = overrides;
  return {
    method: "POST",
    url: "/openai/deployments/gpt-4/chat/completions?api-version=2024-02-01",
    headers: { "api-key": SECRET, "content-type": "application/json" },
    body: json === undefined ? Buffer.alloc(0) : Buffer.from(JSON.stringify(json)),
    ...rest
  };
}

export function makeContext(
  values: RequestContext["values"] = {},
  request: SimRequest = makeRequest(),
  config: SimulatorConfig = makeConfig()
): RequestContext {
  const context = createRequestContext(config, request);
  Object.assign(context.values, values);
  return context;
}

export class MemoryPersister implements RecordingPersister {
  readonly saves: Array<{ name: string; interactions: RecordedInteraction[] }> = [];

  constructor(private readonly initial: Record<string, RecordedInteraction[]> = {}) {}

  async load(): Promise<Map<string, RecordedInteraction[]>> {
    return new Map(Object.entries(this.initial).map(([name, list]) => [name, [...list]]));
  }

  async save(name: string, interactions: readonly RecordedInteraction[]): Promise<void> {
    this.saves.push({ name, interactions: [...interactions] });
  }
}
