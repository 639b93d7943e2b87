import { RequestContext, SimRequest, SimulatorConfig } from "../types";

export function createRequestContext(config: SimulatorConfig, request: SimRequest): RequestContext {
  return { config, request, values: {} };
}
