import { ContextValues, RequestContext, SimResponse } from "../types";

export type RecordedInteraction = {
  request: {
    method: string;
    url: string;
    bodyHash: string;
  };
  response: {
    status: number;
    headers: Record<string, string>;
    body: string;
  };
  durationMs: number;
  contextValues: Omit<ContextValues, "recordedDurationMs">;
};

export interface RecordingPersister {
  load(): Promise<Map<string, RecordedInteraction[]>>;
  save(name: string, interactions: readonly RecordedInteraction[]): Promise<void>;
}

/** Calls a real upstream; `undefined` when the request is not for this upstream. */
export type Forwarder = (context: RequestContext) => Promise<SimResponse | undefined>;
