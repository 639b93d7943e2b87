import axios, { AxiosHeaders, AxiosInstance, AxiosResponse } from "axios";
import { ForwarderError } from "../errors";
import { matchOpenAIRoute } from "../generator/openaiGenerators";
import { DOC_INTELLIGENCE_LIMITER_KEY } from "../limiters/docIntelligenceLimiter";
import { OPENAI_LIMITER_KEY } from "../limiters/openaiLimiter";
import { RequestContext, SimResponse, UpstreamConfig } from "../types";
import { Forwarder } from "./types";

const HOP_BY_HOP = new Set(["connection", "keep-alive", "transfer-encoding", "content-length", "content-encoding"]);
const DOC_INTELLIGENCE_PREFIXES = ["/formrecognizer/", "/documentintelligence/"];

export function createAzureOpenAIForwarder(upstream: UpstreamConfig, client: AxiosInstance = axios.create()): Forwarder {
  return async (context) => {
    const route = matchOpenAIRoute(context.request.url);
    if (!route) return undefined;

    const response = await send(client, upstream, context, "api-key");
    context.values.limiterKey = OPENAI_LIMITER_KEY;
    context.values.deploymentName = route.deployment;
    const tokens = totalTokens(response.body);
    if (tokens !== undefined) context.values.tokenCount = tokens;
    return response;
  };
}

export function createDocIntelligenceForwarder(upstream: UpstreamConfig, client: AxiosInstance = axios.create()): Forwarder {
  return async (context) => {
    const url = context.request.url;
    if (!DOC_INTELLIGENCE_PREFIXES.some((p) => url.startsWith(p))) return undefined;

    const response = await send(client, upstream, context, "ocp-apim-subscription-key");
    context.values.limiterKey = DOC_INTELLIGENCE_LIMITER_KEY;
    return response;
  };
}

async function send(
  client: AxiosInstance,
  upstream: UpstreamConfig,
  context: RequestContext,
  keyHeader: string
): Promise<SimResponse> {
  const { request } = context;
  const target = `${upstream.endpoint}${request.url}`;
  const headers: Record<string, string> = { [keyHeader]: upstream.key };
  if (request.headers["content-type"]) headers["content-type"] = request.headers["content-type"];

  let response: AxiosResponse<unknown>;
  try {
    response = await client.request<unknown>({
      method: request.method,
      url: target,
      headers,
      data: request.body.length > 0 ? request.body : undefined,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true
    });
  } catch (err) {
    throw new ForwarderError(`upstream request failed (${err instanceof Error ? err.message : String(err)})`, target);
  }

  return {
    status: response.status,
    headers: flattenHeaders(response.headers),
    body: typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? "")
  };
}

function flattenHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const raw = headers instanceof AxiosHeaders ? headers.toJSON() : headers;
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    const key = name.toLowerCase();
    if (HOP_BY_HOP.has(key) || value === undefined || value === null) continue;
    out[key] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return out;
}

function totalTokens(body: string): number | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== "object" || parsed === null || !("usage" in parsed)) return undefined;
    const usage = parsed.usage;
    if (typeof usage !== "object" || usage === null || !("total_tokens" in usage)) return undefined;
    return typeof usage.total_tokens === "number" ? usage.total_tokens : undefined;
  } catch {
    return undefined;
  }
}
