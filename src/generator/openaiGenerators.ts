import { randomUUID } from "crypto";
import { z } from "zod";
import { OPENAI_LIMITER_KEY } from "../limiters/openaiLimiter";
import { jsonResponse } from "../responses";
import { RequestContext, SimResponse } from "../types";
import { estimateTokens } from "./tokenEstimator";

const DEFAULT_MAX_TOKENS = 10;
const EMBEDDING_DIMENSIONS = 1536;

const LOREM = [
  "lorem", "ipsum", "dolor", "sit", "amet", "consectetur", "adipiscing", "elit", "sed", "do",
  "eiusmod", "tempor", "incididunt", "ut", "labore", "et", "dolore", "magna", "aliqua"
];

const chatRequestSchema = z.object({
  messages: z.array(
    z.object({
      role: z.string(),
      content: z.union([z.string(), z.array(z.unknown()), z.null()]).optional()
    })
  ),
  max_tokens: z.number().int().positive().optional()
});

const embeddingsRequestSchema = z.object({
  input: z.union([z.string(), z.array(z.string())])
});

type OpenAIRoute = { deployment: string; operation: string };

export function matchOpenAIRoute(url: string): OpenAIRoute | undefined {
  const path = url.split("?", 1)[0];
  const match = /^\/openai\/deployments\/([^/]+)\/(.+)$/.exec(path);
  if (!match) return undefined;
  return { deployment: decodeURIComponent(match[1]), operation: match[2] };
}

export function loremText(wordCount: number): string {
  const words: string[] = [];
  for (let i = 0; i < wordCount; i++) words.push(LOREM[i % LOREM.length]);
  return words.join(" ");
}

export async function chatCompletionsGenerator(context: RequestContext): Promise<SimResponse | undefined> {
  const route = matchOpenAIRoute(context.request.url);
  if (!route || route.operation !== "chat/completions" || context.request.method !== "POST") return undefined;

  const body = parseBody(context, chatRequestSchema);
  if (!body.ok) return body.response;

  const promptText = body.value.messages
    .map((m) => (typeof m.content === "string" ? m.content : JSON.stringify(m.content ?? "")))
    .join("\n");
  const promptTokens = estimateTokens(promptText) || 1;
  const maxTokens = body.value.max_tokens ?? DEFAULT_MAX_TOKENS;

  tagOpenAIRequest(context, route.deployment, promptTokens + maxTokens);

  return jsonResponse(200, {
    id: `chatcmpl-${randomUUID()}`,
    object: "chat.completion",
    created: Math.floor(Date.now() / 1000),
    model: modelName(context, route.deployment),
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: loremText(maxTokens) },
        finish_reason: "length"
      }
    ],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: maxTokens,
      total_tokens: promptTokens + maxTokens
    }
  });
}

export async function embeddingsGenerator(context: RequestContext): Promise<SimResponse | undefined> {
  const route = matchOpenAIRoute(context.request.url);
  if (!route || route.operation !== "embeddings" || context.request.method !== "POST") return undefined;

  const body = parseBody(context, embeddingsRequestSchema);
  if (!body.ok) return body.response;

  const inputs = typeof body.value.input === "string" ? [body.value.input] : body.value.input;
  const promptTokens = inputs.reduce((sum, text) => sum + estimateTokens(text), 0);

  tagOpenAIRequest(context, route.deployment, promptTokens);

  return jsonResponse(200, {
    object: "list",
    data: inputs.map((_, index) => ({
      object: "embedding",
      index,
      embedding: Array.from({ length: EMBEDDING_DIMENSIONS }, () => Math.random() * 2 - 1)
    })),
    model: modelName(context, route.deployment),
    usage: { prompt_tokens: promptTokens, total_tokens: promptTokens }
  });
}

function tagOpenAIRequest(context: RequestContext, deployment: string, tokens: number): void {
  context.values.limiterKey = OPENAI_LIMITER_KEY;
  context.values.deploymentName = deployment;
  context.values.tokenCount = tokens;
}

function modelName(context: RequestContext, deployment: string): string {
  return context.config.openaiDeployments[deployment]?.model ?? deployment;
}

function parseBody<T>(
  context: RequestContext,
  schema: z.ZodType<T>
): { ok: true; value: T } | { ok: false; response: SimResponse } {
  let raw: unknown;
  try {
    raw = JSON.parse(context.request.body.toString("utf8"));
  } catch {
    return { ok: false, response: badRequest("Request body is not valid JSON") };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, response: badRequest(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")) };
  }
  return { ok: true, value: parsed.data };
}

function badRequest(message: string): SimResponse {
  return jsonResponse(400, { error: { code: "BadRequest", message } });
}
