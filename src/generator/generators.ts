import { RequestContext, ResponseGenerator, SimResponse } from "../types";
import { chatCompletionsGenerator, embeddingsGenerator } from "./openaiGenerators";

export const DEFAULT_GENERATORS: readonly ResponseGenerator[] = [chatCompletionsGenerator, embeddingsGenerator];

/** First generator to return a response wins; `undefined` when none applies. */
export async function invokeGenerators(
  context: RequestContext,
  generators: readonly ResponseGenerator[]
): Promise<SimResponse | undefined> {
  for (const generator of generators) {
    const response = await generator(context);
    if (response) return response;
  }
  return undefined;
}
