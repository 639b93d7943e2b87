export type SimulatorMode = "generate" | "record" | "replay";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type OpenAIDeployment = {
  model: string;
  tokensPerMinute: number;
};

export type RecordingConfig = {
  dir: string;
  autosave: boolean;
};

export type UpstreamConfig = {
  endpoint: string;
  key: string;
};

export type SimulatorConfig = {
  mode: SimulatorMode;
  apiKey: string;
  recording: RecordingConfig;
  openaiDeployments: Readonly<Record<string, OpenAIDeployment>>;
  docIntelligenceRps: number;
  azureOpenAI?: UpstreamConfig;
  azureFormRecognizer?: UpstreamConfig;
  logLevel: LogLevel;
  host: string;
  port: number;
};

export type SimRequest = {
  readonly method: string;
  /** Path including the query string, e.g. `/openai/deployments/gpt-4/chat/completions?api-version=...` */
  readonly url: string;
  /** Header names are lower-cased. */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
};

export type SimResponse = {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
};

export type ContextValues = {
  limiterKey?: string;
  deploymentName?: string;
  tokenCount?: number;
  recordedDurationMs?: number;
};

export type RequestContext = {
  readonly config: SimulatorConfig;
  readonly request: SimRequest;
  readonly values: ContextValues;
};

export type ResponseGenerator = (context: RequestContext) => Promise<SimResponse | undefined>;

export interface ResponseProducer {
  handle(context: RequestContext): Promise<SimResponse | undefined>;
}

export interface Limiter {
  check(context: RequestContext, response: SimResponse): SimResponse | undefined;
}

export interface Histogram {
  record(value: number, attributes: Record<string, string | number | undefined>): void;
}

export type SimulatorMetrics = {
  latencyBase: Histogram;
  latencyFull: Histogram;
  tokensUsed: Histogram;
  tokensRequested: Histogram;
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
