import * as fs from "fs";
import { z } from "zod";
import { ConfigError } from "./errors";
import { OpenAIDeployment, SimulatorConfig, UpstreamConfig } from "./types";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  SIMULATOR_MODE: z.enum(["generate", "record", "replay"]).default("generate"),
  SIMULATOR_API_KEY: z.string().min(1, "SIMULATOR_API_KEY is required"),
  RECORDING_DIR: z.string().min(1).default(".recording"),
  RECORDING_AUTOSAVE: booleanFlag.default("true"),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_KEY: z.string().min(1).optional(),
  AZURE_FORM_RECOGNIZER_ENDPOINT: z.string().url().optional(),
  AZURE_FORM_RECOGNIZER_KEY: z.string().min(1).optional(),
  OPENAI_DEPLOYMENT_CONFIG_PATH: z.string().min(1).optional(),
  DOC_INTELLIGENCE_RPS: z.coerce.number().int().positive().default(15),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000)
});

const deploymentsSchema = z.record(
  z.object({
    model: z.string().min(1),
    tokensPerMinute: z.number().int().nonnegative()
  })
);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  // empty strings are treated as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  const config: SimulatorConfig = {
    mode: e.SIMULATOR_MODE,
    apiKey: e.SIMULATOR_API_KEY,
    recording: { dir: e.RECORDING_DIR, autosave: e.RECORDING_AUTOSAVE },
    openaiDeployments: e.OPENAI_DEPLOYMENT_CONFIG_PATH
      ? loadDeployments(e.OPENAI_DEPLOYMENT_CONFIG_PATH)
      : {},
    docIntelligenceRps: e.DOC_INTELLIGENCE_RPS,
    azureOpenAI: upstream(e.AZURE_OPENAI_ENDPOINT, e.AZURE_OPENAI_KEY),
    azureFormRecognizer: upstream(e.AZURE_FORM_RECOGNIZER_ENDPOINT, e.AZURE_FORM_RECOGNIZER_KEY),
    logLevel: e.LOG_LEVEL,
    host: e.HOST,
    port: e.PORT
  };
  return Object.freeze(config);
}

export function loadDeployments(path: string): Record<string, OpenAIDeployment> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`OPENAI_DEPLOYMENT_CONFIG_PATH: cannot read ${path} (${reason})`]);
  }
  const parsed = deploymentsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `OPENAI_DEPLOYMENT_CONFIG_PATH.${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data;
}

function upstream(endpoint?: string, key?: string): UpstreamConfig | undefined {
  if (!endpoint || !key) return undefined;
  return { endpoint: endpoint.replace(/\/+$/, ""), key };
}
