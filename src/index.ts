export * from "./types";
export * from "./errors";
export { loadConfig } from "./config";
export { buildSimulator } from "./app";
export { ConsoleLogger, NullLogger } from "./logging/logger";
export { CredentialValidator } from "./auth/credentialValidator";
export { SimulatorPipeline } from "./pipeline/simulatorPipeline";
export { GeneratorProducer, selectProducer } from "./pipeline/modeDispatcher";
export { createRequestContext } from "./pipeline/requestContext";
export { LimiterRegistry, createLimiterRegistry } from "./limiters/limiterRegistry";
export { OpenAILimiter } from "./limiters/openaiLimiter";
export { DocIntelligenceLimiter } from "./limiters/docIntelligenceLimiter";
export { TokenBucket } from "./limiters/tokenBucket";
export { LatencyEmulator } from "./latency/latencyEmulator";
export { MetricsRecorder } from "./telemetry/metricsRecorder";
export { BucketHistogram, InMemoryHistogram, createBucketMetrics, createInMemoryMetrics } from "./telemetry/histograms";
export { invokeGenerators, DEFAULT_GENERATORS } from "./generator/generators";
export { RecordReplayHandler } from "./recordReplay/recordReplayHandler";
export { YamlRecordingPersister } from "./recordReplay/yamlPersister";
export { createAzureOpenAIForwarder, createDocIntelligenceForwarder } from "./recordReplay/forwarders";
export { SimulatorServer } from "./gateway/httpServer";
