import { CredentialValidator } from "./auth/credentialValidator";
import { SimulatorServer } from "./gateway/httpServer";
import { DEFAULT_GENERATORS } from "./generator/generators";
import { LatencyEmulator } from "./latency/latencyEmulator";
import { createLimiterRegistry } from "./limiters/limiterRegistry";
import { GeneratorProducer, selectProducer } from "./pipeline/modeDispatcher";
import { SimulatorPipeline } from "./pipeline/simulatorPipeline";
import { createAzureOpenAIForwarder, createDocIntelligenceForwarder } from "./recordReplay/forwarders";
import { RecordReplayHandler } from "./recordReplay/recordReplayHandler";
import { Forwarder, RecordingPersister } from "./recordReplay/types";
import { YamlRecordingPersister } from "./recordReplay/yamlPersister";
import { createBucketMetrics, snapshotMetrics } from "./telemetry/histograms";
import { MetricsRecorder } from "./telemetry/metricsRecorder";
import { Logger, ResponseGenerator, SimulatorConfig, SimulatorMetrics } from "./types";

export type SimulatorOverrides = {
  generators?: readonly ResponseGenerator[];
  forwarders?: readonly Forwarder[];
  persister?: RecordingPersister;
  metrics?: SimulatorMetrics;
};

export type Simulator = {
  server: SimulatorServer;
  pipeline: SimulatorPipeline;
  recordReplay?: RecordReplayHandler;
};

export function buildSimulator(config: SimulatorConfig, logger: Logger, overrides: SimulatorOverrides = {}): Simulator {
  logger.info("🚀 starting aoai-simulated-api in %s mode", config.mode);

  let recordReplay: RecordReplayHandler | undefined;
  if (config.mode === "record" || config.mode === "replay") {
    logger.info("📼 recording directory: %s", config.recording.dir);
    logger.info("📼 recording auto-save: %s", config.recording.autosave);
    recordReplay = new RecordReplayHandler({
      mode: config.mode,
      persister: overrides.persister ?? new YamlRecordingPersister(config.recording.dir),
      forwarders: overrides.forwarders ?? defaultForwarders(config, logger),
      autosave: config.recording.autosave,
      logger
    });
  }

  let metrics: SimulatorMetrics;
  let metricsSnapshot: (() => Record<string, number>) | undefined;
  if (overrides.metrics) {
    metrics = overrides.metrics;
  } else {
    const buckets = createBucketMetrics();
    metrics = buckets;
    metricsSnapshot = () => snapshotMetrics(buckets);
  }

  const pipeline = new SimulatorPipeline({
    config,
    validator: new CredentialValidator(config.apiKey, logger),
    producer: selectProducer(config.mode, {
      generate: new GeneratorProducer(overrides.generators ?? DEFAULT_GENERATORS),
      recordReplay
    }),
    limiters: createLimiterRegistry(config, logger),
    latency: new LatencyEmulator(),
    metrics: new MetricsRecorder(metrics, logger),
    logger
  });

  const server = new SimulatorServer({
    pipeline,
    mode: config.mode,
    recordReplay,
    metricsSnapshot,
    logger
  });

  return { server, pipeline, recordReplay };
}

function defaultForwarders(config: SimulatorConfig, logger: Logger): Forwarder[] {
  const forwarders: Forwarder[] = [];
  if (config.azureOpenAI) forwarders.push(createAzureOpenAIForwarder(config.azureOpenAI));
  if (config.azureFormRecognizer) forwarders.push(createDocIntelligenceForwarder(config.azureFormRecognizer));
  if (config.mode === "record" && forwarders.length === 0) {
    logger.warn("record mode without any upstream configured; every request will fail");
  }
  return forwarders;
}

