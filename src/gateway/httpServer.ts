import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import { AddressInfo } from "net";
import { describeError } from "../errors";
import { SimulatorPipeline } from "../pipeline/simulatorPipeline";
import { RecordReplayHandler } from "../recordReplay/recordReplayHandler";
import { jsonResponse, textResponse, unauthorizedResponse } from "../responses";
import { Logger, SimRequest, SimResponse, SimulatorMode } from "../types";

export const SAVE_RECORDINGS_PATH = "/++/save-recordings";
export const METRICS_PATH = "/++/metrics";

type ServerDeps = {
  pipeline: SimulatorPipeline;
  mode: SimulatorMode;
  recordReplay?: RecordReplayHandler;
  metricsSnapshot?: () => Record<string, number>;
  logger: Logger;
};

/**
 * HTTP front: the liveness probe and management actions are answered here,
 * every other method/path goes through the pipeline.
 */
export class SimulatorServer {
  private readonly server: Server;

  constructor(private readonly deps: ServerDeps) {
    this.server = createServer((req, res) => {
      void this.handle(req, res);
    });
  }

  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const request = await toSimRequest(req);
      const response = await this.route(request);
      res.writeHead(response.status, { ...response.headers });
      res.end(response.body);
    } catch (err) {
      this.deps.logger.error("failed to handle %s %s: %s", req.method, req.url, describeError(err));
      if (!res.headersSent) res.writeHead(500);
      res.end();
    }
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(port, host, () => {
        this.server.off("error", reject);
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error(`unexpected server address: ${String(address)}`));
          return;
        }
        resolve(address);
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async route(request: SimRequest): Promise<SimResponse> {
    const path = request.url.split("?", 1)[0];
    if (path === "/" && request.method === "GET") {
      return jsonResponse(200, { message: "👋 aoai-simulated-api is running" });
    }
    if (path === SAVE_RECORDINGS_PATH && request.method === "POST") {
      return this.saveRecordings(request);
    }
    if (path === METRICS_PATH && request.method === "GET" && this.deps.metricsSnapshot) {
      if (!this.deps.pipeline.authenticate(request).ok) return unauthorizedResponse();
      return jsonResponse(200, this.deps.metricsSnapshot());
    }
    this.deps.logger.debug("handling route: %s", request.url);
    return this.deps.pipeline.handle(request);
  }

  private async saveRecordings(request: SimRequest): Promise<SimResponse> {
    if (!this.deps.pipeline.authenticate(request).ok) return unauthorizedResponse();

    const handler = this.deps.recordReplay;
    if (this.deps.mode !== "record" || !handler) {
      this.deps.logger.warn("not saving recordings as not in record mode");
      return textResponse(400, "⚠️ Not saving recordings as not in record mode");
    }
    this.deps.logger.info("saving recordings...");
    await handler.save();
    this.deps.logger.info("recordings saved");
    return textResponse(200, "📼 Recordings saved");
  }
}

export async function toSimRequest(req: IncomingMessage): Promise<SimRequest> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return {
    method: (req.method ?? "GET").toUpperCase(),
    url: req.url ?? "/",
    headers,
    body: Buffer.concat(chunks)
  };
}
