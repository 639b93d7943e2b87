import { createHash } from "crypto";
import { describeError } from "../errors";
import { Logger, RequestContext, ResponseProducer, SimRequest, SimResponse } from "../types";
import { now } from "../utils/time";
import { Forwarder, RecordedInteraction, RecordingPersister } from "./types";

export type RecordReplayOptions = {
  mode: "record" | "replay";
  persister: RecordingPersister;
  forwarders?: readonly Forwarder[];
  autosave?: boolean;
  logger: Logger;
  clock?: () => number;
};

export function recordingName(url: string): string {
  const path = url.split("?", 1)[0];
  const name = path.replace(/[^a-zA-Z0-9]+/g, "_").replace(/^_+|_+$/g, "");
  return name || "root";
}

export function requestKey(req: Pick<SimRequest, "method" | "url">, bodyHash: string): string {
  return `${req.method.toUpperCase()} ${req.url} ${bodyHash}`;
}

export function hashBody(body: Buffer): string {
  return createHash("sha256").update(body).digest("hex");
}

/**
 * Record mode forwards to a real upstream and buffers each exchange; replay
 * mode answers from previously saved exchanges. Saves are queued so a save
 * never interleaves with another and exchanges appended mid-save are written
 * by the next one.
 */
export class RecordReplayHandler implements ResponseProducer {
  private recordings?: Map<string, RecordedInteraction[]>;
  private index = new Map<string, RecordedInteraction>();
  private loading?: Promise<void>;
  private readonly dirty = new Set<string>();
  private saveQueue: Promise<void> = Promise.resolve();
  private readonly clock: () => number;

  constructor(private readonly opts: RecordReplayOptions) {
    this.clock = opts.clock ?? now;
  }

  get mode(): "record" | "replay" {
    return this.opts.mode;
  }

  async handle(context: RequestContext): Promise<SimResponse | undefined> {
    await this.ensureLoaded();
    return this.opts.mode === "replay" ? this.replay(context) : this.record(context);
  }

  save(): Promise<void> {
    const next = this.saveQueue.then(() => this.flush());
    // the failure is reported to this caller; later saves still run
    this.saveQueue = next.catch(() => undefined);
    return next;
  }

  private replay(context: RequestContext): SimResponse | undefined {
    const { request } = context;
    const hit = this.index.get(requestKey(request, hashBody(request.body)));
    if (!hit) {
      this.opts.logger.debug("no recording found for %s %s", request.method, request.url);
      return undefined;
    }
    Object.assign(context.values, hit.contextValues, { recordedDurationMs: hit.durationMs });
    return { status: hit.response.status, headers: { ...hit.response.headers }, body: hit.response.body };
  }

  private async record(context: RequestContext): Promise<SimResponse | undefined> {
    const startedAt = this.clock();
    let response: SimResponse | undefined;
    for (const forward of this.opts.forwarders ?? []) {
      response = await forward(context);
      if (response) break;
    }
    if (!response) return undefined;

    const { request, values } = context;
    const interaction: RecordedInteraction = {
      request: { method: request.method.toUpperCase(), url: request.url, bodyHash: hashBody(request.body) },
      response: { status: response.status, headers: { ...response.headers }, body: response.body },
      durationMs: Math.round(this.clock() - startedAt),
      contextValues: {
        limiterKey: values.limiterKey,
        deploymentName: values.deploymentName,
        tokenCount: values.tokenCount
      }
    };
    this.append(recordingName(request.url), interaction);

    if (this.opts.autosave) {
      try {
        await this.save();
      } catch (err) {
        this.opts.logger.error("autosave failed: %s", describeError(err));
      }
    }
    return response;
  }

  private append(name: string, interaction: RecordedInteraction): void {
    const recordings = this.loaded();
    const list = recordings.get(name) ?? [];
    list.push(interaction);
    recordings.set(name, list);
    this.dirty.add(name);
  }

  private async flush(): Promise<void> {
    await this.ensureLoaded();
    const recordings = this.loaded();
    const names = [...this.dirty];
    this.dirty.clear();
    for (const name of names) {
      const snapshot = [...(recordings.get(name) ?? [])];
      try {
        await this.opts.persister.save(name, snapshot);
      } catch (err) {
        this.dirty.add(name);
        throw err;
      }
    }
  }

  private ensureLoaded(): Promise<void> {
    this.loading ??= this.opts.persister.load().then(
      (recordings) => {
        this.recordings = recordings;
        for (const interactions of recordings.values()) {
          for (const interaction of interactions) {
            this.index.set(requestKey(interaction.request, interaction.request.bodyHash), interaction);
          }
        }
      },
      (err: unknown) => {
        // allow the next request to retry the load
        this.loading = undefined;
        throw err;
      }
    );
    return this.loading;
  }

  private loaded(): Map<string, RecordedInteraction[]> {
    if (!this.recordings) throw new Error("recordings accessed before load completed");
    return this.recordings;
  }
}
