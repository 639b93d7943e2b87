import * as fs from "fs/promises";
import * as path from "path";
import * as YAML from "yaml";
import { z } from "zod";
import { RecordingError } from "../errors";
import { RecordedInteraction, RecordingPersister } from "./types";

const interactionSchema = z.object({
  request: z.object({
    method: z.string(),
    url: z.string(),
    bodyHash: z.string()
  }),
  response: z.object({
    status: z.number().int().min(100).max(599),
    headers: z.record(z.string()),
    body: z.string()
  }),
  durationMs: z.number().nonnegative(),
  contextValues: z.object({
    limiterKey: z.string().optional(),
    deploymentName: z.string().optional(),
    tokenCount: z.number().optional()
  })
});

const recordingFileSchema = z.object({
  interactions: z.array(interactionSchema)
});

export class YamlRecordingPersister implements RecordingPersister {
  constructor(private readonly dir: string) {}

  async load(): Promise<Map<string, RecordedInteraction[]>> {
    const recordings = new Map<string, RecordedInteraction[]>();
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return recordings;
      throw err;
    }

    for (const entry of entries.filter((e) => e.endsWith(".yaml")).sort()) {
      const file = path.join(this.dir, entry);
      const parsed = recordingFileSchema.safeParse(parseYaml(await fs.readFile(file, "utf8"), file));
      if (!parsed.success) {
        throw new RecordingError(`invalid recording: ${parsed.error.issues[0]?.message ?? "unknown"}`, file);
      }
      recordings.set(entry.slice(0, -".yaml".length), parsed.data.interactions);
    }
    return recordings;
  }

  async save(name: string, interactions: readonly RecordedInteraction[]): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const file = path.join(this.dir, `${name}.yaml`);
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, YAML.stringify({ interactions }), "utf8");
    await fs.rename(tmp, file);
  }
}

function parseYaml(text: string, file: string): unknown {
  try {
    return YAML.parse(text);
  } catch (err) {
    throw new RecordingError(`unreadable recording: ${err instanceof Error ? err.message : String(err)}`, file);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
