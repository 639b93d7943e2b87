import { invokeGenerators } from "../generator/generators";
import { RequestContext, ResponseGenerator, ResponseProducer, SimResponse, SimulatorMode } from "../types";

export class GeneratorProducer implements ResponseProducer {
  constructor(private readonly generators: readonly ResponseGenerator[]) {}

  handle(context: RequestContext): Promise<SimResponse | undefined> {
    return invokeGenerators(context, this.generators);
  }
}

export type Producers = {
  generate: ResponseProducer;
  recordReplay?: ResponseProducer;
};

/** Picks the single producer used for the lifetime of the process. */
export function selectProducer(mode: SimulatorMode, producers: Producers): ResponseProducer {
  switch (mode) {
    case "generate":
      return producers.generate;
    case "record":
    case "replay":
      if (!producers.recordReplay) {
        throw new Error(`mode ${mode} requires a record/replay handler`);
      }
      return producers.recordReplay;
    default: {
      const unreachable: never = mode;
      throw new Error(`unknown simulator mode: ${String(unreachable)}`);
    }
  }
}
