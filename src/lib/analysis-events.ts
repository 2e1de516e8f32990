import { EventEmitter } from "events";
import type { PipelineEvent } from "@/analysis/types";

// Prefixed so a run id can never collide with EventEmitter's "error" event
function channel(runId: string): string {
  return `run:${runId}`;
}

/**
 * In-process event bus for pipeline progress. Listeners subscribe per run
 * id; the pipeline emits started, per-stage and final events.
 */
export class AnalysisEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  emit(event: PipelineEvent): void {
    this.emitter.emit(channel(event.runId), event);
  }

  subscribe(runId: string, listener: (event: PipelineEvent) => void): void {
    this.emitter.on(channel(runId), listener);
  }

  unsubscribe(runId: string, listener: (event: PipelineEvent) => void): void {
    this.emitter.off(channel(runId), listener);
  }

  listenerCount(runId: string): number {
    return this.emitter.listenerCount(channel(runId));
  }
}

/** Process-wide bus used when the caller does not inject one. */
export const analysisEvents = new AnalysisEventBus();
