import { setTimeout as sleep } from "timers/promises";
import { NotFoundError } from "../errors.js";
import { log } from "../logger.js";
import type { TuningJobStatus } from "../schemas.js";
import type { DocumentId, DocumentStore } from "../store/index.js";
import { lifecycleBus, type LifecycleEventBus, type LifecycleOutcome } from "./events.js";
import { TUNING_JOB_COLLECTION } from "./service.js";

export const DEFAULT_STEP_DELAY_MS = 2000;

// Each step waits one delay, then writes its status
const STEPS: readonly TuningJobStatus[] = ["running", "completed"];

export interface LifecycleOptions {
  stepDelayMs?: number;
  bus?: LifecycleEventBus;
}

export interface LifecycleRun {
  jobId: string;
  /** Resolves once the run settles. Never rejects. */
  done: Promise<LifecycleOutcome>;
  cancel(): void;
}

/**
 * Advances freshly created tuning jobs through queued -> running -> completed
 * in the background. Writes are unconditional: an explicit status update that
 * lands between steps is overwritten by the next step (last write wins).
 */
export class LifecycleSimulator {
  private readonly runs = new Map<string, LifecycleRun>();
  private readonly stepDelayMs: number;
  private readonly bus: LifecycleEventBus;

  constructor(
    private readonly store: DocumentStore,
    options: LifecycleOptions = {},
  ) {
    this.stepDelayMs = options.stepDelayMs ?? DEFAULT_STEP_DELAY_MS;
    this.bus = options.bus ?? lifecycleBus;
  }

  start(id: DocumentId): LifecycleRun {
    const jobId = id.toString();
    const existing = this.runs.get(jobId);
    if (existing) return existing;

    const controller = new AbortController();
    const done = this.advance(id, controller.signal).then((outcome) => {
      this.runs.delete(jobId);
      log.info("lifecycle", `tuning job ${jobId} settled: ${outcome}`);
      this.bus.emit("tuning-job:settled", { jobId, outcome });
      return outcome;
    });

    const run: LifecycleRun = {
      jobId,
      done,
      cancel: () => controller.abort(),
    };
    this.runs.set(jobId, run);
    log.debug("lifecycle", `tuning job ${jobId} scheduled (step ${this.stepDelayMs}ms)`);
    return run;
  }

  activeRuns(): string[] {
    return Array.from(this.runs.keys());
  }

  /** Cancel every in-flight run and wait for them to settle. */
  async stopAll(): Promise<void> {
    const runs = Array.from(this.runs.values());
    for (const run of runs) run.cancel();
    await Promise.all(runs.map((run) => run.done));
  }

  private async advance(id: DocumentId, signal: AbortSignal): Promise<LifecycleOutcome> {
    try {
      for (const status of STEPS) {
        await sleep(this.stepDelayMs, undefined, { signal });
        await this.writeStatus(id, status);
      }
      return "completed";
    } catch (err) {
      if (signal.aborted) {
        return "cancelled";
      }
      log.warn("lifecycle", `tuning job ${id.toString()} failed:`, err);
      try {
        await this.writeStatus(id, "failed");
      } catch (markErr) {
        log.error("lifecycle", `could not mark tuning job ${id.toString()} failed:`, markErr);
      }
      return "failed";
    }
  }

  private async writeStatus(id: DocumentId, status: TuningJobStatus): Promise<void> {
    const updated = await this.store.updateById(TUNING_JOB_COLLECTION, id, { status });
    if (!updated) {
      throw new NotFoundError(`tuning job ${id.toString()} no longer exists`);
    }
    log.info("lifecycle", `tuning job ${id.toString()} -> ${status}`);
    this.bus.emit("tuning-job:status", { jobId: id.toString(), status });
  }
}
