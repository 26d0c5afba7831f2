import { EventEmitter } from "events";
import type { TuningJobStatus } from "../schemas.js";

export type LifecycleOutcome = "completed" | "failed" | "cancelled";

export interface StatusEventPayload {
  jobId: string;
  status: TuningJobStatus;
}

export interface SettledEventPayload {
  jobId: string;
  outcome: LifecycleOutcome;
}

interface LifecycleEvents {
  "tuning-job:status": [payload: StatusEventPayload];
  "tuning-job:settled": [payload: SettledEventPayload];
}

export class LifecycleEventBus extends EventEmitter {
  emit<K extends keyof LifecycleEvents>(event: K, ...args: LifecycleEvents[K]): boolean {
    return super.emit(event, ...args);
  }
  on<K extends keyof LifecycleEvents>(event: K, listener: (...args: LifecycleEvents[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }
  off<K extends keyof LifecycleEvents>(event: K, listener: (...args: LifecycleEvents[K]) => void): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }
}

export const lifecycleBus = new LifecycleEventBus();
