export { createTuningJobsRouter, type TuningJobsRouterOptions } from "./router.js";
export {
  TUNING_JOB_COLLECTION,
  listTuningJobs,
  createTuningJob,
  getTuningJob,
  updateTuningJobStatus,
  type ListTuningJobsOptions,
  type CreatedTuningJob,
} from "./service.js";
export {
  LifecycleSimulator,
  DEFAULT_STEP_DELAY_MS,
  type LifecycleOptions,
  type LifecycleRun,
} from "./lifecycle.js";
export {
  lifecycleBus,
  LifecycleEventBus,
  type LifecycleOutcome,
  type StatusEventPayload,
  type SettledEventPayload,
} from "./events.js";
