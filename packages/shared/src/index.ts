export type { HealthResponseV1, StatusSnapshotV1 } from "./status.js";
export type { WatcherEventType, WatcherEventV1, WorkerStageV1 } from "./events.js";
