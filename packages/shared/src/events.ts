export type WorkerStageV1 = "stabilizing" | "validating" | "uploading" | "archiving" | "cleanup";

export type WatcherEventV1 =
  | {
      type: "task.admitted";
      file: string;
    }
  | {
      type: "upload.failed";
      file: string;
      attempt: number;
      http_status?: number;
      reason: string;
    }
  | {
      type: "upload.succeeded";
      file: string;
      attempts: number;
    }
  | {
      type: "task.completed";
      file: string;
      attempts: number;
    }
  | {
      type: "task.failed";
      file: string;
      stage: WorkerStageV1 | "unknown";
      reason: string;
      attempts: number;
    };

export type WatcherEventType = WatcherEventV1["type"];
