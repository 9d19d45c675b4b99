export interface StatusSnapshotV1 {
  dir_files: string[];
  working_files: string[];
}

export interface HealthResponseV1 {
  ok: true;
  working: number;
}
