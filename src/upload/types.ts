import type { PhotoRef } from "../state/session";

export type UploadStatus = "success" | "failed";

export interface UploadOutcome {
  fileName: string;
  subItem: string;
  ordinal: number;
  status: UploadStatus;
  fileId?: string;
  errorDetail?: string;
}

export interface PlannedUpload {
  /** 1-based position in the batch */
  position: number;
  subItem: string;
  ordinal: number;
  fileName: string;
  photo: PhotoRef;
}

export interface UploadSummary {
  pointOfSale: string;
  container: string;
  folderName: string;
  photosPerSubItem: Array<{ subItem: string; count: number }>;
  total: number;
}

export interface CompletedReport {
  status: "completed";
  summary: UploadSummary;
  folderId?: string;
  outcomes: UploadOutcome[];
  succeeded: number;
  failed: number;
}

export interface AbortedReport {
  status: "aborted";
  summary: UploadSummary;
  reason: string;
  outcomes: [];
}

export type FinalizeReport = CompletedReport | AbortedReport;

export type PipelineEvent =
  | { type: "started"; summary: UploadSummary }
  | { type: "progress"; position: number; total: number; fileName: string }
  | { type: "outcome"; position: number; outcome: UploadOutcome }
  | { type: "completed"; report: CompletedReport }
  | { type: "aborted"; report: AbortedReport };

export type PipelineListener = (event: PipelineEvent) => void | Promise<void>;

/** Resolves a chat-held photo handle to its bytes. */
export interface PhotoSource {
  fetchPhoto(photo: PhotoRef): Promise<Buffer>;
}
