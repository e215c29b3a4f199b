import { logger as defaultLogger } from "../config/logger";
import type { Logger } from "../config/logger";
import { PHOTO_MIME_TYPE, buildFileName, folderNameFor } from "../inventory/catalog";
import { photosOf, totalPhotos } from "../state/session";
import type { Session } from "../state/session";
import type { AssetStore } from "../storage/AssetStore";
import { FolderResolver } from "../storage/FolderResolver";
import { FatalAuthError, describeError } from "../utils/errors";
import type {
  AbortedReport,
  CompletedReport,
  FinalizeReport,
  PhotoSource,
  PipelineEvent,
  PipelineListener,
  PlannedUpload,
  UploadOutcome,
  UploadSummary,
} from "./types";

export interface UploadPipelineOptions {
  /** Called once per finalize; may throw FatalAuthError when credentials are unusable. */
  connectStore: () => AssetStore | Promise<AssetStore>;
  photos: PhotoSource;
  rootFolderId: string;
  /** Transfers in flight at once. Outcome order never depends on it. */
  concurrency?: number;
  logger?: Logger;
}

/** Every photo of the session in upload order: sub-items as selected, photos as received. */
export function planUploads(session: Session): PlannedUpload[] {
  const plan: PlannedUpload[] = [];
  for (const subItem of session.subItems) {
    photosOf(session, subItem).forEach((photo, index) => {
      const ordinal = index + 1;
      plan.push({
        position: plan.length + 1,
        subItem,
        ordinal,
        fileName: buildFileName(session.pointOfSale, session.containerCategory, subItem, ordinal),
        photo,
      });
    });
  }
  return plan;
}

export function summarize(session: Session): UploadSummary {
  return {
    pointOfSale: session.pointOfSale,
    container: session.containerCategory,
    folderName: folderNameFor(session.pointOfSale),
    photosPerSubItem: session.subItems.map((subItem) => ({ subItem, count: photosOf(session, subItem).length })),
    total: totalPhotos(session),
  };
}

/**
 * Best-effort batch upload of a finished session. A failed photo is recorded and
 * the batch moves on; only unusable credentials stop it, and only before the
 * first transfer.
 */
export class UploadPipeline {
  private readonly logger: Logger;
  private readonly concurrency: number;

  constructor(private readonly options: UploadPipelineOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  async run(session: Session, listener?: PipelineListener): Promise<FinalizeReport> {
    const emit = (event: PipelineEvent) => this.emit(session, event, listener);
    const summary = summarize(session);
    const plan = planUploads(session);
    const startedAt = Date.now();

    this.logger.info({
      event: 'FINALIZE_START',
      conversationId: session.conversationId,
      pointOfSale: summary.pointOfSale,
      container: summary.container,
      totalPhotos: summary.total,
    }, `🏁 FINALIZE_START: ${summary.folderName} | ${summary.container} | ${summary.total} photos`);

    await emit({ type: "started", summary });

    let store: AssetStore | undefined;
    let folderId: string | undefined;
    let folderFailure: string | undefined;
    try {
      store = await this.options.connectStore();
      folderId = await new FolderResolver(store, this.logger).resolve(summary.folderName, this.options.rootFolderId);
    } catch (error) {
      if (error instanceof FatalAuthError) {
        const report: AbortedReport = { status: "aborted", summary, reason: error.message, outcomes: [] };
        this.logger.error({
          event: 'FINALIZE_ABORTED',
          conversationId: session.conversationId,
          reason: error.message,
        }, `❌ FINALIZE_ABORTED: storage unavailable: ${error.message}`);
        await emit({ type: "aborted", report });
        return report;
      }
      folderFailure = describeError(error);
      this.logger.error({
        event: 'FOLDER_RESOLUTION_FAILED',
        conversationId: session.conversationId,
        folderName: summary.folderName,
        error: folderFailure,
      }, `❌ FOLDER_RESOLUTION_FAILED: ${summary.folderName}: ${folderFailure}`);
    }

    let outcomes: UploadOutcome[];
    if (store === undefined || folderId === undefined) {
      outcomes = plan.map((item) => this.failed(item, `folder ${summary.folderName}: ${folderFailure ?? "unavailable"}`));
      for (const [index, outcome] of outcomes.entries()) {
        await emit({ type: "outcome", position: index + 1, outcome });
      }
    } else {
      outcomes = await this.transferAll(store, folderId, plan, emit);
    }

    const succeeded = outcomes.filter((outcome) => outcome.status === "success").length;
    const report: CompletedReport = {
      status: "completed",
      summary,
      folderId,
      outcomes,
      succeeded,
      failed: outcomes.length - succeeded,
    };

    this.logger.info({
      event: 'FINALIZE_COMPLETE',
      conversationId: session.conversationId,
      folderId,
      succeeded: report.succeeded,
      failed: report.failed,
      duration: Date.now() - startedAt,
    }, `✅ FINALIZE_COMPLETE: ${summary.folderName} | ok ${report.succeeded} | failed ${report.failed}`);

    await emit({ type: "completed", report });
    return report;
  }

  /** Bounded fan-out; each worker writes its result back by index so order follows the plan. */
  private async transferAll(
    store: AssetStore,
    folderId: string,
    plan: PlannedUpload[],
    emit: (event: PipelineEvent) => Promise<void>
  ): Promise<UploadOutcome[]> {
    const outcomes: UploadOutcome[] = new Array(plan.length);
    let cursor = 0;

    const worker = async () => {
      while (cursor < plan.length) {
        const index = cursor++;
        const item = plan[index];
        await emit({ type: "progress", position: item.position, total: plan.length, fileName: item.fileName });
        const outcome = await this.transfer(store, folderId, item);
        outcomes[index] = outcome;
        await emit({ type: "outcome", position: item.position, outcome });
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, plan.length) }, () => worker());
    await Promise.all(workers);
    return outcomes;
  }

  private async transfer(store: AssetStore, folderId: string, item: PlannedUpload): Promise<UploadOutcome> {
    try {
      const bytes = await this.options.photos.fetchPhoto(item.photo);
      const fileId = await store.createFile(item.fileName, folderId, bytes, PHOTO_MIME_TYPE);
      this.logger.info({ event: 'PHOTO_UPLOADED', fileName: item.fileName, fileId, size: bytes.length }, `✅ Photo uploaded: ${item.fileName}`);
      return { fileName: item.fileName, subItem: item.subItem, ordinal: item.ordinal, status: "success", fileId };
    } catch (error) {
      const detail = describeError(error);
      this.logger.error({ event: 'PHOTO_UPLOAD_FAILED', fileName: item.fileName, mediaId: item.photo.mediaId, error: detail }, `❌ Failed to upload ${item.fileName}: ${detail}`);
      return this.failed(item, detail);
    }
  }

  private failed(item: PlannedUpload, detail: string): UploadOutcome {
    return { fileName: item.fileName, subItem: item.subItem, ordinal: item.ordinal, status: "failed", errorDetail: detail };
  }

  /** Listener trouble (e.g. a progress message that cannot be sent) never touches the batch. */
  private async emit(session: Session, event: PipelineEvent, listener?: PipelineListener): Promise<void> {
    if (!listener) return;
    try {
      await listener(event);
    } catch (error) {
      this.logger.warn({
        event: 'PIPELINE_LISTENER_FAILED',
        conversationId: session.conversationId,
        pipelineEvent: event.type,
        error: describeError(error),
      }, `⚠️ Progress listener failed on ${event.type}`);
    }
  }
}
