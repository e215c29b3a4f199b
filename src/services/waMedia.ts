import type { AxiosInstance } from "axios";
import type { Logger } from "../config/logger";
import type { PhotoRef } from "../state/session";
import type { WhatsAppMediaInfo } from "../types/whatsapp";
import type { PhotoSource } from "../upload/types";
import { TransientBackendError, describeError, extractErrorDetails } from "../utils/errors";

/** Downloads chat photos through the Graph media endpoints. */
export class WhatsAppMediaSource implements PhotoSource {
  constructor(
    private readonly graph: AxiosInstance,
    private readonly maxBytes: number,
    private readonly logger: Logger
  ) {}

  async fetchMediaUrl(mediaId: string): Promise<WhatsAppMediaInfo> {
    this.logger.debug({ event: 'FETCH_MEDIA_URL_START', mediaId }, `📥 Fetching media URL for: ${mediaId}`);

    const res = await this.graph.get<Partial<WhatsAppMediaInfo>>(`/${mediaId}`);
    const url = res.data?.url;
    if (typeof url !== "string" || !url) {
      throw new TransientBackendError(`media ${mediaId}: no download url`);
    }

    this.logger.debug({
      event: 'FETCH_MEDIA_URL_SUCCESS',
      mediaId,
      mimeType: res.data.mime_type,
      fileSize: res.data.file_size,
    }, `✅ Media URL fetched successfully for: ${mediaId}`);

    return { url, mime_type: res.data.mime_type, file_size: res.data.file_size, id: mediaId };
  }

  async downloadMediaBuffer(url: string): Promise<Buffer> {
    this.logger.debug({ event: 'DOWNLOAD_MEDIA_START', url: url.substring(0, 100) + '...' }, `📥 Downloading media from URL`);

    const res = await this.graph.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      maxContentLength: this.maxBytes,
    });
    const buffer = Buffer.from(res.data);
    if (buffer.length > this.maxBytes) {
      throw new TransientBackendError(`media is ${buffer.length} bytes, limit is ${this.maxBytes}`);
    }

    this.logger.debug({
      event: 'DOWNLOAD_MEDIA_SUCCESS',
      size: buffer.length,
    }, `✅ Media downloaded successfully: ${buffer.length} bytes`);

    return buffer;
  }

  async fetchPhoto(photo: PhotoRef): Promise<Buffer> {
    try {
      const info = await this.fetchMediaUrl(photo.mediaId);
      if (info.file_size !== undefined && info.file_size > this.maxBytes) {
        throw new TransientBackendError(`media is ${info.file_size} bytes, limit is ${this.maxBytes}`);
      }
      return await this.downloadMediaBuffer(info.url);
    } catch (error: unknown) {
      const details = extractErrorDetails(error);
      this.logger.error({
        event: 'FETCH_PHOTO_FAILED',
        mediaId: photo.mediaId,
        error: details,
      }, `❌ Failed to fetch photo ${photo.mediaId}: ${describeError(error)}`);

      if (error instanceof TransientBackendError) throw error;
      throw new TransientBackendError(`media ${photo.mediaId}: ${describeError(error)}`, "transient", details.status, { cause: error });
    }
  }
}
