import { Readable } from "stream";
import { google } from "googleapis";
import type { drive_v3 } from "googleapis";
import { z } from "zod";
import { logger as defaultLogger } from "../config/logger";
import type { Logger } from "../config/logger";
import { FatalAuthError, TransientBackendError, classifyDriveError } from "../utils/errors";
import type { AssetStore } from "./AssetStore";

export const DRIVE_FILE_SCOPE = "https://www.googleapis.com/auth/drive.file";
export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

/**
 * The service account key arrives base64-encoded in an env var; plain JSON is accepted too.
 */
export function decodeServiceAccount(encoded: string | undefined): ServiceAccountCredentials {
  if (!encoded) {
    throw new FatalAuthError("GOOGLE_SERVICE_ACCOUNT_JSON is not configured");
  }

  const trimmed = encoded.trim();
  const json = trimmed.startsWith("{") ? trimmed : Buffer.from(trimmed, "base64").toString("utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new FatalAuthError("Service account credentials are not valid JSON", { cause: error });
  }

  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FatalAuthError("Service account credentials lack client_email or private_key");
  }
  return parsed.data;
}

/** Drive query literals are single-quoted; backslash and quote must be escaped. */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export function folderQuery(name: string, parentId: string): string {
  return (
    `name='${escapeQueryValue(name)}' and ` +
    `mimeType='${FOLDER_MIME_TYPE}' and ` +
    `'${escapeQueryValue(parentId)}' in parents and ` +
    `trashed=false`
  );
}

export class GoogleDriveAssetStore implements AssetStore {
  constructor(
    private readonly drive: drive_v3.Drive,
    private readonly logger: Logger = defaultLogger
  ) {}

  static fromServiceAccount(encoded: string | undefined, logger: Logger = defaultLogger): GoogleDriveAssetStore {
    const credentials = decodeServiceAccount(encoded);
    const auth = new google.auth.GoogleAuth({
      credentials: { client_email: credentials.client_email, private_key: credentials.private_key },
      scopes: [DRIVE_FILE_SCOPE],
    });

    logger.info({
      event: 'DRIVE_CLIENT_CREATED',
      serviceAccount: credentials.client_email,
    }, `✅ Google Drive client created for ${credentials.client_email}`);

    return new GoogleDriveAssetStore(google.drive({ version: "v3", auth }), logger);
  }

  async listFolder(name: string, parentId: string): Promise<string | null> {
    try {
      const res = await this.drive.files.list({
        q: folderQuery(name, parentId),
        spaces: "drive",
        fields: "files(id, name)",
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      });
      return res.data.files?.[0]?.id ?? null;
    } catch (error) {
      throw classifyDriveError(error, `list folder '${name}'`);
    }
  }

  async createFolder(name: string, parentId: string): Promise<string> {
    let id: string | null | undefined;
    try {
      const res = await this.drive.files.create({
        requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
        fields: "id",
        supportsAllDrives: true,
      });
      id = res.data.id;
    } catch (error) {
      throw classifyDriveError(error, `create folder '${name}'`);
    }

    if (!id) throw new TransientBackendError(`create folder '${name}' returned no id`);
    this.logger.info({ event: 'DRIVE_FOLDER_CREATED', name, parentId, folderId: id }, `📁 Folder '${name}' created`);
    return id;
  }

  async createFile(name: string, parentId: string, bytes: Buffer, mimeType: string): Promise<string> {
    let id: string | null | undefined;
    try {
      const res = await this.drive.files.create({
        requestBody: { name, parents: [parentId] },
        media: { mimeType, body: Readable.from(bytes) },
        fields: "id",
        supportsAllDrives: true,
      });
      id = res.data.id;
    } catch (error) {
      throw classifyDriveError(error, `upload '${name}'`);
    }

    if (!id) throw new TransientBackendError(`upload '${name}' returned no id`);
    return id;
  }
}
