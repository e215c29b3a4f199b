/**
 * Hierarchical binary storage as the upload pipeline sees it.
 * Implementations throw TransientBackendError for a failed call and
 * FatalAuthError when the client cannot be used at all.
 */
export interface AssetStore {
  /** Id of a non-trashed folder with exactly this name directly under `parentId`, or null. */
  listFolder(name: string, parentId: string): Promise<string | null>;
  createFolder(name: string, parentId: string): Promise<string>;
  createFile(name: string, parentId: string, bytes: Buffer, mimeType: string): Promise<string>;
}
