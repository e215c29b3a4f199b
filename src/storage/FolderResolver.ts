import { logger as defaultLogger } from "../config/logger";
import type { Logger } from "../config/logger";
import type { AssetStore } from "./AssetStore";

/**
 * Finds-or-creates a folder by exact name under a parent. One resolver lives for
 * one finalize call, so repeated lookups in the same batch hit the cache while a
 * later session looks the folder up again.
 *
 * Two finalize calls racing on the same name can both miss and both create;
 * the backend then holds two folders with that name, which is tolerated.
 */
export class FolderResolver {
  private readonly cache = new Map<string, Promise<string>>();

  constructor(
    private readonly store: AssetStore,
    private readonly logger: Logger = defaultLogger
  ) {}

  resolve(name: string, parentId: string): Promise<string> {
    const key = `${parentId}/${name}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.lookupOrCreate(name, parentId);
    this.cache.set(key, pending);
    // Only successful resolutions stay cached
    pending.catch(() => {
      if (this.cache.get(key) === pending) this.cache.delete(key);
    });
    return pending;
  }

  private async lookupOrCreate(name: string, parentId: string): Promise<string> {
    const existing = await this.store.listFolder(name, parentId);
    if (existing) {
      this.logger.info({ event: 'FOLDER_RESOLVED', name, parentId, folderId: existing, created: false }, `📁 Folder '${name}' found`);
      return existing;
    }

    const created = await this.store.createFolder(name, parentId);
    this.logger.info({ event: 'FOLDER_RESOLVED', name, parentId, folderId: created, created: true }, `✅ Folder '${name}' created with id ${created}`);
    return created;
  }
}
