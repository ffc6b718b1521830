/**
 * Storage Factory - Creates store components from one resolved config.
 *
 * Swap the factory to back a store with a different IStoreFile
 * (an in-memory one in tests, for instance).
 */

import { StoreConfig, ResolvedStoreConfig, resolveStoreConfig } from '../common/Config';
import { StoreFile } from '../storage/file';
import { ExpiringStore } from '../storage/ExpiringStore';
import { IExpiringStore, IStoreFile, IStoreFactory } from '../interfaces/Storage';

export class DefaultStoreFactory implements IStoreFactory {
  private readonly config: ResolvedStoreConfig;

  constructor(config: Partial<StoreConfig> = {}) {
    this.config = resolveStoreConfig(config);
  }

  createStoreFile(): IStoreFile {
    return new StoreFile({
      filePath: this.config.filePath,
      logger: this.config.logger,
    });
  }

  createStore(): IExpiringStore {
    return new ExpiringStore(this.config, {
      storeFile: this.createStoreFile(),
    });
  }
}
