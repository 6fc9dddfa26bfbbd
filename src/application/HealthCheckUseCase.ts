import type { CacheStats, ReconcileReport } from '../domain/entities/CacheRecord.js';
import type { ChunkStore } from '../infrastructure/cache/ChunkStore.js';

export interface HealthCheckOptions {
  fix?: boolean;
}

export interface HealthReport {
  healthy: boolean;
  stats: CacheStats;
  /** 只有 fix 模式才會核對 manifest */
  reconcile: ReconcileReport | null;
  issues: string[];
  fixActions: string[];
}

/**
 * 快取健康檢查：回報統計，fix 模式下核對 manifest 與記錄檔。
 *
 * 檢查項目：
 * 1. manifest 項目數與記錄檔數是否一致
 * 2. （fix）指向不存在記錄的項目：移除或刪減
 */
export class HealthCheckUseCase {
  constructor(private readonly store: ChunkStore) {}

  async check(options: HealthCheckOptions = {}): Promise<HealthReport> {
    const issues: string[] = [];
    const fixActions: string[] = [];
    let reconcile: ReconcileReport | null = null;

    const before = await this.store.getCacheStats();
    if (before.chunkEntries !== before.totalFiles) {
      issues.push(`Manifest lists ${before.chunkEntries} records but ${before.totalFiles} record files exist`);
    }

    if (options.fix) {
      const result = await this.store.verifyAndCleanupManifest();
      if (result.ok) {
        reconcile = result.value;
        if (reconcile.chunkEntriesRemoved > 0) {
          fixActions.push(`Removed ${reconcile.chunkEntriesRemoved} entries for missing records`);
        }
        if (reconcile.fileEntriesPruned > 0) {
          fixActions.push(`Pruned ${reconcile.fileEntriesPruned} file entries`);
        }
        if (reconcile.fileEntriesRemoved > 0) {
          fixActions.push(`Removed ${reconcile.fileEntriesRemoved} file entries with no remaining chunks`);
        }
      } else {
        issues.push(result.error.message);
      }
    }

    const stats = options.fix ? await this.store.getCacheStats() : before;
    const needsPruning = reconcile !== null
      && reconcile.chunkEntriesRemoved + reconcile.fileEntriesPruned + reconcile.fileEntriesRemoved > 0;

    return {
      healthy: issues.length === 0 && !needsPruning,
      stats,
      reconcile,
      issues,
      fixActions,
    };
  }
}
