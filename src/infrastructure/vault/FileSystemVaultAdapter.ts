import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { MarkdownListing, VaultPort } from '../../domain/ports/VaultPort.js';
import { errorMessage } from '../../shared/Logger.js';

const MARKDOWN_EXT = '.md';

export class FileSystemVaultAdapter implements VaultPort {
  async directoryExists(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async listMarkdownFiles(dirPath: string): Promise<MarkdownListing> {
    const listing: MarkdownListing = { files: [], unreadable: [] };
    await this.walkDir(path.resolve(dirPath), listing);
    listing.files.sort();
    return listing;
  }

  /** 遞迴走訪目錄，收集 .md 檔案（跳過隱藏目錄） */
  private async walkDir(dir: string, listing: MarkdownListing): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      listing.unreadable.push({ path: dir, error: errorMessage(err) });
      return;
    }
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.')) {
          await this.walkDir(fullPath, listing);
        }
      } else if (entry.isFile() && entry.name.endsWith(MARKDOWN_EXT)) {
        listing.files.push(fullPath);
      }
    }
  }
}
