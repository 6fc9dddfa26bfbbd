import { z } from 'zod';
import type { Manifest, ManifestEntry } from '../../domain/entities/CacheRecord.js';
import { ManifestCorruptError } from '../../domain/errors/DomainErrors.js';
import { Err, Ok, type Result } from '../../shared/Result.js';

/** 磁碟上的檔案項目：`{type, hash, chunk_ids, chunk_count}` */
const storedFileEntrySchema = z.object({
  type: z.literal('file').optional(),
  hash: z.string(),
  chunk_ids: z.array(z.string()),
  chunk_count: z.number().int().nonnegative().optional(),
}).passthrough();

/** 磁碟上的記錄項目：`{timestamp, meta}` */
const storedChunkEntrySchema = z.object({
  timestamp: z.string().optional(),
  meta: z.record(z.unknown()).nullable(),
}).passthrough();

export interface DecodedManifest {
  manifest: Manifest;
  /** 形狀不符、被捨棄的 key */
  dropped: string[];
}

/**
 * 解析 manifest.json。整體無法解析時回傳 Err（觸發 recovery），
 * 個別項目形狀不符只會被捨棄。以 `chunk_ids` / `meta` 是否存在區分兩種項目。
 */
export function decodeManifest(raw: string): Result<DecodedManifest, ManifestCorruptError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return Err(new ManifestCorruptError('Manifest is not valid JSON', { cause: err }));
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return Err(new ManifestCorruptError('Manifest root must be an object'));
  }

  const manifest: Manifest = new Map();
  const dropped: string[] = [];

  for (const [key, value] of Object.entries(parsed)) {
    const entry = decodeEntry(value);
    if (entry) manifest.set(key, entry);
    else dropped.push(key);
  }

  return Ok({ manifest, dropped });
}

function decodeEntry(value: unknown): ManifestEntry | null {
  if (typeof value !== 'object' || value === null) return null;

  if ('chunk_ids' in value) {
    const file = storedFileEntrySchema.safeParse(value);
    if (!file.success) return null;
    return {
      kind: 'file',
      contentHash: file.data.hash,
      chunkIds: file.data.chunk_ids,
      chunkCount: file.data.chunk_count ?? file.data.chunk_ids.length,
    };
  }

  if ('meta' in value) {
    const chunk = storedChunkEntrySchema.safeParse(value);
    if (!chunk.success) return null;
    return {
      kind: 'chunk',
      timestamp: chunk.data.timestamp ?? new Date(0).toISOString(),
      meta: chunk.data.meta ?? {},
    };
  }

  return null;
}

export function encodeManifest(manifest: Manifest): string {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of manifest) {
    out[key] = entry.kind === 'file'
      ? { type: 'file', hash: entry.contentHash, chunk_ids: entry.chunkIds, chunk_count: entry.chunkCount }
      : { timestamp: entry.timestamp, meta: entry.meta };
  }
  return JSON.stringify(out, null, 2);
}
