import { describe, it, expect } from 'vitest';
import { ContentHash } from '../../../src/domain/value-objects/ContentHash.js';
import {
  breadcrumb,
  fileIdFor,
  headingChunkId,
  splitChunkId,
  queryCacheKey,
} from '../../../src/domain/value-objects/ChunkIdentity.js';

describe('ChunkIdentity', () => {
  it('should join heading paths with " > "', () => {
    expect(breadcrumb(['Overview', 'Setup'])).toBe('Overview > Setup');
    expect(breadcrumb([])).toBe('');
  });

  it('should derive the file id from the path only', () => {
    expect(fileIdFor('/docs/a.md')).toBe(ContentHash.fromText('/docs/a.md').value);
  });

  it('should derive heading ids from file id and breadcrumb', () => {
    const fileId = fileIdFor('/docs/a.md');
    expect(headingChunkId(fileId, ['Overview', 'Setup'])).toBe(
      ContentHash.fromText(`${fileId}_Overview > Setup`).value,
    );
  });

  it('should use only the first 50 characters of content for split ids', () => {
    const fileId = fileIdFor('/docs/a.md');
    const long = 'x'.repeat(50);
    expect(splitChunkId(fileId, 3, long + 'tail one')).toBe(splitChunkId(fileId, 3, long + 'tail two'));
    expect(splitChunkId(fileId, 3, long)).toBe(ContentHash.fromText(`${fileId}_3_${long}`).value);
    expect(splitChunkId(fileId, 4, long)).not.toBe(splitChunkId(fileId, 3, long));
  });

  it('should key cached queries by model and search text', () => {
    expect(queryCacheKey('Goal: x', 'model-a')).toBe(`query_${ContentHash.fromText('model-a_Goal: x').value}`);
    expect(queryCacheKey('Goal: x', 'model-a')).not.toBe(queryCacheKey('Goal: x', 'model-b'));
  });
});
