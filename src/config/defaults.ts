import type { MdSiftConfig } from './types.js';

export const CONFIG_FILE = '.mdsift.json';

export const DEFAULT_CONFIG: MdSiftConfig = {
  version: 1,
  store: {
    dir: '.mdsift/cache',
  },
  chunking: {
    maxChars: 3000,
    minChars: 500,
  },
  discovery: {
    concurrency: 4,
  },
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimension: 1536,
    maxBatchSize: 100,
    maxInputChars: 8000,
  },
  relevance: {
    topK: 3,
    maxSections: 3,
    boosts: {
      fileThreshold: 0.5,
      fileWeight: 0.1,
      neighborThreshold: 0.6,
      neighborBoost: 0.05,
      parentThreshold: 0.7,
      parentBoost: 0.03,
    },
  },
  logging: {
    level: 'info',
  },
};
