/**
 * Server & Dataset Store Configuration
 */

export const PORT = parseInt(process.env.PORT || '3000', 10);
export const HOST = process.env.HOST || '0.0.0.0';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

/** Optional CSV file loaded into the store at startup */
export const DATASET_PATH = process.env.DATASET_PATH || '';

/** Largest accepted request body; uploads carry a whole CSV (default 16 MiB) */
export const MAX_UPLOAD_BYTES = parseInt(process.env.MAX_UPLOAD_BYTES || String(16 * 1024 * 1024), 10);

/** Oldest datasets are evicted once the store holds more than this */
export const MAX_DATASETS = parseInt(process.env.MAX_DATASETS || '20', 10);
