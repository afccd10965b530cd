import { access } from 'fs/promises';
import { createReadStream } from 'fs';
import { createGunzip } from 'zlib';
import { pipeline, type Readable } from 'stream';
import { UsageError, errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/** Path that selects standard input */
export const STDIN_PATH = '-';

/**
 * Open an index document for streaming. Files ending in `.gz` are
 * gunzipped on the fly; `-` reads standard input as-is. Destroying the
 * returned stream releases the file.
 */
export async function openIndexStream(filePath: string): Promise<Readable> {
  if (filePath === STDIN_PATH) {
    return process.stdin;
  }

  try {
    await access(filePath);
  } catch {
    throw new UsageError(`File not found: ${filePath}`);
  }

  const file = createReadStream(filePath);
  if (!filePath.toLowerCase().endsWith('.gz')) {
    return file;
  }

  // Errors reach the reader through the gunzip stream; destroying it closes the file
  return pipeline(file, createGunzip(), (error) => {
    if (error) {
      logger.debug({ filePath, error: errorMessage(error) }, 'Compressed index stream closed');
    }
  });
}
