import fs from 'fs';

function isNotFound(error: unknown): boolean {
  // fs errors may come from another realm, so check the shape rather than the class
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a UTF-8 file, returning null only when it does not exist
 */
export function readOptionalFile(filepath: string): string | null {
  try {
    return fs.readFileSync(filepath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}
