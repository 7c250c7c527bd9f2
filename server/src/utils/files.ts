/**
 * File helpers for staged audio
 */
import { access, unlink } from 'fs/promises';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Deletes a temp file
 * @returns The error when removal failed for a reason other than the file being gone
 */
export async function removeFile(filePath: string): Promise<Error | null> {
  try {
    await unlink(filePath);
    return null;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
