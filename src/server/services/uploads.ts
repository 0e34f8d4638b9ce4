/**
 * Upload Store - writes uploaded executables to the uploads directory
 */
import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

export interface StoredUpload {
  filename: string;
  filepath: string;
  size: number;
}

/**
 * Reduce a client-supplied name to a safe single path segment.
 */
export function sanitizeFilename(name: string): string {
  const base = basename(name.replace(/\\/g, '/')).trim();
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return cleaned === '' ? 'executable' : cleaned;
}

export class UploadStore {
  private last: StoredUpload | undefined;

  constructor(readonly uploadDir: string) {}

  get lastUpload(): StoredUpload | undefined {
    return this.last;
  }

  async save(originalName: string, data: Buffer): Promise<StoredUpload> {
    const filename = sanitizeFilename(originalName);
    const filepath = join(this.uploadDir, filename);

    await mkdir(this.uploadDir, { recursive: true });
    await writeFile(filepath, data);
    await chmod(filepath, 0o755);

    this.last = { filename, filepath, size: data.length };
    console.log(`[Upload] Saved ${filename} (${data.length} bytes) to ${filepath}`);
    return this.last;
  }
}
