import fs from 'fs';
import path from 'path';

export interface RotateFileOptions {
  /** Directory where the file resides */
  dir: string;
  /** Base file name to rotate (e.g., edge-analyzer.log) */
  filename: string;
  /** Retention period in days (default: 7) */
  retentionDays?: number;
  /** Date used for the rotated name, defaults to now */
  now?: Date;
}

export interface RotateFileResult {
  /** Path the live file was moved to, if it was rotated */
  rotatedTo?: string;
  /** Rotated files removed for being older than the retention period */
  deleted: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Move `<base><ext>` to `<base>-<YYYY-MM-DD><ext>` once per day and delete
 * rotated files past the retention period.
 */
export function rotateFile({
  dir,
  filename,
  retentionDays = 7,
  now = new Date(),
}: RotateFileOptions): RotateFileResult {
  const result: RotateFileResult = { deleted: [] };
  if (!fs.existsSync(dir)) {
    return result;
  }

  const day = now.toISOString().slice(0, 10);
  const ext = path.extname(filename);
  const base = path.basename(filename, ext);

  const livePath = path.join(dir, filename);
  const rotatedPath = path.join(dir, `${base}-${day}${ext}`);
  if (fs.existsSync(livePath) && !fs.existsSync(rotatedPath)) {
    fs.renameSync(livePath, rotatedPath);
    result.rotatedTo = rotatedPath;
  }

  const rotatedPattern = new RegExp(`^${escapeRegExp(base)}-(\\d{4}-\\d{2}-\\d{2})${escapeRegExp(ext)}$`);
  const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;

  for (const file of fs.readdirSync(dir)) {
    const match = rotatedPattern.exec(file);
    if (!match) {
      continue;
    }
    const rotatedAt = new Date(match[1]).getTime();
    if (!Number.isNaN(rotatedAt) && rotatedAt < cutoff) {
      fs.unlinkSync(path.join(dir, file));
      result.deleted.push(file);
    }
  }

  return result;
}
