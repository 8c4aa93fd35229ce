import * as fs from 'node:fs';
import * as path from 'node:path';

/** Snapshots live under the project root, next to the sources they protect */
export const SNAPSHOT_DIR = '.hoist/snapshots';

const SNAPSHOT_PREFIX = 'snapshot-';

interface SnapshotManifest {
  createdAt: string;
  description: string;
  files: Array<{ original: string; backup: string }>;
}

export interface SnapshotInfo {
  id: string;
  date: Date;
  description: string;
  fileCount: number;
}

/**
 * Copy files into a new snapshot before they are overwritten.
 *
 * @param files - absolute paths, or paths relative to rootDir
 * @returns the snapshot id, or null when nothing could be written
 */
export function createSnapshot(rootDir: string, files: string[], description = ''): string | null {
  try {
    const baseDir = path.join(rootDir, SNAPSHOT_DIR);
    let snapshotId = `${SNAPSHOT_PREFIX}${Date.now()}`;
    for (let n = 1; fs.existsSync(path.join(baseDir, snapshotId)); n++) {
      snapshotId = `${SNAPSHOT_PREFIX}${Date.now()}-${n}`;
    }
    const snapshotDir = path.join(baseDir, snapshotId);
    fs.mkdirSync(snapshotDir, { recursive: true });

    const manifest: SnapshotManifest = {
      createdAt: new Date().toISOString(),
      description,
      files: [],
    };

    for (const file of files) {
      const fullPath = path.resolve(rootDir, file);
      if (!fs.existsSync(fullPath)) continue;

      const relative = path.relative(rootDir, fullPath).replace(/\\/g, '/');
      const backupPath = path.join(snapshotDir, 'files', relative);
      fs.mkdirSync(path.dirname(backupPath), { recursive: true });
      fs.copyFileSync(fullPath, backupPath);
      manifest.files.push({ original: relative, backup: `files/${relative}` });
    }

    fs.writeFileSync(path.join(snapshotDir, 'manifest.json'), JSON.stringify(manifest, null, 2));
    return snapshotId;
  } catch {
    return null;
  }
}

/**
 * Copy a snapshot's files back and delete the snapshot. Restores the most
 * recent snapshot when no id is given.
 *
 * @returns the restored snapshot id, or null when there was nothing to restore
 */
export function restoreSnapshot(rootDir: string, snapshotId?: string): string | null {
  const baseDir = path.join(rootDir, SNAPSHOT_DIR);
  const id = snapshotId ?? listSnapshots(rootDir)[0]?.id;
  if (!id) return null;

  const snapshotDir = path.join(baseDir, id);
  const manifest = readManifest(path.join(snapshotDir, 'manifest.json'));
  if (!manifest) return null;

  for (const entry of manifest.files) {
    const backupPath = path.join(snapshotDir, entry.backup);
    const originalPath = path.join(rootDir, entry.original);
    if (!fs.existsSync(backupPath)) continue;

    fs.mkdirSync(path.dirname(originalPath), { recursive: true });
    fs.copyFileSync(backupPath, originalPath);
  }

  fs.rmSync(snapshotDir, { recursive: true, force: true });
  return id;
}

/** Snapshots, newest first */
export function listSnapshots(rootDir: string): SnapshotInfo[] {
  const baseDir = path.join(rootDir, SNAPSHOT_DIR);
  if (!fs.existsSync(baseDir)) return [];

  const snapshots: SnapshotInfo[] = [];
  for (const dir of fs.readdirSync(baseDir)) {
    if (!dir.startsWith(SNAPSHOT_PREFIX)) continue;

    const manifest = readManifest(path.join(baseDir, dir, 'manifest.json'));
    if (!manifest) continue;

    snapshots.push({
      id: dir,
      date: new Date(manifest.createdAt),
      description: manifest.description,
      fileCount: manifest.files.length,
    });
  }

  return snapshots.sort((a, b) => {
    const byDate = b.date.getTime() - a.date.getTime();
    if (byDate !== 0 && !Number.isNaN(byDate)) return byDate;
    const [aTime, aRun] = idOrder(a.id);
    const [bTime, bRun] = idOrder(b.id);
    return bTime - aTime || bRun - aRun;
  });
}

/** `snapshot-<ms>[-<n>]` as numbers, so `-10` sorts after `-9` */
function idOrder(id: string): [number, number] {
  const match = /^snapshot-(\d+)(?:-(\d+))?$/.exec(id);
  if (!match) return [0, 0];
  return [Number(match[1]), Number(match[2] ?? 0)];
}

function readManifest(manifestPath: string): SnapshotManifest | null {
  if (!fs.existsSync(manifestPath)) return null;

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
    return isManifest(parsed) ? parsed : null;
  } catch {
    // A half-written snapshot is not restorable
    return null;
  }
}

function isManifest(value: unknown): value is SnapshotManifest {
  if (typeof value !== 'object' || value === null) return false;
  if (!('createdAt' in value) || typeof value.createdAt !== 'string') return false;
  if (!('description' in value) || typeof value.description !== 'string') return false;
  if (!('files' in value) || !Array.isArray(value.files)) return false;

  return value.files.every(
    (entry: unknown) =>
      typeof entry === 'object' &&
      entry !== null &&
      'original' in entry &&
      typeof entry.original === 'string' &&
      'backup' in entry &&
      typeof entry.backup === 'string'
  );
}
