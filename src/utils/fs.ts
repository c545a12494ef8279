import fs from 'node:fs/promises';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes through a sibling `.part` file and renames it into place, so a file
 * at `filePath` is always complete.
 */
export async function writeFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
  const partPath = `${filePath}.part`;
  try {
    await fs.writeFile(partPath, data);
    await fs.rename(partPath, filePath);
  } catch (e) {
    await fs.rm(partPath, { force: true });
    throw e;
  }
}

export function safeBasename(name: string): string {
  const replaced = name
    .normalize('NFKC')
    .replaceAll(/[\\/\u0000-\u001F]/g, '_')
    .trim();
  return replaced.length ? replaced : 'untitled';
}
