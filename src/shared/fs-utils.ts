import * as fs from "node:fs";
import * as path from "node:path";

export function ensureDirectory(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function sortedDirectoryEntries(dirPath: string): fs.Dirent[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function listTopLevelEntries(dirPath: string): Array<{ name: string; absolutePath: string }> {
  if (!fs.existsSync(dirPath)) {
    return [];
  }

  const result: Array<{ name: string; absolutePath: string }> = [];
  for (const entry of sortedDirectoryEntries(dirPath)) {
    result.push({ name: entry.name, absolutePath: path.join(dirPath, entry.name) });
  }
  return result;
}

export function removeEntry(entryPath: string): void {
  if (!fs.existsSync(entryPath)) {
    return;
  }
  fs.rmSync(entryPath, { recursive: true, force: true });
}

/**
 * Swap `stagingDir` into place at `destPath`. The previous content is moved aside first
 * and restored if the swap fails.
 */
export function swapDirectoryIntoPlace(stagingDir: string, destPath: string): void {
  const oldDir = `${destPath}.old-${process.pid}-${Date.now()}`;
  ensureDirectory(path.dirname(destPath));

  if (fs.existsSync(destPath)) {
    fs.renameSync(destPath, oldDir);
  }

  try {
    fs.renameSync(stagingDir, destPath);
  } catch (err) {
    if (!fs.existsSync(destPath) && fs.existsSync(oldDir)) {
      fs.renameSync(oldDir, destPath);
    }
    throw err;
  }

  removeEntry(oldDir);
}

export function writeJsonFileAtomic(filePath: string, value: unknown): void {
  const parentDir = path.dirname(filePath);
  ensureDirectory(parentDir);

  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  const json = JSON.stringify(value, null, 2) + "\n";

  fs.writeFileSync(tmpPath, json, "utf8");
  fs.renameSync(tmpPath, filePath);
}
