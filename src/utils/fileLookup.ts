import fs from 'fs/promises';
import path from 'path';

export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Find a referenced file as given (absolute or relative to the working
 * directory), then inside `directory`.
 */
export async function locateFile(name: string, directory: string): Promise<string | null> {
  if (await isFile(name)) {
    return name;
  }
  const candidate = path.join(directory, name);
  return (await isFile(candidate)) ? candidate : null;
}
