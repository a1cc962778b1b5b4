import { promises as fs } from 'node:fs';

export function isEnoent(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isEnoent(e)) return null;
    throw e;
  }
}
