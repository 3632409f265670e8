import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

/** Reads a JSON file; a missing file yields null, any other fault throws. */
export async function readJsonFile<T>(filePath: string): Promise<T | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
  return JSON.parse(raw) as T;
}

const pendingWrites = new Map<string, Promise<void>>();

/**
 * Writes through a temp file and rename so readers never see a partial file.
 * Writes to the same path run one after another in call order.
 */
export async function writeJsonAtomic(
  filePath: string,
  payload: unknown,
): Promise<void> {
  const key = path.resolve(filePath);
  const body = `${JSON.stringify(payload, null, 2)}\n`;
  const previous = pendingWrites.get(key) ?? Promise.resolve();
  const write = previous
    .catch(() => undefined)
    .then(() => writeFileAtomic(key, body));
  pendingWrites.set(key, write);
  try {
    await write;
  } finally {
    if (pendingWrites.get(key) === write) {
      pendingWrites.delete(key);
    }
  }
}

async function writeFileAtomic(filePath: string, body: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`,
  );

  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tmpPath, body, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
