import { readFile } from 'node:fs/promises';
import { NotFoundError, ValidationError } from '../errors.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Read and parse a JSON data file. */
export async function readJsonFile(path: string | URL): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new NotFoundError(`Data file not found: ${String(path)}`);
    }
    throw err;
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new ValidationError(`Data file is not valid JSON: ${String(path)}`);
  }
}
