import { readFile, rename, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IDocumentStore } from '../../ports/datastore';
import type { ILogger } from '../../ports/logger';
import type { LedgerDocument } from '../../usecases/document';
import { LoadError } from '../../domain/errors';
import { silentLogger } from '../logger/consoleLogger';

export class JsonFileStore implements IDocumentStore {
  constructor(private readonly log: ILogger = silentLogger){}

  async read(path: string): Promise<unknown | null> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (e) {
      if (isMissing(e)) {
        this.log.info(`no data file at ${path}, starting empty`);
        return null;
      }
      throw e;
    }
    try {
      return JSON.parse(text);
    } catch (e) {
      throw new LoadError([{ path, message: `not valid JSON: ${e instanceof Error ? e.message : String(e)}` }]);
    }
  }

  // Written beside the target and renamed over it, so readers never see half a file.
  async write(path: string, doc: LedgerDocument): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    await writeFile(tmp, JSON.stringify(doc, null, 2) + '\n', 'utf8');
    await rename(tmp, path);
    this.log.info(`saved ${path}`);
  }
}

export function isMissing(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
