import type { IDocumentStore } from '../ports/datastore';
import type { ILogger } from '../ports/logger';
import { silentLogger } from '../adapters/logger/consoleLogger';
import { Ledger } from './ledger';
import { loadDocument, saveDocument } from './document';

export async function openLedger(store: IDocumentStore, path: string, log: ILogger = silentLogger): Promise<Ledger> {
  const raw = await store.read(path);
  if (raw === null) return new Ledger(undefined, log);
  const ledger = loadDocument(raw, log);
  log.info(`loaded ${path}: ${ledger.items.list().length} items, ${ledger.snapshots.dates().length} snapshots`);
  return ledger;
}

export async function saveLedger(store: IDocumentStore, path: string, ledger: Ledger): Promise<void> {
  await store.write(path, saveDocument(ledger));
}
