import { z } from 'zod';
import type { ILogger } from '../ports/logger';
import type { LedgerDocument } from './document';
import { silentLogger } from '../adapters/logger/consoleLogger';
import { LoadError } from '../domain/errors';
import { compareDates, isCalendarDate } from '../utils/dates';
import { CATEGORY_PREFIX, ITEM_PREFIX, formatId } from '../utils/ids';
import defaults from './defaultCategories.json';

// Old files: one record per date, each embedding full copies of its assets.
const LegacyAssetSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  liquid: z.boolean().default(false),
  balance: z.number().finite(),
});

const LegacyRecordSchema = z.object({
  date: z.string(),
  assets: z.array(z.unknown()).default([]),
});

export type LegacyAsset = z.infer<typeof LegacyAssetSchema>;

const DEFAULT_KEYWORDS = new Map<string, string[]>(Object.entries(defaults.keywords));
const LIABILITY_CATEGORIES = new Set<string>(defaults.liabilityCategories);

/**
 * Builds a normalized document from the legacy flat list. Items are
 * de-duplicated by name and take the category and liquidity of their first
 * appearance; ids are handed out in name order. Entries that cannot be read
 * are skipped with a warning.
 */
export function migrateLegacy(raw: unknown, log: ILogger = silentLogger): LedgerDocument {
  const top = z.array(z.unknown()).safeParse(raw);
  if (!top.success) throw new LoadError([{ path: '(root)', message: 'legacy data must be a list of dated records' }]);

  const records: Array<{ date: string; assets: LegacyAsset[] }> = [];
  const seenDates = new Set<string>();
  top.data.forEach((r, i) => {
    const rec = LegacyRecordSchema.safeParse(r);
    if (!rec.success || !isCalendarDate(rec.data.date)) {
      log.warn(`skipping legacy record ${i}: missing or invalid date`);
      return;
    }
    if (seenDates.has(rec.data.date)) {
      log.warn(`skipping legacy record ${i}: ${rec.data.date} already seen`);
      return;
    }
    seenDates.add(rec.data.date);
    const assets: LegacyAsset[] = [];
    rec.data.assets.forEach((a, j) => {
      const asset = LegacyAssetSchema.safeParse(a);
      if (asset.success) assets.push(asset.data);
      else log.warn(`skipping entry ${j} of ${rec.data.date}: ${asset.error.issues[0]?.message ?? 'invalid'}`);
    });
    records.push({ date: rec.data.date, assets });
  });

  const firstSeen = new Map<string, LegacyAsset>();
  for (const r of records) for (const a of r.assets) if (!firstSeen.has(a.name)) firstSeen.set(a.name, a);

  // Every category ever used survives, even one an item later moved out of.
  const categoryNames = [...new Set(records.flatMap(r => r.assets.map(a => a.category)))].sort();
  const items = [...firstSeen.values()]
    .sort((a,b)=> (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((a, i) => ({
      id: formatId(ITEM_PREFIX, i + 1),
      name: a.name,
      category_id: formatId(CATEGORY_PREFIX, categoryNames.indexOf(a.category) + 1),
      liquid: a.liquid,
      type: LIABILITY_CATEGORIES.has(a.category) ? 'liability' as const : 'asset' as const,
      status: 'active' as const,
    }));
  const byName = new Map(items.map(it => [it.name, it]));

  const snapshots = [...records]
    .sort((a,b)=> compareDates(a.date, b.date))
    .map(r => {
      const balances: Array<{ item_id: string; balance: number }> = [];
      const done = new Set<string>();
      for (const a of r.assets){
        const item = byName.get(a.name);
        if (!item || done.has(item.id)) continue;
        done.add(item.id);
        // Debts were entered as negative balances; liabilities are kept as magnitudes.
        balances.push({ item_id: item.id, balance: item.type === 'liability' ? Math.abs(a.balance) : a.balance });
      }
      return { date: r.date, balances };
    });

  log.info(`migrated ${records.length} records into ${items.length} items and ${categoryNames.length} categories`);

  return {
    categories: categoryNames.map((name, i) => ({
      id: formatId(CATEGORY_PREFIX, i + 1),
      name,
      keywords: [...(DEFAULT_KEYWORDS.get(name) ?? [])],
    })),
    financial_items: items,
    snapshots,
    financial_goal: null,
    next_ids: { category: categoryNames.length, item: items.length },
  };
}
