import { z } from 'zod';
import type { LedgerState, Snapshot } from '../domain/types';
import type { ILogger } from '../ports/logger';
import { LoadError, type LoadIssue } from '../domain/errors';
import { isCalendarDate, compareDates } from '../utils/dates';
import { CATEGORY_PREFIX, ITEM_PREFIX, maxIdNumber } from '../utils/ids';
import { Ledger } from './ledger';

export const CategoryDocSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  keywords: z.array(z.string()).default([]),
});

export const FinancialItemDocSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  category_id: z.string(),
  liquid: z.boolean(),
  type: z.enum(['asset', 'liability']),
  status: z.enum(['active', 'inactive']).optional(),
  target_balance: z.number().finite().nullable().optional(),
});

export const SnapshotDocSchema = z.object({
  date: z.string(),
  balances: z.array(z.object({
    item_id: z.string(),
    balance: z.number().finite(),
  })),
});

/**
 * The persisted document. `financial_goal` and `next_ids` are optional so
 * files written before they existed still load.
 */
export const LedgerDocumentSchema = z.object({
  categories: z.array(CategoryDocSchema),
  financial_items: z.array(FinancialItemDocSchema),
  snapshots: z.array(SnapshotDocSchema),
  financial_goal: z.object({ target_net_worth: z.number().finite().nonnegative() }).nullable().optional(),
  next_ids: z.object({
    category: z.number().int().nonnegative(),
    item: z.number().int().nonnegative(),
  }).optional(),
});

export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

const RootSchema = z.record(z.string(), z.unknown());
const LooseIdSchema = z.object({ id: z.string() });

/**
 * Validates a raw document and converts it to in-memory state. Every
 * problem found is reported at once in the thrown LoadError: entries with
 * a broken shape are reported and left out, and the reference checks still
 * run over everything that did parse.
 */
export function parseDocument(raw: unknown): LedgerState {
  const root = RootSchema.safeParse(raw);
  if (!root.success) throw new LoadError(toIssues('', root.error.issues));
  const issues: LoadIssue[] = [];

  // Ids of entries that failed validation still count as known, so one
  // broken entry does not also show up as dangling references elsewhere.
  const categoryIds = new Set<string>();
  const categories = parseList(root.data, 'categories', CategoryDocSchema, issues, el => {
    const loose = LooseIdSchema.safeParse(el);
    if (loose.success) categoryIds.add(loose.data.id);
  });
  for (const [i, c] of categories){
    if (categoryIds.has(c.id)) issues.push({ path: `categories.${i}.id`, message: `duplicate category id ${c.id}` });
    categoryIds.add(c.id);
  }

  const itemIds = new Set<string>();
  const items = parseList(root.data, 'financial_items', FinancialItemDocSchema, issues, el => {
    const loose = LooseIdSchema.safeParse(el);
    if (loose.success) itemIds.add(loose.data.id);
  });
  for (const [i, it] of items){
    if (itemIds.has(it.id)) issues.push({ path: `financial_items.${i}.id`, message: `duplicate item id ${it.id}` });
    itemIds.add(it.id);
    if (!categoryIds.has(it.category_id)) {
      issues.push({ path: `financial_items.${i}.category_id`, message: `unknown category ${it.category_id}` });
    }
  }

  const dates = new Set<string>();
  const snapshotDocs = parseList(root.data, 'snapshots', SnapshotDocSchema, issues);
  for (const [i, s] of snapshotDocs){
    if (!isCalendarDate(s.date)) issues.push({ path: `snapshots.${i}.date`, message: `not a calendar date: ${s.date}` });
    else if (dates.has(s.date)) issues.push({ path: `snapshots.${i}.date`, message: `duplicate snapshot date ${s.date}` });
    dates.add(s.date);
    const seen = new Set<string>();
    s.balances.forEach((b, j) => {
      const path = `snapshots.${i}.balances.${j}.item_id`;
      if (!itemIds.has(b.item_id)) issues.push({ path, message: `unknown item ${b.item_id}` });
      else if (seen.has(b.item_id)) issues.push({ path, message: `item ${b.item_id} recorded twice on ${s.date}` });
      seen.add(b.item_id);
    });
  }

  const goal = LedgerDocumentSchema.shape.financial_goal.safeParse(root.data.financial_goal);
  if (!goal.success) issues.push(...toIssues('financial_goal', goal.error.issues));
  const nextIds = LedgerDocumentSchema.shape.next_ids.safeParse(root.data.next_ids);
  if (!nextIds.success) issues.push(...toIssues('next_ids', nextIds.error.issues));

  if (issues.length || !goal.success || !nextIds.success) throw new LoadError(issues);

  const doc = {
    categories: categories.map(([, c]) => c),
    financial_items: items.map(([, it]) => it),
    snapshots: snapshotDocs.map(([, s]) => s),
    financial_goal: goal.data,
    next_ids: nextIds.data,
  };

  const snapshots: Snapshot[] = doc.snapshots
    .map(s => ({ date: s.date, balances: Object.fromEntries(s.balances.map(b => [b.item_id, b.balance])) }))
    .sort((a,b)=> compareDates(a.date, b.date));

  return {
    categories: doc.categories.map(c => ({ id: c.id, name: c.name, keywords: [...c.keywords] })),
    items: doc.financial_items.map(it => ({
      id: it.id,
      name: it.name,
      categoryId: it.category_id,
      liquid: it.liquid,
      type: it.type,
      status: it.status ?? 'active',
      ...(it.target_balance == null ? {} : { targetBalance: it.target_balance }),
    })),
    snapshots,
    goal: doc.financial_goal ? { targetNetWorth: doc.financial_goal.target_net_worth } : null,
    counters: {
      category: Math.max(doc.next_ids?.category ?? 0, maxIdNumber(categoryIds, CATEGORY_PREFIX)),
      item: Math.max(doc.next_ids?.item ?? 0, maxIdNumber(itemIds, ITEM_PREFIX)),
    },
  };
}

function parseList<S extends z.ZodTypeAny>(
  root: Record<string, unknown>,
  key: string,
  schema: S,
  issues: LoadIssue[],
  onInvalid?: (el: unknown) => void,
): Array<[number, z.output<S>]> {
  const list = z.array(z.unknown()).safeParse(root[key]);
  if (!list.success) {
    issues.push(...toIssues(key, list.error.issues));
    return [];
  }
  const out: Array<[number, z.output<S>]> = [];
  list.data.forEach((el, i) => {
    const parsed = schema.safeParse(el);
    if (parsed.success) {
      out.push([i, parsed.data]);
      return;
    }
    issues.push(...toIssues(`${key}.${i}`, parsed.error.issues));
    onInvalid?.(el);
  });
  return out;
}

function toIssues(prefix: string, zodIssues: z.ZodIssue[]): LoadIssue[] {
  return zodIssues.map(i => ({
    path: [prefix, ...i.path].filter(p => p !== '').join('.') || '(root)',
    message: i.message,
  }));
}

export function loadDocument(raw: unknown, log?: ILogger): Ledger {
  return new Ledger(parseDocument(raw), log);
}

/** Snapshots come out in ascending date order. */
export function saveDocument(ledger: Ledger): LedgerDocument {
  const state = ledger.toState();
  return {
    categories: state.categories.map(c => ({ id: c.id, name: c.name, keywords: [...c.keywords] })),
    financial_items: state.items.map(it => ({
      id: it.id,
      name: it.name,
      category_id: it.categoryId,
      liquid: it.liquid,
      type: it.type,
      status: it.status,
      ...(it.targetBalance === undefined ? {} : { target_balance: it.targetBalance }),
    })),
    snapshots: state.snapshots.map(s => ({
      date: s.date,
      balances: Object.entries(s.balances).map(([item_id, balance]) => ({ item_id, balance })),
    })),
    financial_goal: state.goal ? { target_net_worth: state.goal.targetNetWorth } : null,
    next_ids: { ...state.counters },
  };
}
