import type { Balances, ItemId, Point, Snapshot } from '../domain/types';
import type { IItemLookup } from '../ports/lookups';
import type { ILogger } from '../ports/logger';
import { ConflictError, DuplicateDateError, InvalidInputError, NotFoundError } from '../domain/errors';
import { compareDates, isCalendarDate } from '../utils/dates';

interface Row {
  date: string;
  balances: Map<ItemId, number>;
}

/**
 * Dated balance records, always kept in ascending date order. A missing
 * entry for an item means "no record on that date", which is not zero.
 */
export class SnapshotStore {
  private readonly rows: Row[] = [];

  constructor(
    private readonly items: Pick<IItemLookup, 'has'>,
    private readonly log: ILogger,
    initial: Snapshot[] = [],
  ){
    for (const s of initial) this.rows.push({ date: s.date, balances: new Map(Object.entries(s.balances)) });
    this.rows.sort((a,b)=> compareDates(a.date, b.date));
  }

  addSnapshot(date: string, balances: Balances): void {
    requireDate(date);
    if (this.indexOf(date) >= 0) throw new DuplicateDateError(date);
    const entries = this.checkBalances(balances);
    const at = this.rows.findIndex(r => compareDates(r.date, date) > 0);
    const row: Row = { date, balances: new Map(entries) };
    if (at < 0) this.rows.push(row); else this.rows.splice(at, 0, row);
    this.log.debug(`snapshot added ${date} (${entries.length} balances)`);
  }

  /** Overwrites the given balances; items left out keep what this snapshot already had. */
  updateSnapshot(date: string, balances: Balances): void {
    const row = this.require(date);
    const entries = this.checkBalances(balances);
    for (const [id, amount] of entries) row.balances.set(id, amount);
    this.log.debug(`snapshot updated ${date} (${entries.length} balances)`);
  }

  removeBalances(date: string, itemIds: ItemId[]): void {
    const row = this.require(date);
    for (const id of itemIds) row.balances.delete(id);
  }

  deleteSnapshot(date: string): void {
    const i = this.indexOf(date);
    if (i < 0) throw new NotFoundError('snapshot', date);
    this.rows.splice(i, 1);
    this.log.debug(`snapshot deleted ${date}`);
  }

  /**
   * Starting balances for a new entry on `newDate`: those of `baseDate` when
   * given, otherwise of the latest snapshot before `newDate`.
   */
  carryForward(newDate: string, baseDate?: string): Balances {
    requireDate(newDate);
    if (baseDate !== undefined) return toRecord(this.require(baseDate).balances);
    const prior = this.rowBefore(newDate);
    return prior ? toRecord(prior.balances) : {};
  }

  history(itemId: ItemId): Iterable<Point> {
    if (!this.items.has(itemId)) throw new NotFoundError('item', itemId);
    const rows = this.rows;
    return {
      *[Symbol.iterator]() {
        for (const r of rows){
          const v = r.balances.get(itemId);
          if (v !== undefined) yield { x: r.date, y: v };
        }
      },
    };
  }

  get(date: string): Snapshot | undefined {
    const i = this.indexOf(date);
    return i < 0 ? undefined : toSnapshot(this.rows[i]);
  }

  has(date: string): boolean {
    return this.indexOf(date) >= 0;
  }

  dates(): string[] {
    return this.rows.map(r => r.date);
  }

  /** The snapshot right before `date`, if any. */
  previous(date: string): Snapshot | undefined {
    const prior = this.rowBefore(date);
    return prior && toSnapshot(prior);
  }

  latest(): Snapshot | undefined {
    const last = this.rows[this.rows.length - 1];
    return last && toSnapshot(last);
  }

  list(): Snapshot[] {
    return this.rows.map(toSnapshot);
  }

  referencesItem(itemId: ItemId): boolean {
    return this.rows.some(r => r.balances.has(itemId));
  }

  /**
   * Moves every balance of `from` onto `to`. Fails before touching anything
   * when both have a record on the same date.
   */
  reassignItem(from: ItemId, to: ItemId): number {
    const clashes = this.rows.filter(r => r.balances.has(from) && r.balances.has(to)).map(r => r.date);
    if (clashes.length) {
      throw new ConflictError(`${from} and ${to} both have balances on ${clashes.join(', ')}`, from, clashes);
    }
    let moved = 0;
    for (const r of this.rows){
      const v = r.balances.get(from);
      if (v === undefined) continue;
      r.balances.delete(from);
      r.balances.set(to, v);
      moved++;
    }
    return moved;
  }

  private rowBefore(date: string): Row | undefined {
    let prior: Row | undefined;
    for (const r of this.rows){
      if (compareDates(r.date, date) >= 0) break;
      prior = r;
    }
    return prior;
  }

  private indexOf(date: string): number {
    return this.rows.findIndex(r => r.date === date);
  }

  private require(date: string): Row {
    const i = this.indexOf(date);
    if (i < 0) throw new NotFoundError('snapshot', date);
    return this.rows[i];
  }

  private checkBalances(balances: Balances): Array<[ItemId, number]> {
    const entries = Object.entries(balances);
    for (const [id, amount] of entries){
      if (!this.items.has(id)) throw new NotFoundError('item', id);
      if (!Number.isFinite(amount)) throw new InvalidInputError(`balance for ${id} must be a finite number`, id);
    }
    return entries;
  }
}

function requireDate(date: string){
  if (!isCalendarDate(date)) throw new InvalidInputError(`not a calendar date (YYYY-MM-DD): ${date}`, date);
}

function toRecord(m: Map<ItemId, number>): Balances {
  return Object.fromEntries(m);
}

function toSnapshot(r: Row): Snapshot {
  return { date: r.date, balances: toRecord(r.balances) };
}
