import { describe, it, expect } from 'vitest';
import { Ledger } from '../ledger';
import { DuplicateDateError, InvalidInputError, NotFoundError } from '../../domain/errors';

function setup() {
  const ledger = new Ledger();
  const cat = ledger.categories.create('Property');
  const house = ledger.items.create('House', cat, false, 'asset');
  const cash = ledger.items.create('Cash', cat, true, 'asset');
  return { ledger, house, cash };
}

describe('SnapshotStore', () => {
  it('keeps snapshots in ascending order whatever order they are added in', () => {
    const { ledger, house } = setup();
    ledger.snapshots.addSnapshot('2024-06-01', { [house]: 2 });
    ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1 });
    ledger.snapshots.addSnapshot('2024-03-01', { [house]: 3 });
    expect(ledger.snapshots.dates()).toEqual(['2024-01-01', '2024-03-01', '2024-06-01']);
  });

  it('refuses a second snapshot on the same date and keeps the first', () => {
    const { ledger, house } = setup();
    ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1 });
    expect(() => ledger.snapshots.addSnapshot('2024-01-01', { [house]: 2 })).toThrow(DuplicateDateError);
    expect(ledger.snapshots.list()).toEqual([{ date: '2024-01-01', balances: { [house]: 1 } }]);
  });

  it('refuses unknown items without writing anything', () => {
    const { ledger, house } = setup();
    expect(() => ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1, item_99: 5 })).toThrow(NotFoundError);
    expect(ledger.snapshots.dates()).toEqual([]);
  });

  it('validates dates and amounts', () => {
    const { ledger, house } = setup();
    expect(() => ledger.snapshots.addSnapshot('2024-02-30', {})).toThrow(InvalidInputError);
    expect(() => ledger.snapshots.addSnapshot('01/02/2024', {})).toThrow(InvalidInputError);
    expect(() => ledger.snapshots.addSnapshot('2024-02-29', { [house]: Number.NaN })).toThrow(InvalidInputError);
  });

  it('merges an update into the existing snapshot only', () => {
    const { ledger, house, cash } = setup();
    ledger.snapshots.addSnapshot('2024-01-01', { [house]: 300000, [cash]: 500 });
    ledger.snapshots.addSnapshot('2024-06-01', { [house]: 310000 });
    ledger.snapshots.updateSnapshot('2024-06-01', { [house]: 320000 });
    expect(ledger.snapshots.get('2024-06-01')).toEqual({ date: '2024-06-01', balances: { [house]: 320000 } });
    ledger.snapshots.updateSnapshot('2024-01-01', { [cash]: 0 });
    expect(ledger.snapshots.get('2024-01-01')?.balances).toEqual({ [house]: 300000, [cash]: 0 });
    expect(() => ledger.snapshots.updateSnapshot('2024-02-01', {})).toThrow(NotFoundError);
  });

  it('drops balances only when asked', () => {
    const { ledger, house, cash } = setup();
    ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1, [cash]: 2 });
    ledger.snapshots.removeBalances('2024-01-01', [cash]);
    expect(ledger.snapshots.get('2024-01-01')?.balances).toEqual({ [house]: 1 });
  });

  it('deletes a snapshot by date', () => {
    const { ledger } = setup();
    ledger.snapshots.addSnapshot('2024-01-01', {});
    ledger.snapshots.deleteSnapshot('2024-01-01');
    expect(ledger.snapshots.dates()).toEqual([]);
    expect(() => ledger.snapshots.deleteSnapshot('2024-01-01')).toThrow(NotFoundError);
  });

  describe('carryForward', () => {
    it('starts from the latest snapshot before the new date', () => {
      const { ledger, house, cash } = setup();
      ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1 });
      ledger.snapshots.addSnapshot('2024-03-01', { [house]: 2, [cash]: 7 });
      ledger.snapshots.addSnapshot('2024-09-01', { [house]: 3 });
      expect(ledger.snapshots.carryForward('2024-06-01')).toEqual({ [house]: 2, [cash]: 7 });
      expect(ledger.snapshots.carryForward('2024-03-01')).toEqual({ [house]: 1 });
    });

    it('uses an explicit base date when given', () => {
      const { ledger, house } = setup();
      ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1 });
      ledger.snapshots.addSnapshot('2024-03-01', { [house]: 2 });
      expect(ledger.snapshots.carryForward('2024-06-01', '2024-01-01')).toEqual({ [house]: 1 });
      expect(() => ledger.snapshots.carryForward('2024-06-01', '2023-01-01')).toThrow(NotFoundError);
    });

    it('is empty with nothing earlier and does not mutate the store', () => {
      const { ledger, house } = setup();
      ledger.snapshots.addSnapshot('2024-03-01', { [house]: 2 });
      const start = ledger.snapshots.carryForward('2024-01-01');
      expect(start).toEqual({});
      const copy = ledger.snapshots.carryForward('2024-04-01');
      copy[house] = 99;
      expect(ledger.snapshots.get('2024-03-01')?.balances).toEqual({ [house]: 2 });
    });
  });

  describe('history', () => {
    it('skips dates without a record and keeps zeros', () => {
      const { ledger, house, cash } = setup();
      ledger.snapshots.addSnapshot('2024-01-01', { [cash]: 10 });
      ledger.snapshots.addSnapshot('2024-02-01', { [house]: 5 });
      ledger.snapshots.addSnapshot('2024-03-01', { [cash]: 0 });
      expect([...ledger.snapshots.history(cash)]).toEqual([
        { x: '2024-01-01', y: 10 },
        { x: '2024-03-01', y: 0 },
      ]);
    });

    it('can be iterated again and sees later writes', () => {
      const { ledger, house } = setup();
      ledger.snapshots.addSnapshot('2024-01-01', { [house]: 1 });
      const h = ledger.snapshots.history(house);
      expect([...h]).toEqual([{ x: '2024-01-01', y: 1 }]);
      ledger.snapshots.addSnapshot('2024-02-01', { [house]: 2 });
      expect([...h]).toEqual([{ x: '2024-01-01', y: 1 }, { x: '2024-02-01', y: 2 }]);
    });

    it('fails for an unknown item', () => {
      const { ledger } = setup();
      expect(() => ledger.snapshots.history('item_404')).toThrow(NotFoundError);
    });
  });
});
