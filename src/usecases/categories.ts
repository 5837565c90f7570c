import type { Category, CategoryId } from '../domain/types';
import type { IItemLookup } from '../ports/lookups';
import type { ILogger } from '../ports/logger';
import { DuplicateNameError, InUseError, InvalidInputError, NotFoundError } from '../domain/errors';
import { CATEGORY_PREFIX, formatId, maxIdNumber } from '../utils/ids';

export interface CreateCategoryOptions {
  /** Create anyway (with a warning) when another category has the same name. */
  allowDuplicateName?: boolean;
}

export class CategoryRegistry {
  private readonly byId = new Map<CategoryId, Category>();
  private counter: number;

  constructor(
    private readonly items: IItemLookup,
    private readonly log: ILogger,
    initial: Category[] = [],
    counter = 0,
  ){
    for (const c of initial) this.byId.set(c.id, copy(c));
    this.counter = Math.max(counter, maxIdNumber(this.byId.keys(), CATEGORY_PREFIX));
  }

  create(name: string, keywords: string[] = [], opts: CreateCategoryOptions = {}): CategoryId {
    const clean = requireName(name);
    this.checkName(clean, undefined, opts);
    const id = formatId(CATEGORY_PREFIX, this.counter + 1);
    this.counter += 1;
    this.byId.set(id, { id, name: clean, keywords: normalizeKeywords(keywords) });
    this.log.debug(`category created ${id} "${clean}"`);
    return id;
  }

  rename(id: CategoryId, newName: string, opts: CreateCategoryOptions = {}): void {
    const cat = this.require(id);
    const clean = requireName(newName);
    this.checkName(clean, id, opts);
    cat.name = clean;
    this.log.debug(`category renamed ${id} -> "${clean}"`);
  }

  setKeywords(id: CategoryId, keywords: string[]): void {
    this.require(id).keywords = normalizeKeywords(keywords);
  }

  delete(id: CategoryId): void {
    this.require(id);
    const used = this.items.countInCategory(id);
    if (used > 0) throw new InUseError(id, used);
    this.byId.delete(id);
    this.log.debug(`category deleted ${id}`);
  }

  /**
   * Suggests categories for free text such as an item name. A category
   * matches when the text contains one of its keywords, a keyword contains
   * the text, or the name contains the text. Order follows the registry.
   */
  findByKeyword(text: string): CategoryId[] {
    const needle = text.trim().toLowerCase();
    if (!needle) return [];
    const out: CategoryId[] = [];
    for (const c of this.byId.values()){
      const hit = c.name.toLowerCase().includes(needle)
        || c.keywords.some(k => k.includes(needle) || needle.includes(k));
      if (hit) out.push(c.id);
    }
    return out;
  }

  get(id: CategoryId): Category | undefined {
    const c = this.byId.get(id);
    return c && copy(c);
  }

  has(id: CategoryId): boolean {
    return this.byId.has(id);
  }

  list(): Category[] {
    return Array.from(this.byId.values(), copy);
  }

  nextCounter(): number {
    return this.counter;
  }

  private require(id: CategoryId): Category {
    const c = this.byId.get(id);
    if (!c) throw new NotFoundError('category', id);
    return c;
  }

  private checkName(name: string, self: CategoryId | undefined, opts: CreateCategoryOptions){
    const key = name.toLowerCase();
    for (const c of this.byId.values()){
      if (c.id === self || c.name.toLowerCase() !== key) continue;
      if (!opts.allowDuplicateName) throw new DuplicateNameError(name, c.id);
      this.log.warn(`category name "${name}" duplicates ${c.id}`);
      return;
    }
  }
}

function requireName(name: string): string {
  const clean = name.trim();
  if (!clean) throw new InvalidInputError('category name must not be empty');
  return clean;
}

function normalizeKeywords(keywords: string[]): string[] {
  const seen = new Set<string>();
  for (const k of keywords){
    const v = k.trim().toLowerCase();
    if (v) seen.add(v);
  }
  return [...seen];
}

function copy(c: Category): Category {
  return { ...c, keywords: [...c.keywords] };
}
