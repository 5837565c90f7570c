export type LedgerErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_DATE'
  | 'DUPLICATE_NAME'
  | 'IN_USE'
  | 'IMMUTABLE_FIELD'
  | 'CONFLICT'
  | 'INVALID_INPUT'
  | 'LOAD';

/**
 * Base of every failure the ledger reports. `ref` is the offending id or
 * date so the caller can point the user at it.
 */
export class LedgerError extends Error {
  constructor(readonly code: LedgerErrorCode, message: string, readonly ref?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends LedgerError {
  constructor(what: 'category' | 'item' | 'snapshot' | 'series', ref: string) {
    super('NOT_FOUND', `${what} not found: ${ref}`, ref);
  }
}

export class DuplicateDateError extends LedgerError {
  constructor(date: string) {
    super('DUPLICATE_DATE', `a snapshot already exists for ${date}`, date);
  }
}

export class DuplicateNameError extends LedgerError {
  constructor(name: string, existingId: string) {
    super('DUPLICATE_NAME', `category name "${name}" is already used by ${existingId}`, existingId);
  }
}

export class InUseError extends LedgerError {
  constructor(categoryId: string, itemCount: number) {
    super('IN_USE', `category ${categoryId} is still referenced by ${itemCount} item(s)`, categoryId);
  }
}

export class ImmutableFieldError extends LedgerError {
  constructor(itemId: string, field: string) {
    super('IMMUTABLE_FIELD', `${field} of ${itemId} cannot change once balances are recorded`, itemId);
  }
}

export class ConflictError extends LedgerError {
  constructor(message: string, ref: string, readonly dates: string[] = []) {
    super('CONFLICT', message, ref);
  }
}

export class InvalidInputError extends LedgerError {
  constructor(message: string, ref?: string) {
    super('INVALID_INPUT', message, ref);
  }
}

export interface LoadIssue {
  path: string;
  message: string;
}

export class LoadError extends LedgerError {
  constructor(readonly issues: LoadIssue[]) {
    super('LOAD', `document failed validation with ${issues.length} issue(s):\n` +
      issues.map(i => `  ${i.path}: ${i.message}`).join('\n'));
  }
}

export function isLedgerError(e: unknown): e is LedgerError {
  return e instanceof LedgerError;
}
