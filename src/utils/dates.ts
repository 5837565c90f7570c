const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Accepts only real calendar dates; 2024-02-30 is rejected.
export function isCalendarDate(value: string): boolean {
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const t = new Date(Date.UTC(y, mo - 1, d));
  return t.getUTCFullYear() === y && t.getUTCMonth() === mo - 1 && t.getUTCDate() === d;
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}
