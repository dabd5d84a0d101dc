import { SelectOptions, StoredRecord } from './store.types';

const comparable = (value: unknown): unknown =>
  value instanceof Date ? value.getTime() : value;

/**
 * Field equality; dates compare by instant, so a Date filter matches the
 * ISO string a JSON log wrote for it.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date || b instanceof Date) {
    const left = typeof a === 'string' ? Date.parse(a) : comparable(a);
    const right = typeof b === 'string' ? Date.parse(b) : comparable(b);
    return left === right;
  }
  return a === b;
}

export function matchesFilters(record: StoredRecord, filters: object): boolean {
  return Object.entries(filters).every(([field, expected]) =>
    valuesEqual(record[field], expected)
  );
}

/**
 * Ordering for select(): null/undefined sort first
 */
export function compareValues(a: unknown, b: unknown): number {
  const left = comparable(a);
  const right = comparable(b);
  if (left === right) return 0;
  if (left === null || left === undefined) return -1;
  if (right === null || right === undefined) return 1;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  return String(left) < String(right) ? -1 : 1;
}

export function applySelectOptions<T extends StoredRecord>(
  records: T[],
  options: SelectOptions<T> = {}
): T[] {
  let result = [...records];

  if (options.orderBy) {
    const { field, direction } = options.orderBy;
    const sign = direction === 'asc' ? 1 : -1;
    result.sort((a, b) => sign * compareValues(a[field], b[field]));
  }

  if (options.limit !== undefined) {
    result = result.slice(0, options.limit);
  }

  return result;
}
