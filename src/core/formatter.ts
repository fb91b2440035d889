// core/formatter.ts
// Value-to-string conversion and named transforms for custom mappings

// ============================================
// Value Conversion
// ============================================

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Convert a mapped value to the string written into a field.
 * Dates use MM/DD/YYYY, arrays are joined with ", ".
 */
export function valueToString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) {
    return `${pad2(value.getMonth() + 1)}/${pad2(value.getDate())}/${value.getFullYear()}`;
  }
  if (Array.isArray(value)) {
    return value.map(valueToString).join(', ');
  }
  return JSON.stringify(value) ?? '';
}

// ============================================
// Transform Registry
// ============================================

export type Transform = (args: readonly string[]) => string;

const transforms: Map<string, Transform> = new Map();

/**
 * Register a transform by name (names are case-insensitive)
 */
export function registerTransform(name: string, fn: Transform): void {
  transforms.set(name.toLowerCase(), fn);
}

/**
 * Get transform by name
 */
export function getTransform(name: string): Transform | undefined {
  return transforms.get(name.toLowerCase());
}

export function listTransforms(): string[] {
  return Array.from(transforms.keys()).sort();
}

// ============================================
// Built-in Transforms
// ============================================

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Parse an ISO calendar date (YYYY-MM-DD)
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;

  const [, year, month, day] = match;
  const date: CalendarDate = { year: Number(year), month: Number(month), day: Number(day) };
  const check = new Date(Date.UTC(date.year, date.month - 1, date.day));
  if (check.getUTCMonth() !== date.month - 1 || check.getUTCDate() !== date.day) {
    return null;
  }
  return date;
}

function toEpochDays(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day) / 86_400_000;
}

export function formatPhoneUS(phone: string): string {
  if (!phone) return '';
  const digits = phone.replace(/[^0-9]/g, '');
  if (digits.length !== 10) return phone;
  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
}

export function formatCurrency(amount: string): string {
  if (!amount) return '$0.00';
  const value = Number(amount.trim());
  if (amount.trim() === '' || Number.isNaN(value)) return amount;
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

/**
 * Format an ISO date with tokens yyyy yy MMMM MMM MM M dd d.
 * Unparseable input is returned unchanged.
 */
export function formatDate(value: string, pattern = 'MM/dd/yyyy'): string {
  if (!value) return '';
  const date = parseIsoDate(value);
  if (!date) return value;

  return pattern.replace(/yyyy|yy|MMMM|MMM|MM|M|dd|d/g, token => {
    switch (token) {
      case 'yyyy':
        return String(date.year).padStart(4, '0');
      case 'yy':
        return pad2(date.year % 100);
      case 'MMMM':
        return MONTH_NAMES[date.month - 1];
      case 'MMM':
        return MONTH_NAMES[date.month - 1].slice(0, 3);
      case 'MM':
        return pad2(date.month);
      case 'M':
        return String(date.month);
      case 'dd':
        return pad2(date.day);
      default:
        return String(date.day);
    }
  });
}

/**
 * Whole years between an ISO birth date and `now`
 */
export function calculateAge(dob: string, now: Date = new Date()): string {
  const birth = dob ? parseIsoDate(dob) : null;
  if (!birth) return '0';

  let years = now.getFullYear() - birth.year;
  const month = now.getMonth() + 1;
  if (month < birth.month || (month === birth.month && now.getDate() < birth.day)) {
    years -= 1;
  }
  return String(years);
}

export function calculateDaysBetween(first: string, second: string): string {
  const a = parseIsoDate(first);
  const b = parseIsoDate(second);
  if (!a || !b) return '0';
  return String(Math.abs(toEpochDays(b) - toEpochDays(a)));
}

export function capitalizeWords(value: string): string {
  if (!value) return '';
  return value
    .toLowerCase()
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...`;
}

function argAt(args: readonly string[], index: number, fallback = ''): string {
  return args[index] ?? fallback;
}

function intArgAt(args: readonly string[], index: number, fallback: number): number {
  const raw = args[index];
  if (raw === undefined || !/^-?\d+$/.test(raw.trim())) return fallback;
  return Number(raw.trim());
}

registerTransform('identity', args => argAt(args, 0));
registerTransform('passthrough', args => argAt(args, 0));
registerTransform('formatPhoneUS', args => formatPhoneUS(argAt(args, 0)));
registerTransform('formatCurrency', args => formatCurrency(argAt(args, 0)));
registerTransform('formatDate', args => formatDate(argAt(args, 0), argAt(args, 1, 'MM/dd/yyyy')));
registerTransform('calculateAge', args => calculateAge(argAt(args, 0)));
registerTransform('calculateDays', args => calculateDaysBetween(argAt(args, 0), argAt(args, 1)));
registerTransform('calculateDaysBetween', args => calculateDaysBetween(argAt(args, 0), argAt(args, 1)));
registerTransform('removeSpaces', args => argAt(args, 0).replace(/\s+/g, ''));
registerTransform('capitalize', args => capitalizeWords(argAt(args, 0)));
registerTransform('truncate', args => truncate(argAt(args, 0), intArgAt(args, 1, 50)));
