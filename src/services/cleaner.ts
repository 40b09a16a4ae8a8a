import type { CleanJobRecord, TextJobField } from '../types/job';
import { isPlainObject } from '../utils/object';

export type CleaningDropReason = 'malformed-record' | 'missing-identifier' | 'normalization-failed';

/**
 * A raw record that did not make it into the clean set
 */
export interface CleaningDrop {
  /** Position of the record in the cleaned batch */
  index: number;
  reason: CleaningDropReason;
  detail: string;
}

export interface CleanResult {
  records: CleanJobRecord[];
  drops: CleaningDrop[];
}

// Textual stand-ins for "no value" emitted by the various platforms
const MISSING_TOKENS = new Set(['nan', 'none', 'null', 'nat', '<na>', 'n/a']);

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
// UTF-8 lead byte followed by a continuation byte, read as Latin-1
const MOJIBAKE = /[\u00C2-\u00F4][\u0080-\u00BF]/;
const AMOUNT_CHARS = /^-?[\d.,]+$/;
// 1.234.567 or 1,234,567, one separator throughout
const GROUPED_INTEGER = /^\d{1,3}([.,])\d{3}(\1\d{3})*$/;

const utf8 = new TextDecoder('utf-8');

/**
 * True for every representation of "no value": null, undefined, NaN,
 * non-finite numbers, invalid dates, blank strings and sentinel tokens
 */
export function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return !Number.isFinite(value);
  if (value instanceof Date) return isNaN(value.getTime());
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' || MISSING_TOKENS.has(trimmed.toLowerCase());
  }
  return false;
}

function repairMojibake(text: string): string {
  if (!MOJIBAKE.test(text)) return text;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0xff) return text;
  }
  const repaired = Buffer.from(text, 'latin1').toString('utf8');
  return repaired.includes('\uFFFD') ? text : repaired;
}

function cleanString(value: string): string {
  const cleaned = repairMojibake(value)
    .replace(LONE_SURROGATE, '\uFFFD')
    .replace(CONTROL_CHARS, '')
    .normalize('NFC')
    .trim();
  return isMissing(cleaned) ? '' : cleaned;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Cleaned text, or null when the value has no text form
 */
export function tryNormalizeText(value: unknown): string | null {
  if (isMissing(value)) return '';
  if (typeof value === 'string') return cleanString(value);
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return cleanString(utf8.decode(value));
  if (Array.isArray(value)) {
    const parts: string[] = [];
    for (const item of value) {
      const part = tryNormalizeText(item);
      if (part === null) return null;
      if (part !== '') parts.push(part);
    }
    return parts.join(', ');
  }
  if (isPlainObject(value)) return cleanString(JSON.stringify(value));
  return null;
}

export function normalizeText(value: unknown): string {
  const text = tryNormalizeText(value);
  if (text === null) throw new TypeError(`unsupported value of type ${typeof value}`);
  return text;
}

/**
 * Decimal separator of an amount: the later one when both appear; a lone
 * separator followed by exactly three digits groups thousands
 */
function decimalSeparator(digits: string): '.' | ',' | null {
  const lastDot = digits.lastIndexOf('.');
  const lastComma = digits.lastIndexOf(',');
  if (lastDot >= 0 && lastComma >= 0) return lastDot > lastComma ? '.' : ',';

  const separator = lastDot >= 0 ? '.' : lastComma >= 0 ? ',' : null;
  if (separator === null) return null;
  const occurrences = digits.split(separator).length - 1;
  const fractionLength = digits.length - digits.lastIndexOf(separator) - 1;
  return occurrences === 1 && fractionLength !== 3 ? separator : null;
}

function parseAmountText(text: string): number | '' {
  // "R$ 5.000,00", "USD 85,000.50" -> sign and digits only
  const compact = text.replace(/\s/g, '').replace(/^[^\d.,-]+/, '');
  if (!AMOUNT_CHARS.test(compact)) return '';

  const negative = compact.startsWith('-');
  const digits = negative ? compact.slice(1) : compact;
  const separator = decimalSeparator(digits);
  const decimalAt = separator ? digits.lastIndexOf(separator) : -1;
  const integerPart = decimalAt >= 0 ? digits.slice(0, decimalAt) : digits;
  const fraction = decimalAt >= 0 ? digits.slice(decimalAt + 1) : '';

  if (integerPart === '' && fraction === '') return '';
  if (decimalAt >= 0 && !/^\d+$/.test(fraction)) return '';
  if (!/^\d*$/.test(integerPart) && !GROUPED_INTEGER.test(integerPart)) return '';

  const integer = integerPart.replace(/[.,]/g, '') || '0';
  return Number(`${negative ? '-' : ''}${integer}${fraction ? `.${fraction}` : ''}`);
}

export function normalizeAmount(value: unknown): number | '' {
  if (isMissing(value)) return '';
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value !== 'string') return '';
  return parseAmountText(cleanString(value));
}

export function normalizeBoolean(value: unknown): boolean | '' {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value !== 'string') return '';

  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'yes':
    case 'y':
    case '1':
      return true;
    case 'false':
    case 'no':
    case 'n':
    case '0':
      return false;
    default:
      return '';
  }
}

export function normalizeDate(value: unknown): string {
  if (isMissing(value)) return '';
  if (value instanceof Date) return formatDate(value);
  if (typeof value === 'number') {
    const date = new Date(value);
    return isNaN(date.getTime()) ? '' : formatDate(date);
  }
  return normalizeText(value);
}

function project(raw: Record<string, unknown>): CleanJobRecord {
  const text = (field: TextJobField): string => normalizeText(raw[field]);

  return {
    id: text('id'),
    site: text('site'),
    job_url: text('job_url'),
    job_url_direct: text('job_url_direct'),
    title: text('title'),
    company: text('company'),
    location: text('location'),
    date_posted: normalizeDate(raw.date_posted),
    job_type: text('job_type'),
    salary_source: text('salary_source'),
    interval: text('interval'),
    min_amount: normalizeAmount(raw.min_amount),
    max_amount: normalizeAmount(raw.max_amount),
    currency: text('currency'),
    is_remote: normalizeBoolean(raw.is_remote),
    job_level: text('job_level'),
    job_function: text('job_function'),
    description: text('description'),
    skills: text('skills'),
  };
}

/**
 * Cleans and validates job records
 * Deterministic projection onto the exported schema; safe to re-apply
 */
export class JobDataCleaner {
  clean(records: readonly unknown[]): CleanResult {
    const cleaned: CleanJobRecord[] = [];
    const drops: CleaningDrop[] = [];

    records.forEach((raw, index) => {
      if (!isPlainObject(raw)) {
        drops.push({ index, reason: 'malformed-record', detail: `expected an object, got ${raw === null ? 'null' : typeof raw}` });
        return;
      }

      let record: CleanJobRecord;
      try {
        record = project(raw);
      } catch (error) {
        drops.push({
          index,
          reason: 'normalization-failed',
          detail: error instanceof Error ? error.message : String(error),
        });
        return;
      }

      if (!record.job_url && !record.id) {
        drops.push({ index, reason: 'missing-identifier', detail: 'record has neither job_url nor id' });
        return;
      }

      cleaned.push(record);
    });

    return { records: cleaned, drops };
  }
}
