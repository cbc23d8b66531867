import { Transform, type TransformFnParams } from 'class-transformer';
import { isRecord } from 'src/common/helpers/request';

const TRUE_LIKE = new Set(['1', 'true', 'on', 'yes', 'y', 't']);

// plain decimal only: Number() would also take 0x10, 0b11, 0o7 and Infinity
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function isTrueLike(v: unknown): boolean {
  const s = String(v).trim().toLowerCase();
  return TRUE_LIKE.has(s);
}

// Implicit conversion has already run by the time @Transform sees `value`
// (so '' is 0 and 'false' is true); read what the browser actually sent.
function rawValue({ obj, key }: TransformFnParams): unknown {
  return isRecord(obj) ? obj[key] : undefined;
}

/** Checkbox semantics: hidden=0 + checkbox=1 arrives as ['0', '1']. */
export function ToCheckbox() {
  return Transform(
    (params) => {
      const raw = rawValue(params);
      if (Array.isArray(raw)) return raw.some(isTrueLike);
      if (raw == null) return false;
      return isTrueLike(raw);
    },
    { toClassOnly: true },
  );
}

/** Empty input is absent; anything else becomes a number or stays as sent. */
export function ToOptionalNumber() {
  return Transform(
    (params) => {
      const raw = rawValue(params);
      if (raw == null) return undefined;
      const s = String(raw).trim();
      if (s === '') return undefined;
      return DECIMAL.test(s) ? Number(s) : s;
    },
    { toClassOnly: true },
  );
}

/** Trims text; blank text is absent. */
export function ToTrimmedText() {
  return Transform(
    (params) => {
      const raw = rawValue(params);
      if (raw == null) return undefined;
      if (typeof raw !== 'string') return raw;
      const s = raw.trim();
      return s === '' ? undefined : s;
    },
    { toClassOnly: true },
  );
}
