export type HashEncoding = 'legacy-delimited' | 'length-prefixed';

export const HASH_ENCODINGS: readonly HashEncoding[] = ['legacy-delimited', 'length-prefixed'];

export const LEGACY_FIELD_DELIMITER = '-';

/**
 * Joins hash-input fields in the given order.
 *
 * `legacy-delimited` reproduces the digests already anchored on chain but is
 * ambiguous when a field contains the delimiter (`a-b` + `c` and `a` + `b-c`
 * collide). `length-prefixed` writes `<utf8 length>:<value>` per field and has
 * no such collisions, at the cost of different digests for the same record.
 */
export function encodeFields(fields: readonly string[], encoding: HashEncoding): string {
  if (encoding === 'length-prefixed') {
    return fields.map((field) => `${Buffer.byteLength(field, 'utf8')}:${field}`).join('');
  }

  return fields.join(LEGACY_FIELD_DELIMITER);
}

export function isHashEncoding(value: string): value is HashEncoding {
  return HASH_ENCODINGS.some((encoding) => encoding === value);
}

function expandExponent(value: number): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(value.toExponential());
  if (!match) {
    return String(value);
  }

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = `${lead}${fraction}`;
  const point = 1 + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Shortest round-trip decimal without an exponent, e.g. `100`, `12.5`,
 * `0.0000001`. Negative zero keeps its sign.
 */
export function formatDecimal(value: number): string {
  if (Object.is(value, -0)) {
    return '-0';
  }

  const rendered = String(value);
  return Number.isFinite(value) && rendered.includes('e') ? expandExponent(value) : rendered;
}

/**
 * Decimal that always carries a fractional part, e.g. `4.0`, `61.5`.
 * Magnitudes below 1e-4 or from 1e16 up switch to exponent form (`1e-5`, `1.5e16`).
 */
export function formatFractionalDecimal(value: number): string {
  const magnitude = Math.abs(value);
  if (value !== 0 && Number.isFinite(value) && (magnitude < 1e-4 || magnitude >= 1e16)) {
    return value.toExponential().replace('e+', 'e');
  }

  const rendered = formatDecimal(value);
  return Number.isInteger(value) ? `${rendered}.0` : rendered;
}

/** Optional sensor reading as `Some(<value>)` or `None`. */
export function formatOptionalReading(value: number | null | undefined): string {
  return value === null || value === undefined ? 'None' : `Some(${formatFractionalDecimal(value)})`;
}

/** `cold_storage` -> `ColdStorage` */
export function formatVariantName(value: string): string {
  return value
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join('');
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * `2024-05-01 10:20:30.123 UTC`; the fraction is omitted when the
 * milliseconds are zero.
 */
export function formatAnchorTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
  const time = `${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}`;
  const millis = date.getUTCMilliseconds();
  const fraction = millis === 0 ? '' : `.${pad(millis, 3)}`;
  return `${day} ${time}${fraction} UTC`;
}
