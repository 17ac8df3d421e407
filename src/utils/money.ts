/**
 * Monetary values travel through the pipeline as integer minor units
 * (paise). Conversion happens once, when a row leaves the database.
 */

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

/**
 * Converts a database value (number or decimal string) to minor units.
 * Returns null when the value is absent or not numeric.
 */
export const toMinorUnits = (value: unknown): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    // Same rounding as a decimal string of the value
    return Number.isFinite(value) ? toMinorUnits(value.toFixed(6)) : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match || (match[2] === '' && (match[3] ?? '') === '')) {
    return null;
  }

  const [, sign, whole, fraction = ''] = match;
  const cents = (fraction + '00').slice(0, 2);
  // Round half up on the third fractional digit
  const roundUp = fraction.length > 2 && Number(fraction[2]) >= 5 ? 1 : 0;
  const minor = Number(whole || '0') * 100 + Number(cents) + roundUp;

  return sign === '-' ? -minor : minor;
};

/**
 * Renders minor units with two decimals and no grouping, e.g. 123450 -> "1234.50"
 */
export const formatAmount = (minor: number): string => {
  const sign = minor < 0 ? '-' : '';
  const abs = Math.abs(minor);
  const whole = Math.floor(abs / 100);
  const cents = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${cents}`;
};

const DISPLAY_FORMAT = new Intl.NumberFormat('en-IN', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Renders minor units for people, with Indian digit grouping and a symbol
 */
export const formatCurrency = (minor: number, symbol: string): string =>
  `${symbol}${DISPLAY_FORMAT.format(minor / 100)}`;

/**
 * Share of `part` in `total` with one decimal, computed on integers
 */
export const formatPercent = (part: number, total: number): string => {
  if (total <= 0) {
    return '0.0%';
  }
  const tenths = Math.round((Math.abs(part) * 1000) / total);
  const sign = part < 0 && tenths > 0 ? '-' : '';
  return `${sign}${Math.floor(tenths / 10)}.${tenths % 10}%`;
};

/**
 * Integer average in minor units, rounded half up
 */
export const averageOf = (amount: number, count: number): number =>
  count > 0 ? Math.round(amount / count) : 0;
