/**
 * Number and duration formatting for rendered results.
 */

const VALUE_SIG_FIGS = 3;

/**
 * Format a metric or cell value.
 *
 * - Integers: formatted with commas
 * - Floats: at least 1 decimal place and at least 3 significant figures
 */
export function defaultRenderNumber(value: number): string {
  if (Number.isInteger(value)) {
    return formatWithCommas(value, 0);
  }

  const absVal = Math.abs(value);

  /* v8 ignore next 3 -- unreachable: all zero values pass the integer check above */
  if (absVal === 0) {
    return value.toFixed(VALUE_SIG_FIGS);
  }

  let decimals: number;
  if (absVal >= 1) {
    const digits = Math.floor(Math.log10(absVal)) + 1;
    decimals = Math.max(1, VALUE_SIG_FIGS - digits);
  } else {
    const exponent = Math.floor(Math.log10(absVal));
    decimals = -exponent + VALUE_SIG_FIGS - 1;
  }

  return formatWithCommas(value, decimals);
}

/**
 * Format a duration given in seconds.
 */
export function defaultRenderDuration(seconds: number): string {
  if (seconds === 0) {
    return '0s';
  }

  let precision = 1;
  let value: number;
  let unit: string;
  const absSeconds = Math.abs(seconds);

  if (absSeconds < 1e-3) {
    value = seconds * 1_000_000;
    unit = '\u00b5s';
    if (Math.abs(value) >= 1) {
      precision = 0;
    }
  } else if (absSeconds < 1) {
    value = seconds * 1_000;
    unit = 'ms';
  } else {
    value = seconds;
    unit = 's';
  }

  const formatted = formatWithCommas(Math.abs(value), precision);
  return `${value < 0 ? '-' : ''}${formatted}${unit}`;
}

function formatWithCommas(value: number, decimals: number): string {
  const parts = Math.abs(value).toFixed(decimals).split('.');
  const intPart = (parts[0] ?? '').replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  if (parts.length > 1 && parts[1]) {
    return `${sign}${intPart}.${parts[1]}`;
  }
  return `${sign}${intPart}`;
}
