/**
 * Textual float form used inside `f` records.
 *
 * The runtime writes the shortest round-trip digits and switches to
 * exponent form when the decimal point falls outside the digit run; special
 * values are spelled `nan`, `inf` and `-inf`. Older producers may append a
 * NUL and raw mantissa bytes after the text, which readers ignore.
 */

const FLOAT_TEXT = /^-?(\d+(\.\d*)?|\.\d+)(e[-+]?\d+)?$/i;

export function formatFloat(v: number): string {
  if (Number.isNaN(v)) return 'nan';
  if (v === Infinity) return 'inf';
  if (v === -Infinity) return '-inf';
  if (v === 0) return Object.is(v, -0) ? '-0' : '0';

  const [mantissa, exponent] = Math.abs(v).toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const decpt = Number(exponent) + 1;
  const sign = v < 0 ? '-' : '';
  const count = digits.length;

  if (decpt < -3 || decpt > count) {
    const fraction = count > 1 ? `.${digits.slice(1)}` : '';
    return `${sign}${digits[0]}${fraction}e${decpt - 1}`;
  }
  if (decpt > 0) {
    const fraction = count > decpt ? `.${digits.slice(decpt)}` : '';
    return `${sign}${digits.slice(0, decpt)}${fraction}`;
  }
  return `${sign}0.${'0'.repeat(-decpt)}${digits}`;
}

/** Parse float text, returning `undefined` when it is not a number. */
export function parseFloatText(raw: string): number | undefined {
  const nul = raw.indexOf('\0');
  const text = nul === -1 ? raw : raw.slice(0, nul);

  switch (text) {
    case 'nan':
      return NaN;
    case 'inf':
      return Infinity;
    case '-inf':
      return -Infinity;
  }
  if (!FLOAT_TEXT.test(text)) return undefined;
  return Number(text);
}
