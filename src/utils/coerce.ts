const LAKH = 100_000;
const CRORE = 10_000_000;

/**
 * Reads a number out of loosely formatted model output: `5000000`,
 * `"50,00,000"`, `"₹50 lakh"`, `"1.5 crore"`, `"20 years"`.
 */
export const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const text = value.toLowerCase().replace(/[₹,\s]/g, '').replace(/^rs\.?/, '');
  const match = text.match(/^(-?\d+(?:\.\d+)?)(lakhs?|lacs?|l|crores?|cr)?/);
  if (!match) {
    return undefined;
  }

  const amount = Number(match[1]);
  const unit = match[2];
  if (!unit) {
    return amount;
  }
  return unit.startsWith('c') ? amount * CRORE : amount * LAKH;
};

export const toInteger = (value: unknown): number | undefined => {
  const parsed = toNumber(value);
  return parsed === undefined ? undefined : Math.round(parsed);
};

export const toBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim().toLowerCase();
  if (['true', 'yes', 'y', '1'].includes(text)) {
    return true;
  }
  if (['false', 'no', 'n', '0'].includes(text)) {
    return false;
  }
  return undefined;
};

export const toText = (value: unknown): string | undefined => {
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const text = value.trim();
  return text.length > 0 ? text : undefined;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
