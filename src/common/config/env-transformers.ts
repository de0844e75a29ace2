import { parseBool } from '@common/parse-bool.fn';

function blank(raw?: string): raw is undefined {
  return raw === undefined || raw.trim() === '';
}

export const intOr =
  (fallback: number) =>
  (raw?: string): number => {
    if (blank(raw)) return fallback;
    const value = Number(raw.trim());
    if (!Number.isInteger(value)) {
      throw new Error(`"${raw}" is not an integer`);
    }
    return value;
  };

export const floatOr =
  (fallback: number) =>
  (raw?: string): number => {
    if (blank(raw)) return fallback;
    const value = Number(raw.trim());
    if (!Number.isFinite(value)) {
      throw new Error(`"${raw}" is not a number`);
    }
    return value;
  };

export const boolOr =
  (fallback: boolean) =>
  (raw?: string): boolean =>
    blank(raw) ? fallback : parseBool(raw);

export const stringOr =
  (fallback: string) =>
  (raw?: string): string =>
    blank(raw) ? fallback : raw.trim();
