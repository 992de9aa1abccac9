const TRUTHY = new Set(["true", "yes", "on", "1"]);
const FALSY = new Set(["false", "no", "off", "0"]);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

export function toBool(text: string, fallback = false): boolean {
  const token = text.trim().toLowerCase();
  if (TRUTHY.has(token)) {
    return true;
  }
  if (FALSY.has(token)) {
    return false;
  }
  return fallback;
}

export function toInteger(text: string, fallback = 0): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return fallback;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : fallback;
}

export function toFloat(text: string, fallback = 0): number {
  const trimmed = text.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    return fallback;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
}
