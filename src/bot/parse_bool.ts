const TRUE_WORDS = ['true', '1', 'yes', 'y', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'n', 'off'];

/** Lenient boolean for env values; unset, blank or unrecognised input gives the fallback. */
export function parseBool(val: unknown, fallback = false): boolean {
  if (typeof val === 'boolean') return val;
  if (typeof val === 'number') return val !== 0;
  if (typeof val === 'string') {
    const normalized = val.trim().toLowerCase();
    if (TRUE_WORDS.includes(normalized)) return true;
    if (FALSE_WORDS.includes(normalized)) return false;
  }
  return fallback;
}
