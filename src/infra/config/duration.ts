const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;
const SEGMENT_PATTERN = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parse a duration such as `15m`, `1h30m`, `2.5s` or `500ms` into milliseconds.
 * A bare `0` is accepted. Returns null when the string is not a duration.
 */
export function parseDuration(value: string): number | null {
  const input = value.trim();
  if (input === '0') {
    return 0;
  }
  if (!DURATION_PATTERN.test(input)) {
    return null;
  }

  let total = 0;
  for (const match of input.matchAll(SEGMENT_PATTERN)) {
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}
