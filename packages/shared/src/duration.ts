const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/**
 * Parse a duration string in the form used by Kubernetes resources
 * (`300ms`, `10s`, `5m`, `1h30m`, `1.5h`) into milliseconds.
 *
 * A bare `0` is accepted. Signs, whitespace and unit-less numbers are not.
 */
export function parseDuration(input: string): number {
  if (input === '0') return 0;
  if (!input) {
    throw new Error('invalid duration: empty string');
  }

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < input.length) {
    const start = SEGMENT.lastIndex;
    const match = SEGMENT.exec(input);
    if (!match) {
      throw new Error(`invalid duration "${input}" at offset ${start}`);
    }
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}

/** Render milliseconds the way `parseDuration` reads them, e.g. 5400000 -> "1h30m". */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  const parts: string[] = [];
  let rest = ms;
  const h = Math.floor(rest / 3_600_000);
  rest -= h * 3_600_000;
  const m = Math.floor(rest / 60_000);
  rest -= m * 60_000;
  const s = Math.floor(rest / 1_000);
  rest -= s * 1_000;
  if (h) parts.push(`${h}h`);
  if (m) parts.push(`${m}m`);
  if (s) parts.push(`${s}s`);
  if (rest) parts.push(`${rest}ms`);
  return parts.join('');
}
