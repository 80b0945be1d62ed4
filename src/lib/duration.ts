const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

export class DurationParseError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid duration "${input}": ${reason}`);
    this.name = "DurationParseError";
    this.input = input;
  }
}

/**
 * Parses duration strings such as "300ms", "1.5h" or "2h45m" into
 * milliseconds. A bare "0" is accepted; every other number needs a unit.
 */
export function parseDuration(input: string): number {
  let rest = input.trim();
  if (rest.length === 0) {
    throw new DurationParseError(input, "empty string");
  }

  let sign = 1;
  if (rest[0] === "-" || rest[0] === "+") {
    if (rest[0] === "-") sign = -1;
    rest = rest.slice(1);
  }

  if (rest === "0") return 0;
  if (rest.length === 0) {
    throw new DurationParseError(input, "missing value");
  }

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) {
      throw new DurationParseError(
        input,
        /^(\d+(?:\.\d*)?|\.\d+)$/.test(rest) ? "missing unit" : "unexpected input"
      );
    }
    const [segment, amount, unit] = match;
    const factor = UNIT_MS[unit];
    if (factor === undefined) {
      throw new DurationParseError(input, `unknown unit "${unit}"`);
    }
    total += Number(amount) * factor;
    rest = rest.slice(segment.length);
  }

  if (!Number.isFinite(total)) {
    throw new DurationParseError(input, "overflow");
  }
  return sign * total;
}

/** Parses a TTL, which must not be negative. */
export function parseTtl(input: string): number {
  const ms = parseDuration(input);
  if (ms < 0) {
    throw new DurationParseError(input, "TTL must not be negative");
  }
  return ms;
}
