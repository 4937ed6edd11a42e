import {
  InvalidDurationFormatError,
} from '../errors/invalid-duration-format.error';

export type DurationUnit = 'h' | 'm' | 'd';

const SECONDS_PER_UNIT: Record<DurationUnit, number> = {
  m: 60,
  h: 3600,
  d: 86400,
};

const TOKEN_PATTERN = /^(\d+)([hmd])$/;

function isDurationUnit(unit: string): unit is DurationUnit {
  return unit in SECONDS_PER_UNIT;
}

/**
 * Absolute span of time in whole seconds, parsed from compact tokens
 * such as `30m`, `24h` or `2d`.
 */
export class Duration {
  static readonly DEFAULT_TOKEN = '24h';

  private constructor(private readonly seconds: number) {}

  /**
   * Parses `<integer><unit>` where unit is one of h, m, d.
   * An absent or empty token yields the 24 hour default.
   *
   * @throws InvalidDurationFormatError when the token is malformed or
   * the resulting span cannot be represented exactly.
   */
  static parse(token?: string | null): Duration {
    if (!token) {
      return Duration.parse(Duration.DEFAULT_TOKEN);
    }

    const match = TOKEN_PATTERN.exec(token);
    const [, digits, unit] = match ?? [];
    if (digits === undefined || unit === undefined || !isDurationUnit(unit)) {
      throw new InvalidDurationFormatError(token);
    }

    const value = Number(digits);
    const seconds = value * SECONDS_PER_UNIT[unit];
    if (!Number.isSafeInteger(value) || !Number.isSafeInteger(seconds)) {
      throw new InvalidDurationFormatError(
        token,
        `Invalid duration format: ${token}. Value exceeds the supported range`,
      );
    }

    return new Duration(seconds);
  }

  static ofSeconds(seconds: number): Duration {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new RangeError(
        `Duration must be a non-negative integer number of seconds, got ${seconds}`,
      );
    }
    return new Duration(seconds);
  }

  static default(): Duration {
    return Duration.parse(Duration.DEFAULT_TOKEN);
  }

  toSeconds(): number {
    return this.seconds;
  }

  toMilliseconds(): number {
    return this.seconds * 1000;
  }

  equals(other: Duration): boolean {
    return this.seconds === other.seconds;
  }

  toString(): string {
    return `${this.seconds}s`;
  }
}
