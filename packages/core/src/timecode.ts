/**
 * TimeCode
 * 
 * Immutable elapsed-time offset parsed from `MM:SS` or `HH:MM:SS` text.
 * 
 * The two-part form allows up to 999 minutes while the three-part form caps
 * hours at 23; the asymmetry is kept as-is.
 */

const MAX_MINUTES_SHORT_FORM = 999;
const MAX_HOURS = 23;
const DIGITS = /^\d+$/;

export class TimeCode {
  private constructor(
    private readonly seconds: number,
    /** The text this timecode was read from, e.g. `05:30` */
    public readonly text: string
  ) {}

  /**
   * Parse `MM:SS` or `HH:MM:SS`. Returns null for anything else.
   */
  static parse(text: string): TimeCode | null {
    const parts = text.split(':');
    if (!parts.every((part) => DIGITS.test(part))) {
      return null;
    }
    const values = parts.map((part) => parseInt(part, 10));

    if (values.length === 2) {
      const [minutes = 0, seconds = 0] = values;
      if (minutes > MAX_MINUTES_SHORT_FORM || seconds > 59) return null;
      return new TimeCode(minutes * 60 + seconds, text);
    }

    if (values.length === 3) {
      const [hours = 0, minutes = 0, seconds = 0] = values;
      if (hours > MAX_HOURS || minutes > 59 || seconds > 59) return null;
      return new TimeCode(hours * 3600 + minutes * 60 + seconds, text);
    }

    return null;
  }

  /**
   * Build a timecode from a second count, rendered in `M:SS` form
   */
  static fromSeconds(seconds: number): TimeCode {
    const whole = Math.max(0, Math.floor(seconds));
    return new TimeCode(whole, TimeCode.format(whole));
  }

  /**
   * Canonical `M:SS` rendering: minutes unbounded and unpadded,
   * seconds zero-padded.
   */
  static format(seconds: number): string {
    const whole = Math.max(0, Math.floor(seconds));
    return `${Math.floor(whole / 60)}:${String(whole % 60).padStart(2, '0')}`;
  }

  toSeconds(): number {
    return this.seconds;
  }

  equals(other: TimeCode): boolean {
    return this.seconds === other.seconds;
  }

  toString(): string {
    return this.text;
  }
}
