/**
 * Protocol (hard fork) version value object
 * Ensures the version fits the single byte the node protocol uses
 */
export class HardForkVersion {
  private readonly _value: number;

  /** Highest representable version */
  static readonly MAX = 255;

  private constructor(value: number) {
    this._value = value;
  }

  /**
   * Whether a number is a valid protocol version
   */
  static isValid(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= HardForkVersion.MAX;
  }

  /**
   * Create a HardForkVersion from a number
   */
  static from(value: number): HardForkVersion {
    if (!HardForkVersion.isValid(value)) {
      throw new Error(`Invalid hard fork version: ${value}. Must be an integer between 0 and ${HardForkVersion.MAX}.`);
    }
    return new HardForkVersion(value);
  }

  /**
   * Get the version as a number
   */
  get value(): number {
    return this._value;
  }

  /**
   * String representation
   */
  toString(): string {
    return `v${this._value}`;
  }
}
