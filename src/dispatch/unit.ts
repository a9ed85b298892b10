/**
 * Unit -- the zero-information result of a command.
 *
 * Lets commands share the result-typed pipeline with queries. There is
 * exactly one instance; every Unit equals every other.
 */
export class Unit {
  static readonly value: Unit = new Unit();

  private constructor() {
    Object.freeze(this);
  }

  equals(other: unknown): boolean {
    return other instanceof Unit;
  }

  toString(): string {
    return '()';
  }

  toJSON(): null {
    return null;
  }
}

/** Whether a value is the Unit marker. */
export function isUnit(value: unknown): value is Unit {
  return value instanceof Unit;
}
