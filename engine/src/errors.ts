/** Base class for every precondition failure raised by the engine. */
export class StriplogEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing bounds, or a coordinate given without its pair. */
export class PositionError extends StriplogEngineError {}

/** An operand that must overlap, touch or share order with another does not. */
export class IntervalError extends StriplogEngineError {}

/** Empty or inconsistently ordered sequences, and invalid sequence-level options. */
export class StriplogError extends StriplogEngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}
