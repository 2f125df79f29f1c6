import { Data } from "effect";

export type InvariantCheck = "soc-bounds" | "battery-energy-balance" | "pv-energy-balance";

/**
 * A logic fault inside the dispatch engine. Never corrected silently.
 */
export class ComputationInvariantError extends Data.TaggedError("ComputationInvariant")<{
  readonly check: InvariantCheck;
  readonly timestamp: Date;
  readonly expected: number;
  readonly actual: number;
}> {
  public override readonly message = `Invariant ${this.check} violated at ${this.timestamp.toISOString()}: expected ${this.expected}, got ${this.actual}`;
}
