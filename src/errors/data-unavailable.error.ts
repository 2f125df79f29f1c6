import { Data } from "effect";

export type SeriesName = "price" | "solar";

export class DataUnavailableError extends Data.TaggedError("DataUnavailable")<{
  readonly series: SeriesName;
  readonly timestamp: Date;
  readonly reason: string;
}> {
  public override readonly message = `${this.series} series: ${this.reason} at ${this.timestamp.toISOString()}`;
}
