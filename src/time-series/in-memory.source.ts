import { Effect, Layer } from "effect";
import { TimeSeriesSource, type SeriesBundle } from "./types.js";

// Serves series that are already in memory; alignment drops anything outside the range.
export const InMemoryTimeSeriesSourceLayer = (bundle: SeriesBundle) =>
  Layer.succeed(
    TimeSeriesSource,
    TimeSeriesSource.of({
      load: () => Effect.succeed(bundle),
    })
  );
