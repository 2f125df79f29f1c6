import { Layer } from "effect";
import { ScenarioCacheLayer } from "./scenario/cache.js";
import { ScenarioRunnerLayer } from "./scenario/runner.js";
import { JsonFileTimeSeriesSourceLayer } from "./time-series/json-file.source.js";

export const createServiceLayers = (config: {
    readonly seriesFile: string;
    readonly cacheEntries: number;
}) => ScenarioRunnerLayer().pipe(
    Layer.provide(Layer.mergeAll(
        ScenarioCacheLayer(config.cacheEntries),
        JsonFileTimeSeriesSourceLayer(config.seriesFile),
    )),
);
