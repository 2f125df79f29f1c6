#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Either, Logger, LogLevel, Option, Schema } from "effect"
import { FileSystem } from "@effect/platform";
import * as Sentry from "@sentry/node";
import { AppConfig } from "./config.js";
import { createServiceLayers } from "./layers.js";
import { ScenarioRunner } from "./scenario/runner.js";

const isProd = process.env.NODE_ENV == 'production';

const program = Effect.gen(function*() {
  const sentryDsn = yield* AppConfig.sentry.dsn;
  if (Option.isSome(sentryDsn)) {
    Sentry.init({ dsn: sentryDsn.value });
  }

  const configFiles = yield* AppConfig.scenario.configFiles;
  const seriesFile = yield* AppConfig.scenario.seriesFile;
  const concurrency = yield* AppConfig.scenario.batchConcurrency;
  const cacheEntries = yield* AppConfig.scenario.cacheEntries;
  const fs = yield* FileSystem.FileSystem;

  const requests = yield* Effect.forEach(configFiles, (path) =>
    fs.readFileString(path).pipe(
      Effect.flatMap(Schema.decodeUnknown(Schema.parseJson())),
      Effect.map((config) => ({ label: path, config })),
    )
  );

  const outcomes = yield* Effect.gen(function*() {
    const runner = yield* ScenarioRunner;
    return yield* runner.runBatch(requests, { concurrency });
  }).pipe(Effect.provide(createServiceLayers({ seriesFile, cacheEntries })));

  for (const { label, result } of outcomes) {
    if (Either.isLeft(result)) {
      Sentry.captureException(result.left);
      continue;
    }

    const { batteryOnly, hybrid, delta } = result.right;
    yield* Effect.log(`Results for ${label}`, {
      batteryOnly: batteryOnly.metrics,
      hybrid: hybrid.metrics,
      delta,
    });
  }

  const failures = outcomes.filter(({ result }) => Either.isLeft(result)).length;
  if (failures > 0) {
    yield* Effect.flatMap(
      Effect.promise(() => Sentry.flush(2000)),
      () => Effect.dieMessage(`${failures} of ${outcomes.length} scenario comparisons failed`),
    );
  }
}).pipe(
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
