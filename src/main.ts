#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Cause, Config, Console, Effect, Logger, LogLevel, Option } from "effect"
import * as Sentry from "@sentry/node";
import { AppConfig } from './config.js';
import { decodeAnalysisConfig } from './analysis-config.js';
import { BatchAnalyzer } from './batch-analyzer.js';
import { parseCliArgs } from './cli-args.js';
import { CHARGER_MIX_LABEL } from './charger-mix/charger-mix-optimizer.js';
import { exportOutcome } from './report/csv-exporter.js';
import { chargerMixRecords, evaluationRecords, toCsv } from './report/records.js';
import { FileTableReaderLayer } from './table-reader/file-table-reader.js';
import { TableReader } from './table-reader/types.js';

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const USAGE = 'Usage: load-headroom [--layout=tall|wide] [--charger=Name:kW:qty ...] [--out=dir] <file.csv|file.xlsx> ...';

const program = Effect.gen(function*() {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.files.length === 0) {
    yield* Console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const env = yield* Config.all(AppConfig.analysis);

  const config = yield* decodeAnalysisConfig({
    ...env,
    layout: cli.layout ?? 'auto',
    customChargers: cli.chargers,
  });

  const analyzer = new BatchAnalyzer(yield* TableReader);

  const outcomes = yield* analyzer.analyzeFiles(cli.files, config);

  const outputDir = cli.outputDir ?? Option.getOrUndefined(yield* AppConfig.outputDir);

  for (const outcome of outcomes) {
    if (outcome.result === null) {
      continue;
    }

    if (outputDir !== undefined) {
      yield* exportOutcome(outcome, outputDir);
      continue;
    }

    yield* Console.log(`# ${outcome.file}`);
    yield* Console.log(toCsv(evaluationRecords(outcome.result.evaluation)));

    if (outcome.result.chargerMix.length > 0) {
      yield* Console.log(`# ${CHARGER_MIX_LABEL}`);
      yield* Console.log(toCsv(chargerMixRecords(outcome.result.chargerMix)));
    }
  }

  if (outcomes.every((outcome) => outcome.result === null)) {
    process.exitCode = 1;
  }
}).pipe(
  Effect.tapErrorCause((cause) => Effect.sync(() => Sentry.captureException(Cause.squash(cause)))),
  Effect.provide(FileTableReaderLayer),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
