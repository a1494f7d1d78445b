#!/usr/bin/env node

import path from "path";
import { Command } from "commander";
import { runOnce, type RunOptions } from "../core/runner";
import { watchEndpoints } from "../core/watcher";
import { initConfig } from "../core/init-config";
import { compilePath } from "../core/renderer";
import { isGenerationError } from "../core/errors";
import { defaultLogger, type Logger } from "../util/logger";
import { loadEndpointGenConfig } from "../core/config-loader";
import { parseParamPairs } from "./params";

interface BaseCliOptions {
  config?: string;
  watch?: boolean;
  force?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

interface InitCliOptions {
  force?: boolean;
}

interface RenderCliOptions {
  param?: string[];
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function runnerOptions(cwd: string, baseOpts: BaseCliOptions, logger: Logger): RunOptions {
  return {
    configPath: baseOpts.config ? path.resolve(cwd, baseOpts.config) : undefined,
    force: baseOpts.force,
    logger,
  };
}

async function handleGenerateCommand(cwd: string, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const options = runnerOptions(cwd, baseOpts, logger);

  // config.watch is only a default; --watch always wins
  const watch =
    baseOpts.watch ??
    (await loadEndpointGenConfig(cwd, { configPath: options.configPath })).config.watch;

  logger.debug(
    `Starting endpointgen (cwd=${cwd}, config=${options.configPath ?? "auto"}, watch=${watch ? "yes" : "no"})`,
  );

  if (watch) {
    // Watch mode – keeps the process alive until interrupted
    const watcher = await watchEndpoints(cwd, options);
    process.once("SIGINT", () => {
      watcher.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(err);
          process.exit(1);
        },
      );
    });
    return;
  }

  const summary = await runOnce(cwd, options);
  if (summary.errors.length) {
    process.exitCode = 1;
  }
}

async function handleCheckCommand(cwd: string, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const summary = await runOnce(cwd, {
    ...runnerOptions(cwd, baseOpts, logger),
    check: true,
  });
  if (summary.errors.length) {
    process.exitCode = 1;
  }
}

async function handleInitCommand(
  cwd: string,
  initOpts: InitCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const result = await initConfig(cwd, { force: initOpts.force ?? baseOpts.force });
  logger.debug(`init: configPath=${result.configPath}, created=${result.created}`);
}

async function handleRenderCommand(
  template: string,
  renderOpts: RenderCliOptions,
  baseOpts: BaseCliOptions,
) {
  createCliLogger(baseOpts);
  const { values, fields } = parseParamPairs(renderOpts.param ?? []);
  const schema = fields.length ? { name: "CliParams", fields } : undefined;
  const render = compilePath(template, schema);
  process.stdout.write(render(values) + "\n");
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("endpointgen")
    .description("Generate endpoint path helpers from annotated TypeScript functions")
    .option("-c, --config <path>", "Path to endpointgen config file")
    .option("-w, --watch", "Watch sources and regenerate on change")
    .option("-f, --force", "Ignore the cache and regenerate every file")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  // check subcommand
  program
    .command("check")
    .description("Validate every annotation without writing output")
    .action(async (_opts: object, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleCheckCommand(cwd, baseOpts);
    });

  // init subcommand
  program
    .command("init")
    .description("Write a starter endpointgen.config.ts")
    .option("--force", "Overwrite an existing config file")
    .action(async (initOpts: InitCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleInitCommand(cwd, initOpts, baseOpts);
    });

  // render subcommand
  program
    .command("render")
    .description("Render a template with key=value parameters and print the path")
    .argument("<template>", "Endpoint template, e.g. /customers/{customer_id}")
    .option("-p, --param <pairs...>", "Placeholder values as key=value")
    .action(async (template: string, renderOpts: RenderCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleRenderCommand(template, renderOpts, baseOpts);
    });

  // Base command: generate once or in watch mode
  program.action(async (opts: BaseCliOptions) => {
    await handleGenerateCommand(cwd, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err: unknown) => {
  defaultLogger.error(isGenerationError(err) ? err.format() : err);
  process.exit(1);
});
