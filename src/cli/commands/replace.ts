/**
 * Replace command - Loads config and runs the replacement pipeline
 */

import ora, { type Ora } from "ora";
import { z } from "zod";
import { loadConfig, createLogger, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";
import { LogLevelSchema } from "../../types";
import type { ReplaceContext } from "../../types";

const ReplaceOptionsSchema = z.object({
  source: z.string().optional(),
  target: z.string().optional(),
  log: z
    .string()
    .transform((level) => level.toUpperCase())
    .pipe(LogLevelSchema)
    .optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ReplaceOptionsSchema>;

// Keeps console errors from landing inside the spinner line
function reportError(spinner: Ora, line: string): void {
  if (!spinner.isSpinning) {
    console.error(line);
    return;
  }
  spinner.clear();
  console.error(line);
  spinner.render();
}

export async function replaceCommand(opts: Options): Promise<void> {
  let logger = new Logger();
  const spinner = ora({ text: "Initializing...", indent: 2 });

  try {
    // Validate CLI options
    const options = ReplaceOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.source) {
      config.source = options.source;
    }
    if (options.target) {
      config.target = options.target;
    }
    if (options.log) {
      config.logging.level = options.log;
    }

    if (!config.source) {
      throw new Error("No table file given (use --source <path>)");
    }
    if (!config.target) {
      throw new Error("No target directory given (use --target <path>)");
    }

    logger = await createLogger(config.source, {
      ...config.logging,
      report: (line) => reportError(spinner, line),
    });
    if (logger.filePath) {
      console.log(`Log file created: ${logger.filePath}`);
    } else {
      console.log("Logging is disabled. No log file will be created.");
    }

    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const ctx: ReplaceContext = {
      config,
      logger,
      tracker,
      verbose: options.verbose,
    };

    spinner.start("Replacing...");
    const summary = await modules.run(ctx);

    spinner.clear();
    spinner.stop();

    modules.stats(summary, ctx.verbose);
    console.log("Replacement operation completed.");
  } catch (error) {
    spinner.fail("Replacement failed");
    logger.critical(error instanceof Error ? error.message : String(error));
    console.error(error);
    process.exitCode = 1;
  } finally {
    await logger.close();
  }
}
