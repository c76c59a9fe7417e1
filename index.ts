import { cli, command } from "cleye";

import { askOnce, createQueryService, printCourses, runConversation } from "./src/cli";
import {
  loadConfigFile,
  resolveConfig,
  type ConfigOverrides,
  type LecternConfig,
} from "./src/config";
import { createActivitySpinner } from "./src/terminal-formatting";
import pkg from "./package.json";

const argv = cli({
  name: "lectern",
  version: pkg.version,
  parameters: ["[question]"],
  help: {
    description: "Ask questions about course material, answered with sources",
  },
  flags: {
    model: {
      type: String,
      alias: "m",
      description: "Model to use (sonnet, opus, haiku, or a full model ID)",
    },
    maxRounds: {
      type: Number,
      alias: "r",
      description: "Maximum number of tool-calling rounds per question",
    },
    timeout: {
      type: Number,
      alias: "t",
      description: "Per-question timeout in milliseconds",
    },
    catalog: {
      type: String,
      description: "Path to the course catalog JSON file",
    },
    interactive: {
      type: Boolean,
      alias: "i",
      description: "Read questions from stdin, keeping conversation history",
    },
    verbose: {
      type: Boolean,
      alias: "v",
      description: "Show tool arguments and results",
    },
  },
  commands: [
    command({
      name: "courses",
      flags: {
        catalog: {
          type: String,
          description: "Path to the course catalog JSON file",
        },
      },
      help: {
        description: "List the courses in the catalog",
      },
    }),
  ],
});

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`error: ${message}\n`);
  process.exit(1);
}

function loadConfig(overrides: ConfigOverrides): LecternConfig {
  try {
    return resolveConfig(loadConfigFile(), process.env, overrides);
  } catch (err) {
    fail(err);
  }
}

// Handle `lectern courses` subcommand
if (argv.command === "courses") {
  try {
    const config = loadConfig({ catalog: argv.flags.catalog });
    const service = await createQueryService({ config, activity: process.stderr, verbose: false });
    await printCourses(service, process.stdout);
  } catch (err) {
    fail(err);
  }
  process.exit(0);
}

const question = argv._.question;
const interactive = argv.flags.interactive ?? false;

if (!question && !interactive) {
  argv.showHelp();
  process.exit(1);
}

const maxRounds = argv.flags.maxRounds;
if (maxRounds !== undefined && (Number.isNaN(maxRounds) || !Number.isInteger(maxRounds))) {
  fail("--max-rounds must be a whole number");
}

const config = loadConfig({
  model: argv.flags.model,
  maxRounds,
  timeoutMs: argv.flags.timeout,
  catalog: argv.flags.catalog,
});

try {
  const output = process.stdout;
  const spinner = process.stderr.isTTY ? createActivitySpinner(process.stderr) : undefined;
  const service = await createQueryService({
    config,
    activity: process.stderr,
    verbose: argv.flags.verbose ?? false,
    ...(spinner ? { spinner } : {}),
  });

  if (interactive) {
    await runConversation({ service, output, input: process.stdin, ...(spinner ? { spinner } : {}) });
  } else if (question) {
    const sessionId = await askOnce({ service, output, ...(spinner ? { spinner } : {}) }, question);
    if (!sessionId) process.exit(1);
  }
} catch (err) {
  fail(err);
}
