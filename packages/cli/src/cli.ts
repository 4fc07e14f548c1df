/**
 * pakdb CLI entry point
 */

import { Command } from "commander";
import { logger } from "@pakdb/sdk";
import { buildCommand } from "./commands/build.js";
import { formatInfo, infoCommand } from "./commands/info.js";
import { queryCommand } from "./commands/query.js";
import { getCommand } from "./commands/get.js";
import { defaultType, isVerbose, resolveFile } from "./lib/env.js";
import { parseNonNegativeInt } from "./lib/arg.js";
import { readInput } from "./lib/io.js";
import { printJson, printLines, colorize, toJson } from "./lib/render.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { emitIndexMetrics, withTiming } from "./lib/telemetry.js";
import { VERSION } from "./version.js";

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

interface BuildCliOptions {
  output: string;
  type: string;
  index: string[];
  name?: string;
  description?: string;
  author?: string;
}

interface QueryCliOptions {
  filter: string;
  type: string;
  limit?: number;
  raw?: boolean;
  pointers?: boolean;
}

interface GetCliOptions {
  type: string;
  tag?: string;
  raw?: boolean;
}

const program = new Command();

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

// Configure error output with color
program
  .configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  })
  .exitOverride((err) => {
    // commander has already printed usage errors, help and the version
    process.exit(err.exitCode);
  });

// Global options
program
  .name("pakdb")
  .description("pakdb - immutable, file-backed object store with sorted secondary indexes")
  .version(VERSION)
  .option("--verbose", "Verbose diagnostics (SDK debug logs, error causes)")
  .option("--quiet", "Suppress non-error output")
  .hook("preAction", () => {
    if (globalOptions().verbose) {
      logger.setLevel("debug");
    }
  });

// Build command
program
  .command("build")
  .description("Pack a JSON array or NDJSON file of documents into an artifact")
  .argument("<input>", 'JSON or NDJSON file ("-" reads stdin)')
  .requiredOption("-o, --output <file>", "Artifact path to write")
  .option("-t, --type <name>", "Record type name", defaultType())
  .option("-i, --index <path...>", "Dot-paths to index", [])
  .option("--name <name>", "Artifact name")
  .option("--description <text>", "Artifact description")
  .option("--author <name>", "Artifact author")
  .action(async (input: string, options: BuildCliOptions) => {
    await withTiming("cli.build", async () => {
      const text = await readInput(input === "-" ? input : resolveFile(input));
      const result = await buildCommand(text, input === "-" ? "stdin" : input, {
        ...options,
        output: resolveFile(options.output),
      });

      if (!globalOptions().quiet) {
        console.log(`Packed ${result.records} records into ${options.output}`);
      }
    });
  });

// Info command
program
  .command("info")
  .description("Show artifact metadata and indexes")
  .argument("<file>", "Artifact path")
  .option("--raw", "Output JSON")
  .action(async (file: string, options: { raw?: boolean }) => {
    await withTiming("cli.info", async () => {
      const info = infoCommand(resolveFile(file));
      if (options.raw) {
        printJson(info, { raw: true });
      } else {
        printLines(formatInfo({ ...info, file }));
      }
    });
  });

// Query command
program
  .command("query")
  .description("Print the documents matching a filter")
  .argument("<file>", "Artifact path")
  .requiredOption("-f, --filter <json>", 'Filter document, e.g. {"age":{"$gte":18}}')
  .option("-t, --type <name>", "Record type name", defaultType())
  .option("--limit <n>", "Maximum number of results", (value: string) =>
    parseNonNegativeInt(value, "--limit")
  )
  .option("--raw", "One compact JSON document per line")
  .option("--pointers", "Print pointers instead of documents")
  .action(async (file: string, options: QueryCliOptions) => {
    await withTiming("cli.query", async () => {
      const result = queryCommand(resolveFile(file), options);

      if (options.pointers) {
        printLines(result.pointers.map((pointer) => toJson(pointer, true)));
      } else if (options.raw) {
        printLines(result.documents.map((doc) => toJson(doc, true)));
      } else {
        printJson(result.documents);
      }

      emitIndexMetrics(result.keys);
    });
  });

// Get command
program
  .command("get")
  .description("Print the document a pointer refers to")
  .argument("<file>", "Artifact path")
  .argument("<offset>", "Offset in the data segment", (value: string) =>
    parseNonNegativeInt(value, "offset")
  )
  .argument("<length>", "Length in bytes", (value: string) => parseNonNegativeInt(value, "length"))
  .option("-t, --type <name>", "Record type name", defaultType())
  .option("--tag <hex>", "Pointer type tag (16 hex digits)")
  .option("--raw", "Output compact JSON")
  .action(async (file: string, offset: number, length: number, options: GetCliOptions) => {
    await withTiming("cli.get", async () => {
      const doc = getCommand(resolveFile(file), offset, length, options);
      printJson(doc, { raw: options.raw });
    });
  });

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const exitCode = mapSdkErrorToExitCode(err);
    const message = formatCliError(err, globalOptions().verbose || isVerbose());
    console.error(`Error: ${message}`);
    process.exit(exitCode);
  }
}

void main();
