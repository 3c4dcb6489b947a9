/**
 * motif-reconcile command line interface
 *
 * Each subcommand maps its arguments onto a runner configuration, prints the
 * runner's report and hands the exit status to `onExit`. Configuration
 * problems (missing inputs, unknown reference names, malformed tables) print
 * one red error line and exit with status 2.
 */

import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { isConfigurationFailure } from "../errors";
import { runCompare } from "../operations/compare";
import { compareDirectories, formatDirectoryReport } from "../operations/compare-dirs";
import { runCorrelate } from "../operations/correlate";
import { runRawDiff } from "../operations/raw-diff";
import { ExitCode, RUNNER_DEFAULTS } from "../operations/types";

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const setProcessExitCode = (code: ExitCode): void => {
  process.exitCode = code;
};

/**
 * Option parser for signed base-10 integers
 */
export function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

async function execute(
  output: CliOutput,
  task: () => Promise<{ exitCode: ExitCode; lines: string[] }>
): Promise<ExitCode> {
  try {
    const { exitCode, lines } = await task();
    for (const line of lines) output.out(line);
    return exitCode;
  } catch (error) {
    if (isConfigurationFailure(error)) {
      output.err(chalk.red(`Error: ${error.message}`));
      return ExitCode.CONFIGURATION;
    }
    throw error;
  }
}

interface CompareCommandOptions {
  referenceName: string;
  reportLimit: number;
  caseSensitive?: boolean;
}

interface CorrelateCommandOptions {
  outDir: string;
  sampleLimit: number;
  caseSensitive?: boolean;
}

interface RawDiffCommandOptions {
  outDir: string;
  topN: number;
  maxSamples: number;
  caseSensitive?: boolean;
}

interface CompareDirsCommandOptions {
  caseSensitive?: boolean;
}

/**
 * Build the program; tests pass their own output sink and exit handler
 *
 * Commander's own usage errors are thrown as CommanderError (see main.ts).
 */
export function createProgram(
  output: CliOutput = consoleOutput,
  onExit: (code: ExitCode) => void = setProcessExitCode
): Command {
  const program = new Command();

  program
    .name("motif-reconcile")
    .description("Reconcile motif detection runs made in whole-reference and chunked modes")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.out(str.replace(/\n$/, "")),
      writeErr: (str) => output.err(chalk.red(str.replace(/\n$/, ""))),
    });

  program
    .command("compare")
    .description("Diff two hit tables and validate every differing hit against the reference")
    .argument("<left>", "first hit table (A)")
    .argument("<right>", "second hit table (B)")
    .argument("<fasta>", "reference FASTA")
    .requiredOption("-r, --reference-name <name>", "FASTA record to validate against")
    .option(
      "-l, --report-limit <n>",
      "rows listed per direction (negative lists all)",
      parseInteger,
      RUNNER_DEFAULTS.reportLimit
    )
    .option("--case-sensitive", "compare sequences without case folding")
    .action(async (left: string, right: string, fasta: string, options: CompareCommandOptions) => {
      onExit(
        await execute(output, async () => {
          const { result, lines } = await runCompare({
            left,
            right,
            reference: fasta,
            referenceName: options.referenceName,
            reportLimit: options.reportLimit,
            caseSensitive: options.caseSensitive === true,
          });
          return { exitCode: result.exitCode, lines };
        })
      );
    });

  program
    .command("correlate")
    .description("Map rows one run lacks to the chunks of the chunked run's trace log")
    .argument("<whole-reference-table>", "hit table of the whole-reference run")
    .argument("<chunked-table>", "hit table of the chunked run")
    .argument("<chunked-log>", "trace log of the chunked run")
    .requiredOption("-o, --out-dir <dir>", "directory receiving the reports")
    .option(
      "-s, --sample-limit <n>",
      "records listed per direction in the text report",
      parseInteger,
      RUNNER_DEFAULTS.sampleLimit
    )
    .option("--case-sensitive", "compare sequences without case folding")
    .action(
      async (
        wholeReferenceTable: string,
        chunkedTable: string,
        chunkedLog: string,
        options: CorrelateCommandOptions
      ) => {
        onExit(
          await execute(output, async () => {
            const result = await runCorrelate({
              wholeReferenceTable,
              chunkedTable,
              chunkedLog,
              outDir: options.outDir,
              sampleLimit: options.sampleLimit,
              caseSensitive: options.caseSensitive === true,
            });
            const { wholeReferenceOnly, chunkedOnly } = result.correlations;
            return {
              exitCode: result.exitCode,
              lines: [
                `chunked-only: ${chunkedOnly.length} distinct, whole-reference-only: ${wholeReferenceOnly.length} distinct`,
                `Wrote ${result.reportPath}`,
                `Wrote ${result.mappingPath}`,
                `Wrote ${result.summaryPath}`,
              ],
            };
          })
        );
      }
    );

  program
    .command("raw-diff")
    .description("Compare raw candidates of both modes for the most-differing sequences")
    .argument("<whole-reference-table>", "hit table of the whole-reference run")
    .argument("<chunked-table>", "hit table of the chunked run")
    .argument("<whole-reference-log>", "trace log of the whole-reference run")
    .argument("<chunked-log>", "trace log of the chunked run")
    .requiredOption("-o, --out-dir <dir>", "directory receiving the reports")
    .option("-n, --top-n <n>", "sequences examined", parseInteger, RUNNER_DEFAULTS.topN)
    .option(
      "-m, --max-samples <n>",
      "candidates listed per side",
      parseInteger,
      RUNNER_DEFAULTS.maxSamples
    )
    .option("--case-sensitive", "compare sequences without case folding")
    .action(
      async (
        wholeReferenceTable: string,
        chunkedTable: string,
        wholeReferenceLog: string,
        chunkedLog: string,
        options: RawDiffCommandOptions
      ) => {
        onExit(
          await execute(output, async () => {
            const result = await runRawDiff({
              wholeReferenceTable,
              chunkedTable,
              wholeReferenceLog,
              chunkedLog,
              outDir: options.outDir,
              topN: options.topN,
              maxSamples: options.maxSamples,
              caseSensitive: options.caseSensitive === true,
            });
            return {
              exitCode: result.exitCode,
              lines: [`Wrote ${result.reports.length} report(s). Summary: ${result.summaryPath}`],
            };
          })
        );
      }
    );

  program
    .command("compare-dirs")
    .description("Compare every hit table two output directories share")
    .argument("<whole-reference-dir>", "output directory of the whole-reference run")
    .argument("<chunked-dir>", "output directory of the chunked run")
    .option("--case-sensitive", "compare sequences without case folding")
    .action(
      async (wholeReferenceDir: string, chunkedDir: string, options: CompareDirsCommandOptions) => {
        onExit(
          await execute(output, async () => {
            const result = await compareDirectories({
              wholeReferenceDir,
              chunkedDir,
              caseSensitive: options.caseSensitive === true,
            });
            return { exitCode: result.exitCode, lines: formatDirectoryReport(result) };
          })
        );
      }
    );

  return program;
}
