#!/usr/bin/env node
/**
 * gazette-clean command line
 *
 * Usage:
 *   gazette-clean clean         --input <dir> --output <dir> [--scripts greek,latin] [--threads N]
 *   gazette-clean analyze       --input <dir> --report <csv> [--output <dir>] [--scripts ...] [--threads N]
 *   gazette-clean detect-tables --input <dir> --report <csv> [--threads N]
 *   gazette-clean table-report  --input <dir> --report <csv> [--threads N]
 *   gazette-clean full-pipeline --input <dir> --output <dir> --report <csv> [--table-report <csv>] [--scripts ...] [--threads N]
 *   gazette-clean scripts
 *
 * Defaults for --scripts and --threads come from GAZETTE_SCRIPTS and
 * GAZETTE_THREADS (.env is read from the working directory).
 */

import { parseArgs } from 'util'
import chalk from 'chalk'
import { loadConfig, parseScriptList, type AppConfig } from '../lib/config.js'
import { InvalidOptionsError, getUserFriendlyError, toError } from '../lib/errors.js'
import { setLogLevel } from '../lib/logger.js'
import { listAvailableScripts } from '../lib/text-analysis.js'
import { batchCleanMarkdownFiles } from '../handlers/batch-clean.js'
import { generateAnalysisReport } from '../handlers/analysis-report.js'
import { generateDetailedTableReport, generateTableSummary } from '../handlers/table-report.js'
import { runFullPipeline } from '../handlers/full-pipeline.js'
import type { BatchSummary } from '../types/job-schemas.js'

export const COMMANDS = ['clean', 'analyze', 'detect-tables', 'table-report', 'full-pipeline', 'scripts'] as const
export type Command = typeof COMMANDS[number]

const USAGE = `Usage: gazette-clean <command> [options]

Commands:
  clean           Clean markdown files into --output
  analyze         Write the badness/script report to --report
  detect-tables   Write a per-file table summary to --report
  table-report    Write one row per table issue to --report
  full-pipeline   Clean into --output, then write both reports
  scripts         List the available script keys

Options:
  --input <dir>          Directory of markdown files
  --output <dir>         Directory for cleaned files
  --report <csv>         CSV report path
  --table-report <csv>   Table report path for full-pipeline
  --scripts <list>       Comma-separated script keys
  --threads <n>          Worker count, 0 = one per core
  -h, --help             Show this message`

export interface CliFlags {
  input?: string
  output?: string
  report?: string
  tableReport?: string
  scripts: string[]
  threads: number
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(command => command === value)
}

/**
 * Parses argv (without node and script path) into a command and flags.
 *
 * @throws TypeError from util.parseArgs for unknown or malformed options
 */
export function parseCliArgs(argv: string[], config: AppConfig): {
  command: string | undefined
  flags: CliFlags
  help: boolean
} {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      input: { type: 'string' },
      output: { type: 'string' },
      report: { type: 'string' },
      'table-report': { type: 'string' },
      scripts: { type: 'string' },
      threads: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  return {
    command: positionals[0],
    help: values.help === true,
    flags: {
      input: values.input,
      output: values.output,
      report: values.report,
      tableReport: values['table-report'],
      scripts: values.scripts !== undefined ? parseScriptList(values.scripts) : config.scripts,
      // Non-numeric input becomes NaN and is rejected by option validation
      threads: values.threads !== undefined ? Number(values.threads) : config.threads,
    },
  }
}

function requireFlag(value: string | undefined, flag: string): string {
  if (value === undefined || value.length === 0) {
    throw new InvalidOptionsError([`${flag} is required`])
  }
  return value
}

function printSummary(label: string, summary: BatchSummary): void {
  const color = summary.filesWithErrors > 0 ? chalk.yellow : chalk.green
  console.log(color(`${label}: ${summary.message}`))
  for (const failure of summary.errors) {
    console.log(chalk.gray(`  [${failure.errorType}] ${failure.file}: ${failure.message}`))
  }
}

async function runCommand(command: Command, flags: CliFlags): Promise<void> {
  switch (command) {
    case 'scripts':
      console.log(listAvailableScripts().join('\n'))
      return

    case 'clean': {
      const summary = await batchCleanMarkdownFiles({
        inputDir: requireFlag(flags.input, '--input'),
        outputDir: requireFlag(flags.output, '--output'),
        scripts: flags.scripts,
        threads: flags.threads,
      })
      printSummary('Clean', summary)
      return
    }

    case 'analyze': {
      const { summary } = await generateAnalysisReport({
        inputDir: requireFlag(flags.input, '--input'),
        reportCsv: flags.report,
        outputDir: flags.output,
        scripts: flags.scripts,
        threads: flags.threads,
      })
      printSummary('Analysis', summary)
      if (flags.report !== undefined) console.log(chalk.cyan(`Report: ${flags.report}`))
      return
    }

    case 'detect-tables': {
      const { summary, scans } = await generateTableSummary({
        inputDir: requireFlag(flags.input, '--input'),
        outputCsv: requireFlag(flags.report, '--report'),
        threads: flags.threads,
      })
      printSummary('Tables', summary)
      const tables = scans.reduce((total, { scan }) => total + scan.totalTables, 0)
      console.log(chalk.cyan(`${tables} tables in ${scans.length} files. Report: ${flags.report}`))
      return
    }

    case 'table-report': {
      const { summary, scans } = await generateDetailedTableReport({
        inputDir: requireFlag(flags.input, '--input'),
        outputCsv: requireFlag(flags.report, '--report'),
        threads: flags.threads,
      })
      printSummary('Tables', summary)
      const issues = scans.reduce((total, { scan }) => total + scan.issues.length, 0)
      console.log(chalk.cyan(`${issues} table issues. Report: ${flags.report}`))
      return
    }

    case 'full-pipeline': {
      const result = await runFullPipeline({
        inputDir: requireFlag(flags.input, '--input'),
        finalOutputDir: requireFlag(flags.output, '--output'),
        reportCsv: requireFlag(flags.report, '--report'),
        tableReportCsv: flags.tableReport,
        scripts: flags.scripts,
        threads: flags.threads,
      })
      printSummary('Analysis', result.analysis)
      printSummary('Tables', result.tables)
      console.log(chalk.cyan(`Reports: ${result.reportCsv}, ${result.tableReportCsv}`))
      return
    }
  }
}

/**
 * Runs the CLI and returns the process exit code.
 * 0 = done (per-file errors are reported, not fatal), 1 = fatal error, 2 = usage error.
 */
export async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>
  try {
    const config = loadConfig()
    setLogLevel(config.logLevel)
    parsed = parseCliArgs(argv, config)
  } catch (error) {
    console.error(chalk.red(toError(error).message))
    console.error(USAGE)
    return 2
  }

  if (parsed.help) {
    console.log(USAGE)
    return 0
  }
  if (!isCommand(parsed.command)) {
    console.error(chalk.red(parsed.command === undefined ? 'Missing command' : `Unknown command: ${parsed.command}`))
    console.error(USAGE)
    return 2
  }

  try {
    await runCommand(parsed.command, parsed.flags)
    return 0
  } catch (error) {
    console.error(chalk.red(`❌ ${getUserFriendlyError(toError(error))}`))
    return 1
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      console.error(chalk.red('Fatal:'), error)
      process.exitCode = 1
    })
}
