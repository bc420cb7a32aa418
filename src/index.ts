#!/usr/bin/env node
/**
 * hunkscan - Diff-aware rule-based code analysis CLI
 * Main Entry Point
 */

// Global error handlers - must be set up first to catch any errors during startup
process.on('uncaughtException', (error, origin) => {
  console.error(`[hunkscan] Fatal: Uncaught exception from ${origin}:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[hunkscan] Fatal: Unhandled promise rejection:', reason);
  process.exit(1);
});

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { AnalysisCancelledError, type Report } from './analyzer/types.js';
import { runAnalysis } from './analyzer/engine.js';
import { loadCatalog } from './catalog/loader.js';
import { createProgressPrinterWithMode, type IProgressPrinter } from './cli/index.js';
import { StructuredProgressPrinter } from './cli/structured-progress.js';
import { resolveSettings, type SettingOverrides } from './config/env.js';
import {
  CONFIG_KEYS,
  ConfigError,
  clearConfig,
  deleteConfigValue,
  getConfigLocation,
  getConfigValue,
  isConfigKey,
  loadConfig,
  setConfigValue,
  type ConfigKey,
} from './config/store.js';
import { MyersLineDiffer } from './diff/line-diff.js';
import { locateChanges } from './diff/locator.js';
import { PatchProvider } from './git/parser.js';
import { GitRepository } from './git/repository.js';
import type { ChangeSet, GitProvider } from './git/type.js';
import { isSupportedLanguage } from './language/classifier.js';
import { formatReport } from './report/formatters.js';
import { meetsThreshold } from './report/aggregator.js';

/**
 * Exit code when a finding meets the --fail-on threshold
 */
const EXIT_THRESHOLD = 2;

/**
 * Print usage information
 */
function printUsage(): void {
  console.log(`
Usage: hunkscan <command> [options]

Commands:
  analyze <repo>                     Analyze lines changed between two refs
  rules                              List the loaded rule catalog
  config                             Manage configuration

Options (analyze command):
  --source=<ref>           Baseline ref (default: main)
  --target=<ref>           Ref with the changes (default: HEAD; HEAD also
                           includes staged, unstaged and untracked files)
  --include=<glob>         Only analyze matching paths (repeatable)
  --exclude=<glob>         Skip matching paths (repeatable)
  --no-default-excludes    Do not skip build output, lockfiles and binaries
  --format=<format>        summary (default) | detailed | json | markdown
  --fail-on=<severity>     Exit with code 2 if a finding is at or above severity
  --concurrency=<n>        Files analyzed in parallel (default: CPU count)
  --rules-dir=<path>       Extra YAML rules directory (repeatable)
  --diff-file=<path>       Analyze a unified diff file instead of the repository
  --json-logs              Progress as NDJSON events on stderr
  --verbose                Enable verbose output

Options (rules command):
  --language=<lang>        Only rules applying to rust | javascript | typescript | python
  --rules-dir=<path>       Extra YAML rules directory (repeatable)

Environment:
  HUNKSCAN_FORMAT, HUNKSCAN_FAIL_ON, HUNKSCAN_CONCURRENCY override the config file.
  HUNKSCAN_CONFIG_DIR moves the config directory.

Exit codes:
  0  Analysis completed
  1  Analysis failed or was cancelled
  2  Analysis completed with findings at or above --fail-on

Examples:
  hunkscan analyze . --source=main
  hunkscan analyze /path/to/repo --source=v1.2.0 --target=v1.3.0 --format=markdown
  hunkscan analyze . --exclude="test_files/**" --fail-on=high
  hunkscan analyze . --diff-file=./change.patch --format=json
`);
}

/**
 * Print config command usage
 */
function printConfigUsage(): void {
  console.log(`
Usage: hunkscan config <subcommand> [options]

Subcommands:
  set <key> <value>    Set a configuration value
  get <key>            Get a configuration value
  list                 List all configuration
  delete <key>         Delete a configuration value
  clear                Remove all configuration
  path                 Show config file location

Keys:
  format        summary | detailed | json | markdown
  failOn        critical | high | medium | low | info
  concurrency   Positive integer
  rulesDirs     Comma-separated list of rule directories
  exclude       Comma-separated list of exclusion globs

Examples:
  hunkscan config set format markdown
  hunkscan config set exclude "vendor/**,fixtures/**"
  hunkscan config get failOn
  hunkscan config list

Note:
  Config is stored in ${getConfigLocation()}
  Environment variables and command-line flags take precedence over config file values.
`);
}

function displayValue(value: unknown): string {
  return Array.isArray(value) ? value.join(', ') : String(value);
}

/**
 * Handle config command
 */
function runConfigCommand(args: string[]): number {
  const subcommand = args[0];

  if (!subcommand || subcommand === 'help' || subcommand === '--help') {
    printConfigUsage();
    return 0;
  }

  const requireKey = (): ConfigKey | undefined => {
    const key = args[1];
    if (!key) {
      console.error(`Error: config ${subcommand} requires <key>\n`);
      printConfigUsage();
      return undefined;
    }
    if (!isConfigKey(key)) {
      console.error(`Error: Unknown config key "${key}"`);
      console.error(`Valid keys: ${CONFIG_KEYS.join(', ')}`);
      return undefined;
    }
    return key;
  };

  switch (subcommand) {
    case 'set': {
      const key = requireKey();
      const value = args[2];
      if (key === undefined) return 1;
      if (value === undefined) {
        console.error('Error: config set requires <key> and <value>\n');
        printConfigUsage();
        return 1;
      }
      setConfigValue(key, value);
      console.log(`Set ${key} = ${displayValue(getConfigValue(key))}`);
      return 0;
    }

    case 'get': {
      const key = requireKey();
      if (key === undefined) return 1;
      const value = getConfigValue(key);
      console.log(value === undefined ? '(not set)' : displayValue(value));
      return 0;
    }

    case 'list': {
      const config = loadConfig();

      console.log('Current configuration:');
      console.log('=================================');

      const entries = Object.entries(config);
      if (entries.length === 0) {
        console.log('(no configuration set)');
      } else {
        for (const [key, value] of entries) {
          console.log(`${(key + ':').padEnd(13)}${displayValue(value)}`);
        }
      }

      console.log('=================================');
      console.log(`Config file: ${getConfigLocation()}`);
      return 0;
    }

    case 'delete': {
      const key = requireKey();
      if (key === undefined) return 1;
      deleteConfigValue(key);
      console.log(`Deleted ${key}`);
      return 0;
    }

    case 'clear': {
      clearConfig();
      console.log('Configuration cleared');
      return 0;
    }

    case 'path': {
      console.log(getConfigLocation());
      return 0;
    }

    default:
      console.error(`Error: Unknown config subcommand "${subcommand}"\n`);
      printConfigUsage();
      return 1;
  }
}

/**
 * Options parsed from the command line
 */
interface CliOptions {
  source?: string;
  target?: string;
  include: string[];
  defaultExcludes: boolean;
  diffFile?: string;
  language?: string;
  jsonLogs: boolean;
  verbose: boolean;
  settings: SettingOverrides & { rulesDirs: string[]; exclude: string[] };
}

/**
 * Parse `--key=value` and boolean flags; repeatable flags accumulate
 */
function parseOptions(args: string[]): CliOptions {
  const options: CliOptions = {
    include: [],
    defaultExcludes: true,
    jsonLogs: false,
    verbose: false,
    settings: { rulesDirs: [], exclude: [] },
  };

  for (const arg of args) {
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    switch (name) {
      case '--no-default-excludes':
        options.defaultExcludes = false;
        continue;
      case '--json-logs':
        options.jsonLogs = true;
        continue;
      case '--verbose':
        options.verbose = true;
        continue;
    }

    if (!value) {
      throw new ConfigError(`Option ${name} requires a value (${name}=<value>)`);
    }

    switch (name) {
      case '--source':
        options.source = value;
        break;
      case '--target':
        options.target = value;
        break;
      case '--include':
        options.include.push(value);
        break;
      case '--exclude':
        options.settings.exclude.push(value);
        break;
      case '--rules-dir':
        options.settings.rulesDirs.push(value);
        break;
      case '--format':
        options.settings.format = value;
        break;
      case '--fail-on':
        options.settings.failOn = value;
        break;
      case '--concurrency':
        options.settings.concurrency = value;
        break;
      case '--diff-file':
        options.diffFile = value;
        break;
      case '--language':
        options.language = value;
        break;
      default:
        throw new ConfigError(`Unknown option ${name}`);
    }
  }

  return options;
}

/**
 * Run the analyze command and return the exit code
 */
async function runAnalyzeCommand(repoPath: string, options: CliOptions, signal: AbortSignal): Promise<number> {
  const settings = resolveSettings(options.settings);
  const printer = createProgressPrinterWithMode({
    mode: options.jsonLogs ? 'json' : 'auto',
    verbose: options.verbose,
  });
  const progress: IProgressPrinter = printer;

  const sourceRef = options.source ?? 'main';
  const targetRef = options.target ?? 'HEAD';
  const startTime = Date.now();

  if (printer instanceof StructuredProgressPrinter) {
    printer.initAnalysis(repoPath, options.diffFile ? 'patch' : sourceRef, options.diffFile ? 'patch' : targetRef);
  }

  try {
    progress.phase(1, 3, 'Loading rule catalog...');
    const catalog = await loadCatalog({ rulesDirs: settings.rulesDirs, verbose: options.verbose });
    progress.success(`Loaded ${catalog.size} rules`);

    progress.phase(2, 3, 'Locating changed lines...');
    const filter = {
      include: options.include.length > 0 ? options.include : undefined,
      exclude: settings.exclude,
      defaultExcludes: options.defaultExcludes,
    };

    let provider: GitProvider;
    let changeSet: ChangeSet;
    if (options.diffFile) {
      const patch = new PatchProvider(await readFile(options.diffFile, 'utf-8'));
      provider = patch;
      changeSet = await patch.locate(filter);
    } else {
      provider = new GitRepository(repoPath);
      changeSet = await locateChanges(provider, new MyersLineDiffer(), {
        ...filter,
        sourceRef,
        targetRef,
        verbose: options.verbose,
      });
    }
    progress.success(`${changeSet.files.length} changed files (${changeSet.skipped.length} skipped)`);

    progress.phase(3, 3, 'Analyzing changed lines...');
    const report: Report = await runAnalysis(changeSet, provider, catalog, {
      concurrency: settings.concurrency,
      signal,
      progress,
    });
    progress.success(`Analyzed ${report.files_analyzed} files`);
    progress.stats([
      { label: 'Findings', value: report.findings.length },
      { label: 'Critical', value: report.severity_counts.critical },
      { label: 'High', value: report.severity_counts.high },
      { label: 'Skipped', value: report.files_skipped },
    ]);
    progress.complete(report.findings.length, Date.now() - startTime);
    progress.report?.(report);

    process.stdout.write(formatReport(report, settings.format) + '\n');

    if (settings.failOn !== undefined && meetsThreshold(report, settings.failOn)) {
      return EXIT_THRESHOLD;
    }
    return 0;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    progress.failed(message);
    throw error;
  }
}

/**
 * List the rule catalog
 */
async function runRulesCommand(options: CliOptions): Promise<number> {
  const settings = resolveSettings(options.settings);
  const catalog = await loadCatalog({ rulesDirs: settings.rulesDirs, verbose: options.verbose });

  let rules = catalog.rules;
  if (options.language !== undefined) {
    const language = options.language;
    if (!isSupportedLanguage(language) && language !== 'unknown') {
      throw new ConfigError(`Unknown language "${language}"`);
    }
    rules = catalog.rulesFor(language);
  }

  for (const rule of rules) {
    const scope = rule.languages === 'generic' ? 'generic' : rule.languages.join(',');
    const owasp = rule.owasp ? ` ${rule.owasp}` : '';
    console.log(`${rule.id.padEnd(28)} ${rule.severity.padEnd(9)}${rule.category.padEnd(16)}${scope}${owasp}`);
  }
  console.log(`\n${rules.length} rules`);
  return 0;
}

/**
 * Main CLI function, resolving to the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  // Handle no arguments or help
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printUsage();
    return 0;
  }

  const command = argv[0];
  const rest = argv.slice(1);

  if (command === 'config') {
    return runConfigCommand(rest);
  }

  const optionArgs = rest.filter((a) => a.startsWith('--'));
  const positionalArgs = rest.filter((a) => !a.startsWith('--'));

  if (command === 'rules') {
    return runRulesCommand(parseOptions(optionArgs));
  }

  if (command === 'analyze') {
    const options = parseOptions(optionArgs);
    const repoPath = positionalArgs[0] ?? (options.diffFile ? '.' : undefined);
    if (!repoPath) {
      console.error('Error: analyze command requires <repo>\n');
      printUsage();
      return 1;
    }

    const controller = new AbortController();
    const onSigint = (): void => {
      console.error('\nCancelling: waiting for files in progress...');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
      return await runAnalyzeCommand(repoPath, options, controller.signal);
    } catch (error: unknown) {
      if (error instanceof AnalysisCancelledError) {
        console.error(`\n❌ ${error.message}`);
        return 1;
      }
      if (error instanceof Error) {
        console.error(`\n❌ Analysis failed: ${error.message}`);
        if (options.verbose || process.env.DEBUG) {
          console.error('\nStack trace:');
          console.error(error.stack);
        } else if (!options.jsonLogs) {
          console.error('(Run with --verbose or DEBUG=1 to see stack trace)');
        }
      } else {
        console.error('\n❌ Unexpected error:', error);
      }
      return 1;
    } finally {
      process.off('SIGINT', onSigint);
    }
  }

  // Unknown command
  console.error(`Error: Unknown command "${command}"\n`);
  printUsage();
  return 1;
}

// Run CLI
main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
