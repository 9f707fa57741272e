/**
 * Commander program definition.
 * Wires all CLI commands with lazy imports for fast --help.
 *
 * @module src/cli/program
 */

import { Command } from 'commander';
import {
  CLI_NAME,
  DEFAULT_TAXONOMY,
  ENV_CATALOG,
  PRODUCT_NAME,
  VERSION,
} from '../app/constants';
import type { IngestWarning } from '../ingestion';
import { setColorsEnabled } from './colors';
import {
  applyGlobalOptions,
  type GlobalOptions,
  parseGlobalOptions,
} from './context';
import { toCliError } from './errors';
import {
  assertTaxonomyName,
  RESERVED_TAXONOMY_NAMES,
  resolveSearchArgs,
  resolveTagArgs,
} from './taxonomy-args';
import * as ui from './ui';

// ─────────────────────────────────────────────────────────────────────────────
// Global State (set by preAction hook)
// ─────────────────────────────────────────────────────────────────────────────

// Using object wrapper to allow mutation while satisfying linter
const globalState: { current: GlobalOptions | null } = { current: null };

/**
 * Get resolved global options. Must be called after command parsing.
 * Throws if called before preAction hook runs.
 */
export function getGlobals(): GlobalOptions {
  if (!globalState.current) {
    throw new Error('Global options not resolved - called before preAction?');
  }
  return globalState.current;
}

/**
 * Reset global state (for testing).
 * Resets both option state and color state to avoid test pollution.
 */
export function resetGlobals(): void {
  globalState.current = null;
  // Reset colors to default (true) - will be set by applyGlobalOptions on next run
  setColorsEnabled(true);
}

function policy(): ui.OutputPolicy {
  return ui.createOutputPolicy(getGlobals());
}

/**
 * Print bulk-operation warnings to stderr. Under --json they are part of
 * the data instead.
 */
function reportWarnings(warnings: IngestWarning[]): void {
  if (!getGlobals().json) {
    ui.warnAll(warnings, policy());
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Program Factory
// ─────────────────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(`${PRODUCT_NAME} - content-addressed file catalog`)
    .version(VERSION, '-V, --version', 'show version')
    .exitOverride() // Prevent Commander from calling process.exit()
    .showSuggestionAfterError(true)
    .showHelpAfterError('(Use --help for available options)');

  // Global flags - resolved via preAction hook
  program
    .option(
      '--catalog <path>',
      `catalog database path (env: ${ENV_CATALOG}, default: ./.stowl)`
    )
    .option('--no-color', 'disable colors')
    .option('--verbose', 'verbose output')
    .option('-q, --quiet', 'suppress non-essential output')
    .option('--json', 'JSON output (for errors and supported commands)');

  // Resolve globals ONCE before any command runs (ensures consistency)
  program.hook('preAction', (thisCommand) => {
    const rootOpts = thisCommand.optsWithGlobals();
    const globals = parseGlobalOptions(rootOpts);
    applyGlobalOptions(globals);
    globalState.current = globals;
  });

  wireCatalogCommands(program);
  wireTaxonomyCommands(program);
  wireReconcileCommands(program);

  return program;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Commands (init, add, ls, status)
// ─────────────────────────────────────────────────────────────────────────────

function wireCatalogCommands(program: Command): void {
  program
    .command('init')
    .description('Create the catalog in the current directory')
    .action(async () => {
      const globals = getGlobals();
      const { init, formatInit } = await import('./commands/init');
      const result = await init({ catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatInit(result, { json: globals.json }));
    });

  program
    .command('add <paths...>')
    .description('Hash and register files, directories or patterns')
    .action(async (paths: string[]) => {
      const globals = getGlobals();
      const { add, formatAdd } = await import('./commands/add');
      const result = await add(paths, { catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatAdd(result, { json: globals.json }));
      reportWarnings(result.data.warnings);
      if (result.data.added.length === 0) {
        ui.hint('No files added', policy());
      }
    });

  program
    .command('ls')
    .description('List cataloged files')
    .option('-l, --long', 'show hash, size and modification time')
    .option('--tags', 'show tags of each file')
    .action(async (cmdOpts: Record<string, unknown>) => {
      const globals = getGlobals();
      const { ls, formatLs } = await import('./commands/ls');
      const result = await ls({
        catalogPath: globals.catalog,
        tags: Boolean(cmdOpts.tags),
      });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(
        formatLs(result, { json: globals.json, long: Boolean(cmdOpts.long) })
      );
    });

  program
    .command('status')
    .description('Show catalog counts')
    .action(async () => {
      const globals = getGlobals();
      const { status, formatStatus } = await import('./commands/status');
      const result = await status({ catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatStatus(result, { json: globals.json }));
    });
}

// ─────────────────────────────────────────────────────────────────────────────
// Taxonomy Commands (taxonomy, tag, search, tags)
// ─────────────────────────────────────────────────────────────────────────────

function wireTaxonomyCommands(program: Command): void {
  const taxonomyCmd = program
    .command('taxonomy')
    .description('Manage taxonomies');

  taxonomyCmd
    .command('init <name>')
    .description(
      `Create a taxonomy (reserved: ${RESERVED_TAXONOMY_NAMES.join(', ')})`
    )
    .action(async (name: string) => {
      const globals = getGlobals();
      assertTaxonomyName(name);
      const { taxonomyInit, formatTaxonomyInit } = await import(
        './commands/taxonomy'
      );
      const result = await taxonomyInit(name, { catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatTaxonomyInit(result, { json: globals.json }));
    });

  taxonomyCmd
    .command('list')
    .description('List taxonomies')
    .action(async () => {
      const globals = getGlobals();
      const { taxonomyList, formatTaxonomyList } = await import(
        './commands/taxonomy'
      );
      const result = await taxonomyList({ catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatTaxonomyList(result, { json: globals.json }));
    });

  // --<taxonomy> <value> flags are not declared; taxonomy-args parses them.
  // Global option names are reserved: the program consumes those first.
  program
    .command('tag')
    .description(
      `Tag a cataloged file: tag <file> [value] [--<taxonomy> <value>...] (value alone uses "${DEFAULT_TAXONOMY}")`
    )
    .argument('[args...]', 'file, optional value and --<taxonomy> <value> pairs')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      const globals = getGlobals();
      const { file, assignments } = resolveTagArgs(args);
      const { tag, formatTag } = await import('./commands/tag');
      const result = await tag(file, assignments, {
        catalogPath: globals.catalog,
      });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatTag(result, { json: globals.json }));
    });

  program
    .command('search')
    .description(
      `Find files by tag: search <value> | search --<taxonomy> <value>`
    )
    .argument('[args...]', 'value or one --<taxonomy> <value> pair')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      const globals = getGlobals();
      const term = resolveSearchArgs(args);
      const { search, formatSearch } = await import('./commands/search');
      const result = await search(term, { catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatSearch(result, { json: globals.json }));
      if (result.data.paths.length === 0) {
        ui.hint(
          `No files tagged ${result.data.taxonomy}=${result.data.value}`,
          policy()
        );
      }
    });

  program
    .command('tags [taxonomy]')
    .description(`List tag values with file counts (default: ${DEFAULT_TAXONOMY})`)
    .action(async (taxonomy: string | undefined) => {
      const globals = getGlobals();
      const { tagsList, formatTagsList } = await import('./commands/tags');
      const result = await tagsList(taxonomy, { catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatTagsList(result, { json: globals.json }));
    });
}

// ─────────────────────────────────────────────────────────────────────────────
// Reconcile Commands (check, verify, normalize)
// ─────────────────────────────────────────────────────────────────────────────

function wireReconcileCommands(program: Command): void {
  program
    .command('check [path]')
    .description('Report whether files are already cataloged by content')
    .action(async (path: string | undefined) => {
      const globals = getGlobals();
      const { check, formatCheck } = await import('./commands/check');
      const result = await check(path, { catalogPath: globals.catalog });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatCheck(result, { json: globals.json }));
      reportWarnings(result.data.warnings);
    });

  program
    .command('verify [path]')
    .description('Reconcile files on disk against the catalog')
    .option(
      '--detect-duplicates',
      'report copies whose original still exists as duplicates'
    )
    .action(async (path: string | undefined, cmdOpts: Record<string, unknown>) => {
      const globals = getGlobals();
      const { verify, formatVerify } = await import('./commands/verify');
      const result = await verify(path, {
        catalogPath: globals.catalog,
        detectDuplicates: cmdOpts.detectDuplicates === true ? true : undefined,
      });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatVerify(result, { json: globals.json }));
      reportWarnings(result.data.warnings);
      if (globals.verbose && !globals.json) {
        ui.info(`${result.data.unchanged} unchanged`);
      }
      if (result.data.entries.length === 0) {
        ui.hint('Catalog is up to date', policy());
      }
    });

  program
    .command('normalize [path]')
    .description('Rename files to normalized names and update the catalog')
    .option('--dry-run', 'show what would be renamed')
    .action(async (path: string | undefined, cmdOpts: Record<string, unknown>) => {
      const globals = getGlobals();
      const { normalize, formatNormalize } = await import(
        './commands/normalize'
      );
      const result = await normalize(path, {
        catalogPath: globals.catalog,
        dryRun: Boolean(cmdOpts.dryRun),
      });
      if (!result.success) {
        throw toCliError(result);
      }
      ui.output(formatNormalize(result, { json: globals.json }));
      reportWarnings(result.data.warnings);
    });
}
