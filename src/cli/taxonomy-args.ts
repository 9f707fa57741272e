/**
 * Parser for the "--<taxonomy> <value>" calling convention.
 * Commander passes these through as unknown options; they are resolved
 * into explicit (taxonomy, value) pairs before the taxonomy service runs.
 *
 * @module src/cli/taxonomy-args
 */

import { DEFAULT_TAXONOMY } from '../app/constants';
import type { TagAssignment } from '../taxonomy/service';
import { CliError } from './errors';

/**
 * Long names of the global options. The program consumes these wherever
 * they appear, so they never reach a command as taxonomy flags.
 */
export const RESERVED_TAXONOMY_NAMES: readonly string[] = [
  'catalog',
  'color',
  'no-color',
  'verbose',
  'quiet',
  'json',
  'version',
  'help',
];

/**
 * Reject taxonomy names that collide with a global option.
 */
export function assertTaxonomyName(name: string): void {
  const normalized = name.trim().toLowerCase();
  if (RESERVED_TAXONOMY_NAMES.includes(normalized)) {
    throw new CliError(
      'VALIDATION',
      `"${normalized}" is reserved for the global --${normalized} option and cannot name a taxonomy`
    );
  }
}

export type ParsedTaxonomyArgs = {
  /** Positional arguments in order */
  operands: string[];
  /** Flag pairs in order */
  pairs: TagAssignment[];
};

/**
 * Split raw arguments into operands and --<taxonomy> <value> pairs.
 * Accepts "--name value" and "--name=value"; "--" ends flag parsing.
 */
export function parseTaxonomyArgs(args: string[]): ParsedTaxonomyArgs {
  const operands: string[] = [];
  const pairs: TagAssignment[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      operands.push(...args.slice(i + 1));
      break;
    }

    if (!arg.startsWith('-') || arg === '-') {
      operands.push(arg);
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new CliError('VALIDATION', `Unknown option: ${arg}`);
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      const taxonomy = body.slice(0, eq);
      assertTaxonomyName(taxonomy);
      pairs.push({ taxonomy, value: body.slice(eq + 1) });
      continue;
    }
    assertTaxonomyName(body);

    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new CliError('VALIDATION', `Missing value for --${body}`);
    }
    pairs.push({ taxonomy: body, value: next });
    i += 1;
  }

  return { operands, pairs };
}

/**
 * Resolve `tag` arguments: <file> [value] [--<taxonomy> <value>...].
 * A bare value goes to the default taxonomy and is applied first.
 */
export function resolveTagArgs(args: string[]): {
  file: string;
  assignments: TagAssignment[];
} {
  const { operands, pairs } = parseTaxonomyArgs(args);
  const [file, value, ...extra] = operands;

  if (file === undefined) {
    throw new CliError('VALIDATION', 'Missing file argument');
  }
  if (extra.length > 0) {
    throw new CliError('VALIDATION', `Unexpected argument: ${extra[0]}`);
  }

  const assignments: TagAssignment[] =
    value === undefined ? [] : [{ taxonomy: DEFAULT_TAXONOMY, value }];
  assignments.push(...pairs);

  if (assignments.length === 0) {
    throw new CliError(
      'VALIDATION',
      'Nothing to tag: give a value or --<taxonomy> <value>'
    );
  }
  return { file, assignments };
}

/**
 * Resolve `search` arguments: [value] or --<taxonomy> <value>, exactly one.
 */
export function resolveSearchArgs(args: string[]): TagAssignment {
  const { operands, pairs } = parseTaxonomyArgs(args);
  const candidates: TagAssignment[] = [
    ...operands.map((value) => ({ taxonomy: DEFAULT_TAXONOMY, value })),
    ...pairs,
  ];

  const [only, ...rest] = candidates;
  if (only === undefined) {
    throw new CliError(
      'VALIDATION',
      'Missing search term: give a value or --<taxonomy> <value>'
    );
  }
  if (rest.length > 0) {
    throw new CliError('VALIDATION', 'Search takes exactly one term');
  }
  return only;
}
