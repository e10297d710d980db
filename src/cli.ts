#!/usr/bin/env node
/**
 * CLI tool to check, inspect and edit files containing sections
 *
 * Modes:
 *   Check mode:  section-edit <file> [--check]
 *   List mode:   section-edit <file> --list
 *   Trim mode:   section-edit <file> --trim [--write]
 *   Merge mode:  section-edit <file> --merge <generated> [--write]
 *
 * Output:
 *   Check mode: Writes the formatted check result to stdout, exits 1 on errors
 *   List mode:  Writes the indented section outline to stdout
 *   Trim/Merge: Writes the edited text to stdout, or back to <file> with --write
 */

import * as fs from 'fs';
import * as path from 'path';
import { checkSectionContent, formatCheckResult } from './checker.js';
import { createStrategy, loadConfig, ServerConfig } from './config.js';
import { mergeSections } from './merge.js';
import { TrailingWhitespaceEditor } from './trailing-whitespace.js';
import { outlineSections, readSectionTree } from './tree-reader.js';
import { SectionOutline } from './types.js';

export type CliMode = 'check' | 'list' | 'trim' | 'merge';

export interface ParsedArgs {
  mode: CliMode;
  inputFile: string;
  generatedFile?: string;
  configPath?: string;
  write: boolean;
}

export type ParseArgsResult = { ok: true; args: ParsedArgs } | { ok: false; error: string | null };

const MODE_FLAGS = new Map<string, CliMode>([
  ['--check', 'check'],
  ['--list', 'list'],
  ['--trim', 'trim'],
]);

/**
 * Parse command line arguments
 *
 * Returns `{ ok: false, error: null }` when help was requested.
 *
 * @param argv - Arguments without node and script path
 *
 * @example
 * ```typescript
 * parseArgs(['generated.ts', '--merge', 'generated.ts.new', '--write'])
 * // Returns: { ok: true, args: { mode: 'merge', inputFile: 'generated.ts',
 * //   generatedFile: 'generated.ts.new', write: true } }
 * ```
 */
export function parseArgs(argv: string[]): ParseArgsResult {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { ok: false, error: null };
  }

  let mode: CliMode | undefined;
  let inputFile: string | undefined;
  let generatedFile: string | undefined;
  let configPath: string | undefined;
  let write = false;

  const setMode = (next: CliMode): string | undefined => {
    if (mode && mode !== next) {
      return `Conflicting modes: --${mode} and --${next}`;
    }
    mode = next;
    return undefined;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const flagMode = MODE_FLAGS.get(arg);

    if (flagMode) {
      const conflict = setMode(flagMode);
      if (conflict) {
        return { ok: false, error: conflict };
      }
    } else if (arg === '--merge' || arg === '-m') {
      const conflict = setMode('merge');
      if (conflict) {
        return { ok: false, error: conflict };
      }
      generatedFile = argv[++i];
      if (!generatedFile) {
        return { ok: false, error: '--merge requires a path argument' };
      }
    } else if (arg === '--config' || arg === '-c') {
      configPath = argv[++i];
      if (!configPath) {
        return { ok: false, error: '--config requires a path argument' };
      }
    } else if (arg === '--write' || arg === '-w') {
      write = true;
    } else if (!arg.startsWith('-')) {
      if (inputFile) {
        return { ok: false, error: `Unexpected argument: ${arg}` };
      }
      inputFile = arg;
    } else {
      return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  if (!inputFile) {
    return { ok: false, error: 'Input file required' };
  }

  const resolvedMode = mode ?? 'check';
  if (write && resolvedMode !== 'trim' && resolvedMode !== 'merge') {
    return { ok: false, error: '--write is only supported with --trim and --merge' };
  }

  return {
    ok: true,
    args: { mode: resolvedMode, inputFile, generatedFile, configPath, write },
  };
}

/**
 * Print usage information to stderr
 */
function printUsage(): void {
  console.error(`
Usage: section-edit <file> [options]

Check, inspect and edit files containing SECTION-START[name] / SECTION-END markers.

Modes:
  --check                 Report malformed, unmatched and unclosed markers (default)
  --list                  Print the section outline
  --trim                  Remove trailing whitespace from every line
  -m, --merge <generated> Merge hand-edited sections of <file> into <generated>

Options:
  -w, --write             Write the result back to <file> (trim and merge only)
  -c, --config <path>     Path to section-editor.json
                          (defaults to SECTION_EDITOR_CONFIG env var or ./section-editor.json)
  -h, --help              Show this help message

Examples:
  section-edit src/generated.ts
  section-edit src/generated.ts --merge build/generated.ts --write
`);
}

/**
 * Render an outline as indented lines of section names
 */
export function formatOutline(outline: SectionOutline[], depth: number = 0): string[] {
  return outline.flatMap((entry) => [
    `${'  '.repeat(depth)}${entry.name}`,
    ...formatOutline(entry.children, depth + 1),
  ]);
}

function resolvePath(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
}

function readInput(filePath: string): string {
  const resolved = resolvePath(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Input file not found: ${resolved}`);
  }
  return fs.readFileSync(resolved, 'utf8');
}

function emit(text: string, args: ParsedArgs): void {
  if (args.write) {
    fs.writeFileSync(resolvePath(args.inputFile), text, 'utf8');
    console.error(`Wrote ${args.inputFile}`);
  } else {
    process.stdout.write(text);
  }
}

/**
 * Run the selected mode
 *
 * @returns Process exit code
 */
async function run(args: ParsedArgs, config: ServerConfig): Promise<number> {
  const content = readInput(args.inputFile);
  const options = { lineSeparator: config.lineSeparator, strategy: createStrategy(config) };

  switch (args.mode) {
    case 'check': {
      const result = checkSectionContent(content);
      process.stdout.write(formatCheckResult(result, args.inputFile) + '\n');
      return result.valid ? 0 : 1;
    }

    case 'list': {
      const outline = outlineSections(await readSectionTree(content, options));
      process.stdout.write(formatOutline(outline).map((line) => line + '\n').join(''));
      return 0;
    }

    case 'trim': {
      const editor = new TrailingWhitespaceEditor({ lineSeparator: config.lineSeparator });
      emit((await editor.edit(content)) ?? '', args);
      return 0;
    }

    case 'merge': {
      if (!args.generatedFile) {
        throw new Error('--merge requires a path argument');
      }
      const result = await mergeSections(readInput(args.generatedFile), content, options);
      if (result.dropped.length > 0) {
        console.error(`Dropped sections: ${result.dropped.join(', ')}`);
      }
      emit(result.text, args);
      return 0;
    }
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (!parsed.ok) {
    if (parsed.error) {
      console.error(`Error: ${parsed.error}`);
    }
    printUsage();
    process.exitCode = parsed.error ? 1 : 0;
    return;
  }

  const config = loadConfig(parsed.args.configPath);
  process.exitCode = await run(parsed.args, config);
}

// Only run main when executed directly, not when imported for testing
const isDirectRun =
  process.argv[1]?.endsWith('cli.js') ||
  process.argv[1]?.endsWith('cli.ts') ||
  process.argv[1]?.endsWith('section-edit');

if (isDirectRun) {
  main().catch((error) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
