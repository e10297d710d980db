/**
 * MCP tool request handlers
 * Implements the section tools on top of the section editor
 */

import * as fs from 'fs';
import * as path from 'path';
import { checkSectionContent } from './checker.js';
import { createStrategy, ServerConfig } from './config.js';
import { mergeSections } from './merge.js';
import { SectionReplacer } from './replacer.js';
import { SectionEditorOptions } from './section-editor.js';
import { TrailingWhitespaceEditor } from './trailing-whitespace.js';
import { outlineSections, readSectionTree } from './tree-reader.js';

/**
 * MCP tool response structure
 *
 * Index signature required for MCP SDK compatibility.
 */
export interface ToolResponse {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  [key: string]: unknown;
}

/**
 * Tool argument interfaces for type safety
 */
interface SourceArgs {
  text?: string;
  file_path?: string;
}

interface ReplaceSectionsArgs extends SourceArgs {
  sections: Record<string, string>;
  write?: boolean;
}

interface MergeSectionsArgs {
  generated?: string;
  generated_file?: string;
  existing?: string;
  existing_file?: string;
  write?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === 'string');
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function isOptionalBoolean(value: unknown): value is boolean | undefined {
  return value === undefined || typeof value === 'boolean';
}

/**
 * Type guard for SourceArgs (exactly one of text and file_path)
 */
function isSourceArgs(args: unknown): args is SourceArgs {
  return (
    isRecord(args) &&
    isOptionalString(args.text) &&
    isOptionalString(args.file_path) &&
    (args.text === undefined) !== (args.file_path === undefined)
  );
}

/**
 * Type guard for ReplaceSectionsArgs
 */
function isReplaceSectionsArgs(args: unknown): args is ReplaceSectionsArgs {
  return (
    isSourceArgs(args) &&
    isRecord(args) &&
    isStringRecord(args.sections) &&
    isOptionalBoolean(args.write)
  );
}

/**
 * Type guard for MergeSectionsArgs
 */
function isMergeSectionsArgs(args: unknown): args is MergeSectionsArgs {
  return (
    isRecord(args) &&
    isOptionalString(args.generated) &&
    isOptionalString(args.generated_file) &&
    isOptionalString(args.existing) &&
    isOptionalString(args.existing_file) &&
    isOptionalBoolean(args.write) &&
    (args.generated === undefined) !== (args.generated_file === undefined) &&
    (args.existing === undefined) !== (args.existing_file === undefined)
  );
}

function textResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

function jsonResponse(value: unknown): ToolResponse {
  return textResponse(JSON.stringify(value, null, 2));
}

function editorOptions(config: ServerConfig): SectionEditorOptions {
  return {
    lineSeparator: config.lineSeparator,
    strategy: createStrategy(config),
  };
}

/**
 * Resolve a tool file path against the configured base directory
 */
export function resolveFilePath(filePath: string, config: ServerConfig): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(config.baseDir, filePath);
}

function readSource(
  text: string | undefined,
  filePath: string | undefined,
  config: ServerConfig
): string {
  if (text !== undefined) {
    return text;
  }
  if (filePath === undefined) {
    throw new Error('Either text or a file path is required');
  }

  const resolved = resolveFilePath(filePath, config);
  try {
    return fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new Error(
      `Failed to read file ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Handle list_sections tool request
 *
 * @param args - Tool arguments containing text or file_path
 * @param config - Server configuration
 * @returns Tool response with the section outline as JSON
 * @throws Error if arguments are invalid or the section structure is broken
 *
 * @example
 * ```typescript
 * const response = await handleListSections(
 *   { text: 'SECTION-START[a]\nSECTION-END\n' },
 *   config
 * );
 * // Returns: [{ "name": "a", "children": [] }]
 * ```
 */
export async function handleListSections(
  args: unknown,
  config: ServerConfig
): Promise<ToolResponse> {
  if (!isSourceArgs(args)) {
    throw new Error('Invalid arguments: expected { text: string } or { file_path: string }');
  }

  const source = readSource(args.text, args.file_path, config);
  const root = await readSectionTree(source, editorOptions(config));
  return jsonResponse(outlineSections(root));
}

/**
 * Handle replace_sections tool request
 *
 * Replaces the head content of the named sections. With `write` and a
 * `file_path`, the result is written back to the file.
 *
 * @returns Tool response with `{ text, unmatched }` as JSON
 * @throws Error if arguments are invalid or the section structure is broken
 */
export async function handleReplaceSections(
  args: unknown,
  config: ServerConfig
): Promise<ToolResponse> {
  if (!isReplaceSectionsArgs(args)) {
    throw new Error(
      'Invalid arguments: expected { text | file_path, sections: Record<string, string>, write?: boolean }'
    );
  }

  const source = readSource(args.text, args.file_path, config);
  const replacer = new SectionReplacer(args.sections, editorOptions(config));
  const text = (await replacer.edit(source)) ?? '';

  if (args.write && args.file_path !== undefined) {
    fs.writeFileSync(resolveFilePath(args.file_path, config), text, 'utf8');
  }

  return jsonResponse({ text, unmatched: replacer.unmatched });
}

/**
 * Handle merge_sections tool request
 *
 * Carries hand-edited section content of the existing text into the
 * generated text. With `write` and an `existing_file`, the merged text
 * replaces the existing file.
 *
 * @returns Tool response with `{ text, merged, dropped }` as JSON
 * @throws Error if arguments are invalid or either structure is broken
 */
export async function handleMergeSections(
  args: unknown,
  config: ServerConfig
): Promise<ToolResponse> {
  if (!isMergeSectionsArgs(args)) {
    throw new Error(
      'Invalid arguments: expected { generated | generated_file, existing | existing_file, write?: boolean }'
    );
  }

  const generated = readSource(args.generated, args.generated_file, config);
  const existing = readSource(args.existing, args.existing_file, config);
  const result = await mergeSections(generated, existing, editorOptions(config));

  if (args.write && args.existing_file !== undefined) {
    fs.writeFileSync(resolveFilePath(args.existing_file, config), result.text, 'utf8');
  }

  return jsonResponse(result);
}

/**
 * Handle check_sections tool request
 *
 * @returns Tool response with the check result as JSON
 * @throws Error if arguments are invalid
 */
export function handleCheckSections(args: unknown, config: ServerConfig): ToolResponse {
  if (!isSourceArgs(args)) {
    throw new Error('Invalid arguments: expected { text: string } or { file_path: string }');
  }

  const source = readSource(args.text, args.file_path, config);
  return jsonResponse(checkSectionContent(source));
}

/**
 * Handle trim_trailing_whitespace tool request
 *
 * @returns Tool response with the trimmed text
 * @throws Error if arguments are invalid
 */
export async function handleTrimTrailingWhitespace(
  args: unknown,
  config: ServerConfig
): Promise<ToolResponse> {
  if (!isSourceArgs(args)) {
    throw new Error('Invalid arguments: expected { text: string } or { file_path: string }');
  }

  const source = readSource(args.text, args.file_path, config);
  const editor = new TrailingWhitespaceEditor({ lineSeparator: config.lineSeparator });
  return textResponse((await editor.edit(source)) ?? '');
}
