/**
 * Core type definitions for the section editor
 * Defines interfaces, types, and error classes used throughout the system
 */

/**
 * Result of matching a line against the section start marker
 *
 * `undefined` when the line carries no start marker, `'malformed'` when the
 * marker is present but its closing bracket is missing.
 */
export type StartMarkerMatch = { name: string } | 'malformed' | undefined;

/**
 * Outline entry for a named section
 *
 * Anonymous wrapper sections created by the parser never appear in an
 * outline; their children are lifted into the enclosing list.
 *
 * @example
 * ```typescript
 * const outline: SectionOutline = {
 *   name: 'imports',
 *   children: [{ name: 'generated-imports', children: [] }]
 * };
 * ```
 */
export interface SectionOutline {
  /** Section name as written between the start marker brackets */
  name: string;

  /** Nested named sections in document order */
  children: SectionOutline[];
}

/**
 * Result of merging previously edited sections into generated text
 */
export interface MergeResult {
  /** Generated text with carried-over section content */
  text: string;

  /** Names whose content was carried over, sorted */
  merged: string[];

  /** Names found in the existing text but missing from the generated text, sorted */
  dropped: string[];
}

/**
 * Severity levels for section structure issues
 */
export type CheckSeverity = 'error' | 'warning';

/**
 * Single issue found during a section structure check
 *
 * @example
 * ```typescript
 * const issue: CheckIssue = {
 *   line: 15,
 *   severity: 'error',
 *   code: 'UNCLOSED_SECTION',
 *   message: 'Section "imports" opened at line 15 is never closed'
 * };
 * ```
 */
export interface CheckIssue {
  /** Line number where issue was detected (1-based) */
  line: number;

  /** Severity level: error (must fix) or warning (should fix) */
  severity: CheckSeverity;

  /** Machine-readable error code for programmatic handling */
  code: string;

  /** Human-readable description of the issue */
  message: string;
}

/**
 * Result of a section structure check
 *
 * Contains all issues found and summary statistics.
 * Content passes validation when errors is 0.
 */
export interface CheckResult {
  /** True when no errors found (warnings allowed) */
  valid: boolean;

  /** Count of error-level issues */
  errors: number;

  /** Count of warning-level issues */
  warnings: number;

  /** All issues found during check */
  issues: CheckIssue[];
}

/**
 * Configuration error exception
 *
 * Thrown when the configuration file is missing, malformed,
 * or contains invalid values.
 *
 * @example
 * ```typescript
 * throw new ConfigError('Invalid concurrency: -1. Must be a non-negative integer');
 * ```
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Section structure error exception
 *
 * Base class for every fatal error raised while parsing sections.
 * Carries the offending line and its 1-based line number.
 */
export class SectionParseError extends Error {
  readonly lineNumber: number;
  readonly line: string | null;

  constructor(message: string, lineNumber: number, line: string | null) {
    super(message);
    this.name = 'SectionParseError';
    this.lineNumber = lineNumber;
    this.line = line;
    Object.setPrototypeOf(this, SectionParseError.prototype);
  }
}

/**
 * Thrown when a start marker has no closing bracket on the same line
 *
 * @example
 * ```typescript
 * throw new MalformedSectionMarkerError('// SECTION-START[imports', 3);
 * ```
 */
export class MalformedSectionMarkerError extends SectionParseError {
  constructor(line: string, lineNumber: number) {
    super(`Malformed section start marker at line ${lineNumber}: "${line}"`, lineNumber, line);
    this.name = 'MalformedSectionMarkerError';
    Object.setPrototypeOf(this, MalformedSectionMarkerError.prototype);
  }
}

/**
 * Thrown when an end marker is found with no open section to close
 */
export class UnmatchedSectionEndError extends SectionParseError {
  constructor(line: string, lineNumber: number) {
    super(
      `Unexpected end of section at line ${lineNumber}: no open section to close`,
      lineNumber,
      line
    );
    this.name = 'UnmatchedSectionEndError';
    Object.setPrototypeOf(this, UnmatchedSectionEndError.prototype);
  }
}

/**
 * Thrown when input ends while a section is still open
 *
 * `sectionName` is the innermost open section, or `'/'` when that section
 * has no name.
 */
export class UnterminatedSectionError extends SectionParseError {
  readonly sectionName: string;

  constructor(sectionName: string | null, lineNumber: number) {
    const displayName = sectionName ?? '/';
    super(
      `Unexpected end of input at line ${lineNumber}: section "${displayName}" is not closed`,
      lineNumber,
      null
    );
    this.name = 'UnterminatedSectionError';
    this.sectionName = displayName;
    Object.setPrototypeOf(this, UnterminatedSectionError.prototype);
  }
}
