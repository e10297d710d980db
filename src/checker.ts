/**
 * Section structure checker
 * Reports every marker problem in a text instead of stopping at the first one
 */

import * as fs from 'fs';
import { matchSectionEnd, matchSectionStart } from './markers.js';
import { CheckIssue, CheckResult } from './types.js';

/**
 * Check a file for section structure issues
 *
 * @param filePath - Path to the file to check
 * @returns Check result with issues and statistics
 *
 * @example
 * ```typescript
 * const result = checkSectionFile('/path/to/generated.ts');
 * if (!result.valid) {
 *   console.error(formatCheckResult(result, 'generated.ts'));
 * }
 * ```
 */
export function checkSectionFile(filePath: string): CheckResult {
  const content = fs.readFileSync(filePath, 'utf8');
  return checkSectionContent(content);
}

/**
 * Check content for section structure issues
 *
 * Validates:
 * - Start markers are closed by `]` (MALFORMED_MARKER)
 * - End markers close an open section (UNMATCHED_END)
 * - Every opened section is closed (UNCLOSED_SECTION)
 * - Section names are unique (DUPLICATE_SECTION, warning)
 * - Section names are not empty (EMPTY_NAME, warning)
 *
 * A malformed start marker does not open a section.
 */
export function checkSectionContent(content: string): CheckResult {
  const issues: CheckIssue[] = [];
  const lines = content.split(/\r\n|\r|\n/);

  const open: Array<{ line: number; name: string }> = [];
  const firstSeen = new Map<string, number>();

  for (let i = 0; i < lines.length; i++) {
    const lineNum = i + 1;
    const line = lines[i];

    const start = matchSectionStart(line);
    if (start === 'malformed') {
      issues.push({
        line: lineNum,
        severity: 'error',
        code: 'MALFORMED_MARKER',
        message: 'Malformed section start marker. Expected format: SECTION-START[name]',
      });
      continue;
    }

    if (start) {
      const { name } = start;

      if (name.length === 0) {
        issues.push({
          line: lineNum,
          severity: 'warning',
          code: 'EMPTY_NAME',
          message: 'Section has an empty name',
        });
      }

      const previous = firstSeen.get(name);
      if (previous === undefined) {
        firstSeen.set(name, lineNum);
      } else {
        issues.push({
          line: lineNum,
          severity: 'warning',
          code: 'DUPLICATE_SECTION',
          message: `Section "${name}" already opened at line ${previous}`,
        });
      }

      open.push({ line: lineNum, name });
      continue;
    }

    if (matchSectionEnd(line)) {
      if (!open.pop()) {
        issues.push({
          line: lineNum,
          severity: 'error',
          code: 'UNMATCHED_END',
          message: 'Section end marker without an open section',
        });
      }
    }
  }

  for (const section of open) {
    issues.push({
      line: section.line,
      severity: 'error',
      code: 'UNCLOSED_SECTION',
      message: `Section "${section.name}" opened at line ${section.line} is never closed`,
    });
  }

  // Sort issues by line number
  issues.sort((a, b) => a.line - b.line);

  const errors = issues.filter((i) => i.severity === 'error').length;
  const warnings = issues.filter((i) => i.severity === 'warning').length;

  return {
    valid: errors === 0,
    errors,
    warnings,
    issues,
  };
}

/**
 * Format check result for human-readable output
 *
 * @param result - Check result to format
 * @param label - File path or other label for display
 * @returns Formatted string with all issues
 */
export function formatCheckResult(result: CheckResult, label: string): string {
  const lines: string[] = [];

  if (result.valid && result.warnings === 0) {
    lines.push(`✓ ${label}: OK`);
    return lines.join('\n');
  }

  lines.push(`${result.valid ? '⚠' : '✗'} ${label}`);

  for (const issue of result.issues) {
    const icon = issue.severity === 'error' ? '  ✗' : '  ⚠';
    lines.push(`${icon} Line ${issue.line}: [${issue.code}] ${issue.message}`);
  }

  lines.push('');
  lines.push(`  ${result.errors} error(s), ${result.warnings} warning(s)`);

  return lines.join('\n');
}
