/**
 * Human-readable output for extraction results
 */

import { NOT_AVAILABLE, type RuleRecord } from '@stig-extract/contracts';
import { buildSeveritySummary, shortHash } from '@stig-extract/shared';
import type { ExtractionFailure, ExtractionSuccess } from '@stig-extract/xccdf-parser';

const SEPARATOR = '-'.repeat(20);

/**
 * Preview lines for a successful extraction: a count, a severity
 * breakdown and the identifier fields and title of the first `limit` records.
 */
export function formatPreview(result: ExtractionSuccess, limit: number): string[] {
  if (result.records.length === 0) {
    return [`No rules found in ${result.path}.`];
  }

  const summary = buildSeveritySummary(result.records);
  const { high, medium, low } = summary.totalBySeverity;

  const lines = [
    `Successfully parsed ${result.records.length} STIG rules.`,
    `Severity: high=${high} medium=${medium} low=${low} other=${summary.unclassified}`,
    `Fingerprint: ${shortHash(result.fingerprint)}`,
  ];

  if (result.benchmark.title) {
    lines.splice(1, 0, `Benchmark: ${result.benchmark.title}`);
  }

  result.records.slice(0, limit).forEach((record, index) => {
    lines.push('', ...formatRecord(record, index + 1));
  });

  return lines;
}

export function formatRecord(record: RuleRecord, position: number): string[] {
  return [
    `--- Rule ${position} ---`,
    `STIG ID: ${record.stigId}`,
    `Rule ID: ${record.ruleId ?? NOT_AVAILABLE}`,
    `Severity: ${record.severity ?? NOT_AVAILABLE}`,
    `Title: ${record.title}`,
    SEPARATOR,
  ];
}

export function formatFailure(result: ExtractionFailure): string {
  return `Could not read rules from ${result.path}: ${result.error.message}`;
}
