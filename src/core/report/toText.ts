import type { AnalysisResult, FormatOptions, RelationReport, SampleReport } from './reportTypes.js';
import { formatAttributes, formatDependency } from '../analysis/normalizeChecks/format.js';

/**
 * Format an AnalysisResult as human-readable text.
 */
export function toText(result: AnalysisResult, options?: FormatOptions): string {
  const lines: string[] = [];

  lines.push('=== Functional Dependency Analysis ===');
  lines.push('');

  if (result.metadata.timestamp !== null) {
    lines.push(`Timestamp: ${result.metadata.timestamp}`);
  }
  if (result.metadata.inputPath !== null) {
    lines.push(`Input:     ${result.metadata.inputPath}`);
  }
  lines.push(`Relations: ${String(result.metadata.relationCount)}`);
  lines.push(`Findings:  ${String(result.metadata.findingCount)}`);
  lines.push(`Covers:    ${result.metadata.coverMode}`);
  lines.push('');

  if (options?.findingsOnly !== true) {
    lines.push('--- Relations ---');
    for (const relation of result.relations) {
      pushRelation(lines, relation);
    }
    lines.push('');
  }

  // Findings
  if (result.findings.length > 0) {
    lines.push('--- Findings ---');
    for (const f of result.findings) {
      const attribute = f.attribute !== null ? `.${f.attribute}` : '';
      lines.push(`  [${f.severity.toUpperCase()}] ${f.rule} @ ${f.relation}${attribute}`);
      lines.push(`    ${f.message}`);
    }
  } else {
    lines.push('No normalization findings.');
  }

  lines.push('');
  return lines.join('\n');
}

function pushRelation(lines: string[], relation: RelationReport): void {
  const yesNo = (value: boolean): string => (value ? 'yes' : 'no');

  lines.push(`  Relation: ${relation.name} ${formatAttributes(relation.attributes)}`);
  lines.push(`    Keys:  ${relation.candidateKeys.map(formatAttributes).join(', ')}`);
  lines.push(`    Prime: ${formatAttributes(relation.primeAttributes)}`);
  lines.push(
    `    Normal form: ${relation.highestNormalForm} (BCNF: ${yesNo(relation.normalForms.bcnf)}, 3NF: ${yesNo(relation.normalForms.thirdNf)}, 2NF: ${yesNo(relation.normalForms.secondNf)})`,
  );

  if (relation.minimalCover !== null) {
    lines.push('    Minimal cover:');
    for (const fd of relation.minimalCover) {
      lines.push(`      ${formatDependency(fd)}`);
    }
  }

  if (relation.allMinimalCovers !== null) {
    lines.push(`    Minimal covers (${String(relation.allMinimalCovers.length)}):`);
    relation.allMinimalCovers.forEach((cover, index) => {
      lines.push(`      #${String(index + 1)}: ${cover.map(formatDependency).join('; ')}`);
    });
  }
}

/** Summary of a sample rush: how many samples reached each normal form. */
export function sampleReportToText(report: SampleReport): string {
  const { summary } = report;
  return [
    '=== Sample Rush ===',
    '',
    `Attributes:   ${String(report.attributeCount)}`,
    `Distribution: ${report.distribution}`,
    `Samples:      ${String(summary.samples)}`,
    `BCNF:         ${String(summary.bcnf)}`,
    `3NF:          ${String(summary.thirdNf)}`,
    `2NF:          ${String(summary.secondNf)}`,
    `Time (ms):    ${summary.totalTimeMs.toFixed(3)}`,
    '',
  ].join('\n');
}
