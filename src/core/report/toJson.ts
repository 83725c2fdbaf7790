import type { AnalysisResult, FormatOptions, SampleReport } from './reportTypes.js';
import { isRecord } from '../../util/index.js';

/**
 * Serialize an AnalysisResult to a deterministic JSON string.
 * Keys are sorted for stable diffing.
 */
export function toJson(result: AnalysisResult, pretty: boolean, options?: FormatOptions): string {
  const data = options?.findingsOnly === true
    ? { findings: result.findings, metadata: result.metadata }
    : result;
  return stringifySorted(data, pretty);
}

/** Serialize a sample rush report with the same key ordering. */
export function sampleReportToJson(report: SampleReport, pretty: boolean): string {
  return stringifySorted(report, pretty);
}

function stringifySorted(value: unknown, pretty: boolean): string {
  return JSON.stringify(value, sortKeys, pretty ? 2 : undefined);
}

// JSON.stringify recurses into whatever the replacer returns, so sorting
// each object on the way down sorts every level.
function sortKeys(_key: string, value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  return Object.fromEntries(Object.keys(value).sort().map((key) => [key, value[key]]));
}
