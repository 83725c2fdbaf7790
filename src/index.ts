export type {
  AnalysisResult,
  AnalysisMetadata,
  CoverMode,
  Finding,
  FormatOptions,
  NamedDependency,
  NormalForm,
  NormalFormLevel,
  NormalFormResults,
  OutputFormat,
  RelationReport,
  RuleCode,
  SampleReport,
  Severity,
} from './core/report/reportTypes.js';

export type { FunctionalDependency, DependencySlot } from './core/dependencies/functionalDependency.js';
export type { DeclaredDependency, RelationDeclaration, RelationsFile } from './core/relations/schema.js';
export type { ParsedRelations } from './core/relations/parse.js';
export type { RelationAnalysis } from './core/analysis/analyzeRelation.js';
export type { Distribution, FdGeneratorOptions } from './core/sampling/generator.js';
export type {
  FdCountDistribution,
  SampleResult,
  SampleRunOptions,
  SampleRushOptions,
  SampleSummary,
} from './core/sampling/sampleRush.js';

export { AttributeSet } from './core/attributes/attributeSet.js';
export {
  FdNormalizerError,
  IndexOutOfRangeError,
  ValueOutOfRangeError,
  LengthMismatchError,
  InvalidLengthError,
  DuplicateAttributeError,
  UnknownAttributeError,
  GenerationLimitError,
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';
export {
  dependency,
  dependencyOf,
  isTrivial,
  dependencyKey,
  dependencyEquals,
  compareDependencies,
  dedupeDependencies,
  sortDependencies,
  canonicalDependencies,
  isDependencySubset,
  sameDependencySet,
} from './core/dependencies/functionalDependency.js';
export { attributeClosure, isSuperkey, implies, areEquivalent } from './core/analysis/closure.js';
export { attributeCombinations, candidateKeys, primeAttributes } from './core/analysis/computeKeys.js';
export {
  decompose,
  dropTrivial,
  minimizeLeft,
  minimizeLeftAll,
  minimizeRight,
  minimizeRightAll,
  minimalCover,
  allMinimalCovers,
  allMinimalCoversOfClosure,
  compact,
} from './core/analysis/minimalCover.js';
export { sigmaPlusLimited } from './core/analysis/sigmaPlus.js';
export { isBcnf, is3nf, is2nf, NormalFormClassifier } from './core/analysis/normalizeChecks/normalForms.js';
export { AttributeNameAdapter } from './core/relations/adapter.js';
export { parseRelations, parseRelationsFile } from './core/relations/parse.js';
export { analyzeRelation } from './core/analysis/analyzeRelation.js';
export { toJson, sampleReportToJson } from './core/report/toJson.js';
export { toText, sampleReportToText } from './core/report/toText.js';
export { XorShift32 } from './core/sampling/rng.js';
export { FdGenerator } from './core/sampling/generator.js';
export { SampleRush, evaluateSample, summarizeSamples } from './core/sampling/sampleRush.js';

import { analyzeRelation } from './core/analysis/analyzeRelation.js';
import { parseRelationsFile } from './core/relations/parse.js';
import type { ParsedRelations } from './core/relations/parse.js';
import type { AnalysisResult, CoverMode, Finding, RelationReport } from './core/report/reportTypes.js';
import { sortBy } from './util/index.js';

/** Options for the analyze function. */
export interface AnalyzeOptions {
  readonly inputPath: string;
  readonly covers?: CoverMode | undefined;
  readonly noTimestamp?: boolean | undefined;
}

/** Options for analyzing relations already held in memory. */
export interface AnalyzeRelationsOptions {
  readonly covers?: CoverMode | undefined;
  readonly noTimestamp?: boolean | undefined;
  readonly inputPath?: string | null | undefined;
}

/**
 * Run a full analysis on a relations file.
 * Returns per-relation reports and normalization findings.
 */
export function analyze(
  inputPathOrOptions: string | AnalyzeOptions,
  noTimestamp = false,
): AnalysisResult {
  const options: AnalyzeOptions =
    typeof inputPathOrOptions === 'string'
      ? { inputPath: inputPathOrOptions, noTimestamp }
      : inputPathOrOptions;

  const parsed = parseRelationsFile(options.inputPath);
  return analyzeRelations(parsed, {
    covers: options.covers,
    noTimestamp: options.noTimestamp,
    inputPath: options.inputPath,
  });
}

/**
 * Analyze every relation of a parsed relations document, in name order,
 * and apply its suppress list.
 */
export function analyzeRelations(
  parsed: ParsedRelations,
  options: AnalyzeRelationsOptions = {},
): AnalysisResult {
  const coverMode = options.covers ?? 'one';
  const shouldOmitTimestamp = options.noTimestamp === true;

  const relations: RelationReport[] = [];
  const allFindings: Finding[] = [];
  for (const [name, declaration] of sortBy(Object.entries(parsed.relations), ([n]) => n)) {
    const { report, findings } = analyzeRelation(name, declaration, coverMode);
    relations.push(report);
    allFindings.push(...findings);
  }

  const findings = parsed.suppress.length > 0
    ? allFindings.filter((f) => !isSuppressed(f, parsed.suppress))
    : allFindings;

  return {
    relations,
    findings,
    metadata: {
      inputPath: options.inputPath ?? null,
      timestamp: shouldOmitTimestamp ? null : new Date().toISOString(),
      relationCount: relations.length,
      findingCount: findings.length,
      coverMode,
    },
  };
}

/**
 * Check if a finding is suppressed by a suppress entry.
 * Supports RULE:Relation and RULE:Relation.attribute patterns.
 */
function isSuppressed(finding: Finding, suppress: readonly string[]): boolean {
  for (const entry of suppress) {
    const colonIdx = entry.indexOf(':');
    const rule = entry.slice(0, colonIdx);
    const target = entry.slice(colonIdx + 1);

    if (rule !== finding.rule) {
      continue;
    }

    const dotIdx = target.indexOf('.');
    if (dotIdx === -1) {
      // RULE:Relation: every finding for this relation
      if (target === finding.relation) {
        return true;
      }
    } else {
      // RULE:Relation.attribute: only that attribute
      const relation = target.slice(0, dotIdx);
      const attribute = target.slice(dotIdx + 1);
      if (relation === finding.relation && attribute === finding.attribute) {
        return true;
      }
    }
  }
  return false;
}
