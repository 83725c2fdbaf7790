import type { Distribution } from '../sampling/generator.js';
import type { SampleSummary } from '../sampling/sampleRush.js';

/** Severity levels for analysis findings. */
export type Severity = 'error' | 'warning' | 'info';

/** Normal forms a relation can reach, weakest first. */
export type NormalFormLevel = '1NF' | '2NF' | '3NF' | 'BCNF';

/** Normal form a finding belongs to; SCHEMA covers declaration problems. */
export type NormalForm = NormalFormLevel | 'SCHEMA';

/** Unique finding rule codes. */
export type RuleCode =
  | 'NF2_PARTIAL_DEPENDENCY'
  | 'NF3_TRANSITIVE_DEPENDENCY'
  | 'BCNF_VIOLATION'
  | 'RELATION_UNKNOWN_ATTRIBUTE'
  | 'RELATION_TRIVIAL_DEPENDENCY';

/** A functional dependency written with attribute names. */
export interface NamedDependency {
  readonly determinant: readonly string[];
  readonly dependent: readonly string[];
}

/** A single normalization finding. */
export interface Finding {
  readonly rule: RuleCode;
  readonly severity: Severity;
  readonly normalForm: NormalForm;
  readonly relation: string;
  readonly attribute: string | null;
  readonly dependency: NamedDependency | null;
  readonly message: string;
  readonly fix: string | null;
}

/** Which minimal covers to compute for each relation. */
export type CoverMode = 'none' | 'one' | 'all' | 'implied';

/** Outcome of each normal-form predicate. */
export interface NormalFormResults {
  readonly bcnf: boolean;
  readonly thirdNf: boolean;
  readonly secondNf: boolean;
}

/** Everything computed for one relation. */
export interface RelationReport {
  readonly name: string;
  readonly attributes: readonly string[];
  readonly dependencies: readonly NamedDependency[];
  readonly candidateKeys: readonly (readonly string[])[];
  readonly primeAttributes: readonly string[];
  readonly normalForms: NormalFormResults;
  readonly highestNormalForm: NormalFormLevel;
  /** Present when covers are computed in `one` mode. */
  readonly minimalCover: readonly NamedDependency[] | null;
  /** Present in `all` and `implied` modes. */
  readonly allMinimalCovers: readonly (readonly NamedDependency[])[] | null;
}

/** Output format options. */
export type OutputFormat = 'json' | 'text';

/** Options controlling formatter output. */
export interface FormatOptions {
  readonly findingsOnly?: boolean | undefined;
}

/** The complete analysis result. */
export interface AnalysisResult {
  readonly relations: readonly RelationReport[];
  readonly findings: readonly Finding[];
  readonly metadata: AnalysisMetadata;
}

/** Metadata about the analysis run. */
export interface AnalysisMetadata {
  readonly inputPath: string | null;
  readonly timestamp: string | null;
  readonly relationCount: number;
  readonly findingCount: number;
  readonly coverMode: CoverMode;
}

/** Outcome of a sample rush over random dependency sets. */
export interface SampleReport {
  readonly attributeCount: number;
  readonly distribution: Distribution['kind'];
  readonly summary: SampleSummary;
}
