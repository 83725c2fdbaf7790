import { isTrivial } from '../dependencies/functionalDependency.js';
import { AttributeNameAdapter } from '../relations/adapter.js';
import type { DeclaredDependency, RelationDeclaration } from '../relations/schema.js';
import type { CoverMode, Finding, NamedDependency, RelationReport } from '../report/reportTypes.js';
import { allMinimalCovers, allMinimalCoversOfClosure, minimalCover } from './minimalCover.js';
import { check2nf } from './normalizeChecks/check2nf.js';
import { check3nf } from './normalizeChecks/check3nf.js';
import { formatDependency } from './normalizeChecks/format.js';
import { NormalFormClassifier } from './normalizeChecks/normalForms.js';

/** Report and findings for one relation. */
export interface RelationAnalysis {
  readonly report: RelationReport;
  readonly findings: readonly Finding[];
}

/**
 * Analyze one declared relation: encode its dependencies, compute candidate
 * keys, the normal-form ladder, the requested minimal covers, and findings.
 *
 * Dependencies naming attributes outside the declared universe are reported
 * and left out of the analysis.
 */
export function analyzeRelation(
  name: string,
  declaration: RelationDeclaration,
  coverMode: CoverMode,
): RelationAnalysis {
  const declared = declaration.functionalDependencies ?? [];
  const adapter =
    declaration.attributes !== undefined
      ? new AttributeNameAdapter(declaration.attributes)
      : AttributeNameAdapter.fromDependencies(declared);

  const findings: Finding[] = [];
  const known: DeclaredDependency[] = [];
  const declaredIndex: number[] = [];
  declared.forEach((fd, index) => {
    const unknown = [...new Set([...fd.determinant, ...fd.dependent])].filter(
      (attribute) => !adapter.has(attribute),
    );
    for (const attribute of unknown) {
      findings.push({
        rule: 'RELATION_UNKNOWN_ATTRIBUTE',
        severity: 'warning',
        normalForm: 'SCHEMA',
        relation: name,
        attribute,
        dependency: { determinant: fd.determinant, dependent: fd.dependent },
        message: `FD ${formatDependency(fd)} references attribute "${attribute}" which is not declared on relation "${name}". The dependency is ignored.`,
        fix: `Add "${attribute}" to the attributes of "${name}" or remove it from the dependency.`,
      });
    }
    if (unknown.length === 0) {
      known.push(fd);
      declaredIndex.push(index + 1);
    }
  });

  const fds = adapter.toDependencies(known);
  fds.forEach((fd, index) => {
    if (isTrivial(fd)) {
      const named: NamedDependency = adapter.fromDependency(fd);
      findings.push({
        rule: 'RELATION_TRIVIAL_DEPENDENCY',
        severity: 'info',
        normalForm: 'SCHEMA',
        relation: name,
        attribute: null,
        dependency: named,
        message: `FD #${String(declaredIndex[index] ?? index + 1)} ${formatDependency(named)} on "${name}" is trivial: its dependent attributes are part of its determinant.`,
        fix: 'Remove the dependency; it always holds.',
      });
    }
  });

  const classifier = new NormalFormClassifier(adapter.size, fds);
  const keys = classifier.candidateKeys();
  const context = { name, adapter, dependencies: fds, keys };
  findings.push(...check2nf(context), ...check3nf(context));

  let covers: NamedDependency[][] | null = null;
  if (coverMode === 'all') {
    covers = allMinimalCovers(fds).map((cover) => adapter.fromDependencies(cover));
  } else if (coverMode === 'implied') {
    covers = allMinimalCoversOfClosure(adapter.size, fds).map((cover) =>
      adapter.fromDependencies(cover),
    );
  }

  const report: RelationReport = {
    name,
    attributes: adapter.attributes,
    dependencies: adapter.fromDependencies(fds),
    candidateKeys: keys.map((key) => adapter.fromAttributeSet(key)),
    primeAttributes: adapter.fromAttributeSet(classifier.primeAttributes()),
    normalForms: {
      bcnf: classifier.isBcnf(),
      thirdNf: classifier.is3nf(),
      secondNf: classifier.is2nf(),
    },
    highestNormalForm: classifier.highestNormalForm(),
    minimalCover: coverMode === 'one' ? adapter.fromDependencies(minimalCover(fds)) : null,
    allMinimalCovers: covers,
  };

  return { report, findings };
}
