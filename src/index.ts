export type {
  AnalysisResult,
  AnalysisMetadata,
  ClosureReport,
  Finding,
  FormatOptions,
  NormalForm,
  OutputFormat,
  RelationDefinition,
  RelationReport,
  RuleCode,
  Severity,
} from './core/report/reportTypes.js';

export type { Attribute, AttributeInput, AttributeSet } from './core/fd/attributeSet.js';
export type { FdInput, FdSet, FunctionalDependency } from './core/fd/dependency.js';
export type { ClosureOptions } from './core/analysis/closure.js';
export type {
  DecomposeOptions,
  DecompositionNode,
  DecompositionSplit,
} from './core/analysis/decompose.js';
export type { KeySearchOptions } from './core/analysis/computeKeys.js';
export type { RelationsFile, DeclaredFd } from './core/relation/schema.js';
export type { ParsedRelations } from './core/relation/parse.js';

export {
  NormalizerError,
  InvalidInputTypeError,
  ConsistencyViolationError,
  SearchLimitExceededError,
} from './core/errors.js';
export { toAttributeSet, formatAttributeSet } from './core/fd/attributeSet.js';
export { toFdSet, toFunctionalDependency, formatFd } from './core/fd/dependency.js';
export { leafSchemas } from './core/analysis/decompose.js';

import { toAttributeSet } from './core/fd/attributeSet.js';
import type { AttributeInput, AttributeSet } from './core/fd/attributeSet.js';
import { toFdSet } from './core/fd/dependency.js';
import type { FdInput } from './core/fd/dependency.js';
import * as closureEngine from './core/analysis/closure.js';
import type { ClosureOptions } from './core/analysis/closure.js';
import * as decomposer from './core/analysis/decompose.js';
import { DEFAULT_MAX_IMPLIED_SEARCH_ATTRIBUTES } from './core/analysis/decompose.js';
import type { DecomposeOptions, DecompositionNode } from './core/analysis/decompose.js';
import {
  DEFAULT_MAX_KEY_SEARCH_ATTRIBUTES,
  findCandidateKeys as searchCandidateKeys,
} from './core/analysis/computeKeys.js';
import type { KeySearchOptions } from './core/analysis/computeKeys.js';
import { checkFdAttributes } from './core/analysis/normalizeChecks/checkFdAttributes.js';
import { check2nf } from './core/analysis/normalizeChecks/check2nf.js';
import { checkBcnf } from './core/analysis/normalizeChecks/checkBcnf.js';
import { SearchLimitExceededError } from './core/errors.js';
import { parseRelationFile, relationsToDefinitions } from './core/relation/parse.js';
import type {
  AnalysisResult,
  ClosureReport,
  Finding,
  RelationDefinition,
  RelationReport,
  Severity,
} from './core/report/reportTypes.js';

/**
 * Compute the closure of `attributes` under `fds`.
 * Accepts a single attribute or a collection for any attribute-set argument.
 */
export function computeClosure(
  attributes: AttributeInput,
  fds: readonly FdInput[],
  options: ClosureOptions = {},
): AttributeSet {
  return closureEngine.computeClosure(toAttributeSet(attributes), toFdSet(fds), options);
}

/** True iff `candidate` determines every attribute of `universe`. */
export function isSuperkeyFor(
  universe: AttributeInput,
  candidate: AttributeInput,
  fds: readonly FdInput[],
  options: ClosureOptions = {},
): boolean {
  return closureEngine.isSuperkeyFor(
    toAttributeSet(universe),
    toAttributeSet(candidate),
    toFdSet(fds),
    options,
  );
}

/** True iff `candidate` is a superkey of `universe` and no attribute can be dropped. */
export function isKeyFor(
  universe: AttributeInput,
  candidate: AttributeInput,
  fds: readonly FdInput[],
  options: ClosureOptions = {},
): boolean {
  return closureEngine.isKeyFor(
    toAttributeSet(universe),
    toAttributeSet(candidate),
    toFdSet(fds),
    options,
  );
}

/** Decompose `schema` into BCNF schemas, splitting on FDs in list order. */
export function decomposeBcnf(
  schema: AttributeInput,
  fds: readonly FdInput[],
  options: DecomposeOptions = {},
): AttributeSet[] {
  return decomposer.decomposeBcnf(toAttributeSet(schema), toFdSet(fds), options);
}

/** Decompose `schema` into BCNF and return the full split tree. */
export function decompose(
  schema: AttributeInput,
  fds: readonly FdInput[],
  options: DecomposeOptions = {},
): DecompositionNode {
  return decomposer.decompose(toAttributeSet(schema), toFdSet(fds), options);
}

/** Every candidate key of `universe`, smallest first. */
export function findCandidateKeys(
  universe: AttributeInput,
  fds: readonly FdInput[],
  options: KeySearchOptions = {},
): AttributeSet[] {
  return searchCandidateKeys(toAttributeSet(universe), toFdSet(fds), options);
}

/** Options for the analyze function. */
export interface AnalyzeOptions {
  readonly relationPath: string;
  /** Attribute sets whose closures are reported for every relation. */
  readonly closures?: readonly (readonly string[])[] | undefined;
  readonly noTimestamp?: boolean | undefined;
  readonly onTrace?: ((line: string) => void) | undefined;
}

/**
 * Analyze every relation in a relations file: candidate keys, requested
 * closures, normal-form findings and a BCNF decomposition.
 */
export function analyze(options: AnalyzeOptions): AnalysisResult {
  const { relations, suppress } = parseRelationFile(options.relationPath);
  const definitions = relationsToDefinitions(relations);
  const closureOptions: ClosureOptions = { onTrace: options.onTrace };
  const requested = (options.closures ?? []).map((attrs) => toAttributeSet(attrs));

  const reports = definitions.map((relation) => {
    const report = analyzeRelation(relation, requested, closureOptions);
    return {
      ...report,
      findings: report.findings.filter((f) => !isSuppressed(f, suppress)),
    };
  });

  const findings = reports.flatMap((r) => r.findings);

  return {
    relations: reports,
    findings,
    metadata: {
      relationPath: options.relationPath,
      timestamp: options.noTimestamp === true ? null : new Date().toISOString(),
      relationCount: reports.length,
      findingCount: findings.length,
    },
  };
}

function analyzeRelation(
  relation: RelationDefinition,
  requested: readonly AttributeSet[],
  closureOptions: ClosureOptions,
): RelationReport {
  const candidateKeys = candidateKeysOrNull(relation);

  const closures: ClosureReport[] = requested.map((attributes) => ({
    attributes,
    closure: closureEngine.computeClosure(attributes, relation.fds, closureOptions),
    isSuperkey: closureEngine.isSuperkeyFor(relation.attributes, attributes, relation.fds),
    isKey: closureEngine.isKeyFor(relation.attributes, attributes, relation.fds),
  }));

  const findings: Finding[] = [...checkFdAttributes(relation)];
  if (candidateKeys !== null) {
    findings.push(...check2nf(relation, candidateKeys), ...checkBcnf(relation, candidateKeys));
  } else {
    findings.push(searchSkippedFinding(
      relation,
      'KEY_SEARCH_SKIPPED',
      'warning',
      `Candidate key search skipped: "${relation.name}" has ${String(relation.attributes.size)} attributes (limit ${String(DEFAULT_MAX_KEY_SEARCH_ATTRIBUTES)}). 2NF, 3NF and BCNF findings were not computed.`,
    ));
  }
  if (relation.attributes.size > DEFAULT_MAX_IMPLIED_SEARCH_ATTRIBUTES) {
    findings.push(searchSkippedFinding(
      relation,
      'IMPLIED_FD_SEARCH_SKIPPED',
      'info',
      `Schemas of "${relation.name}" with more than ${String(DEFAULT_MAX_IMPLIED_SEARCH_ATTRIBUTES)} attributes were checked against the listed FDs only during decomposition.`,
    ));
  }

  const decomposition = decomposer.decompose(relation.attributes, relation.fds);

  return {
    relation,
    candidateKeys,
    closures,
    findings,
    decomposition,
    bcnfSchemas: decomposer.leafSchemas(decomposition),
  };
}

function candidateKeysOrNull(relation: RelationDefinition): AttributeSet[] | null {
  try {
    return searchCandidateKeys(relation.attributes, relation.fds);
  } catch (error: unknown) {
    if (error instanceof SearchLimitExceededError) {
      return null;
    }
    throw error;
  }
}

function searchSkippedFinding(
  relation: RelationDefinition,
  rule: 'KEY_SEARCH_SKIPPED' | 'IMPLIED_FD_SEARCH_SKIPPED',
  severity: Severity,
  message: string,
): Finding {
  return {
    rule,
    severity,
    normalForm: 'SCHEMA',
    relation: relation.name,
    attribute: null,
    message,
    fix: `Split '${relation.name}' into smaller relations before analysis.`,
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
      if (target === finding.relation) {
        return true;
      }
    } else {
      const relation = target.slice(0, dotIdx);
      const attribute = target.slice(dotIdx + 1);
      if (relation === finding.relation && attribute === finding.attribute) {
        return true;
      }
    }
  }
  return false;
}
