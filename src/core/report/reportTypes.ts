import type { AttributeSet } from '../fd/attributeSet.js';
import type { FdSet } from '../fd/dependency.js';
import type { DecompositionNode } from '../analysis/decompose.js';

/** Severity levels for findings. */
export type Severity = 'error' | 'warning' | 'info';

/** Normal form levels. */
export type NormalForm = '2NF' | '3NF' | 'BCNF' | 'SCHEMA';

/** Unique finding rule codes. */
export type RuleCode =
  | 'FD_UNKNOWN_ATTRIBUTE'
  | 'NF2_PARTIAL_DEPENDENCY'
  | 'NF3_VIOLATION'
  | 'BCNF_VIOLATION'
  | 'KEY_SEARCH_SKIPPED'
  | 'IMPLIED_FD_SEARCH_SKIPPED';

/** A single normalization finding. */
export interface Finding {
  readonly rule: RuleCode;
  readonly severity: Severity;
  readonly normalForm: NormalForm;
  readonly relation: string;
  readonly attribute: string | null;
  readonly message: string;
  readonly fix: string | null;
}

/** A relation schema with its FDs, in canonical form. */
export interface RelationDefinition {
  readonly name: string;
  readonly attributes: AttributeSet;
  readonly fds: FdSet;
}

/** A requested attribute closure. */
export interface ClosureReport {
  readonly attributes: AttributeSet;
  readonly closure: AttributeSet;
  readonly isSuperkey: boolean;
  readonly isKey: boolean;
}

/** Analysis of one relation. */
export interface RelationReport {
  readonly relation: RelationDefinition;
  /** Null when the relation is too wide for the key search. */
  readonly candidateKeys: readonly AttributeSet[] | null;
  readonly closures: readonly ClosureReport[];
  readonly findings: readonly Finding[];
  readonly decomposition: DecompositionNode;
  readonly bcnfSchemas: readonly AttributeSet[];
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
  readonly relationPath: string;
  readonly timestamp: string | null;
  readonly relationCount: number;
  readonly findingCount: number;
}
