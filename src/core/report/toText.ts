import type { AnalysisResult, FormatOptions } from './reportTypes.js';
import type { DecompositionNode } from '../analysis/decompose.js';
import { formatAttributeSet } from '../fd/attributeSet.js';
import { formatFd } from '../fd/dependency.js';

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
  lines.push(`Relations: ${result.metadata.relationPath}`);
  lines.push(`Count:     ${String(result.metadata.relationCount)}`);
  lines.push(`Findings:  ${String(result.metadata.findingCount)}`);
  lines.push('');

  if (options?.findingsOnly !== true) {
    for (const report of result.relations) {
      lines.push(`--- Relation: ${report.relation.name} ---`);
      lines.push(`  Attributes: ${formatAttributeSet(report.relation.attributes)}`);
      for (const fd of report.relation.fds) {
        lines.push(`  FD: ${formatFd(fd)}`);
      }
      if (report.candidateKeys === null) {
        lines.push('  Keys: not searched');
      } else {
        for (const key of report.candidateKeys) {
          lines.push(`  Key: ${formatAttributeSet(key)}`);
        }
      }
      for (const c of report.closures) {
        const kind = c.isKey ? ' [key]' : c.isSuperkey ? ' [superkey]' : '';
        lines.push(`  Closure: ${formatAttributeSet(c.attributes)}+ = ${formatAttributeSet(c.closure)}${kind}`);
      }
      lines.push('  Decomposition:');
      formatNode(report.decomposition, 2, lines);
      lines.push('');
    }
  }

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

function formatNode(node: DecompositionNode, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);
  if (node.split === null) {
    lines.push(`${indent}${formatAttributeSet(node.schema)}`);
    return;
  }
  lines.push(`${indent}${formatAttributeSet(node.schema)} split on ${formatFd(node.split.fd)}`);
  formatNode(node.split.left, depth + 1, lines);
  formatNode(node.split.right, depth + 1, lines);
}
