/**
 * Audit Summary
 *
 * Plain-text rendering of an analysis result for display and export.
 */

import type { AnalysisResult, RedFlag } from '../types';

const rupeeFormat = new Intl.NumberFormat('en-IN', { maximumFractionDigits: 2 });

/**
 * Absolute rupee value with Indian digit grouping, e.g. "Rs. 4,52,00,000"
 */
export function formatRupees(value: number): string {
  return `Rs. ${rupeeFormat.format(value)}`;
}

function formatFlag(flag: RedFlag): string[] {
  switch (flag.kind) {
    case 'structured':
      return [
        `Issue: ${flag.issue} [${flag.severity} RISK]`,
        `Regulation: ${flag.regulation}`,
        `Evidence: ${flag.evidence}`,
      ];
    case 'freeform':
      return [`Flag Note: ${flag.note}`];
  }
}

export function formatAuditSummary(result: AnalysisResult): string[] {
  const lines = [
    'Forensic Governance Report',
    `Status: ${result.metadata.status}`,
    `Compliance Score: ${result.complianceScore}/100`,
    `Risk Level: ${result.riskLevel}`,
  ];

  // Structured exposure breakdowns stay in the JSON result
  if (result.financialExposure.kind === 'freeform') {
    lines.push(`Financial Exposure: ${result.financialExposure.text}`);
  }
  if (result.exposureAmounts.length > 0) {
    lines.push(`Normalized Exposure: ${result.exposureAmounts.map(formatRupees).join(', ')}`);
  }

  lines.push('', 'Detected Governance Red Flags:');

  if (result.redFlags.length === 0) {
    lines.push('No material red flags detected during this audit cycle.');
    return lines;
  }

  result.redFlags.forEach((flag, index) => {
    if (index > 0) {
      lines.push('');
    }
    lines.push(...formatFlag(flag));
  });

  return lines;
}
