/**
 * Related Party Transactions Audit Template
 *
 * Asks the model to act as a forensic auditor over the related-party section of
 * an Indian listed company's annual report.
 */

import type { AuditPromptTemplate } from './types';

export const RELATED_PARTY_AUDIT_TEMPLATE: AuditPromptTemplate = {
  description: 'Forensic review of related party disclosures (SEBI LODR, Companies Act 2013)',
  version: '1.2.0',

  systemPrompt: `ROLE: Senior Forensic Auditor (Chartered Accountant).
TASK: Audit the extracted annual report text for violations of SEBI (LODR) Regulations 2015 (Regulation 23) and the Companies Act 2013 (Section 188, Section 177, Ind AS 24).

Look for:
- Related party transactions without audit committee or shareholder approval
- Transactions not at arm's length or outside the ordinary course of business
- Loans, guarantees or advances to Key Management Personnel, promoters or their relatives
- Material transactions with subsidiaries, associates or joint ventures that are not adequately disclosed
- Missing or inconsistent amounts between notes

OUTPUT: A single JSON object with exactly these keys:
- compliance_score: integer 0-100 (100 = fully compliant)
- risk_level: one of "LOW", "MEDIUM", "HIGH", "CRITICAL"
- red_flags: array of objects { "issue": string, "severity": "LOW" | "MEDIUM" | "HIGH" | "CRITICAL", "regulation": string, "evidence": string }
- financial_exposure: string giving the total amount at risk in Indian units (e.g. "Rs. 45.2 Crore")

Quote evidence verbatim from the text. Amounts stay in the units the report uses (Lakh / Crore).
IMPORTANT: If the text is empty or irrelevant, return compliance_score 100 and a single red flag noting 'Insufficient Data'.`,

  userPromptTemplate: `Analyze this text:

{{section_text}}`,
};
