/**
 * Audit Prompt Template Types
 */

/**
 * Prompt template for a forensic audit request.
 */
export interface AuditPromptTemplate {
  /** Auditor role, regulatory scope and required output shape */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{section_text}}: The focused report text
   */
  userPromptTemplate: string;

  /** Human-readable description of the audit */
  description: string;

  version: string;
}
