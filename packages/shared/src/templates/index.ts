/**
 * Audit Prompt Templates
 */

export { RELATED_PARTY_AUDIT_TEMPLATE } from './related-party-audit.template';
export type { AuditPromptTemplate } from './types';
