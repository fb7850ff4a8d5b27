/**
 * Audit Payload Normalization
 *
 * The payload shape is model-controlled. Everything is coerced into the
 * AnalysisResult fields here, and the polymorphic parts become tagged variants
 * so consumers switch on `kind` instead of guessing.
 */

import { parseIndianCurrency } from '../currency/indian-currency';
import type { FinancialExposure, JsonValue, RedFlag } from '../types';
import { isJsonObject, type JsonObject } from './response-parser';

export interface NormalizedPayload {
  complianceScore: number;
  riskLevel: string;
  redFlags: RedFlag[];
  financialExposure: FinancialExposure;
  exposureAmounts: number[];
  warnings: string[];
}

/**
 * Read a key in snake_case (what the prompt asks for) or camelCase
 */
function pick(payload: JsonObject, snakeKey: string, camelKey: string): JsonValue | undefined {
  return payload[snakeKey] ?? payload[camelKey];
}

function textField(value: JsonValue | undefined, fallback: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return fallback;
}

export function normalizeScore(raw: JsonValue | undefined, warnings: string[]): number {
  let score = NaN;
  if (typeof raw === 'number') {
    score = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    score = Number(raw.trim());
  }

  if (!Number.isFinite(score)) {
    warnings.push(`compliance_score is not numeric: ${JSON.stringify(raw ?? null)}`);
    return 0;
  }

  return Math.min(100, Math.max(0, Math.round(score)));
}

export function normalizeFlag(raw: JsonValue): RedFlag {
  if (isJsonObject(raw)) {
    return {
      kind: 'structured',
      issue: textField(raw.issue, 'Unknown'),
      severity: textField(raw.severity, 'UNKNOWN'),
      regulation: textField(raw.regulation, 'N/A'),
      evidence: textField(raw.evidence, 'N/A'),
    };
  }
  if (typeof raw === 'string') {
    return { kind: 'freeform', note: raw };
  }
  return { kind: 'freeform', note: JSON.stringify(raw) };
}

function normalizeFlags(raw: JsonValue | undefined): RedFlag[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (Array.isArray(raw)) {
    return raw.map(normalizeFlag);
  }
  return [normalizeFlag(raw)];
}

export function normalizeExposure(raw: JsonValue | undefined): FinancialExposure {
  if (raw === undefined || raw === null) {
    return { kind: 'freeform', text: 'Unknown' };
  }
  if (typeof raw === 'object') {
    return { kind: 'structured', value: raw };
  }
  return { kind: 'freeform', text: String(raw) };
}

export function normalizeAuditPayload(payload: JsonObject): NormalizedPayload {
  const warnings: string[] = [];

  const complianceScore = normalizeScore(
    pick(payload, 'compliance_score', 'complianceScore'),
    warnings
  );

  const rawRisk = pick(payload, 'risk_level', 'riskLevel');
  const riskLevel = textField(rawRisk, 'UNKNOWN').trim() || 'UNKNOWN';
  if (rawRisk === undefined) {
    warnings.push('risk_level missing');
  }

  const financialExposure = normalizeExposure(
    pick(payload, 'financial_exposure', 'financialExposure')
  );

  return {
    complianceScore,
    riskLevel,
    redFlags: normalizeFlags(pick(payload, 'red_flags', 'redFlags')),
    financialExposure,
    exposureAmounts:
      financialExposure.kind === 'freeform' ? parseIndianCurrency(financialExposure.text) : [],
    warnings,
  };
}
