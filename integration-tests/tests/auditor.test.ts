/**
 * Forensic Auditor Tests
 */

import { Auditor, RELATED_PARTY_AUDIT_TEMPLATE } from '@governance-audit/shared';
import { AUDIT_REPLY, FakeModelClient, failWith, filler, replyWith } from './helpers';

const SECTION = `--- PAGE 87 ---\nNote 32 Related Party Disclosures\n${filler(4)}`;

describe('Auditor', () => {
  describe('extraction guard', () => {
    it('should not call the model for text shorter than 100 characters', async () => {
      const client = replyWith(AUDIT_REPLY);
      const auditor = new Auditor(client);

      const result = await auditor.audit('Note 32 Related Party Disclosures');

      expect(client.requests).toHaveLength(0);
      expect(result.metadata.status).toBe('Failed');
      expect(result.metadata.model).toBe('None');
      expect(result.complianceScore).toBe(0);
      expect(result.riskLevel).toBe('ERROR');
      expect(result.redFlags).toEqual([
        {
          kind: 'structured',
          issue: 'Extraction Failed',
          severity: 'HIGH',
          regulation: 'N/A',
          evidence: 'No text found in PDF',
        },
      ]);
    });

    it('should treat empty text as an extraction failure', async () => {
      const client = replyWith(AUDIT_REPLY);

      const result = await new Auditor(client).audit('');

      expect(client.requests).toHaveLength(0);
      expect(result.metadata.status).toBe('Failed');
    });

    it('should call the model at exactly the minimum length', async () => {
      const client = replyWith(AUDIT_REPLY);

      await new Auditor(client).audit('a'.repeat(100));

      expect(client.requests).toHaveLength(1);
    });
  });

  describe('successful analysis', () => {
    it('should parse a json-fenced reply surrounded by prose', async () => {
      const auditor = new Auditor(replyWith(AUDIT_REPLY));

      const result = await auditor.audit(SECTION);

      expect(result.complianceScore).toBe(62);
      expect(result.riskLevel).toBe('HIGH');
      expect(result.redFlags).toEqual([
        {
          kind: 'structured',
          issue: 'Unsecured loan to director',
          severity: 'HIGH',
          regulation: 'Section 185, Companies Act 2013',
          evidence: 'Loan of Rs. 12 Crore to director (PAN ABCDE1234F) without approval',
        },
        {
          kind: 'freeform',
          note: 'Audit committee approval not disclosed for lease with Associate',
        },
      ]);
      expect(result.financialExposure).toEqual({ kind: 'freeform', text: 'Rs. 45 Crore' });
      expect(result.exposureAmounts).toEqual([450000000]);
    });

    it('should attach success metadata', async () => {
      const auditor = new Auditor(replyWith(AUDIT_REPLY));

      const { metadata } = await auditor.audit(SECTION);

      expect(metadata.status).toBe('Success');
      expect(metadata.source).toBe('OpenAI API');
      expect(metadata.model).toBe('fake-model');
      expect(metadata.requestId).toBe('req_1');
      expect(metadata.latency).toMatch(/^\d+\.\d{2}s$/);
      expect(metadata.errorMessage).toBeUndefined();
      expect(metadata.schemaWarnings).toBeUndefined();
    });

    it('should send the template system prompt and the focused text', async () => {
      const client = replyWith(AUDIT_REPLY);
      const auditor = new Auditor(client, { model: 'gpt-test', requestTimeoutMs: 5000 });

      await auditor.audit(SECTION);

      expect(client.requests).toEqual([
        {
          model: 'gpt-test',
          systemPrompt: RELATED_PARTY_AUDIT_TEMPLATE.systemPrompt,
          userPrompt: `Analyze this text:\n\n${SECTION}`,
          timeoutMs: 5000,
        },
      ]);
    });

    it('should truncate the prompt text to 25,000 characters', async () => {
      const client = replyWith(AUDIT_REPLY);

      await new Auditor(client).audit('a'.repeat(30000));

      expect(client.requests[0].userPrompt).toBe(`Analyze this text:\n\n${'a'.repeat(25000)}`);
    });

    it('should keep replacement patterns in the report text literal', async () => {
      const client = replyWith(AUDIT_REPLY);
      const text = `Consideration paid $& $1 to Associate. ${filler(2)}`;

      await new Auditor(client).audit(text);

      expect(client.requests[0].userPrompt).toBe(`Analyze this text:\n\n${text}`);
    });

    it('should record schema warnings for wrongly typed fields', async () => {
      const reply = '{"compliance_score": "high", "risk_level": "LOW", "red_flags": []}';

      const { metadata, complianceScore } = await new Auditor(replyWith(reply)).audit(SECTION);

      expect(metadata.status).toBe('Success');
      expect(complianceScore).toBe(0);
      expect(metadata.schemaWarnings).toContain('/compliance_score: must match exactly one schema in oneOf');
      expect(metadata.schemaWarnings).toContain('compliance_score is not numeric: "high"');
    });
  });

  describe('failure recovery', () => {
    it('should return an error result for an unparsable reply', async () => {
      const auditor = new Auditor(replyWith('The document does not contain enough information.'));

      const result = await auditor.audit(SECTION);

      expect(result.metadata.status).toBe('Error');
      expect(result.metadata.source).toBe('Fallback');
      expect(result.metadata.errorMessage).toMatch(/^Model reply is not valid JSON: /);
      expect(result.riskLevel).toBe('API_ERROR');
      expect(result.complianceScore).toBe(0);
      expect(result.financialExposure).toEqual({ kind: 'freeform', text: 'Unknown' });
      expect(result.redFlags).toEqual([
        {
          kind: 'structured',
          issue: 'AI Generation Failed',
          severity: 'CRITICAL',
          regulation: 'N/A',
          evidence: result.metadata.errorMessage,
        },
      ]);
    });

    it('should return an error result when the model call fails', async () => {
      const auditor = new Auditor(failWith(new Error('connect ECONNREFUSED 127.0.0.1:443')), {
        model: 'gpt-test',
      });

      const result = await auditor.audit(SECTION);

      expect(result.metadata.status).toBe('Error');
      expect(result.metadata.model).toBe('gpt-test');
      expect(result.metadata.errorMessage).toBe('connect ECONNREFUSED 127.0.0.1:443');
      expect(result.metadata.latency).toMatch(/^\d+\.\d{2}s$/);
    });

    it('should return an error result for a JSON array reply', async () => {
      const result = await new Auditor(replyWith('```json\n[]\n```')).audit(SECTION);

      expect(result.metadata.status).toBe('Error');
      expect(result.metadata.errorMessage).toBe('Expected a JSON object from model, got array');
    });

    it('should resolve rather than reject when the client rejects asynchronously', async () => {
      const client = new FakeModelClient(async () => {
        throw new Error('Request timed out.');
      });

      await expect(new Auditor(client).audit(SECTION)).resolves.toMatchObject({
        riskLevel: 'API_ERROR',
        metadata: { status: 'Error', errorMessage: 'Request timed out.' },
      });
    });
  });
});
