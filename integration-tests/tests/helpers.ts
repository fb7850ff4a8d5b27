/**
 * Test Helpers
 *
 * In-process stand-ins for the model service and the document source.
 */

import type {
  DocumentLoader,
  DocumentSource,
  ModelClient,
  ModelCompletion,
  ModelRequest,
} from '@governance-audit/shared';

/**
 * Model client that records requests and answers from a callback
 */
export class FakeModelClient implements ModelClient {
  readonly requests: ModelRequest[] = [];

  constructor(
    private readonly respond: (request: ModelRequest) => string | Promise<string>,
    private readonly model: string = 'fake-model'
  ) {}

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    this.requests.push(request);
    const text = await this.respond(request);
    return { text, model: this.model, requestId: `req_${this.requests.length}` };
  }
}

export function replyWith(text: string): FakeModelClient {
  return new FakeModelClient(() => text);
}

export function failWith(error: Error): FakeModelClient {
  return new FakeModelClient(() => {
    throw error;
  });
}

/**
 * Document whose pages are plain strings
 */
export class InMemoryDocument implements DocumentSource {
  closed = false;

  constructor(private readonly pages: string[]) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async getPageText(index: number): Promise<string> {
    return this.pages[index];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function loaderFor(document: DocumentSource): DocumentLoader {
  return async () => document;
}

/**
 * Neutral report prose with no related-party keywords
 */
export function filler(sentences: number): string {
  return 'Revenue from operations grew steadily across all business segments. '.repeat(sentences);
}

export const AUDIT_REPLY = `Here is my forensic assessment of the disclosures.

\`\`\`json
{
  "compliance_score": 62,
  "risk_level": "HIGH",
  "red_flags": [
    {
      "issue": "Unsecured loan to director",
      "severity": "HIGH",
      "regulation": "Section 185, Companies Act 2013",
      "evidence": "Loan of Rs. 12 Crore to director (PAN ABCDE1234F) without approval"
    },
    "Audit committee approval not disclosed for lease with Associate"
  ],
  "financial_exposure": "Rs. 45 Crore"
}
\`\`\`

Let me know if you need the working papers.`;
