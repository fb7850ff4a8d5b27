/**
 * Request Context Tests
 */

import * as shared from '@governance-audit/shared';
import { getContext, getCorrelationId, runWithContext, runWithContextAsync } from '@governance-audit/shared';

describe('request context', () => {
  it('should expose the context only inside a run', () => {
    expect(getContext()).toBeUndefined();

    runWithContext({ correlationId: 'corr-1', auditId: 'audit-1' }, () => {
      expect(getContext()).toEqual({ correlationId: 'corr-1', auditId: 'audit-1' });
      expect(getCorrelationId()).toBe('corr-1');
    });

    expect(getContext()).toBeUndefined();
  });

  it('should keep the context across awaits', async () => {
    const seen = await runWithContextAsync({ correlationId: 'corr-2' }, async () => {
      await Promise.resolve();
      return getCorrelationId();
    });

    expect(seen).toBe('corr-2');
  });

  it('should not export the underlying storage', () => {
    expect(Object.keys(shared)).not.toContain('asyncLocalStorage');
  });
});
