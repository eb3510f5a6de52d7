import { describe, expect, it } from 'vitest';
import { loadConfig } from '@toolsmith/common';
import { inlineServiceAccount } from '../llm/vertexProvider';

describe('inlineServiceAccount', () => {
  const base = { projectId: 'test-project', location: 'us-central1' };

  it('should pass the configured base64 credentials inline', () => {
    expect(inlineServiceAccount({ ...base, credentials: 'dGVzdC1zZWNyZXQ=' })).toBe('dGVzdC1zZWNyZXQ=');
  });

  it('should defer to a key file path when one is configured', () => {
    const config = loadConfig({
      GOOGLE_CLOUD_CREDENTIALS: 'dGVzdC1zZWNyZXQ=',
      GOOGLE_APPLICATION_CREDENTIALS: '/tmp/test-key.json',
    });
    expect(
      inlineServiceAccount({
        ...base,
        credentials: config.GOOGLE_CLOUD_CREDENTIALS,
        applicationCredentials: config.GOOGLE_APPLICATION_CREDENTIALS,
      })
    ).toBeUndefined();
  });

  it('should pass nothing without credentials', () => {
    expect(inlineServiceAccount({ ...base, credentials: '', applicationCredentials: '' })).toBeUndefined();
  });
});
