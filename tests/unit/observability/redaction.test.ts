import { describe, expect, it } from 'vitest';
import { redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('redacts sensitive keys and user-entered text', () => {
    const input = {
      eventId: 'evt-1',
      accessToken: 'test-token',
      title: 'Book dinner at 8pm',
      input: 'friday 9am',
      nested: {
        client_secret: 'test-secret',
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted.eventId).toBe('evt-1');
    expect(redacted.accessToken).toBe('[REDACTED]');
    expect(redacted.title).toBe(`[REDACTED_TEXT len=${input.title.length}]`);
    expect(redacted.input).toBe('[REDACTED_TEXT len=10]');
    expect(redacted.nested).toEqual({ client_secret: '[REDACTED]' });
  });

  it('writes dates as ISO strings and errors as plain objects', () => {
    const redacted = redactSecrets({
      start: new Date('2024-01-05T09:00:00Z'),
      error: new Error('offline'),
    });

    expect(redacted).toEqual({
      start: '2024-01-05T09:00:00.000Z',
      error: { name: 'Error', message: 'offline', stack: undefined },
    });
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    const snippet = safeSnippet(value, 20);
    expect(snippet).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
  });
});
