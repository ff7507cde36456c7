import { describe, expect, it } from 'vitest';
import { redactSensitive } from '../src/lib/redaction.js';

describe('redactSensitive', () => {
  it('redacts auth and PHI-like keys recursively', () => {
    const input = {
      headers: {
        authorization: 'Bearer placeholder',
        'x-api-key': 'test-api-key',
        accept: 'application/json'
      },
      query: {
        format: 'wav',
        patientName: 'Ana Ruiz'
      },
      entries: [{ email: 'ana@example.test' }, { status: 'ok' }]
    };

    expect(redactSensitive(input)).toEqual({
      headers: {
        authorization: '[REDACTED]',
        'x-api-key': '[REDACTED]',
        accept: 'application/json'
      },
      query: {
        format: 'wav',
        patientName: '[REDACTED]'
      },
      entries: [{ email: '[REDACTED]' }, { status: 'ok' }]
    });
  });

  it('replaces audio bodies with their size and hides transcript text', () => {
    expect(redactSensitive({ body: Buffer.from('RIFF1234') })).toEqual({ body: '[binary 8 bytes]' });
    expect(redactSensitive({ body: { transcript: 'Paciente refiere dolor de cabeza' } })).toEqual({
      body: { transcript: '[REDACTED]' }
    });
  });

  it('does not mutate the original object', () => {
    const input = {
      password: 'test-secret',
      nested: { keep: 'value' }
    };

    expect(redactSensitive(input)).toEqual({ password: '[REDACTED]', nested: { keep: 'value' } });
    expect(input.password).toBe('test-secret');
  });
});
