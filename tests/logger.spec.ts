import { describe, it, expect, vi, afterEach } from 'vitest';
import { info, error } from '@/lib/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes one JSON line with level and event', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
    info({ event: 'indent.submitted', requestId: 'MRN-002' });
    const line = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'info', event: 'indent.submitted', requestId: 'MRN-002' });
    expect(typeof line.ts).toBe('string');
  });

  it('redacts secrets and phone numbers', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    error({ event: 'x', private_key: 'test-secret', nested: { accessToken: 'test-token' }, phone: '+254700000123', err: new Error('nope') });
    const line = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line.private_key).toBe('***');
    expect(line.nested).toEqual({ accessToken: '***' });
    expect(line.phone).toBe('***123');
    expect(line.err).toEqual({ name: 'Error', message: 'nope' });
  });
});
