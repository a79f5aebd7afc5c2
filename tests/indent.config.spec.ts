import { describe, it, expect } from 'vitest';
import { ZodError, z } from 'zod';
import { ConfigError, StoreError, ValidationError, toErrorResponse } from '@/lib/errors';
import { loadIndentConfig } from '@/server/indent/config';

const ACCOUNT = JSON.stringify({ client_email: 'svc@example.com', private_key: 'test-secret\\nsecond-line' });

describe('loadIndentConfig', () => {
  it('applies defaults', () => {
    const cfg = loadIndentConfig({ GCP_SERVICE_ACCOUNT: ACCOUNT, INDENT_SPREADSHEET_ID: 'sheet-test' });
    expect(cfg).toEqual({
      serviceAccount: { client_email: 'svc@example.com', private_key: 'test-secret\nsecond-line' },
      spreadsheetId: 'sheet-test',
      logSheet: 'Sheet1',
      referenceSheet: 'reference',
      departments: ['Kitchen', 'Bar', 'Housekeeping', 'Admin', 'Maintenance'],
      referenceTtlMs: 300_000,
      logTtlMs: 60_000,
      historyDays: 90,
      sharePhone: null,
      phoneCountry: '',
    });
  });

  it('reads overrides', () => {
    const cfg = loadIndentConfig({
      GCP_SERVICE_ACCOUNT: ACCOUNT,
      INDENT_SPREADSHEET_ID: 'sheet-test',
      INDENT_LOG_SHEET: 'Indents',
      INDENT_DEPARTMENTS: 'Kitchen, Spa ,',
      INDENT_LOG_TTL_SEC: '5',
      INDENT_SHARE_PHONE: ' 0700000001 ',
      INDENT_PHONE_COUNTRY: '254',
    });
    expect(cfg.logSheet).toBe('Indents');
    expect(cfg.departments).toEqual(['Kitchen', 'Spa']);
    expect(cfg.logTtlMs).toBe(5000);
    expect(cfg.sharePhone).toBe('0700000001');
    expect(cfg.phoneCountry).toBe('254');
  });

  it('names the missing keys', () => {
    const err = (() => {
      try {
        loadIndentConfig({});
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(ConfigError);
    expect(err instanceof ConfigError && err.details).toEqual(['GCP_SERVICE_ACCOUNT', 'INDENT_SPREADSHEET_ID']);
  });

  it('rejects a service account that is not JSON', () => {
    expect(() => loadIndentConfig({ GCP_SERVICE_ACCOUNT: '{oops', INDENT_SPREADSHEET_ID: 'sheet-test' })).toThrow('GCP_SERVICE_ACCOUNT is not valid JSON');
  });
});

describe('toErrorResponse', () => {
  it('maps each error kind onto a status', () => {
    expect(toErrorResponse(new ValidationError('bad', ['Salt']))).toEqual({
      status: 400,
      body: { ok: false, error: 'bad', kind: 'validation', fatal: false, details: ['Salt'] },
    });
    expect(toErrorResponse(new StoreError('down', 503))).toEqual({ status: 502, body: { ok: false, error: 'down', kind: 'store', fatal: false } });
    expect(toErrorResponse(new ConfigError('no sheet')).body.fatal).toBe(true);
    expect(toErrorResponse(new Error('boom'))).toEqual({ status: 500, body: { ok: false, error: 'boom', kind: 'internal', fatal: false } });
  });

  it('lists zod issues with their paths', () => {
    const r = z.object({ lines: z.array(z.string()).min(1, 'Add at least one item') }).safeParse({ lines: [] });
    expect(r.success).toBe(false);
    const err = r.success ? null : r.error;
    expect(err).toBeInstanceOf(ZodError);
    expect(toErrorResponse(err).body).toEqual({ ok: false, error: 'Invalid request', kind: 'validation', fatal: false, details: ['lines: Add at least one item'] });
  });
});
