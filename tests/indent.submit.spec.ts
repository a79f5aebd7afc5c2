import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConfigError, StoreError, ValidationError } from '@/lib/errors';
import { getDepartmentCatalog, getRequest, loadHistory, loadReference, submitIndent } from '@/server/indent/indent.service';
import { queryHistory } from '@/server/indent/history.service';
import { LOG_HEADER, MemorySheetStore, REFERENCE_ROWS, testConfig } from './utils/memorySheetStore';

const NOW = new Date(2026, 3, 10, 9, 30, 0);

function setup(log: string[][] = [LOG_HEADER, ['MRN-001', '2026-04-01 10:00:00', 'Juma', 'Bar', '02-04-2026', 'Sugar', '1', 'kg', 'N/A', 'Dry Goods', 'Sweeteners']]) {
  const store = new MemorySheetStore({ reference: REFERENCE_ROWS, Sheet1: log });
  return { store, deps: { store, config: testConfig(), now: () => NOW } };
}

function payload(lines: { itemName: string; quantity: number; note?: string }[], extra: Record<string, unknown> = {}) {
  return { department: 'Kitchen', requiredDate: '2026-04-12', requestedBy: 'Asha', lines, ...extra };
}

describe('submitIndent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('appends one row per line with the next request number', async () => {
    const { store, deps } = setup();
    const req = await submitIndent(payload([{ itemName: 'Salt', quantity: 2 }]), deps);

    expect(req).toEqual({
      requestId: 'MRN-002',
      createdAt: '2026-04-10 09:30:00',
      department: 'Kitchen',
      requiredDate: '2026-04-12',
      requestedBy: 'Asha',
      lines: [{ itemName: 'Salt', quantity: 2, unit: 'kg', note: '', category: 'Dry Goods', subCategory: 'Spices' }],
    });
    expect(store.appends).toEqual([
      {
        sheet: 'Sheet1',
        rows: [['MRN-002', '2026-04-10 09:30:00', 'Asha', 'Kitchen', '12-04-2026', 'Salt', '2', 'kg', 'N/A', 'Dry Goods', 'Spices']],
      },
    ]);
  });

  it('is readable back from the log after submission', async () => {
    const { deps } = setup();
    await submitIndent(payload([{ itemName: 'Salt', quantity: 2, note: 'coarse' }]), deps);
    const back = await getRequest('MRN-002', deps);
    expect(back?.lines).toEqual([{ itemName: 'Salt', quantity: 2, unit: 'kg', note: 'coarse', category: 'Dry Goods', subCategory: 'Spices' }]);
    expect(back?.requiredDate).toBe('2026-04-12');
  });

  it('reads the log once per submission', async () => {
    const { store, deps } = setup();
    await submitIndent(payload([{ itemName: 'Salt', quantity: 2 }]), deps);
    expect(store.reads.filter((s) => s === 'Sheet1')).toHaveLength(1);
  });

  it('shows the submitted lines in history', async () => {
    const { deps } = setup();
    await loadHistory({}, deps);
    await submitIndent(payload([{ itemName: 'Salt', quantity: 2 }]), deps);
    const res = await queryHistory({}, deps);
    expect(res.rows.map((r) => r.requestId)).toEqual(['MRN-002', 'MRN-001']);
    expect(res.rows[0]).toMatchObject({ department: 'Kitchen', itemName: 'Salt', quantity: 2, requestedBy: 'Asha', requiredDate: '2026-04-12' });
  });

  it('finds a new request even when a history read was in flight during submit', async () => {
    const { store, deps } = setup();
    const read = store.getValues.bind(store);
    const gate = { held: false, release: () => {} };
    store.getValues = async (sheet: string) => {
      if (sheet !== 'Sheet1' || gate.held) return read(sheet);
      gate.held = true;
      const before = read(sheet);
      await new Promise<void>((resolve) => { gate.release = () => resolve(); });
      return before;
    };

    const history = loadHistory({}, deps);
    await submitIndent(payload([{ itemName: 'Salt', quantity: 2 }]), deps);
    gate.release();
    expect((await history).data.map((r) => r.requestId)).toEqual(['MRN-001']);

    const back = await getRequest('MRN-002', deps);
    expect(back?.lines.map((l) => l.itemName)).toEqual(['Salt']);
  });

  it('reloads the log when a request id is not in the cached copy', async () => {
    const { store, deps } = setup();
    await loadHistory({}, deps);
    // written by another server instance
    store.sheets.set('Sheet1', [
      ...(store.sheets.get('Sheet1') ?? []),
      ['MRN-002', '2026-04-10 09:00:00', 'Omari', 'Bar', '11-04-2026', 'Rice', '1', 'bag', 'N/A', 'Dry Goods', 'Grains'],
    ]);
    const back = await getRequest('MRN-002', deps);
    expect(back?.requestedBy).toBe('Omari');
    expect(store.reads.filter((s) => s === 'Sheet1')).toHaveLength(2);
    await expect(getRequest('MRN-999', deps)).resolves.toBeNull();
  });

  it('sorts lines by category, sub-category and item', async () => {
    const { store, deps } = setup();
    await submitIndent(
      payload([
        { itemName: 'Sugar', quantity: 1 },
        { itemName: 'Rice', quantity: 2 },
        { itemName: 'Salt', quantity: 3 },
      ]),
      deps,
    );
    expect(store.appends[0].rows.map((r) => r[5])).toEqual(['Rice', 'Salt', 'Sugar']);
  });

  it('writes the header first into an empty log', async () => {
    const { store, deps } = setup([]);
    const req = await submitIndent(payload([{ itemName: 'salt', quantity: 1 }]), deps);
    expect(req.requestId).toBe('MRN-001');
    expect(store.appends[0].rows[0]).toEqual(LOG_HEADER);
    expect(store.appends[0].rows[1].slice(0, 6)).toEqual(['MRN-001', '2026-04-10 09:30:00', 'Asha', 'Kitchen', '12-04-2026', 'Salt']);
  });

  it('follows the column order of an existing header', async () => {
    const { store, deps } = setup([['Item', 'MRN', 'Qty', 'Remarks']]);
    await submitIndent(payload([{ itemName: 'Salt', quantity: 4 }]), deps);
    expect(store.appends[0].rows).toEqual([['Salt', 'MRN-001', '4', 'N/A']]);
  });

  it('blocks duplicate items without writing', async () => {
    const { store, deps } = setup();
    const err = await submitIndent(payload([{ itemName: 'Salt', quantity: 1 }, { itemName: 'Salt', quantity: 2 }]), deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.details).toEqual(['Salt']);
    expect(store.appends).toEqual([]);
  });

  it('rejects items the department may not request', async () => {
    const { store, deps } = setup();
    await expect(submitIndent(payload([{ itemName: 'Soap', quantity: 1 }]), deps)).rejects.toThrow('Items not available for Kitchen');
    expect(store.appends).toEqual([]);
  });

  it('rejects unknown items', async () => {
    const { deps } = setup();
    await expect(submitIndent(payload([{ itemName: 'Caviar', quantity: 1 }]), deps)).rejects.toThrow('Unknown items');
  });

  it('rejects unknown departments and past dates', async () => {
    const { deps } = setup();
    await expect(submitIndent(payload([{ itemName: 'Salt', quantity: 1 }], { department: 'Garage' }), deps)).rejects.toThrow("Unknown department 'Garage'");
    await expect(submitIndent(payload([{ itemName: 'Salt', quantity: 1 }], { requiredDate: '2026-04-09' }), deps)).rejects.toThrow(
      'Date required cannot be in the past',
    );
  });

  it('rejects non-positive quantities before anything is read', async () => {
    const { store, deps } = setup();
    await expect(submitIndent(payload([{ itemName: 'Salt', quantity: 0 }]), deps)).rejects.toThrow();
    expect(store.reads).toEqual([]);
  });

  it('reports a failed write and keeps nothing', async () => {
    const { store, deps } = setup();
    store.failAppend = new Error('quota exceeded');
    const err = await submitIndent(payload([{ itemName: 'Salt', quantity: 1 }]), deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    expect(err instanceof StoreError && err.message).toBe('Submitting MRN-002 failed: quota exceeded');
    expect(store.appends).toEqual([]);
  });

  it('refuses to write when no request number can be allocated', async () => {
    const { store, deps } = setup();
    store.failReads.add('Sheet1');
    await expect(submitIndent(payload([{ itemName: 'Salt', quantity: 1 }]), deps)).rejects.toThrow('Could not allocate a request number (MRN-ERR-093000)');
    expect(store.appends).toEqual([]);
  });
});

describe('reference loading', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('serves the department catalog from cache until refreshed', async () => {
    const { store, deps } = setup();
    const first = await getDepartmentCatalog('Bar', {}, deps);
    expect(first.items.map((i) => i.name)).toEqual(['Rice', 'Sugar']);
    expect(first.items[0]).toEqual({ name: 'Rice', unit: 'bag', category: 'Dry Goods', subCategory: 'Grains', baseUnit: 'kg', conversionFactor: 25 });
    expect(first.departments).toEqual(['Kitchen', 'Bar', 'Housekeeping', 'Admin', 'Maintenance']);
    await getDepartmentCatalog('Kitchen', {}, deps);
    expect(store.reads.filter((s) => s === 'reference')).toHaveLength(1);
    await getDepartmentCatalog('Kitchen', { refresh: true }, deps);
    expect(store.reads.filter((s) => s === 'reference')).toHaveLength(2);
  });

  it('reports the server calendar day with the catalog', async () => {
    const { deps } = setup();
    const res = await getDepartmentCatalog('Kitchen', {}, deps);
    expect(res.today).toBe('2026-04-10');
  });

  it('returns no items without a department', async () => {
    const { deps } = setup();
    const res = await getDepartmentCatalog(null, {}, deps);
    expect(res.items).toEqual([]);
    expect(res.totalItems).toBe(4);
  });

  it('degrades a store failure to an empty table', async () => {
    const { store, deps } = setup();
    store.failReads.add('reference');
    const res = await loadReference({}, deps);
    expect(res.data.items).toEqual([]);
    expect(res.error).toBe('Could not load reference items: read reference failed');
  });

  it('lets configuration errors through', async () => {
    const store = new MemorySheetStore();
    store.getValues = async () => {
      throw new ConfigError("Worksheet 'reference' not found");
    };
    await expect(loadReference({}, { store, config: testConfig(), now: () => NOW })).rejects.toBeInstanceOf(ConfigError);
  });
});
