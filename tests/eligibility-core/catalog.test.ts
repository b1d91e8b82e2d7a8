import path from 'path';
import { describe, it, expect } from 'vitest';
import { buildCatalogSnapshot, loadCatalogPack } from '@core/catalog';

const PACK_DIR = path.resolve('catalog-packs/florida-brevard-2024');

describe('loadCatalogPack', () => {
  it('loads pack metadata', async () => {
    const catalog = await loadCatalogPack(PACK_DIR);
    expect(catalog.meta.packId).toBe('florida-brevard-2024');
    expect(catalog.meta.fplYear).toBe(2024);
    expect(catalog.fpl.defaultState).toBe('FL');
  });

  it('loads every program and document without rejections', async () => {
    const catalog = await loadCatalogPack(PACK_DIR);
    expect(catalog.rejected).toEqual([]);
    expect(catalog.programs).toHaveLength(12);
    expect(catalog.documents.size).toBe(12);
    expect(catalog.fpl.entries).toHaveLength(8);
  });

  it('maps the legacy "id" document type to identification', async () => {
    const catalog = await loadCatalogPack(PACK_DIR);
    expect(catalog.documents.get('photo-id')?.type).toBe('identification');
  });

  it('loads the SNAP benefit rules', async () => {
    const catalog = await loadCatalogPack(PACK_DIR);
    expect(catalog.benefitRules.snap?.excessShelter.cap).toBe(624);
  });

  it('applies program defaults', async () => {
    const catalog = await loadCatalogPack(PACK_DIR);
    const snap = catalog.programs.find((p) => p.id === 'snap-fl');
    expect(snap?.isActive).toBe(true);
    expect(snap?.isEmergency).toBe(false);
    expect(snap?.documents[0]).toEqual({ documentId: 'photo-id', isRequired: true });
  });
});

describe('buildCatalogSnapshot', () => {
  const meta = {
    packId: 'test-pack',
    jurisdiction: 'Test',
    defaultState: 'fl',
    fplYear: 2024,
    version: '0.0.1',
    effectiveDate: '2024-01-01',
    createdAt: '2024-01-01',
  };

  it('rejects a bad program without losing the others', () => {
    const catalog = buildCatalogSnapshot({
      meta,
      programs: [
        { id: 'good', name: 'Good', category: 'food' },
        { id: 'bad', name: 'Bad', category: 'pets' },
        'not even an object',
      ],
      documents: [],
      fpl: [],
    });
    expect(catalog.programs.map((p) => p.id)).toEqual(['good']);
    expect(catalog.rejected.map((r) => [r.kind, r.ref])).toEqual([
      ['program', 'bad'],
      ['program', '#2'],
    ]);
    expect(catalog.fpl.defaultState).toBe('FL');
  });

  it('files documents of an unknown type under other', () => {
    const catalog = buildCatalogSnapshot({
      meta,
      programs: [],
      documents: [{ id: 'w2', name: 'W-2', type: 'tax' }],
      fpl: [],
    });
    expect(catalog.documents.get('w2')?.type).toBe('other');
  });

  it('throws on invalid pack metadata', () => {
    expect(() =>
      buildCatalogSnapshot({ meta: { packId: 'x' }, programs: [], documents: [], fpl: [] }),
    ).toThrow();
  });
});
