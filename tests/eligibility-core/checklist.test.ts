// tests/eligibility-core/checklist.test.ts
import { describe, it, expect } from 'vitest';
import {
  buildChecklist,
  checklistContextFromProfile,
  isConditionActive,
} from '@core/checklist';
import type { DocumentRecord } from '@core/catalog';
import { makeDocument, makeProfile, makeProgram } from './fixtures';

const documents = new Map<string, DocumentRecord>(
  [
    makeDocument({ id: 'photo-id', name: 'Photo ID', type: 'id', alternatives: ['Passport', 'Military ID'] }),
    makeDocument({ id: 'pay-stubs', name: 'Pay Stubs', type: 'income' }),
    makeDocument({ id: 'lease', name: 'Lease', type: 'residence' }),
    makeDocument({ id: 'eviction-notice', name: 'Eviction Notice', type: 'legal' }),
    makeDocument({ id: 'birth-certificate', name: 'Birth Certificate', type: 'identification' }),
  ].map((d) => [d.id, d]),
);

describe('buildChecklist', () => {
  it('lists a document shared by two programs once, with both program names', () => {
    const programs = [
      makeProgram({ id: 'a', name: 'Food Help', documents: [{ documentId: 'photo-id' }] }),
      makeProgram({ id: 'b', name: 'Rent Help', documents: [{ documentId: 'photo-id' }] }),
    ];
    const checklist = buildChecklist(programs, documents, { needs: [] });
    expect(checklist.totalDocuments).toBe(1);
    expect(checklist.groups).toEqual([
      {
        type: 'identification',
        items: [
          {
            documentId: 'photo-id',
            name: 'Photo ID',
            type: 'identification',
            description: undefined,
            howToObtain: undefined,
            required: true,
            requiredBy: ['Food Help', 'Rent Help'],
            alternatives: ['Passport', 'Military ID'],
          },
        ],
      },
    ]);
  });

  it('groups documents in the fixed display order and omits empty groups', () => {
    const program = makeProgram({
      documents: [
        { documentId: 'eviction-notice' },
        { documentId: 'lease' },
        { documentId: 'pay-stubs' },
        { documentId: 'birth-certificate' },
      ],
    });
    const checklist = buildChecklist([program], documents, { needs: [] });
    expect(checklist.groups.map((g) => g.type)).toEqual(['identification', 'income', 'residence', 'legal']);
  });

  it('drops a conditional document for one program but keeps it through another', () => {
    const programs = [
      makeProgram({
        id: 'a',
        name: 'Food Help',
        documents: [{ documentId: 'lease', condition: { needsAny: ['housing'] } }],
      }),
      makeProgram({
        id: 'b',
        name: 'Eviction Help',
        documents: [{ documentId: 'lease', condition: { situationsAny: ['eviction'] } }],
      }),
    ];
    const checklist = buildChecklist(programs, documents, { needs: ['food'], situations: ['eviction'] });
    expect(checklist.groups[0].items[0].requiredBy).toEqual(['Eviction Help']);
  });

  it('marks a document required when any program requires it', () => {
    const programs = [
      makeProgram({ id: 'a', name: 'A', documents: [{ documentId: 'pay-stubs', isRequired: false }] }),
      makeProgram({ id: 'b', name: 'B', documents: [{ documentId: 'pay-stubs' }] }),
    ];
    const checklist = buildChecklist(programs, documents, { needs: [] });
    expect(checklist.groups[0].items[0].required).toBe(true);
  });

  it('reports associations to documents missing from the catalog', () => {
    const program = makeProgram({ id: 'a', documents: [{ documentId: 'dd214' }] });
    const checklist = buildChecklist([program], documents, { needs: [] });
    expect(checklist.groups).toEqual([]);
    expect(checklist.unresolved).toEqual([{ programId: 'a', documentId: 'dd214' }]);
  });
});

describe('isConditionActive', () => {
  it('requires every stated part of a condition to hold', () => {
    const condition = { needsAny: ['housing' as const], flags: { hasChildren: true } };
    expect(isConditionActive(condition, { needs: ['housing'], facts: { hasChildren: true } })).toBe(true);
    expect(isConditionActive(condition, { needs: ['housing'], facts: { hasChildren: false } })).toBe(false);
    expect(isConditionActive(condition, { needs: ['food'], facts: { hasChildren: true } })).toBe(false);
  });

  it('treats an unstated flag as not satisfying the condition', () => {
    expect(isConditionActive({ flags: { isPregnant: true } }, { needs: [] })).toBe(false);
  });

  it('reads conditions against facts derived from the profile', () => {
    const profile = makeProfile({ householdSize: 2, members: [{ age: 40 }, { age: 7 }], needs: ['food'] });
    const context = checklistContextFromProfile(profile);
    expect(isConditionActive({ flags: { hasChildren: true } }, context)).toBe(true);
  });
});
