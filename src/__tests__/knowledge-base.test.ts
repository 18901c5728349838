import { describe, it, expect } from 'vitest';
import { KnowledgeBase } from '../knowledge-base.js';
import { DOCUMENT_SUMMARY_INFORMATION, SUMMARY_INFORMATION, canonical } from './helpers.js';

const title = canonical({ format_identifier: SUMMARY_INFORMATION, property_identifier: 2, name: 'System.Title' });
const subject = canonical({ format_identifier: SUMMARY_INFORMATION, property_identifier: 3, name: 'System.Subject' });
const category = canonical({ format_identifier: DOCUMENT_SUMMARY_INFORMATION, property_identifier: 2, name: 'System.Category' });

describe('KnowledgeBase', () => {
  it('should find entries by canonical or decorated identifiers', () => {
    const knowledgeBase = KnowledgeBase.fromEntries([title, category]);

    expect(knowledgeBase.lookup(SUMMARY_INFORMATION, 2)?.name).toBe('System.Title');
    expect(knowledgeBase.lookup('{F29F85E0-4FF9-1068-AB91-08002B27B3D9}', '2')?.name).toBe('System.Title');
  });

  it('should report missing and unparsable keys as not found', () => {
    const knowledgeBase = KnowledgeBase.fromEntries([title]);

    expect(knowledgeBase.lookup(SUMMARY_INFORMATION, 99)).toBeUndefined();
    expect(knowledgeBase.lookup('not-a-guid', 2)).toBeUndefined();
    expect(knowledgeBase.lookup(SUMMARY_INFORMATION, -2)).toBeUndefined();
  });

  it('should iterate in key order, restartably', () => {
    const knowledgeBase = KnowledgeBase.fromEntries([subject, title, category]);
    const names = () => [...knowledgeBase.all()].map((entry) => entry.name);

    expect(names()).toEqual(['System.Category', 'System.Title', 'System.Subject']);
    expect(names()).toEqual(names());
    expect([...knowledgeBase.keys()]).toEqual([
      '{d5cdd502-2e9c-101b-9397-08002b2cf9ae}/2',
      '{f29f85e0-4ff9-1068-ab91-08002b27b3d9}/2',
      '{f29f85e0-4ff9-1068-ab91-08002b27b3d9}/3'
    ]);
    expect(knowledgeBase.size).toBe(3);
  });

  it('should reject duplicate keys', () => {
    expect(() => KnowledgeBase.fromEntries([title, { ...title, name: 'Title' }])).toThrow(/Duplicate knowledge base key/);
  });

  it('should hand out frozen entries', () => {
    const knowledgeBase = KnowledgeBase.fromEntries([title]);
    const entry = knowledgeBase.lookup(SUMMARY_INFORMATION, 2);

    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry?.provenance)).toBe(true);
  });
});
