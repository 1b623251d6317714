import { describe, it, expect } from 'vitest';
import type { Submission } from '../../domain';
import { buildExportRows, EXPORT_HEADER, formatTimestamp, toCsv } from '../export';
import { parseTags } from '../tags';

describe('export.ts', () => {
  describe('formatTimestamp', () => {
    it('renders UTC to the minute', () => {
      expect(formatTimestamp(new Date('2026-03-02T09:05:59.999Z'))).toBe('2026-03-02 09:05');
    });

    it('renders a missing value as N/A', () => {
      expect(formatTimestamp(null)).toBe('N/A');
    });
  });

  describe('toCsv', () => {
    it('quotes only fields that need it and doubles embedded quotes', () => {
      const csv = toCsv([
        ['ID', 'Title'],
        ['1', 'Plain'],
        ['2', 'Roads, bridges'],
        ['3', 'The "big" one'],
        ['4', 'two\nlines'],
      ]);

      expect(csv).toBe(
        'ID,Title\r\n1,Plain\r\n2,"Roads, bridges"\r\n3,"The ""big"" one"\r\n4,"two\nlines"\r\n'
      );
    });
  });

  describe('buildExportRows', () => {
    it('fills unknown people, agencies and dates with N/A', () => {
      const at = new Date('2026-03-02T09:00:00.000Z');
      const s: Submission = {
        id: 's-1',
        title: 'Orphan',
        contentType: 'SPEECH',
        description: 'd',
        tags: '',
        fileRef: 'f',
        isConfidential: false,
        macId: 'gone',
        submittedBy: null,
        assignedTo: null,
        reviewedBy: null,
        status: 'PENDING',
        priority: 'MEDIUM',
        isPublished: false,
        reviewerComments: '',
        denialReason: '',
        submittedAt: at,
        reviewedAt: null,
        approvedAt: null,
        publishedAt: null,
        updatedAt: at,
      };

      const rows = buildExportRows([s], [], []);

      expect(rows[0]).toEqual([...EXPORT_HEADER]);
      expect(rows[1]).toEqual([
        's-1', 'Orphan', 'N/A', 'Speech', 'Pending Review', 'N/A',
        '2026-03-02 09:00', 'N/A', 'N/A', 'N/A', 'N/A', '',
      ]);
    });

    it('writes tags exactly as entered', () => {
      const at = new Date('2026-03-02T09:00:00.000Z');
      const s: Submission = {
        id: 's-2',
        title: 'Tagged',
        contentType: 'PHOTO',
        description: 'd',
        tags: 'flood,  weather, flood',
        fileRef: 'f',
        isConfidential: false,
        macId: 'gone',
        submittedBy: null,
        assignedTo: null,
        reviewedBy: null,
        status: 'PENDING',
        priority: 'MEDIUM',
        isPublished: false,
        reviewerComments: '',
        denialReason: '',
        submittedAt: at,
        reviewedAt: null,
        approvedAt: null,
        publishedAt: null,
        updatedAt: at,
      };

      const [, row] = buildExportRows([s], [], []);

      expect(row[11]).toBe('flood,  weather, flood');
    });
  });

  describe('parseTags', () => {
    it('trims, drops blanks and keeps first occurrences', () => {
      expect(parseTags(' flood, weather,,flood , ')).toEqual(['flood', 'weather']);
      expect(parseTags('')).toEqual([]);
    });
  });
});
