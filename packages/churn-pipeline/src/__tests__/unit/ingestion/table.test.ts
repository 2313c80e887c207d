/**
 * CSV codec tests
 */

import { describe, it, expect } from 'vitest';
import { escapeCsv, formatCsv, parseCsv, parseCsvLine, tableFromObjects } from '../../../ingestion/table.js';

describe('parseCsv', () => {
  it('parses header and rows', () => {
    expect(parseCsv('customerID,tenure\nA,2\nB,30\n')).toEqual({
      columns: ['customerID', 'tenure'],
      rows: [
        ['A', '2'],
        ['B', '30'],
      ],
    });
  });

  it('handles CRLF, a byte order mark and blank lines', () => {
    expect(parseCsv('﻿customerID,tenure\r\n\r\nA,2\r\n')).toEqual({
      columns: ['customerID', 'tenure'],
      rows: [['A', '2']],
    });
  });

  it('returns an empty table for empty content', () => {
    expect(parseCsv('')).toEqual({ columns: [], rows: [] });
    expect(parseCsv('\n \n')).toEqual({ columns: [], rows: [] });
  });
});

describe('parseCsvLine', () => {
  it('keeps commas inside quotes and unescapes doubled quotes', () => {
    expect(parseCsvLine('A,"Bank transfer, automatic","say ""hi"""')).toEqual([
      'A',
      'Bank transfer, automatic',
      'say "hi"',
    ]);
  });

  it('trims unquoted whitespace and keeps empty cells', () => {
    expect(parseCsvLine(' A , ,3')).toEqual(['A', '', '3']);
  });
});

describe('formatCsv', () => {
  it('escapes cells that need quoting and ends with a newline', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv('a,b')).toBe('"a,b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');

    expect(
      formatCsv({
        columns: ['customerID', 'note'],
        rows: [['A', 'x,y']],
      })
    ).toBe('customerID,note\nA,"x,y"\n');
  });

  it('parses its own output back to the same table', () => {
    const table = {
      columns: ['customerID', 'PaymentMethod'],
      rows: [
        ['A', 'Bank transfer (automatic)'],
        ['B', 'Mailed, "paper" check'],
      ],
    };
    expect(parseCsv(formatCsv(table))).toEqual(table);
  });
});

describe('tableFromObjects', () => {
  it('unions keys in first-seen order and blanks absent or null cells', () => {
    expect(
      tableFromObjects([
        { customerID: 'A', tenure: 2 },
        { customerID: 'B', Contract: 'One year', tenure: null },
        { customerID: 'C', active: true },
      ])
    ).toEqual({
      columns: ['customerID', 'tenure', 'Contract', 'active'],
      rows: [
        ['A', '2', '', ''],
        ['B', '', 'One year', ''],
        ['C', '', '', 'true'],
      ],
    });
  });
});
