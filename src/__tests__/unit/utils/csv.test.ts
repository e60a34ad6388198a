/**
 * CSV Reader Unit Tests
 */

import { parseCsv, splitCsvLine, CsvSyntaxError } from '../../../utils/csv';

describe('splitCsvLine', () => {
  it('should split plain cells and trim whitespace', () => {
    expect(splitCsvLine(' 1 , Dallas ,TX', 1)).toEqual(['1', 'Dallas', 'TX']);
  });

  it('should keep delimiters inside quoted cells', () => {
    expect(splitCsvLine('1,"Dallas, TX",Reefer', 1)).toEqual(['1', 'Dallas, TX', 'Reefer']);
  });

  it('should unescape doubled quotes', () => {
    expect(splitCsvLine('"12"" pipe",x', 1)).toEqual(['12" pipe', 'x']);
  });

  it('should keep trailing empty cells', () => {
    expect(splitCsvLine('a,b,,', 1)).toEqual(['a', 'b', '', '']);
  });

  it('should reject an unterminated quote with its line number', () => {
    let caught: unknown;
    try {
      splitCsvLine('1,"Dallas, TX', 7);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CsvSyntaxError);
    expect(caught).toMatchObject({ message: 'Unterminated quoted cell', line: 7 });
  });
});

describe('parseCsv', () => {
  it('should skip blank lines and keep source line numbers', () => {
    const rows = parseCsv('a,b\n\n1,2\r\n3,4\n');

    expect(rows).toEqual([
      { line: 1, cells: ['a', 'b'] },
      { line: 3, cells: ['1', '2'] },
      { line: 4, cells: ['3', '4'] },
    ]);
  });

  it('should strip a byte order mark', () => {
    const rows = parseCsv('\uFEFFload_id\n1');

    expect(rows[0].cells).toEqual(['load_id']);
  });

  it('should return no rows for empty text', () => {
    expect(parseCsv('')).toEqual([]);
  });
});
