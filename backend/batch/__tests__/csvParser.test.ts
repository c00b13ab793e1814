// ─── CSV Parser Tests ─────────────────────────────────────────────────────

import { detectSeparator, formatCsv, formatCsvField, parseCsv } from '../csvParser';

describe('csvParser', () => {
  test('parses a simple CSV with headers and data rows', () => {
    const csv = `capability_type,capability_name,target_trl
capability,Highway Navigation,8
technical_function,Lane Keeping,7`;

    const result = parseCsv(csv);
    expect(result.headers).toEqual(['capability_type', 'capability_name', 'target_trl']);
    expect(result.records).toHaveLength(2);
    expect(result.records[0]?.values.capability_name).toBe('Highway Navigation');
    expect(result.records[1]?.values.target_trl).toBe('7');
    expect(result.errors).toHaveLength(0);
  });

  test('handles empty CSV content', () => {
    const result = parseCsv('');
    expect(result.headers).toEqual([]);
    expect(result.records).toHaveLength(0);
    expect(result.errors).toEqual(['CSV content is empty.']);
  });

  test('handles CSV with only headers', () => {
    const result = parseCsv('capability_type,capability_name');
    expect(result.headers).toEqual(['capability_type', 'capability_name']);
    expect(result.records).toHaveLength(0);
  });

  test('handles quoted fields with separators, quotes and newlines', () => {
    const csv = `capability_name,notes
"Docking, rear","Said ""ready""
after trial"
Parking,plain`;

    const result = parseCsv(csv);
    expect(result.records[0]?.values).toEqual({
      capability_name: 'Docking, rear',
      notes: 'Said "ready"\nafter trial',
    });
    expect(result.records[1]?.line).toBe(4);
  });

  test('reads missing trailing values as empty strings', () => {
    const result = parseCsv('a,b,c\n1,,\n2');
    expect(result.records.map((r) => r.values)).toEqual([
      { a: '1', b: '', c: '' },
      { a: '2', b: '', c: '' },
    ]);
  });

  test('lowercases headers and strips a byte order mark', () => {
    const result = parseCsv('\uFEFFCapability_Type,Capability_Name\r\ncapability,X\r\n');
    expect(result.headers).toEqual(['capability_type', 'capability_name']);
    expect(result.records[0]?.values.capability_type).toBe('capability');
  });

  test('skips blank lines but keeps line numbers', () => {
    const result = parseCsv('name\nfirst\n\n\nsecond');
    expect(result.records.map((r) => [r.line, r.values.name])).toEqual([
      [2, 'first'],
      [5, 'second'],
    ]);
  });

  test('reports rows with extra fields', () => {
    const result = parseCsv('a,b\n1,2,3');
    expect(result.errors).toEqual(['Row 2: 3 fields for 2 columns; extra fields ignored.']);
  });
});

describe('detectSeparator', () => {
  it.each([
    ['a,b,c', ','],
    ['a;b;c', ';'],
    ['a\tb\tc', '\t'],
    ['single', ','],
  ])('detects the separator of %j', (header, expected) => {
    expect(detectSeparator(header)).toBe(expected);
  });

  test('parses semicolon-separated CSV', () => {
    const result = parseCsv('name;trl\nLane Keeping;6');
    expect(result.separator).toBe(';');
    expect(result.records[0]?.values).toEqual({ name: 'Lane Keeping', trl: '6' });
  });
});

describe('formatCsv', () => {
  test('quotes only fields that need it', () => {
    expect(formatCsvField('plain')).toBe('plain');
    expect(formatCsvField('a,b')).toBe('"a,b"');
    expect(formatCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvField(null)).toBe('');
    expect(formatCsvField(4.5)).toBe('4.5');
  });

  test('writes a header and newline-terminated rows', () => {
    expect(formatCsv(['name', 'trl'], [{ name: 'A', trl: 3 }, { name: 'B, C' }])).toBe(
      'name,trl\nA,3\n"B, C",\n',
    );
  });
});
