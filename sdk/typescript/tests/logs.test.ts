import { describe, expect, it } from 'vitest';

import { ProtocolError } from '../src/errors.js';
import { encodeColumns, parseLogEntries } from '../src/logs.js';

describe('encodeColumns', () => {
  it('serializes name and label in order', () => {
    expect(
      encodeColumns([
        { name: 'Date', label: 'date' },
        { name: 'Status', label: 'status' },
      ])
    ).toBe('[{"name":"Date","label":"date"},{"name":"Status","label":"status"}]');
  });

  it('encodes an empty schema', () => {
    expect(encodeColumns([])).toBe('[]');
  });
});

describe('parseLogEntries', () => {
  it('projects the columns of each row', () => {
    expect(parseLogEntries('[{"columns":{"a":1}},{"columns":{"a":2}}]')).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('ignores other row fields', () => {
    expect(parseLogEntries('[{"id":3,"dateCreation":"2024-01-01","columns":{"status":"ok"}}]')).toEqual([
      { status: 'ok' },
    ]);
  });

  it('returns no rows for an empty list', () => {
    expect(parseLogEntries('[]')).toEqual([]);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseLogEntries('not json')).toThrow(ProtocolError);
  });

  it('rejects rows without columns', () => {
    expect(() => parseLogEntries('[{"a":1}]')).toThrow(ProtocolError);
  });

  it('names the operation in the error', () => {
    try {
      parseLogEntries('{}', 'log read');
      expect.fail('expected ProtocolError');
    } catch (err) {
      expect(err).toMatchObject({ name: 'ProtocolError', operation: 'log read', responseBody: '{}' });
    }
  });
});
