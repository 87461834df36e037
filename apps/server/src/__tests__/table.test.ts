import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { displayWidth, formatTable, formatValue } from '../util/table.js';

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    assert.equal(
      formatTable(['id', 'name'], [
        { id: 1, name: 'a' },
        { id: 22, name: null },
      ]),
      ['id | name', '---+-----', '1  | a   ', '22 | NULL'].join('\n'),
    );
  });

  it('counts CJK characters as two cells', () => {
    assert.equal(displayWidth('餐厅ID'), 6);
    assert.equal(formatTable(['餐厅'], [{ 餐厅: 'ab' }]), ['餐厅', '----', 'ab  '].join('\n'));
  });

  it('shortens cells wider than the maximum', () => {
    const lines = formatTable(['note'], [{ note: 'x'.repeat(60) }]).split('\n');
    assert.equal(lines[2], `${'x'.repeat(39)}…`);
  });

  it('describes empty input', () => {
    assert.equal(formatTable([], []), '(no columns)');
    assert.equal(formatTable(['a'], []), '(0 rows)');
  });
});

describe('formatValue', () => {
  it('renders values for display', () => {
    assert.equal(formatValue(undefined), 'NULL');
    assert.equal(formatValue(true), 'true');
    assert.equal(formatValue({ a: 1 }), '{"a":1}');
    assert.equal(formatValue(new Date(Date.UTC(2025, 9, 21))), '2025-10-21T00:00:00.000Z');
  });
});
