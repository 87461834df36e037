import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { enforceRowLimit, resolveRowLimit } from '../rewrite.js';

describe('resolveRowLimit', () => {
  it('uses the default when no limit is given', () => {
    assert.equal(resolveRowLimit(undefined), 100);
    assert.equal(resolveRowLimit(null), 100);
  });

  it('clamps to the hard maximum', () => {
    assert.equal(resolveRowLimit(5000), 1000);
    assert.equal(resolveRowLimit(1000), 1000);
  });

  it('raises zero and negatives to one', () => {
    assert.equal(resolveRowLimit(0), 1);
    assert.equal(resolveRowLimit(-5), 1);
  });

  it('truncates fractional limits', () => {
    assert.equal(resolveRowLimit(10.9), 10);
  });

  it('treats non-finite numbers as absent', () => {
    assert.equal(resolveRowLimit(Number.NaN), 100);
    assert.equal(resolveRowLimit(Number.POSITIVE_INFINITY), 100);
  });

  it('applies a configured default and maximum', () => {
    assert.equal(resolveRowLimit(undefined, { defaultLimit: 50, maxLimit: 200 }), 50);
    assert.equal(resolveRowLimit(500, { defaultLimit: 50, maxLimit: 200 }), 200);
  });

  it('never lets configuration lift the cap above 1000', () => {
    assert.equal(resolveRowLimit(5000, { maxLimit: 5000 }), 1000);
  });
});

describe('enforceRowLimit', () => {
  it('appends LIMIT when none is present', () => {
    assert.deepEqual(enforceRowLimit('SELECT * FROM roleplay_daily_reports', 100), {
      sql: 'SELECT * FROM roleplay_daily_reports LIMIT 100',
      effectiveLimit: 100,
      action: 'appended',
      originalLimit: null,
    });
  });

  it('clamps an outer LIMIT above the effective limit', () => {
    assert.deepEqual(enforceRowLimit('select name from t limit 50', 10), {
      sql: 'select name from t limit 10',
      effectiveLimit: 10,
      action: 'clamped',
      originalLimit: 50,
    });
  });

  it('keeps an outer LIMIT at or below the effective limit', () => {
    assert.deepEqual(enforceRowLimit('SELECT * FROM t LIMIT 5', 100), {
      sql: 'SELECT * FROM t LIMIT 5',
      effectiveLimit: 100,
      action: 'kept',
      originalLimit: 5,
    });
  });

  it('keeps OFFSET when clamping', () => {
    assert.equal(enforceRowLimit('SELECT * FROM t LIMIT 2000 OFFSET 10', 1000).sql, 'SELECT * FROM t LIMIT 1000 OFFSET 10');
  });

  it('strips trailing semicolons and comments before appending', () => {
    assert.equal(enforceRowLimit('SELECT * FROM t;  -- done\n', 100).sql, 'SELECT * FROM t LIMIT 100');
  });

  it('ignores LIMIT inside a subquery', () => {
    const result = enforceRowLimit('SELECT * FROM (SELECT * FROM t LIMIT 5000) s', 100);
    assert.equal(result.action, 'appended');
    assert.equal(result.sql, 'SELECT * FROM (SELECT * FROM t LIMIT 5000) s LIMIT 100');
  });

  it('ignores LIMIT inside a string literal', () => {
    assert.equal(enforceRowLimit("SELECT 'limit 5000' AS x", 100).sql, "SELECT 'limit 5000' AS x LIMIT 100");
  });

  it('clamps LIMIT ALL', () => {
    assert.deepEqual(enforceRowLimit('SELECT * FROM t LIMIT ALL', 100), {
      sql: 'SELECT * FROM t LIMIT 100',
      effectiveLimit: 100,
      action: 'clamped',
      originalLimit: null,
    });
  });

  it('wraps a LIMIT it cannot read as a number', () => {
    assert.deepEqual(enforceRowLimit('SELECT * FROM t LIMIT $1', 100), {
      sql: 'SELECT * FROM (SELECT * FROM t LIMIT $1) AS limited_rows LIMIT 100',
      effectiveLimit: 100,
      action: 'wrapped',
      originalLimit: null,
    });
  });

  it('wraps the comma form instead of keeping its first number', () => {
    assert.deepEqual(enforceRowLimit('SELECT * FROM t LIMIT 10, 5000', 100), {
      sql: 'SELECT * FROM (SELECT * FROM t LIMIT 10, 5000) AS limited_rows LIMIT 100',
      effectiveLimit: 100,
      action: 'wrapped',
      originalLimit: null,
    });
  });

  it('wraps a LIMIT expression', () => {
    assert.equal(enforceRowLimit('SELECT * FROM t LIMIT 10 + 5000', 100).action, 'wrapped');
  });

  it('wraps an outer FETCH FIRST clause', () => {
    assert.equal(
      enforceRowLimit('SELECT * FROM t FETCH FIRST 5000 ROWS ONLY', 100).sql,
      'SELECT * FROM (SELECT * FROM t FETCH FIRST 5000 ROWS ONLY) AS limited_rows LIMIT 100',
    );
  });

  it('returns the same SQL when applied to its own output', () => {
    const queries = [
      'SELECT * FROM roleplay_daily_reports',
      'select name from t limit 50',
      'SELECT * FROM t LIMIT 5',
      'SELECT * FROM t LIMIT ALL;',
      'SELECT * FROM t LIMIT $1',
      'SELECT * FROM t FETCH FIRST 5 ROWS ONLY',
      'SELECT * FROM (SELECT * FROM t LIMIT 5000) s -- note',
    ];
    for (const query of queries) {
      const once = enforceRowLimit(query, 10);
      const twice = enforceRowLimit(once.sql, 10);
      assert.equal(twice.sql, once.sql, query);
      assert.equal(twice.effectiveLimit, once.effectiveLimit);
    }
  });
});
