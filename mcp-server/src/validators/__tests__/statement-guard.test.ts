import { describe, expect, it } from 'vitest';
import { leadingKeyword, StatementGuard } from '../statement-guard.js';

describe('leadingKeyword', () => {
  it.each([
    ['SELECT 1', 'SELECT'],
    ['   \n\tdelete from t', 'delete'],
    ['-- cleanup\nDROP TABLE t', 'DROP'],
    ['/* multi\nline */ insert into t values (1)', 'insert'],
    ['((SELECT 1))', 'SELECT'],
    ['-- only a comment', undefined],
    ['', undefined]
  ])('finds the first keyword of %j', (sql, expected) => {
    expect(leadingKeyword(sql)).toBe(expected);
  });
});

describe('StatementGuard', () => {
  it('blocks denylisted leading keywords regardless of case', () => {
    const guard = new StatementGuard({ mode: 'leading' });

    expect(guard.check('drop table sales')).toEqual({ allowed: false, keyword: 'DROP' });
    expect(guard.check('/* nightly */ Merge INTO t USING s ON t.id = s.id')).toEqual({
      allowed: false,
      keyword: 'MERGE'
    });
  });

  it('allows reads that merely mention a denylisted word', () => {
    const guard = new StatementGuard({ mode: 'leading' });

    expect(guard.check('SELECT created_at, update_count FROM events')).toEqual({ allowed: true });
    expect(guard.check("SELECT * FROM audit WHERE action = 'DELETE'")).toEqual({ allowed: true });
  });

  it('checks every word in anywhere mode', () => {
    const guard = new StatementGuard({ mode: 'anywhere' });

    expect(guard.check("SELECT * FROM audit WHERE action = 'DELETE'")).toEqual({
      allowed: false,
      keyword: 'DELETE'
    });
    expect(guard.check('SELECT created_at FROM events')).toEqual({ allowed: true });
  });

  it('lets everything through when off', () => {
    const guard = new StatementGuard({ mode: 'off' });

    expect(guard.mode).toBe('off');
    expect(guard.check('DROP TABLE t')).toEqual({ allowed: true });
  });

  it('uses a custom denylist in place of the default', () => {
    const guard = new StatementGuard({ mode: 'leading', denylist: ['optimize', 'VACUUM'] });

    expect(guard.check('OPTIMIZE sales')).toEqual({ allowed: false, keyword: 'OPTIMIZE' });
    expect(guard.check('DROP TABLE t')).toEqual({ allowed: true });
  });
});
