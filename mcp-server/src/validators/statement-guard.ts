export const DEFAULT_DENYLIST: readonly string[] = [
  'DROP',
  'DELETE',
  'TRUNCATE',
  'ALTER',
  'CREATE',
  'INSERT',
  'UPDATE',
  'MERGE',
  'GRANT',
  'REVOKE'
];

/**
 * `leading` checks only the statement's first keyword, `anywhere` checks every
 * word token, `off` lets everything through.
 */
export type StatementGuardMode = 'leading' | 'anywhere' | 'off';

export interface StatementGuardOptions {
  mode: StatementGuardMode;
  denylist?: readonly string[];
}

export type GuardVerdict = { allowed: true } | { allowed: false; keyword: string };

const LEADING_NOISE = /^(?:\s|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/|\()+/;
const WORD = /[A-Za-z_][A-Za-z0-9_]*/g;

export class StatementGuard {
  private readonly denied: ReadonlySet<string>;

  constructor(private readonly options: StatementGuardOptions) {
    this.denied = new Set((options.denylist ?? DEFAULT_DENYLIST).map(keyword => keyword.toUpperCase()));
  }

  get mode(): StatementGuardMode {
    return this.options.mode;
  }

  check(sql: string): GuardVerdict {
    if (this.options.mode === 'off') {
      return { allowed: true };
    }

    const candidates = this.options.mode === 'leading'
      ? [leadingKeyword(sql)].filter((word): word is string => word !== undefined)
      : sql.match(WORD) ?? [];

    for (const word of candidates) {
      const upper = word.toUpperCase();
      if (this.denied.has(upper)) {
        return { allowed: false, keyword: upper };
      }
    }

    return { allowed: true };
  }
}

export function leadingKeyword(sql: string): string | undefined {
  const body = sql.replace(LEADING_NOISE, '');
  const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(body);
  return match ? match[0] : undefined;
}
