/**
 * Quotes a dotted name part by part: `main.sales` -> `` `main`.`sales` ``.
 * Parts that are already backtick-quoted keep their content.
 */
export function quoteQualifiedName(name: string): string {
  const parts = splitQualifiedName(name);
  if (parts.length === 0) {
    throw new Error('Object name must not be empty');
  }
  return parts.map(quoteIdentifier).join('.');
}

export function quoteIdentifier(part: string): string {
  return `\`${part.replace(/`/g, '``')}\``;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function splitQualifiedName(name: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < name.length; i++) {
    const char = name[i];
    if (char === '`') {
      if (quoted && name[i + 1] === '`') {
        current += '`';
        i++;
      } else {
        quoted = !quoted;
      }
    } else if (char === '.' && !quoted) {
      parts.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current.trim());

  return parts.filter(part => part.length > 0);
}
