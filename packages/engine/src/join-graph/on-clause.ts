/**
 * ON-clause reference scanning
 *
 * Tokenizes the predicate instead of searching for table-name substrings:
 * string literals are skipped and only `table.column` pairs count, so a
 * column such as `countries_id` never reads as a reference to `countries`.
 * This is not a SQL parser; the predicate is emitted verbatim.
 */

type Token =
  | { kind: 'identifier'; value: string }
  | { kind: 'dot' }
  | { kind: 'other' };

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;

function readQuoted(input: string, start: number, quote: string): { value: string; end: number } {
  let value = '';
  let i = start + 1;
  while (i < input.length) {
    const ch = input[i];
    if (ch === quote) {
      // Doubled quote is an escaped quote
      if (input[i + 1] === quote) {
        value += quote;
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += ch;
    i++;
  }
  return { value, end: input.length };
}

function tokenize(clause: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < clause.length) {
    const ch = clause.charAt(i);

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "'") {
      i = readQuoted(clause, i, "'").end;
      tokens.push({ kind: 'other' });
    } else if (ch === '"' || ch === '`') {
      const quoted = readQuoted(clause, i, ch);
      tokens.push({ kind: 'identifier', value: quoted.value });
      i = quoted.end;
    } else if (ch === '.') {
      tokens.push({ kind: 'dot' });
      i++;
    } else if (IDENTIFIER_START.test(ch)) {
      let end = i + 1;
      while (end < clause.length && IDENTIFIER_PART.test(clause.charAt(end))) end++;
      tokens.push({ kind: 'identifier', value: clause.slice(i, end) });
      i = end;
    } else if (/[0-9]/.test(ch)) {
      // Numeric literal, including decimals such as 1.5
      let end = i + 1;
      while (end < clause.length && /[0-9.eE]/.test(clause.charAt(end))) end++;
      tokens.push({ kind: 'other' });
      i = end;
    } else {
      tokens.push({ kind: 'other' });
      i++;
    }
  }

  return tokens;
}

/**
 * Tables referenced through qualified identifiers, in order of first use.
 * For `schema.table.column` chains the table is the second-to-last part.
 */
export function extractTableReferences(clause: string): string[] {
  const tokens = tokenize(clause);
  const tables: string[] = [];

  let i = 0;
  while (i < tokens.length) {
    const chain: string[] = [];
    let j = i;
    while (true) {
      const token = tokens[j];
      if (token?.kind !== 'identifier') break;
      chain.push(token.value);
      if (tokens[j + 1]?.kind !== 'dot') break;
      j += 2;
    }

    if (chain.length >= 2) {
      const table = chain[chain.length - 2];
      if (table !== undefined && !tables.includes(table)) tables.push(table);
      i = j + 1;
    } else {
      i++;
    }
  }

  return tables;
}
