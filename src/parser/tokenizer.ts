export type TokenKind =
  | 'const'
  | 'ident'
  | 'label'
  | 'keyword'
  | 'symbol'
  | 'string'
  | 'dstring'
  | 'scope'
  | 'dot'
  | 'comma'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'lbrace'
  | 'rbrace'
  | 'arrow'
  | 'assign'
  | 'lt'
  | 'newline'
  | 'other';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Literal value for strings and symbols, bare name for labels. */
  value: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export const KEYWORDS = new Set([
  'alias', 'and', 'begin', 'break', 'case', 'class', 'def', 'defined?', 'do', 'else', 'elsif',
  'end', 'ensure', 'false', 'for', 'if', 'in', 'module', 'next', 'nil', 'not', 'or', 'redo',
  'rescue', 'retry', 'return', 'self', 'super', 'then', 'true', 'undef', 'unless', 'until',
  'when', 'while', 'yield',
]);

// Tokens after which a `/` starts a regexp literal rather than a division.
const REGEXP_PRECEDERS = new Set<TokenKind>([
  'newline', 'comma', 'lparen', 'lbracket', 'lbrace', 'assign', 'arrow', 'keyword', 'lt',
]);

const PERCENT_LITERAL = /^%[wWiIqQrs]?[([{<|!/]/;
const CLOSING_DELIMITERS: Record<string, string> = { '(': ')', '[': ']', '{': '}', '<': '>' };
const HEREDOC_OPENER = /^<<([~-]?)(["'`]?)([A-Za-z_]\w*)\2/;

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /\w/.test(ch);
}

/**
 * Splits Ruby source into the tokens the reference tree builder needs.
 * Comments, regexps, percent literals and the plain text of strings and
 * heredocs are consumed so their contents never surface as constants. Code
 * inside `#{...}` is tokenized and its tokens follow the string's token.
 */
export function tokenize(source: string): Token[] {
  return new Tokenizer(source).run();
}

interface PendingHeredoc {
  terminator: string;
  indented: boolean;
  interpolates: boolean;
}

class Tokenizer {
  private tokens: Token[] = [];
  private pendingHeredocs: PendingHeredoc[] = [];
  private braceDepth = 0;

  /** With `interpolation`, stops at the `}` that closes the `#{` it was started after. */
  constructor(
    private source: string,
    private pos = 0,
    private line = 1,
    private lineStart = 0,
    private interpolation = false,
  ) {}

  run(): Token[] {
    const src = this.source;
    while (this.pos < src.length) {
      const ch = src[this.pos];
      const next = src[this.pos + 1];

      if (this.interpolation && ch === '}' && this.braceDepth === 0) break;

      if (ch === '\n') {
        this.push('newline', this.pos, this.pos + 1);
        this.advanceLine(this.pos + 1);
        if (this.pendingHeredocs.length > 0) this.readHeredocBodies();
        continue;
      }
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.pos++;
        continue;
      }
      if (ch === '\\' && next === '\n') {
        this.advanceLine(this.pos + 2);
        continue;
      }
      if (ch === '#') {
        this.skipToLineEnd();
        continue;
      }
      if (ch === '=' && this.pos === this.lineStart && src.startsWith('=begin', this.pos)) {
        this.skipEmbeddedDoc();
        continue;
      }
      if (ch === ';') {
        this.push('newline', this.pos, this.pos + 1);
        this.pos++;
        continue;
      }
      if (ch === '"' || ch === "'" || ch === '`') {
        this.readString(ch);
        continue;
      }
      if (ch === ':') {
        this.readColon();
        continue;
      }
      if (isIdentStart(ch)) {
        this.readWord();
        continue;
      }
      if (ch === '@' || ch === '$') {
        const start = this.pos;
        this.pos++;
        while (src[this.pos] === '@') this.pos++;
        while (isIdentChar(src[this.pos])) this.pos++;
        this.push('other', start, this.pos);
        continue;
      }
      if (/\d/.test(ch)) {
        const start = this.pos;
        while (/[\w]/.test(src[this.pos] ?? '')) this.pos++;
        if (src[this.pos] === '.' && /\d/.test(src[this.pos + 1] ?? '')) {
          this.pos++;
          while (/[\w]/.test(src[this.pos] ?? '')) this.pos++;
        }
        this.push('other', start, this.pos);
        continue;
      }
      if (ch === '%' && PERCENT_LITERAL.test(src.slice(this.pos, this.pos + 3)) && this.percentLiteralAllowed()) {
        this.readPercentLiteral();
        continue;
      }
      if (ch === '/' && this.regexpAllowed()) {
        this.readRegexp();
        continue;
      }
      if (ch === '<' && next === '<') {
        const match = HEREDOC_OPENER.exec(src.slice(this.pos));
        if (match && this.regexpAllowed()) {
          this.pendingHeredocs.push({
            terminator: match[3],
            indented: match[1] !== '',
            interpolates: match[2] !== "'",
          });
          this.push('dstring', this.pos, this.pos + match[0].length);
          this.pos += match[0].length;
          continue;
        }
        this.push('other', this.pos, this.pos + 2);
        this.pos += 2;
        continue;
      }
      this.readPunctuation(ch, next);
    }
    return this.tokens;
  }

  private push(kind: TokenKind, start: number, end: number, value?: string): void {
    const text = this.source.slice(start, end);
    this.tokens.push({
      kind,
      text,
      value: value ?? text,
      start,
      end,
      line: this.line,
      column: start - this.lineStart + 1,
    });
  }

  private previous(): Token | undefined {
    return this.tokens[this.tokens.length - 1];
  }

  private advanceLine(newLineStart: number): void {
    this.line++;
    this.lineStart = newLineStart;
    this.pos = newLineStart;
  }

  private skipToLineEnd(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n') this.pos++;
  }

  private skipEmbeddedDoc(): void {
    while (this.pos < this.source.length) {
      this.skipToLineEnd();
      if (this.pos >= this.source.length) return;
      this.advanceLine(this.pos + 1);
      if (this.source.startsWith('=end', this.pos)) {
        this.skipToLineEnd();
        return;
      }
    }
  }

  // Body lines up to each terminator; interpolated code becomes one statement after the bodies.
  private readHeredocBodies(): void {
    const src = this.source;
    const embedded: Token[] = [];
    const lineEndFrom = (pos: number): number => {
      const end = src.indexOf('\n', pos);
      return end === -1 ? src.length : end;
    };

    while (this.pendingHeredocs.length > 0 && this.pos < src.length) {
      const heredoc = this.pendingHeredocs[0];
      let lineEnd = lineEndFrom(this.pos);
      const lineText = src.slice(this.pos, lineEnd);
      const candidate = heredoc.indented ? lineText.trim() : lineText;

      if (candidate === heredoc.terminator) {
        this.pendingHeredocs.shift();
      } else if (heredoc.interpolates) {
        let at = src.indexOf('#{', this.pos);
        while (at !== -1 && at < lineEnd) {
          this.pos = at;
          embedded.push(...this.readInterpolation());
          lineEnd = lineEndFrom(this.pos);
          at = src.indexOf('#{', this.pos);
        }
      }

      if (lineEnd >= src.length) {
        this.pos = src.length;
        break;
      }
      this.advanceLine(lineEnd + 1);
    }

    const last = embedded[embedded.length - 1];
    if (last) {
      this.tokens.push(...embedded, { ...last, kind: 'newline', text: '', value: '', start: last.end });
    }
  }

  /** With `symbolStart`, the string is the body of a `:"..."` symbol starting there. */
  private readString(quote: string, symbolStart?: number): void {
    const src = this.source;
    const start = symbolStart ?? this.pos;
    const startLine = this.line;
    const startColumn = start - this.lineStart + 1;
    const embedded: Token[] = [];
    let value = '';
    let interpolated = false;
    this.pos++;

    while (this.pos < src.length && src[this.pos] !== quote) {
      const ch = src[this.pos];
      if (ch === '\\' && this.pos + 1 < src.length) {
        const escaped = src[this.pos + 1];
        if (quote === "'") {
          value += escaped === "'" || escaped === '\\' ? escaped : ch + escaped;
        } else {
          value += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped;
        }
        if (escaped === '\n') {
          this.line++;
          this.lineStart = this.pos + 2;
        }
        this.pos += 2;
        continue;
      }
      if (quote !== "'" && ch === '#' && src[this.pos + 1] === '{') {
        interpolated = true;
        embedded.push(...this.readInterpolation());
        continue;
      }
      if (ch === '\n') {
        this.line++;
        this.lineStart = this.pos + 1;
      }
      value += ch;
      this.pos++;
    }
    this.pos++;

    this.tokens.push(
      {
        kind: symbolStart !== undefined ? 'symbol' : interpolated ? 'dstring' : 'string',
        text: src.slice(start, this.pos),
        value,
        start,
        end: Math.min(this.pos, src.length),
        line: startLine,
        column: startColumn,
      },
      ...embedded,
    );
  }

  // `this.pos` is at `#{`; leaves it after the closing `}`.
  private readInterpolation(): Token[] {
    const inner = new Tokenizer(this.source, this.pos + 2, this.line, this.lineStart, true);
    const tokens = inner.run();
    this.pos = Math.min(inner.pos + 1, this.source.length);
    this.line = inner.line;
    this.lineStart = inner.lineStart;
    return tokens.filter(token => token.kind !== 'newline');
  }

  private readColon(): void {
    const src = this.source;
    const start = this.pos;
    const next = src[this.pos + 1];

    if (next === ':') {
      this.push('scope', start, start + 2);
      this.pos += 2;
      return;
    }
    if (next === '"' || next === "'") {
      this.pos++;
      this.readString(next, start);
      return;
    }
    if (isIdentStart(next)) {
      this.pos++;
      while (isIdentChar(src[this.pos])) this.pos++;
      if ((src[this.pos] === '?' || src[this.pos] === '!') && src[this.pos + 1] !== '=') this.pos++;
      this.push('symbol', start, this.pos, src.slice(start + 1, this.pos));
      return;
    }
    this.push('other', start, start + 1);
    this.pos++;
  }

  private readWord(): void {
    const src = this.source;
    const start = this.pos;
    while (isIdentChar(src[this.pos])) this.pos++;
    const afterWord = src[this.pos];
    if ((afterWord === '?' || afterWord === '!') && src[this.pos + 1] !== '=' && src[this.pos + 1] !== ':') {
      this.pos++;
    }
    const word = src.slice(start, this.pos);
    const prev = this.previous();
    const afterDot = prev?.kind === 'dot';

    if (src[this.pos] === ':' && src[this.pos + 1] !== ':' && !afterDot) {
      this.push('label', start, this.pos + 1, word);
      this.pos++;
      return;
    }
    if (afterDot) {
      this.push('ident', start, this.pos);
    } else if (/^[A-Z]/.test(word)) {
      this.push('const', start, this.pos);
    } else if (KEYWORDS.has(word)) {
      this.push('keyword', start, this.pos);
    } else {
      this.push('ident', start, this.pos);
    }
  }

  private regexpAllowed(): boolean {
    const prev = this.previous();
    if (!prev) return true;
    if (REGEXP_PRECEDERS.has(prev.kind)) return prev.kind !== 'keyword' || prev.text !== 'end';
    if (prev.kind === 'ident') {
      // `foo /bar/` is an argument, `foo / bar` is a division.
      const next = this.source[this.pos + 1];
      return this.source[this.pos - 1] === ' ' && next !== ' ' && next !== '=';
    }
    return false;
  }

  private percentLiteralAllowed(): boolean {
    const prev = this.previous();
    if (!prev) return true;
    if (prev.kind === 'ident') return this.source[this.pos - 1] === ' ' && this.source[this.pos + 1] !== ' ';
    return REGEXP_PRECEDERS.has(prev.kind);
  }

  // A `/` with no closing `/` on its line is a division.
  private readRegexp(): void {
    const src = this.source;
    const start = this.pos;
    let end = start + 1;
    while (end < src.length && src[end] !== '/' && src[end] !== '\n') {
      end += src[end] === '\\' && src[end + 1] !== '\n' ? 2 : 1;
    }
    if (src[end] !== '/') {
      this.push('other', start, start + 1);
      this.pos = start + 1;
      return;
    }

    end++;
    while (/[a-z]/.test(src[end] ?? '')) end++;
    this.push('other', start, end);
    this.pos = end;
  }

  private readPercentLiteral(): void {
    const src = this.source;
    const start = this.pos;
    this.pos++;
    if (/[A-Za-z]/.test(src[this.pos])) this.pos++;
    const open = src[this.pos];
    const close = CLOSING_DELIMITERS[open] ?? open;
    let depth = 1;
    this.pos++;
    while (this.pos < src.length && depth > 0) {
      const ch = src[this.pos];
      if (ch === '\\') {
        this.pos += 2;
        continue;
      }
      if (ch === close) depth--;
      else if (ch === open && close !== open) depth++;
      if (ch === '\n') {
        this.line++;
        this.lineStart = this.pos + 1;
      }
      this.pos++;
    }
    this.push('other', start, this.pos);
  }

  private readPunctuation(ch: string, next: string | undefined): void {
    const start = this.pos;
    const single = (kind: TokenKind): void => {
      this.push(kind, start, start + 1);
      this.pos++;
    };
    const double = (kind: TokenKind): void => {
      this.push(kind, start, start + 2);
      this.pos += 2;
    };

    switch (ch) {
      case '.':
        if (next === '.') {
          const end = this.source[start + 2] === '.' ? start + 3 : start + 2;
          this.push('other', start, end);
          this.pos = end;
        } else {
          single('dot');
        }
        return;
      case '&':
        if (next === '.') double('dot');
        else single('other');
        return;
      case ',':
        single('comma');
        return;
      case '(':
        single('lparen');
        return;
      case ')':
        single('rparen');
        return;
      case '[':
        single('lbracket');
        return;
      case ']':
        single('rbracket');
        return;
      case '{':
        this.braceDepth++;
        single('lbrace');
        return;
      case '}':
        this.braceDepth--;
        single('rbrace');
        return;
      case '=':
        if (next === '>') double('arrow');
        else if (next === '=' || next === '~') double('other');
        else single('assign');
        return;
      case '<':
        if (next === '=') double('other');
        else single('lt');
        return;
      default:
        single('other');
    }
  }
}
