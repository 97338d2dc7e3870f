import type { NodeKind, SourceRange, TreeNode } from '../types.js';
import { ARGUMENT_CALLS } from './calls.js';
import { tokenize, type Token, type TokenKind } from './tokenizer.js';

/**
 * Arena of reference-tree nodes. Node 0 is the root; every other node points
 * at its parent by index, so ancestor walks are plain index chasing.
 */
export class ReferenceTree {
  constructor(
    readonly source: string,
    readonly nodes: TreeNode[],
  ) {}

  get root(): TreeNode {
    return this.nodes[0];
  }

  node(id: number): TreeNode {
    return this.nodes[id];
  }

  parentOf(node: TreeNode): TreeNode | null {
    return node.parent === null ? null : this.nodes[node.parent];
  }

  childrenOf(node: TreeNode): TreeNode[] {
    return node.children.map(id => this.nodes[id]);
  }

  argumentsOf(send: TreeNode): TreeNode[] {
    return this.childrenOf(send).filter(child => child.id !== send.receiver);
  }

  sourceOf(node: TreeNode): string {
    return this.source.slice(node.range.start, node.range.end);
  }

  /** `A::B::C` for the outer node of `::A::B::C`; the leading `::` is not part of the name. */
  constName(node: TreeNode): string {
    const segments: string[] = [];
    let current: TreeNode | undefined = node;
    while (current && current.kind === 'const') {
      segments.unshift(current.name);
      const scope: number | undefined = current.children[0];
      current = scope === undefined ? undefined : this.nodes[scope];
    }
    return segments.join('::');
  }

  /** Key/value nodes of a hash; pairs whose value was not parsed are left out. */
  pairsOf(hash: TreeNode): Array<{ key: TreeNode; value: TreeNode }> {
    const pairs: Array<{ key: TreeNode; value: TreeNode }> = [];
    for (const pair of this.childrenOf(hash)) {
      if (pair.kind !== 'pair' || pair.children.length < 2) continue;
      pairs.push({ key: this.nodes[pair.children[0]], value: this.nodes[pair.children[1]] });
    }
    return pairs;
  }

  /** Value of the first `key:` (or `:key =>`) pair. */
  symbolKeyValue(hash: TreeNode, key: string): TreeNode | null {
    const pair = this.pairsOf(hash).find(p => p.key.kind === 'sym' && p.key.name === key);
    return pair ? pair.value : null;
  }

  inSourceOrder(): TreeNode[] {
    return [...this.nodes].sort((a, b) => a.range.start - b.range.start || a.id - b.id);
  }

  ofKind(kind: NodeKind): TreeNode[] {
    return this.inSourceOrder().filter(node => node.kind === kind);
  }
}

export interface TreeBuildOptions {
  /** Calls whose arguments become nodes. Other calls only contribute their receiver. */
  argumentCalls?: Set<string>;
}

export function buildReferenceTree(source: string, options: TreeBuildOptions = {}): ReferenceTree {
  return new TreeBuilder(source, options.argumentCalls ?? ARGUMENT_CALLS).build();
}

interface Frame {
  node: number;
  /** Line of a `while`/`until`/`for` whose optional `do` has not been seen yet. */
  loopLine?: number;
}

const LOOP_KEYWORDS = new Set(['while', 'until', 'for']);
const MODIFIER_CAPABLE = new Set(['if', 'unless', 'while', 'until']);
const ALWAYS_OPENS = new Set(['case', 'begin', 'for']);
const STATEMENT_STARTERS = new Set<TokenKind>(['newline', 'assign', 'lparen', 'lbracket', 'lbrace', 'comma', 'arrow']);
const BARE_ARGUMENT_ENDERS = new Set(['do', 'end', 'if', 'unless', 'while', 'until', 'rescue', 'and', 'or', 'then']);
const OPENERS = new Set<TokenKind>(['lparen', 'lbracket', 'lbrace']);
const CLOSERS = new Set<TokenKind>(['rparen', 'rbracket', 'rbrace']);

function rangeOf(token: Token): SourceRange {
  return { start: token.start, end: token.end, line: token.line, column: token.column };
}

class TreeBuilder {
  private tokens: Token[];
  private pos = 0;
  private nodes: TreeNode[] = [];
  private frames: Frame[] = [];
  private lastCall: { node: number; end: number } | null = null;

  constructor(
    private source: string,
    private argumentCalls: Set<string>,
  ) {
    this.tokens = tokenize(source);
    this.create('root', { start: 0, end: source.length, line: 1, column: 1 }, '', null);
  }

  build(): ReferenceTree {
    while (this.pos < this.tokens.length) {
      this.statementToken();
    }
    return new ReferenceTree(this.source, this.nodes);
  }

  // ---------------------------------------------------------------------------
  // Node bookkeeping

  private create(kind: NodeKind, range: SourceRange, name: string, parent: number | null): TreeNode {
    const node: TreeNode = { id: this.nodes.length, kind, parent: null, children: [], range, name, receiver: null };
    this.nodes.push(node);
    if (parent !== null) this.attach(node.id, parent);
    return node;
  }

  private attach(child: number, parent: number): void {
    this.nodes[child].parent = parent;
    this.nodes[parent].children.push(child);
  }

  private reparent(child: number, parent: number): void {
    const previous = this.nodes[child].parent;
    if (previous !== null) {
      const siblings = this.nodes[previous].children;
      siblings.splice(siblings.indexOf(child), 1);
    }
    this.attach(child, parent);
  }

  private context(): number {
    const frame = this.frames[this.frames.length - 1];
    return frame ? frame.node : 0;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private skipNewlines(): void {
    while (this.peek()?.kind === 'newline') this.pos++;
  }

  private atConstPath(): boolean {
    const tok = this.peek();
    return tok?.kind === 'const' || (tok?.kind === 'scope' && this.peek(1)?.kind === 'const');
  }

  private atStatementStart(): boolean {
    const prev = this.tokens[this.pos - 1];
    return !prev || STATEMENT_STARTERS.has(prev.kind);
  }

  private isCallSite(): boolean {
    const tok = this.peek();
    if (!tok || tok.kind !== 'ident' || !this.argumentCalls.has(tok.text)) return false;
    const prev = this.tokens[this.pos - 1];
    if (prev?.kind === 'keyword' && prev.text === 'def') return false;
    return this.peek(1)?.kind !== 'assign';
  }

  // ---------------------------------------------------------------------------
  // Statements

  private statementToken(): void {
    const tok = this.tokens[this.pos];
    if (tok.kind === 'keyword') {
      this.keyword(tok);
      return;
    }
    if (this.atConstPath()) {
      this.constExpression(this.context());
      return;
    }
    if (this.isCallSite()) {
      this.call(null, this.context());
      return;
    }
    this.pos++;
  }

  private keyword(tok: Token): void {
    switch (tok.text) {
      case 'module':
      case 'class':
        this.declaration(tok);
        return;
      case 'def':
        this.frames.push({ node: this.context() });
        this.pos++;
        return;
      case 'do':
        this.doBlock(tok);
        return;
      case 'end':
        this.frames.pop();
        this.pos++;
        return;
    }
    if (ALWAYS_OPENS.has(tok.text) || (MODIFIER_CAPABLE.has(tok.text) && this.atStatementStart())) {
      this.frames.push({
        node: this.context(),
        loopLine: LOOP_KEYWORDS.has(tok.text) ? tok.line : undefined,
      });
    }
    this.pos++;
  }

  private declaration(tok: Token): void {
    const kind = tok.text === 'module' ? 'module' : 'class';
    this.pos++;

    const next = this.peek();
    if (kind === 'class' && next?.kind === 'other' && next.text === '<<') {
      this.frames.push({ node: this.context() });
      return;
    }

    const declaration = this.create(kind, rangeOf(tok), kind, this.context());
    if (this.atConstPath()) {
      this.attach(this.constPath(), declaration.id);
    }
    if (kind === 'class' && this.peek()?.kind === 'lt') {
      this.pos++;
      if (this.atConstPath()) this.constExpression(declaration.id);
    }
    this.frames.push({ node: declaration.id });
  }

  private doBlock(tok: Token): void {
    const top = this.frames[this.frames.length - 1];
    if (top?.loopLine === tok.line) {
      top.loopLine = undefined;
      this.pos++;
      return;
    }

    const last = this.lastCall;
    const send = last !== null && last.end === this.pos ? last.node : null;
    const parent = send !== null ? (this.nodes[send].parent ?? this.context()) : this.context();
    const start = send !== null ? this.nodes[send].range : rangeOf(tok);
    const block = this.create('block', { ...start, end: tok.end }, 'do', parent);
    if (send !== null) this.reparent(send, block.id);

    this.frames.push({ node: block.id });
    this.pos++;
  }

  // ---------------------------------------------------------------------------
  // Expressions

  /** Builds `A`, `A::B`, `A::B::C` nodes, each the parent of the previous, and returns the outermost. */
  private constPath(): number {
    const first = this.tokens[this.pos];
    let scope: number | null = null;
    if (first.kind === 'scope') {
      scope = this.create('cbase', rangeOf(first), '', null).id;
      this.pos++;
    }

    const segmentRange = (segment: Token): SourceRange => ({
      start: first.start,
      end: segment.end,
      line: first.line,
      column: first.column,
    });

    const head = this.tokens[this.pos];
    let current = this.create('const', segmentRange(head), head.text, null).id;
    if (scope !== null) this.attach(scope, current);
    this.pos++;

    while (this.peek()?.kind === 'scope' && this.peek(1)?.kind === 'const') {
      const segment = this.tokens[this.pos + 1];
      const outer = this.create('const', segmentRange(segment), segment.text, null).id;
      this.attach(current, outer);
      current = outer;
      this.pos += 2;
    }
    return current;
  }

  private constExpression(parent: number): number {
    const top = this.constPath();
    const separator = this.peek();
    const method = this.peek(1);
    const isCall =
      (separator?.kind === 'dot' && (method?.kind === 'ident' || method?.kind === 'keyword')) ||
      (separator?.kind === 'scope' && method?.kind === 'ident');

    if (isCall) {
      this.pos++;
      return this.call(top, parent);
    }
    this.attach(top, parent);
    return top;
  }

  private call(receiver: number | null, parent: number): number {
    const nameTok = this.tokens[this.pos];
    this.pos++;

    const start = receiver !== null ? this.nodes[receiver].range : rangeOf(nameTok);
    const send = this.create(
      'send',
      { start: start.start, end: nameTok.end, line: start.line, column: start.column },
      nameTok.text,
      parent,
    );
    if (receiver !== null) {
      send.receiver = receiver;
      this.attach(receiver, send.id);
    }
    if (this.argumentCalls.has(nameTok.text) && this.peek()?.kind !== 'assign') {
      this.callArguments(send.id);
    }
    this.lastCall = { node: send.id, end: this.pos };
    return send.id;
  }

  private callArguments(send: number): void {
    const open = this.peek();
    const nameTok = this.tokens[this.pos - 1];
    const parenthesized = open?.kind === 'lparen' && open.start === nameTok.end;
    if (parenthesized) this.pos++;

    let hash: number | null = null;
    while (this.pos < this.tokens.length) {
      if (parenthesized) this.skipNewlines();
      const tok = this.peek();
      if (!tok) break;
      if (parenthesized && tok.kind === 'rparen') {
        this.pos++;
        break;
      }
      if (!parenthesized && this.endsBareArguments(tok)) break;

      if (this.atPairKey()) {
        hash ??= this.create('hash', rangeOf(tok), '', send).id;
        this.hashPair(hash);
      } else if (tok.kind === 'lbrace') {
        this.hashLiteral(send);
      } else if (this.value(send) === null) {
        this.skipToSeparator(parenthesized ? 'rparen' : null, true);
      }
      this.skipToSeparator(parenthesized ? 'rparen' : null, false);

      const separator = this.peek();
      if (separator?.kind === 'comma') {
        this.pos++;
        this.skipNewlines();
        continue;
      }
      if (parenthesized && separator?.kind === 'rparen') {
        this.pos++;
      }
      break;
    }
  }

  private endsBareArguments(tok: Token): boolean {
    if (tok.kind === 'newline' || CLOSERS.has(tok.kind)) return true;
    return tok.kind === 'keyword' && BARE_ARGUMENT_ENDERS.has(tok.text);
  }

  private atPairKey(): boolean {
    const tok = this.peek();
    if (tok?.kind === 'label') return true;
    return (tok?.kind === 'symbol' || tok?.kind === 'string') && this.peek(1)?.kind === 'arrow';
  }

  private hashPair(hash: number): void {
    const key = this.tokens[this.pos];
    const pair = this.create('pair', rangeOf(key), '', hash);
    this.create(key.kind === 'string' ? 'str' : 'sym', rangeOf(key), key.value, pair.id);
    this.pos += key.kind === 'label' ? 1 : 2;
    this.skipNewlines();
    this.value(pair.id);
  }

  /** Parses one literal-ish value; returns null, consuming nothing, when the value is an arbitrary expression. */
  private value(parent: number): number | null {
    const tok = this.peek();
    if (!tok) return null;
    const chained = this.peek(1)?.kind === 'dot';

    switch (tok.kind) {
      case 'symbol':
        if (chained) return null;
        this.pos++;
        return this.create('sym', rangeOf(tok), tok.value, parent).id;
      case 'string':
      case 'dstring':
        this.pos++;
        return this.create(tok.kind === 'string' && !chained ? 'str' : 'dstr', rangeOf(tok), tok.value, parent).id;
      case 'lbracket':
        return this.arrayLiteral(parent);
      case 'lbrace':
        return this.hashLiteral(parent);
    }
    if (this.atConstPath()) return this.constExpression(parent);
    return null;
  }

  private arrayLiteral(parent: number): number {
    const open = this.tokens[this.pos];
    this.pos++;
    const array = this.create('array', rangeOf(open), '', parent);
    this.collectUntil('rbracket', () => {
      if (this.value(array.id) === null) this.skipToSeparator('rbracket', true);
    });
    return array.id;
  }

  private hashLiteral(parent: number): number {
    const open = this.tokens[this.pos];
    this.pos++;
    const hash = this.create('hash', rangeOf(open), '', parent);
    this.collectUntil('rbrace', () => {
      if (this.atPairKey()) this.hashPair(hash.id);
      else this.skipToSeparator('rbrace', true);
    });
    return hash.id;
  }

  private collectUntil(closer: TokenKind, element: () => void): void {
    while (this.pos < this.tokens.length) {
      this.skipNewlines();
      const tok = this.peek();
      if (!tok) return;
      if (tok.kind === closer) {
        this.pos++;
        return;
      }
      if (tok.kind === 'comma') {
        this.pos++;
        continue;
      }
      element();
    }
  }

  /**
   * Consumes the rest of an argument up to the next top-level comma or closer.
   * Constant paths and recognised calls met on the way still become nodes.
   */
  private skipToSeparator(closer: TokenKind | null, mustAdvance: boolean): void {
    const start = this.pos;
    let depth = 0;

    while (this.pos < this.tokens.length) {
      const tok = this.tokens[this.pos];
      if (depth === 0) {
        if (tok.kind === 'comma' || (closer !== null && tok.kind === closer)) break;
        if (closer === null && this.endsBareArguments(tok)) break;
        if (CLOSERS.has(tok.kind)) break;
      }
      if (this.atConstPath()) {
        this.constExpression(this.context());
        continue;
      }
      if (this.isCallSite()) {
        this.call(null, this.context());
        continue;
      }
      if (OPENERS.has(tok.kind)) depth++;
      if (CLOSERS.has(tok.kind)) depth--;
      this.pos++;
    }

    if (mustAdvance && this.pos === start) this.pos++;
  }
}
