import { describe, it, expect } from 'vitest';
import { buildReferenceTree, type ReferenceTree } from './tree.js';
import type { NodeKind, TreeNode } from '../types.js';

function find(tree: ReferenceTree, kind: NodeKind, name: string): TreeNode {
  const node = tree.ofKind(kind).find(candidate => candidate.name === name);
  if (!node) throw new Error(`no ${kind} node named ${name}`);
  return node;
}

describe('buildReferenceTree', () => {
  it('nests each constant segment inside the next', () => {
    const tree = buildReferenceTree('Billing::Invoices::Paid');
    const [billing, invoices, paid] = tree.ofKind('const');

    expect([billing.name, invoices.name, paid.name]).toEqual(['Billing', 'Invoices', 'Paid']);
    expect(tree.parentOf(billing)).toBe(invoices);
    expect(tree.parentOf(invoices)).toBe(paid);
    expect(tree.parentOf(paid)).toBe(tree.root);
    expect(tree.constName(paid)).toBe('Billing::Invoices::Paid');
    expect(tree.sourceOf(invoices)).toBe('Billing::Invoices');
  });

  it('keeps a leading scope out of the qualified name', () => {
    const tree = buildReferenceTree('::Billing::Invoice');
    const invoice = find(tree, 'const', 'Invoice');

    expect(tree.ofKind('cbase')).toHaveLength(1);
    expect(tree.constName(invoice)).toBe('Billing::Invoice');
    expect(tree.sourceOf(invoice)).toBe('::Billing::Invoice');
  });

  it('puts the declared name first and the superclass second', () => {
    const tree = buildReferenceTree('module Billing\n  class Invoice < ApplicationRecord\n  end\nend\n');
    const declaration = tree.ofKind('class')[0];

    expect(tree.childrenOf(declaration).map(node => node.name)).toEqual(['Invoice', 'ApplicationRecord']);
    expect(tree.parentOf(declaration)?.kind).toBe('module');
  });

  it('records the receiver of a call', () => {
    const tree = buildReferenceTree('Billing::Invoice.where(paid: true)');
    const send = find(tree, 'send', 'where');
    const invoice = find(tree, 'const', 'Invoice');

    expect(send.receiver).toBe(invoice.id);
    expect(tree.parentOf(invoice)).toBe(send);
    expect(tree.argumentsOf(send)).toEqual([]);
  });

  it('parses association arguments into a symbol and a hash', () => {
    const tree = buildReferenceTree(
      'class Customer\n  has_many :invoices, class_name: "Billing::Invoice", dependent: :destroy\nend\n',
    );
    const send = find(tree, 'send', 'has_many');
    const [association, options] = tree.argumentsOf(send);

    expect(tree.parentOf(send)?.kind).toBe('class');
    expect(association).toMatchObject({ kind: 'sym', name: 'invoices' });
    expect(options.kind).toBe('hash');
    expect(tree.pairsOf(options).map(pair => pair.key.name)).toEqual(['class_name', 'dependent']);

    const className = tree.symbolKeyValue(options, 'class_name');
    expect(className).toMatchObject({ kind: 'str', name: 'Billing::Invoice' });
    expect(className?.range.line).toBe(2);
    expect(className?.range.column).toBe(35);
  });

  it('parses parenthesized arguments across lines', () => {
    const tree = buildReferenceTree('belongs_to(:invoice,\n  class_name: "Billing::Invoice")\n');
    const send = find(tree, 'send', 'belongs_to');

    expect(tree.argumentsOf(send).map(node => node.kind)).toEqual(['sym', 'hash']);
  });

  it('marks interpolated and chained strings as non-literal', () => {
    const interpolated = buildReferenceTree('has_one :invoice, class_name: "#{namespace}::Invoice"');
    const chained = buildReferenceTree('has_one :invoice, class_name: "Billing::Invoice".freeze');

    for (const tree of [interpolated, chained]) {
      const [, options] = tree.argumentsOf(find(tree, 'send', 'has_one'));
      expect(tree.symbolKeyValue(options, 'class_name')?.kind).toBe('dstr');
    }
  });

  it('wraps the call a do block belongs to', () => {
    const tree = buildReferenceTree('FactoryBot.define do\n  factory :user\nend\n');
    const [block] = tree.ofKind('block');

    expect(tree.childrenOf(block).map(node => node.name)).toEqual(['define', 'factory']);
  });

  it('does not open a block for a loop do', () => {
    const tree = buildReferenceTree('while running do\n  Billing::Invoice\nend\nShipping\n');

    expect(tree.ofKind('block')).toHaveLength(0);
    expect(tree.parentOf(find(tree, 'const', 'Shipping'))).toBe(tree.root);
  });

  it('does not open a frame for a modifier if', () => {
    const tree = buildReferenceTree('class Foo\n  Billing::Invoice if ready\nend\nShipping\n');

    expect(tree.parentOf(find(tree, 'const', 'Invoice'))?.kind).toBe('class');
    expect(tree.parentOf(find(tree, 'const', 'Shipping'))).toBe(tree.root);
  });
});
