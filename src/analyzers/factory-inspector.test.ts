import { describe, it, expect } from 'vitest';
import { FactoryRegistry } from '../factories.js';
import { buildReferenceTree } from '../parser/tree.js';
import { PolicyStore } from '../policy.js';
import { createProject, policyConfig } from '../test-project.js';
import { FactoryUsageInspector, isSpecFile } from './factory-inspector.js';

const root = createProject({
  'engines/billing/lib/billing.rb': '',
  'engines/legacy/lib/legacy.rb': '',
  'spec/factories/all.rb': [
    'FactoryBot.define do',
    '  factory :invoice, class: "Billing::Invoice"',
    '  factory :report, class: "Legacy::Report"',
    '  factory :user',
    'end',
    '',
  ].join('\n'),
});
const policy = new PolicyStore(policyConfig(root, { unprotectedEngines: new Set(['Legacy']) }));
const inspector = new FactoryUsageInspector(policy, new FactoryRegistry(policy));

function inspect(source: string, path = 'spec/models/customer_spec.rb') {
  const tree = buildReferenceTree(source);
  const send = tree.ofKind('send')[0];
  return send ? inspector.inspect(tree, send, { path, currentEngine: null }) : null;
}

describe('isSpecFile', () => {
  it('matches only _spec.rb files', () => {
    expect(isSpecFile('spec/models/customer_spec.rb')).toBe(true);
    expect(isSpecFile('spec/support/helpers.rb')).toBe(false);
    expect(isSpecFile('app/models/customer_spec.rb.bak')).toBe(false);
  });
});

describe('FactoryUsageInspector', () => {
  it('resolves the factory to its model', () => {
    const found = inspect('invoice = create(:invoice)');

    expect(found?.engine).toBe('Billing');
    expect(found?.reference.candidates).toEqual(['Billing', 'Billing::Invoice']);
    expect(found?.reference.throughApi).toBe(false);
    expect(found?.reference.node).toMatchObject({ kind: 'sym', name: 'invoice' });
  });

  it('accepts extra arguments after the factory name', () => {
    expect(inspect('create_list(:invoice, 3, paid: true)')?.engine).toBe('Billing');
    expect(inspect('build_stubbed :invoice')?.engine).toBe('Billing');
  });

  it('ignores files that are not specs', () => {
    expect(inspect('create(:invoice)', 'spec/support/helpers.rb')).toBeNull();
  });

  it('ignores unknown factories and unprotected models', () => {
    expect(inspect('create(:unknown)')).toBeNull();
    expect(inspect('create(:report)')).toBeNull();
    expect(inspect('create(:user)')).toBeNull();
  });

  it('needs a symbol as the first argument', () => {
    expect(inspect('create("invoice")')).toBeNull();
    expect(inspect('create(factory_name)')).toBeNull();
  });
});
