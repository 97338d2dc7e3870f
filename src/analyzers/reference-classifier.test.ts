import { describe, it, expect } from 'vitest';
import { buildReferenceTree } from '../parser/tree.js';
import { PolicyStore } from '../policy.js';
import { createProject, policyConfig } from '../test-project.js';
import type { EngineName } from '../types.js';
import { ReferenceClassifier } from './reference-classifier.js';

const root = createProject({
  'engines/billing/lib/billing.rb': '',
  'engines/shipping/lib/shipping.rb': '',
  'engines/legacy/lib/legacy.rb': '',
});
const policy = new PolicyStore(
  policyConfig(root, {
    unprotectedEngines: new Set(['Legacy']),
    stronglyProtectedEngines: new Set(['Shipping']),
  }),
);
const classifier = new ReferenceClassifier(policy);

/** Classification of every const node, keyed by its qualified name. */
function classifyAll(source: string, currentEngine: EngineName | null = null): Record<string, string | null> {
  const tree = buildReferenceTree(source);
  const result: Record<string, string | null> = {};
  for (const node of tree.ofKind('const')) {
    result[tree.constName(node)] = classifier.classify(tree, node, { path: 'app/x.rb', currentEngine });
  }
  return result;
}

describe('ReferenceClassifier', () => {
  it('classifies the engine segment of a path', () => {
    expect(classifyAll('Billing::Invoice.first')).toEqual({
      Billing: 'Billing',
      'Billing::Invoice': null,
    });
  });

  it('ignores unprotected engines', () => {
    expect(classifyAll('Legacy::Report.first')).toEqual({ Legacy: null, 'Legacy::Report': null });
  });

  it('ignores names that only contain an engine name', () => {
    expect(classifyAll('Reports::Billing::Summary')).toEqual({
      Reports: null,
      'Reports::Billing': null,
      'Reports::Billing::Summary': null,
    });
  });

  it('ignores the declared name of a module or class', () => {
    expect(classifyAll('module Billing\nend\nclass Billing::Invoice\nend\n')).toEqual({
      Billing: null,
      'Billing::Invoice': null,
    });
  });

  it('checks a superclass', () => {
    expect(classifyAll('class Report < Billing::Base\nend\n')).toMatchObject({ Billing: 'Billing' });
  });

  it('ignores a value object that is sent a message', () => {
    expect(classifyAll('Billing.new(amount)')).toEqual({ Billing: null });
  });

  it('names the main application once for strongly protected engines', () => {
    expect(classifyAll('MainApp::EngineApi::Users.find(1)', 'Shipping')).toEqual({
      MainApp: null,
      'MainApp::EngineApi': 'MainApp::EngineApi',
      'MainApp::EngineApi::Users': null,
    });
  });

  it('leaves the main application alone for other engines', () => {
    expect(classifyAll('MainApp::EngineApi::Users.find(1)', 'Billing')).toEqual({
      MainApp: null,
      'MainApp::EngineApi': null,
      'MainApp::EngineApi::Users': null,
    });
  });
});
