import { describe, it, expect } from 'vitest';
import { utimesSync } from 'fs';
import { join } from 'path';
import { API_FILES, ApiMetadataReader, extractDeclaredList } from './api-metadata.js';
import { PolicyStore } from './policy.js';
import {
  allowlistSource,
  apiDir,
  createProject,
  legacyDependentsSource,
  policyConfig,
  writeProjectFiles,
} from './test-project.js';

describe('extractDeclaredList', () => {
  it('reads constant entries as written', () => {
    const source = allowlistSource('Billing', ['Billing::InvoiceService', '::Billing::Rates']);
    expect(extractDeclaredList(source, API_FILES.allowlist)).toEqual(['Billing::InvoiceService', 'Billing::Rates']);
  });

  it('accepts the whitelist module name', () => {
    const source = allowlistSource('Billing', ['Billing::InvoiceService'], 'Whitelist');
    expect(extractDeclaredList(source, API_FILES.allowlist)).toEqual(['Billing::InvoiceService']);
  });

  it('reads string entries as their value', () => {
    const source = legacyDependentsSource('Billing', ['app/models/legacy.rb', 'engines/shipping/app/services']);
    expect(extractDeclaredList(source, API_FILES.legacyDependents)).toEqual([
      'app/models/legacy.rb',
      'engines/shipping/app/services',
    ]);
  });

  it('reads a list on one line', () => {
    const source = 'module Billing::Api::Allowlist\n  PUBLIC_MODULES = [Billing::A, Billing::B]\nend\n';
    expect(extractDeclaredList(source, API_FILES.allowlist)).toEqual(['Billing::A', 'Billing::B']);
  });

  it('returns nothing for other shapes', () => {
    const shapes = [
      'module Billing::Allowlist\n  PUBLIC_MODULES = [Billing::A]\nend\n',
      'module Billing::Api::Allowlist\n  MODULES = [Billing::A]\nend\n',
      'module Billing::Api::Allowlist\n  PUBLIC_MODULES = [Billing::A].freeze\nend\n',
      'module Billing::Api::Allowlist\n  PUBLIC_MODULES = [Billing::A]\n',
      'module Billing\n  module Api\n    module Allowlist\n      PUBLIC_MODULES = [Billing::A]\n    end\n  end\nend\n',
      '',
    ];
    for (const source of shapes) {
      expect(extractDeclaredList(source, API_FILES.allowlist)).toEqual([]);
    }
  });

  it('does not take a legacy-dependents file for an allow-list', () => {
    const source = legacyDependentsSource('Billing', ['app/models/legacy.rb']);
    expect(extractDeclaredList(source, API_FILES.allowlist)).toEqual([]);
  });
});

describe('ApiMetadataReader', () => {
  it('reads the allow-list and legacy dependents of an engine', () => {
    const root = createProject({
      [`${apiDir('billing')}/_allowlist.rb`]: allowlistSource('Billing', ['Billing::InvoiceService']),
      [`${apiDir('billing')}/_legacy_dependents.rb`]: legacyDependentsSource('Billing', ['app/models/legacy.rb']),
    });
    const reader = new ApiMetadataReader(new PolicyStore(policyConfig(root)));

    expect(reader.allowlist('Billing')).toEqual(['Billing::InvoiceService']);
    expect(reader.legacyDependents('Billing')).toEqual(['app/models/legacy.rb']);
  });

  it('falls back to the whitelist when the allow-list is empty or absent', () => {
    const root = createProject({
      [`${apiDir('billing')}/_whitelist.rb`]: allowlistSource('Billing', ['Billing::Rates'], 'Whitelist'),
      [`${apiDir('shipping')}/_allowlist.rb`]: allowlistSource('Shipping', []),
      [`${apiDir('shipping')}/_whitelist.rb`]: allowlistSource('Shipping', ['Shipping::Quote'], 'Whitelist'),
    });
    const reader = new ApiMetadataReader(new PolicyStore(policyConfig(root)));

    expect(reader.allowlist('Billing')).toEqual(['Billing::Rates']);
    expect(reader.allowlist('Shipping')).toEqual(['Shipping::Quote']);
  });

  it('returns empty lists for engines without an API directory', () => {
    const root = createProject({ 'engines/billing/lib/billing.rb': '' });
    const reader = new ApiMetadataReader(new PolicyStore(policyConfig(root)));

    expect(reader.allowlist('Billing')).toEqual([]);
    expect(reader.legacyDependents('Billing')).toEqual([]);
    expect(reader.engineChecksum('Billing')).toBe(0);
  });

  it('sums whole-second modification times of the API files', () => {
    const root = createProject({
      [`${apiDir('billing')}/_allowlist.rb`]: allowlistSource('Billing', []),
      [`${apiDir('billing')}/nested/charge_service.rb`]: '',
      [`${apiDir('shipping')}/quote_service.rb`]: '',
    });
    utimesSync(join(root, apiDir('billing'), '_allowlist.rb'), 1000, 1000);
    utimesSync(join(root, apiDir('billing'), 'nested', 'charge_service.rb'), 2000, 2000.9);
    utimesSync(join(root, apiDir('shipping'), 'quote_service.rb'), 500, 500);
    const reader = new ApiMetadataReader(new PolicyStore(policyConfig(root)));

    expect(reader.engineChecksum('Billing')).toBe(3000);
    expect(reader.checksum()).toBe('3500');
  });

  it('re-reads an engine when its checksum changes', () => {
    const root = createProject({
      [`${apiDir('billing')}/_allowlist.rb`]: allowlistSource('Billing', ['Billing::A']),
    });
    const path = join(root, apiDir('billing'), '_allowlist.rb');
    utimesSync(path, 1000, 1000);
    const reader = new ApiMetadataReader(new PolicyStore(policyConfig(root)));
    expect(reader.allowlist('Billing')).toEqual(['Billing::A']);

    writeProjectFiles(root, { [`${apiDir('billing')}/_allowlist.rb`]: allowlistSource('Billing', ['Billing::B']) });
    utimesSync(path, 1000, 1000);
    expect(reader.allowlist('Billing')).toEqual(['Billing::A']);

    utimesSync(path, 2000, 2000);
    expect(reader.allowlist('Billing')).toEqual(['Billing::B']);
  });
});
