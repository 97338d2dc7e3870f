import { describe, it, expect } from 'vitest';
import { camelize, removeLeadingColons, underscore } from './inflector.js';

describe('camelize', () => {
  it('camelizes snake case', () => expect(camelize('shipping_rates')).toBe('ShippingRates'));
  it('turns slashes into namespaces', () => expect(camelize('admin/tools')).toBe('Admin::Tools'));
  it('leaves camelized names alone', () => expect(camelize('Billing')).toBe('Billing'));
  it('keeps digits with their word', () => expect(camelize('api_v2')).toBe('ApiV2'));
});

describe('underscore', () => {
  it('underscores camel case', () => expect(underscore('ShippingRates')).toBe('shipping_rates'));
  it('turns namespaces into slashes', () => expect(underscore('Admin::Tools')).toBe('admin/tools'));
  it('splits acronyms', () => expect(underscore('HTMLParser')).toBe('html_parser'));
});

describe('removeLeadingColons', () => {
  it('strips the top-level prefix', () => expect(removeLeadingColons('::Billing::Invoice')).toBe('Billing::Invoice'));
  it('leaves relative names alone', () => expect(removeLeadingColons('Billing')).toBe('Billing'));
});
