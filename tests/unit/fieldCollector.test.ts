import { describe, it, expect } from 'vitest';
import { FieldCollector, parseAmount } from '../../src/catalog/fieldCollector';
import { listTemplates } from '../../src/catalog/templateCatalog';
import type { TemplateCatalog } from '../../src/types';

const CATALOG: TemplateCatalog = {
  templates: {
    physical_single: {
      name: 'Single product',
      description: 'One product',
      required_fields: { product_name: 'string', old_price: 'number', new_price: 'number', phone: 'phone' }
    },
    b2b: { name: 'B2B offer' }
  },
  field_prompts: { product_name: 'What is the product called?' }
};

const collector = new FieldCollector(CATALOG);

describe('FieldCollector', () => {
  it('lists required fields in catalog order', () => {
    expect(collector.requiredFields('physical_single')).toEqual([
      ['product_name', 'string'],
      ['old_price', 'number'],
      ['new_price', 'number'],
      ['phone', 'phone']
    ]);
    expect(collector.requiredFields('b2b')).toEqual([]);
    expect(collector.requiredFields('unknown')).toEqual([]);
  });

  it('finds the next missing field', () => {
    expect(collector.nextField('physical_single', {})).toBe('product_name');
    expect(collector.nextField('physical_single', { product_name: 'Memory foam pillow' })).toBe('old_price');
    expect(
      collector.nextField('physical_single', {
        product_name: 'Memory foam pillow',
        old_price: '100 BYN',
        new_price: '70 BYN',
        phone: '+375 29 000-00-00'
      })
    ).toBeUndefined();
  });

  it('returns catalog prompts with a generic fallback', () => {
    expect(collector.fieldPrompt('product_name')).toBe('What is the product called?');
    expect(collector.fieldPrompt('colour')).toBe('Enter a value for colour');
  });

  describe('validateField', () => {
    it('rejects empty values', () => {
      expect(collector.validateField('physical_single', 'product_name', '   ')).toEqual({
        valid: false,
        message: 'Field product_name must not be empty'
      });
      expect(collector.validateField('physical_single', 'product_name', [])).toMatchObject({ valid: false });
    });

    it('requires numbers for number fields', () => {
      expect(collector.validateField('physical_single', 'old_price', 'cheap')).toEqual({
        valid: false,
        message: 'Field old_price must be a number'
      });
      expect(collector.validateField('physical_single', 'old_price', '100 BYN')).toEqual({ valid: true, message: '' });
    });

    it('checks phone fields', () => {
      expect(collector.validateField('physical_single', 'phone', '+375 29 123-45-67').valid).toBe(true);
      expect(collector.validateField('physical_single', 'phone', 'call me').valid).toBe(false);
    });

    it('treats fields outside the template as strings', () => {
      expect(collector.validateField('physical_single', 'slogan', 'Sleep better')).toEqual({ valid: true, message: '' });
    });
  });

  describe('formatCollectedData', () => {
    it('derives the discount from old and new price', () => {
      expect(collector.formatCollectedData({ old_price: '100 BYN', new_price: '70 BYN' })).toEqual({
        old_price: '100 BYN',
        new_price: '70 BYN',
        discount_percent: 30
      });
    });

    it('trims prices and splits list fields', () => {
      const formatted = collector.formatCollectedData({
        price: ' 120 BYN ',
        features: 'Memory foam\n\n  Washable cover ',
        benefits: ['Already split']
      });
      expect(formatted).toEqual({
        price: '120 BYN',
        features: ['Memory foam', 'Washable cover'],
        benefits: ['Already split']
      });
    });

    it('skips the discount when a price does not parse', () => {
      expect(collector.formatCollectedData({ old_price: 'n/a', new_price: '70' })).toEqual({
        old_price: 'n/a',
        new_price: '70'
      });
    });

    it('does not mutate its input', () => {
      const collected = { features: 'a\nb' };
      collector.formatCollectedData(collected);
      expect(collected).toEqual({ features: 'a\nb' });
    });
  });
});

describe('parseAmount', () => {
  it.each<[string | number, number | undefined]>([
    ['152 BYN', 152],
    ['99,50', 99.5],
    ['usd 20', 20],
    [42, 42],
    ['', undefined],
    ['free', undefined]
  ])('reads %j as %j', (input, expected) => {
    expect(parseAmount(input)).toBe(expected);
  });
});

describe('listTemplates', () => {
  it('summarises every template', () => {
    expect(listTemplates(CATALOG)).toEqual([
      { id: 'physical_single', name: 'Single product', description: 'One product', useCase: '' },
      { id: 'b2b', name: 'B2B offer', description: '', useCase: '' }
    ]);
  });
});
