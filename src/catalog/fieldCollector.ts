import type { TemplateCatalog } from '../types';
import { getTemplate } from './templateCatalog';

/**
 * Collects the product data a chosen template needs. The selection engine
 * knows nothing about this phase; the conversation driver asks the fields in
 * catalog order and hands the formatted result to whatever renders the page.
 */

export type FieldValue = string | number | string[];
export type CollectedData = Record<string, FieldValue>;

export interface FieldValidation {
  valid: boolean;
  message: string;
}

const CURRENCY_RE = /\b(BYN|BYR|RUB|USD|EUR)\b/gi;
const PHONE_RE = /^\+?\d[\d\s()-]{5,}\d$/;

/** Reads "152 BYN" or "99,50" as a number. */
export function parseAmount(value: FieldValue | undefined): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const cleaned = value.replace(CURRENCY_RE, '').trim().replace(',', '.');
  if (cleaned === '') return undefined;
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : undefined;
}

function isEmpty(value: FieldValue | undefined): boolean {
  if (value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function splitLines(value: string): string[] {
  return value
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export class FieldCollector {
  constructor(private readonly catalog: TemplateCatalog) {}

  /** Field id and type pairs, in the order they should be asked. */
  requiredFields(templateId: string): Array<[string, string]> {
    return Object.entries(getTemplate(this.catalog, templateId)?.required_fields ?? {});
  }

  nextField(templateId: string, collected: CollectedData): string | undefined {
    return this.requiredFields(templateId).find(([fieldId]) => !Object.hasOwn(collected, fieldId))?.[0];
  }

  fieldPrompt(fieldId: string): string {
    const prompts = this.catalog.field_prompts ?? {};
    return Object.hasOwn(prompts, fieldId) ? prompts[fieldId] : `Enter a value for ${fieldId}`;
  }

  validateField(templateId: string, fieldId: string, value: FieldValue | undefined): FieldValidation {
    if (isEmpty(value)) {
      return { valid: false, message: `Field ${fieldId} must not be empty` };
    }

    const fieldType = Object.fromEntries(this.requiredFields(templateId))[fieldId] ?? 'string';
    if (fieldType === 'number' && parseAmount(value) === undefined) {
      return { valid: false, message: `Field ${fieldId} must be a number` };
    }
    if (fieldType === 'phone' && !(typeof value === 'string' && PHONE_RE.test(value.trim()))) {
      return { valid: false, message: `Field ${fieldId} must be a phone number` };
    }
    return { valid: true, message: '' };
  }

  /**
   * Normalises collected answers for rendering: trims prices, derives
   * discount_percent from old/new price and splits multi-line lists.
   */
  formatCollectedData(collected: CollectedData): CollectedData {
    const formatted: CollectedData = { ...collected };

    for (const key of ['old_price', 'new_price', 'price']) {
      const value = formatted[key];
      if (typeof value === 'string') formatted[key] = value.trim();
    }

    const oldPrice = parseAmount(formatted.old_price);
    const newPrice = parseAmount(formatted.new_price);
    if (oldPrice !== undefined && newPrice !== undefined && oldPrice > 0) {
      formatted.discount_percent = Math.trunc(((oldPrice - newPrice) / oldPrice) * 100);
    }

    for (const key of ['features', 'benefits']) {
      const value = formatted[key];
      if (typeof value === 'string') formatted[key] = splitLines(value);
    }

    return formatted;
  }
}
