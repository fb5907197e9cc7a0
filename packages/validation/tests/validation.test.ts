import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '@tasklane/errors';
import {
  nonEmptyStringSchema,
  resourceIdSchema,
  queryBooleanSchema,
  pageNumberSchema,
  validate,
  safeValidate,
  formatZodErrors,
  formatZodErrorsFlat,
  omitUndefined,
} from '../src/index.js';

const folderSchema = z.object({
  name: nonEmptyStringSchema,
  hidden: z.boolean().optional(),
});

describe('field schemas', () => {
  it('rejects empty and blank names', () => {
    expect(nonEmptyStringSchema.safeParse('').success).toBe(false);
    expect(nonEmptyStringSchema.safeParse('   ').success).toBe(false);
    expect(nonEmptyStringSchema.parse(' Roadmap ')).toBe(' Roadmap ');
  });

  it('accepts numeric and alphanumeric identifiers', () => {
    expect(resourceIdSchema.parse('90120045')).toBe('90120045');
    expect(resourceIdSchema.parse('86a1b2c3')).toBe('86a1b2c3');
    expect(resourceIdSchema.safeParse('../team').success).toBe(false);
  });

  it('parses boolean query strings strictly', () => {
    expect(queryBooleanSchema.parse('true')).toBe(true);
    expect(queryBooleanSchema.parse('false')).toBe(false);
    expect(queryBooleanSchema.safeParse('yes').success).toBe(false);
  });

  it('coerces zero-based page numbers', () => {
    expect(pageNumberSchema.parse('0')).toBe(0);
    expect(pageNumberSchema.parse('2')).toBe(2);
    expect(pageNumberSchema.parse('010')).toBe(10);
  });

  it('rejects page numbers that are not plain digits', () => {
    for (const value of ['', ' ', '-1', '1.5', '0x10', '1e2', 'two']) {
      expect(pageNumberSchema.safeParse(value).success).toBe(false);
    }
  });
});

describe('validate', () => {
  it('returns parsed data', () => {
    expect(validate(folderSchema, { name: 'Q3', hidden: false })).toEqual({ name: 'Q3', hidden: false });
  });

  it('throws ValidationError with field errors', () => {
    let thrown: unknown;
    try {
      validate(folderSchema, { hidden: 'no' }, 'Invalid folder request');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    const error = thrown instanceof ValidationError ? thrown : undefined;
    expect(error?.message).toBe('Invalid folder request');
    expect(error?.fieldErrors).toEqual({
      name: ['Required'],
      hidden: ['Expected boolean, received string'],
    });
  });
});

describe('safeValidate', () => {
  it('reports success and failure without throwing', () => {
    const ok = safeValidate(folderSchema, { name: 'Q3' });
    const bad = safeValidate(folderSchema, { name: '' });

    expect(ok).toEqual({ success: true, data: { name: 'Q3' } });
    expect(bad.success).toBe(false);
  });
});

describe('formatZodErrors', () => {
  it('groups messages by path and uses _root for top-level issues', () => {
    const result = z.array(folderSchema).min(2).safeParse([{ name: '' }]);
    if (result.success) throw new Error('expected failure');

    expect(formatZodErrors(result.error)).toEqual({
      '0.name': ['This field is required'],
      _root: ['Array must contain at least 2 element(s)'],
    });
    expect(formatZodErrorsFlat(result.error)).toEqual([
      'Array must contain at least 2 element(s)',
      '0.name: This field is required',
    ]);
  });
});

describe('omitUndefined', () => {
  it('drops undefined keys and keeps nulls', () => {
    expect(omitUndefined({ name: 'X', priority: null, hidden: undefined })).toEqual({
      name: 'X',
      priority: null,
    });
    expect(Object.keys(omitUndefined({ name: 'X', hidden: undefined }))).toEqual(['name']);
  });
});
