// Unit tests for submission validation

import { describe, test, expect } from '@jest/globals';
import { InvalidSubmissionError } from '../../../src/core/errors.js';
import { validateSubmission } from '../../../src/core/validation.js';

const valid = {
  file_size: 2048,
  file_name: 'budget.xlsx',
  user_tier: 'basic',
};

function issuesOf(request: unknown): string[] {
  try {
    validateSubmission(request);
  } catch (error) {
    if (error instanceof InvalidSubmissionError) return error.issues;
    throw error;
  }
  return [];
}

describe('validateSubmission', () => {
  test('should default requested priority to normal', () => {
    expect(validateSubmission(valid)).toEqual({ ...valid, requested_priority: 'normal' });
  });

  test('should accept a fully specified submission', () => {
    const request = {
      ...valid,
      requested_priority: 'urgent',
      similar_file_history: [{ file_size: 2000, historical_ai_tier: 2 }],
      file_id: 'file-9',
      user_id: 'user-9',
      payload: { sheet: 'Summary' },
    };

    expect(validateSubmission(request)).toEqual(request);
  });

  test('should accept an empty file', () => {
    expect(validateSubmission({ ...valid, file_size: 0 }).file_size).toBe(0);
  });

  test.each([
    ['negative size', { ...valid, file_size: -1 }, 'file_size'],
    ['NaN size', { ...valid, file_size: Number.NaN }, 'file_size'],
    ['fractional size', { ...valid, file_size: 1.5 }, 'file_size'],
    ['empty file name', { ...valid, file_name: '' }, 'file_name'],
    ['unknown user tier', { ...valid, user_tier: 'gold' }, 'user_tier'],
    ['unknown priority', { ...valid, requested_priority: 'asap' }, 'requested_priority'],
    ['bad history entry', { ...valid, similar_file_history: [{ file_size: -5, historical_ai_tier: 1 }] }, 'similar_file_history.0.file_size'],
  ])('should reject %s', (_label, request, path) => {
    const issues = issuesOf(request);

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith(`${path}: `)).toBe(true);
  });

  test('should reject an infinite size', () => {
    const issues = issuesOf({ ...valid, file_size: Number.POSITIVE_INFINITY });

    expect(issues.length).toBeGreaterThanOrEqual(1);
    expect(issues.every(issue => issue.startsWith('file_size: '))).toBe(true);
  });

  test('should accept a bare file extension in place of a file name', () => {
    const request = { file_size: 10, file_extension: '.xlsx', user_tier: 'free' };

    expect(validateSubmission(request)).toEqual({ ...request, requested_priority: 'normal' });
  });

  test('should require a file name or a file extension', () => {
    expect(issuesOf({ file_size: 10, user_tier: 'free' })).toEqual([
      'file_name: file_name or file_extension is required',
    ]);
  });

  test('should reject a non-object request', () => {
    expect(() => validateSubmission(null)).toThrow(InvalidSubmissionError);
    expect(issuesOf(null)[0].startsWith('request: ')).toBe(true);
  });

  test('should list every problem in the error message', () => {
    expect(() => validateSubmission({ file_size: -1, file_name: '', user_tier: 'free' })).toThrow(
      /^Invalid analysis submission: file_size: .+; file_name: .+$/
    );
  });
});
