import { describe, it, expect } from 'vitest';
import {
  AliasNameSchema,
  ModelIdSchema,
  RegisterModelInputSchema,
  RegisterVersionInputSchema,
  TagsSchema,
  UpdateModelInputSchema,
} from '../../src/schemas/registry.js';

function messages(result: { success: boolean; error?: { issues: Array<{ message: string }> } }): string[] {
  return result.error?.issues.map((issue) => issue.message) ?? [];
}

describe('RegisterModelInputSchema', () => {
  it('fills optional maps with empty objects', () => {
    const parsed = RegisterModelInputSchema.parse({
      name: 'Resnet 50',
      description: 'classifier',
      createdBy: 'alice',
      versionDescription: 'first',
    });

    expect(parsed).toEqual({
      name: 'Resnet 50',
      description: 'classifier',
      createdBy: 'alice',
      tags: {},
      versionDescription: 'first',
      versionMetrics: {},
      versionParameters: {},
      versionTags: {},
    });
  });

  it('names every missing field', () => {
    const result = RegisterModelInputSchema.safeParse({});

    expect(messages(result)).toEqual([
      'name is required',
      'description is required',
      'createdBy is required',
      'versionDescription is required',
    ]);
  });

  it('rejects blank text', () => {
    const result = RegisterModelInputSchema.safeParse({
      name: '   ',
      description: 'classifier',
      createdBy: 'alice',
      versionDescription: 'first',
    });

    expect(messages(result)).toEqual(['name must not be blank']);
  });

  it('requires numeric metrics', () => {
    const result = RegisterModelInputSchema.safeParse({
      name: 'm',
      description: 'd',
      createdBy: 'c',
      versionDescription: 'v',
      versionMetrics: { accuracy: 'high' },
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['versionMetrics', 'accuracy']);
  });

  it('accepts a null alias', () => {
    const result = RegisterModelInputSchema.safeParse({
      name: 'm',
      description: 'd',
      createdBy: 'c',
      versionDescription: 'v',
      versionAlias: null,
    });

    expect(result.success).toBe(true);
  });
});

describe('RegisterVersionInputSchema', () => {
  it('accepts nested JSON parameters', () => {
    const parsed = RegisterVersionInputSchema.parse({
      description: 'retrained',
      createdBy: 'bob',
      parameters: { layers: [64, 32], optimizer: { name: 'adam', lr: 0.001 } },
    });

    expect(parsed.parameters).toEqual({ layers: [64, 32], optimizer: { name: 'adam', lr: 0.001 } });
    expect(parsed.alias).toBeUndefined();
  });
});

describe('UpdateModelInputSchema', () => {
  it('accepts an empty patch', () => {
    expect(UpdateModelInputSchema.parse({})).toEqual({});
  });

  it('rejects an empty name', () => {
    expect(messages(UpdateModelInputSchema.safeParse({ name: '' }))).toEqual([
      'name must not be empty',
      'name must not be blank',
    ]);
  });
});

describe('identifier schemas', () => {
  it('coerce path parameters to positive integers', () => {
    expect(ModelIdSchema.parse('12')).toBe(12);
    expect(ModelIdSchema.safeParse('0').success).toBe(false);
    expect(ModelIdSchema.safeParse('1.5').success).toBe(false);
  });

  it('require alias names', () => {
    expect(AliasNameSchema.safeParse('prod').success).toBe(true);
    expect(AliasNameSchema.safeParse('').success).toBe(false);
  });

  it('TagsSchema rejects arrays', () => {
    expect(TagsSchema.safeParse(['a']).success).toBe(false);
  });
});
