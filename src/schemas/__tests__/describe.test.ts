import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { describeNodeSchema, describeZodType } from '../describe.js';
import { nodeSchemaRegistry } from '../nodes.js';

describe('describeNodeSchema', () => {
  it('describes the fields of an available type', () => {
    expect(describeNodeSchema('answer', nodeSchemaRegistry)).toEqual({
      type: 'answer',
      schema_available: true,
      fields: {
        type: { required: true, type: '"answer"', description: 'Node type identifier' },
        title: { required: true, type: 'string', description: 'Title shown on the canvas' },
        desc: { required: false, type: 'string', description: 'Free-form description' },
        answer: { required: true, type: 'string', description: 'Reply text; may embed {{#node.field#}} references' },
      },
      example_structure: {
        id: 'node_id',
        position: { x: 100, y: 100 },
        data: { type: 'answer', title: 'Node Title' },
      },
    });
  });

  it('includes defaults', () => {
    const info = describeNodeSchema('end', nodeSchemaRegistry);
    if (!('fields' in info)) throw new Error('expected an available schema');

    expect(info.fields.outputs).toEqual({
      required: false,
      type: 'array<object>',
      description: 'Workflow outputs and where their values come from',
      default: [],
    });
  });

  it('falls back to the common fields when a schema is unavailable', () => {
    expect(describeNodeSchema('human-input', nodeSchemaRegistry)).toEqual({
      type: 'human-input',
      schema_available: false,
      message:
        'Schema validation is unavailable for this node type: The human-input schema is provided by a plugin runtime that is not installed',
      required_fields: ['id', 'type', 'title'],
    });
  });

  it('lists the known types for an unknown one', () => {
    const info = describeNodeSchema('teleport', nodeSchemaRegistry);

    expect(info).toEqual({ error: 'Unknown node type: teleport', available_types: nodeSchemaRegistry.types() });
  });
});

describe('describeZodType', () => {
  it('names composite types', () => {
    expect(describeZodType(z.array(z.string()).optional())).toBe('array<string>');
    expect(describeZodType(z.enum(['chat', 'completion']))).toBe('"chat" | "completion"');
    expect(describeZodType(z.record(z.number()).default({}))).toBe('record<string, number>');
    expect(describeZodType(z.union([z.string(), z.boolean()]).nullable())).toBe('string | boolean');
    expect(describeZodType(z.unknown())).toBe('any');
  });
});
