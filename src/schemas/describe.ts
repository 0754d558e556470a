import { z } from 'zod';
import { NodeSchemaRegistry } from './registry.js';

export interface FieldInfo {
  required: boolean;
  type: string;
  description?: string;
  default?: unknown;
}

export type NodeSchemaInfo =
  | {
      type: string;
      schema_available: true;
      fields: Record<string, FieldInfo>;
      example_structure: Record<string, unknown>;
    }
  | {
      type: string;
      schema_available: false;
      message: string;
      required_fields: string[];
    }
  | {
      error: string;
      available_types: string[];
    };

/** Fields every node carries regardless of its type. */
export const DEFAULT_REQUIRED_FIELDS = ['id', 'type', 'title'];

export function describeNodeSchema(nodeType: string, registry: NodeSchemaRegistry): NodeSchemaInfo {
  const entry = registry.get(nodeType);
  if (!entry) {
    return { error: `Unknown node type: ${nodeType}`, available_types: registry.types() };
  }
  if (entry.status === 'unavailable') {
    return {
      type: nodeType,
      schema_available: false,
      message: `Schema validation is unavailable for this node type: ${entry.reason}`,
      required_fields: [...DEFAULT_REQUIRED_FIELDS],
    };
  }

  const fields: Record<string, FieldInfo> = {};
  for (const [name, field] of Object.entries<z.ZodTypeAny>(entry.capability.schema.shape)) {
    const info: FieldInfo = { required: !field.isOptional(), type: describeZodType(field) };
    if (field.description !== undefined) info.description = field.description;
    if (field instanceof z.ZodDefault) {
      const fallback = field.safeParse(undefined);
      if (fallback.success) info.default = fallback.data;
    }
    fields[name] = info;
  }

  return {
    type: nodeType,
    schema_available: true,
    fields,
    example_structure: {
      id: 'node_id',
      position: { x: 100, y: 100 },
      data: { type: nodeType, title: 'Node Title' },
    },
  };
}

/** Human-readable type name of a zod schema, e.g. `array<string>` or `"a" | "b"`. */
export function describeZodType(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return describeZodType(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) return describeZodType(schema.removeDefault());
  if (schema instanceof z.ZodEffects) return describeZodType(schema.innerType());
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodLiteral) return JSON.stringify(schema.value);
  if (schema instanceof z.ZodEnum) {
    return schema.options.map((option: string) => JSON.stringify(option)).join(' | ');
  }
  if (schema instanceof z.ZodArray) return `array<${describeZodType(schema.element)}>`;
  if (schema instanceof z.ZodRecord) return `record<string, ${describeZodType(schema.valueSchema)}>`;
  if (schema instanceof z.ZodObject) return 'object';
  if (schema instanceof z.ZodUnion) {
    return schema.options.map((option: z.ZodTypeAny) => describeZodType(option)).join(' | ');
  }
  return 'any';
}
