import { z } from 'zod';

/** One field-level violation reported by a schema capability. */
export interface FieldViolation {
  fieldPath: string;
  message: string;
  errorType: string;
}

/** Structural validation for the `data` mapping of one node type. */
export interface NodeSchemaCapability {
  readonly nodeType: string;
  readonly schema: z.AnyZodObject;
  validate(data: unknown): FieldViolation[];
}

export type NodeSchemaEntry =
  | { status: 'available'; capability: NodeSchemaCapability }
  | { status: 'unavailable'; reason: string };

export function zodViolations(error: z.ZodError): FieldViolation[] {
  return error.issues.map((issue) => ({
    fieldPath: issue.path.length > 0 ? issue.path.map(String).join('.') : '$',
    message: issue.message,
    errorType: issue.code,
  }));
}

export function createNodeSchemaCapability(nodeType: string, schema: z.AnyZodObject): NodeSchemaCapability {
  return {
    nodeType,
    schema,
    validate(data: unknown): FieldViolation[] {
      const parsed = schema.safeParse(data);
      return parsed.success ? [] : zodViolations(parsed.error);
    },
  };
}

/**
 * Maps node-type identifiers to schema capabilities.
 *
 * Entries are registered once at start-up; a loader that throws leaves the
 * type registered as unavailable instead of failing start-up.
 */
export class NodeSchemaRegistry {
  private readonly entries = new Map<string, NodeSchemaEntry>();

  register(nodeType: string, load: () => z.AnyZodObject): this {
    try {
      this.entries.set(nodeType, { status: 'available', capability: createNodeSchemaCapability(nodeType, load()) });
    } catch (error) {
      this.markUnavailable(nodeType, error instanceof Error ? error.message : String(error));
    }
    return this;
  }

  markUnavailable(nodeType: string, reason: string): this {
    this.entries.set(nodeType, { status: 'unavailable', reason });
    return this;
  }

  get(nodeType: string): NodeSchemaEntry | undefined {
    return this.entries.get(nodeType);
  }

  types(): string[] {
    return [...this.entries.keys()];
  }
}
