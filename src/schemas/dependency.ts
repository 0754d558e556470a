import { z } from 'zod';
import { FieldViolation, zodViolations } from './registry.js';

export interface DependencySchemaCapability {
  validate(dependency: unknown): FieldViolation[];
}

export const pluginDependencySchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('github'),
      value: z
        .object({
          repo: z.string(),
          version: z.string(),
          package: z.string(),
          github_plugin_unique_identifier: z.string(),
        })
        .passthrough(),
      current_identifier: z.string().nullish(),
    })
    .passthrough(),
  z
    .object({
      type: z.literal('marketplace'),
      value: z.object({ marketplace_plugin_unique_identifier: z.string() }).passthrough(),
      current_identifier: z.string().nullish(),
    })
    .passthrough(),
  z
    .object({
      type: z.literal('package'),
      value: z.object({ plugin_unique_identifier: z.string() }).passthrough(),
      current_identifier: z.string().nullish(),
    })
    .passthrough(),
]);

export const pluginDependencyCapability: DependencySchemaCapability = {
  validate(dependency: unknown): FieldViolation[] {
    const parsed = pluginDependencySchema.safeParse(dependency);
    return parsed.success ? [] : zodViolations(parsed.error);
  },
};
