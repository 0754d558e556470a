/**
 * Workflow DSL validator.
 *
 * Structural checks run first and stop at the first fatal defect. Once the
 * document is well formed, the graph, variable, dependency and reference
 * checks all run and append to the same result, so one call reports every
 * problem that can be found.
 */

import { ValidationCollector, ValidationResult } from './result.js';
import { validateStructure } from './structure.js';
import { validateGraph } from './graph.js';
import { validateFeatures } from './features.js';
import { validateVariableLists } from './variables.js';
import { validateDependencies } from './dependencies.js';
import { validateVariableReferences } from './references.js';
import { NodeSchemaRegistry } from '../schemas/registry.js';
import { nodeSchemaRegistry } from '../schemas/nodes.js';
import { DependencySchemaCapability, pluginDependencyCapability } from '../schemas/dependency.js';

export interface ValidateOptions {
  nodeSchemas?: NodeSchemaRegistry;
  /** `null` falls back to checking that each dependency has `type` and `value`. */
  dependencySchema?: DependencySchemaCapability | null;
}

/** Validate a workflow document. Never throws. */
export function validateWorkflowYaml(content: string, options: ValidateOptions = {}): ValidationResult {
  const collector = new ValidationCollector();
  const registry = options.nodeSchemas ?? nodeSchemaRegistry;
  const dependencySchema = options.dependencySchema === undefined ? pluginDependencyCapability : options.dependencySchema;

  try {
    const document = validateStructure(content, collector);
    if (document) {
      const { root, workflow } = document;
      if (workflow) {
        const graph = validateGraph(workflow, collector, registry);
        if (graph) {
          validateFeatures(workflow, collector);
          validateVariableLists(workflow, collector);
          validateDependencies(root.dependencies, collector, dependencySchema);
          validateVariableReferences(workflow, graph.nodes, collector);
        }
      } else {
        validateDependencies(root.dependencies, collector, dependencySchema);
      }
    }
  } catch (error) {
    collector.error('unexpected_error', 'VALIDATION_ERROR', error instanceof Error ? error.message : String(error));
  }

  return collector.toResult();
}
