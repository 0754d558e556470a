import { describeValue, isMapping } from './guards.js';
import { ValidationCollector } from './result.js';
import { DependencySchemaCapability } from '../schemas/dependency.js';

/**
 * Validate the top-level `dependencies` list. With no schema capability only
 * the presence of `type` and `value` is checked.
 */
export function validateDependencies(
  dependencies: unknown,
  collector: ValidationCollector,
  capability: DependencySchemaCapability | null,
): void {
  if (dependencies === undefined || dependencies === null) return;
  if (!Array.isArray(dependencies)) {
    collector.error('dependency_validation', 'INVALID_DEPENDENCIES_TYPE', 'dependencies must be a list', {
      actual_type: describeValue(dependencies),
    });
    return;
  }

  dependencies.forEach((dependency: unknown, index) => {
    if (!isMapping(dependency)) {
      collector.error('dependency_validation', 'INVALID_DEPENDENCY_TYPE', `Dependency at index ${index} must be a mapping`, {
        dependency_index: index,
      });
      return;
    }

    if (capability) {
      for (const violation of capability.validate(dependency)) {
        collector.error(
          'dependency_validation',
          'DEPENDENCY_VALIDATION_ERROR',
          `Dependency at index ${index} field '${violation.fieldPath}': ${violation.message}`,
          { dependency_index: index, field: violation.fieldPath, error_type: violation.errorType },
        );
      }
      return;
    }

    if (!('type' in dependency)) {
      collector.error('dependency_validation', 'MISSING_DEPENDENCY_TYPE', `Dependency at index ${index} is missing 'type' field`, {
        dependency_index: index,
      });
    }
    if (!('value' in dependency)) {
      collector.error('dependency_validation', 'MISSING_DEPENDENCY_VALUE', `Dependency at index ${index} is missing 'value' field`, {
        dependency_index: index,
      });
    }
  });
}
