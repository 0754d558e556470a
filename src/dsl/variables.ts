import { CONVERSATION_VARIABLE_TYPES, ENVIRONMENT_VARIABLE_TYPES } from './constants.js';
import { YamlMapping, describeValue, isMapping } from './guards.js';
import { ValidationCollector } from './result.js';

interface VariableListRules {
  key: 'environment_variables' | 'conversation_variables';
  label: string;
  /** Code prefix, e.g. `ENV_VAR` yields `MISSING_ENV_VAR_FIELD`. */
  codePrefix: 'ENV_VAR' | 'CONVERSATION_VAR';
  allowedTypes: readonly string[];
}

const REQUIRED_VARIABLE_FIELDS = ['id', 'name', 'value_type'] as const;

const ENVIRONMENT_RULES: VariableListRules = {
  key: 'environment_variables',
  label: 'Environment variable',
  codePrefix: 'ENV_VAR',
  allowedTypes: ENVIRONMENT_VARIABLE_TYPES,
};

const CONVERSATION_RULES: VariableListRules = {
  key: 'conversation_variables',
  label: 'Conversation variable',
  codePrefix: 'CONVERSATION_VAR',
  allowedTypes: CONVERSATION_VARIABLE_TYPES,
};

export function validateVariableLists(workflow: YamlMapping, collector: ValidationCollector): void {
  validateVariableList(workflow, ENVIRONMENT_RULES, collector);
  validateVariableList(workflow, CONVERSATION_RULES, collector);
}

function validateVariableList(workflow: YamlMapping, rules: VariableListRules, collector: ValidationCollector): void {
  const list = workflow[rules.key];
  if (list === undefined || list === null) return;

  if (!Array.isArray(list)) {
    collector.error('variable_validation', `INVALID_${rules.codePrefix}S_TYPE`, `workflow.${rules.key} must be a list`, {
      actual_type: describeValue(list),
    });
    return;
  }

  list.forEach((entry: unknown, index) => {
    if (!isMapping(entry)) {
      collector.error(
        'variable_validation',
        `INVALID_${rules.codePrefix}_TYPE`,
        `${rules.label} at index ${index} must be a mapping`,
        { index },
      );
      return;
    }

    for (const field of REQUIRED_VARIABLE_FIELDS) {
      if (entry[field] === undefined || entry[field] === null) {
        collector.error(
          'variable_validation',
          `MISSING_${rules.codePrefix}_FIELD`,
          `${rules.label} at index ${index} is missing '${field}' field`,
          { index, field },
        );
      }
    }

    const valueType = entry.value_type;
    if (valueType !== undefined && valueType !== null && !(typeof valueType === 'string' && rules.allowedTypes.includes(valueType))) {
      collector.error(
        'variable_validation',
        `INVALID_${rules.codePrefix}_VALUE_TYPE`,
        `${rules.label} at index ${index} has invalid value_type '${String(valueType)}'. Must be one of: ${rules.allowedTypes.join(', ')}`,
        { index, value_type: valueType, allowed: [...rules.allowedTypes] },
      );
    }
  });
}

/** String ids of every well-formed entry in a variable list; anything else contributes nothing. */
export function declaredVariableIds(list: unknown): Set<string> {
  const ids = new Set<string>();
  if (!Array.isArray(list)) return ids;
  for (const entry of list) {
    if (isMapping(entry) && typeof entry.id === 'string') ids.add(entry.id);
  }
  return ids;
}
