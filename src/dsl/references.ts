/**
 * Cross-reference check for `{{#...#}}` tokens embedded in node data.
 *
 * Each token names an environment variable (`env.<id>`), a conversation
 * variable (`conversation.<id>`) or a node output (`<node_id>.<field>`); the
 * head must resolve to something the document declares.
 */

import { YamlMapping, isMapping } from './guards.js';
import { ValidationCollector } from './result.js';
import { collectNodeIds, nodeLabel } from './graph.js';
import { declaredVariableIds } from './variables.js';

export const VARIABLE_REFERENCE_PATTERN =
  /\{\{#([a-zA-Z0-9_]{1,50}(?:\.[a-zA-Z_][a-zA-Z0-9_]{0,29}){1,10})#\}\}/g;

export interface VariableReference {
  /** The whole `{{#...#}}` token. */
  token: string;
  /** Text between the delimiters, e.g. `env.api_key`. */
  selector: string;
  /** Location inside the node's `data`, e.g. `prompt_template[1].text`. */
  path: string;
}

interface ReferenceScope {
  environment: Set<string>;
  conversation: Set<string>;
  /** Stringified, since an unquoted numeric id loads as a number. */
  nodes: Set<string>;
}

export function validateVariableReferences(
  workflow: YamlMapping,
  nodes: unknown[],
  collector: ValidationCollector,
): void {
  const scope: ReferenceScope = {
    environment: declaredVariableIds(workflow.environment_variables),
    conversation: declaredVariableIds(workflow.conversation_variables),
    nodes: new Set([...collectNodeIds(nodes)].map(String)),
  };

  // Shared across nodes: data reached again through an alias is reported once, for the first node.
  const visited = new WeakSet<object>();
  nodes.forEach((node, index) => {
    if (!isMapping(node) || !isMapping(node.data)) return;
    const nodeId = nodeLabel(node, index);
    for (const reference of findVariableReferences(node.data, '', visited)) {
      checkReference(nodeId, reference, scope, collector);
    }
  });
}

/**
 * Every reference token in a value tree, in document order. Each sequence or
 * mapping is walked once; a container reached again (a YAML alias, or a
 * cycle) contributes nothing after its first path.
 */
export function findVariableReferences(
  value: unknown,
  path = '',
  visited: WeakSet<object> = new WeakSet(),
): VariableReference[] {
  if (typeof value === 'string') {
    return [...value.matchAll(VARIABLE_REFERENCE_PATTERN)].map((match) => ({
      token: match[0],
      selector: match[1],
      path,
    }));
  }
  if (Array.isArray(value)) {
    if (visited.has(value)) return [];
    visited.add(value);
    return value.flatMap((item: unknown, index) => findVariableReferences(item, `${path}[${index}]`, visited));
  }
  if (isMapping(value)) {
    if (visited.has(value)) return [];
    visited.add(value);
    return Object.entries(value).flatMap(([key, item]) =>
      findVariableReferences(item, path === '' ? key : `${path}.${key}`, visited),
    );
  }
  return [];
}

function checkReference(
  nodeId: string,
  reference: VariableReference,
  scope: ReferenceScope,
  collector: ValidationCollector,
): void {
  const { token, selector, path } = reference;
  const dot = selector.indexOf('.');
  if (dot === -1) {
    collector.warning(
      'variable_reference_validation',
      'INVALID_VARIABLE_REFERENCE_FORMAT',
      `Node '${nodeId}' has malformed variable reference '${token}' at '${path}'`,
      { node_id: nodeId, reference: token, path },
    );
    return;
  }

  const prefix = selector.slice(0, dot);
  const remainder = selector.slice(dot + 1);

  if (prefix === 'env') {
    if (!scope.environment.has(remainder)) {
      collector.error(
        'variable_reference_validation',
        'UNDEFINED_ENVIRONMENT_VARIABLE',
        `Node '${nodeId}' references undefined environment variable '${remainder}' at '${path}'`,
        { node_id: nodeId, variable_id: remainder, reference: token, path },
      );
    }
    return;
  }

  if (prefix === 'conversation') {
    if (!scope.conversation.has(remainder)) {
      collector.error(
        'variable_reference_validation',
        'UNDEFINED_CONVERSATION_VARIABLE',
        `Node '${nodeId}' references undefined conversation variable '${remainder}' at '${path}'`,
        { node_id: nodeId, variable_id: remainder, reference: token, path },
      );
    }
    return;
  }

  if (!scope.nodes.has(prefix)) {
    collector.error(
      'variable_reference_validation',
      'UNDEFINED_NODE_REFERENCE',
      `Node '${nodeId}' references non-existent node '${prefix}' at '${path}'`,
      { node_id: nodeId, referenced_node_id: prefix, reference: token, path },
    );
  }
}
