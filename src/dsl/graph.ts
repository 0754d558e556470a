import { YamlMapping, isMapping } from './guards.js';
import { ValidationCollector } from './result.js';
import { NodeSchemaRegistry } from '../schemas/registry.js';

/** Node and edge sequences, available once the graph passed its type checks. */
export interface GraphShape {
  nodes: unknown[];
  edges: unknown[];
}

/**
 * Validate `workflow.graph`. Returns `undefined` when the graph, its nodes or
 * its edges have the wrong type; per-node and per-edge problems never stop
 * the walk.
 */
export function validateGraph(
  workflow: YamlMapping,
  collector: ValidationCollector,
  registry: NodeSchemaRegistry,
): GraphShape | undefined {
  const graph = workflow.graph === undefined ? {} : workflow.graph;
  if (!isMapping(graph)) {
    collector.error('workflow_validation', 'INVALID_GRAPH_TYPE', 'Workflow graph must be a mapping');
    return undefined;
  }

  const nodes = graph.nodes === undefined ? [] : graph.nodes;
  const edges = graph.edges === undefined ? [] : graph.edges;
  if (!Array.isArray(nodes)) {
    collector.error('workflow_validation', 'INVALID_NODES_TYPE', 'Workflow nodes must be a list');
    return undefined;
  }
  if (!Array.isArray(edges)) {
    collector.error('workflow_validation', 'INVALID_EDGES_TYPE', 'Workflow edges must be a list');
    return undefined;
  }

  collector.info.node_count = nodes.length;
  collector.info.edge_count = edges.length;

  const seenIds = new Set<unknown>();
  nodes.forEach((node, index) => validateNode(node, index, seenIds, collector, registry));

  const nodeIds = collectNodeIds(nodes);
  edges.forEach((edge, index) => validateEdge(edge, index, nodeIds, collector));

  return { nodes, edges };
}

/** Ids of every mapping node that declares one. */
export function collectNodeIds(nodes: unknown[]): Set<unknown> {
  const ids = new Set<unknown>();
  for (const node of nodes) {
    if (isMapping(node) && 'id' in node) ids.add(node.id);
  }
  return ids;
}

export function nodeLabel(node: YamlMapping, index: number): string {
  return 'id' in node ? String(node.id) : `node_${index}`;
}

function validateNode(
  node: unknown,
  index: number,
  seenIds: Set<unknown>,
  collector: ValidationCollector,
  registry: NodeSchemaRegistry,
): void {
  if (!isMapping(node)) {
    collector.error('workflow_validation', 'INVALID_NODE_TYPE', `Node at index ${index} must be a mapping`, { index });
    return;
  }

  const nodeId = nodeLabel(node, index);
  if (!('id' in node)) {
    collector.error('workflow_validation', 'MISSING_NODE_ID', `Node at index ${index} is missing 'id' field`, { index });
  } else if (seenIds.has(node.id)) {
    collector.error('workflow_validation', 'DUPLICATE_NODE_ID', `Node id '${nodeId}' is used by more than one node`, {
      node_id: nodeId,
      index,
    });
  } else {
    seenIds.add(node.id);
  }

  const data = node.data;
  if (!isMapping(data)) {
    collector.error(
      'workflow_validation',
      'MISSING_NODE_DATA',
      `Node '${nodeId}' is missing or has invalid 'data' field`,
      { node_id: nodeId },
    );
  } else {
    validateNodeData(nodeId, data, collector, registry);
  }

  validateNodeLayout(nodeId, node, collector);
}

function validateNodeData(
  nodeId: string,
  data: YamlMapping,
  collector: ValidationCollector,
  registry: NodeSchemaRegistry,
): void {
  const nodeType = data.type;
  if (typeof nodeType !== 'string' || nodeType === '') {
    collector.error('workflow_validation', 'MISSING_NODE_TYPE', `Node '${nodeId}' data is missing 'type' field`, {
      node_id: nodeId,
    });
    return;
  }

  const entry = registry.get(nodeType);
  if (!entry) {
    collector.warning(
      'node_schema_validation',
      'UNKNOWN_NODE_TYPE',
      `Node '${nodeId}' has unknown type '${nodeType}'; its data was not validated`,
      { node_id: nodeId, node_type: nodeType },
    );
    return;
  }
  if (entry.status === 'unavailable') {
    collector.warning(
      'node_schema_validation',
      'NODE_SCHEMA_UNAVAILABLE',
      `Schema validation is unavailable for node type '${nodeType}' (node '${nodeId}')`,
      { node_id: nodeId, node_type: nodeType, reason: entry.reason },
    );
    return;
  }

  for (const violation of entry.capability.validate(data)) {
    collector.error(
      'node_schema_validation',
      'NODE_SCHEMA_VALIDATION_ERROR',
      `Node '${nodeId}' (${nodeType}) field '${violation.fieldPath}': ${violation.message}`,
      { node_id: nodeId, node_type: nodeType, field: violation.fieldPath, error_type: violation.errorType },
    );
  }
}

function validateNodeLayout(nodeId: string, node: YamlMapping, collector: ValidationCollector): void {
  if (!('position' in node)) {
    collector.error(
      'frontend_compatibility',
      'MISSING_NODE_POSITION',
      `Node '${nodeId}' is missing 'position' field required by frontend`,
      { node_id: nodeId },
    );
    return;
  }

  const position = node.position;
  if (!isMapping(position)) {
    collector.error(
      'frontend_compatibility',
      'INVALID_NODE_POSITION_TYPE',
      `Node '${nodeId}' position must be a mapping with x and y coordinates`,
      { node_id: nodeId },
    );
    return;
  }

  if (!('x' in position) || !('y' in position)) {
    collector.error(
      'frontend_compatibility',
      'INCOMPLETE_NODE_POSITION',
      `Node '${nodeId}' position must have both 'x' and 'y' coordinates`,
      { node_id: nodeId },
    );
    return;
  }

  if (typeof position.x !== 'number' || typeof position.y !== 'number') {
    collector.error(
      'frontend_compatibility',
      'INVALID_NODE_POSITION_VALUES',
      `Node '${nodeId}' position x and y must be numeric values`,
      { node_id: nodeId },
    );
  }

  if (!('width' in node) || !('height' in node)) {
    collector.warning(
      'frontend_compatibility',
      'MISSING_NODE_DIMENSIONS',
      `Node '${nodeId}' is missing 'width' or 'height'. Frontend will calculate these dynamically.`,
      { node_id: nodeId },
    );
  }
}

function validateEdge(edge: unknown, index: number, nodeIds: Set<unknown>, collector: ValidationCollector): void {
  if (!isMapping(edge)) {
    collector.error('workflow_validation', 'INVALID_EDGE_TYPE', `Edge at index ${index} must be a mapping`, { index });
    return;
  }

  const { source, target } = edge;
  if (!source) {
    collector.error('workflow_validation', 'MISSING_EDGE_SOURCE', `Edge at index ${index} is missing 'source' field`, {
      index,
    });
  }
  if (!target) {
    collector.error('workflow_validation', 'MISSING_EDGE_TARGET', `Edge at index ${index} is missing 'target' field`, {
      index,
    });
  }
  if (source && !nodeIds.has(source)) {
    collector.error(
      'workflow_validation',
      'INVALID_EDGE_SOURCE',
      `Edge references non-existent source node '${String(source)}'`,
      { index, source },
    );
  }
  if (target && !nodeIds.has(target)) {
    collector.error(
      'workflow_validation',
      'INVALID_EDGE_TARGET',
      `Edge references non-existent target node '${String(target)}'`,
      { index, target },
    );
  }
}
