/**
 * Workflow document handle.
 *
 * A handle owns one in-memory document. Callers create it from YAML (or from
 * scratch), apply mutations, and render it back with `toYaml()`; handles
 * share no state with each other.
 */

import yaml from 'js-yaml';
import { AppMode, CURRENT_DSL_VERSION } from '../dsl/constants.js';
import { YamlMapping, isMapping } from '../dsl/guards.js';
import { ValidationResult } from '../dsl/result.js';
import { ValidateOptions, validateWorkflowYaml } from '../dsl/validator.js';
import {
  ConversationVariableInput,
  EnvironmentVariableInput,
  conversationVariableSchema,
  environmentVariableSchema,
} from '../schemas/variables.js';
import { ConversationVariable, EnvironmentVariable, WorkflowEdge, WorkflowNode } from '../types/workflow.js';

export class WorkflowDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowDocumentError';
  }
}

export interface CreateWorkflowOptions {
  name: string;
  description?: string;
  icon?: string;
  icon_background?: string;
  mode?: Extract<AppMode, 'workflow' | 'advanced-chat'>;
}

interface GraphLists {
  nodes: unknown[];
  edges: unknown[];
}

type VariableListKey = 'environment_variables' | 'conversation_variables';

export class WorkflowDocument {
  private constructor(private readonly data: YamlMapping) {}

  /** A workflow with no nodes, edges or variables. */
  static create(options: CreateWorkflowOptions): WorkflowDocument {
    return new WorkflowDocument({
      version: CURRENT_DSL_VERSION,
      kind: 'app',
      app: {
        mode: options.mode ?? 'workflow',
        name: options.name,
        description: options.description ?? '',
        icon: options.icon ?? '🤖',
        icon_background: options.icon_background ?? '#FFEAD5',
        use_icon_as_answer_icon: false,
      },
      workflow: {
        environment_variables: [],
        conversation_variables: [],
        graph: { nodes: [], edges: [], viewport: { x: 0, y: 0, zoom: 1 } },
        features: {},
        rag_pipeline_variables: [],
      },
      dependencies: [],
    });
  }

  static fromYaml(content: string): WorkflowDocument {
    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new WorkflowDocumentError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isMapping(parsed)) {
      throw new WorkflowDocumentError('Invalid YAML: document must be a mapping');
    }
    return new WorkflowDocument(parsed);
  }

  /** Values shared through YAML aliases are written once, with an anchor. */
  toYaml(): string {
    return yaml.dump(this.data, { lineWidth: -1, skipInvalid: true });
  }

  validate(options?: ValidateOptions): ValidationResult {
    return validateWorkflowYaml(this.toYaml(), options);
  }

  // -------------------------------------------------------------------------
  // Nodes
  // -------------------------------------------------------------------------

  /** Append a node built by one of the node builders. Returns its id. */
  addNode(node: WorkflowNode): string {
    const { nodes } = this.ensureGraph();
    if (nodes.some((existing) => isMapping(existing) && existing.id === node.id)) {
      throw new WorkflowDocumentError(`Node with ID '${node.id}' already exists`);
    }
    nodes.push(node);
    return node.id;
  }

  /** Remove a node together with every edge attached to it. */
  removeNode(nodeId: string): void {
    const graph = this.requireGraph();
    const remaining = graph.nodes.filter((node) => !(isMapping(node) && node.id === nodeId));
    if (remaining.length === graph.nodes.length) {
      throw new WorkflowDocumentError(`Node '${nodeId}' not found`);
    }
    graph.nodes.splice(0, graph.nodes.length, ...remaining);

    const edges = graph.edges.filter(
      (edge) => !(isMapping(edge) && (edge.source === nodeId || edge.target === nodeId)),
    );
    graph.edges.splice(0, graph.edges.length, ...edges);
  }

  getNode(nodeId: string): YamlMapping {
    const node = this.requireGraph().nodes.find((candidate) => isMapping(candidate) && candidate.id === nodeId);
    if (!isMapping(node)) {
      throw new WorkflowDocumentError(`Node '${nodeId}' not found`);
    }
    return node;
  }

  /** Replace the node whose id matches `node.id`, keeping its place in the list. */
  updateNode(node: WorkflowNode): void {
    const { nodes } = this.requireGraph();
    const index = nodes.findIndex((candidate) => isMapping(candidate) && candidate.id === node.id);
    if (index === -1) {
      throw new WorkflowDocumentError(`Node '${node.id}' not found`);
    }
    nodes[index] = node;
  }

  listNodes(): YamlMapping[] {
    return this.graphLists()?.nodes.filter(isMapping) ?? [];
  }

  // -------------------------------------------------------------------------
  // Edges
  // -------------------------------------------------------------------------

  addEdge(sourceNodeId: string, targetNodeId: string, sourceHandle = 'source', targetHandle = 'target'): string {
    const graph = this.requireGraph();
    const nodeIds = new Set(graph.nodes.filter(isMapping).map((node) => node.id));
    if (!nodeIds.has(sourceNodeId)) {
      throw new WorkflowDocumentError(`Source node '${sourceNodeId}' not found`);
    }
    if (!nodeIds.has(targetNodeId)) {
      throw new WorkflowDocumentError(`Target node '${targetNodeId}' not found`);
    }

    const edge: WorkflowEdge = {
      id: `${sourceNodeId}-${sourceHandle}-${targetNodeId}-${targetHandle}`,
      source: sourceNodeId,
      target: targetNodeId,
      sourceHandle,
      targetHandle,
      type: 'custom',
      zIndex: 0,
    };
    graph.edges.push(edge);
    return edge.id;
  }

  /** Remove every edge running from `sourceNodeId` to `targetNodeId`. */
  removeEdge(sourceNodeId: string, targetNodeId: string): void {
    const { edges } = this.requireGraph();
    const remaining = edges.filter(
      (edge) => !(isMapping(edge) && edge.source === sourceNodeId && edge.target === targetNodeId),
    );
    if (remaining.length === edges.length) {
      throw new WorkflowDocumentError(`No edge found from '${sourceNodeId}' to '${targetNodeId}'`);
    }
    edges.splice(0, edges.length, ...remaining);
  }

  listEdges(): YamlMapping[] {
    return this.graphLists()?.edges.filter(isMapping) ?? [];
  }

  // -------------------------------------------------------------------------
  // Variables
  // -------------------------------------------------------------------------

  addEnvironmentVariable(input: EnvironmentVariableInput): EnvironmentVariable {
    const parsed = environmentVariableSchema.safeParse(input);
    if (!parsed.success) {
      throw new WorkflowDocumentError(`Invalid environment variable: ${formatIssues(parsed.error.issues)}`);
    }
    this.appendVariable('environment_variables', 'Environment variable', parsed.data.id, parsed.data);
    return parsed.data;
  }

  addConversationVariable(input: ConversationVariableInput): ConversationVariable {
    const parsed = conversationVariableSchema.safeParse(input);
    if (!parsed.success) {
      throw new WorkflowDocumentError(`Invalid conversation variable: ${formatIssues(parsed.error.issues)}`);
    }
    this.appendVariable('conversation_variables', 'Conversation variable', parsed.data.id, parsed.data);
    return parsed.data;
  }

  removeEnvironmentVariable(id: string): void {
    this.removeVariable('environment_variables', 'Environment variable', id);
  }

  removeConversationVariable(id: string): void {
    this.removeVariable('conversation_variables', 'Conversation variable', id);
  }

  // -------------------------------------------------------------------------
  // App metadata
  // -------------------------------------------------------------------------

  setAppName(name: string): void {
    this.app().name = name;
  }

  setAppDescription(description: string): void {
    this.app().description = description;
  }

  setAppIcon(icon: string, iconBackground?: string): void {
    const app = this.app();
    app.icon = icon;
    if (iconBackground) app.icon_background = iconBackground;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private app(): YamlMapping {
    const app: YamlMapping = isMapping(this.data.app) ? this.data.app : {};
    this.data.app = app;
    return app;
  }

  private workflow(): YamlMapping {
    const workflow = this.data.workflow;
    if (!isMapping(workflow)) {
      throw new WorkflowDocumentError('Workflow structure missing (not a workflow app?)');
    }
    return workflow;
  }

  private graphLists(): GraphLists | undefined {
    const workflow = this.data.workflow;
    if (!isMapping(workflow) || !isMapping(workflow.graph)) return undefined;
    const { nodes, edges } = workflow.graph;
    return { nodes: Array.isArray(nodes) ? nodes : [], edges: Array.isArray(edges) ? edges : [] };
  }

  /** The graph, created (with empty lists) when absent. */
  private ensureGraph(): GraphLists {
    const workflow = this.workflow();
    if (!isMapping(workflow.graph)) {
      workflow.graph = { nodes: [], edges: [], viewport: { x: 0, y: 0, zoom: 1 } };
    }
    return this.requireGraph();
  }

  /** The graph's node and edge lists; missing lists are created in place. */
  private requireGraph(): GraphLists {
    const graph = this.workflow().graph;
    if (!isMapping(graph)) {
      throw new WorkflowDocumentError('Workflow structure missing');
    }
    const nodes: unknown[] = Array.isArray(graph.nodes) ? graph.nodes : [];
    const edges: unknown[] = Array.isArray(graph.edges) ? graph.edges : [];
    graph.nodes = nodes;
    graph.edges = edges;
    return { nodes, edges };
  }

  private appendVariable(key: VariableListKey, label: string, id: string, variable: object): void {
    const workflow = this.workflow();
    const list: unknown[] = Array.isArray(workflow[key]) ? workflow[key] : [];
    workflow[key] = list;
    if (list.some((entry: unknown) => isMapping(entry) && entry.id === id)) {
      throw new WorkflowDocumentError(`${label} '${id}' already exists`);
    }
    list.push(variable);
  }

  private removeVariable(key: VariableListKey, label: string, id: string): void {
    const list = this.workflow()[key];
    const entries: unknown[] = Array.isArray(list) ? list : [];
    const remaining = entries.filter((entry) => !(isMapping(entry) && entry.id === id));
    if (remaining.length === entries.length) {
      throw new WorkflowDocumentError(`${label} '${id}' not found`);
    }
    entries.splice(0, entries.length, ...remaining);
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}
