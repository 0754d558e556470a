/**
 * Node builders.
 *
 * Each builder is a plain function that returns a complete node value. The
 * node's `data` is checked against the node schema registry before it is
 * returned, so a builder never hands out a node the validator would reject.
 */

import { v4 as uuidv4 } from 'uuid';
import { CODE_LANGUAGES, START_INPUT_TYPES, nodeSchemaRegistry } from '../schemas/nodes.js';
import { NodeSchemaRegistry } from '../schemas/registry.js';
import { NodeData, WorkflowNode } from '../types/workflow.js';

export class NodeBuilderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NodeBuilderError';
  }
}

export interface NodeOptions {
  /** Generated when omitted. */
  id?: string;
  title?: string;
  x?: number;
  y?: number;
}

export interface ValueSelectorBinding {
  variable: string;
  value_selector: string[];
}

interface NodeDefaults {
  title: string;
  x: number;
  y: number;
}

/** 13 alphanumeric characters, usable as the head of a `{{#node.field#}}` reference. */
export function generateNodeId(): string {
  return uuidv4().replace(/-/g, '').slice(0, 13);
}

function buildNode(
  nodeType: string,
  options: NodeOptions,
  defaults: NodeDefaults,
  fields: Record<string, unknown>,
  registry: NodeSchemaRegistry = nodeSchemaRegistry,
): WorkflowNode {
  const data: NodeData = { type: nodeType, title: options.title || defaults.title, ...fields };

  const entry = registry.get(nodeType);
  if (!entry || entry.status === 'unavailable') {
    throw new NodeBuilderError(`Schema validation unavailable for node type '${nodeType}'`);
  }
  const violations = entry.capability.validate(data);
  if (violations.length > 0) {
    const summary = violations.map((violation) => `${violation.fieldPath}: ${violation.message}`).join('; ');
    throw new NodeBuilderError(`Node validation failed for '${nodeType}': ${summary}`);
  }

  return {
    id: options.id || generateNodeId(),
    type: 'custom',
    data,
    position: { x: options.x ?? defaults.x, y: options.y ?? defaults.y },
    sourcePosition: 'right',
    targetPosition: 'left',
  };
}

// ---------------------------------------------------------------------------
// Start / End / Answer
// ---------------------------------------------------------------------------

export interface StartVariableInput {
  variable: string;
  label: string;
  type?: (typeof START_INPUT_TYPES)[number];
  required?: boolean;
  default?: string;
  placeholder?: string;
  max_length?: number;
  options?: string[];
}

export interface StartNodeOptions extends NodeOptions {
  variables?: StartVariableInput[];
}

export function startNode(options: StartNodeOptions = {}): WorkflowNode {
  const variables = (options.variables ?? []).map((input) => {
    const variable: Record<string, unknown> = {
      variable: input.variable,
      label: input.label,
      type: input.type ?? 'text-input',
      required: input.required ?? false,
      default: input.default ?? '',
      placeholder: input.placeholder ?? '',
      options: input.options ?? [],
    };
    if (input.max_length !== undefined) variable.max_length = input.max_length;
    return variable;
  });
  return buildNode('start', options, { title: 'Start', x: 80, y: 282 }, { variables });
}

export interface EndNodeOptions extends NodeOptions {
  outputs?: ValueSelectorBinding[];
}

export function endNode(options: EndNodeOptions = {}): WorkflowNode {
  const outputs = (options.outputs ?? []).map(({ variable, value_selector }) => ({ variable, value_selector }));
  return buildNode('end', options, { title: 'End', x: 756, y: 300 }, { outputs });
}

export interface AnswerNodeOptions extends NodeOptions {
  /** May embed references such as `{{#llm.text#}}`. */
  answer?: string;
}

export function answerNode(options: AnswerNodeOptions = {}): WorkflowNode {
  return buildNode('answer', options, { title: 'Answer', x: 0, y: 0 }, { answer: options.answer ?? '' });
}

// ---------------------------------------------------------------------------
// LLM
// ---------------------------------------------------------------------------

export interface LlmNodeOptions extends NodeOptions {
  provider?: string;
  model?: string;
  mode?: 'chat' | 'completion';
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  userPrompt?: string;
  contextEnabled?: boolean;
  contextVariableSelector?: string[];
}

/** Bare provider names are expanded to the `org/plugin/provider` form. */
export function qualifyProvider(provider: string): string {
  return provider.includes('/') ? provider : `langgenius/${provider}/${provider}`;
}

export function llmNode(options: LlmNodeOptions = {}): WorkflowNode {
  const completionParams: Record<string, number> = { temperature: options.temperature ?? 0.7 };
  if (options.maxTokens !== undefined) completionParams.max_tokens = options.maxTokens;

  const promptTemplate: Array<Record<string, string>> = [];
  if (options.systemPrompt) {
    promptTemplate.push({ role: 'system', text: options.systemPrompt, edition_type: 'basic' });
  }
  if (options.userPrompt) {
    promptTemplate.push({ role: 'user', text: options.userPrompt });
  }

  return buildNode(
    'llm',
    options,
    { title: 'LLM', x: 382, y: 282 },
    {
      model: {
        provider: qualifyProvider(options.provider ?? 'openai'),
        name: options.model ?? 'gpt-4',
        mode: options.mode ?? 'chat',
        completion_params: completionParams,
      },
      prompt_template: promptTemplate,
      context: options.contextEnabled
        ? { enabled: true, variable_selector: options.contextVariableSelector ?? null }
        : { enabled: false },
      vision: { enabled: false },
      prompt_config: { jinja2_variables: [] },
    },
  );
}

// ---------------------------------------------------------------------------
// Template transform / Code
// ---------------------------------------------------------------------------

export interface TemplateTransformNodeOptions extends NodeOptions {
  variables?: ValueSelectorBinding[];
  /** Jinja2 template, e.g. `Hello {{ name }}!`. */
  template?: string;
}

export function templateTransformNode(options: TemplateTransformNodeOptions = {}): WorkflowNode {
  return buildNode(
    'template-transform',
    options,
    { title: 'Template', x: 0, y: 0 },
    {
      variables: (options.variables ?? []).map(({ variable, value_selector }) => ({ variable, value_selector })),
      template: options.template ?? '',
    },
  );
}

export interface CodeNodeOptions extends NodeOptions {
  language?: (typeof CODE_LANGUAGES)[number];
  code?: string;
  variables?: ValueSelectorBinding[];
  /** Output name to output type, e.g. `{ result: 'string' }`. */
  outputs?: Record<string, string>;
}

export function codeNode(options: CodeNodeOptions = {}): WorkflowNode {
  const outputs: Record<string, { type: string; children: null }> = {};
  for (const [name, type] of Object.entries(options.outputs ?? {})) {
    outputs[name] = { type, children: null };
  }
  return buildNode(
    'code',
    options,
    { title: 'Code', x: 0, y: 0 },
    {
      variables: (options.variables ?? []).map(({ variable, value_selector }) => ({ variable, value_selector })),
      code_language: options.language ?? 'python3',
      code: options.code ?? '',
      outputs,
    },
  );
}

// ---------------------------------------------------------------------------
// HTTP request
// ---------------------------------------------------------------------------

export interface HttpAuthorizationConfig {
  type: 'basic' | 'bearer' | 'custom';
  api_key: string;
  header?: string;
}

export interface HttpBodyItem {
  key: string;
  type: 'file' | 'text';
  value: string;
}

export interface HttpRequestNodeOptions extends NodeOptions {
  method?: string;
  url?: string;
  authorization?: HttpAuthorizationConfig;
  headers?: Record<string, string> | string;
  params?: Record<string, string> | string;
  bodyType?: 'none' | 'form-data' | 'x-www-form-urlencoded' | 'raw-text' | 'json' | 'binary';
  body?: HttpBodyItem[];
}

export function httpRequestNode(options: HttpRequestNodeOptions = {}): WorkflowNode {
  const serialize = (value: Record<string, string> | string | undefined): string =>
    typeof value === 'string' ? value : JSON.stringify(value ?? {});

  return buildNode(
    'http-request',
    options,
    { title: 'HTTP Request', x: 0, y: 0 },
    {
      method: (options.method ?? 'GET').toUpperCase(),
      url: options.url ?? '',
      authorization: options.authorization
        ? { type: 'api-key', config: { ...options.authorization } }
        : { type: 'no-auth' },
      headers: serialize(options.headers),
      params: serialize(options.params),
      body: options.bodyType ? { type: options.bodyType, data: options.body ?? [] } : null,
      timeout: null,
    },
  );
}

// ---------------------------------------------------------------------------
// If / else
// ---------------------------------------------------------------------------

export interface IfElseCondition {
  variable_selector: string[];
  comparison_operator: string;
  value?: unknown;
}

export interface IfElseCase {
  case_id: string;
  logical_operator?: 'and' | 'or';
  conditions?: IfElseCondition[];
}

export interface IfElseNodeOptions extends NodeOptions {
  /** Each case's `case_id` doubles as the source handle of its outgoing edge; the else branch uses `false`. */
  cases?: IfElseCase[];
}

export function ifElseNode(options: IfElseNodeOptions = {}): WorkflowNode {
  const cases = (options.cases ?? []).map((branch) => ({
    case_id: branch.case_id,
    logical_operator: branch.logical_operator ?? 'and',
    conditions: (branch.conditions ?? []).map((condition) => ({ ...condition })),
  }));
  return buildNode('if-else', options, { title: 'IF/ELSE', x: 0, y: 0 }, { cases });
}
