/**
 * Structural schemas for the `data` mapping of each node type.
 *
 * Every schema passes unknown keys through: editors attach presentation
 * fields (`selected`, `desc`, ...) that the DSL does not constrain.
 */

import { z } from 'zod';
import { NodeSchemaRegistry } from './registry.js';

const valueSelector = z.array(z.string()).describe('Path to a value, e.g. ["node_id", "output"]');

const variableSelector = z
  .object({
    variable: z.string().describe('Name used inside the node'),
    value_selector: valueSelector,
  })
  .passthrough();

const modelConfig = z
  .object({
    provider: z.string().describe('Model provider identifier'),
    name: z.string().describe('Model name'),
    mode: z.enum(['chat', 'completion']).describe('Model invocation mode'),
    completion_params: z.record(z.unknown()).default({}).describe('Sampling parameters such as temperature'),
  })
  .passthrough();

const condition = z
  .object({
    variable_selector: valueSelector,
    comparison_operator: z.string().describe('Operator such as "contains", "=", ">" or "is"'),
    value: z.unknown().optional(),
  })
  .passthrough();

function nodeData<T extends z.ZodRawShape>(type: string, shape: T) {
  return z
    .object({
      type: z.literal(type).describe('Node type identifier'),
      title: z.string().describe('Title shown on the canvas'),
      desc: z.string().optional().describe('Free-form description'),
      ...shape,
    })
    .passthrough();
}

export const START_INPUT_TYPES = [
  'text-input',
  'paragraph',
  'select',
  'number',
  'file',
  'file-list',
  'checkbox',
  'json_object',
] as const;

export const startNodeSchema = nodeData('start', {
  variables: z
    .array(
      z
        .object({
          variable: z.string(),
          label: z.string(),
          type: z.enum(START_INPUT_TYPES),
          required: z.boolean().default(false),
          max_length: z.number().int().positive().nullish(),
          options: z.array(z.string()).default([]),
          placeholder: z.string().optional(),
          default: z.unknown().optional(),
        })
        .passthrough(),
    )
    .default([])
    .describe('User inputs collected when the workflow starts'),
});

export const endNodeSchema = nodeData('end', {
  outputs: z.array(variableSelector).default([]).describe('Workflow outputs and where their values come from'),
});

export const answerNodeSchema = nodeData('answer', {
  answer: z.string().describe('Reply text; may embed {{#node.field#}} references'),
});

const promptMessage = z
  .object({
    role: z.enum(['system', 'user', 'assistant']),
    text: z.string(),
    edition_type: z.enum(['basic', 'jinja2']).optional(),
  })
  .passthrough();

export const llmNodeSchema = nodeData('llm', {
  model: modelConfig.describe('Model used for the call'),
  prompt_template: z
    .union([z.array(promptMessage), z.object({ text: z.string() }).passthrough()])
    .describe('Chat messages, or a single completion prompt'),
  context: z
    .object({
      enabled: z.boolean(),
      variable_selector: valueSelector.nullish(),
    })
    .passthrough()
    .describe('Optional context input'),
  vision: z.object({ enabled: z.boolean() }).passthrough().default({ enabled: false }).describe('Image input settings'),
  memory: z.record(z.unknown()).nullish().describe('Conversation memory settings'),
  prompt_config: z
    .object({ jinja2_variables: z.array(variableSelector).default([]) })
    .passthrough()
    .optional()
    .describe('Variables exposed to jinja2 prompts'),
});

export const templateTransformNodeSchema = nodeData('template-transform', {
  variables: z.array(variableSelector).describe('Values made available to the template'),
  template: z.string().describe('Jinja2 template'),
});

export const CODE_LANGUAGES = ['python3', 'javascript', 'jinja2'] as const;

export const codeNodeSchema = nodeData('code', {
  variables: z.array(variableSelector).describe('Inputs passed to the code'),
  code_language: z.enum(CODE_LANGUAGES).describe('Language of the code'),
  code: z.string().describe('Source code with a main() entry point'),
  outputs: z
    .record(z.object({ type: z.string(), children: z.unknown().nullish() }).passthrough())
    .describe('Declared outputs keyed by name'),
});

export const HTTP_METHODS = ['get', 'post', 'put', 'patch', 'delete', 'head', 'options'] as const;

export const httpRequestNodeSchema = nodeData('http-request', {
  method: z
    .string()
    .refine((method) => HTTP_METHODS.some((allowed) => allowed === method.toLowerCase()), {
      message: `Method must be one of ${HTTP_METHODS.join(', ')}`,
    })
    .describe('HTTP method'),
  url: z.string().describe('Request URL; may embed {{#node.field#}} references'),
  authorization: z
    .object({
      type: z.enum(['no-auth', 'api-key']),
      config: z
        .object({
          type: z.enum(['basic', 'bearer', 'custom']),
          api_key: z.string(),
          header: z.string().optional(),
        })
        .passthrough()
        .nullish(),
    })
    .passthrough()
    .describe('Authorization settings'),
  headers: z.string().describe('Headers, one "key:value" per line or JSON'),
  params: z.string().describe('Query parameters, one "key:value" per line or JSON'),
  body: z
    .object({
      type: z.enum(['none', 'form-data', 'x-www-form-urlencoded', 'raw-text', 'json', 'binary']),
      data: z.union([z.array(z.record(z.unknown())), z.string()]),
    })
    .passthrough()
    .nullish()
    .describe('Request body'),
  timeout: z.record(z.unknown()).nullish().describe('Connect/read/write timeouts'),
});

export const ifElseNodeSchema = nodeData('if-else', {
  cases: z
    .array(
      z
        .object({
          case_id: z.string(),
          logical_operator: z.enum(['and', 'or']),
          conditions: z.array(condition),
        })
        .passthrough(),
    )
    .describe('Branches evaluated in order'),
});

export const toolNodeSchema = nodeData('tool', {
  provider_id: z.string(),
  provider_type: z.string(),
  provider_name: z.string(),
  tool_name: z.string(),
  tool_label: z.string(),
  tool_configurations: z.record(z.unknown()).default({}),
  tool_parameters: z
    .record(
      z
        .object({
          type: z.enum(['mixed', 'variable', 'constant']),
          value: z.unknown(),
        })
        .passthrough(),
    )
    .default({}),
});

export const agentNodeSchema = nodeData('agent', {
  agent_strategy_provider_name: z.string(),
  agent_strategy_name: z.string(),
  agent_strategy_label: z.string(),
  agent_parameters: z.record(z.unknown()).default({}),
});

export const documentExtractorNodeSchema = nodeData('document-extractor', {
  variable_selector: valueSelector,
  is_array_file: z.boolean().default(false),
});

const ERROR_HANDLE_MODES = ['terminated', 'continue-on-error', 'remove-abnormal-output'] as const;

export const iterationNodeSchema = nodeData('iteration', {
  iterator_selector: valueSelector.describe('Array to iterate over'),
  output_selector: valueSelector.describe('Value collected from each iteration'),
  start_node_id: z.string().optional(),
  is_parallel: z.boolean().default(false),
  parallel_nums: z.number().int().positive().default(10),
  error_handle_mode: z.enum(ERROR_HANDLE_MODES).default('terminated'),
});

export const loopNodeSchema = nodeData('loop', {
  loop_count: z.number().int().nonnegative().describe('Maximum number of rounds'),
  break_conditions: z.array(condition).default([]),
  logical_operator: z.enum(['and', 'or']).default('and'),
  loop_variables: z.array(z.record(z.unknown())).default([]),
  start_node_id: z.string().optional(),
});

export const listOperatorNodeSchema = nodeData('list-operator', {
  variable: valueSelector,
  filter_by: z
    .object({ enabled: z.boolean(), conditions: z.array(z.record(z.unknown())).default([]) })
    .passthrough()
    .default({ enabled: false, conditions: [] }),
  order_by: z
    .object({ enabled: z.boolean(), key: z.string().default(''), value: z.enum(['asc', 'desc']).default('asc') })
    .passthrough()
    .default({ enabled: false, key: '', value: 'asc' }),
  limit: z
    .object({ enabled: z.boolean(), size: z.number().int().nonnegative().default(-1) })
    .passthrough()
    .optional(),
});

export const knowledgeRetrievalNodeSchema = nodeData('knowledge-retrieval', {
  query_variable_selector: valueSelector,
  dataset_ids: z.array(z.string()),
  retrieval_mode: z.enum(['single', 'multiple']),
});

export const parameterExtractorNodeSchema = nodeData('parameter-extractor', {
  model: modelConfig,
  query: valueSelector,
  parameters: z.array(
    z
      .object({
        name: z.string(),
        type: z.enum(['string', 'number', 'bool', 'select', 'array[string]', 'array[number]', 'array[object]']),
        description: z.string(),
        required: z.boolean(),
        options: z.array(z.string()).optional(),
      })
      .passthrough(),
  ),
  reasoning_mode: z.enum(['function_call', 'prompt']).default('function_call'),
  instruction: z.string().optional(),
});

export const questionClassifierNodeSchema = nodeData('question-classifier', {
  query_variable_selector: valueSelector,
  model: modelConfig,
  classes: z.array(z.object({ id: z.string(), name: z.string() }).passthrough()),
  instruction: z.string().optional(),
});

export const variableAggregatorNodeSchema = nodeData('variable-aggregator', {
  output_type: z.string(),
  variables: z.array(valueSelector),
});

/** Types the DSL knows about but whose schema needs a plugin runtime this server does not bundle. */
const PLUGIN_BACKED_NODE_TYPES = ['datasource', 'knowledge-index', 'human-input'] as const;

export function createDefaultNodeSchemaRegistry(): NodeSchemaRegistry {
  const registry = new NodeSchemaRegistry()
    .register('agent', () => agentNodeSchema)
    .register('answer', () => answerNodeSchema)
    .register('code', () => codeNodeSchema)
    .register('document-extractor', () => documentExtractorNodeSchema)
    .register('end', () => endNodeSchema)
    .register('http-request', () => httpRequestNodeSchema)
    .register('if-else', () => ifElseNodeSchema)
    .register('iteration', () => iterationNodeSchema)
    .register('knowledge-retrieval', () => knowledgeRetrievalNodeSchema)
    .register('list-operator', () => listOperatorNodeSchema)
    .register('llm', () => llmNodeSchema)
    .register('loop', () => loopNodeSchema)
    .register('parameter-extractor', () => parameterExtractorNodeSchema)
    .register('question-classifier', () => questionClassifierNodeSchema)
    .register('start', () => startNodeSchema)
    .register('template-transform', () => templateTransformNodeSchema)
    .register('tool', () => toolNodeSchema)
    .register('variable-aggregator', () => variableAggregatorNodeSchema);

  for (const nodeType of PLUGIN_BACKED_NODE_TYPES) {
    registry.markUnavailable(nodeType, `The ${nodeType} schema is provided by a plugin runtime that is not installed`);
  }
  return registry;
}

/** Process-wide registry, built once and only read afterwards. */
export const nodeSchemaRegistry = createDefaultNodeSchemaRegistry();
