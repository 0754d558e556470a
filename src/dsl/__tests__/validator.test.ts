import { describe, it, expect } from 'vitest';
import { validateWorkflowYaml } from '../validator.js';
import { DSL_MAX_SIZE } from '../constants.js';
import { DependencySchemaCapability } from '../../schemas/dependency.js';
import { aliasedWorkflowYaml, layoutNode, toYaml, workflowDocument } from './helpers.js';

const codes = (issues: { code: string }[]) => issues.map((issue) => issue.code);

describe('validateWorkflowYaml', () => {
  describe('fatal structure checks', () => {
    it('rejects oversized content before parsing it', () => {
      const result = validateWorkflowYaml('a'.repeat(DSL_MAX_SIZE + 1));

      expect(result.success).toBe(false);
      expect(codes(result.errors)).toEqual(['FILE_TOO_LARGE']);
      expect(result.errors[0].stage).toBe('size_check');
      expect(result.errors[0].message).toBe('File size exceeds the limit of 10MB');
      expect(result.warnings).toEqual([]);
      expect(result.info).toEqual({});
    });

    it('counts characters outside the BMP once toward the size limit', () => {
      const result = validateWorkflowYaml('😀'.repeat(DSL_MAX_SIZE / 2 + 1));

      expect(codes(result.errors)).toEqual(['INVALID_YAML_TYPE']);
      expect(result.errors[0].details).toEqual({ actual_type: 'string' });
    });

    it('rejects blank content', () => {
      const result = validateWorkflowYaml('  \n\t\n');

      expect(result.errors).toEqual([{ stage: 'content_check', code: 'EMPTY_CONTENT', message: 'Empty YAML content' }]);
    });

    it('reports unparseable text as a single syntax error', () => {
      const result = validateWorkflowYaml('app: [unclosed');

      expect(codes(result.errors)).toEqual(['YAML_SYNTAX_ERROR']);
      expect(result.errors[0].stage).toBe('yaml_parsing');
      expect(result.errors[0].message.startsWith('Invalid YAML format: ')).toBe(true);
    });

    it('requires the document root to be a mapping', () => {
      const result = validateWorkflowYaml('- one\n- two\n');

      expect(codes(result.errors)).toEqual(['INVALID_YAML_TYPE']);
      expect(result.errors[0].details).toEqual({ actual_type: 'sequence' });
    });

    it('rejects a non-string version', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { version: 4 } })));

      expect(result.errors).toEqual([
        {
          stage: 'version_check',
          code: 'INVALID_VERSION_TYPE',
          message: 'Invalid version type, expected string, got number',
        },
      ]);
    });

    it('rejects a malformed version', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { version: 'v4' } })));

      expect(codes(result.errors)).toEqual(['INVALID_VERSION_FORMAT']);
      expect(result.info.dsl_version).toBe('v4');
    });

    it('stops at missing app data', () => {
      const document = workflowDocument();
      delete document.app;
      const result = validateWorkflowYaml(toYaml(document));

      expect(codes(result.errors)).toEqual(['MISSING_APP_DATA']);
    });

    it('stops at a missing app mode', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { app: { name: 'No mode' } } })));

      expect(codes(result.errors)).toEqual(['MISSING_APP_MODE']);
    });

    it('stops at an unknown app mode and lists the valid ones', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { app: { mode: 'pipeline' } } })));

      expect(codes(result.errors)).toEqual(['INVALID_APP_MODE']);
      expect(result.errors[0].details).toEqual({
        app_mode: 'pipeline',
        valid_modes: ['completion', 'chat', 'agent-chat', 'advanced-chat', 'workflow'],
      });
    });

    it('requires workflow data for graph modes', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { workflow: {} } })));

      expect(codes(result.errors)).toEqual(['MISSING_WORKFLOW_DATA']);
      expect(result.info.app_mode).toBe('workflow');
    });

    it('requires model_config for chat apps until one is present', () => {
      const chat = { version: '0.4.0', kind: 'app', app: { name: 'Chat', mode: 'chat' } };

      const missing = validateWorkflowYaml(toYaml(chat));
      expect(missing.success).toBe(false);
      expect(codes(missing.errors)).toEqual(['MISSING_MODEL_CONFIG']);
      expect(missing.errors[0].message).toBe('Missing model_config for chat app');

      const present = validateWorkflowYaml(toYaml({ ...chat, model_config: { model: { name: 'gpt-4' } } }));
      expect(present.success).toBe(true);
      expect(present.errors).toEqual([]);
      expect(present.info).toEqual({ dsl_version: '0.4.0', app_mode: 'chat' });
    });
  });

  describe('versions and kind', () => {
    it('accepts a minimal workflow', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument()));

      expect(result).toEqual({
        success: true,
        errors: [],
        warnings: [],
        info: { dsl_version: '0.4.0', app_mode: 'workflow', node_count: 1, edge_count: 0 },
      });
    });

    it('defaults a missing version to 0.1.0 and warns that it is older', () => {
      const document = workflowDocument();
      delete document.version;
      const result = validateWorkflowYaml(toYaml(document));

      expect(result.success).toBe(true);
      expect(result.info.dsl_version).toBe('0.1.0');
      expect(result.warnings).toEqual([
        {
          stage: 'version_check',
          code: 'VERSION_MINOR_OLDER',
          message: 'DSL version 0.1.0 is older than current 0.4.0',
          details: { imported_version: '0.1.0', current_version: '0.4.0' },
        },
      ]);
    });

    it('warns about a newer version without failing', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { version: '1.0.0' } })));

      expect(result.success).toBe(true);
      expect(codes(result.warnings)).toEqual(['VERSION_NEWER']);
    });

    it('warns about an unexpected kind', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { kind: 'plugin' } })));

      expect(result.success).toBe(true);
      expect(codes(result.warnings)).toEqual(['INVALID_KIND']);
      expect(result.warnings[0].details).toEqual({ kind: 'plugin' });
    });
  });

  describe('graph', () => {
    it('treats a non-mapping graph as fatal', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ workflow: { graph: [], environment_variables: 'oops' } })),
      );

      expect(codes(result.errors)).toEqual(['INVALID_GRAPH_TYPE']);
      expect(result.info.node_count).toBeUndefined();
    });

    it('requires nodes and edges to be lists', () => {
      expect(codes(validateWorkflowYaml(toYaml(workflowDocument({ nodes: {} }))).errors)).toEqual([
        'INVALID_NODES_TYPE',
      ]);
      expect(codes(validateWorkflowYaml(toYaml(workflowDocument({ edges: 'start->end' }))).errors)).toEqual([
        'INVALID_EDGES_TYPE',
      ]);
    });

    it('reports an edge whose source is not a node', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ edges: [{ id: 'e1', source: 'ghost', target: 'start' }] })),
      );

      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        {
          stage: 'workflow_validation',
          code: 'INVALID_EDGE_SOURCE',
          message: "Edge references non-existent source node 'ghost'",
          details: { index: 0, source: 'ghost' },
        },
      ]);
      expect(result.info.edge_count).toBe(1);
    });

    it('reports an edge whose target is not a node', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ edges: [{ id: 'e1', source: 'start', target: 'ghost' }] })),
      );

      expect(codes(result.errors)).toEqual(['INVALID_EDGE_TARGET']);
      expect(result.errors[0].message).toBe("Edge references non-existent target node 'ghost'");
      expect(result.errors[0].details).toEqual({ index: 0, target: 'ghost' });
    });

    it('reports edges missing either end', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ edges: [{ source: 'start' }, 'edge'] })));

      expect(codes(result.errors)).toEqual(['MISSING_EDGE_TARGET', 'INVALID_EDGE_TYPE']);
    });

    it('keeps checking nodes after a bad one', () => {
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            nodes: [
              'not a node',
              { data: { type: 'start', title: 'Start' }, position: { x: 0, y: 0 }, width: 1, height: 1 },
              { id: 'bare', position: { x: 0, y: 0 }, width: 1, height: 1 },
              { id: 'untyped', data: { title: 'Untyped' }, position: { x: 0, y: 0 }, width: 1, height: 1 },
            ],
          }),
        ),
      );

      expect(codes(result.errors)).toEqual(['INVALID_NODE_TYPE', 'MISSING_NODE_ID', 'MISSING_NODE_DATA', 'MISSING_NODE_TYPE']);
      expect(result.errors[1].details).toEqual({ index: 1 });
      expect(result.errors[2].details).toEqual({ node_id: 'bare' });
      expect(result.info.node_count).toBe(4);
    });

    it('rejects duplicate node ids', () => {
      const start = layoutNode('start', { type: 'start', title: 'Start' });
      const result = validateWorkflowYaml(toYaml(workflowDocument({ nodes: [start, { ...start }] })));

      expect(codes(result.errors)).toEqual(['DUPLICATE_NODE_ID']);
      expect(result.errors[0].details).toEqual({ node_id: 'start', index: 1 });
    });

    it('checks node data against its schema', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ nodes: [layoutNode('reply', { type: 'answer', title: 'Reply' })] })),
      );

      expect(result.errors).toEqual([
        {
          stage: 'node_schema_validation',
          code: 'NODE_SCHEMA_VALIDATION_ERROR',
          message: "Node 'reply' (answer) field 'answer': Required",
          details: { node_id: 'reply', node_type: 'answer', field: 'answer', error_type: 'invalid_type' },
        },
      ]);
    });

    it('warns about unknown and unavailable node types', () => {
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            nodes: [
              layoutNode('custom', { type: 'teleport', title: 'Teleport' }),
              layoutNode('approval', { type: 'human-input', title: 'Approval' }),
            ],
          }),
        ),
      );

      expect(result.success).toBe(true);
      expect(codes(result.warnings)).toEqual(['UNKNOWN_NODE_TYPE', 'NODE_SCHEMA_UNAVAILABLE']);
      expect(result.warnings[0].details).toEqual({ node_id: 'custom', node_type: 'teleport' });
    });

    it('checks node layout for the editor', () => {
      const data = { type: 'start', title: 'Start' };
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            nodes: [
              { id: 'a', data },
              { id: 'b', data, position: [1, 2] },
              { id: 'c', data, position: { x: 1 } },
              { id: 'd', data, position: { x: 'left', y: 2 }, width: 1, height: 1 },
              { id: 'e', data, position: { x: 1, y: 2 } },
            ],
          }),
        ),
      );

      expect(codes(result.errors)).toEqual([
        'MISSING_NODE_POSITION',
        'INVALID_NODE_POSITION_TYPE',
        'INCOMPLETE_NODE_POSITION',
        'INVALID_NODE_POSITION_VALUES',
      ]);
      expect(result.errors.every((issue) => issue.stage === 'frontend_compatibility')).toBe(true);
      expect(result.warnings).toEqual([
        {
          stage: 'frontend_compatibility',
          code: 'MISSING_NODE_DIMENSIONS',
          message: "Node 'e' is missing 'width' or 'height'. Frontend will calculate these dynamically.",
          details: { node_id: 'e' },
        },
      ]);
    });
  });

  describe('features', () => {
    it('warns about incomplete file upload settings and rejects non-list suggested questions', () => {
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            workflow: {
              features: {
                file_upload: {
                  enabled: true,
                  allowed_file_types: 'document',
                  image: { enabled: true },
                },
                suggested_questions: 'What can you do?',
              },
            },
          }),
        ),
      );

      expect(codes(result.warnings)).toEqual([
        'INVALID_FILE_UPLOAD_FIELD_TYPE',
        'MISSING_FILE_UPLOAD_FIELD',
        'MISSING_FILE_UPLOAD_FIELD',
        'MISSING_FILE_UPLOAD_CONFIG',
        'MISSING_IMAGE_TRANSFER_METHODS',
      ]);
      expect(result.warnings[1].details).toEqual({ field: 'allowed_file_extensions' });
      expect(codes(result.errors)).toEqual(['INVALID_SUGGESTED_QUESTIONS_TYPE']);
    });

    it('ignores file upload settings while uploads are disabled', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ workflow: { features: { file_upload: { enabled: false } } } })),
      );

      expect(result.warnings).toEqual([]);
    });
  });

  describe('variables', () => {
    it('reports incomplete and mistyped variable declarations', () => {
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            workflow: {
              environment_variables: [{ id: 'api_key', value_type: 'secret' }, 'token'],
              conversation_variables: [{ id: 'history', name: 'History', value_type: 'list' }],
            },
          }),
        ),
      );

      expect(codes(result.errors)).toEqual([
        'MISSING_ENV_VAR_FIELD',
        'INVALID_ENV_VAR_TYPE',
        'INVALID_CONVERSATION_VAR_VALUE_TYPE',
      ]);
      expect(result.errors[0].details).toEqual({ index: 0, field: 'name' });
      expect(result.errors[2].message).toBe(
        "Conversation variable at index 0 has invalid value_type 'list'. Must be one of: string, number, array[string], array[number], array[object], object",
      );
    });

    it('requires variable lists to be lists', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ workflow: { environment_variables: { api_key: 'x' } } })),
      );

      expect(codes(result.errors)).toEqual(['INVALID_ENV_VARS_TYPE']);
    });
  });

  describe('variable references', () => {
    const answer = (text: string) => layoutNode('reply', { type: 'answer', title: 'Reply', answer: text });

    it('reports an undefined environment variable', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ nodes: [answer('Key: {{#env.missing_key#}}')] })),
      );

      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        {
          stage: 'variable_reference_validation',
          code: 'UNDEFINED_ENVIRONMENT_VARIABLE',
          message: "Node 'reply' references undefined environment variable 'missing_key' at 'answer'",
          details: { node_id: 'reply', variable_id: 'missing_key', reference: '{{#env.missing_key#}}', path: 'answer' },
        },
      ]);
    });

    it('resolves declared variables and existing nodes', () => {
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            nodes: [
              layoutNode('start', { type: 'start', title: 'Start' }),
              answer('{{#env.api_key#}} {{#conversation.history#}} {{#start.query#}}'),
            ],
            workflow: {
              environment_variables: [{ id: 'api_key', name: 'API key', value_type: 'secret', value: '' }],
              conversation_variables: [{ id: 'history', name: 'History', value_type: 'string' }],
            },
          }),
        ),
      );

      expect(result.errors).toEqual([]);
    });

    it('resolves references to unquoted numeric node ids', () => {
      const result = validateWorkflowYaml(
        toYaml(
          workflowDocument({
            nodes: [
              { ...layoutNode('start', { type: 'start', title: 'Start' }), id: 1711528914102 },
              answer('{{#1711528914102.query#}}'),
            ],
          }),
        ),
      );

      expect(result.errors).toEqual([]);
    });

    it('scans data shared through aliases once', () => {
      const result = validateWorkflowYaml(aliasedWorkflowYaml(8));

      expect(result.errors).toEqual([
        {
          stage: 'variable_reference_validation',
          code: 'UNDEFINED_ENVIRONMENT_VARIABLE',
          message: "Node 'reply' references undefined environment variable 'missing' at 'a0[0]'",
          details: { node_id: 'reply', variable_id: 'missing', reference: '{{#env.missing#}}', path: 'a0[0]' },
        },
      ]);
    });

    it('reports undefined conversation variables and unknown nodes', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ nodes: [answer('{{#conversation.topic#}} then {{#llm_2.text#}}')] })),
      );

      expect(codes(result.errors)).toEqual(['UNDEFINED_CONVERSATION_VARIABLE', 'UNDEFINED_NODE_REFERENCE']);
      expect(result.errors[1].details).toEqual({
        node_id: 'reply',
        referenced_node_id: 'llm_2',
        reference: '{{#llm_2.text#}}',
        path: 'answer',
      });
    });
  });

  describe('dependencies', () => {
    const marketplace = { type: 'marketplace', value: { marketplace_plugin_unique_identifier: 'acme/search:1.0.0' } };

    it('accepts well-formed plugin dependencies', () => {
      const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { dependencies: [marketplace] } })));

      expect(result.errors).toEqual([]);
    });

    it('checks each dependency against the plugin dependency schema', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ root: { dependencies: [marketplace, { type: 'marketplace', value: {} }, 7] } })),
      );

      expect(codes(result.errors)).toEqual(['DEPENDENCY_VALIDATION_ERROR', 'INVALID_DEPENDENCY_TYPE']);
      expect(result.errors[0].details).toEqual({
        dependency_index: 1,
        field: 'value.marketplace_plugin_unique_identifier',
        error_type: 'invalid_type',
      });
    });

    it('falls back to presence checks without a dependency schema', () => {
      const result = validateWorkflowYaml(
        toYaml(workflowDocument({ root: { dependencies: [{ type: 'marketplace' }, {}] } })),
        { dependencySchema: null },
      );

      expect(codes(result.errors)).toEqual([
        'MISSING_DEPENDENCY_VALUE',
        'MISSING_DEPENDENCY_TYPE',
        'MISSING_DEPENDENCY_VALUE',
      ]);
    });

    it('validates dependencies of non-graph apps too', () => {
      const result = validateWorkflowYaml(
        toYaml({ version: '0.4.0', app: { mode: 'completion' }, model_config: {}, dependencies: 'none' }),
      );

      expect(codes(result.errors)).toEqual(['INVALID_DEPENDENCIES_TYPE']);
    });
  });

  it('turns unexpected exceptions into a single error', () => {
    const exploding: DependencySchemaCapability = {
      validate() {
        throw new Error('schema exploded');
      },
    };
    const result = validateWorkflowYaml(toYaml(workflowDocument({ root: { dependencies: [{}] } })), {
      dependencySchema: exploding,
    });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([{ stage: 'unexpected_error', code: 'VALIDATION_ERROR', message: 'schema exploded' }]);
  });

  it('returns the same result for the same input', () => {
    const content = toYaml(
      workflowDocument({ nodes: [layoutNode('reply', { type: 'answer', title: 'Reply', answer: '{{#env.x#}}' })] }),
    );

    expect(validateWorkflowYaml(content)).toEqual(validateWorkflowYaml(content));
  });
});
