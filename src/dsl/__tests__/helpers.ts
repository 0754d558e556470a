import yaml from 'js-yaml';

export interface TestNode {
  id?: unknown;
  type?: string;
  data?: unknown;
  position?: unknown;
  width?: number;
  height?: number;
  [key: string]: unknown;
}

export function layoutNode(id: string, data: Record<string, unknown>): TestNode {
  return { id, type: 'custom', data, position: { x: 80, y: 282 }, width: 244, height: 90 };
}

export interface TestWorkflowOptions {
  nodes?: unknown;
  edges?: unknown;
  workflow?: Record<string, unknown>;
  root?: Record<string, unknown>;
}

/** A valid single-start-node workflow document, with overrides. */
export function workflowDocument(options: TestWorkflowOptions = {}): Record<string, unknown> {
  return {
    version: '0.4.0',
    kind: 'app',
    app: { name: 'Test App', mode: 'workflow' },
    workflow: {
      graph: {
        nodes: options.nodes ?? [layoutNode('start', { type: 'start', title: 'Start' })],
        edges: options.edges ?? [],
      },
      ...options.workflow,
    },
    ...options.root,
  };
}

export function toYaml(document: unknown): string {
  return yaml.dump(document, { noRefs: true });
}

/**
 * A workflow whose answer node nests `levels` layers of ten-way aliases over
 * one sequence holding `{{#env.missing#}}`.
 */
export function aliasedWorkflowYaml(levels: number): string {
  const lines = [
    "version: '0.4.0'",
    'kind: app',
    'app:',
    '  name: Aliases',
    '  mode: workflow',
    'workflow:',
    '  graph:',
    '    edges: []',
    '    nodes:',
    '      - id: reply',
    '        type: custom',
    '        position: { x: 0, y: 0 }',
    '        width: 1',
    '        height: 1',
    '        data:',
    '          type: answer',
    '          title: Reply',
    '          answer: done',
    "          a0: &a0 ['{{#env.missing#}}']",
  ];
  for (let level = 1; level <= levels; level++) {
    const aliases = Array.from({ length: 10 }, () => `*a${level - 1}`).join(', ');
    lines.push(`          a${level}: &a${level} [${aliases}]`);
  }
  return `${lines.join('\n')}\n`;
}
