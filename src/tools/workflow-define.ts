import { server } from '../server.js';
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { APP_MODES, CURRENT_DSL_VERSION } from "../dsl/constants.js";
import { nodeSchemaRegistry } from "../schemas/nodes.js";
import { NodeSchemaRegistry } from "../schemas/registry.js";
import { textResult } from "./results.js";

/** Markdown reference of the DSL, with the node types taken from `registry`. */
export function dslReference(registry: NodeSchemaRegistry): string {
    const nodeTypes = registry
        .types()
        .map((nodeType) => {
            const entry = registry.get(nodeType);
            return entry?.status === 'available'
                ? `- \`${nodeType}\``
                : `- \`${nodeType}\` (schema unavailable; data is not checked)`;
        })
        .join("\n");

    return `# Workflow DSL

## Overview
A workflow document is a YAML file describing a directed graph of typed nodes
joined by edges. Data flows along the edges; nodes read upstream values through
variable references.

## Document Structure
- **version**: string, semantic version (current: \`${CURRENT_DSL_VERSION}\`)
- **kind**: always \`app\`
- **app**: mapping with \`name\`, \`mode\`, \`description\`, \`icon\`, \`icon_background\`
- **workflow**: mapping, required for \`workflow\` and \`advanced-chat\` modes
  - **graph**: \`nodes\` (list), \`edges\` (list), \`viewport\`
  - **environment_variables**: list of \`{id, name, value_type, value}\`
  - **conversation_variables**: list of \`{id, name, value_type, value}\`
  - **features**: optional UI features (file upload, suggested questions, ...)
- **model_config**: mapping, required for \`chat\`, \`agent-chat\` and \`completion\` modes
- **dependencies**: list of plugin dependencies

App modes: ${APP_MODES.map((mode) => `\`${mode}\``).join(", ")}

## Nodes
\`\`\`yaml
- id: "1732007415808"
  type: custom
  position: { x: 80, y: 282 }
  width: 244
  height: 90
  data:
    type: start
    title: Start
    variables: []
\`\`\`

Every node needs \`id\`, \`data.type\`, \`data.title\` and a numeric \`position\`.
\`width\` and \`height\` are optional; the editor computes them when missing.

### Node Types
${nodeTypes}

Use workflow-node-schema to see the fields of a node type.

## Edges
\`\`\`yaml
- id: start-source-llm-target
  source: start
  target: llm
  sourceHandle: source
  targetHandle: target
  type: custom
\`\`\`

Both ends must name existing node ids. Branching nodes use their case id (or
\`false\` for the else branch) as the \`sourceHandle\`.

## Variable References
Text fields may embed \`{{#<source>.<field>#}}\`:
- \`{{#env.api_key#}}\`: an environment variable
- \`{{#conversation.history#}}\`: a conversation variable
- \`{{#<node_id>.text#}}\`: an output of another node

References to undeclared variables or unknown nodes fail validation.

## Building a Workflow
1. workflow-create returns an empty document
2. workflow-add-*-node tools add nodes and report the new node id
3. workflow-add-edge connects them
4. workflow-validate checks the result

Every mutation takes the current document as \`workflow_yaml\` and returns the
updated document.
`;
}

export function workflowDefine() {
    server.tool(
        'workflow-define',
        'Provides a reference of the workflow DSL format and its node types',
        {},
        async (): Promise<CallToolResult> => textResult(dslReference(nodeSchemaRegistry))
    );
}
