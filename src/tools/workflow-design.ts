import { server } from '../server.js';
import { GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

export function workflowDesign() {
    server.prompt(
        'workflow-design',
        'Interactive workflow design assistant.',
        {
            name: z.string().describe('Name of the application to build'),
            context: z.string().describe('Description of what the workflow should accomplish, or dialogue history for context.'),
        },
        async ({ name, context }): Promise<GetPromptResult> => {
            return {
                messages: [
                    {
                        role: 'user',
                        content: {
                            type: 'text',
                            text: `Design a workflow application named '${name}' based on the following context:

**Context:**
${context}

**Instructions:**
1. First, use the workflow-define tool to understand the DSL format
2. Analyze the context to identify the nodes needed and how data flows between them
3. Use workflow-create to start an empty document
4. Add nodes with the workflow-add-*-node tools; check unfamiliar node types with workflow-node-schema
5. Connect the nodes with workflow-add-edge, using the node ids the add tools report
6. Declare any environment or conversation variables the nodes reference
7. Run workflow-validate and fix every error before presenting the document

**Design Guidelines:**
- Start with a start node and finish with an end node (or an answer node in advanced-chat mode)
- Keep each node focused on a single task with a descriptive title
- Reference upstream values with {{#node_id.field#}} and secrets with {{#env.name#}}
- Give every if-else case an edge from its case id, and the else branch an edge from "false"

**Context Analysis:**
Based on the provided context, identify:
- What inputs does the user provide?
- Which steps need a model call, code, or an HTTP request?
- Where does the flow branch?
- What outputs should be returned?

Start by using workflow-define to get the format, then build and validate the document.`,
                        },
                    },
                ],
            };
        }
    );
}
