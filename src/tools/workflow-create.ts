import { server } from '../server.js';
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { WorkflowDocument } from "../document/workflow-document.js";
import { log } from "../logging.js";
import { errorMessage, errorResult, textResult } from "./results.js";

export function workflowCreate() {
    server.tool(
        'workflow-create',
        'Create an empty workflow document. Returns the document as YAML; pass it to the other workflow tools to add nodes, edges and variables.',
        {
            name: z.string().min(1).describe('Application name'),
            description: z.string().optional().describe('Application description'),
            icon: z.string().optional().describe('Icon, usually an emoji'),
            icon_background: z.string().optional().describe('Icon background colour, e.g. "#FFEAD5"'),
            mode: z.enum(['workflow', 'advanced-chat']).optional().describe('Application mode (default: workflow)'),
        },
        async ({ name, description, icon, icon_background, mode }, extra): Promise<CallToolResult> => {
            try {
                const document = WorkflowDocument.create({ name, description, icon, icon_background, mode });
                await log("info", `Created workflow '${name}'`, extra.sessionId);
                return textResult(document.toYaml());
            } catch (error) {
                await log("error", `Failed to create workflow '${name}': ${errorMessage(error)}`, extra.sessionId);
                return errorResult(`Error: failed to create workflow: ${errorMessage(error)}`);
            }
        }
    );
}
