import { server } from "../server.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { WorkflowDocument } from "../document/workflow-document.js";
import { errorMessage, errorResult, jsonResult, mutateWorkflow } from "./results.js";

const workflowYaml = z.string().describe("The current workflow document as YAML");

export function workflowEdges() {
    server.tool(
        "workflow-add-edge",
        "Connect two nodes. For if-else branches, set source_handle to the case id (or \"false\" for the else branch).",
        {
            workflow_yaml: workflowYaml,
            source: z.string().describe("Source node id"),
            target: z.string().describe("Target node id"),
            source_handle: z.string().optional().describe('Source handle (default: "source")'),
            target_handle: z.string().optional().describe('Target handle (default: "target")'),
        },
        async ({ workflow_yaml, source, target, source_handle, target_handle }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `connect '${source}' to '${target}'`,
                (document) => {
                    const edgeId = document.addEdge(source, target, source_handle, target_handle);
                    return `Added edge '${edgeId}'`;
                },
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-remove-edge",
        "Remove every edge running from one node to another.",
        {
            workflow_yaml: workflowYaml,
            source: z.string().describe("Source node id"),
            target: z.string().describe("Target node id"),
        },
        async ({ workflow_yaml, source, target }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `disconnect '${source}' from '${target}'`,
                (document) => {
                    document.removeEdge(source, target);
                    return `Removed edge from '${source}' to '${target}'`;
                },
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-list-edges",
        "List every edge in the workflow.",
        {
            workflow_yaml: workflowYaml,
        },
        async ({ workflow_yaml }): Promise<CallToolResult> => {
            try {
                const edges = WorkflowDocument.fromYaml(workflow_yaml)
                    .listEdges()
                    .map(({ id, source, target, sourceHandle, targetHandle }) => ({
                        id,
                        source,
                        target,
                        sourceHandle,
                        targetHandle,
                    }));
                return jsonResult({ edges, count: edges.length });
            } catch (error) {
                return errorResult(`Error: failed to list edges: ${errorMessage(error)}`);
            }
        }
    );
}
