import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { WorkflowDocument } from "../document/workflow-document.js";
import { log } from "../logging.js";

export function textResult(text: string): CallToolResult {
    return {
        content: [
            {
                type: "text",
                text,
            },
        ],
    };
}

export function jsonResult(value: unknown): CallToolResult {
    return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(text: string): CallToolResult {
    return {
        content: [
            {
                type: "text",
                text,
            },
        ],
        isError: true,
    };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Load a document, apply one change, and answer with a one-line summary
 * followed by the whole re-rendered document. `action` names the change in
 * error text.
 */
export async function mutateWorkflow(
    workflowYaml: string,
    action: string,
    mutate: (document: WorkflowDocument) => string,
    sessionId?: string,
): Promise<CallToolResult> {
    let summary: string;
    let rendered: string;
    try {
        const document = WorkflowDocument.fromYaml(workflowYaml);
        summary = mutate(document);
        rendered = document.toYaml();
    } catch (error) {
        await log("warning", `Failed to ${action}: ${errorMessage(error)}`, sessionId);
        return errorResult(`Error: failed to ${action}: ${errorMessage(error)}`);
    }

    await log("info", summary, sessionId);
    return {
        content: [
            {
                type: "text",
                text: summary,
            },
            {
                type: "text",
                text: rendered,
            },
        ],
    };
}
