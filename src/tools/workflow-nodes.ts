import { server } from "../server.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
    answerNode,
    codeNode,
    endNode,
    httpRequestNode,
    ifElseNode,
    llmNode,
    startNode,
    templateTransformNode,
} from "../builders/nodes.js";
import { WorkflowDocument } from "../document/workflow-document.js";
import { isMapping } from "../dsl/guards.js";
import { CODE_LANGUAGES, START_INPUT_TYPES } from "../schemas/nodes.js";
import { NodeSummary, WorkflowNode } from "../types/workflow.js";
import { errorMessage, errorResult, jsonResult, mutateWorkflow } from "./results.js";

const workflowYaml = z.string().describe("The current workflow document as YAML");

/** Arguments shared by every add-node tool. */
const nodePlacement = {
    workflow_yaml: workflowYaml,
    node_id: z.string().optional().describe("Node id (generated when omitted)"),
    title: z.string().optional().describe("Title shown on the canvas"),
    x: z.number().optional().describe("Canvas x coordinate"),
    y: z.number().optional().describe("Canvas y coordinate"),
};

const valueSelectorBinding = z.object({
    variable: z.string().describe("Name used inside the node"),
    value_selector: z.array(z.string()).describe('Source of the value, e.g. ["node_id", "text"]'),
});

function placement(args: { node_id?: string; title?: string; x?: number; y?: number }) {
    return { id: args.node_id, title: args.title, x: args.x, y: args.y };
}

function addNode(document: WorkflowDocument, node: WorkflowNode): string {
    const nodeId = document.addNode(node);
    return `Added ${node.data.type} node '${nodeId}'`;
}

export function summarizeNodes(document: WorkflowDocument): NodeSummary[] {
    return document.listNodes().map((node) => {
        const data = isMapping(node.data) ? node.data : {};
        return { id: node.id, type: data.type, title: data.title };
    });
}

export function workflowNodes() {
    server.tool(
        "workflow-add-start-node",
        "Add a start node that collects the workflow's user inputs.",
        {
            ...nodePlacement,
            variables: z
                .array(
                    z.object({
                        variable: z.string().describe("Variable name"),
                        label: z.string().describe("Label shown to the user"),
                        type: z.enum(START_INPUT_TYPES).optional().describe("Input type (default: text-input)"),
                        required: z.boolean().optional(),
                        default: z.string().optional(),
                        placeholder: z.string().optional(),
                        max_length: z.number().int().positive().optional(),
                        options: z.array(z.string()).optional().describe("Choices for select inputs"),
                    })
                )
                .optional()
                .describe("User inputs"),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add start node",
                (document) => addNode(document, startNode({ ...placement(args), variables: args.variables })),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-end-node",
        "Add an end node that declares the workflow's outputs.",
        {
            ...nodePlacement,
            outputs: z.array(valueSelectorBinding).optional().describe("Outputs and where their values come from"),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add end node",
                (document) => addNode(document, endNode({ ...placement(args), outputs: args.outputs })),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-llm-node",
        "Add an LLM node that calls a model with a system and user prompt.",
        {
            ...nodePlacement,
            provider: z.string().optional().describe('Model provider, e.g. "openai" (default: openai)'),
            model: z.string().optional().describe("Model name (default: gpt-4)"),
            mode: z.enum(["chat", "completion"]).optional(),
            temperature: z.number().min(0).max(2).optional(),
            max_tokens: z.number().int().positive().optional(),
            system_prompt: z.string().optional(),
            user_prompt: z.string().optional().describe("May embed {{#node_id.field#}} references"),
            context_enabled: z.boolean().optional(),
            context_variable_selector: z.array(z.string()).optional(),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add llm node",
                (document) =>
                    addNode(
                        document,
                        llmNode({
                            ...placement(args),
                            provider: args.provider,
                            model: args.model,
                            mode: args.mode,
                            temperature: args.temperature,
                            maxTokens: args.max_tokens,
                            systemPrompt: args.system_prompt,
                            userPrompt: args.user_prompt,
                            contextEnabled: args.context_enabled,
                            contextVariableSelector: args.context_variable_selector,
                        })
                    ),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-template-transform-node",
        "Add a template node that renders a Jinja2 template over upstream values.",
        {
            ...nodePlacement,
            variables: z.array(valueSelectorBinding).optional().describe("Values exposed to the template"),
            template: z.string().optional().describe("Jinja2 template, e.g. \"Hello {{ name }}!\""),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add template-transform node",
                (document) =>
                    addNode(
                        document,
                        templateTransformNode({ ...placement(args), variables: args.variables, template: args.template })
                    ),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-answer-node",
        "Add an answer node that replies to the user (advanced-chat mode).",
        {
            ...nodePlacement,
            answer: z.string().optional().describe("Reply text; may embed {{#node_id.field#}} references"),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add answer node",
                (document) => addNode(document, answerNode({ ...placement(args), answer: args.answer })),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-http-request-node",
        "Add an HTTP request node.",
        {
            ...nodePlacement,
            method: z.string().optional().describe("HTTP method (default: GET)"),
            url: z.string().optional(),
            headers: z.record(z.string()).optional(),
            params: z.record(z.string()).optional().describe("Query parameters"),
            body_type: z
                .enum(["none", "form-data", "x-www-form-urlencoded", "raw-text", "json", "binary"])
                .optional(),
            body: z
                .array(z.object({ key: z.string(), type: z.enum(["file", "text"]), value: z.string() }))
                .optional(),
            authorization: z
                .object({
                    type: z.enum(["basic", "bearer", "custom"]),
                    api_key: z.string(),
                    header: z.string().optional(),
                })
                .optional()
                .describe("API key authorization; omit for none"),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add http-request node",
                (document) =>
                    addNode(
                        document,
                        httpRequestNode({
                            ...placement(args),
                            method: args.method,
                            url: args.url,
                            headers: args.headers,
                            params: args.params,
                            bodyType: args.body_type,
                            body: args.body,
                            authorization: args.authorization,
                        })
                    ),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-code-node",
        "Add a code node that runs a main() function over upstream values.",
        {
            ...nodePlacement,
            language: z.enum(CODE_LANGUAGES).optional().describe("Code language (default: python3)"),
            code: z.string().optional(),
            variables: z.array(valueSelectorBinding).optional().describe("Arguments passed to main()"),
            outputs: z.record(z.string()).optional().describe('Output name to type, e.g. {"result": "string"}'),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add code node",
                (document) =>
                    addNode(
                        document,
                        codeNode({
                            ...placement(args),
                            language: args.language,
                            code: args.code,
                            variables: args.variables,
                            outputs: args.outputs,
                        })
                    ),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-if-else-node",
        "Add an if/else node. Each case id becomes the source handle of that branch's edge; the else branch uses \"false\".",
        {
            ...nodePlacement,
            cases: z
                .array(
                    z.object({
                        case_id: z.string(),
                        logical_operator: z.enum(["and", "or"]).optional(),
                        conditions: z
                            .array(
                                z.object({
                                    variable_selector: z.array(z.string()),
                                    comparison_operator: z.string().describe('e.g. "contains", "=", ">" or "empty"'),
                                    value: z.unknown().optional(),
                                })
                            )
                            .optional(),
                    })
                )
                .optional(),
        },
        async (args, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                args.workflow_yaml,
                "add if-else node",
                (document) => addNode(document, ifElseNode({ ...placement(args), cases: args.cases })),
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-remove-node",
        "Remove a node and every edge attached to it.",
        {
            workflow_yaml: workflowYaml,
            node_id: z.string(),
        },
        async ({ workflow_yaml, node_id }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `remove node '${node_id}'`,
                (document) => {
                    document.removeNode(node_id);
                    return `Removed node '${node_id}'`;
                },
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-list-nodes",
        "List the id, type and title of every node in the workflow.",
        {
            workflow_yaml: workflowYaml,
        },
        async ({ workflow_yaml }): Promise<CallToolResult> => {
            try {
                const nodes = summarizeNodes(WorkflowDocument.fromYaml(workflow_yaml));
                return jsonResult({ nodes, count: nodes.length });
            } catch (error) {
                return errorResult(`Error: failed to list nodes: ${errorMessage(error)}`);
            }
        }
    );
}
