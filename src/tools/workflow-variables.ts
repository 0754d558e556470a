import { server } from "../server.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { CONVERSATION_VARIABLE_TYPES, ENVIRONMENT_VARIABLE_TYPES } from "../dsl/constants.js";
import { mutateWorkflow } from "./results.js";

const workflowYaml = z.string().describe("The current workflow document as YAML");

export function workflowVariables() {
    server.tool(
        "workflow-add-env-var",
        "Declare an environment variable. Nodes reference it as {{#env.<id>#}}.",
        {
            workflow_yaml: workflowYaml,
            id: z.string().describe("Variable id used in references"),
            name: z.string().describe("Display name"),
            value_type: z.enum(ENVIRONMENT_VARIABLE_TYPES),
            value: z.string().describe("Value; may be empty"),
            required: z.boolean().optional().describe("Whether the value must be set before running (default: true)"),
        },
        async ({ workflow_yaml, ...variable }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `add environment variable '${variable.id}'`,
                (document) => {
                    document.addEnvironmentVariable(variable);
                    return `Added environment variable '${variable.id}'`;
                },
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-remove-env-var",
        "Remove an environment variable.",
        {
            workflow_yaml: workflowYaml,
            id: z.string(),
        },
        async ({ workflow_yaml, id }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `remove environment variable '${id}'`,
                (document) => {
                    document.removeEnvironmentVariable(id);
                    return `Removed environment variable '${id}'`;
                },
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-add-conversation-var",
        "Declare a conversation variable. Nodes reference it as {{#conversation.<id>#}}.",
        {
            workflow_yaml: workflowYaml,
            id: z.string().describe("Variable id used in references"),
            name: z.string().describe("Display name"),
            value_type: z.enum(CONVERSATION_VARIABLE_TYPES),
            description: z.string().optional(),
        },
        async ({ workflow_yaml, ...variable }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `add conversation variable '${variable.id}'`,
                (document) => {
                    document.addConversationVariable(variable);
                    return `Added conversation variable '${variable.id}'`;
                },
                extra.sessionId,
            )
    );

    server.tool(
        "workflow-remove-conversation-var",
        "Remove a conversation variable.",
        {
            workflow_yaml: workflowYaml,
            id: z.string(),
        },
        async ({ workflow_yaml, id }, extra): Promise<CallToolResult> =>
            mutateWorkflow(
                workflow_yaml,
                `remove conversation variable '${id}'`,
                (document) => {
                    document.removeConversationVariable(id);
                    return `Removed conversation variable '${id}'`;
                },
                extra.sessionId,
            )
    );
}
