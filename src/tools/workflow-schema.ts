import { server } from "../server.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_MODES, CURRENT_DSL_VERSION } from "../dsl/constants.js";
import { describeNodeSchema } from "../schemas/describe.js";
import { nodeSchemaRegistry } from "../schemas/nodes.js";
import { jsonResult, textResult } from "./results.js";

export function workflowSchema() {
    server.tool(
        "workflow-dsl-version",
        "Get the DSL version this server writes and validates against.",
        {},
        async (): Promise<CallToolResult> => textResult(CURRENT_DSL_VERSION)
    );

    server.tool(
        "workflow-app-modes",
        "List the supported application modes.",
        {},
        async (): Promise<CallToolResult> => jsonResult([...APP_MODES])
    );

    server.tool(
        "workflow-node-schema",
        "Describe the data fields of a node type: which are required, their types and defaults.",
        {
            node_type: z.string().describe('Node type identifier, e.g. "llm" or "if-else"'),
        },
        async ({ node_type }): Promise<CallToolResult> => jsonResult(describeNodeSchema(node_type, nodeSchemaRegistry))
    );
}
