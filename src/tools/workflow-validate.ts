import { server } from "../server.js";
import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { validateWorkflowYaml } from "../dsl/validator.js";
import { log } from "../logging.js";
import { jsonResult } from "./results.js";

export function workflowValidate() {
    server.tool(
        "workflow-validate",
        "Validate a workflow DSL document. Returns every error and warning found, grouped by validation stage, plus basic document info.",
        {
            yaml_content: z.string().describe("The workflow DSL document as YAML text"),
        },
        async ({ yaml_content }, extra): Promise<CallToolResult> => {
            const result = validateWorkflowYaml(yaml_content);
            await log(
                result.success ? "info" : "notice",
                `Validated workflow: ${result.errors.length} error(s), ${result.warnings.length} warning(s)`,
                extra.sessionId,
            );
            return jsonResult(result);
        }
    );
}
