import { workflowCreate } from "./workflow-create.js";
import { workflowDefine } from "./workflow-define.js";
import { workflowDesign } from "./workflow-design.js";
import { workflowEdges } from "./workflow-edges.js";
import { workflowNodes } from "./workflow-nodes.js";
import { workflowSchema } from "./workflow-schema.js";
import { workflowValidate } from "./workflow-validate.js";
import { workflowVariables } from "./workflow-variables.js";

let registered = false;

/** Register every tool and prompt on the shared server. Safe to call more than once. */
export function registerTools(): void {
    if (registered) return;
    registered = true;

    workflowValidate();
    workflowSchema();
    workflowDefine();
    workflowCreate();
    workflowNodes();
    workflowEdges();
    workflowVariables();
    workflowDesign();
}
