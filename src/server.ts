import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export const SERVER_NAME = 'workflow-dsl';
export const SERVER_VERSION = '0.1.0';

export const server = new McpServer(
    {
        name: SERVER_NAME,
        version: SERVER_VERSION,
    },
    {
        capabilities: {
            logging: {},
        },
    }
);
