import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { MCPServer } from "./servers/mcp-server";
import { loadConfig, loadDotEnv } from "./config";
import { getBusinessObjectsClient } from "./businessobjects/businessobjects-client";

async function main() {
    loadDotEnv();
    const { props, columnResolution } = loadConfig();

    console.error("[SAP BO MCP] Initializing SAP BusinessObjects client for ", props.instanceUrl);
    const client = getBusinessObjectsClient(props);
    const server = new MCPServer({ props, client, columnResolution });
    await server.init();

    const transport = new StdioServerTransport();
    await server.connect(transport);

    const shutdown = (signal: string) => {
        console.error(`[SAP BO MCP] Received ${signal} signal. Shutting down...`);
        void server.shutdown()
            .catch((error: unknown) => console.error("[SAP BO MCP] Error during shutdown:", error))
            .finally(() => process.exit(0));
    };

    // Handle shutdown signals and the host closing the pipe
    server.onclose = () => shutdown('close');
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    console.error(
        '[SAP BO MCP] Server is now handling requests. Press Ctrl+C to terminate.',
    );
}

main().catch((error) => {
    console.error("[SAP BO MCP] Error:", error instanceof Error ? error.message : error);
    process.exit(1);
});
