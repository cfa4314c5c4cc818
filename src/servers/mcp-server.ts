import {
    type CallToolRequestSchema,
    type ReadResourceRequestSchema,
    ToolSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { WithSpan } from "../metrics/tracing/tracing-utils";
import { toCsv } from "../csv";
import { NotFoundError } from "../utils";
import {
    GetColumnsSchema,
    RunQuerySchema,
    ToolName,
    toolDefinitions
} from "../api-schemas/schemas";
import { BaseMCPServer, type Context, type ToolResponse } from "./mcp-server-base";

const ToolInputSchema = ToolSchema.shape.inputSchema;
type ToolInput = z.infer<typeof ToolInputSchema>;

export const UNIVERSE_URI_PREFIX = "universe:///";

export class MCPServer extends BaseMCPServer {
    constructor(ctx: Context) {
        super(ctx, "sapbusinessobjectsbi", "1.0.0");
    }

    protected async listTools() {
        return {
            tools: toolDefinitions.map(toolDef => ({
                name: toolDef.name,
                description: toolDef.description,
                inputSchema: zodToJsonSchema(toolDef.schema) as ToolInput,
            }))
        };
    }

    protected async listResources() {
        const tables = await this.getBusinessObjectsService().getTables();
        return {
            resources: tables
                .filter(table => table.id)
                .map(table => ({
                    uri: `${UNIVERSE_URI_PREFIX}${encodeURIComponent(table.id)}`,
                    name: table.table_name,
                    description: `Columns of the universe ${table.table_name}, as CSV`,
                    mimeType: "text/csv",
                })),
        };
    }

    protected async readResource(request: z.infer<typeof ReadResourceRequestSchema>) {
        const { uri } = request.params;
        if (!uri.startsWith(UNIVERSE_URI_PREFIX)) {
            throw new NotFoundError(`Unknown resource uri: ${uri}`);
        }
        const tableId = decodeURIComponent(uri.slice(UNIVERSE_URI_PREFIX.length));

        const service = this.getBusinessObjectsService();
        const tables = await service.getTables();
        if (!tables.some(table => table.id === tableId)) {
            throw new NotFoundError(`Universe with id '${tableId}' not found.`);
        }

        const columns = await service.getColumnsById(tableId);
        return {
            contents: [{
                uri,
                mimeType: "text/csv",
                text: toCsv(columns),
            }],
        };
    }

    protected async callTool(request: z.infer<typeof CallToolRequestSchema>): Promise<ToolResponse> {
        const { name } = request.params;

        switch (name) {
            case ToolName.GetTables:
                return this.callGetTables();

            case ToolName.GetColumns:
                return this.callGetColumns(request);

            case ToolName.RunQuery:
                return this.callRunQuery(request);

            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    }

    @WithSpan('call-get-tables')
    async callGetTables(): Promise<ToolResponse> {
        console.error("[DEBUG] Executing get_tables tool...");
        try {
            const tables = await this.getBusinessObjectsService().getTables();
            return this.createSuccessResponse(toCsv(tables), `Found ${tables.length} tables`);
        } catch (error) {
            return this.createToolErrorResponse(error, ToolName.GetTables);
        }
    }

    @WithSpan('call-get-columns')
    async callGetColumns(request: z.infer<typeof CallToolRequestSchema>): Promise<ToolResponse> {
        try {
            const { table } = GetColumnsSchema.parse(request.params.arguments);
            console.error("[DEBUG] Executing get_columns tool for table: ", table);
            const columns = await this.getBusinessObjectsService().getColumns(table);
            return this.createSuccessResponse(toCsv(columns), `Found ${columns.length} columns`);
        } catch (error) {
            return this.createToolErrorResponse(error, ToolName.GetColumns);
        }
    }

    @WithSpan('call-run-query')
    async callRunQuery(request: z.infer<typeof CallToolRequestSchema>): Promise<ToolResponse> {
        try {
            const { sql } = RunQuerySchema.parse(request.params.arguments);
            console.error("[DEBUG] Executing run_query tool with SQL: ", sql);
            const rows = await this.getBusinessObjectsService().runQuery(sql);
            return this.createSuccessResponse(toCsv(rows), `Query returned ${rows.length} rows`);
        } catch (error) {
            return this.createToolErrorResponse(error, ToolName.RunQuery);
        }
    }
}
