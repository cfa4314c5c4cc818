import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
    type ListResourcesResult,
    type ListToolsResult,
    type ReadResourceResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { type Span, SpanStatusCode } from "@opentelemetry/api";
import { getActiveSpan, withSpan } from "../metrics/tracing/tracing-utils";
import type { ColumnResolution } from "../config";
import { errorMessage, type Props } from "../utils";
import type { BusinessObjectsClient } from "../businessobjects/businessobjects-client";
import { BusinessObjectsService } from "../businessobjects/businessobjects-service";

// Response utility types
export type ContentItem = {
    type: "text";
    text: string;
};

export type SuccessResponse = {
    content: ContentItem[];
};

export type ErrorResponse = {
    isError: true;
    content: ContentItem[];
};

export type ToolResponse = SuccessResponse | ErrorResponse;

export interface Context {
    props: Props;
    client: BusinessObjectsClient;
    columnResolution?: ColumnResolution;
}

export abstract class BaseMCPServer extends Server {
    constructor(
        protected ctx: Context,
        serverName?: string,
        serverVersion?: string
    ) {
        super({
            name: serverName || "sapbusinessobjectsbi",
            version: serverVersion || "1.0.0",
        }, {
            capabilities: {
                tools: {},
                resources: {},
            }
        });
    }

    /**
     * Initialize span with common attributes (user_name and instance_url)
     */
    protected initSpanWithCommonAttributes(): Span | undefined {
        const span = getActiveSpan();
        span?.setAttributes({
            user_name: this.ctx.props.username,
            instance_url: this.ctx.props.instanceUrl,
        });
        return span;
    }

    /**
     * Create a standardized error response
     */
    protected createErrorResponse(message: string, statusMessage?: string): ErrorResponse {
        const span = this.initSpanWithCommonAttributes();
        span?.setStatus({ code: SpanStatusCode.ERROR, message: statusMessage || message });
        return {
            isError: true,
            content: [{ type: "text", text: `Error: ${message}` }],
        };
    }

    /**
     * Create a standardized success response with a single message
     */
    protected createSuccessResponse(message: string, statusMessage?: string): SuccessResponse {
        const span = this.initSpanWithCommonAttributes();
        span?.setStatus({ code: SpanStatusCode.OK, message: statusMessage || message });
        return {
            content: [{ type: "text", text: message }],
        };
    }

    protected createToolErrorResponse(error: unknown, operation: string): ErrorResponse {
        const message = errorMessage(error);
        console.error(`[SAP BO MCP] ${operation} failed: `, message);
        return this.createErrorResponse(message, `Error in ${operation}: ${message}`);
    }

    protected getBusinessObjectsService() {
        return new BusinessObjectsService(this.ctx.client, this.ctx.columnResolution);
    }

    /**
     * Opens the logon session. Fails with AuthenticationError when the
     * server does not hand out a token.
     */
    protected async initializeService(): Promise<void> {
        await this.ctx.client.exclusive(() => this.ctx.client.login());
    }

    /**
     * Closes the logon session, after any tool call still in flight.
     */
    async shutdown(): Promise<void> {
        await this.ctx.client.exclusive(() => this.ctx.client.logout());
    }

    /**
     * Abstract method to be implemented by subclasses for listing tools
     */
    protected abstract listTools(): Promise<ListToolsResult>;

    /**
     * Abstract method to be implemented by subclasses for listing resources
     */
    protected abstract listResources(): Promise<ListResourcesResult>;

    /**
     * Abstract method to be implemented by subclasses for reading resources
     */
    protected abstract readResource(request: z.infer<typeof ReadResourceRequestSchema>): Promise<ReadResourceResult>;

    /**
     * Abstract method to be implemented by subclasses for calling tools
     */
    protected abstract callTool(request: z.infer<typeof CallToolRequestSchema>): Promise<ToolResponse>;

    async init() {
        // Initialize the service-specific functionality
        await this.initializeService();

        // Set up request handlers. Everything touching the session goes through its gate.
        this.setRequestHandler(ListToolsRequestSchema, async () => {
            return withSpan('list-tools', async () => {
                this.initSpanWithCommonAttributes();
                return this.listTools();
            });
        });

        this.setRequestHandler(ListResourcesRequestSchema, async () => {
            return withSpan('list-resources', async () => {
                this.initSpanWithCommonAttributes();
                return this.ctx.client.exclusive(() => this.listResources());
            });
        });

        this.setRequestHandler(ReadResourceRequestSchema, async (request: z.infer<typeof ReadResourceRequestSchema>) => {
            return withSpan('read-resource', async () => {
                this.initSpanWithCommonAttributes();
                return this.ctx.client.exclusive(() => this.readResource(request));
            });
        });

        // Handle call tool request
        this.setRequestHandler(CallToolRequestSchema, async (request: z.infer<typeof CallToolRequestSchema>) => {
            return withSpan('call-tool', async () => {
                this.initSpanWithCommonAttributes();
                return this.ctx.client.exclusive(() => this.callTool(request));
            });
        });
    }
}
