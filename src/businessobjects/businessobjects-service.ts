import { SpanStatusCode } from "@opentelemetry/api";
import { getActiveSpan, WithSpan } from "../metrics/tracing/tracing-utils";
import type { ColumnResolution } from "../config";
import {
    BusinessObjectsError,
    degraded,
    errorMessage,
    fail,
    NotFoundError,
    ok,
    type RemoteResult,
    UnresolvedColumnError,
    unwrap,
} from "../utils";
import type { BusinessObjectsClient } from "./businessobjects-client";
import { extractColumns } from "./outline";
import { parseSelect, placeholderResultObjects } from "./sql";
import {
    CreateDocumentResponseSchema,
    FlowResponseSchema,
    OutlineResponseSchema,
    UniversesResponseSchema,
    type Column,
    type OutlineColumn,
    type ParsedQuery,
    type ResultObject,
    type Row,
    type Table,
} from "./types";

export const TRANSIENT_DOCUMENT_NAME = "MCP_Transient_Query";

/**
 * Catalog and query operations against the Raylight (Web Intelligence) REST API.
 *
 * Remote failures while listing, describing or querying degrade to empty
 * results; only lookups and malformed input surface as errors.
 */
export class BusinessObjectsService {
    constructor(
        private client: BusinessObjectsClient,
        private columnResolution: ColumnResolution = "placeholder",
    ) { }

    /**
     * List universes as tables. Remote failures yield an empty list.
     */
    @WithSpan('get-tables')
    async getTables(): Promise<Table[]> {
        return unwrap(await this.fetchTables());
    }

    /**
     * List the columns of the universe with the given name.
     *
     * @throws NotFoundError when no universe has that name
     */
    @WithSpan('get-columns')
    async getColumns(tableName: string): Promise<Column[]> {
        const span = getActiveSpan();
        span?.setAttribute("table_name", tableName);

        const tableId = await this.resolveTableId(tableName);
        const columns = unwrap(await this.fetchColumns(tableId, tableName));
        span?.setAttribute("columns_count", columns.length);
        return columns.map(({ column_name, data_type, description }) => ({ column_name, data_type, description }));
    }

    /**
     * Columns of a universe addressed by id, as listed in its outline.
     */
    @WithSpan('get-columns-by-id')
    async getColumnsById(tableId: string): Promise<Column[]> {
        const columns = unwrap(await this.fetchColumns(tableId, tableId));
        return columns.map(({ column_name, data_type, description }) => ({ column_name, data_type, description }));
    }

    /**
     * Run `SELECT col1, col2 FROM universe` through a transient document.
     *
     * @throws UnsupportedFormatError for any other statement shape
     * @throws NotFoundError when the universe does not exist
     * @throws UnresolvedColumnError when catalog resolution cannot map a column
     */
    @WithSpan('run-query')
    async runQuery(sql: string): Promise<Row[]> {
        const span = getActiveSpan();
        const query = parseSelect(sql);
        span?.setAttributes({
            table_name: query.tableName,
            columns_count: query.columns.length,
        });

        // one listing for the whole query: the outline below is fetched by id
        const tableId = await this.resolveTableId(query.tableName);
        const available = unwrap(await this.fetchColumns(tableId, query.tableName));
        const resultObjects = this.resolveResultObjects(query, available);

        const rows = unwrap(await this.executeQuery(tableId, query, resultObjects));
        span?.setAttribute("rows_count", rows.length);
        return rows;
    }

    private async fetchTables(): Promise<RemoteResult<Table[]>> {
        try {
            const data = await this.client.request("GET", "/raylight/v1/universes", UniversesResponseSchema);
            const universes = data.universes?.universe ?? [];
            const tables = universes
                .filter(universe => !!universe.name)
                .map(universe => ({
                    table_name: universe.name ?? "",
                    id: universe.id ?? "",
                }));
            return ok(tables);
        } catch (error) {
            return this.degrade("fetching universes", error, []);
        }
    }

    private async resolveTableId(tableName: string): Promise<string> {
        const tables = unwrap(await this.fetchTables());
        const tableId = tables.find(table => table.table_name === tableName)?.id;
        if (!tableId) {
            throw new NotFoundError(`Universe '${tableName}' not found.`);
        }
        return tableId;
    }

    private async fetchColumns(tableId: string, label: string): Promise<RemoteResult<OutlineColumn[]>> {
        try {
            const data = await this.client.request(
                "GET",
                `/raylight/v1/universes/${encodeURIComponent(tableId)}?aggregated=true`,
                OutlineResponseSchema,
            );
            return ok(extractColumns(data.nodes?.node ?? []));
        } catch (error) {
            return this.degrade(`fetching columns for ${label}`, error, []);
        }
    }

    private resolveResultObjects(query: ParsedQuery, available: OutlineColumn[]): ResultObject[] {
        if (this.columnResolution === "placeholder") {
            console.error(`[DEBUG] Using placeholder object ids for ${query.columns.length} column(s), ${available.length} available`);
            return placeholderResultObjects(query.columns);
        }

        const byName = new Map(available.map(column => [column.column_name.toUpperCase(), column]));
        const unresolved = query.columns.filter(name => !byName.has(name));
        if (unresolved.length > 0) {
            throw new UnresolvedColumnError(unresolved);
        }
        return query.columns.map(name => {
            const column = byName.get(name);
            return {
                id: column?.objectId ?? column?.column_name ?? name,
                name: column?.column_name ?? name,
            };
        });
    }

    @WithSpan('execute-query')
    private async executeQuery(
        tableId: string,
        query: ParsedQuery,
        resultObjects: ResultObject[],
    ): Promise<RemoteResult<Row[]>> {
        const span = getActiveSpan();

        let documentId: string | undefined;
        try {
            span?.addEvent("create-document");
            const created = await this.client.request("POST", "/raylight/v1/documents", CreateDocumentResponseSchema, {
                document: {
                    name: TRANSIENT_DOCUMENT_NAME,
                    query: {
                        dataSourceId: tableId,
                        resultObjects,
                    },
                },
            });
            documentId = created.document?.id ?? undefined;
            if (!documentId) {
                throw new BusinessObjectsError("Failed to create transient document for query.");
            }
            span?.setAttribute("document_id", documentId);

            span?.addEvent("read-flow");
            const flow = await this.client.request(
                "GET",
                `/raylight/v1/documents/${encodeURIComponent(documentId)}/dataproviders/1/flows/1`,
                FlowResponseSchema,
            );
            const values = flow.flow?.values ?? [];

            span?.setStatus({ code: SpanStatusCode.OK, message: "Query executed" });
            return ok(values.map(row => zipRow(query.columns, row)));
        } catch (error) {
            return this.degrade("running query", error, []);
        } finally {
            if (documentId) {
                await this.deleteDocument(documentId);
            }
        }
    }

    private async deleteDocument(documentId: string): Promise<void> {
        try {
            await this.client.delete(`/raylight/v1/documents/${encodeURIComponent(documentId)}`);
        } catch (error) {
            console.error(`[SAP BO MCP] Error deleting transient document ${documentId}: `, errorMessage(error));
        }
    }

    private degrade<T>(operation: string, error: unknown, fallback: T): RemoteResult<T> {
        if (!(error instanceof BusinessObjectsError)) {
            return fail(new BusinessObjectsError(`Unexpected error while ${operation}: ${errorMessage(error)}`, { cause: error }));
        }
        console.error(`[SAP BO MCP] Error ${operation}: `, error.message);
        if (error.body) {
            console.error("[SAP BO MCP] Response body: ", error.body);
        }
        return degraded(fallback, error);
    }
}

/**
 * Pairs a row of values with the requested header. Short rows are padded with
 * empty values and surplus values are dropped, so every record has every key.
 */
export function zipRow(header: string[], values: Row[string][]): Row {
    const row: Row = {};
    header.forEach((name, index) => {
        row[name] = index < values.length ? values[index] : null;
    });
    return row;
}
