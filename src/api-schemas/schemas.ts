import { z } from "zod";

export const GetTablesSchema = z.object({});

export const GetColumnsSchema = z.object({
    table: z.string().describe("The name of the table to retrieve columns for."),
});

export const RunQuerySchema = z.object({
    sql: z.string().describe("The SELECT statement to execute. The format should be 'SELECT col1, col2 FROM [TableName]'."),
});

export enum ToolName {
    GetTables = "get_tables",
    GetColumns = "get_columns",
    RunQuery = "run_query",
}

export const toolDefinitions = [
    {
        name: ToolName.GetTables,
        description: "Retrieves a list of objects, entities, collections, etc. (as tables) available in the data source. Use the `get_columns` tool to list available columns on a table.",
        schema: GetTablesSchema,
    },
    {
        name: ToolName.GetColumns,
        description: "Retrieves a list of fields, dimensions, or measures (as columns) for an object, entity or collection (table). Use the `get_tables` tool to get a list of available tables.",
        schema: GetColumnsSchema,
    },
    {
        name: ToolName.RunQuery,
        description: "Executes a SQL SELECT statement. Only 'SELECT col1, col2 FROM table' is supported: no filters, joins or aggregates. Table and column names are matched in upper case.",
        schema: RunQuerySchema,
    },
];
