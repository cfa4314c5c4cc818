import { z } from "zod";

/**
 * The REST API answers with a bare object where a list holds a single entry.
 */
const oneOrMany = <T extends z.ZodTypeAny>(schema: T) =>
    z.union([z.array(schema), schema]).transform((value): z.infer<T>[] =>
        Array.isArray(value) ? value : [value]
    );

const Identifier = z.union([z.string(), z.number()]).transform(String);

export const LogonResponseSchema = z.object({
    logonToken: z.string().optional(),
}).passthrough();

const UniverseSchema = z.object({
    id: Identifier.optional().nullable(),
    name: z.string().optional().nullable(),
}).passthrough();

export const UniversesResponseSchema = z.object({
    universes: z.object({
        universe: oneOrMany(UniverseSchema).optional(),
    }).passthrough().optional(),
}).passthrough();

export interface OutlineNode {
    id?: string | null;
    name?: string | null;
    techType?: string | null;
    dataType?: string | null;
    description?: string | null;
    nodes?: { node?: OutlineNode[] };
}

export const OutlineNodeSchema: z.ZodType<OutlineNode, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        id: Identifier.optional().nullable(),
        name: z.string().optional().nullable(),
        techType: z.string().optional().nullable(),
        dataType: z.string().optional().nullable(),
        description: z.string().optional().nullable(),
        nodes: z.object({
            node: oneOrMany(OutlineNodeSchema).optional(),
        }).passthrough().optional(),
    }).passthrough()
);

export const OutlineResponseSchema = z.object({
    nodes: z.object({
        node: oneOrMany(OutlineNodeSchema).optional(),
    }).passthrough().optional(),
}).passthrough();

export const CreateDocumentResponseSchema = z.object({
    document: z.object({
        id: Identifier.optional().nullable(),
    }).passthrough().optional(),
}).passthrough();

const Scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type Scalar = z.infer<typeof Scalar>;

export const FlowResponseSchema = z.object({
    flow: z.object({
        values: z.array(z.array(Scalar)).optional(),
    }).passthrough().optional(),
}).passthrough();

/**
 * A universe, exposed to the host as a table.
 */
export interface Table {
    table_name: string;
    id: string;
}

/**
 * A dimension, measure or attribute of a universe, exposed as a column.
 */
export interface Column {
    column_name: string;
    data_type: string;
    description: string;
}

/**
 * A column together with the outline id the query document needs for it.
 */
export interface OutlineColumn extends Column {
    objectId?: string;
}

export interface ParsedQuery {
    tableName: string;
    columns: string[];
}

export interface ResultObject {
    id: string;
    name: string;
}

export type Row = Record<string, Scalar>;
