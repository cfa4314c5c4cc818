import type { OutlineColumn, OutlineNode } from "./types";

export const COLUMN_TECH_TYPES: ReadonlySet<string> = new Set(["Dimension", "Measure", "Attribute"]);

/**
 * Role of an outline node. Folders are containers; dimensions, measures and
 * attributes are leaves. A dimension with attributes under it is both.
 */
export type NodeKind = "leaf" | "container" | "both" | "other";

function childrenOf(node: OutlineNode): OutlineNode[] | undefined {
    return node.nodes?.node;
}

export function classifyNode(node: OutlineNode): NodeKind {
    const isColumn = node.techType != null && COLUMN_TECH_TYPES.has(node.techType);
    const hasChildren = childrenOf(node) !== undefined;
    if (isColumn && hasChildren) return "both";
    if (isColumn) return "leaf";
    if (hasChildren) return "container";
    return "other";
}

function toColumn(node: OutlineNode): OutlineColumn {
    return {
        column_name: node.name ?? "",
        data_type: node.dataType ?? "string",
        description: node.description ?? "",
        objectId: node.id ?? undefined,
    };
}

/**
 * Collects the columns of a universe outline, depth first, in document order.
 * Emitting a node and descending into it are independent decisions.
 */
export function extractColumns(roots: OutlineNode[]): OutlineColumn[] {
    const columns: OutlineColumn[] = [];
    const stack = [...roots].reverse();

    let node = stack.pop();
    while (node !== undefined) {
        const kind = classifyNode(node);
        if (kind === "leaf" || kind === "both") {
            columns.push(toColumn(node));
        }
        if (kind === "container" || kind === "both") {
            const children = childrenOf(node) ?? [];
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push(children[i]);
            }
        }
        node = stack.pop();
    }

    return columns;
}
