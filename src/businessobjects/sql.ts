import { UnsupportedFormatError } from "../utils";
import type { ParsedQuery, ResultObject } from "./types";

export const UNSUPPORTED_SQL_MESSAGE = "Unsupported SQL format. Please use 'SELECT col1, col2 FROM table'.";

const QUOTE_CHARS = new Set(["[", "]", '"']);

/**
 * Strips any run of brackets and double quotes from both ends of an identifier.
 */
export function stripIdentifier(token: string): string {
    let start = 0;
    let end = token.length;
    while (start < end && QUOTE_CHARS.has(token[start])) start++;
    while (end > start && QUOTE_CHARS.has(token[end - 1])) end--;
    return token.slice(start, end);
}

/**
 * Parses `SELECT col1, col2 FROM table`. The statement is upper-cased before
 * it is split, so identifiers come back upper-cased.
 *
 * @throws UnsupportedFormatError for anything but a single SELECT ... FROM ...
 */
export function parseSelect(sql: string): ParsedQuery {
    const parts = sql.toUpperCase().split(" FROM ");
    if (parts.length !== 2) {
        throw new UnsupportedFormatError(UNSUPPORTED_SQL_MESSAGE);
    }

    const [selectPart, fromPart] = parts;
    const tableName = stripIdentifier(fromPart.trim());
    const columns = selectPart
        .replaceAll("SELECT", "")
        .trim()
        .split(",")
        .map(column => stripIdentifier(column.trim()));

    if (!tableName || columns.some(column => !column)) {
        throw new UnsupportedFormatError(UNSUPPORTED_SQL_MESSAGE);
    }

    return { tableName, columns };
}

/**
 * Result objects as the server has been observed to accept them: the
 * requested name doubles as the object id.
 */
export function placeholderResultObjects(columns: string[]): ResultObject[] {
    return columns.map(column => ({ id: column, name: column }));
}
