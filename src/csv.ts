import { stringify } from "csv-stringify/sync";
import { SchemaInconsistencyError } from "./utils";

export type CsvValue = string | number | boolean | null | undefined;

/**
 * Serializes uniform records as CSV with a header taken from the first
 * record's keys. An empty list yields an empty string, with no header.
 *
 * @throws SchemaInconsistencyError when records do not all share the same keys
 */
export function toCsv<T extends { [K in keyof T]: CsvValue }>(records: T[]): string {
    if (records.length === 0) {
        return "";
    }

    const columns = Object.keys(records[0]);
    const expected = new Set(columns);
    records.forEach((record, index) => {
        const keys = Object.keys(record);
        if (keys.length !== expected.size || keys.some(key => !expected.has(key))) {
            throw new SchemaInconsistencyError(
                `Row ${index + 1} has columns [${keys.join(", ")}], expected [${columns.join(", ")}]`
            );
        }
    });

    return stringify(records, {
        header: true,
        columns,
        record_delimiter: "\r\n",
        // a lone \n is not the record delimiter, so it would otherwise go unquoted
        quoted_match: /[\r\n]/,
        cast: {
            boolean: (value) => String(value),
        },
    });
}
