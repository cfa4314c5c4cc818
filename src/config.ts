import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError, validateAndSanitizeUrl, type Props } from "./utils";

export const AUTH_TYPES = ["secEnterprise", "secLDAP", "secWinAD", "secSAPR3"] as const;

/**
 * How requested column names are turned into result objects of a query document.
 * "placeholder" sends each name as its own id, "catalog" maps names to outline ids.
 */
export const COLUMN_RESOLUTIONS = ["placeholder", "catalog"] as const;
export type ColumnResolution = typeof COLUMN_RESOLUTIONS[number];

const requiredString = (name: string) =>
    z.string({ required_error: `${name} must be set` }).min(1, `${name} must be set`);

const EnvSchema = z.object({
    SAP_BO_REST_API_URL: requiredString("SAP_BO_REST_API_URL").transform((url, ctx) => {
        try {
            return validateAndSanitizeUrl(url);
        } catch (error) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: error instanceof Error ? error.message : "Invalid URL",
            });
            return z.NEVER;
        }
    }),
    SAP_BO_USERNAME: requiredString("SAP_BO_USERNAME"),
    SAP_BO_PASSWORD: requiredString("SAP_BO_PASSWORD"),
    SAP_BO_AUTH_TYPE: z.enum(AUTH_TYPES).default("secEnterprise"),
    SAP_BO_COLUMN_RESOLUTION: z.enum(COLUMN_RESOLUTIONS).default("placeholder"),
});

export interface Config {
    props: Props;
    columnResolution: ColumnResolution;
}

/**
 * Reads the server configuration from the given environment.
 * Empty strings count as unset, so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const values = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
    );
    const parsed = EnvSchema.safeParse(values);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    }

    const config = parsed.data;
    return {
        props: {
            instanceUrl: config.SAP_BO_REST_API_URL,
            username: config.SAP_BO_USERNAME,
            password: config.SAP_BO_PASSWORD,
            authType: config.SAP_BO_AUTH_TYPE,
        },
        columnResolution: config.SAP_BO_COLUMN_RESOLUTION,
    };
}

/**
 * Loads a .env file from the working directory into process.env, if there is one.
 */
export function loadDotEnv(): void {
    const result = dotenv.config();
    if (result.error) {
        console.error("[SAP BO MCP] No .env file found, using the process environment.");
    }
}
