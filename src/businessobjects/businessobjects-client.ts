import type { z } from "zod";
import type { Props } from "../utils";
import {
    AuthenticationError,
    errorMessage,
    RemoteCallError,
    SchemaParseError,
} from "../utils";
import { SerialGate } from "../serial-gate";
import { LogonResponseSchema } from "./types";

export const LOGON_TOKEN_HEADER = "X-SAP-LogonToken";

type HttpMethod = "GET" | "POST" | "DELETE";

/**
 * Holds the single logon session against the BusinessObjects RESTful web service.
 *
 * The REST API speaks XML unless asked otherwise, so every request negotiates
 * JSON through Accept/Content-Type. There is no automatic re-login: once the
 * server expires the token, requests fail until the process restarts.
 */
export class BusinessObjectsClient {
    private logonToken: string | null = null;
    private readonly gate = new SerialGate();

    constructor(private readonly props: Props) { }

    get instanceUrl(): string {
        return this.props.instanceUrl;
    }

    get token(): string | null {
        return this.logonToken;
    }

    get isLoggedIn(): boolean {
        return this.logonToken !== null;
    }

    /**
     * Runs a task with exclusive access to the session. Tool calls dispatched
     * concurrently by the host are queued behind each other and behind login/logout.
     */
    exclusive<T>(task: () => Promise<T>): Promise<T> {
        return this.gate.run(task);
    }

    async login(): Promise<void> {
        const loginUrl = `${this.props.instanceUrl}/logon/long`;
        let response: Response;
        try {
            response = await fetch(loginUrl, {
                method: "POST",
                headers: this.headers(false),
                body: JSON.stringify({
                    userName: this.props.username,
                    password: this.props.password,
                    auth: this.props.authType,
                }),
            });
        } catch (error) {
            console.error("[SAP BO MCP] Error during login: ", errorMessage(error));
            throw new AuthenticationError(
                `Could not connect to SAP BusinessObjects server at ${loginUrl}. Please check the URL and credentials.`,
                { cause: error },
            );
        }

        if (!response.ok) {
            const body = await this.readLoginBody(response, loginUrl);
            console.error("[SAP BO MCP] Login rejected with status ", response.status);
            throw new AuthenticationError(
                `Login to SAP BusinessObjects failed with status ${response.status}. Please check the URL and credentials.`,
                { statusCode: response.status, body },
            );
        }

        const token = response.headers.get(LOGON_TOKEN_HEADER) || await this.readBodyToken(response, loginUrl);
        if (!token) {
            throw new AuthenticationError("Failed to retrieve logon token from SAP BusinessObjects server.");
        }

        this.logonToken = token;
        console.error("[SAP BO MCP] Successfully logged into SAP BusinessObjects.");
    }

    /**
     * Invalidates the token on the server. Failures are logged, never thrown,
     * and the local token is dropped either way.
     */
    async logout(): Promise<void> {
        if (!this.logonToken) {
            return;
        }

        try {
            const response = await fetch(`${this.props.instanceUrl}/logoff`, {
                method: "POST",
                headers: this.headers(true),
                body: "{}",
            });
            if (!response.ok) {
                console.error("[SAP BO MCP] Logout returned status ", response.status);
            } else {
                console.error("[SAP BO MCP] Successfully logged out from SAP BusinessObjects.");
            }
        } catch (error) {
            console.error("[SAP BO MCP] Error during logout: ", errorMessage(error));
        } finally {
            this.logonToken = null;
        }
    }

    /**
     * Sends an authenticated request and validates the JSON body against a schema.
     *
     * @throws RemoteCallError on transport failure or a non-2xx status
     * @throws SchemaParseError when the body is not JSON or does not fit the schema
     */
    async request<S extends z.ZodTypeAny>(
        method: HttpMethod,
        path: string,
        schema: S,
        body?: unknown,
    ): Promise<z.output<S>> {
        const response = await this.send(method, path, body);
        const text = await this.readText(method, path, response);

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            throw new SchemaParseError(`${method} ${path} returned a body that is not JSON`, {
                statusCode: response.status,
                body: text,
                cause: error,
            });
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new SchemaParseError(
                `${method} ${path} returned an unexpected response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
                { statusCode: response.status, body: text, cause: parsed.error },
            );
        }
        return parsed.data;
    }

    /**
     * Sends an authenticated request whose response body is of no interest.
     */
    async delete(path: string): Promise<void> {
        const response = await this.send("DELETE", path);
        // drain the body so the connection can be reused
        await this.readText("DELETE", path, response);
    }

    private async send(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
        if (!this.logonToken) {
            throw new RemoteCallError(`${method} ${path} attempted without a logon session`);
        }

        let response: Response;
        try {
            response = await fetch(`${this.props.instanceUrl}${path}`, {
                method,
                headers: this.headers(true),
                body: body === undefined ? undefined : JSON.stringify(body),
            });
        } catch (error) {
            throw new RemoteCallError(`${method} ${path} failed: ${errorMessage(error)}`, { cause: error });
        }

        if (!response.ok) {
            const text = await this.readText(method, path, response);
            throw new RemoteCallError(`${method} ${path} failed with status ${response.status}`, {
                statusCode: response.status,
                body: text,
            });
        }
        return response;
    }

    private headers(authenticated: boolean): Record<string, string> {
        const headers: Record<string, string> = {
            "Accept": "application/json",
            "Content-Type": "application/json",
        };
        if (authenticated && this.logonToken) {
            headers[LOGON_TOKEN_HEADER] = this.logonToken;
        }
        return headers;
    }

    /**
     * Reads a response body. The connection can still drop after the headers
     * arrived, which counts as a failed call.
     */
    private async readText(method: HttpMethod, path: string, response: Response): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            throw new RemoteCallError(`${method} ${path} failed: ${errorMessage(error)}`, {
                statusCode: response.status,
                cause: error,
            });
        }
    }

    private async readLoginBody(response: Response, loginUrl: string): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            console.error("[SAP BO MCP] Error reading login response: ", errorMessage(error));
            throw new AuthenticationError(
                `Could not connect to SAP BusinessObjects server at ${loginUrl}. Please check the URL and credentials.`,
                { statusCode: response.status, cause: error },
            );
        }
    }

    private async readBodyToken(response: Response, loginUrl: string): Promise<string | undefined> {
        const text = await this.readLoginBody(response, loginUrl);
        try {
            const parsed = LogonResponseSchema.safeParse(JSON.parse(text));
            return parsed.success ? parsed.data.logonToken || undefined : undefined;
        } catch (error) {
            console.error("[SAP BO MCP] Login response body is not JSON: ", errorMessage(error));
            return undefined;
        }
    }
}

export const getBusinessObjectsClient = (props: Props) => new BusinessObjectsClient(props);
