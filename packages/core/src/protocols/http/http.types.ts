/**
 * HTTP Types
 *
 * Request/response shapes of the HTTP protocol.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

/**
 * HTTP request options
 */
export interface HttpRequestOptions {
	/** HTTP method */
	method: HttpMethod;
	/** Path template relative to the base URL, e.g. `/pet/{petId}` */
	path: string;
	/** Values for `{name}` placeholders in `path` */
	pathParams?: Record<string, string | number>;
	/** Query parameters; undefined values are left out */
	query?: Record<string, QueryValue>;
	/** Request headers */
	headers?: Record<string, string>;
	/** Request body, serialized as JSON */
	body?: unknown;
}

/**
 * HTTP Response
 */
export interface HttpResponse<TBody = unknown> {
	code: number; // HTTP status code
	headers: Record<string, string>; // Response headers, lower-cased names
	body: TBody | undefined; // Parsed JSON; undefined when empty or not JSON
	text: string; // Raw response body
	method: HttpMethod;
	url: string;
	duration: number;
}
