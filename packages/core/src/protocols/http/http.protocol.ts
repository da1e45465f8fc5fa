/**
 * HTTP Protocol
 *
 * Issues one request per call against the profile's base URL using fetch.
 * Responses come back whatever their status; only a failed exchange
 * (no response, unreadable JSON) raises, as a TransportError.
 */

import { TransportError } from "../../errors";
import { type Logger, silentLogger } from "../../logging";
import type { InteractionRecorder } from "../../recording/interaction-recorder";
import type { InteractionHandle } from "../../recording/recording.types";
import type { RequestProfile } from "../../specs";
import type { HttpRequestOptions, HttpResponse, QueryValue } from "./http.types";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * HTTP protocol options
 */
export interface HttpProtocolOptions {
	profile: RequestProfile;
	logger?: Logger;
	/** Records every exchange when set */
	recorder?: InteractionRecorder;
	/** Replaces the global fetch */
	fetch?: FetchFn;
}

export class HttpProtocol {
	readonly type = "http";
	readonly profile: RequestProfile;
	private readonly logger: Logger;
	private readonly recorder?: InteractionRecorder;
	private readonly fetchFn: FetchFn;

	constructor(options: HttpProtocolOptions) {
		this.profile = options.profile;
		this.logger = options.logger ?? silentLogger;
		this.recorder = options.recorder;
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
	}

	/**
	 * Build the absolute URL for a request
	 */
	buildUrl(options: Pick<HttpRequestOptions, "path" | "pathParams" | "query">): string {
		const path = options.path.replace(/\{(\w+)\}/g, (_placeholder: string, name: string) => {
			const value = options.pathParams?.[name];
			if (value === undefined) {
				throw new Error(`Missing path parameter "${name}" for ${options.path}`);
			}
			return encodeURIComponent(String(value));
		});

		return `${this.profile.baseUrl}${path}${buildQuery(options.query)}`;
	}

	/**
	 * Make one HTTP request
	 */
	async request<TRes = unknown>(options: HttpRequestOptions): Promise<HttpResponse<TRes>> {
		const url = this.buildUrl(options);
		const context = { method: options.method, url };

		const init: RequestInit = {
			method: options.method,
			headers: {
				"Content-Type": this.profile.contentType,
				Accept: this.profile.accept,
				...options.headers,
			},
		};
		if (options.body !== undefined) {
			init.body = JSON.stringify(options.body);
		}

		const interaction = this.recorder?.begin({ method: options.method, url, requestPayload: options.body });
		this.logger.debug(`--> ${options.method} ${url}`, options.body === undefined ? undefined : { body: options.body });

		const startTime = Date.now();
		let response: Response;
		let text: string;
		try {
			response = await this.fetchFn(url, init);
			text = await response.text();
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.fail(interaction, message);
			throw new TransportError(`Request failed: ${message}`, context, error);
		}

		const headers: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			headers[key.toLowerCase()] = value;
		});

		let body: TRes | undefined;
		try {
			body = parseBody<TRes>(text, headers["content-type"]);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.fail(interaction, message);
			throw new TransportError(`Response body is not valid JSON: ${message}`, context, error);
		}

		const duration = Date.now() - startTime;
		interaction?.respond(response.status, body);
		this.logger.debug(`<-- ${response.status} ${options.method} ${url} (${duration}ms)`, body === undefined ? undefined : { body });

		return {
			code: response.status,
			headers,
			body,
			text,
			method: options.method,
			url,
			duration,
		};
	}

	get<TRes = unknown>(path: string, options?: Omit<HttpRequestOptions, "method" | "path">): Promise<HttpResponse<TRes>> {
		return this.request<TRes>({ ...options, method: "GET", path });
	}

	post<TRes = unknown>(path: string, options?: Omit<HttpRequestOptions, "method" | "path">): Promise<HttpResponse<TRes>> {
		return this.request<TRes>({ ...options, method: "POST", path });
	}

	put<TRes = unknown>(path: string, options?: Omit<HttpRequestOptions, "method" | "path">): Promise<HttpResponse<TRes>> {
		return this.request<TRes>({ ...options, method: "PUT", path });
	}

	delete<TRes = unknown>(path: string, options?: Omit<HttpRequestOptions, "method" | "path">): Promise<HttpResponse<TRes>> {
		return this.request<TRes>({ ...options, method: "DELETE", path });
	}

	private fail(interaction: InteractionHandle | undefined, message: string): void {
		interaction?.fail(message);
		this.logger.warn(`<-x ${message}`);
	}
}

function buildQuery(query?: Record<string, QueryValue>): string {
	if (!query) {
		return "";
	}
	const params = new URLSearchParams();
	for (const [key, value] of Object.entries(query)) {
		if (value !== undefined) {
			params.append(key, String(value));
		}
	}
	const encoded = params.toString();
	return encoded ? `?${encoded}` : "";
}

/**
 * Parse a JSON body. A JSON content type that does not parse is a transport
 * failure; other content types yield undefined when they do not parse.
 */
function parseBody<T>(text: string, contentType?: string): T | undefined {
	if (text.length === 0) {
		return undefined;
	}
	if (contentType?.includes("json")) {
		return JSON.parse(text);
	}
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}
