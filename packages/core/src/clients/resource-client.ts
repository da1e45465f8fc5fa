/**
 * Resource Client
 *
 * Base for the per-resource clients. Every operation is one of three
 * wrappers around the same transport call:
 *
 * - `send`          raw: one request, any status, no assertion
 * - `sendExpecting` raw, then asserted against a ResponseExpectation
 * - `waitFor`       raw, polled by awaitUntil until a predicate holds
 *
 * Clients keep no state between calls.
 */

import { assertResponse } from "../assertions";
import { type AwaitPolicies, type AwaitPolicy, DEFAULT_AWAIT_POLICIES, awaitUntil, copyPolicies } from "../await";
import { type Logger, silentLogger } from "../logging";
import type { HttpProtocol, HttpRequestOptions, HttpResponse } from "../protocols/http";
import type { ApiSpecifications, ResponseExpectation } from "../specs";
import { stringify } from "../utils";

export type ResponsePredicate<T> = (response: HttpResponse<T>) => boolean;

export interface ResourceClientOptions {
	protocol: HttpProtocol;
	specs: ApiSpecifications;
	/** Per call-site overrides of the default policies */
	policies?: Partial<AwaitPolicies>;
	logger?: Logger;
}

export abstract class ResourceClient {
	protected readonly protocol: HttpProtocol;
	protected readonly specs: ApiSpecifications;
	protected readonly policies: AwaitPolicies;
	protected readonly logger: Logger;

	constructor(options: ResourceClientOptions) {
		this.protocol = options.protocol;
		this.specs = options.specs;
		this.policies = copyPolicies({ ...DEFAULT_AWAIT_POLICIES, ...options.policies });
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Policy used by the given call site
	 */
	policy(name: keyof AwaitPolicies): AwaitPolicy {
		return this.policies[name];
	}

	protected send<T>(request: HttpRequestOptions): Promise<HttpResponse<T>> {
		return this.protocol.request<T>(request);
	}

	protected async sendExpecting<T>(
		request: HttpRequestOptions,
		expectation: ResponseExpectation = this.specs.response200,
	): Promise<HttpResponse<T>> {
		return assertResponse(await this.send<T>(request), expectation);
	}

	protected waitFor<T>(
		request: HttpRequestOptions,
		predicate: ResponsePredicate<T>,
		policy: AwaitPolicy,
		description: string,
	): Promise<HttpResponse<T>> {
		return awaitUntil(() => this.send<T>(request), predicate, {
			...policy,
			description,
			describe: describeResponse,
			onAttempt: (response, attempt) => {
				this.logger.debug(`${description}: attempt ${attempt} observed ${response.code}`);
			},
		});
	}

	protected waitForStatus<T>(
		request: HttpRequestOptions,
		status: number,
		policy: AwaitPolicy,
		description: string,
	): Promise<HttpResponse<T>> {
		return this.waitFor<T>(request, (response) => response.code === status, policy, description);
	}
}

export function describeResponse(response: HttpResponse): string {
	return `status ${response.code}, body ${stringify(response.body ?? response.text)}`;
}
