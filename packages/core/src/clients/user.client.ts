/**
 * User Client
 *
 * Operations on `/user`. Users are addressed by username.
 */

import { assertBodyMatches, equalTo, startsWith } from "../assertions";
import type { ApiMessage, User } from "../models";
import type { HttpRequestOptions, HttpResponse } from "../protocols/http";
import { ResourceClient, type ResponsePredicate } from "./resource-client";

export const LOGIN_MESSAGE_PREFIX = "logged in user session:";

const byUsername = (method: HttpRequestOptions["method"], username: string, body?: unknown): HttpRequestOptions => ({
	method,
	path: "/user/{username}",
	pathParams: { username },
	body,
});

export class UserClient extends ResourceClient {
	/**
	 * POST /user, expecting 200 JSON. The service answers `message` = user id.
	 */
	createUser(user: Partial<User>): Promise<HttpResponse<ApiMessage>> {
		return this.sendExpecting<ApiMessage>({ method: "POST", path: "/user", body: user });
	}

	/**
	 * POST /user, any status. For negative paths.
	 */
	createUserRaw(user: Partial<User>): Promise<HttpResponse<ApiMessage>> {
		return this.send<ApiMessage>({ method: "POST", path: "/user", body: user });
	}

	/**
	 * POST /user/createWithList, expecting 200 JSON.
	 */
	createUsersWithList(users: readonly Partial<User>[]): Promise<HttpResponse<ApiMessage>> {
		return this.sendExpecting<ApiMessage>({ method: "POST", path: "/user/createWithList", body: users });
	}

	/**
	 * POST /user/createWithArray, expecting 200 JSON.
	 */
	createUsersWithArray(users: readonly Partial<User>[]): Promise<HttpResponse<ApiMessage>> {
		return this.sendExpecting<ApiMessage>({ method: "POST", path: "/user/createWithArray", body: users });
	}

	/**
	 * GET /user/{username}, any status.
	 */
	getUserByUsernameRaw(username: string): Promise<HttpResponse<User | ApiMessage>> {
		return this.send<User | ApiMessage>(byUsername("GET", username));
	}

	/**
	 * GET /user/{username} until it answers 200.
	 */
	getUserByUsername(username: string): Promise<HttpResponse<User>> {
		return this.waitForStatus<User>(byUsername("GET", username), 200, this.policy("read"), `user ${username} readable`);
	}

	/**
	 * GET /user/{username} until it answers 404. Users take as long to
	 * disappear as they take to appear, so this uses the read policy.
	 */
	getUserByUsernameExpectingError(username: string): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(
			byUsername("GET", username),
			404,
			this.policy("read"),
			`user ${username} absent`,
		);
	}

	/**
	 * GET /user/{username} until it answers 200 and every field of
	 * `expected` equals the body's.
	 */
	waitForUserUpdate(username: string, expected: Partial<User>, atMost?: number): Promise<HttpResponse<User>> {
		const entries = Object.entries(expected);
		const accepts: ResponsePredicate<User> = (response) => {
			const body: Record<string, unknown> | undefined = response.body ? { ...response.body } : undefined;
			return response.code === 200 && body !== undefined && entries.every(([key, value]) => body[key] === value);
		};
		const policy = this.policy("convergence");
		return this.waitFor<User>(
			byUsername("GET", username),
			accepts,
			{ atMost: atMost ?? policy.atMost, pollInterval: policy.pollInterval },
			`user ${username} updated`,
		);
	}

	/**
	 * PUT /user/{username}, any status.
	 */
	updateUserRaw(user: Partial<User> & Pick<User, "username">): Promise<HttpResponse<ApiMessage>> {
		return this.send<ApiMessage>(byUsername("PUT", user.username, user));
	}

	/**
	 * PUT /user/{username} until it answers 200.
	 */
	updateUser(user: Partial<User> & Pick<User, "username">): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(
			byUsername("PUT", user.username, user),
			200,
			this.policy("update"),
			`user ${user.username} update acknowledged`,
		);
	}

	/**
	 * DELETE /user/{username}, any status. Used by cleanup.
	 */
	deleteUserRaw(username: string): Promise<HttpResponse<ApiMessage>> {
		return this.send<ApiMessage>(byUsername("DELETE", username));
	}

	/**
	 * DELETE /user/{username} until it answers 200.
	 */
	deleteUser(username: string): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(
			byUsername("DELETE", username),
			200,
			this.policy("delete"),
			`user ${username} deleted`,
		);
	}

	/**
	 * GET /user/login, expecting 200 JSON and a session message.
	 */
	async loginUser(username: string, password: string): Promise<HttpResponse<ApiMessage>> {
		const response = await this.sendExpecting<ApiMessage>(this.loginRequest(username, password));
		return assertBodyMatches(response, "message", startsWith(LOGIN_MESSAGE_PREFIX));
	}

	/**
	 * GET /user/login with possibly missing credentials, expecting `status`.
	 */
	loginUserExpectingStatus(
		username: string | undefined,
		password: string | undefined,
		status: number,
	): Promise<HttpResponse<ApiMessage>> {
		return this.sendExpecting<ApiMessage>(this.loginRequest(username, password), { status });
	}

	/**
	 * GET /user/logout, expecting 200 JSON and message `ok`.
	 */
	async logoutUser(): Promise<HttpResponse<ApiMessage>> {
		const response = await this.sendExpecting<ApiMessage>({ method: "GET", path: "/user/logout" });
		return assertBodyMatches(response, "message", equalTo("ok"));
	}

	private loginRequest(username?: string, password?: string): HttpRequestOptions {
		return { method: "GET", path: "/user/login", query: { username, password } };
	}
}
