/**
 * Store Client
 *
 * Orders under `/store/order` and the pet inventory.
 */

import { assertBody } from "../assertions";
import { awaitAsserted } from "../await";
import type { ApiMessage, Inventory, Order } from "../models";
import type { HttpRequestOptions, HttpResponse } from "../protocols/http";
import { ResourceClient, type ResponsePredicate } from "./resource-client";

const byId = (method: HttpRequestOptions["method"], orderId: number): HttpRequestOptions => ({
	method,
	path: "/store/order/{orderId}",
	pathParams: { orderId },
});

export class StoreClient extends ResourceClient {
	/**
	 * POST /store/order, expecting 200 JSON.
	 */
	placeOrder(order: Partial<Order>): Promise<HttpResponse<Order>> {
		return this.sendExpecting<Order>({ method: "POST", path: "/store/order", body: order });
	}

	placeOrderRaw(order: Partial<Order>): Promise<HttpResponse<Order | ApiMessage>> {
		return this.send<Order | ApiMessage>({ method: "POST", path: "/store/order", body: order });
	}

	getOrderByIdRaw(orderId: number): Promise<HttpResponse<Order | ApiMessage>> {
		return this.send<Order | ApiMessage>(byId("GET", orderId));
	}

	/**
	 * GET /store/order/{orderId} until it answers 200.
	 */
	getOrderById(orderId: number): Promise<HttpResponse<Order>> {
		return this.waitForStatus<Order>(byId("GET", orderId), 200, this.policy("read"), `order ${orderId} readable`);
	}

	/**
	 * GET /store/order/{orderId} until it answers 200 with the given `petId`.
	 */
	getOrderByIdAndVerifyPetId(orderId: number, petId: number): Promise<HttpResponse<Order>> {
		const accepts: ResponsePredicate<Order> = (response) => response.code === 200 && response.body?.petId === petId;
		return this.waitFor<Order>(
			byId("GET", orderId),
			accepts,
			this.policy("read"),
			`order ${orderId} readable with petId ${petId}`,
		);
	}

	/**
	 * GET /store/order/{orderId} until it answers 404.
	 */
	getOrderByIdExpectingError(orderId: number): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(
			byId("GET", orderId),
			404,
			this.policy("absence"),
			`order ${orderId} absent`,
		);
	}

	/**
	 * DELETE /store/order/{orderId}, any status.
	 */
	deleteOrderRaw(orderId: number): Promise<HttpResponse<ApiMessage>> {
		return this.send<ApiMessage>(byId("DELETE", orderId));
	}

	/**
	 * DELETE /store/order/{orderId} until it answers 200.
	 */
	deleteOrder(orderId: number): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(
			byId("DELETE", orderId),
			200,
			this.policy("delete"),
			`order ${orderId} deleted`,
		);
	}

	/**
	 * GET /store/inventory, expecting 200 JSON.
	 */
	getInventory(): Promise<HttpResponse<Inventory>> {
		return this.sendExpecting<Inventory>({ method: "GET", path: "/store/inventory" });
	}

	/**
	 * Re-read the inventory until the count for `status` equals `count`.
	 */
	getInventoryAndVerifyStatusCount(status: string, count: number): Promise<HttpResponse<Inventory>> {
		return awaitAsserted(async () => assertBody(await this.getInventory(), { [status]: count }), {
			...this.policy("inventory"),
			description: `inventory count of "${status}" reaching ${count}`,
			onViolation: (violation, attempt) => {
				this.logger.debug(`inventory attempt ${attempt}: ${violation.message}`);
			},
		});
	}
}
