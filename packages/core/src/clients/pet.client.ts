/**
 * Pet Client
 *
 * Operations on `/pet`.
 */

import type { HttpRequestOptions, HttpResponse } from "../protocols/http";
import type { ApiMessage, Pet } from "../models";
import { ResourceClient, type ResponsePredicate } from "./resource-client";

const byId = (method: HttpRequestOptions["method"], petId: number): HttpRequestOptions => ({
	method,
	path: "/pet/{petId}",
	pathParams: { petId },
});

export class PetClient extends ResourceClient {
	/**
	 * POST /pet, expecting 200 JSON.
	 */
	addPet(pet: Partial<Pet>): Promise<HttpResponse<Pet>> {
		return this.sendExpecting<Pet>({ method: "POST", path: "/pet", body: pet });
	}

	/**
	 * POST /pet, any status.
	 */
	addPetRaw(pet: Partial<Pet>): Promise<HttpResponse<Pet | ApiMessage>> {
		return this.send<Pet | ApiMessage>({ method: "POST", path: "/pet", body: pet });
	}

	/**
	 * GET /pet/{petId}, any status. The primitive the waiting reads poll.
	 */
	getPetByIdRaw(petId: number): Promise<HttpResponse<Pet | ApiMessage>> {
		return this.send<Pet | ApiMessage>(byId("GET", petId));
	}

	/**
	 * GET /pet/{petId} until it answers 200.
	 */
	getPetById(petId: number): Promise<HttpResponse<Pet>> {
		return this.waitForStatus<Pet>(byId("GET", petId), 200, this.policy("read"), `pet ${petId} readable`);
	}

	/**
	 * GET /pet/{petId} until it answers 404, e.g. after a delete.
	 */
	getPetByIdExpectingError(petId: number): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(byId("GET", petId), 404, this.policy("absence"), `pet ${petId} absent`);
	}

	/**
	 * GET /pet/{petId} until it answers 200 with a body the predicate accepts.
	 */
	waitForPet(petId: number, predicate: (pet: Pet) => boolean, description = `pet ${petId} updated`): Promise<HttpResponse<Pet>> {
		const accepts: ResponsePredicate<Pet> = (response) =>
			response.code === 200 && response.body !== undefined && predicate(response.body);
		return this.waitFor<Pet>(byId("GET", petId), accepts, this.policy("convergence"), description);
	}

	/**
	 * PUT /pet, any status.
	 */
	updatePetRaw(pet: Partial<Pet>): Promise<HttpResponse<Pet | ApiMessage>> {
		return this.send<Pet | ApiMessage>({ method: "PUT", path: "/pet", body: pet });
	}

	/**
	 * PUT /pet until it answers 200.
	 */
	updatePet(pet: Partial<Pet>): Promise<HttpResponse<Pet>> {
		return this.waitForStatus<Pet>(
			{ method: "PUT", path: "/pet", body: pet },
			200,
			this.policy("update"),
			`pet ${pet.id ?? "(no id)"} update acknowledged`,
		);
	}

	/**
	 * DELETE /pet/{petId}, any status. Used by cleanup.
	 */
	deletePetRaw(petId: number): Promise<HttpResponse<ApiMessage>> {
		return this.send<ApiMessage>(byId("DELETE", petId));
	}

	/**
	 * DELETE /pet/{petId} until it answers 200.
	 */
	deletePet(petId: number): Promise<HttpResponse<ApiMessage>> {
		return this.waitForStatus<ApiMessage>(byId("DELETE", petId), 200, this.policy("delete"), `pet ${petId} deleted`);
	}

	/**
	 * GET /pet/findByStatus, expecting 200 JSON.
	 */
	getPetsByStatus(status: string): Promise<HttpResponse<Pet[]>> {
		return this.sendExpecting<Pet[]>({ method: "GET", path: "/pet/findByStatus", query: { status } });
	}
}
