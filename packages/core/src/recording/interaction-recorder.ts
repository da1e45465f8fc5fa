/**
 * Interaction Recorder
 *
 * Keeps the HTTP exchanges of the current test case so a failure can be
 * reported together with what was actually sent and received. The HTTP
 * protocol opens an interaction per request; the scenario drains the
 * recorder after every case.
 */

import type {
	Interaction,
	InteractionHandle,
	InteractionQuery,
	RecordedRequest,
} from "./recording.types";

const detached: InteractionHandle = {
	id: "",
	respond: () => {},
	fail: () => {},
};

export class InteractionRecorder {
	/** While false, `begin` records nothing and hands out a handle that does nothing */
	enabled = true;

	private interactions: Interaction[] = [];
	private sequence = 0;

	begin(request: RecordedRequest): InteractionHandle {
		if (!this.enabled) {
			return detached;
		}

		const interaction: Interaction = {
			id: `#${++this.sequence}`,
			method: request.method,
			url: request.url,
			requestPayload: request.requestPayload,
			sentAt: Date.now(),
			status: "pending",
		};
		this.interactions.push(interaction);

		const settle = (outcome: Pick<Interaction, "status" | "responseStatus" | "responsePayload" | "error">) => {
			if (interaction.status !== "pending") {
				return;
			}
			Object.assign(interaction, outcome, { duration: Date.now() - interaction.sentAt });
		};

		return {
			id: interaction.id,
			respond: (responseStatus, responsePayload) => settle({ status: "completed", responseStatus, responsePayload }),
			fail: (error) => settle({ status: "failed", error }),
		};
	}

	list(query: InteractionQuery = {}): Interaction[] {
		return this.interactions.filter((interaction) => matches(interaction, query));
	}

	failures(): Interaction[] {
		return this.list({ status: "failed" });
	}

	/**
	 * Everything recorded since the last drain or clear, oldest first
	 */
	drain(): Interaction[] {
		const drained = this.interactions;
		this.interactions = [];
		return drained;
	}

	clear(): void {
		this.interactions = [];
	}

	get size(): number {
		return this.interactions.length;
	}
}

function matches(interaction: Interaction, query: InteractionQuery): boolean {
	if (query.method !== undefined && interaction.method !== query.method) {
		return false;
	}
	if (query.status !== undefined && interaction.status !== query.status) {
		return false;
	}
	if (query.responseStatus !== undefined && interaction.responseStatus !== query.responseStatus) {
		return false;
	}
	if (typeof query.url === "string") {
		return interaction.url === query.url;
	}
	return query.url === undefined || query.url.test(interaction.url);
}
