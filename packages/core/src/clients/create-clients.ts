/**
 * Client Factory
 *
 * Wires one protocol, one set of specifications and the three resource
 * clients from a single configuration.
 */

import type { PetprobeConfig } from "../config";
import { createLogger, type Logger } from "../logging";
import { type FetchFn, HttpProtocol } from "../protocols/http";
import { InteractionRecorder } from "../recording/interaction-recorder";
import { type ApiSpecifications, createApiSpecifications } from "../specs";
import { PetClient } from "./pet.client";
import { StoreClient } from "./store.client";
import { UserClient } from "./user.client";

export interface PetprobeClients {
	specs: ApiSpecifications;
	protocol: HttpProtocol;
	recorder: InteractionRecorder;
	logger: Logger;
	pets: PetClient;
	users: UserClient;
	store: StoreClient;
}

export function createClients(
	config: PetprobeConfig,
	overrides?: { logger?: Logger; fetch?: FetchFn },
): PetprobeClients {
	const logger = overrides?.logger ?? createLogger(config.logLevel);
	const specs = createApiSpecifications({ baseUrl: config.baseUrl });
	const recorder = new InteractionRecorder();
	const protocol = new HttpProtocol({
		profile: specs.request,
		logger: logger.child?.("http") ?? logger,
		recorder,
		fetch: overrides?.fetch,
	});
	const options = { protocol, specs, policies: config.policies, logger };

	return {
		specs,
		protocol,
		recorder,
		logger,
		pets: new PetClient(options),
		users: new UserClient(options),
		store: new StoreClient(options),
	};
}
