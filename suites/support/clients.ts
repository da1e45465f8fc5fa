import type { PetClient, StoreClient, UserClient } from "petprobe";

/**
 * Clients a suite runs against
 */
export interface SuiteClients {
	pets: PetClient;
	users: UserClient;
	store: StoreClient;
}
