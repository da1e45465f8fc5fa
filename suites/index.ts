import type { TestCase } from "petprobe";
import { knownDefectsSuite } from "./known-defects.suite";
import { petSuite } from "./pet.suite";
import { storeSuite } from "./store.suite";
import type { SuiteClients } from "./support/clients";
import { userSuite } from "./user.suite";

export { knownDefectsSuite, petSuite, storeSuite, userSuite };
export type { SuiteClients };
export { registerScenario } from "./support/register";

/**
 * Every suite, keyed by the scenario name it runs under
 */
export function allSuites(clients: SuiteClients): Record<string, TestCase[]> {
	return {
		"Pet API": petSuite(clients),
		"Store API": storeSuite(clients),
		"User API": userSuite(clients),
		"Known defects": knownDefectsSuite(clients),
	};
}
