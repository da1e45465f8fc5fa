/**
 * Petprobe Core
 *
 * Conformance-testing toolkit for the pet-store REST API: typed resource
 * clients over fetch, bounded await-until polling, response assertions,
 * test cases with cleanup ledgers, interaction recording and reporters.
 *
 * For reporters:
 * - @petprobe/reporter-allure - Allure results on disk
 *
 * @example
 * ```typescript
 * import { createClients, loadConfig, scenario, testCase } from "petprobe";
 *
 * const { pets, recorder, logger } = createClients(loadConfig());
 *
 * const tc = testCase("Create and read a pet", async ({ step, ledger }) => {
 *   const created = ledger("pet", (id: number) => pets.deletePetRaw(id));
 *   const id = created.track(12345);
 *   await step("create", () => pets.addPet({ id, name: "Rex", photoUrls: [] }));
 *   await step("read", () => pets.getPetById(id));
 * });
 *
 * await scenario({ name: "Pets", recorder, logger }).useConsoleReporter().run(tc);
 * ```
 */

export * from "./models";
export * from "./specs";
export * from "./errors";
export * from "./logging";
export * from "./config";
export * from "./protocols/http";
export * from "./await";
export * from "./assertions";
export * from "./clients";
export * from "./execution";
export * from "./recording";
export { isRecord, sleep, stringify, truncate } from "./utils";
