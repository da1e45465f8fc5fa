import type { Label } from "allure-js-commons";

/**
 * Where the HTTP exchanges of a test case end up in its Allure result:
 * a JSON attachment, one `METHOD url` parameter per exchange, both, or
 * nowhere.
 */
export type InteractionsMode = "attachments" | "parameters" | "both" | "none";

export interface AllureReporterOptions {
	/** Defaults to `allure-results`, created on the first write */
	resultsDir?: string;

	/** Written to `environment.properties` once a scenario completes, e.g. the base URL under test */
	environmentInfo?: Record<string, string>;

	// Labels. A test case's own epic and feature take precedence over the defaults.
	labels?: Label[];
	defaultEpic?: string;
	defaultFeature?: string;

	// Links. `{id}` is replaced by the test case id or by each issue id.
	tmsUrlPattern?: string;
	issueUrlPattern?: string;

	/** Defaults to `attachments` */
	includeInteractions?: InteractionsMode;
	/** Parameter values longer than this are cut and end in `...`; defaults to 1000 */
	maxParameterSize?: number;
}
