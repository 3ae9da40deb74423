import type { TellerLogger } from "@atm-teller/core";
import { createConsoleLogger, createJsonLogger } from "@atm-teller/core/logger";
import { createFileAccountStore, createTeller } from "@atm-teller/teller";
import { createClackPrompter, type Prompter } from "./shell/prompter.js";
import { runShell } from "./shell/shell.js";
import { type CliFlags, getConfig, type TellerCliConfig } from "./utils/get-config.js";

export interface RunCliOptions extends CliFlags {
	version: string;
	sleep: (ms: number) => Promise<void>;
	/** Defaults to the interactive clack prompter */
	prompter?: Prompter;
	env?: NodeJS.ProcessEnv;
}

export function createLogger(config: TellerCliConfig): TellerLogger {
	return config.logFormat === "json"
		? createJsonLogger({ level: config.logLevel })
		: createConsoleLogger({ level: config.logLevel });
}

/**
 * Resolve configuration, open the file store and run the interactive shell
 * until the user exits. A corrupt snapshot rejects before any prompt.
 */
export async function runCli(options: RunCliOptions): Promise<void> {
	const config = await getConfig(options, options.env);
	const logger = createLogger(config);

	const store = createFileAccountStore({ path: config.dataFile, cwd: options.cwd, logger });
	const teller = createTeller({
		store,
		currency: config.currency,
		statementLimit: config.statementLimit,
		logger,
	});
	logger.debug("Teller started", { version: options.version, dataFile: store.path });

	const prompter = options.prompter ?? createClackPrompter();
	prompter.intro(`teller v${options.version}`);
	await runShell(teller, prompter, {
		seedDemo: config.seedDemo,
		logoutDelayMs: config.logoutDelayMs,
		sleep: options.sleep,
	});
}
