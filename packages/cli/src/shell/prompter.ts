// =============================================================================
// PROMPTER: the shell's only view of the terminal
// =============================================================================
// Every prompt resolves to `null` when the user cancels (Ctrl+C / Esc), so the
// menu loops never see clack's cancel symbol.

import * as p from "@clack/prompts";
import pc from "picocolors";

export interface MenuOption<V extends string> {
	value: V;
	label: string;
	hint?: string;
}

export interface Prompter {
	select<V extends string>(message: string, options: MenuOption<V>[]): Promise<V | null>;
	text(message: string, placeholder?: string): Promise<string | null>;
	info(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	/** Multi-line block, printed as-is. */
	message(message: string): void;
	intro(title: string): void;
	outro(message: string): void;
}

export function createClackPrompter(): Prompter {
	return {
		async select(message, options) {
			const result = await p.select({ message, options });
			if (p.isCancel(result)) return null;
			return options.find((option) => option.value === result)?.value ?? null;
		},
		async text(message, placeholder) {
			const result = await p.text({ message, placeholder, defaultValue: "" });
			return p.isCancel(result) ? null : result.trim();
		},
		info: (message) => p.log.info(message),
		success: (message) => p.log.success(message),
		warn: (message) => p.log.warning(message),
		error: (message) => p.log.error(pc.red(message)),
		message: (message) => p.log.message(message),
		intro: (title) => p.intro(pc.bgCyan(pc.black(` ${title} `))),
		outro: (message) => p.outro(pc.dim(message)),
	};
}
