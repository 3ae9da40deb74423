import { readFileSync } from "node:fs";
import { resolve } from "node:path";

/**
 * Read the CLI's version from the package.json one level above `dir`. `dir`
 * is `src/` when run from source and `dist/` once built.
 */
export function readPackageVersion(dir: string): string {
	const pkg: unknown = JSON.parse(readFileSync(resolve(dir, "../package.json"), "utf-8"));
	if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
		return pkg.version;
	}
	throw new Error(`${resolve(dir, "../package.json")} has no version`);
}
