/**
 * Opt-in stderr tracing.
 * Each scope is silent unless its environment flag is "1" or "true".
 */

export type DebugFn = (message: string) => void;

export function isFlagEnabled(value: string | undefined): boolean {
	return value === "1" || value === "true";
}

export function createDebug(scope: string, envVar: string): DebugFn {
	return (message: string) => {
		// Read on every call so tests and long-lived processes can toggle tracing.
		if (!isFlagEnabled(process.env[envVar])) {
			return;
		}
		process.stderr.write(`[voyager][${scope}] ${message}\n`);
	};
}
