/**
 * Get the value following a command-line flag
 */
export function getArg(args: string[], name: string): string | undefined {
	const index = args.indexOf(name);
	if (index !== -1 && args[index + 1]) {
		return args[index + 1];
	}
	return undefined;
}

/**
 * Whether a boolean flag is present
 */
export function hasFlag(args: string[], ...names: string[]): boolean {
	return names.some((name) => args.includes(name));
}
