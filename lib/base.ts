export type RegisterFunction = {
	(pattern: string | RegExp, run: (arg: RegExpMatchArray, ...args: string[]) => unknown, description?: string): void;
}

/** `'--width=80'`, `'width'` &rarr; `'80'` */
export function flagValue(args: readonly string[], name: string): string | undefined {
	const prefix = `--${name}=`
	const arg = args.findLast(a => a.startsWith(prefix))
	return arg?.slice(prefix.length)
}

/** `--chunk=20` as a number; `fallback` when absent. */
export function intFlag(args: readonly string[], name: string, fallback: number): number {
	const value = flagValue(args, name)
	if (value === undefined) return fallback
	const n = Number(value)
	if (!Number.isInteger(n) || n < 0) throw new Error(`--${name} expects a non-negative integer, got '${value}'`)
	return n
}

export function hasFlag(args: readonly string[], name: string): boolean {
	return args.includes(`--${name}`)
}

export function positionals(args: readonly string[]): string[] {
	return args.filter(a => !a.startsWith('--'))
}

export function getErrorMessage(error: unknown): string {
	if (typeof error == 'string') return error;
	if (error instanceof Error) return error.stack || error.message;
	if (typeof error == 'object' && error !== null && 'code' in error) return String(error.code);
	return String(error) || 'Error'
}

/** Print a failure the way commands report it and mark the process as failed. */
export async function reportError(err: unknown): Promise<void> {
	if (err instanceof Error && typeof err.stack === 'string') {
		const { default: cleanStack } = await import('clean-stack')
		console.error(cleanStack(err.stack, { pretty: true }))
	} else {
		console.error(getErrorMessage(err))
	}
	process.exitCode = 1
}
