/** Anything text can be written to. `process.stdout` qualifies. */
export interface ISink {
	write(chunk: string): unknown
}

/** A sink that can discard everything written so far. */
export interface IResettableSink extends ISink {
	reset(): void
}

export function isResettable(sink: ISink): sink is IResettableSink {
	return 'reset' in sink && typeof sink.reset === 'function'
}

/** In-memory resettable sink. */
export class MemorySink implements IResettableSink {
	private chunks: string[] = []

	write(chunk: string): void {
		this.chunks.push(chunk)
	}

	reset(): void {
		this.chunks = []
	}

	toString(): string {
		return this.chunks.join('')
	}
}

/** Write-only sink; changed output cannot be taken back. */
export class AppendOnlySink implements ISink {
	private text = ''

	write(chunk: string): void {
		this.text += chunk
	}

	toString(): string {
		return this.text
	}
}

export interface IWritableLike {
	write(chunk: string): unknown
	readonly isTTY?: boolean
}

/**
 * A terminal as a resettable sink: resetting clears the screen and the
 * scrollback and homes the cursor.
 */
export class TerminalSink implements IResettableSink {
	constructor(readonly stream: IWritableLike) {}

	write(chunk: string): void {
		this.stream.write(chunk)
	}

	reset(): void {
		this.stream.write('\x1B[2J\x1B[3J\x1B[H')
	}
}
