import { isResettable, type IResettableSink, type ISink } from './sink'
import { ansiSequenceEnd } from './terminal'

export class NonResettableWriterError extends Error {
	override name = 'NonResettableWriterError'

	constructor() {
		super('streaming renderer cannot update changed prefix with non-resettable writer')
	}
}

export interface IApplySnapshotOptions {
	/** Reset a resettable sink and write the whole snapshot when the prefix changed. */
	readonly rewrite?: boolean
}

/**
 * Where to start writing `snapshot` so that the write begins at or before
 * `offset` and not inside an escape sequence.
 */
export function safeTailStart(snapshot: string, offset: number): number {
	let i = 0
	while (i < offset) {
		const end = ansiSequenceEnd(snapshot, i)
		if (end > offset) return i
		i = end > i ? end : i + 1
	}
	return offset
}

function rewriteAll(sink: IResettableSink, snapshot: string): string {
	sink.reset()
	if (snapshot) sink.write(snapshot)
	return snapshot
}

/**
 * Bring `sink`, which currently holds `emitted`, in line with `snapshot`
 * using as few writes as it can. Returns what the sink holds afterwards.
 *
 * After a tail write the result is `emitted + tail`, which no longer
 * prefixes later snapshots, so later commits take the tail path too and a
 * shorter snapshot resets the sink (a terminal loses its scrollback). The
 * final flush rewrites, so the end result matches a direct render.
 *
 * @throws {NonResettableWriterError} when the prefix changed and the sink
 * cannot be reset.
 */
export function applySnapshot(sink: ISink, emitted: string, snapshot: string, options: IApplySnapshotOptions = {}): string {
	if (snapshot === emitted) return emitted

	if (snapshot.startsWith(emitted)) {
		sink.write(snapshot.slice(emitted.length))
		return snapshot
	}

	if (!isResettable(sink)) {
		throw new NonResettableWriterError()
	}

	if (options.rewrite || snapshot.length < emitted.length) {
		return rewriteAll(sink, snapshot)
	}

	// Earlier bytes stay stale until the next full rewrite.
	const start = safeTailStart(snapshot, emitted.length)
	const tail = snapshot.slice(start)
	if (tail) sink.write(tail)
	return emitted + tail
}
