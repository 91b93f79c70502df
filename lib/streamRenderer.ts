import { finish, initialMachine, step, type IBlockEffect, type IBlockMachine } from './blockState'
import { isListMarker, isOrderedListMarkerPrefix, trimIndent } from './classify'
import { collapseBlankLines, createTerminalRenderer, normalizeTabs, trimTrailingNewlines, type DocumentRendererFactory, type IDocumentRenderer, type StyleProfile } from './markdown'
import { applySnapshot } from './reconcile'
import { findSafePoint } from './safePoint'
import { isResettable, type ISink } from './sink'
import { TerminalController } from './terminal'

export interface IStreamRendererOptions {
	readonly style?: StyleProfile
	/** Terminal width in cells; also needed for partial previews. */
	readonly width?: number
	/** Preview the safe prefix of the open block. Needs `width`. */
	readonly partial?: boolean
	readonly createRenderer?: DocumentRendererFactory
}

interface IPartialState {
	readonly markdown: string
	readonly rendered: string
	/** Rows to move up to retract the preview, see `retractPartial`. */
	readonly rows: number
	/**
	 * Last committed line, erased with the preview and written back. A line
	 * exactly `width` cells wide leaves the cursor pending a wrap on its last
	 * column; the preview's leading newline then moves down one row, which is
	 * the one row `countLines` gives that line.
	 */
	readonly tail: string
}

/**
 * Streaming markdown renderer. Complete blocks are rendered as soon as they
 * close, by rendering the whole committed document and writing only what
 * changed. Once closed, the sink holds exactly what rendering the whole input
 * in one go would give, however the input was chunked.
 *
 * Not safe for concurrent use; calls must be serialized by the caller.
 */
export class StreamRenderer {
	private renderer: IDocumentRenderer
	private readonly createRenderer: DocumentRendererFactory
	private readonly style: StyleProfile
	private width: number | undefined
	private readonly terminal: TerminalController | undefined

	private machine: IBlockMachine = initialMachine
	private lineBuffer = ''
	private readonly decoder = new TextDecoder()
	private committed = ''
	private emitted = ''
	private partial: IPartialState | undefined

	constructor(private readonly output: ISink, options: IStreamRendererOptions = {}) {
		this.style = options.style ?? {}
		this.width = options.width
		this.createRenderer = options.createRenderer ?? createTerminalRenderer
		this.renderer = this.createRenderer(this.style, this.width)
		if (options.partial && this.width !== undefined && this.width > 0) {
			this.terminal = new TerminalController(output, this.width)
		}
	}

	/** Raw length of the markdown committed as complete blocks. */
	get committedMarkdownLength(): number {
		return this.committed.length
	}

	/** Length of what has been written to the sink. */
	get renderedLength(): number {
		return this.emitted.length
	}

	/** The open block: its complete lines plus any unterminated tail. */
	get pendingMarkdown(): string {
		return this.machine.pending.join('') + this.lineBuffer
	}

	get pendingIsTable(): boolean {
		if (this.machine.state.kind === 'table') return true
		return this.firstPendingLine().startsWith('|')
	}

	get pendingIsList(): boolean {
		if (this.machine.state.kind === 'list') return true
		const first = this.firstPendingLine()
		if (!first) return false
		// A lone '*' may still become emphasis, so it does not count.
		return isListMarker(first) || isOrderedListMarkerPrefix(first) || first === '-' || first === '+'
	}

	private firstPendingLine(): string {
		const [first = ''] = this.pendingMarkdown.split('\n', 1)
		return trimIndent(first.replace(/\r$/, ''))
	}

	/**
	 * Feed a chunk of markdown. Returns its length. A render failure is
	 * thrown after the affected lines were committed; later lines of the
	 * chunk stay buffered.
	 */
	write(chunk: string | Uint8Array): number {
		this.lineBuffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true })

		let newline: number
		while ((newline = this.lineBuffer.indexOf('\n')) >= 0) {
			const line = this.lineBuffer.slice(0, newline + 1)
			this.lineBuffer = this.lineBuffer.slice(newline + 1)
			const { machine, effects } = step(this.machine, line)
			this.machine = machine
			this.apply(effects)
		}

		if (this.terminal && (this.machine.pending.length > 0 || this.lineBuffer)) {
			this.renderPartial(this.terminal)
		}
		return chunk.length
	}

	/** Close the open block and write the final render, trailing newlines included. */
	flush(): void {
		this.retractPartial()

		this.lineBuffer += this.decoder.decode()
		if (this.lineBuffer) {
			const rest = this.lineBuffer.endsWith('\n') ? this.lineBuffer : this.lineBuffer + '\n'
			this.lineBuffer = ''
			this.machine = { ...this.machine, pending: [...this.machine.pending, rest] }
		}
		const { machine, effects } = finish(this.machine)
		this.machine = machine
		for (const effect of effects) this.committed += effect.lines.join('')

		if (!this.committed) return
		const rendered = collapseBlankLines(this.renderer.render(normalizeTabs(this.committed)))
		this.emitted = applySnapshot(this.output, this.emitted, rendered, { rewrite: true })
	}

	close(): void {
		this.flush()
	}

	/**
	 * Re-render the committed document at `width`. A resettable sink is reset
	 * first; otherwise the caller is expected to have cleared the screen.
	 */
	resize(width: number): void {
		if (width <= 0) return
		this.renderer = this.createRenderer(this.style, width)
		this.width = width
		if (this.terminal) this.terminal.width = width

		this.partial = undefined
		this.emitted = ''
		if (isResettable(this.output)) this.output.reset()

		if (!this.committed) return
		const snapshot = this.stableSnapshot()
		if (snapshot) {
			this.emitted = applySnapshot(this.output, this.emitted, snapshot, { rewrite: true })
		}
	}

	private apply(effects: readonly IBlockEffect[]): void {
		for (const [i, effect] of effects.entries()) {
			this.committed += effect.lines.join('')
			if (effect.kind !== 'commit') continue
			try {
				this.emit()
			} catch (err) {
				// Keep the input; a later flush renders it.
				for (const rest of effects.slice(i + 1)) this.committed += rest.lines.join('')
				throw err
			}
		}
	}

	/** Full render with trailing newlines dropped, since more may follow. */
	private stableSnapshot(): string {
		return trimTrailingNewlines(collapseBlankLines(this.renderer.render(normalizeTabs(this.committed))))
	}

	private emit(): void {
		this.retractPartial()
		if (!this.committed) return
		this.emitted = applySnapshot(this.output, this.emitted, this.stableSnapshot())
	}

	private renderPartial(terminal: TerminalController): void {
		const content = this.pendingMarkdown
		const safe = content.slice(0, findSafePoint(content))
		if (!safe || safe === this.partial?.markdown) return

		this.retractPartial()
		const rendered = trimTrailingNewlines(this.renderer.render(safe))

		// The preview starts on its own row below the committed output and
		// ends with a newline, so the cursor lands in column 1.
		const tail = this.emitted.slice(this.emitted.lastIndexOf('\n') + 1)
		const preview = (this.emitted ? '\n' : '') + rendered + '\n'
		this.output.write(preview)
		this.partial = { markdown: safe, rendered, rows: terminal.countLines(tail + preview), tail }
	}

	/** Erase the preview together with the last committed line, then restore that line. */
	private retractPartial(): void {
		const partial = this.partial
		this.partial = undefined
		if (!partial || !this.terminal) return
		this.terminal.clearLines(partial.rows)
		if (partial.tail) this.output.write(partial.tail)
	}
}
