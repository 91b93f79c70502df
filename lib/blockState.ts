import { classifyLine, countIndent, isBlankLine, isClosingFence, isListMarker, isTableLine, parseFence, trimIndent, type IFence } from './classify'

export interface IListContext {
	/** Shallowest marker indent seen in this list. */
	readonly baseIndent: number
	readonly lastMarkerIndent: number
}

/**
 * What block is open. Nested blocks opened inside a list item carry the list
 * context in `resume` and return to it when they close.
 */
export type BlockState =
	| { readonly kind: 'ready' }
	| { readonly kind: 'paragraph' }
	| { readonly kind: 'fencedCode', readonly fence: IFence, readonly resume?: IListContext }
	| { readonly kind: 'table', readonly resume?: IListContext }
	| { readonly kind: 'list', readonly list: IListContext }
	| { readonly kind: 'blockquote', readonly resume?: IListContext }

export interface IBlockMachine {
	readonly state: BlockState
	/** Raw lines of the open block, newlines included. */
	readonly pending: readonly string[]
}

/**
 * `append` lines go straight into the committed document; `commit` lines do
 * too, and then the document is rendered.
 */
export interface IBlockEffect {
	readonly kind: 'append' | 'commit'
	readonly lines: readonly string[]
}

export interface IStepResult {
	readonly machine: IBlockMachine
	readonly effects: readonly IBlockEffect[]
}

const READY: BlockState = { kind: 'ready' }

export const initialMachine: IBlockMachine = { state: READY, pending: [] }

/** `'foo\r\n'` &rarr; `'foo'` */
function lineContent(rawLine: string): string {
	return rawLine.replace(/\n$/, '').replace(/\r$/, '')
}

function commit(lines: readonly string[]): IBlockEffect {
	return { kind: 'commit', lines }
}

class Step {
	state: BlockState
	pending: string[]
	readonly effects: IBlockEffect[] = []

	constructor(machine: IBlockMachine) {
		this.state = machine.state
		this.pending = [...machine.pending]
	}

	result(): IStepResult {
		return { machine: { state: this.state, pending: this.pending }, effects: this.effects }
	}

	/** Commit the open block plus `extra` lines and go back to ready. */
	close(...extra: string[]): void {
		const lines = [...this.pending, ...extra]
		this.pending = []
		this.state = READY
		if (lines.length > 0) this.effects.push(commit(lines))
	}

	dispatch(rawLine: string): void {
		const content = lineContent(rawLine)
		switch (this.state.kind) {
			case 'ready': return this.ready(content, rawLine)
			case 'paragraph': return this.paragraph(content, rawLine)
			case 'fencedCode': return this.fencedCode(this.state, content, rawLine)
			case 'table': return this.table(this.state, content, rawLine)
			case 'list': return this.list(this.state.list, content, rawLine)
			case 'blockquote': return this.blockquote(this.state, content, rawLine)
		}
	}

	ready(content: string, rawLine: string): void {
		const kind = classifyLine(content)
		switch (kind) {
			case 'blank':
				this.effects.push({ kind: 'append', lines: [rawLine] })
				return
			case 'heading':
			case 'thematicBreak':
				this.effects.push(commit([rawLine]))
				return
			case 'fencedCode': {
				const fence = parseFence(content)
				this.state = fence ? { kind: 'fencedCode', fence } : { kind: 'paragraph' }
				break
			}
			case 'table':
				this.state = { kind: 'table' }
				break
			case 'list': {
				const indent = countIndent(content)
				this.state = { kind: 'list', list: { baseIndent: indent, lastMarkerIndent: indent } }
				break
			}
			case 'blockquote':
				this.state = { kind: 'blockquote' }
				break
			default:
				this.state = { kind: 'paragraph' }
		}
		this.pending.push(rawLine)
	}

	paragraph(content: string, rawLine: string): void {
		const kind = classifyLine(content, { inParagraph: true })
		if (kind === 'blank' || kind === 'setextUnderline') {
			this.close(rawLine)
			return
		}
		if (kind !== 'paragraph') {
			this.close()
			this.ready(content, rawLine)
			return
		}
		this.pending.push(rawLine)
	}

	fencedCode(state: Extract<BlockState, { kind: 'fencedCode' }>, content: string, rawLine: string): void {
		this.pending.push(rawLine)
		if (!isClosingFence(content, state.fence)) return
		if (state.resume) {
			this.state = { kind: 'list', list: state.resume }
		} else {
			this.close()
		}
	}

	table(state: Extract<BlockState, { kind: 'table' }>, content: string, rawLine: string): void {
		if (isTableLine(content)) {
			this.pending.push(rawLine)
		} else if (state.resume) {
			this.state = { kind: 'list', list: state.resume }
			this.list(state.resume, content, rawLine)
		} else {
			this.close()
			this.ready(content, rawLine)
		}
	}

	list(list: IListContext, content: string, rawLine: string): void {
		if (isBlankLine(content)) {
			// A list may go on after a blank line.
			this.pending.push(rawLine)
			return
		}

		const indent = countIndent(content)
		if (isListMarker(trimIndent(content))) {
			// Sibling or outdented marker: everything before it is final.
			if (indent <= list.baseIndent || indent < list.lastMarkerIndent) {
				this.close()
			}
			this.pending.push(rawLine)
			this.state = {
				kind: 'list',
				list: { baseIndent: Math.min(list.baseIndent, indent), lastMarkerIndent: indent },
			}
			return
		}

		const kind = classifyLine(content)
		if (indent > list.baseIndent) {
			switch (kind) {
				case 'fencedCode': {
					const fence = parseFence(content)
					if (fence) this.state = { kind: 'fencedCode', fence, resume: list }
					this.pending.push(rawLine)
					return
				}
				case 'blockquote':
					this.state = { kind: 'blockquote', resume: list }
					this.pending.push(rawLine)
					return
				case 'table':
					this.state = { kind: 'table', resume: list }
					this.pending.push(rawLine)
					return
				case 'paragraph':
				case 'heading':
				case 'thematicBreak':
					this.pending.push(rawLine)
					return
			}
		}

		this.close()
		this.ready(content, rawLine)
	}

	blockquote(state: Extract<BlockState, { kind: 'blockquote' }>, content: string, rawLine: string): void {
		if (isBlankLine(content) || trimIndent(content)[0] === '>') {
			this.pending.push(rawLine)
		} else if (state.resume) {
			this.state = { kind: 'list', list: state.resume }
			this.list(state.resume, content, rawLine)
		} else {
			this.close()
			this.ready(content, rawLine)
		}
	}
}

/**
 * Feed one complete raw line (newline included) to the machine. Pure: the
 * input machine is left untouched.
 */
export function step(machine: IBlockMachine, rawLine: string): IStepResult {
	const s = new Step(machine)
	s.dispatch(rawLine)
	return s.result()
}

/** Close whatever is open, as at end of stream. */
export function finish(machine: IBlockMachine): IStepResult {
	const s = new Step(machine)
	s.close()
	return s.result()
}
