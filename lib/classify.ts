export type BlockKind =
	| 'heading'
	| 'fencedCode'
	| 'thematicBreak'
	| 'blockquote'
	| 'list'
	| 'table'
	| 'paragraph'
	| 'blank'
	| 'setextUnderline'

export interface IFence {
	readonly char: '`' | '~'
	readonly length: number
	readonly indent: number
}

export interface IClassifyOptions {
	/** A paragraph is open, so a bare `===`/`---` run underlines it. */
	readonly inParagraph?: boolean
}

/** `'\t  foo'` &rarr; `'foo'` */
export function trimIndent(line: string): string {
	return line.replace(/^[ \t]+/, '')
}

/** Tabs count as one column. */
export function countIndent(line: string): number {
	return line.length - trimIndent(line).length
}

export function isBlankLine(line: string): boolean {
	return line.trim() === ''
}

export function isHeading(trimmed: string): boolean {
	return /^#{1,6}(?:[ \t]|$)/.test(trimmed)
}

export function isThematicBreak(trimmed: string): boolean {
	const char = trimmed[0]
	if (char !== '-' && char !== '*' && char !== '_') return false
	let count = 0
	for (const c of trimmed) {
		if (c === char) count++
		else if (c !== ' ' && c !== '\t') return false
	}
	return count >= 3
}

export function isSetextUnderline(line: string): boolean {
	return /^(?:=+|-+)$/.test(line.trim())
}

export function isListMarker(trimmed: string): boolean {
	return /^[-*+][ \t]/.test(trimmed) || /^\d{1,9}[.)](?:[ \t]|$)/.test(trimmed)
}

/** `'1.'` or `'2)'` with nothing typed after the marker yet. */
export function isOrderedListMarkerPrefix(trimmed: string): boolean {
	return /^\d{1,9}[.)]$/.test(trimmed)
}

export function isTableLine(line: string): boolean {
	return !isBlankLine(line) && line.includes('|')
}

export function parseFence(line: string): IFence | undefined {
	const match = /^(`{3,}|~{3,})/.exec(trimIndent(line))
	if (!match) return
	const run = match[1]
	return { char: run[0] === '~' ? '~' : '`', length: run.length, indent: countIndent(line) }
}

export function isClosingFence(line: string, fence: IFence): boolean {
	if (countIndent(line) > Math.max(3, fence.indent + 3)) return false
	const trimmed = trimIndent(line)
	let run = 0
	while (run < trimmed.length && trimmed[run] === fence.char) run++
	return run >= fence.length && isBlankLine(trimmed.slice(run))
}

/**
 * Classify one line (without its newline). Order matters: a setext underline
 * beats a thematic break only while a paragraph is open.
 */
export function classifyLine(line: string, options: IClassifyOptions = {}): BlockKind {
	const trimmed = trimIndent(line)
	if (isBlankLine(trimmed)) return 'blank'
	if (isHeading(trimmed)) return 'heading'
	if (parseFence(trimmed)) return 'fencedCode'
	if (options.inParagraph && isSetextUnderline(trimmed)) return 'setextUnderline'
	if (isThematicBreak(trimmed)) return 'thematicBreak'
	if (trimmed[0] === '>') return 'blockquote'
	if (isListMarker(trimmed)) return 'list'
	if (isTableLine(trimmed)) return 'table'
	return 'paragraph'
}
