import type { ISink } from './sink'

const ESC = '\x1B'

/** CSI sequences and OSC strings (hyperlinks), terminated by BEL or ST. */
const ANSI_PATTERN = /\x1B\[[0-?]*[ -/]*[@-~]|\x1B\][^\x07\x1B]*(?:\x07|\x1B\\)|\x1B[@-Z\\-_]/g
const ANSI_AT = new RegExp(ANSI_PATTERN.source, 'y')

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' })

export function stripAnsi(text: string): string {
	return text.replace(ANSI_PATTERN, '')
}

/**
 * End index of the escape sequence starting at `start`, or `start` when there
 * is none there.
 */
export function ansiSequenceEnd(text: string, start: number): number {
	if (text[start] !== ESC) return start
	ANSI_AT.lastIndex = start
	const match = ANSI_AT.exec(text)
	return match ? start + match[0].length : start
}

function isWide(codePoint: number): boolean {
	return (
		(codePoint >= 0x1100 && codePoint <= 0x115F) ||
		(codePoint >= 0x2E80 && codePoint <= 0xA4CF && codePoint !== 0x303F) ||
		(codePoint >= 0xAC00 && codePoint <= 0xD7A3) ||
		(codePoint >= 0xF900 && codePoint <= 0xFAFF) ||
		(codePoint >= 0xFE30 && codePoint <= 0xFE4F) ||
		(codePoint >= 0xFF00 && codePoint <= 0xFF60) ||
		(codePoint >= 0xFFE0 && codePoint <= 0xFFE6) ||
		(codePoint >= 0x1F300 && codePoint <= 0x1FAFF) ||
		(codePoint >= 0x20000 && codePoint <= 0x3FFFD)
	)
}

function graphemeWidth(grapheme: string): number {
	const codePoint = grapheme.codePointAt(0) ?? 0
	if (codePoint < 0x20 || (codePoint >= 0x7F && codePoint < 0xA0)) return 0
	if (/^\p{Mark}+$/u.test(grapheme) || /^[\u200B-\u200F\u2060\uFEFF]+$/.test(grapheme)) return 0
	if (isWide(codePoint) || /\p{Extended_Pictographic}\uFE0F/u.test(grapheme)) return 2
	return 1
}

/** Terminal cells taken by `text`, ignoring escape sequences. */
export function displayWidth(text: string): number {
	const plain = stripAnsi(text)
	if (/^[\x20-\x7E]*$/.test(plain)) return plain.length
	let width = 0
	for (const { segment } of graphemeSegmenter.segment(plain)) {
		width += graphemeWidth(segment)
	}
	return width
}

/** Cursor movement and erasure for retracting speculative output. */
export class TerminalController {
	constructor(private readonly output: ISink, public width: number) {}

	/** Cursor up `n` rows, to column 1, then erase to the end of the screen. */
	clearLines(n: number): void {
		if (n <= 0) return
		this.output.write(`${ESC}[${n}A${ESC}[1G${ESC}[J`)
	}

	/** Rows `rendered` occupies at the current width; a trailing newline adds none. */
	countLines(rendered: string): number {
		if (rendered === '') return 0
		const lines = rendered.split('\n')
		let rows = 0
		lines.forEach((line, i) => {
			if (i === lines.length - 1 && line === '') return
			const width = displayWidth(line)
			rows += width > 0 && this.width > 0 ? Math.max(1, Math.ceil(width / this.width)) : 1
		})
		return rows
	}
}
