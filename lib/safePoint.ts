const PAIRS: Record<string, string> = { '(': ')', '[': ']' }

/** Index of the first single `marker` at or after `from` that is not part of a doubled run. */
function findSingleMarker(content: string, marker: string, from: number): number {
	let search = from
	while (search < content.length) {
		const pos = content.indexOf(marker, search)
		if (pos < 0) return -1
		const doubledAfter = content[pos + 1] === marker
		const doubledBefore = pos > search && content[pos - 1] === marker
		if (!doubledAfter && !doubledBefore) return pos
		search = pos + 1
	}
	return -1
}

/**
 * Scan a bracketed link `[text](dest)` or `[text][ref]` starting at `start`.
 * Returns the index just past it, or -1 when it is still open. Plain
 * `[text]` with no destination counts as closed.
 */
function scanLink(content: string, start: number): number {
	const n = content.length
	let i = start + 1
	let depth = 1
	while (i < n) {
		const c = content[i]
		if (c === '\\' && i + 1 < n) {
			i += 2
			continue
		}
		if (c === '[') {
			depth++
		} else if (c === ']' && --depth === 0) {
			const opener = content[i + 1]
			const closer = opener === undefined ? undefined : PAIRS[opener]
			if (closer === undefined) return i + 1
			i += 2
			let nested = 1
			while (i < n && nested > 0) {
				const d = content[i]
				if (d === '\\' && i + 1 < n) {
					i += 2
					continue
				}
				if (d === opener) nested++
				else if (d === closer) nested--
				i++
			}
			return nested === 0 ? i : -1
		}
		i++
	}
	return -1
}

/**
 * Length of the longest prefix of `content` that holds no unclosed inline
 * syntax: code spans, `**`/`__`, `*`/`_`, `~~` and links. When several spans
 * are open the earliest opener wins. Trailing spaces and tabs are dropped,
 * keeping at least one character.
 *
 * @example findSafePoint('hello **wor') // 5
 */
export function findSafePoint(content: string): number {
	const n = content.length
	if (n === 0) return 0

	let safePoint = n
	const unsafeAt = (start: number) => { safePoint = Math.min(safePoint, start) }

	let i = 0
	while (i < n) {
		const c = content[i]

		if (c === '\\' && i + 1 < n) {
			i += 2
			continue
		}

		if (c === '`') {
			const start = i
			while (i < n && content[i] === '`') i++
			const fence = content.slice(start, i)
			const close = content.indexOf(fence, i)
			if (close < 0) unsafeAt(start)
			else i = close + fence.length
			continue
		}

		if ((c === '*' || c === '_') && content[i + 1] === c) {
			const start = i
			const close = content.indexOf(c + c, i + 2)
			if (close < 0) {
				unsafeAt(start)
				i += 2
			} else {
				i = close + 2
			}
			continue
		}

		if (c === '*' || c === '_') {
			const close = findSingleMarker(content, c, i + 1)
			if (close < 0) {
				unsafeAt(i)
				i++
			} else {
				i = close + 1
			}
			continue
		}

		if (c === '~' && content[i + 1] === '~') {
			const close = content.indexOf('~~', i + 2)
			if (close < 0) {
				unsafeAt(i)
				i += 2
			} else {
				i = close + 2
			}
			continue
		}

		if (c === '[') {
			const end = scanLink(content, i)
			if (end < 0) {
				unsafeAt(i)
				i++
			} else {
				i = end
			}
			continue
		}

		i++
	}

	while (safePoint > 1 && (content[safePoint - 1] === ' ' || content[safePoint - 1] === '\t')) {
		safePoint--
	}
	return safePoint
}
