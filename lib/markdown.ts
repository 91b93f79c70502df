import { Marked, type MarkedExtension } from 'marked'
import { markedTerminal } from 'marked-terminal'

/** `marked-terminal` options: colors, section prefixes, tab size and so on. */
export type StyleProfile = NonNullable<Parameters<typeof markedTerminal>[0]>

/** Turns a whole markdown document into styled terminal text. */
export interface IDocumentRenderer {
	render(markdown: string): string
}

export type DocumentRendererFactory = (style: StyleProfile, width: number | undefined) => IDocumentRenderer

export class RendererError extends Error {
	override name = 'RendererError'
}

/**
 * `markedTerminal()` is typed as returning a renderer, but at run time it
 * returns an extension object holding one.
 */
function isMarkedExtension(value: unknown): value is MarkedExtension {
	return typeof value === 'object' && value !== null && 'renderer' in value
}

/** A `Marked` instance per renderer so widths do not leak through the global one. */
export const createTerminalRenderer: DocumentRendererFactory = (style, width) => {
	if (width !== undefined && !(Number.isInteger(width) && width > 0)) {
		throw new RendererError(`Invalid terminal width: ${width}`)
	}
	const options: StyleProfile = width === undefined ? style : { ...style, width, reflowText: true }
	const extension: unknown = markedTerminal(options)
	if (!isMarkedExtension(extension)) {
		throw new RendererError('marked-terminal did not return a marked extension')
	}
	const marked = new Marked(extension)
	return {
		render(markdown) {
			const rendered = marked.parse(markdown, { async: false })
			if (typeof rendered !== 'string') {
				throw new RendererError('Markdown extensions must not render asynchronously')
			}
			return rendered
		}
	}
}

const MULTI_NEWLINE = /\n{3,}/g

/** Reduce 3+ consecutive newlines to one blank line. */
export function collapseBlankLines(text: string): string {
	return text.replace(MULTI_NEWLINE, '\n\n')
}

/** Tabs become two spaces so the renderer does not expand them to eight. */
export function normalizeTabs(markdown: string): string {
	return markdown.replaceAll('\t', '  ')
}

export function trimTrailingNewlines(text: string): string {
	return text.replace(/\n+$/, '')
}

/** What the pipeline emits for a finished document, trailing newlines included. */
export function renderDocument(renderer: IDocumentRenderer, markdown: string): string {
	return collapseBlankLines(renderer.render(normalizeTabs(markdown)))
}
