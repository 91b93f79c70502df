/// <reference types="node" />

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { setTimeout } from 'node:timers/promises';

import { flagValue, hasFlag, intFlag, positionals, reportError, type RegisterFunction } from './lib/base';
import { loadStyleConfig, pickStyle } from './lib/config';
import { renderMarkdownStream } from './lib/renderMarkdownStream';

export { StreamRenderer, type IStreamRendererOptions } from './lib/streamRenderer';
export { applySnapshot, NonResettableWriterError } from './lib/reconcile';
export { findSafePoint } from './lib/safePoint';
export { classifyLine, type BlockKind } from './lib/classify';
export { step, finish, initialMachine, type BlockState, type IBlockMachine } from './lib/blockState';
export { createTerminalRenderer, RendererError, type IDocumentRenderer, type StyleProfile } from './lib/markdown';
export { MemorySink, AppendOnlySink, TerminalSink, type ISink, type IResettableSink } from './lib/sink';
export { TerminalController } from './lib/terminal';
export { renderMarkdownStream } from './lib/renderMarkdownStream';

export const STYLES_FILE = fileURLToPath(new URL('./private/styles.json', import.meta.url))

/** Split `text` into random chunks of 1..`maxChunk` characters, pausing up to `delay` ms between them. */
export async function* chunked(text: string, maxChunk: number, delay: number): AsyncGenerator<string> {
	let pos = 0
	while (pos < text.length) {
		const chunkSize = Math.floor(Math.random() * maxChunk) + 1
		yield text.slice(pos, pos + chunkSize)
		pos += chunkSize
		// Simulated network latency
		if (delay > 0) await setTimeout(Math.random() * delay)
	}
}

export interface IInstallOptions {
	readonly stylesFile?: string
}

export default function install(register: RegisterFunction, { stylesFile = STYLES_FILE }: IInstallOptions = {}) {
	register('md', async (_, ...args) => {
		try {
			let [file] = positionals(args)
			if (!file) {
				const { text, isCancel } = await import('@clack/prompts')
				const answer = await text({ message: 'Markdown file:' })
				if (isCancel(answer) || !answer) return
				file = answer
			}

			const configs = loadStyleConfig(stylesFile)
			const name = flagValue(args, 'style')
			const config = pickStyle(configs, name)
			if (name && !config) {
				console.log(`Not found style '${name}', expect ${configs.map(c => c.name).join(' or ')}`)
				return
			}

			const width = intFlag(args, 'width', 0) || config?.width
			const maxChunk = Math.max(1, intFlag(args, 'chunk', 20))
			const delay = intFlag(args, 'delay', 0)
			const content = readFileSync(file, 'utf-8')
			await renderMarkdownStream(chunked(content, maxChunk, delay), {
				style: config?.style,
				width,
				partial: hasFlag(args, 'partial') || config?.partial,
			})
		} catch (err) {
			await reportError(err)
		}
	}, 'Stream a markdown file to the terminal in random chunks')

	register('md-styles', async () => {
		try {
			const configs = loadStyleConfig(stylesFile)
			if (configs.length == 0) {
				console.log(`No styles, create ${stylesFile} to add some.`)
				return
			}
			for (const [i, config] of configs.entries()) {
				const options = JSON.stringify({ ...config.style, width: config.width, partial: config.partial })
				console.log(`  ${config.name}${i == 0 ? ' (default)' : ''} \x1B[2m${options}\x1B[m`)
			}
		} catch (err) {
			await reportError(err)
		}
	}, 'List markdown style profiles')
}
