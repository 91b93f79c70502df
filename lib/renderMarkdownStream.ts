import { TerminalSink, type ISink, type IWritableLike } from './sink'
import { StreamRenderer, type IStreamRendererOptions } from './streamRenderer'

export interface IRenderMarkdownStreamOptions extends IStreamRendererOptions {
	/** Defaults to `process.stdout`. */
	readonly output?: ISink | ITerminalStream
}

/** A writable that emits `resize`, like a TTY `process.stdout`. */
export interface ITerminalStream extends IWritableLike {
	readonly columns?: number
	on(event: 'resize', listener: () => void): unknown
	off(event: 'resize', listener: () => void): unknown
}

function isTerminalStream(output: ISink | ITerminalStream): output is ITerminalStream {
	return 'isTTY' in output && output.isTTY === true && 'on' in output && 'off' in output
}

/**
 * Render markdown arriving in chunks. On a TTY the output follows terminal
 * resizes and gets the full-rewrite capability of a terminal sink.
 */
export async function renderMarkdownStream(stream: AsyncIterable<string>, options: IRenderMarkdownStreamOptions = {}): Promise<void> {
	const output = options.output ?? process.stdout
	const terminal = isTerminalStream(output) ? output : undefined
	const sink = terminal ? new TerminalSink(terminal) : output

	const renderer = new StreamRenderer(sink, {
		...options,
		width: options.width ?? terminal?.columns,
	})

	const onResize = () => {
		if (terminal?.columns) renderer.resize(terminal.columns)
	}
	terminal?.on('resize', onResize)
	try {
		for await (const chunk of stream) {
			renderer.write(chunk)
		}
		renderer.close()
	} finally {
		terminal?.off('resize', onResize)
	}
}
